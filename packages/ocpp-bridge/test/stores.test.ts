import { describe, expect, it, vi } from "vitest";
import { AdapterError } from "../src/errors.js";
import { InMemoryDeviceRegistry } from "../src/stores/registry.js";
import {
  InMemoryShadowStore,
  mergePatch,
  ShadowWriter,
} from "../src/stores/shadow.js";

describe("mergePatch", () => {
  it("should merge nested objects and replace everything else", () => {
    const doc = {
      boot: { model: "M1", vendorName: "V" },
      connectors: { "1": { "1": { status: "Available" } } },
      tags: ["a"],
    };

    expect(
      mergePatch(doc, {
        boot: { model: "M2" },
        connectors: { "1": { "2": { status: "Occupied" } } },
        tags: ["b"],
      }),
    ).toEqual({
      boot: { model: "M2", vendorName: "V" },
      connectors: {
        "1": { "1": { status: "Available" }, "2": { status: "Occupied" } },
      },
      tags: ["b"],
    });
  });

  it("should delete keys patched with null", () => {
    expect(
      mergePatch(
        { activeTransaction: { transactionId: "TX1" }, keep: 1 },
        { activeTransaction: null, missing: null },
      ),
    ).toEqual({ keep: 1 });
  });

  it("should not modify the target", () => {
    const doc = { a: { b: 1 } };
    mergePatch(doc, { a: { c: 2 } });
    expect(doc).toEqual({ a: { b: 1 } });
  });
});

describe("InMemoryShadowStore", () => {
  it("should merge writes per device and count them", async () => {
    const store = new InMemoryShadowStore();
    await store.merge("CP1", { lastHeartbeatAt: "t1" });
    await store.merge("CP1", { lastBootAt: "t0" });
    await store.merge("CP2", { lastHeartbeatAt: "t2" });

    expect(store.get("CP1")).toEqual({ lastHeartbeatAt: "t1", lastBootAt: "t0" });
    expect(store.get("CP3")).toEqual({});
    expect(store.writes).toBe(3);

    store.clear();
    expect(store.writes).toBe(0);
    expect(store.get("CP1")).toEqual({});
  });
});

describe("ShadowWriter", () => {
  it("should retry a failing store", async () => {
    const store = new InMemoryShadowStore();
    const merge = vi
      .spyOn(store, "merge")
      .mockRejectedValueOnce(new Error("blip"));
    const writer = new ShadowWriter(store, {
      retry: { retries: 2, baseDelayMs: 0 },
      logging: false,
    });

    await writer.merge("CP1", { a: 1 });

    expect(merge).toHaveBeenCalledTimes(2);
    expect(store.get("CP1")).toEqual({ a: 1 });
  });

  it("should fail with AdapterError once retries are exhausted", async () => {
    const writer = new ShadowWriter(
      { merge: vi.fn().mockRejectedValue(new Error("store down")) },
      { retry: { retries: 1, baseDelayMs: 0 }, logging: false },
    );

    const error = await writer.merge("CP1", { a: 1 }).catch((err) => err);

    expect(error).toBeInstanceOf(AdapterError);
    expect(error).toMatchObject({
      adapter: "shadow",
      attempts: 2,
      message: "shadow adapter failed after 2 attempt(s): store down",
    });
  });
});

describe("InMemoryDeviceRegistry", () => {
  it("should answer exists for provisioned devices", async () => {
    const registry = new InMemoryDeviceRegistry(["CP1"]);
    registry.add("CP2");

    await expect(registry.exists("CP1")).resolves.toBe(true);
    await expect(registry.exists("CP2")).resolves.toBe(true);
    await expect(registry.exists("CP3")).resolves.toBe(false);
    expect(registry.size).toBe(2);

    expect(registry.remove("CP1")).toBe(true);
    expect(registry.remove("CP1")).toBe(false);
    expect(registry.list()).toEqual(["CP2"]);
  });
});
