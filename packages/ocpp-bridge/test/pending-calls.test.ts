import { afterEach, describe, expect, it, vi } from "vitest";
import { DuplicatePendingCallError } from "../src/errors.js";
import { PendingCallTable } from "../src/pending-calls.js";
import type { OrphanResponse } from "../src/types.js";

function createTable(start = 1_000) {
  let now = start;
  const table = new PendingCallTable({
    defaultTimeoutMs: 500,
    now: () => now,
    logging: false,
  });
  return {
    table,
    advance: (ms: number) => {
      now += ms;
      return now;
    },
  };
}

describe("PendingCallTable", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("should register an entry with its deadline", () => {
    const { table } = createTable();
    const token = table.register("CP1", "m1", "Reset", 2_000);

    expect(token.messageId).toBe("m1");
    expect(token.deviceId).toBe("CP1");
    expect(token.action).toBe("Reset");
    expect(table.size).toBe(1);
    expect(table.sizeFor("CP1")).toBe(1);
    expect(table.has("CP1", "m1")).toBe(true);

    const entry = table.peek("CP1", "m1");
    expect(entry?.issuedAt).toBe(1_000);
    expect(entry?.timeoutAt).toBe(3_000);
  });

  it("should use the default timeout", () => {
    const { table } = createTable();
    table.register("CP1", "m1", "Reset");
    expect(table.peek("CP1", "m1")?.timeoutAt).toBe(1_500);
  });

  it("should throw on a duplicate key", () => {
    const { table } = createTable();
    table.register("CP1", "m1", "Reset");
    expect(() => table.register("CP1", "m1", "Reset")).toThrow(
      DuplicatePendingCallError,
    );
  });

  it("should allow the same messageId on different devices", () => {
    const { table } = createTable();
    table.register("CP1", "m1", "Reset");
    table.register("CP2", "m1", "Reset");
    expect(table.size).toBe(2);
  });

  it("should resolve exactly once", async () => {
    const { table } = createTable();
    const token = table.register("CP1", "m1", "Reset");

    expect(
      table.resolve("CP1", "m1", { status: "result", payload: { ok: 1 } }),
    ).toBe(true);
    expect(
      table.resolve("CP1", "m1", { status: "result", payload: { ok: 2 } }),
    ).toBe(false);

    await expect(token.outcome).resolves.toEqual({
      status: "result",
      payload: { ok: 1 },
    });
    expect(table.size).toBe(0);
    expect(table.sizeFor("CP1")).toBe(0);
  });

  it("should emit orphan for unmatched responses", () => {
    const { table } = createTable();
    const orphans: OrphanResponse[] = [];
    table.on("orphan", (o) => orphans.push(o));

    table.resolve("CP1", "nope", { status: "result", payload: {} });
    table.resolve("CP1", "nope2", {
      status: "error",
      errorCode: "GenericError",
      errorDescription: "",
      details: {},
    });
    table.resolve("CP1", "nope3", { status: "cancelled", reason: "x" });

    expect(orphans).toEqual([
      { deviceId: "CP1", messageId: "nope", kind: "CallResult" },
      { deviceId: "CP1", messageId: "nope2", kind: "CallError" },
    ]);
  });

  it("should expire entries at or past their deadline", async () => {
    const { table, advance } = createTable();
    const early = table.register("CP1", "m1", "Reset", 100);
    table.register("CP1", "m2", "Reset", 1_000);
    const expiredEvents: string[] = [];
    table.on("expired", (entry) => expiredEvents.push(entry.messageId));

    const expired = table.expireOlderThan(advance(100));

    expect(expired.map((e) => e.messageId)).toEqual(["m1"]);
    expect(expiredEvents).toEqual(["m1"]);
    await expect(early.outcome).resolves.toEqual({ status: "timeout" });
    expect(table.has("CP1", "m1")).toBe(false);
    expect(table.has("CP1", "m2")).toBe(true);
  });

  it("should ignore a response that arrives after the timeout", async () => {
    const { table, advance } = createTable();
    const token = table.register("CP1", "m1", "Reset", 100);
    table.expireOlderThan(advance(200));

    expect(table.resolve("CP1", "m1", { status: "result", payload: {} })).toBe(
      false,
    );
    await expect(token.outcome).resolves.toEqual({ status: "timeout" });
  });

  it("should cancel every entry of a device", async () => {
    const { table } = createTable();
    const a = table.register("CP1", "m1", "Reset");
    const b = table.register("CP1", "m2", "Reset");
    table.register("CP2", "m3", "Reset");

    const cancelled = table.cancelDevice("CP1", "session closed");

    expect(cancelled).toHaveLength(2);
    await expect(a.outcome).resolves.toEqual({
      status: "cancelled",
      reason: "session closed",
    });
    await expect(b.outcome).resolves.toEqual({
      status: "cancelled",
      reason: "session closed",
    });
    expect(table.size).toBe(1);
    expect(table.cancelDevice("CP1", "again")).toEqual([]);
  });

  it("should sweep on an interval", async () => {
    vi.useFakeTimers();
    const table = new PendingCallTable({ logging: false });
    const token = table.register("CP1", "m1", "Reset", 1_500);

    table.startSweeper(1_000);
    await vi.advanceTimersByTimeAsync(1_000);
    expect(table.has("CP1", "m1")).toBe(true);

    await vi.advanceTimersByTimeAsync(1_000);
    expect(table.has("CP1", "m1")).toBe(false);
    await expect(token.outcome).resolves.toEqual({ status: "timeout" });

    table.stopSweeper();
  });

  it("should time out an entry at its own deadline between sweeps", async () => {
    vi.useFakeTimers();
    const table = new PendingCallTable({ logging: false });
    table.startSweeper(1_000);

    await vi.advanceTimersByTimeAsync(100);
    const token = table.register("CP1", "m1", "Reset", 2_000);

    await vi.advanceTimersByTimeAsync(1_999);
    expect(table.has("CP1", "m1")).toBe(true);

    await vi.advanceTimersByTimeAsync(1);
    expect(table.has("CP1", "m1")).toBe(false);
    await expect(token.outcome).resolves.toEqual({ status: "timeout" });

    table.stopSweeper();
  });

  it("should not time out an entry that was already resolved", async () => {
    vi.useFakeTimers();
    const table = new PendingCallTable({ logging: false });
    const expired: string[] = [];
    table.on("expired", (entry) => expired.push(entry.messageId));

    const token = table.register("CP1", "m1", "Reset", 500);
    table.resolve("CP1", "m1", { status: "result", payload: {} });
    await vi.advanceTimersByTimeAsync(1_000);

    expect(expired).toEqual([]);
    await expect(token.outcome).resolves.toEqual({
      status: "result",
      payload: {},
    });
  });

  it("should cancel on release only for the owner holding the claim", async () => {
    const { table } = createTable();
    const older = {};
    const newer = {};
    table.claim("CP1", older);
    table.claim("CP1", newer);
    const token = table.register("CP1", "m1", "Reset");

    expect(table.release("CP1", older, "session closed")).toEqual([]);
    expect(table.has("CP1", "m1")).toBe(true);

    expect(
      table.release("CP1", newer, "session closed").map((e) => e.messageId),
    ).toEqual(["m1"]);
    await expect(token.outcome).resolves.toEqual({
      status: "cancelled",
      reason: "session closed",
    });
  });
});
