import { createServer, type Server } from "node:http";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { InMemoryAdapter } from "../src/adapters/adapter.js";
import { CommandServer } from "../src/command-server.js";
import { CommandIngress } from "../src/ingress.js";
import { PendingCallTable } from "../src/pending-calls.js";
import { MessageRouter } from "../src/router.js";
import { DeviceSession } from "../src/session.js";
import { InMemoryDeviceRegistry } from "../src/stores/registry.js";
import { InMemoryShadowStore } from "../src/stores/shadow.js";
import { TransactionStateMachine } from "../src/transactions.js";
import { createValidator } from "../src/validator.js";
import { FakeSocket, getPort } from "./helpers.js";

describe("CommandServer", () => {
  let server: Server;
  let baseUrl: string;
  let socket: FakeSocket;
  let adapter: InMemoryAdapter;
  let pendingCalls: PendingCallTable;
  let transactions: TransactionStateMachine;

  beforeEach(async () => {
    socket = new FakeSocket();
    adapter = new InMemoryAdapter({ logging: false });
    const shadow = new InMemoryShadowStore();
    pendingCalls = new PendingCallTable({ logging: false });
    transactions = new TransactionStateMachine(shadow, { logging: false });
    const router = new MessageRouter({
      pendingCalls,
      transactions,
      shadow,
      logging: false,
    });

    const session = new DeviceSession({
      deviceId: "CP1",
      protocol: "ocpp2.0.1",
      socket,
      adapter,
      router,
      pendingCalls,
      logging: false,
    });
    session.beginValidation();
    await session.activate();
    const active = new Set(["CP1"]);

    const ingress = new CommandIngress(
      {
        registry: new InMemoryDeviceRegistry(["CP1", "CP2"]),
        sessions: active,
        pendingCalls,
        adapter,
        transactions,
      },
      { retry: { retries: 0 }, logging: false },
    );
    const commands = new CommandServer(
      {
        ingress,
        validator: createValidator(),
        pendingCalls,
        sessions: active,
      },
      { maxBodyBytes: 256, logging: false },
    );

    server = createServer(commands.handleRequest);
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
    baseUrl = `http://127.0.0.1:${getPort(server)}`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  function post(path: string, body: unknown): Promise<Response> {
    return fetch(`${baseUrl}${path}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: typeof body === "string" ? body : JSON.stringify(body),
    });
  }

  describe("/health", () => {
    it("should report sessions and pending calls", async () => {
      pendingCalls.register("CP1", "m1", "Reset");

      const res = await fetch(`${baseUrl}/health`);

      expect(res.status).toBe(200);
      expect(res.headers.get("server")).toBe("ocpp-bridge/0.1.0");
      expect(await res.json()).toEqual({
        status: "ok",
        sessions: 1,
        pendingCalls: 1,
      });
    });

    it("should only allow GET", async () => {
      const res = await post("/health", {});
      expect(res.status).toBe(405);
      expect(res.headers.get("allow")).toBe("GET");
    });
  });

  describe("routing", () => {
    it("should answer 404 for unknown paths", async () => {
      const res = await fetch(`${baseUrl}/nope`);
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        error: "NotFound",
        message: "Not Found",
      });
    });

    it("should answer 405 for GET on a command route", async () => {
      const res = await fetch(`${baseUrl}/commands/start`);
      expect(res.status).toBe(405);
      expect(res.headers.get("allow")).toBe("POST");
      expect(await res.json()).toEqual({
        error: "MethodNotAllowed",
        message: "Method Not Allowed",
      });
    });
  });

  describe("POST /commands/start", () => {
    it("should answer 202 once the Call is published", async () => {
      const res = await post("/commands/start", {
        deviceId: "CP1",
        idToken: "TAG1",
        evseId: 1,
        remoteStartId: 3,
      });

      expect(res.status).toBe(202);
      const body: unknown = await res.json();
      expect(body).toMatchObject({ status: "Accepted", deviceId: "CP1" });

      await vi.waitFor(() => expect(socket.sent).toHaveLength(1));
      const [frame] = socket.sentFrames();
      expect(frame).toEqual([
        2,
        expect.any(String),
        "RequestStartTransaction",
        {
          idToken: { idToken: "TAG1", type: "ISO14443" },
          evseId: 1,
          remoteStartId: 3,
        },
      ]);
      expect(transactions.get("CP1", "remote-3")?.state).toBe("Requested");
    });

    it("should wait for the device's answer with ?wait=true", async () => {
      const pending = post("/commands/start?wait=true", {
        deviceId: "CP1",
        idToken: "TAG1",
        evseId: 1,
      });

      await vi.waitFor(() => expect(socket.sent).toHaveLength(1));
      const [frame] = socket.sentFrames();
      const messageId = Array.isArray(frame) ? frame[1] : undefined;
      socket.receive(JSON.stringify([3, messageId, { status: "Accepted" }]));

      const res = await pending;
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        status: "result",
        messageId,
        outcome: { status: "result", payload: { status: "Accepted" } },
      });
    });

    it("should reject a body that fails the schema", async () => {
      const res = await post("/commands/start", { deviceId: "CP1", evseId: 1 });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: "OccurrenceConstraintViolation",
      });
      expect(pendingCalls.size).toBe(0);
    });

    it("should reject a body that is not JSON", async () => {
      const res = await post("/commands/start", "{nope");
      expect(res.status).toBe(400);
      const body: unknown = await res.json();
      expect(body).toMatchObject({ error: "FormationViolation" });
    });

    it("should reject an oversized body with 413", async () => {
      const res = await post("/commands/call", {
        deviceId: "CP1",
        action: "DataTransfer",
        payload: { data: "x".repeat(512) },
      });
      expect(res.status).toBe(413);
      expect(await res.json()).toEqual({
        error: "PayloadTooLarge",
        message: "Request body too large",
      });
    });
  });

  describe("POST /commands/stop", () => {
    it("should publish RequestStopTransaction", async () => {
      const res = await post("/commands/stop", {
        deviceId: "CP1",
        transactionId: "TX1",
      });

      expect(res.status).toBe(202);
      await vi.waitFor(() => expect(socket.sent).toHaveLength(1));
      expect(socket.sentFrames()[0]).toEqual([
        2,
        expect.any(String),
        "RequestStopTransaction",
        { transactionId: "TX1" },
      ]);
    });
  });

  describe("POST /commands/call", () => {
    it("should answer 404 for an unknown device", async () => {
      const res = await post("/commands/call", {
        deviceId: "CP9",
        action: "Reset",
        payload: {},
      });
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        error: "UnknownDevice",
        message: "Device CP9 is not registered",
      });
    });

    it("should answer 409 for a device without a session", async () => {
      const res = await post("/commands/call", {
        deviceId: "CP2",
        action: "Reset",
        payload: {},
      });
      expect(res.status).toBe(409);
      expect(await res.json()).toEqual({
        error: "NoActiveSession",
        message: "Device CP2 has no active session",
      });
    });

    it("should answer 503 when the backend is unavailable", async () => {
      vi.spyOn(adapter, "publish").mockRejectedValue(new Error("backend down"));

      const res = await post("/commands/call", {
        deviceId: "CP1",
        action: "Reset",
        payload: { type: "Immediate" },
      });

      expect(res.status).toBe(503);
      expect(await res.json()).toEqual({
        error: "BackendUnavailable",
        message: "backend adapter failed after 1 attempt(s): backend down",
      });
      expect(pendingCalls.size).toBe(0);
    });

    it("should report a timeout outcome with ?wait=true", async () => {
      const pending = post("/commands/call?wait=true", {
        deviceId: "CP1",
        action: "Reset",
        payload: {},
        timeoutMs: 1,
      });

      const res = await pending;
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        status: "timeout",
        outcome: { status: "timeout" },
      });
    });
  });
});
