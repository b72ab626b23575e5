import { beforeEach, describe, expect, it, vi } from "vitest";
import { call, callError, callResult } from "../src/codec.js";
import { PendingCallTable } from "../src/pending-calls.js";
import { MessageRouter, toOutcome } from "../src/router.js";
import { InMemoryShadowStore } from "../src/stores/shadow.js";
import { TransactionStateMachine } from "../src/transactions.js";
import type { OrphanResponse } from "../src/types.js";

const NOW = "2024-05-01T10:00:00.000Z";

describe("MessageRouter", () => {
  let shadow: InMemoryShadowStore;
  let pendingCalls: PendingCallTable;
  let transactions: TransactionStateMachine;
  let router: MessageRouter;

  function createRouter(
    extra: {
      respondWithDetailedErrors?: boolean;
    } = {},
  ) {
    return new MessageRouter({
      pendingCalls,
      transactions,
      shadow,
      now: () => new Date(NOW),
      logging: false,
      ...extra,
    });
  }

  beforeEach(() => {
    shadow = new InMemoryShadowStore();
    pendingCalls = new PendingCallTable({ logging: false });
    transactions = new TransactionStateMachine(shadow, { logging: false });
    router = createRouter();
  });

  describe("calls", () => {
    it("should accept a BootNotification", async () => {
      const payload = {
        reason: "PowerUp",
        chargingStation: { model: "M1", vendorName: "V" },
      };
      const response = await router.route(
        "CP1",
        call("m1", "BootNotification", payload),
      );

      expect(response).toEqual(
        callResult("m1", { currentTime: NOW, interval: 10, status: "Accepted" }),
      );
      expect(shadow.get("CP1")).toEqual({ boot: payload, lastBootAt: NOW });
    });

    it("should hand out the configured heartbeat interval", async () => {
      router = new MessageRouter({
        pendingCalls,
        transactions,
        shadow,
        heartbeatInterval: 300,
        now: () => new Date(NOW),
        logging: false,
      });
      const response = await router.route(
        "CP1",
        call("m1", "BootNotification", {}),
      );
      expect(response).toEqual(
        callResult("m1", {
          currentTime: NOW,
          interval: 300,
          status: "Accepted",
        }),
      );
    });

    it("should answer a Heartbeat with the current time", async () => {
      const response = await router.route("CP1", call("h1", "Heartbeat", {}));
      expect(response).toEqual(callResult("h1", { currentTime: NOW }));
      expect(shadow.get("CP1")).toEqual({ lastHeartbeatAt: NOW });
    });

    it("should record a StatusNotification per connector", async () => {
      const response = await router.route(
        "CP1",
        call("s1", "StatusNotification", {
          timestamp: NOW,
          connectorStatus: "Occupied",
          evseId: 1,
          connectorId: 2,
        }),
      );

      expect(response).toEqual(callResult("s1", {}));
      expect(shadow.get("CP1")).toEqual({
        connectors: { "1": { "2": { status: "Occupied", timestamp: NOW } } },
      });
    });

    it("should answer an invalid payload with the validator's error code", async () => {
      const missing = await router.route(
        "CP1",
        call("s2", "StatusNotification", {
          timestamp: NOW,
          connectorStatus: "Available",
          evseId: 1,
        }),
      );
      expect(missing?.type).toBe("CallError");
      if (missing?.type !== "CallError") return;
      expect(missing.errorCode).toBe("OccurrenceConstraintViolation");

      const badEnum = await router.route(
        "CP1",
        call("s3", "StatusNotification", {
          timestamp: NOW,
          connectorStatus: "Broken",
          evseId: 1,
          connectorId: 1,
        }),
      );
      expect(badEnum?.type === "CallError" && badEnum.errorCode).toBe(
        "PropertyConstraintViolation",
      );
      expect(shadow.writes).toBe(0);
    });

    it("should answer NotImplemented for an unknown action", async () => {
      const response = await router.route("CP1", call("u1", "Teleport", {}));
      expect(response).toEqual(
        callError("u1", "NotImplemented", 'Action "Teleport" is not implemented'),
      );
    });

    it("should answer NotSupported for remote commands sent by a device", async () => {
      const response = await router.route(
        "CP1",
        call("r1", "RequestStartTransaction", {}),
      );
      expect(response).toEqual(
        callError(
          "r1",
          "NotSupported",
          "RequestStartTransaction is only sent to charging stations",
        ),
      );
    });

    it("should answer InternalError when a handler throws", async () => {
      vi.spyOn(shadow, "merge").mockRejectedValueOnce(new Error("kaboom"));

      const response = await router.route("CP1", call("x1", "Heartbeat", {}));
      expect(response).toEqual(
        callError(
          "x1",
          "InternalError",
          'Handler for "Heartbeat" failed: kaboom',
        ),
      );
    });

    it("should include the error in details when detailed errors are on", async () => {
      router = createRouter({ respondWithDetailedErrors: true });
      vi.spyOn(shadow, "merge").mockRejectedValueOnce(new Error("kaboom"));

      const response = await router.route("CP1", call("x1", "Heartbeat", {}));
      if (response?.type !== "CallError") throw new Error("expected error");
      expect(response.details.error).toMatchObject({
        name: "Error",
        message: "kaboom",
      });
    });

    it("should not dispatch names inherited by the handler table", async () => {
      for (const action of ["toString", "constructor", "hasOwnProperty"]) {
        expect(await router.route("CP1", call("p1", action, {}))).toEqual(
          callError(
            "p1",
            "NotImplemented",
            `Action "${action}" is not implemented`,
          ),
        );
      }
    });
  });

  describe("device-initiated transaction", () => {
    it("should track a transaction from its events", async () => {
      const started = await router.route(
        "CP1",
        call("t1", "TransactionEvent", {
          eventType: "Started",
          timestamp: NOW,
          triggerReason: "Authorized",
          seqNo: 0,
          transactionInfo: { transactionId: "TX1" },
          evse: { id: 1, connectorId: 1 },
          idToken: { idToken: "TAG1", type: "ISO14443" },
        }),
      );
      expect(started).toEqual(callResult("t1", {}));
      expect(transactions.get("CP1", "TX1")).toMatchObject({
        state: "Started",
        evseId: 1,
        idToken: { idToken: "TAG1", type: "ISO14443" },
        startTime: NOW,
      });

      const ended = await router.route(
        "CP1",
        call("t2", "TransactionEvent", {
          eventType: "Ended",
          timestamp: "2024-05-01T11:00:00.000Z",
          triggerReason: "EVDeparted",
          seqNo: 1,
          transactionInfo: { transactionId: "TX1", stoppedReason: "Local" },
        }),
      );
      expect(ended).toEqual(callResult("t2", {}));

      const doc = shadow.get("CP1");
      expect(doc.lastTransactionEvent).toEqual({
        eventType: "Ended",
        timestamp: "2024-05-01T11:00:00.000Z",
        transactionId: "TX1",
        receivedAt: NOW,
        data: {
          eventType: "Ended",
          timestamp: "2024-05-01T11:00:00.000Z",
          triggerReason: "EVDeparted",
          seqNo: 1,
          transactionInfo: { transactionId: "TX1", stoppedReason: "Local" },
        },
      });
      expect(doc.activeTransaction).toBeUndefined();
      expect(doc.lastCompletedTransaction).toMatchObject({
        transactionId: "TX1",
        state: "Ended",
        stoppedReason: "Local",
        endTime: "2024-05-01T11:00:00.000Z",
      });
    });

    it("should reject a TransactionEvent without transactionInfo", async () => {
      const response = await router.route(
        "CP1",
        call("t3", "TransactionEvent", { eventType: "Started", timestamp: NOW }),
      );
      expect(response?.type === "CallError" && response.errorCode).toBe(
        "OccurrenceConstraintViolation",
      );
    });
  });

  describe("responses", () => {
    it("should never answer a response", async () => {
      pendingCalls.register("CP1", "m1", "Reset");
      expect(
        await router.route("CP1", callResult("m1", { status: "Accepted" })),
      ).toBeNull();
    });

    it("should drop an orphan response", async () => {
      const orphans: OrphanResponse[] = [];
      pendingCalls.on("orphan", (o) => orphans.push(o));

      expect(await router.route("CP1", callResult("ghost", {}))).toBeNull();
      expect(orphans).toEqual([
        { deviceId: "CP1", messageId: "ghost", kind: "CallResult" },
      ]);
      expect(shadow.writes).toBe(0);
    });

    it("should complete the pending call with the device's answer", async () => {
      const token = pendingCalls.register("CP1", "m1", "Reset");
      await router.route(
        "CP1",
        callError("m1", "NotSupported", "no reset", { hint: "x" }),
      );

      await expect(token.outcome).resolves.toEqual({
        status: "error",
        errorCode: "NotSupported",
        errorDescription: "no reset",
        details: { hint: "x" },
      });
      expect(shadow.get("CP1")).toEqual({
        lastCallResult: {
          action: "Reset",
          messageId: "m1",
          receivedAt: NOW,
          status: "error",
          errorCode: "NotSupported",
          errorDescription: "no reset",
        },
      });
    });

    it("should apply an accepted remote start once", async () => {
      const token = pendingCalls.register(
        "CP1",
        "m1",
        "RequestStartTransaction",
      );
      await transactions.onStartRequested(
        "CP1",
        undefined,
        1,
        { idToken: "TAG1", type: "ISO14443" },
        { remoteStartId: 7, messageId: "m1" },
      );

      await router.route("CP1", callResult("m1", { status: "Accepted" }));
      await expect(token.outcome).resolves.toEqual({
        status: "result",
        payload: { status: "Accepted" },
      });
      expect(transactions.get("CP1", "remote-7")).toMatchObject({
        state: "Requested",
        startAccepted: true,
      });

      const writes = shadow.writes;
      const before = transactions.get("CP1", "remote-7");
      await router.route("CP1", callResult("m1", { status: "Accepted" }));
      expect(shadow.writes).toBe(writes);
      expect(transactions.get("CP1", "remote-7")).toEqual(before);
    });

    it("should reject a remote start answered with Rejected", async () => {
      pendingCalls.register("CP1", "m1", "RequestStartTransaction");
      await transactions.onStartRequested("CP1", undefined, 1, null, {
        remoteStartId: 8,
        messageId: "m1",
      });

      await router.route("CP1", callResult("m1", { status: "Rejected" }));
      expect(transactions.get("CP1", "remote-8")?.state).toBe("Rejected");
    });

    it("should record a remote command's answer as the last call result", async () => {
      pendingCalls.register("CP1", "m1", "RequestStopTransaction");

      await router.route("CP1", callResult("m1", { status: "Rejected" }));

      expect(shadow.get("CP1").lastCallResult).toEqual({
        action: "RequestStopTransaction",
        messageId: "m1",
        receivedAt: NOW,
        status: "result",
        payload: { status: "Rejected" },
      });
    });
  });
});

describe("toOutcome", () => {
  it("should map responses to outcomes", () => {
    expect(toOutcome(callResult("a", { x: 1 }))).toEqual({
      status: "result",
      payload: { x: 1 },
    });
    expect(toOutcome(callError("b", "GenericError", "d"))).toEqual({
      status: "error",
      errorCode: "GenericError",
      errorDescription: "d",
      details: {},
    });
  });
});
