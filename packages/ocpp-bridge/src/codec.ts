import { RPCFormationViolationError } from "./errors.js";
import {
  type CallEnvelope,
  type CallErrorEnvelope,
  type CallResultEnvelope,
  type Envelope,
  MessageType,
  type OCPPCall,
  type OCPPCallError,
  type OCPPCallResult,
  type OCPPMessage,
} from "./types.js";
import { isPlainObject } from "./util.js";

// ─── Types ──────────────────────────────────────────────────────

export type DecodeResult =
  | { ok: true; envelope: Envelope }
  | {
      ok: false;
      error: RPCFormationViolationError;
      /** The messageId, when element 1 of the array was a string */
      recoverableMessageId?: string;
    };

const ARITY: Record<MessageType, number> = {
  [MessageType.CALL]: 4,
  [MessageType.CALLRESULT]: 3,
  [MessageType.CALLERROR]: 5,
};

function isMessageType(value: unknown): value is MessageType {
  return (
    value === MessageType.CALL ||
    value === MessageType.CALLRESULT ||
    value === MessageType.CALLERROR
  );
}

// ─── Encode ─────────────────────────────────────────────────────

export function toWire(envelope: Envelope): OCPPMessage {
  switch (envelope.type) {
    case "Call":
      return [
        MessageType.CALL,
        envelope.messageId,
        envelope.action,
        envelope.payload,
      ] satisfies OCPPCall;
    case "CallResult":
      return [
        MessageType.CALLRESULT,
        envelope.messageId,
        envelope.payload,
      ] satisfies OCPPCallResult;
    case "CallError":
      return [
        MessageType.CALLERROR,
        envelope.messageId,
        envelope.errorCode,
        envelope.errorDescription,
        envelope.details,
      ] satisfies OCPPCallError;
  }
}

/** Serialize an envelope to its OCPP-J JSON text. */
export function encode(envelope: Envelope): string {
  return JSON.stringify(toWire(envelope));
}

// ─── Builders ───────────────────────────────────────────────────

export function call(
  messageId: string,
  action: string,
  payload: unknown,
): CallEnvelope {
  const envelope: CallEnvelope = { type: "Call", messageId, action, payload };
  return Object.freeze(envelope);
}

export function callResult(
  messageId: string,
  payload: unknown,
): CallResultEnvelope {
  const envelope: CallResultEnvelope = {
    type: "CallResult",
    messageId,
    payload,
  };
  return Object.freeze(envelope);
}

export function callError(
  messageId: string,
  errorCode: string,
  errorDescription: string,
  details: Record<string, unknown> = {},
): CallErrorEnvelope {
  const envelope: CallErrorEnvelope = {
    type: "CallError",
    messageId,
    errorCode,
    errorDescription,
    details,
  };
  return Object.freeze(envelope);
}

// ─── Decode ─────────────────────────────────────────────────────

function fail(message: string, recoverableMessageId?: string): DecodeResult {
  return {
    ok: false,
    error: new RPCFormationViolationError(message),
    recoverableMessageId,
  };
}

/**
 * Parse one OCPP-J frame. Never throws; a malformed frame yields
 * `{ ok: false }` with a FormationViolation.
 */
export function decode(raw: string | Buffer): DecodeResult {
  const text = typeof raw === "string" ? raw : raw.toString("utf8");

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    return fail(
      `Frame is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  if (!Array.isArray(parsed)) {
    return fail("Frame must be a JSON array");
  }

  const frame: unknown[] = parsed;
  const [typeId, messageId] = frame;
  const recoverable = typeof messageId === "string" ? messageId : undefined;

  if (!isMessageType(typeId)) {
    return fail(`Unknown message type: ${String(typeId)}`, recoverable);
  }
  if (frame.length !== ARITY[typeId]) {
    return fail(
      `Message type ${typeId} must have ${ARITY[typeId]} elements, got ${frame.length}`,
      recoverable,
    );
  }
  if (typeof messageId !== "string") {
    return fail("Message ID must be a string");
  }

  switch (typeId) {
    case MessageType.CALL: {
      const action = frame[2];
      if (typeof action !== "string") {
        return fail("Action must be a string", messageId);
      }
      return { ok: true, envelope: call(messageId, action, frame[3]) };
    }
    case MessageType.CALLRESULT:
      return { ok: true, envelope: callResult(messageId, frame[2]) };
    case MessageType.CALLERROR: {
      const [, , errorCode, errorDescription, details] = frame;
      if (typeof errorCode !== "string") {
        return fail("Error code must be a string", messageId);
      }
      if (typeof errorDescription !== "string") {
        return fail("Error description must be a string", messageId);
      }
      if (!isPlainObject(details)) {
        return fail("Error details must be an object", messageId);
      }
      return {
        ok: true,
        envelope: callError(messageId, errorCode, errorDescription, details),
      };
    }
  }
}
