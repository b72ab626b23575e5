import { RPCFormationViolationError } from "../errors.js";
import type {
  IdToken,
  TransactionEventInput,
  TransactionEventType,
} from "../transactions.js";
import { isPlainObject } from "../util.js";
import { SchemaId } from "../validator.js";
import type { CallHandler } from "./types.js";

function isEventType(value: unknown): value is TransactionEventType {
  return value === "Started" || value === "Updated" || value === "Ended";
}

function toIdToken(value: unknown): IdToken | undefined {
  if (!isPlainObject(value)) return undefined;
  const { idToken, type } = value;
  if (typeof idToken !== "string" || typeof type !== "string") {
    return undefined;
  }
  return { idToken, type };
}

/**
 * Pull the fields the state machine needs out of a TransactionEventRequest
 * that already passed schema validation.
 */
export function toTransactionEventInput(
  payload: unknown,
): TransactionEventInput {
  if (!isPlainObject(payload) || !isPlainObject(payload.transactionInfo)) {
    throw new RPCFormationViolationError("transactionInfo is missing");
  }
  const { eventType, timestamp, transactionInfo, evse, idToken } = payload;
  const { transactionId, stoppedReason, remoteStartId } = transactionInfo;

  if (
    !isEventType(eventType) ||
    typeof timestamp !== "string" ||
    typeof transactionId !== "string"
  ) {
    throw new RPCFormationViolationError(
      "eventType, timestamp and transactionInfo.transactionId are required",
    );
  }

  return {
    eventType,
    transactionId,
    timestamp,
    evseId:
      isPlainObject(evse) && typeof evse.id === "number" ? evse.id : undefined,
    idToken: toIdToken(idToken),
    remoteStartId:
      typeof remoteStartId === "number" ? remoteStartId : undefined,
    stoppedReason:
      typeof stoppedReason === "string" ? stoppedReason : undefined,
  };
}

export const transactionEvent: CallHandler = async (ctx) => {
  ctx.validator.validate(SchemaId.TRANSACTION_EVENT, ctx.payload);
  const event = toTransactionEventInput(ctx.payload);
  await ctx.transactions.onTransactionEvent(ctx.deviceId, event);
  await ctx.transactions.recordLastEvent(
    ctx.deviceId,
    event,
    ctx.payload,
    ctx.now().toISOString(),
  );
  return { ok: true, payload: {} };
};
