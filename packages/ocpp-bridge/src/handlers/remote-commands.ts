import { RPCNotSupportedError } from "../errors.js";
import type { CallOutcome } from "../types.js";
import { isPlainObject } from "../util.js";
import type { CallHandler, ResultHandler } from "./types.js";

/**
 * RequestStartTransaction / RequestStopTransaction flow from the backend to
 * the device only. A device sending one gets NotSupported.
 */
export const remoteCommandFromDevice: CallHandler = async (ctx) => ({
  ok: false,
  error: new RPCNotSupportedError(
    `${ctx.action} is only sent to charging stations`,
  ),
});

/** `status: "Accepted"` in a CallResult; anything else counts as refused. */
export function isAccepted(outcome: CallOutcome): boolean {
  return (
    outcome.status === "result" &&
    isPlainObject(outcome.payload) &&
    outcome.payload.status === "Accepted"
  );
}


/** Merge-patch body for `lastCallResult`; `null` clears fields of an older answer. */
function describeOutcome(outcome: CallOutcome): Record<string, unknown> {
  switch (outcome.status) {
    case "result":
      return {
        status: "result",
        payload: outcome.payload,
        errorCode: null,
        errorDescription: null,
      };
    case "error":
      return {
        status: "error",
        payload: null,
        errorCode: outcome.errorCode,
        errorDescription: outcome.errorDescription,
      };
    default:
      return {
        status: outcome.status,
        payload: null,
        errorCode: null,
        errorDescription: null,
      };
  }
}

/** Keep the latest answer to any command on the shadow. */
export const recordCallResult: ResultHandler = async (ctx) => {
  await ctx.shadow.merge(ctx.deviceId, {
    lastCallResult: {
      action: ctx.pending.action,
      messageId: ctx.pending.messageId,
      receivedAt: ctx.now().toISOString(),
      ...describeOutcome(ctx.outcome),
    },
  });
};

export const requestStartTransactionResult: ResultHandler = async (ctx) => {
  await ctx.transactions.onStartResult(
    ctx.deviceId,
    ctx.pending.messageId,
    isAccepted(ctx.outcome),
  );
  await recordCallResult(ctx);
};

export const requestStopTransactionResult: ResultHandler = async (ctx) => {
  await ctx.transactions.onStopResult(
    ctx.deviceId,
    ctx.pending.messageId,
    isAccepted(ctx.outcome),
  );
  await recordCallResult(ctx);
};
