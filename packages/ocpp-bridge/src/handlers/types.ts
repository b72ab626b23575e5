import type { RPCError } from "../errors.js";
import type { PendingCall } from "../pending-calls.js";
import type { ShadowStore } from "../stores/shadow.js";
import type { TransactionStateMachine } from "../transactions.js";
import type { CallOutcome, LoggerLike } from "../types.js";
import type { Validator } from "../validator.js";

export type HandlerResult =
  | { ok: true; payload: unknown }
  | { ok: false; error: RPCError };

/** Everything a handler may touch. Built by the router per message. */
export interface HandlerServices {
  shadow: ShadowStore;
  transactions: TransactionStateMachine;
  validator: Validator;
  logger: LoggerLike | null;
  now: () => Date;
  /** Heartbeat interval handed out in BootNotification responses, in seconds */
  heartbeatInterval: number;
}

export interface CallContext extends HandlerServices {
  deviceId: string;
  messageId: string;
  action: string;
  payload: unknown;
}

export interface ResultContext extends HandlerServices {
  deviceId: string;
  pending: PendingCall;
  outcome: CallOutcome;
}

export type CallHandler = (ctx: CallContext) => Promise<HandlerResult>;
export type ResultHandler = (ctx: ResultContext) => Promise<void>;
