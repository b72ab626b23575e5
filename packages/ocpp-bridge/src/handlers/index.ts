import { bootNotification } from "./boot-notification.js";
import { heartbeat } from "./heartbeat.js";
import {
  recordCallResult,
  remoteCommandFromDevice,
  requestStartTransactionResult,
  requestStopTransactionResult,
} from "./remote-commands.js";
import { statusNotification } from "./status-notification.js";
import { transactionEvent } from "./transaction-event.js";
import type { CallHandler, ResultHandler } from "./types.js";

export type {
  CallContext,
  CallHandler,
  HandlerResult,
  HandlerServices,
  ResultContext,
  ResultHandler,
} from "./types.js";

/** Actions a device may send. */
export type DeviceAction =
  | "BootNotification"
  | "Heartbeat"
  | "StatusNotification"
  | "TransactionEvent"
  | "RequestStartTransaction"
  | "RequestStopTransaction";

/** Remote commands whose answers drive the transaction state machine. */
export type RemoteCommandAction =
  | "RequestStartTransaction"
  | "RequestStopTransaction";

export const callHandlers = {
  BootNotification: bootNotification,
  Heartbeat: heartbeat,
  StatusNotification: statusNotification,
  TransactionEvent: transactionEvent,
  RequestStartTransaction: remoteCommandFromDevice,
  RequestStopTransaction: remoteCommandFromDevice,
} as const satisfies Record<DeviceAction, CallHandler>;

/** What to do with a device's answer, by the action of the original Call. */
export const resultHandlers = {
  RequestStartTransaction: requestStartTransactionResult,
  RequestStopTransaction: requestStopTransactionResult,
} as const satisfies Record<RemoteCommandAction, ResultHandler>;

export const defaultResultHandler: ResultHandler = recordCallResult;

export function isDeviceAction(action: string): action is DeviceAction {
  return Object.prototype.hasOwnProperty.call(callHandlers, action);
}

export function isRemoteCommandAction(
  action: string,
): action is RemoteCommandAction {
  return Object.prototype.hasOwnProperty.call(resultHandlers, action);
}

export function resultHandlerFor(action: string): ResultHandler {
  return isRemoteCommandAction(action)
    ? resultHandlers[action]
    : defaultResultHandler;
}
