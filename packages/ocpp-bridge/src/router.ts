import { callError, callResult } from "./codec.js";
import {
  DispatchError,
  HandlerExecutionError,
  isRPCError,
  type RPCError,
} from "./errors.js";
import {
  callHandlers,
  type HandlerServices,
  isDeviceAction,
  resultHandlerFor,
} from "./handlers/index.js";
import { initLogger } from "./init-logger.js";
import type { PendingCallTable } from "./pending-calls.js";
import type { ShadowStore } from "./stores/shadow.js";
import type { TransactionStateMachine } from "./transactions.js";
import type {
  CallEnvelope,
  CallErrorEnvelope,
  CallOutcome,
  CallResultEnvelope,
  Envelope,
  LoggerLike,
  LoggingConfig,
} from "./types.js";
import { getErrorPlainObject } from "./util.js";
import { createValidator, type Validator } from "./validator.js";

export interface MessageRouterOptions {
  pendingCalls: PendingCallTable;
  transactions: TransactionStateMachine;
  shadow: ShadowStore;
  validator?: Validator;
  /** Heartbeat interval returned to booting devices, in seconds (default: 10) */
  heartbeatInterval?: number;
  /** Include serialized handler errors in CallError details (default: false) */
  respondWithDetailedErrors?: boolean;
  now?: () => Date;
  logging?: LoggingConfig | false;
}

/**
 * Dispatches decoded envelopes from a device.
 *
 * Calls are answered through the action's handler; responses are matched
 * against the pending-call table and never answered.
 */
export class MessageRouter {
  private _pending: PendingCallTable;
  private _services: HandlerServices;
  private _detailedErrors: boolean;
  private _logger: LoggerLike | null;

  constructor(options: MessageRouterOptions) {
    this._pending = options.pendingCalls;
    this._detailedErrors = options.respondWithDetailedErrors ?? false;
    this._logger = initLogger(options.logging, { component: "Router" });
    this._services = {
      shadow: options.shadow,
      transactions: options.transactions,
      validator: options.validator ?? createValidator(),
      logger: this._logger,
      now: options.now ?? (() => new Date()),
      heartbeatInterval: options.heartbeatInterval ?? 10,
    };
  }

  /**
   * Route one envelope from `deviceId`. Resolves to the response to send
   * back, or null when there is nothing to answer.
   */
  async route(deviceId: string, envelope: Envelope): Promise<Envelope | null> {
    if (envelope.type === "Call") {
      return this._routeCall(deviceId, envelope);
    }
    await this._routeResponse(deviceId, envelope);
    return null;
  }

  // ─── Calls ────────────────────────────────────────────────────

  private async _routeCall(
    deviceId: string,
    envelope: CallEnvelope,
  ): Promise<Envelope> {
    const { messageId, action, payload } = envelope;

    if (!isDeviceAction(action)) {
      this._logger?.warn?.("No handler for action", { deviceId, action });
      return this._errorResponse(
        messageId,
        new DispatchError(`Action "${action}" is not implemented`),
      );
    }

    try {
      const result = await callHandlers[action]({
        ...this._services,
        deviceId,
        messageId,
        action,
        payload,
      });
      if (result.ok) {
        return callResult(messageId, result.payload);
      }
      return this._errorResponse(messageId, result.error);
    } catch (err) {
      if (isRPCError(err)) {
        this._logger?.warn?.("Call rejected", {
          deviceId,
          action,
          code: err.rpcErrorCode,
          reason: err.message,
        });
        return this._errorResponse(messageId, err);
      }

      const error = new HandlerExecutionError(action, err);
      this._logger?.error?.("Handler failed", {
        deviceId,
        action,
        messageId,
        error: err instanceof Error ? err.message : String(err),
      });
      return this._errorResponse(
        messageId,
        error,
        this._detailedErrors && err instanceof Error
          ? { error: getErrorPlainObject(err) }
          : {},
      );
    }
  }

  private _errorResponse(
    messageId: string,
    error: RPCError,
    extraDetails: Record<string, unknown> = {},
  ): CallErrorEnvelope {
    return callError(
      messageId,
      error.rpcErrorCode,
      error.message || error.rpcErrorMessage,
      { ...error.details, ...extraDetails },
    );
  }

  // ─── Responses ────────────────────────────────────────────────

  private async _routeResponse(
    deviceId: string,
    envelope: CallResultEnvelope | CallErrorEnvelope,
  ): Promise<void> {
    const { messageId } = envelope;
    const pending = this._pending.peek(deviceId, messageId);
    const outcome = toOutcome(envelope);

    // peek + resolve run without yielding, so only one response can win
    if (!this._pending.resolve(deviceId, messageId, outcome) || !pending) {
      return;
    }

    const handler = resultHandlerFor(pending.action);
    try {
      await handler({ ...this._services, deviceId, pending, outcome });
    } catch (err) {
      this._logger?.error?.("Result handler failed", {
        deviceId,
        action: pending.action,
        messageId,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}

export function toOutcome(
  envelope: CallResultEnvelope | CallErrorEnvelope,
): CallOutcome {
  if (envelope.type === "CallResult") {
    return { status: "result", payload: envelope.payload };
  }
  return {
    status: "error",
    errorCode: envelope.errorCode,
    errorDescription: envelope.errorDescription,
    details: envelope.details,
  };
}
