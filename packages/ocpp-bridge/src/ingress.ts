import { randomInt } from "node:crypto";
import { createId } from "@paralleldrive/cuid2";
import { call, encode } from "./codec.js";
import {
  AdapterError,
  NoActiveSessionError,
  UnknownDeviceError,
} from "./errors.js";
import { initLogger } from "./init-logger.js";
import type { PendingCallTable } from "./pending-calls.js";
import type { DeviceRegistry } from "./stores/registry.js";
import type { IdToken, TransactionStateMachine } from "./transactions.js";
import {
  BackendChannel,
  type CallOutcome,
  type EventAdapterInterface,
  type LoggerLike,
  type LoggingConfig,
  type RetryOptions,
} from "./types.js";
import { withRetry } from "./util.js";

// ─── Types ──────────────────────────────────────────────────────

/** Which devices currently have an Active session. */
export interface SessionLookup {
  has(deviceId: string): boolean;
}

export interface CommandTicket {
  accepted: true;
  messageId: string;
  deviceId: string;
  /** Settles with the device's answer, a timeout or a cancellation */
  outcome: Promise<CallOutcome>;
}

export interface StartTransactionCommand {
  deviceId: string;
  idToken: string;
  evseId: number;
  /** default: "ISO14443" */
  idTokenType?: string;
  /** default: random positive 31-bit integer */
  remoteStartId?: number;
  timeoutMs?: number;
}

export interface StopTransactionCommand {
  deviceId: string;
  transactionId: string;
  timeoutMs?: number;
}

export interface CommandIngressDeps {
  registry: DeviceRegistry;
  sessions: SessionLookup;
  pendingCalls: PendingCallTable;
  adapter: EventAdapterInterface;
  transactions: TransactionStateMachine;
}

export interface CommandIngressOptions {
  /** Retry policy for registry lookups and backend publishes */
  retry?: RetryOptions;
  logging?: LoggingConfig | false;
}

const MAX_REMOTE_START_ID = 2 ** 31 - 1;

// ─── Command Ingress ────────────────────────────────────────────

/**
 * Turns commands from the outside world into Calls on a device's
 * `{deviceId}/out` channel and hands back a ticket for the answer.
 */
export class CommandIngress {
  private _deps: CommandIngressDeps;
  private _retry: RetryOptions;
  private _logger: LoggerLike | null;

  constructor(deps: CommandIngressDeps, options: CommandIngressOptions = {}) {
    this._deps = deps;
    this._retry = options.retry ?? {};
    this._logger = initLogger(options.logging, { component: "Ingress" });
  }

  /**
   * Send `action` to a device. Throws `UnknownDeviceError` or
   * `NoActiveSessionError` without registering anything.
   */
  async issueCall(
    deviceId: string,
    action: string,
    payload: unknown,
    timeoutMs?: number,
  ): Promise<CommandTicket> {
    return this._issue(deviceId, action, payload, timeoutMs);
  }

  /** `RequestStartTransaction`, recorded as a Requested transaction. */
  async startTransaction(
    command: StartTransactionCommand,
  ): Promise<CommandTicket> {
    const idToken: IdToken = {
      idToken: command.idToken,
      type: command.idTokenType ?? "ISO14443",
    };
    const remoteStartId =
      command.remoteStartId ?? randomInt(1, MAX_REMOTE_START_ID + 1);

    return this._issue(
      command.deviceId,
      "RequestStartTransaction",
      { idToken, evseId: command.evseId, remoteStartId },
      command.timeoutMs,
      (messageId) =>
        this._deps.transactions.onStartRequested(
          command.deviceId,
          undefined,
          command.evseId,
          idToken,
          { remoteStartId, messageId },
        ),
    );
  }

  /** `RequestStopTransaction` for a transaction the device reported. */
  async stopTransaction(
    command: StopTransactionCommand,
  ): Promise<CommandTicket> {
    return this._issue(
      command.deviceId,
      "RequestStopTransaction",
      { transactionId: command.transactionId },
      command.timeoutMs,
      (messageId) =>
        this._deps.transactions.onStopRequested(
          command.deviceId,
          command.transactionId,
          messageId,
        ),
    );
  }

  // ─── Internals ────────────────────────────────────────────────

  private async _issue(
    deviceId: string,
    action: string,
    payload: unknown,
    timeoutMs: number | undefined,
    record?: (messageId: string) => Promise<unknown>,
  ): Promise<CommandTicket> {
    const { registry, sessions, pendingCalls, adapter } = this._deps;

    let attempts = 0;
    const known = await withRetry((attempt) => {
      attempts = attempt;
      return registry.exists(deviceId);
    }, this._retry).catch((err: unknown) => {
      throw new AdapterError("registry", attempts, err);
    });
    if (!known) throw new UnknownDeviceError(deviceId);
    if (!sessions.has(deviceId)) throw new NoActiveSessionError(deviceId);

    let messageId = createId();
    while (pendingCalls.has(deviceId, messageId)) messageId = createId();

    const token = pendingCalls.register(deviceId, messageId, action, timeoutMs);

    // Recorded before publishing so a fast answer finds the request
    if (record) {
      try {
        await record(messageId);
      } catch (err) {
        pendingCalls.resolve(deviceId, messageId, {
          status: "cancelled",
          reason: "command not recorded",
        });
        throw err;
      }
    }

    const channel = BackendChannel.outbound(deviceId);
    try {
      await withRetry(
        (attempt) => {
          attempts = attempt;
          return adapter.publish(
            channel,
            encode(call(messageId, action, payload)),
          );
        },
        this._retry,
        (err, attempt, delayMs) => {
          this._logger?.warn?.("Publish failed, retrying", {
            deviceId,
            messageId,
            attempt,
            delayMs,
            error: err instanceof Error ? err.message : String(err),
          });
        },
      );
    } catch (err) {
      pendingCalls.resolve(deviceId, messageId, {
        status: "cancelled",
        reason: "publish failed",
      });
      this._logger?.error?.("Command not delivered", {
        deviceId,
        messageId,
        action,
        error: err instanceof Error ? err.message : String(err),
      });
      throw new AdapterError("backend", attempts, err);
    }

    this._logger?.info?.("Command issued", { deviceId, messageId, action });

    return { accepted: true, messageId, deviceId, outcome: token.outcome };
  }
}
