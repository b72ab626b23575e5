import { isDeepStrictEqual } from "node:util";
import { initLogger } from "./init-logger.js";
import type { ShadowPatch, ShadowStore } from "./stores/shadow.js";
import type { LoggerLike, LoggingConfig } from "./types.js";
import { isPlainObject } from "./util.js";

// ─── Types ──────────────────────────────────────────────────────

export const TransactionState = {
  REQUESTED: "Requested",
  REJECTED: "Rejected",
  STARTED: "Started",
  ENDED: "Ended",
} as const;

export type TransactionState =
  (typeof TransactionState)[keyof typeof TransactionState];

export interface IdToken {
  idToken: string;
  type: string;
}

export interface StopRequest {
  messageId: string;
  status: "Pending" | "Accepted" | "Rejected";
}

export interface Transaction {
  transactionId: string;
  deviceId: string;
  evseId: number | null;
  idToken: IdToken | null;
  state: TransactionState;
  startTime?: string;
  endTime?: string;
  remoteStartId?: number;
  requestMessageId?: string;
  startAccepted?: boolean;
  stopRequest?: StopRequest;
  stoppedReason?: string;
  /** Created from an Ended event for a transaction never seen before */
  synthetic?: boolean;
}

export type TransactionEventType = "Started" | "Updated" | "Ended";

/** The routing fields of a TransactionEvent the state machine acts on. */
export interface TransactionEventInput {
  eventType: TransactionEventType;
  transactionId: string;
  timestamp: string;
  evseId?: number;
  idToken?: IdToken;
  remoteStartId?: number;
  stoppedReason?: string;
}

export interface StartRequestOptions {
  remoteStartId?: number;
  messageId?: string;
}

export interface TransactionStateMachineOptions {
  logging?: LoggingConfig | false;
}

function isTerminal(state: TransactionState): boolean {
  return (
    state === TransactionState.ENDED || state === TransactionState.REJECTED
  );
}

/** Plain JSON snapshot of a transaction, without absent fields. */
export function snapshotOf(tx: Transaction): Record<string, unknown> {
  const snapshot: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(tx)) {
    if (value === undefined) continue;
    snapshot[key] =
      typeof value === "object" && value !== null ? { ...value } : value;
  }
  return snapshot;
}

// ─── Transaction State Machine ──────────────────────────────────

/**
 * Tracks each device's transactions through
 * Requested → {Rejected | Started} → Ended.
 *
 * TransactionEvents from the device are authoritative: a start or stop
 * CallResult arriving after the device already moved the transaction on is
 * a no-op. Every change writes exactly one shadow merge; no-ops write
 * nothing. A change is kept in memory only once its shadow write succeeded,
 * so a retried event after a failed write writes again.
 */
export class TransactionStateMachine {
  private _shadow: ShadowStore;
  private _logger: LoggerLike | null;
  private _transactions = new Map<string, Map<string, Transaction>>();
  private _byRequest = new Map<string, Map<string, Transaction>>();
  /** Last `lastTransactionEvent` written per device */
  private _lastEvents = new Map<string, Record<string, unknown>>();

  constructor(
    shadow: ShadowStore,
    options: TransactionStateMachineOptions = {},
  ) {
    this._shadow = shadow;
    this._logger = initLogger(options.logging, {
      component: "Transactions",
    });
  }

  // ─── Queries ──────────────────────────────────────────────────

  get(deviceId: string, transactionId: string): Transaction | undefined {
    const tx = this._transactions.get(deviceId)?.get(transactionId);
    return tx ? copy(tx) : undefined;
  }

  list(deviceId: string): Transaction[] {
    return [...(this._transactions.get(deviceId)?.values() ?? [])].map(copy);
  }

  /** Transaction created or last referenced by a command with this messageId. */
  getByRequest(deviceId: string, messageId: string): Transaction | undefined {
    const tx = this._byRequest.get(deviceId)?.get(messageId);
    return tx ? copy(tx) : undefined;
  }

  // ─── Commands ─────────────────────────────────────────────────

  /**
   * Record a remote start. Without a transaction id hint the record is
   * keyed `remote-{remoteStartId}` until the device reports its own id.
   * A repeated request for a record still in Requested is indexed under its
   * own messageId; one for a finished record starts a new record.
   */
  async onStartRequested(
    deviceId: string,
    transactionIdHint: string | undefined,
    evseId: number | null,
    idToken: IdToken | null,
    options: StartRequestOptions = {},
  ): Promise<Transaction> {
    let transactionId = transactionIdHint;
    if (transactionId === undefined) {
      if (options.remoteStartId === undefined) {
        throw new TypeError(
          "onStartRequested needs a transaction id hint or a remoteStartId",
        );
      }
      transactionId = `remote-${options.remoteStartId}`;
    }

    const existing = this._transactions.get(deviceId)?.get(transactionId);
    if (existing && !isTerminal(existing.state)) {
      this._logger?.debug?.("Start already recorded", {
        deviceId,
        transactionId,
        state: existing.state,
        messageId: options.messageId,
      });
      if (options.messageId) {
        this._indexRequest(deviceId, options.messageId, existing);
      }
      return copy(existing);
    }

    const tx: Transaction = {
      transactionId,
      deviceId,
      evseId,
      idToken,
      state: TransactionState.REQUESTED,
      remoteStartId: options.remoteStartId,
      requestMessageId: options.messageId,
    };
    const patch = this._patch(tx);
    if (existing) {
      // Merge-patching over the finished record would keep its old fields
      const transactions: Record<string, unknown> = {
        [transactionId]: replacing(snapshotOf(existing), snapshotOf(tx)),
      };
      patch.transactions = transactions;
    }
    await this._write(deviceId, patch);
    this._store(tx);
    if (options.messageId) this._indexRequest(deviceId, options.messageId, tx);

    this._logger?.info?.("Transaction requested", {
      deviceId,
      transactionId,
      remoteStartId: options.remoteStartId,
      replaces: existing?.state,
    });
    return copy(tx);
  }

  /**
   * Apply the device's answer to RequestStartTransaction. Only a
   * transaction still in Requested is affected.
   */
  async onStartResult(
    deviceId: string,
    messageId: string,
    accepted: boolean,
  ): Promise<Transaction | null> {
    const tx = this._byRequest.get(deviceId)?.get(messageId);
    if (!tx) {
      this._logger?.warn?.("Start result for unknown request", {
        deviceId,
        messageId,
      });
      return null;
    }

    if (tx.state !== TransactionState.REQUESTED) {
      this._logger?.debug?.("Late start result ignored", {
        deviceId,
        transactionId: tx.transactionId,
        state: tx.state,
        accepted,
      });
      return copy(tx);
    }

    await this._mutate(tx, (draft) => {
      draft.startAccepted = accepted;
      if (!accepted) draft.state = TransactionState.REJECTED;
    });
    return copy(tx);
  }

  async onStopRequested(
    deviceId: string,
    transactionId: string,
    messageId: string,
  ): Promise<Transaction> {
    const stopRequest: StopRequest = { messageId, status: "Pending" };
    const tx = this._transactions.get(deviceId)?.get(transactionId);
    if (!tx) {
      // Stop for a transaction this gateway never saw, e.g. after a restart
      const unknown: Transaction = {
        transactionId,
        deviceId,
        evseId: null,
        idToken: null,
        state: TransactionState.STARTED,
        stopRequest,
      };
      this._logger?.warn?.("Stop requested for unknown transaction", {
        deviceId,
        transactionId,
      });
      await this._write(deviceId, this._patch(unknown));
      this._store(unknown);
      this._indexRequest(deviceId, messageId, unknown);
      return copy(unknown);
    }

    await this._mutate(tx, (draft) => {
      draft.stopRequest = stopRequest;
    });
    this._indexRequest(deviceId, messageId, tx);
    return copy(tx);
  }

  async onStopResult(
    deviceId: string,
    messageId: string,
    accepted: boolean,
  ): Promise<Transaction | null> {
    const tx = this._byRequest.get(deviceId)?.get(messageId);
    const stopRequest = tx?.stopRequest;
    if (!tx || !stopRequest || stopRequest.messageId !== messageId) {
      this._logger?.warn?.("Stop result for unknown request", {
        deviceId,
        messageId,
      });
      return null;
    }

    await this._mutate(tx, (draft) => {
      draft.stopRequest = {
        messageId: stopRequest.messageId,
        status: accepted ? "Accepted" : "Rejected",
      };
    });
    return copy(tx);
  }

  // ─── Device Events ────────────────────────────────────────────

  async onTransactionEvent(
    deviceId: string,
    event: TransactionEventInput,
  ): Promise<Transaction> {
    const shard = this._transactions.get(deviceId);
    let tx = shard?.get(event.transactionId);
    let provisionalId: string | undefined;

    if (!tx && event.remoteStartId !== undefined) {
      const requested = this._findRequested(deviceId, event.remoteStartId);
      if (requested) {
        provisionalId = requested.transactionId;
        tx = requested;
      }
    }

    if (!tx) {
      return this._createFromEvent(deviceId, event);
    }

    if (isTerminal(tx.state)) {
      this._logger?.debug?.("Event for finished transaction ignored", {
        deviceId,
        transactionId: tx.transactionId,
        state: tx.state,
        eventType: event.eventType,
      });
      return copy(tx);
    }

    const next: TransactionState =
      event.eventType === "Ended"
        ? TransactionState.ENDED
        : TransactionState.STARTED;

    if (
      tx.state === TransactionState.REQUESTED &&
      next === TransactionState.ENDED
    ) {
      this._logger?.warn?.("Requested transaction ended without a start", {
        deviceId,
        transactionId: tx.transactionId,
      });
    }

    await this._mutate(
      tx,
      (draft) => {
        draft.transactionId = event.transactionId;
        if (event.evseId !== undefined) draft.evseId = event.evseId;
        if (event.idToken !== undefined) draft.idToken = event.idToken;
        // An Ended straight from Requested started at the latest then
        if (draft.startTime === undefined) draft.startTime = event.timestamp;
        if (next === TransactionState.ENDED) {
          draft.endTime = event.timestamp;
          if (event.stoppedReason !== undefined) {
            draft.stoppedReason = event.stoppedReason;
          }
        }
        draft.state = next;
      },
      provisionalId,
    );
    return copy(tx);
  }

  /**
   * Shadow the latest TransactionEvent as `lastTransactionEvent`, replacing
   * the one written before it.
   */
  async recordLastEvent(
    deviceId: string,
    event: TransactionEventInput,
    data: unknown,
    receivedAt: string,
  ): Promise<void> {
    const next: Record<string, unknown> = {
      eventType: event.eventType,
      timestamp: event.timestamp,
      transactionId: event.transactionId,
      receivedAt,
      data,
    };
    const previous = this._lastEvents.get(deviceId) ?? {};
    await this._write(deviceId, {
      lastTransactionEvent: replacing(previous, next),
    });
    this._lastEvents.set(deviceId, next);
  }

  // ─── Internals ────────────────────────────────────────────────

  private async _createFromEvent(
    deviceId: string,
    event: TransactionEventInput,
  ): Promise<Transaction> {
    const ended = event.eventType === "Ended";
    const tx: Transaction = {
      transactionId: event.transactionId,
      deviceId,
      evseId: event.evseId ?? null,
      idToken: event.idToken ?? null,
      state: ended ? TransactionState.ENDED : TransactionState.STARTED,
      remoteStartId: event.remoteStartId,
    };

    if (ended) {
      tx.endTime = event.timestamp;
      tx.stoppedReason = event.stoppedReason;
      tx.synthetic = true;
      this._logger?.warn?.("Ended event for unknown transaction", {
        deviceId,
        transactionId: event.transactionId,
      });
    } else {
      tx.startTime = event.timestamp;
      this._logger?.info?.("Device-initiated transaction", {
        deviceId,
        transactionId: event.transactionId,
        eventType: event.eventType,
      });
    }

    await this._write(deviceId, this._patch(tx, true));
    this._store(tx);
    return copy(tx);
  }

  /**
   * Apply `change` to a copy of `tx`, write the resulting snapshot, then
   * commit the copy. Writes nothing when the snapshot did not change and
   * the record was not re-keyed.
   */
  private async _mutate(
    tx: Transaction,
    change: (draft: Transaction) => void,
    provisionalId?: string,
  ): Promise<void> {
    const draft = copy(tx);
    change(draft);
    const before = snapshotOf(tx);
    const after = snapshotOf(draft);

    if (provisionalId === undefined && isDeepStrictEqual(before, after)) {
      return;
    }

    const transitioned = tx.state !== draft.state;
    const patch = this._patch(draft, transitioned);
    if (provisionalId !== undefined) {
      const transactions: Record<string, unknown> = {
        [provisionalId]: null,
        [draft.transactionId]: after,
      };
      patch.transactions = transactions;
    }
    await this._write(draft.deviceId, patch);

    if (transitioned) {
      this._logger?.info?.("Transaction state changed", {
        deviceId: draft.deviceId,
        transactionId: draft.transactionId,
        from: tx.state,
        to: draft.state,
      });
    }
    if (draft.transactionId !== tx.transactionId) {
      this._rekey(tx, draft.transactionId);
    }
    Object.assign(tx, draft);
  }

  private _patch(tx: Transaction, transitioned = false): ShadowPatch {
    const snapshot = snapshotOf(tx);
    const patch: ShadowPatch = {
      transactions: { [tx.transactionId]: snapshot },
    };
    if (transitioned && tx.state === TransactionState.STARTED) {
      patch.activeTransaction = snapshot;
    }
    if (transitioned && tx.state === TransactionState.ENDED) {
      patch.activeTransaction = null;
      patch.lastCompletedTransaction = snapshot;
    }
    return patch;
  }

  private async _write(deviceId: string, patch: ShadowPatch): Promise<void> {
    await this._shadow.merge(deviceId, patch);
  }

  private _store(tx: Transaction): void {
    let shard = this._transactions.get(tx.deviceId);
    if (!shard) {
      shard = new Map();
      this._transactions.set(tx.deviceId, shard);
    }
    shard.set(tx.transactionId, tx);
  }

  private _rekey(tx: Transaction, transactionId: string): void {
    const shard = this._transactions.get(tx.deviceId);
    shard?.delete(tx.transactionId);
    this._logger?.info?.("Remote start adopted by device transaction", {
      deviceId: tx.deviceId,
      provisionalId: tx.transactionId,
      transactionId,
    });
    tx.transactionId = transactionId;
    this._store(tx);
  }

  private _indexRequest(
    deviceId: string,
    messageId: string,
    tx: Transaction,
  ): void {
    let index = this._byRequest.get(deviceId);
    if (!index) {
      index = new Map();
      this._byRequest.set(deviceId, index);
    }
    index.set(messageId, tx);
  }

  private _findRequested(
    deviceId: string,
    remoteStartId: number,
  ): Transaction | undefined {
    for (const tx of this._transactions.get(deviceId)?.values() ?? []) {
      if (
        tx.state === TransactionState.REQUESTED &&
        tx.remoteStartId === remoteStartId
      ) {
        return tx;
      }
    }
    return undefined;
  }
}

/**
 * Merge patch turning `previous` into `next`: keys `next` no longer has,
 * at any depth, are set to `null`.
 */
export function replacing(
  previous: Record<string, unknown>,
  next: Record<string, unknown>,
): Record<string, unknown> {
  const patch: Record<string, unknown> = { ...next };
  for (const [key, old] of Object.entries(previous)) {
    const value = next[key];
    if (value === undefined) {
      patch[key] = null;
    } else if (isPlainObject(old) && isPlainObject(value)) {
      patch[key] = replacing(old, value);
    }
  }
  return patch;
}

function copy(tx: Transaction): Transaction {
  return {
    ...tx,
    idToken: tx.idToken ? { ...tx.idToken } : null,
    stopRequest: tx.stopRequest ? { ...tx.stopRequest } : undefined,
  };
}
