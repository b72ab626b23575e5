import { EventEmitter } from "node:events";
import { DuplicatePendingCallError } from "./errors.js";
import { initLogger } from "./init-logger.js";
import type {
  CallOutcome,
  LoggerLike,
  LoggingConfig,
  PendingCallEvents,
  TypedEventEmitter,
} from "./types.js";

// ─── Types ──────────────────────────────────────────────────────

export interface PendingCall {
  readonly messageId: string;
  readonly deviceId: string;
  readonly action: string;
  readonly issuedAt: number;
  readonly timeoutAt: number;
  readonly completionHandler: (outcome: CallOutcome) => void;
}

/** Returned by `register`; `outcome` settles exactly once and never rejects. */
export interface PendingCallToken {
  readonly messageId: string;
  readonly deviceId: string;
  readonly action: string;
  readonly outcome: Promise<CallOutcome>;
}

export interface PendingCallTableOptions {
  /** Timeout used when `register` is called without one (default: 30000) */
  defaultTimeoutMs?: number;
  /** Clock, overridable for tests (default: Date.now) */
  now?: () => number;
  logging?: LoggingConfig | false;
}

// ─── Pending-Call Table ─────────────────────────────────────────

/**
 * Correlates Calls sent to devices with the CallResult/CallError that
 * answers them. Entries are sharded by deviceId and removed exactly once:
 * by `resolve`, by their own deadline timer (or `expireOlderThan`), or by
 * `cancelDevice` / `release`.
 */
export class PendingCallTable extends (EventEmitter as new () => TypedEventEmitter<PendingCallEvents>) {
  private _shards = new Map<string, Map<string, PendingCall>>();
  private _size = 0;
  private _timers = new Map<PendingCall, ReturnType<typeof setTimeout>>();
  /** Session that currently owns each device's calls */
  private _owners = new Map<string, object>();
  private _sweeper: ReturnType<typeof setInterval> | null = null;
  private _defaultTimeoutMs: number;
  private _now: () => number;
  private _logger: LoggerLike | null;

  constructor(options: PendingCallTableOptions = {}) {
    super();
    this._defaultTimeoutMs = options.defaultTimeoutMs ?? 30_000;
    this._now = options.now ?? Date.now;
    this._logger = initLogger(options.logging, {
      component: "PendingCalls",
    });
  }

  get size(): number {
    return this._size;
  }

  sizeFor(deviceId: string): number {
    return this._shards.get(deviceId)?.size ?? 0;
  }

  has(deviceId: string, messageId: string): boolean {
    return this._shards.get(deviceId)?.has(messageId) ?? false;
  }

  peek(deviceId: string, messageId: string): PendingCall | undefined {
    return this._shards.get(deviceId)?.get(messageId);
  }

  /**
   * Record an outstanding Call. Throws `DuplicatePendingCallError` if the
   * (deviceId, messageId) pair is already pending.
   */
  register(
    deviceId: string,
    messageId: string,
    action: string,
    timeoutMs: number = this._defaultTimeoutMs,
  ): PendingCallToken {
    let shard = this._shards.get(deviceId);
    if (shard?.has(messageId)) {
      throw new DuplicatePendingCallError(deviceId, messageId);
    }

    let completionHandler: (outcome: CallOutcome) => void = () => {};
    const outcome = new Promise<CallOutcome>((resolve) => {
      completionHandler = resolve;
    });

    const issuedAt = this._now();
    const entry: PendingCall = {
      messageId,
      deviceId,
      action,
      issuedAt,
      timeoutAt: issuedAt + timeoutMs,
      completionHandler,
    };

    if (!shard) {
      shard = new Map();
      this._shards.set(deviceId, shard);
    }
    shard.set(messageId, entry);
    this._size++;
    this._timers.set(
      entry,
      setTimeout(() => this._expire(entry), timeoutMs).unref(),
    );

    this._logger?.debug?.("Pending call registered", {
      deviceId,
      messageId,
      action,
      timeoutMs,
    });

    return { messageId, deviceId, action, outcome };
  }

  /**
   * Complete a pending call. Returns false (and emits `orphan` for
   * responses) when nothing was pending under that key.
   */
  resolve(deviceId: string, messageId: string, outcome: CallOutcome): boolean {
    const entry = this._take(deviceId, messageId);
    if (!entry) {
      if (outcome.status === "result" || outcome.status === "error") {
        const kind = outcome.status === "result" ? "CallResult" : "CallError";
        this._logger?.warn?.("Orphan response dropped", {
          deviceId,
          messageId,
          kind,
        });
        this.emit("orphan", { deviceId, messageId, kind });
      }
      return false;
    }
    entry.completionHandler(outcome);
    return true;
  }

  /** Time out every entry whose deadline is at or before `now`. */
  expireOlderThan(now: number): PendingCall[] {
    const expired: PendingCall[] = [];
    for (const shard of this._shards.values()) {
      for (const entry of shard.values()) {
        if (entry.timeoutAt <= now) expired.push(entry);
      }
    }

    for (const entry of expired) this._expire(entry);
    return expired;
  }

  private _expire(entry: PendingCall): void {
    if (this._take(entry.deviceId, entry.messageId) !== entry) return;
    this._logger?.warn?.("Pending call timed out", {
      deviceId: entry.deviceId,
      messageId: entry.messageId,
      action: entry.action,
    });
    entry.completionHandler({ status: "timeout" });
    this.emit("expired", entry);
  }

  /** Cancel everything pending for a device, e.g. when its session closes. */
  cancelDevice(deviceId: string, reason: string): PendingCall[] {
    const shard = this._shards.get(deviceId);
    if (!shard) return [];

    const cancelled = [...shard.values()];
    this._shards.delete(deviceId);
    this._size -= cancelled.length;
    for (const entry of cancelled) this._clearTimer(entry);

    for (const entry of cancelled) {
      entry.completionHandler({ status: "cancelled", reason });
    }
    if (cancelled.length > 0) {
      this._logger?.debug?.("Pending calls cancelled", {
        deviceId,
        count: cancelled.length,
        reason,
      });
    }
    return cancelled;
  }

  // ─── Ownership ────────────────────────────────────────────────

  /** Mark `owner` as the session whose close cancels this device's calls. */
  claim(deviceId: string, owner: object): void {
    this._owners.set(deviceId, owner);
  }

  /**
   * Cancel the device's calls if `owner` still holds the claim. A session
   * that lost the device to a newer one leaves the newer one's calls alone.
   */
  release(deviceId: string, owner: object, reason: string): PendingCall[] {
    if (this._owners.get(deviceId) !== owner) return [];
    this._owners.delete(deviceId);
    return this.cancelDevice(deviceId, reason);
  }

  // ─── Sweeper ──────────────────────────────────────────────────

  /** Periodic `expireOlderThan` pass alongside the per-entry timers. */
  startSweeper(intervalMs = 1000): void {
    if (this._sweeper) return;
    this._sweeper = setInterval(() => {
      this.expireOlderThan(this._now());
    }, intervalMs).unref();
  }

  stopSweeper(): void {
    if (this._sweeper) {
      clearInterval(this._sweeper);
      this._sweeper = null;
    }
  }

  private _take(deviceId: string, messageId: string): PendingCall | undefined {
    const shard = this._shards.get(deviceId);
    const entry = shard?.get(messageId);
    if (!shard || !entry) return undefined;

    shard.delete(messageId);
    if (shard.size === 0) this._shards.delete(deviceId);
    this._size--;
    this._clearTimer(entry);
    return entry;
  }

  private _clearTimer(entry: PendingCall): void {
    const timer = this._timers.get(entry);
    if (timer) {
      clearTimeout(timer);
      this._timers.delete(entry);
    }
  }
}
