import { AdapterError } from "../errors.js";
import { initLogger } from "../init-logger.js";
import type { LoggerLike, LoggingConfig, RetryOptions } from "../types.js";
import { isPlainObject, withRetry } from "../util.js";

// ─── Types ──────────────────────────────────────────────────────

export type ShadowPatch = Record<string, unknown>;
export type ShadowDocument = Record<string, unknown>;

/**
 * Per-device state document. `merge` applies a JSON merge patch: nested
 * objects are merged, `null` deletes a key, anything else replaces.
 */
export interface ShadowStore {
  merge(deviceId: string, patch: ShadowPatch): Promise<void>;
}

// ─── Merge Patch ────────────────────────────────────────────────

export function mergePatch(
  target: ShadowDocument,
  patch: ShadowPatch,
): ShadowDocument {
  const result: ShadowDocument = { ...target };
  for (const [key, value] of Object.entries(patch)) {
    if (value === null) {
      delete result[key];
    } else if (isPlainObject(value)) {
      const current = result[key];
      result[key] = mergePatch(isPlainObject(current) ? current : {}, value);
    } else {
      result[key] = value;
    }
  }
  return result;
}

// ─── In-Memory Store ────────────────────────────────────────────

export class InMemoryShadowStore implements ShadowStore {
  private _documents = new Map<string, ShadowDocument>();
  private _writes = 0;

  /** Number of merge-writes applied so far. */
  get writes(): number {
    return this._writes;
  }

  get(deviceId: string): ShadowDocument {
    return this._documents.get(deviceId) ?? {};
  }

  async merge(deviceId: string, patch: ShadowPatch): Promise<void> {
    this._documents.set(deviceId, mergePatch(this.get(deviceId), patch));
    this._writes++;
  }

  clear(): void {
    this._documents.clear();
    this._writes = 0;
  }
}

// ─── Retrying Writer ────────────────────────────────────────────

export interface ShadowWriterOptions {
  retry?: RetryOptions;
  logging?: LoggingConfig | false;
}

/**
 * Wraps a ShadowStore with retries. Once retries are exhausted the write
 * fails with an `AdapterError`.
 */
export class ShadowWriter implements ShadowStore {
  private _store: ShadowStore;
  private _retry: RetryOptions;
  private _logger: LoggerLike | null;

  constructor(store: ShadowStore, options: ShadowWriterOptions = {}) {
    this._store = store;
    this._retry = {
      retries: 3,
      baseDelayMs: 100,
      maxDelayMs: 2000,
      ...options.retry,
    };
    this._logger = initLogger(options.logging, { component: "Shadow" });
  }

  async merge(deviceId: string, patch: ShadowPatch): Promise<void> {
    let attempts = 0;
    try {
      await withRetry(
        (attempt) => {
          attempts = attempt;
          return this._store.merge(deviceId, patch);
        },
        this._retry,
        (err, attempt, delayMs) => {
          this._logger?.warn?.("Shadow write failed, retrying", {
            deviceId,
            attempt,
            delayMs,
            error: err instanceof Error ? err.message : String(err),
          });
        },
      );
    } catch (err) {
      const error = new AdapterError("shadow", attempts, err);
      this._logger?.error?.("Shadow write failed", {
        deviceId,
        attempts,
        error: error.message,
      });
      throw error;
    }
  }
}
