import type { RPCError } from "./errors.js";
import * as errors from "./errors.js";
import type { RetryOptions } from "./types.js";

// ─── RPC Error Factory ──────────────────────────────────────────

/**
 * Registry mapping OCPP-J RPC error code strings to their corresponding
 * error constructors. Grouped by OCPP error code.
 */
const RPC_ERROR_REGISTRY = new Map<
  string,
  new (
    message?: string,
    details?: Record<string, unknown>,
  ) => RPCError
>([
  // Generic / framework errors
  ["GenericError", errors.RPCGenericError],
  ["RpcFrameworkError", errors.RPCFrameworkError],
  ["MessageTypeNotSupported", errors.RPCMessageTypeNotSupportedError],

  // Action-level errors
  ["NotImplemented", errors.RPCNotImplementedError],
  ["NotSupported", errors.RPCNotSupportedError],
  ["InternalError", errors.RPCInternalError],

  // Protocol / security errors
  ["ProtocolError", errors.RPCProtocolError],
  ["SecurityError", errors.RPCSecurityError],

  // Payload validation errors
  ["FormatViolation", errors.RPCFormatViolationError],
  ["FormationViolation", errors.RPCFormationViolationError],
  ["PropertyConstraintViolation", errors.RPCPropertyConstraintViolationError],
  [
    "OccurrenceConstraintViolation",
    errors.RPCOccurrenceConstraintViolationError,
  ],
  ["TypeConstraintViolation", errors.RPCTypeConstraintViolationError],
]);

/**
 * Instantiate a typed RPCError from a string error code.
 * Returns an RPCGenericError if the code is not recognized.
 */
export function createRPCError(
  code: string,
  message?: string,
  details: Record<string, unknown> = {},
): RPCError {
  const RegisteredError = RPC_ERROR_REGISTRY.get(code);
  if (RegisteredError) {
    return new RegisteredError(message, details);
  }
  return new errors.RPCGenericError(message, details);
}

// ─── Error Serialization ────────────────────────────────────────

const ERROR_PROPERTIES = [
  "name",
  "message",
  "stack",
  "code",
  "rpcErrorCode",
  "rpcErrorMessage",
  "details",
] as const;

/**
 * Convert an Error (or subclass) into a plain, JSON-safe object.
 *
 * Well-known properties are extracted explicitly so the output shape is
 * stable. Values that cannot be serialized are skipped.
 */
export function getErrorPlainObject(err: Error): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  const source: Record<string, unknown> = { ...err };
  source.name = err.name;
  source.message = err.message;
  source.stack = err.stack;

  for (const prop of ERROR_PROPERTIES) {
    const value = source[prop];
    if (value === undefined) continue;
    if (typeof value === "function" || typeof value === "symbol") continue;

    if (typeof value === "object" && value !== null) {
      try {
        JSON.stringify(value);
        result[prop] = value;
      } catch {
        // circular
      }
    } else {
      result[prop] = value;
    }
  }

  return result;
}

// ─── Package Identity ───────────────────────────────────────────

const PKG_NAME = "ocpp-bridge";
const PKG_VERSION = "0.1.0";

/**
 * Package identifier used in the HTTP `Server` header and startup logs.
 * Format: `ocpp-bridge/0.1.0`
 */
export function getPackageIdent(): string {
  return `${PKG_NAME}/${PKG_VERSION}`;
}

// ─── Retry ──────────────────────────────────────────────────────

const sleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Full Jitter exponential backoff delay for a 1-based retry attempt.
 */
export function backoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
): number {
  const ceiling = Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1));
  return Math.round(Math.random() * ceiling);
}

/**
 * Run `fn`, retrying on any rejection with Full Jitter exponential backoff.
 * Rethrows the last error once `retries` is exhausted; `onRetry` sees each
 * failure that will be retried.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void,
): Promise<T> {
  const retries = options.retries ?? 3;
  const baseDelayMs = options.baseDelayMs ?? 100;
  const maxDelayMs = options.maxDelayMs ?? 2000;

  let attempt = 0;
  for (;;) {
    attempt++;
    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt > retries) throw err;
      const delayMs = backoffDelay(attempt, baseDelayMs, maxDelayMs);
      onRetry?.(err, attempt, delayMs);
      await sleep(delayMs);
    }
  }
}

// ─── Misc ───────────────────────────────────────────────────────

export function isPlainObject(
  value: unknown,
): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
