import type { EventEmitter } from "node:events";
import type { LogEntry, LogLevelName } from "voltlog-io";

// ─── Typed EventEmitter ──────────────────────────────────────────

/**
 * Overlays typed `.on()`, `.off()`, `.emit()` etc. on top of Node.js
 * EventEmitter.
 */
export type TypedEventEmitter<
  TEvents extends Record<keyof TEvents, unknown[]>,
> = Omit<
  EventEmitter,
  | "on"
  | "once"
  | "off"
  | "emit"
  | "removeListener"
  | "addListener"
  | "removeAllListeners"
> & {
  on<K extends keyof TEvents>(
    event: K,
    listener: (...args: TEvents[K]) => void,
  ): TypedEventEmitter<TEvents>;
  once<K extends keyof TEvents>(
    event: K,
    listener: (...args: TEvents[K]) => void,
  ): TypedEventEmitter<TEvents>;
  off<K extends keyof TEvents>(
    event: K,
    listener: (...args: TEvents[K]) => void,
  ): TypedEventEmitter<TEvents>;
  emit<K extends keyof TEvents>(event: K, ...args: TEvents[K]): boolean;
  addListener<K extends keyof TEvents>(
    event: K,
    listener: (...args: TEvents[K]) => void,
  ): TypedEventEmitter<TEvents>;
  removeListener<K extends keyof TEvents>(
    event: K,
    listener: (...args: TEvents[K]) => void,
  ): TypedEventEmitter<TEvents>;
  removeAllListeners<K extends keyof TEvents>(
    event?: K,
  ): TypedEventEmitter<TEvents>;
};

// ─── Message Types ───────────────────────────────────────────────

export const MessageType = {
  CALL: 2,
  CALLRESULT: 3,
  CALLERROR: 4,
} as const;

export type MessageType = (typeof MessageType)[keyof typeof MessageType];

// ─── OCPP-J Wire Tuples ──────────────────────────────────────────

export type OCPPCall<T = unknown> = [2, string, string, T];
export type OCPPCallResult<T = unknown> = [3, string, T];
export type OCPPCallError = [
  4,
  string,
  string,
  string,
  Record<string, unknown>,
];
export type OCPPMessage<T = unknown> =
  | OCPPCall<T>
  | OCPPCallResult<T>
  | OCPPCallError;

// ─── Envelope ────────────────────────────────────────────────────

export interface CallEnvelope {
  readonly type: "Call";
  readonly messageId: string;
  readonly action: string;
  readonly payload: unknown;
}

export interface CallResultEnvelope {
  readonly type: "CallResult";
  readonly messageId: string;
  readonly payload: unknown;
}

export interface CallErrorEnvelope {
  readonly type: "CallError";
  readonly messageId: string;
  readonly errorCode: string;
  readonly errorDescription: string;
  readonly details: Record<string, unknown>;
}

export type Envelope = CallEnvelope | CallResultEnvelope | CallErrorEnvelope;

// ─── Call Outcome ────────────────────────────────────────────────

/**
 * How a pending call ended. Timeouts and cancellations are outcomes,
 * not rejections.
 */
export type CallOutcome =
  | { status: "result"; payload: unknown }
  | {
      status: "error";
      errorCode: string;
      errorDescription: string;
      details: Record<string, unknown>;
    }
  | { status: "timeout" }
  | { status: "cancelled"; reason: string };

// ─── Session State ───────────────────────────────────────────────

export const SessionState = {
  CONNECTING: "Connecting",
  VALIDATING: "Validating",
  ACTIVE: "Active",
  CLOSING: "Closing",
  CLOSED: "Closed",
} as const;

export type SessionState = (typeof SessionState)[keyof typeof SessionState];

/** WebSocket close codes used by the session layer. */
export const CloseCode = {
  NORMAL: 1000,
  GOING_AWAY: 1001,
  TOO_MANY_BAD_FRAMES: 1002,
  NOT_REGISTERED: 4001,
  IDLE_TIMEOUT: 4008,
  REPLACED: 4009,
} as const;

export type CloseCode = (typeof CloseCode)[keyof typeof CloseCode];

// ─── Logger Interface ────────────────────────────────────────────

/**
 * Minimal logger contract — compatible with `console`, `pino`, `voltlog-io`,
 * or any custom object with these methods.
 */
export interface LoggerLike {
  debug?(message: string, meta?: Record<string, unknown>): void;
  info?(message: string, meta?: Record<string, unknown>): void;
  warn?(message: string, meta?: Record<string, unknown>): void;
  error?(message: string, meta?: Record<string, unknown>): void;
  child?(context: Record<string, unknown>): LoggerLike;
}

/**
 * Logging configuration shared by every component.
 *
 * @example Disable logging
 * ```ts
 * createGateway({ registry, shadow, logging: false });
 * ```
 *
 * @example Pretty console output at debug level
 * ```ts
 * createGateway({ registry, shadow, logging: { prettify: true, level: "DEBUG" } });
 * ```
 */
export interface LoggingConfig {
  /** Enable/disable logging (default: true) */
  enabled?: boolean;
  /**
   * Log every relayed frame at info level with its direction
   * instead of debug (default: false).
   */
  exchangeLog?: boolean;
  /** Pretty-printed colored output via voltlog-io's prettyTransport (default: false) */
  prettify?: boolean;
  /** Log level for the default voltlog-io logger (default: 'INFO') */
  level?: LogLevelName;
  /** Custom logger — replaces the default voltlog-io entirely */
  logger?: LoggerLike;
  /** Extra voltlog-io transport function — receives every entry */
  handler?: (entry: LogEntry) => void | Promise<void>;
  /** Render `{component, deviceId}` context as a compact `[Component/CP1]` tag (default: false) */
  prettifySource?: boolean;
}

// ─── Backend Transport ───────────────────────────────────────────

/**
 * Pub/sub transport between the gateway and backend processing.
 * Device channels are `{deviceId}/in` and `{deviceId}/out`.
 */
export interface EventAdapterInterface {
  publish(channel: string, data: unknown): Promise<void>;
  subscribe(channel: string, handler: (data: unknown) => void): Promise<void>;
  /**
   * Remove `handler` from the channel, or every handler when none is
   * given. The channel is dropped once it has no handlers left.
   */
  unsubscribe(
    channel: string,
    handler?: (data: unknown) => void,
  ): Promise<void>;
  disconnect(): Promise<void>;
}

export const BackendChannel = {
  inbound: (deviceId: string) => `${deviceId}/in`,
  outbound: (deviceId: string) => `${deviceId}/out`,
} as const;

// ─── Retry ───────────────────────────────────────────────────────

export interface RetryOptions {
  /** Retries after the first attempt (default: 3) */
  retries?: number;
  /** Base delay in ms for exponential backoff (default: 100) */
  baseDelayMs?: number;
  /** Upper bound for a single backoff delay in ms (default: 2000) */
  maxDelayMs?: number;
}

// ─── Session Manager Options ─────────────────────────────────────

export interface SessionManagerOptions {
  /** Accepted subprotocols, in order of preference (default: ["ocpp2.0.1"]) */
  protocols?: string[];
  /** Close a session after this long without device traffic (default: 300000, 0 disables) */
  idleTimeoutMs?: number;
  /** Interval of the idle sweep in ms (default: 5000) */
  idleSweepIntervalMs?: number;
  /** Malformed frames tolerated before the session is closed (default: Infinity) */
  maxFormatViolations?: number;
  /** Depth of each per-session frame queue (default: 64) */
  queueDepth?: number;
  /** Retry policy for registry lookups */
  registryRetry?: RetryOptions;
  logging?: LoggingConfig | false;
}

// ─── Events ──────────────────────────────────────────────────────

export interface OrphanResponse {
  deviceId: string;
  messageId: string;
  kind: "CallResult" | "CallError";
}

export interface SessionClosedInfo {
  deviceId: string;
  code: number;
  reason: string;
  /** False when the session never reached Active */
  wasActive: boolean;
}

export interface FormatViolationInfo {
  deviceId: string;
  count: number;
  error: Error;
  /** The messageId, when one could be read from the frame */
  messageId?: string;
}

export interface RejectedConnectionInfo {
  /** Empty when the URL carried no identity */
  deviceId: string;
  reason: string;
  /** HTTP status for handshake rejections, WebSocket close code otherwise */
  code: number;
}

export interface DeviceSessionEvents {
  formatViolation: [FormatViolationInfo];
  close: [SessionClosedInfo];
}

export interface SessionManagerEvents {
  session: [import("./session.js").DeviceSession];
  sessionClosed: [SessionClosedInfo];
  rejected: [RejectedConnectionInfo];
  formatViolation: [FormatViolationInfo];
  upgradeError: [Error];
}

export interface PendingCallEvents {
  orphan: [OrphanResponse];
  expired: [import("./pending-calls.js").PendingCall];
}
