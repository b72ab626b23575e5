import type { IncomingMessage } from "node:http";
import type { Duplex } from "node:stream";

// ─── Transport State Constants ────────────────────────────────────

export const TransportState = {
  CONNECTING: 0,
  OPEN: 1,
  CLOSING: 2,
  CLOSED: 3,
} as const;

export type TransportStateValue =
  (typeof TransportState)[keyof typeof TransportState];

// ─── TransportSocket ──────────────────────────────────────────────

/**
 * Transport-agnostic device connection. The session layer only talks to
 * this interface, so tests can drive it with an in-process fake.
 */
export interface TransportSocket {
  /** Connection state: 0=CONNECTING, 1=OPEN, 2=CLOSING, 3=CLOSED */
  readonly readyState: TransportStateValue;
  /** Negotiated subprotocol (e.g. "ocpp2.0.1") */
  readonly protocol: string;

  send(data: string, cb?: (err?: Error) => void): void;
  /** Initiate graceful close with code + reason */
  close(code?: number, reason?: string): void;
  /** Stop reading from the connection (back-pressure) */
  pause?(): void;
  resume?(): void;

  on(event: "message", handler: (data: Buffer | string) => void): this;
  on(event: "close", handler: (code: number, reason: Buffer) => void): this;
  on(event: "error", handler: (err: Error) => void): this;

  removeAllListeners(event?: string): this;
}

// ─── TransportServer ──────────────────────────────────────────────

/**
 * Server-side transport that accepts incoming connections.
 */
export interface TransportServer {
  /**
   * Upgrade an HTTP request to a transport connection, answering with the
   * already negotiated subprotocol.
   */
  handleUpgrade(
    req: IncomingMessage,
    socket: Duplex,
    head: Buffer,
    protocol: string,
    callback: (socket: TransportSocket) => void,
  ): void;

  close(cb?: () => void): void;
}
