import { EventEmitter } from "node:events";
import type { IncomingMessage, Server as HttpServer } from "node:http";
import type { Duplex } from "node:stream";
import { ProtocolNegotiationError, RegistrationError } from "./errors.js";
import { initLogger } from "./init-logger.js";
import type { PendingCallTable } from "./pending-calls.js";
import type { MessageRouter } from "./router.js";
import { DeviceSession } from "./session.js";
import type { DeviceRegistry } from "./stores/registry.js";
import type { TransportServer, TransportSocket } from "./transport.js";
import { WsTransportServer } from "./transports/ws-transport.js";
import {
  CloseCode,
  type EventAdapterInterface,
  type LoggerLike,
  type SessionManagerEvents,
  type SessionManagerOptions,
  type TypedEventEmitter,
} from "./types.js";
import { withRetry } from "./util.js";
import {
  abortHandshake,
  identityFromPath,
  negotiateSubprotocol,
  parseSubprotocols,
} from "./ws-util.js";

export interface SessionManagerDeps {
  registry: DeviceRegistry;
  adapter: EventAdapterInterface;
  router: MessageRouter;
  pendingCalls: PendingCallTable;
  /** Defaults to a `ws` server in noServer mode */
  transport?: TransportServer;
  /** Clock, overridable for tests (default: Date.now) */
  now?: () => number;
}

/**
 * Owns every device session: accepts upgrades, checks the device against
 * the registry, replaces duplicate connections and closes idle ones.
 */
export class SessionManager extends (EventEmitter as new () => TypedEventEmitter<SessionManagerEvents>) {
  private _deps: SessionManagerDeps;
  private _options: Required<Omit<SessionManagerOptions, "logging">> &
    Pick<SessionManagerOptions, "logging">;
  private _transport: TransportServer;
  private _now: () => number;
  private _logger: LoggerLike | null;

  /** Active sessions by deviceId */
  private _active = new Map<string, DeviceSession>();
  /** Every session not yet closed, including those still validating */
  private _all = new Set<DeviceSession>();
  private _idleInterval: ReturnType<typeof setInterval> | null = null;
  private _httpServers = new Set<HttpServer>();
  private _closing = false;
  /** Tail of each device's activation chain */
  private _locks = new Map<string, Promise<void>>();
  /** Upgrade order, so a late-validated older connection never wins */
  private _arrivals = new WeakMap<DeviceSession, number>();
  private _arrivalSeq = 0;

  constructor(deps: SessionManagerDeps, options: SessionManagerOptions = {}) {
    super();
    this._deps = deps;
    this._options = {
      protocols: ["ocpp2.0.1"],
      idleTimeoutMs: 300_000,
      idleSweepIntervalMs: 5_000,
      maxFormatViolations: Infinity,
      queueDepth: 64,
      registryRetry: {},
      ...options,
    };
    this._transport = deps.transport ?? new WsTransportServer();
    this._now = deps.now ?? Date.now;
    this._logger = initLogger(this._options.logging, {
      component: "SessionManager",
    });

    if (this._options.idleTimeoutMs > 0) {
      this._idleInterval = setInterval(() => {
        this.sweepIdle();
      }, this._options.idleSweepIntervalMs).unref();
    }
  }

  // ─── Getters ──────────────────────────────────────────────────

  get size(): number {
    return this._active.size;
  }

  get protocols(): readonly string[] {
    return this._options.protocols;
  }

  /** The Active session for a device, if any. */
  get(deviceId: string): DeviceSession | undefined {
    return this._active.get(deviceId);
  }

  has(deviceId: string): boolean {
    return this._active.has(deviceId);
  }

  sessions(): DeviceSession[] {
    return [...this._active.values()];
  }

  // ─── Upgrade Handling ─────────────────────────────────────────

  /** Route `upgrade` events of an HTTP server to this manager. */
  attach(httpServer: HttpServer): void {
    httpServer.on("upgrade", this.handleUpgrade);
    this._httpServers.add(httpServer);
  }

  detach(httpServer: HttpServer): void {
    httpServer.removeListener("upgrade", this.handleUpgrade);
    this._httpServers.delete(httpServer);
  }

  /** `upgrade` listener; bound so it can be passed around directly. */
  readonly handleUpgrade = (
    req: IncomingMessage,
    socket: Duplex,
    head: Buffer,
  ): Promise<void> =>
    this._handleUpgrade(req, socket, head).catch((err) => {
      if (!socket.destroyed) socket.destroy();
      const error = err instanceof Error ? err : new Error(String(err));
      this._logger?.error?.("Upgrade error", { error: error.message });
      this.emit("upgradeError", error);
    });

  /**
   * 1. Identity from the last path segment
   * 2. Subprotocol negotiation (server preference order)
   * 3. WebSocket upgrade
   * 4. Registry check, then activation
   */
  private async _handleUpgrade(
    req: IncomingMessage,
    socket: Duplex,
    head: Buffer,
  ): Promise<void> {
    if (this._closing) {
      abortHandshake(socket, 503, "Server is shutting down");
      return;
    }

    const deviceId = identityFromPath(req.url);
    if (!deviceId) {
      this._reject(socket, "", 400, "Missing identity in URL path");
      return;
    }

    let offered = new Set<string>();
    const protocolHeader = req.headers["sec-websocket-protocol"];
    if (protocolHeader) {
      try {
        offered = parseSubprotocols(protocolHeader);
      } catch {
        this._reject(
          socket,
          deviceId,
          400,
          "Invalid Sec-WebSocket-Protocol header",
        );
        return;
      }
    }

    const protocol = negotiateSubprotocol(offered, this._options.protocols);
    if (!protocol) {
      const error = new ProtocolNegotiationError(
        [...offered],
        [...this._options.protocols],
      );
      this._reject(socket, deviceId, 400, error.message);
      return;
    }

    const transportSocket = await this._upgrade(req, socket, head, protocol);
    if (!transportSocket) {
      this._logger?.warn?.("WebSocket upgrade aborted", { deviceId });
      this.emit("rejected", {
        deviceId,
        reason: "WebSocket upgrade aborted",
        code: 400,
      });
      return;
    }

    await this._openSession(deviceId, protocol, transportSocket);
  }

  /** Settles with null when the transport drops the socket without upgrading. */
  private _upgrade(
    req: IncomingMessage,
    socket: Duplex,
    head: Buffer,
    protocol: string,
  ): Promise<TransportSocket | null> {
    return new Promise((resolve) => {
      if (socket.destroyed) {
        resolve(null);
        return;
      }
      const onClose = () => resolve(null);
      socket.once("close", onClose);
      this._transport.handleUpgrade(req, socket, head, protocol, (upgraded) => {
        socket.removeListener("close", onClose);
        resolve(upgraded);
      });
    });
  }

  private _reject(
    socket: Duplex,
    deviceId: string,
    status: number,
    reason: string,
  ): void {
    this._logger?.warn?.("Connection rejected", { deviceId, status, reason });
    abortHandshake(socket, status, reason);
    this.emit("rejected", { deviceId, reason, code: status });
  }

  // ─── Session Lifecycle ────────────────────────────────────────

  /** Validate an upgraded connection and make it the device's Active session. */
  private async _openSession(
    deviceId: string,
    protocol: string,
    socket: TransportSocket,
  ): Promise<DeviceSession | null> {
    const session = new DeviceSession({
      deviceId,
      protocol,
      socket,
      adapter: this._deps.adapter,
      router: this._deps.router,
      pendingCalls: this._deps.pendingCalls,
      queueDepth: this._options.queueDepth,
      maxFormatViolations: this._options.maxFormatViolations,
      now: this._now,
      logging: this._options.logging,
    });
    this._arrivals.set(session, ++this._arrivalSeq);
    this._track(session);
    session.beginValidation();

    const registered = await this._isRegistered(deviceId);
    if (!registered) {
      const error = new RegistrationError(deviceId);
      this._logger?.warn?.("Device not registered", { deviceId });
      await session.close(CloseCode.NOT_REGISTERED, error.message);
      this.emit("rejected", {
        deviceId,
        reason: error.message,
        code: CloseCode.NOT_REGISTERED,
      });
      return null;
    }

    return this._serialize(deviceId, () => this._activate(session));
  }

  /**
   * Runs `task` after every earlier task of the same device has settled.
   * Replacement and activation of one device never interleave.
   */
  private async _serialize<T>(
    deviceId: string,
    task: () => Promise<T>,
  ): Promise<T> {
    const run = (this._locks.get(deviceId) ?? Promise.resolve()).then(task);
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this._locks.set(deviceId, tail);
    try {
      return await run;
    } finally {
      if (this._locks.get(deviceId) === tail) this._locks.delete(deviceId);
    }
  }

  private async _activate(session: DeviceSession): Promise<DeviceSession | null> {
    const { deviceId, protocol } = session;
    if (this._closing) {
      await session.close(CloseCode.GOING_AWAY, "Server shutting down");
      return null;
    }

    const previous = this._active.get(deviceId);
    if (previous && this._arrivalOf(previous) > this._arrivalOf(session)) {
      this._logger?.info?.("Newer connection already active", { deviceId });
      await session.close(CloseCode.REPLACED, "Replaced by new connection");
      return null;
    }
    if (previous) {
      this._logger?.info?.("Replacing existing session", { deviceId });
      await previous.close(CloseCode.REPLACED, "Replaced by new connection");
    }

    await session.activate();
    if (!session.isActive) return null;

    this._active.set(deviceId, session);
    this._logger?.info?.("Device connected", { deviceId, protocol });
    this.emit("session", session);
    return session;
  }

  private _arrivalOf(session: DeviceSession): number {
    return this._arrivals.get(session) ?? 0;
  }

  private async _isRegistered(deviceId: string): Promise<boolean> {
    try {
      return await withRetry(
        () => this._deps.registry.exists(deviceId),
        this._options.registryRetry,
        (err, attempt, delayMs) => {
          this._logger?.warn?.("Registry lookup failed, retrying", {
            deviceId,
            attempt,
            delayMs,
            error: err instanceof Error ? err.message : String(err),
          });
        },
      );
    } catch (err) {
      this._logger?.error?.("Registry lookup failed", {
        deviceId,
        error: err instanceof Error ? err.message : String(err),
      });
      return false;
    }
  }

  private _track(session: DeviceSession): void {
    this._all.add(session);

    session.on("formatViolation", (info) => {
      this.emit("formatViolation", info);
    });

    session.on("close", (info) => {
      this._all.delete(session);
      if (this._active.get(session.deviceId) === session) {
        this._active.delete(session.deviceId);
      }
      if (info.wasActive) {
        this._logger?.info?.("Device disconnected", {
          deviceId: info.deviceId,
          code: info.code,
        });
        this.emit("sessionClosed", info);
      }
    });
  }

  // ─── Idle Sweep ───────────────────────────────────────────────

  /**
   * Close every Active session whose last device frame is older than
   * `idleTimeoutMs`. Returns the sessions being closed.
   */
  sweepIdle(now: number = this._now()): DeviceSession[] {
    const timeout = this._options.idleTimeoutMs;
    if (timeout <= 0) return [];

    const idle = this.sessions().filter(
      (session) => now - session.lastActivityTime > timeout,
    );
    for (const session of idle) {
      this._logger?.info?.("Closing idle session", {
        deviceId: session.deviceId,
        idleMs: now - session.lastActivityTime,
      });
      void session.close(CloseCode.IDLE_TIMEOUT, "Idle timeout");
    }
    return idle;
  }

  // ─── Close ────────────────────────────────────────────────────

  /** Close every session with 1001 and stop accepting connections. */
  async close(): Promise<void> {
    if (this._closing) return;
    this._closing = true;

    if (this._idleInterval) {
      clearInterval(this._idleInterval);
      this._idleInterval = null;
    }
    for (const server of this._httpServers) this.detach(server);

    this._logger?.info?.("Closing sessions", { count: this._all.size });
    await Promise.all(
      [...this._all].map((session) =>
        session.close(CloseCode.GOING_AWAY, "Server shutting down"),
      ),
    );

    await new Promise<void>((resolve) => this._transport.close(() => resolve()));
  }
}
