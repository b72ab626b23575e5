import { EventEmitter } from "node:events";
import { callError, decode, encode } from "./codec.js";
import { initLogger } from "./init-logger.js";
import type { PendingCallTable } from "./pending-calls.js";
import { BoundedQueue, QueueClearedError } from "./queue.js";
import type { MessageRouter } from "./router.js";
import { type TransportSocket, TransportState } from "./transport.js";
import {
  BackendChannel,
  type DeviceSessionEvents,
  type Envelope,
  type EventAdapterInterface,
  type LoggerLike,
  type LoggingConfig,
  type SessionClosedInfo,
  SessionState,
  type TypedEventEmitter,
} from "./types.js";
import { isValidStatusCode } from "./ws-util.js";

export interface DeviceSessionOptions {
  deviceId: string;
  protocol: string;
  socket: TransportSocket;
  adapter: EventAdapterInterface;
  router: MessageRouter;
  pendingCalls: PendingCallTable;
  /** Depth of the inbound and outbound frame queues (default: 64) */
  queueDepth?: number;
  /** Malformed frames tolerated before closing with 1002 (default: Infinity) */
  maxFormatViolations?: number;
  now?: () => number;
  logging?: LoggingConfig | false;
}

/**
 * One connected device.
 *
 * Frames read from the device are processed one at a time, in arrival
 * order, through a bounded inbound queue; the socket is paused while that
 * queue is full. Frames from the backend (`{deviceId}/out`) reach the
 * device through a bounded outbound queue.
 */
export class DeviceSession extends (EventEmitter as new () => TypedEventEmitter<DeviceSessionEvents>) {
  readonly deviceId: string;
  readonly protocol: string;
  readonly backendChannel: { inbound: string; outbound: string };
  lastActivityTime: number;
  formatViolations = 0;

  private _state: SessionState = SessionState.CONNECTING;
  private _socket: TransportSocket;
  private _adapter: EventAdapterInterface;
  private _router: MessageRouter;
  private _pendingCalls: PendingCallTable;
  private _maxFormatViolations: number;
  private _now: () => number;
  private _logger: LoggerLike | null;
  private _exchangeLog: boolean;

  private _inbound: BoundedQueue;
  private _outbound: BoundedQueue;
  /** Frames that arrived while the registry lookup was still running */
  private _early: Array<Buffer | string> = [];
  private _paused = false;
  private _subscribed = false;
  private _backendHandler = (data: unknown): void => this._onBackendFrame(data);
  private _closing: Promise<SessionClosedInfo> | null = null;

  constructor(options: DeviceSessionOptions) {
    super();
    this.deviceId = options.deviceId;
    this.protocol = options.protocol;
    this.backendChannel = {
      inbound: BackendChannel.inbound(options.deviceId),
      outbound: BackendChannel.outbound(options.deviceId),
    };
    this._socket = options.socket;
    this._adapter = options.adapter;
    this._router = options.router;
    this._pendingCalls = options.pendingCalls;
    this._maxFormatViolations = options.maxFormatViolations ?? Infinity;
    this._now = options.now ?? Date.now;
    this.lastActivityTime = this._now();

    const depth = options.queueDepth ?? 64;
    this._inbound = new BoundedQueue(depth);
    this._outbound = new BoundedQueue(depth);

    this._logger = initLogger(options.logging, {
      component: "DeviceSession",
      deviceId: options.deviceId,
    });
    this._exchangeLog =
      options.logging !== false && (options.logging?.exchangeLog ?? false);

    this._socket.on("message", (data) => this._onFrame(data));
    this._socket.on("close", (code, reason) => {
      this._logger?.debug?.("Device socket closed", {
        code,
        reason: reason.toString(),
      });
      // Already closing from our side
      if (
        this._state === SessionState.CLOSING ||
        this._state === SessionState.CLOSED
      ) {
        return;
      }
      void this.close(code, "Device disconnected");
    });
    this._socket.on("error", (err) => {
      this._logger?.warn?.("Device socket error", { error: err.message });
    });
  }

  // ─── State ────────────────────────────────────────────────────

  get state(): SessionState {
    return this._state;
  }

  get isActive(): boolean {
    return this._state === SessionState.ACTIVE;
  }

  /** The device side of the session. */
  get deviceChannel(): TransportSocket {
    return this._socket;
  }

  /** Registry lookup in progress; frames are held until `activate`. */
  beginValidation(): void {
    if (this._state === SessionState.CONNECTING) {
      this._state = SessionState.VALIDATING;
    }
  }

  /**
   * Subscribe to the backend channel and start processing device frames.
   * Frames held during validation are processed first, in order.
   */
  async activate(): Promise<void> {
    if (this._state !== SessionState.VALIDATING) return;

    await this._adapter.subscribe(
      this.backendChannel.outbound,
      this._backendHandler,
    );
    this._subscribed = true;

    // The socket may have gone away while subscribing
    if (this._state !== SessionState.VALIDATING) {
      await this._releaseBackend();
      return;
    }

    this._state = SessionState.ACTIVE;
    this._pendingCalls.claim(this.deviceId, this);
    this._logger?.info?.("Session active", { protocol: this.protocol });

    const early = this._early;
    this._early = [];
    for (const frame of early) this._enqueueInbound(frame);
  }

  // ─── Device → Backend ─────────────────────────────────────────

  private _onFrame(data: Buffer | string): void {
    this.lastActivityTime = this._now();

    if (this._state === SessionState.VALIDATING) {
      this._early.push(data);
      return;
    }
    if (this._state !== SessionState.ACTIVE) return;

    this._enqueueInbound(data);
  }

  private _enqueueInbound(data: Buffer | string): void {
    this._inbound.push(() => this._processFrame(data)).catch((err) => {
      if (err instanceof QueueClearedError) {
        this._logger?.debug?.("Device frame dropped on close");
        return;
      }
      this._logger?.error?.("Frame processing failed", {
        error: err instanceof Error ? err.message : String(err),
      });
    });

    if (this._inbound.full && !this._paused) {
      this._paused = true;
      this._socket.pause?.();
      void this._inbound.whenReady().then(() => {
        this._paused = false;
        if (this._state === SessionState.ACTIVE) this._socket.resume?.();
      });
    }
  }

  private async _processFrame(raw: Buffer | string): Promise<void> {
    if (this._state !== SessionState.ACTIVE) return;

    const decoded = decode(raw);
    if (!decoded.ok) {
      this._onFormatViolation(decoded.error, decoded.recoverableMessageId);
      return;
    }

    const envelope = decoded.envelope;
    const text = encode(envelope);
    this._logExchange("in", envelope);

    try {
      await this._adapter.publish(this.backendChannel.inbound, text);
    } catch (err) {
      this._logger?.error?.("Publish to backend failed", {
        channel: this.backendChannel.inbound,
        error: err instanceof Error ? err.message : String(err),
      });
    }

    const response = await this._router.route(this.deviceId, envelope);
    if (!response) return;

    try {
      await this._adapter.publish(
        this.backendChannel.outbound,
        encode(response),
      );
    } catch (err) {
      this._logger?.error?.("Publish of response failed, answering directly", {
        channel: this.backendChannel.outbound,
        error: err instanceof Error ? err.message : String(err),
      });
      await this.sendToDevice(response);
    }
  }

  private _onFormatViolation(error: Error, messageId?: string): void {
    this.formatViolations++;
    this._logger?.warn?.("Malformed frame", {
      error: error.message,
      count: this.formatViolations,
      messageId,
    });
    this.emit("formatViolation", {
      deviceId: this.deviceId,
      count: this.formatViolations,
      error,
      messageId,
    });

    if (messageId !== undefined) {
      this.sendToDevice(
        callError(messageId, "FormationViolation", error.message),
      ).catch((err) => {
        this._logger?.warn?.("Could not answer malformed frame", {
          error: err instanceof Error ? err.message : String(err),
        });
      });
    }

    if (this.formatViolations >= this._maxFormatViolations) {
      void this.close(1002, "Too many bad messages");
    }
  }

  // ─── Backend → Device ─────────────────────────────────────────

  private _onBackendFrame(data: unknown): void {
    if (this._state !== SessionState.ACTIVE) return;

    const text = typeof data === "string" ? data : JSON.stringify(data);
    const decoded = decode(text);
    if (!decoded.ok) {
      this._logger?.warn?.("Dropping malformed backend frame", {
        error: decoded.error.message,
      });
      return;
    }

    const envelope = decoded.envelope;
    const queued = this._outbound.tryPush(() => this.sendToDevice(envelope));
    if (!queued) {
      this._logger?.warn?.("Outbound queue full, frame dropped", {
        messageId: envelope.messageId,
      });
      return;
    }
    queued.catch((err) => {
      if (err instanceof QueueClearedError) {
        this._logger?.debug?.("Backend frame dropped on close", {
          messageId: envelope.messageId,
        });
        return;
      }
      this._logger?.warn?.("Write to device failed", {
        messageId: envelope.messageId,
        error: err instanceof Error ? err.message : String(err),
      });
    });
  }

  /** Write an envelope straight to the device socket. */
  sendToDevice(envelope: Envelope): Promise<void> {
    if (this._socket.readyState !== TransportState.OPEN) {
      return Promise.reject(new Error("Device socket is not open"));
    }
    this._logExchange("out", envelope);
    return new Promise<void>((resolve, reject) => {
      this._socket.send(encode(envelope), (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  private _logExchange(direction: "in" | "out", envelope: Envelope): void {
    const meta = {
      direction,
      type: envelope.type,
      messageId: envelope.messageId,
      ...(envelope.type === "Call" ? { action: envelope.action } : {}),
    };
    if (this._exchangeLog) this._logger?.info?.("Frame", meta);
    else this._logger?.debug?.("Frame", meta);
  }

  // ─── Close ────────────────────────────────────────────────────

  /**
   * Close the session. Idempotent; every caller gets the same result.
   * Pending calls to this device complete as cancelled ("session closed")
   * unless a newer session has taken the device over.
   */
  close(code = 1000, reason = ""): Promise<SessionClosedInfo> {
    if (!this._closing) {
      this._closing = this._close(code, reason);
    }
    return this._closing;
  }

  private async _close(
    code: number,
    reason: string,
  ): Promise<SessionClosedInfo> {
    const wasActive = this._state === SessionState.ACTIVE;
    this._state = SessionState.CLOSING;

    this._early = [];
    this._inbound.clear();
    this._outbound.clear();

    if (
      this._socket.readyState === TransportState.OPEN ||
      this._socket.readyState === TransportState.CONNECTING
    ) {
      this._socket.close(isValidStatusCode(code) ? code : 1000, reason);
    }

    await this._releaseBackend();
    this._pendingCalls.release(this.deviceId, this, "session closed");

    this._state = SessionState.CLOSED;
    const info: SessionClosedInfo = {
      deviceId: this.deviceId,
      code,
      reason,
      wasActive,
    };
    this._logger?.info?.("Session closed", { code, reason, wasActive });
    this.emit("close", info);
    return info;
  }

  private async _releaseBackend(): Promise<void> {
    if (!this._subscribed) return;
    this._subscribed = false;
    try {
      await this._adapter.unsubscribe(
        this.backendChannel.outbound,
        this._backendHandler,
      );
    } catch (err) {
      this._logger?.warn?.("Unsubscribe failed", {
        channel: this.backendChannel.outbound,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
