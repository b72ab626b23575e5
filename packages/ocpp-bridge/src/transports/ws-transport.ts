import { EventEmitter } from "node:events";
import type { IncomingMessage } from "node:http";
import type { Duplex } from "node:stream";
import type WebSocket from "ws";
import { WebSocketServer } from "ws";
import type {
  TransportServer,
  TransportSocket,
  TransportStateValue,
} from "../transport.js";

// ─── WsTransportSocket ────────────────────────────────────────────

/**
 * Default TransportSocket wrapping the `ws` library's WebSocket.
 * Normalizes message data to `Buffer | string`.
 */
export class WsTransportSocket extends EventEmitter implements TransportSocket {
  constructor(public readonly ws: WebSocket) {
    super();

    ws.on("message", (data: WebSocket.RawData) => {
      // ws hands out Buffer | ArrayBuffer | Buffer[] depending on binaryType
      if (Buffer.isBuffer(data)) {
        this.emit("message", data);
      } else if (Array.isArray(data)) {
        this.emit("message", Buffer.concat(data));
      } else {
        this.emit("message", Buffer.from(data));
      }
    });

    ws.on("close", (code, reason) => this.emit("close", code, reason));
    ws.on("error", (err) => this.emit("error", err));
  }

  get readyState(): TransportStateValue {
    return this.ws.readyState;
  }

  get protocol(): string {
    return this.ws.protocol;
  }

  send(data: string, cb?: (err?: Error) => void): void {
    this.ws.send(data, cb);
  }

  close(code?: number, reason?: string): void {
    this.ws.close(code, reason);
  }

  pause(): void {
    this.ws.pause();
  }

  resume(): void {
    this.ws.resume();
  }
}

// ─── WsTransportServer ────────────────────────────────────────────

/**
 * Default TransportServer wrapping `ws.WebSocketServer` in noServer mode.
 * The subprotocol is chosen before the upgrade; `handleProtocols` only
 * echoes that choice back to the device.
 */
export class WsTransportServer implements TransportServer {
  private _wss: WebSocketServer;
  private _negotiated = new WeakMap<IncomingMessage, string>();

  constructor(options: WebSocket.ServerOptions = {}) {
    this._wss = new WebSocketServer({
      ...options,
      noServer: true,
      handleProtocols: (_offered, req) => this._negotiated.get(req) ?? false,
    });
  }

  handleUpgrade(
    req: IncomingMessage,
    socket: Duplex,
    head: Buffer,
    protocol: string,
    callback: (socket: TransportSocket) => void,
  ): void {
    this._negotiated.set(req, protocol);
    this._wss.handleUpgrade(req, socket, head, (ws) => {
      callback(new WsTransportSocket(ws));
    });
  }

  close(cb?: () => void): void {
    this._wss.close(cb);
  }
}
