import { EventEmitter } from "node:events";
import type { Server } from "node:http";
import {
  type TransportSocket,
  TransportState,
  type TransportStateValue,
} from "../src/transport.js";

/** In-process stand-in for a device's WebSocket. */
export class FakeSocket extends EventEmitter implements TransportSocket {
  readyState: TransportStateValue = TransportState.OPEN;
  sent: string[] = [];
  closeCalls: Array<{ code?: number; reason?: string }> = [];
  pauses = 0;
  resumes = 0;

  constructor(readonly protocol = "ocpp2.0.1") {
    super();
  }

  /** Frame from the device. */
  receive(frame: string): void {
    this.emit("message", frame);
  }

  /** The device drops the connection. */
  drop(code = 1006): void {
    this.readyState = TransportState.CLOSED;
    this.emit("close", code, Buffer.from(""));
  }

  sentFrames(): unknown[] {
    return this.sent.map((text): unknown => JSON.parse(text));
  }

  send(data: string, cb?: (err?: Error) => void): void {
    if (this.readyState !== TransportState.OPEN) {
      cb?.(new Error("socket closed"));
      return;
    }
    this.sent.push(data);
    cb?.();
  }

  close(code?: number, reason?: string): void {
    this.closeCalls.push({ code, reason });
    this.readyState = TransportState.CLOSED;
    this.emit("close", code ?? 1005, Buffer.from(reason ?? ""));
  }

  pause(): void {
    this.pauses++;
  }

  resume(): void {
    this.resumes++;
  }
}

export function deferred() {
  let release: () => void = () => {};
  const promise = new Promise<void>((resolve) => {
    release = resolve;
  });
  return { promise, release };
}

export const getPort = (srv: Server): number => {
  const addr = srv.address();
  if (addr && typeof addr !== "string") return addr.port;
  return 0;
};
