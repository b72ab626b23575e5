import type { IncomingMessage, ServerResponse } from "node:http";
import {
  AdapterError,
  isRPCError,
  NoActiveSessionError,
  UnknownDeviceError,
} from "./errors.js";
import type {
  CommandIngress,
  CommandTicket,
  StartTransactionCommand,
  StopTransactionCommand,
} from "./ingress.js";
import { initLogger } from "./init-logger.js";
import type { PendingCallTable } from "./pending-calls.js";
import type { LoggerLike, LoggingConfig } from "./types.js";
import { getPackageIdent } from "./util.js";
import { SchemaId, type Validator } from "./validator.js";

export interface CallCommand {
  deviceId: string;
  action: string;
  payload: Record<string, unknown>;
  timeoutMs?: number;
}

export interface CommandServerDeps {
  ingress: CommandIngress;
  validator: Validator;
  pendingCalls: PendingCallTable;
  /** Number of Active sessions, reported by /health */
  sessions: { readonly size: number };
}

export interface CommandServerOptions {
  /** Largest accepted request body in bytes (default: 1 MiB) */
  maxBodyBytes?: number;
  logging?: LoggingConfig | false;
}

class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = "HttpError";
  }
}

const COMMAND_ROUTES = new Set([
  "/commands/start",
  "/commands/stop",
  "/commands/call",
]);

/**
 * HTTP entry point for commands:
 *
 * - `POST /commands/start` → RequestStartTransaction
 * - `POST /commands/stop` → RequestStopTransaction
 * - `POST /commands/call` → any action
 * - `GET /health`
 *
 * Commands answer 202 as soon as the Call is published, or 200 with the
 * device's outcome when `?wait=true` is given.
 */
export class CommandServer {
  private _deps: CommandServerDeps;
  private _maxBodyBytes: number;
  private _logger: LoggerLike | null;

  constructor(deps: CommandServerDeps, options: CommandServerOptions = {}) {
    this._deps = deps;
    this._maxBodyBytes = options.maxBodyBytes ?? 1024 * 1024;
    this._logger = initLogger(options.logging, { component: "CommandServer" });
  }

  /** `request` listener for `http.createServer`. */
  readonly handleRequest = (req: IncomingMessage, res: ServerResponse): void => {
    this._handle(req, res).catch((err: unknown) => {
      this._logger?.error?.("Request failed", {
        method: req.method,
        url: req.url,
        error: err instanceof Error ? err.message : String(err),
      });
      if (!res.headersSent) {
        sendJson(res, 500, {
          error: "InternalError",
          message: "Internal server error",
        });
      } else {
        res.destroy();
      }
    });
  };

  private async _handle(
    req: IncomingMessage,
    res: ServerResponse,
  ): Promise<void> {
    res.setHeader("Server", getPackageIdent());
    const url = new URL(req.url ?? "/", "http://localhost");

    if (url.pathname === "/health") {
      if (req.method !== "GET") return methodNotAllowed(res, "GET");
      sendJson(res, 200, {
        status: "ok",
        sessions: this._deps.sessions.size,
        pendingCalls: this._deps.pendingCalls.size,
      });
      return;
    }

    if (!COMMAND_ROUTES.has(url.pathname)) {
      sendJson(res, 404, { error: "NotFound", message: "Not Found" });
      return;
    }
    if (req.method !== "POST") return methodNotAllowed(res, "POST");

    try {
      const body = await this._readJson(req);
      const ticket = await this._dispatch(url.pathname, body);

      this._logger?.info?.("Command accepted", {
        route: url.pathname,
        deviceId: ticket.deviceId,
        messageId: ticket.messageId,
      });

      if (url.searchParams.get("wait") === "true") {
        const outcome = await ticket.outcome;
        sendJson(res, 200, {
          status: outcome.status,
          messageId: ticket.messageId,
          outcome,
        });
        return;
      }

      sendJson(res, 202, {
        status: "Accepted",
        messageId: ticket.messageId,
        deviceId: ticket.deviceId,
      });
    } catch (err) {
      this._sendError(res, err);
    }
  }

  private _dispatch(pathname: string, body: unknown): Promise<CommandTicket> {
    const { ingress } = this._deps;
    // Assertion calls need an explicitly typed target
    const validator: Validator = this._deps.validator;

    switch (pathname) {
      case "/commands/start":
        validator.assert<StartTransactionCommand>(SchemaId.START_COMMAND, body);
        return ingress.startTransaction(body);
      case "/commands/stop":
        validator.assert<StopTransactionCommand>(SchemaId.STOP_COMMAND, body);
        return ingress.stopTransaction(body);
      default:
        validator.assert<CallCommand>(SchemaId.CALL_COMMAND, body);
        return ingress.issueCall(
          body.deviceId,
          body.action,
          body.payload,
          body.timeoutMs,
        );
    }
  }

  private _sendError(res: ServerResponse, err: unknown): void {
    if (err instanceof HttpError) {
      sendJson(res, err.status, { error: err.code, message: err.message });
    } else if (err instanceof UnknownDeviceError) {
      sendJson(res, 404, { error: "UnknownDevice", message: err.message });
    } else if (err instanceof NoActiveSessionError) {
      sendJson(res, 409, { error: "NoActiveSession", message: err.message });
    } else if (isRPCError(err)) {
      sendJson(res, 400, { error: err.rpcErrorCode, message: err.message });
    } else if (err instanceof AdapterError) {
      this._logger?.error?.("Backend unavailable", { error: err.message });
      sendJson(res, 503, { error: "BackendUnavailable", message: err.message });
    } else {
      throw err;
    }
  }

  private async _readJson(req: IncomingMessage): Promise<unknown> {
    const chunks: Buffer[] = [];
    let size = 0;

    // Oversized bodies are drained so the 413 still reaches the client
    for await (const chunk of req) {
      const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
      size += buf.length;
      if (size <= this._maxBodyBytes) chunks.push(buf);
    }
    if (size > this._maxBodyBytes) {
      throw new HttpError(413, "PayloadTooLarge", "Request body too large");
    }

    const text = Buffer.concat(chunks).toString("utf8");
    try {
      return JSON.parse(text);
    } catch (err) {
      throw new HttpError(
        400,
        "FormationViolation",
        `Body is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }
}

// ─── Helpers ────────────────────────────────────────────────────

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  const text = JSON.stringify(body);
  res.writeHead(status, {
    "Content-Type": "application/json; charset=utf-8",
    "Content-Length": Buffer.byteLength(text),
  });
  res.end(text);
}

function methodNotAllowed(res: ServerResponse, allow: string): void {
  res.setHeader("Allow", allow);
  sendJson(res, 405, {
    error: "MethodNotAllowed",
    message: "Method Not Allowed",
  });
}
