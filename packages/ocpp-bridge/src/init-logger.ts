/**
 * Internal utility to initialize a logger from LoggingConfig.
 *
 * - `undefined` → default voltlog-io with console transport
 * - `false` → null (logging disabled)
 * - `LoggingConfig` → custom logger or configured voltlog-io
 */

import {
  consoleTransport,
  createLogger,
  type LogEntry,
  type LogMiddleware,
  prettyTransport,
} from "voltlog-io";
import type { LoggerLike, LoggingConfig } from "./types.js";

// ─── Display middleware ─────────────────────────────────────────

const DIM = "\x1b[2;37m";
const RESET = "\x1b[0m";

/**
 * Collapse `{component, deviceId}` context into a `[Component/CP1]` tag
 * in front of the message, so prettyTransport keeps its colors.
 */
export function sourceTagMiddleware(): LogMiddleware {
  return (entry: LogEntry, next: (e: LogEntry) => void) => {
    const ctx = entry.context;
    if (ctx) {
      const parts: string[] = [];
      if (ctx.component) parts.push(String(ctx.component));
      if (ctx.deviceId) parts.push(String(ctx.deviceId));
      if (parts.length > 0) {
        entry.message = `${DIM}[${parts.join("/")}]${RESET} ${entry.message}`;
        entry.context = undefined;
      }
    }
    next(entry);
  };
}

// ─── Public API ─────────────────────────────────────────────────

/**
 * Resolve a LoggingConfig | false | undefined into a LoggerLike or null.
 */
export function initLogger(
  config: LoggingConfig | false | undefined,
  defaultContext?: Record<string, unknown>,
): LoggerLike | null {
  if (config === false) return null;
  if (config?.enabled === false) return null;

  // Custom external logger provided — use as-is
  if (config?.logger) {
    if (defaultContext && config.logger.child) {
      return config.logger.child(defaultContext);
    }
    return config.logger;
  }

  const level = config?.level ?? "INFO";
  const transports = config?.prettify
    ? [prettyTransport({ level })]
    : [consoleTransport({ level })];

  if (config?.handler) {
    const customTransport = config.handler;
    transports.push({
      name: "customHandler",
      write: (entry) => customTransport(entry),
    });
  }

  const logger = createLogger({
    level,
    transports,
    middleware: config?.prettifySource ? [sourceTagMiddleware()] : undefined,
  });

  if (defaultContext && Object.keys(defaultContext).length > 0) {
    return logger.child(defaultContext);
  }

  return logger;
}
