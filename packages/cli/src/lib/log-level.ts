import type { LoggingConfig } from "ocpp-bridge";

export type LogLevel = NonNullable<LoggingConfig["level"]>;

export const LOG_LEVELS: readonly LogLevel[] = [
  "TRACE",
  "DEBUG",
  "INFO",
  "WARN",
  "ERROR",
  "FATAL",
];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** Case-insensitive; throws on anything voltlog-io does not know. */
export function parseLogLevel(value: string | undefined): LogLevel {
  if (value === undefined) return "INFO";
  const upper = value.toUpperCase();
  if (!isLogLevel(upper)) {
    throw new Error(
      `Unknown log level "${value}" (expected one of ${LOG_LEVELS.join(", ")})`,
    );
  }
  return upper;
}
