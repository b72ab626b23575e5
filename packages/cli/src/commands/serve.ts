import { readFile } from "node:fs/promises";
import * as p from "@clack/prompts";
import {
  createGateway,
  type EventAdapterInterface,
  type Gateway,
  InMemoryDeviceRegistry,
  InMemoryShadowStore,
  type LoggingConfig,
  loadBundledSchemas,
  RedisAdapter,
  Validator,
} from "ocpp-bridge";
import pc from "picocolors";
import { createClient } from "redis";
import { parseLogLevel } from "../lib/log-level.js";

const CONFIG_SCHEMA_ID = "urn:ServeConfig";
const CONFIG_SCHEMAS = new URL("../../schemas/", import.meta.url);

export const DEFAULT_PORT = 9220;

/** Shape of the JSON file passed with `--config`. */
export interface ServeConfig {
  devices: string[];
  port?: number;
  host?: string;
  protocols?: string[];
  heartbeatInterval?: number;
  idleTimeoutMs?: number;
  callTimeoutMs?: number;
  redis?: string;
  logLevel?: string;
}

export interface ServeOptions {
  config?: string;
  /** Comma separated device ids, added to those of the config file */
  devices?: string;
  port?: number;
  host?: string;
  redis?: string;
  heartbeat?: number;
  idleTimeout?: number;
  callTimeout?: number;
  logLevel?: string;
  pretty?: boolean;
}

export async function loadServeConfig(path: string): Promise<ServeConfig> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(path, "utf8"));
  } catch (err) {
    throw new Error(
      `Cannot read config file ${path}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  // Assertion calls need an explicitly typed target
  const validator: Validator = new Validator(
    loadBundledSchemas(CONFIG_SCHEMAS),
  );
  try {
    validator.assert<ServeConfig>(CONFIG_SCHEMA_ID, parsed);
  } catch (err) {
    throw new Error(
      `Invalid config file ${path}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  return parsed;
}

function splitList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

/** Flags win over the config file. */
export async function resolveServeConfig(
  options: ServeOptions,
): Promise<ServeConfig> {
  const file: ServeConfig = options.config
    ? await loadServeConfig(options.config)
    : { devices: [] };

  return {
    ...file,
    devices: [...new Set([...file.devices, ...splitList(options.devices)])],
    port: options.port ?? file.port ?? DEFAULT_PORT,
    host: options.host ?? file.host,
    heartbeatInterval: options.heartbeat ?? file.heartbeatInterval,
    idleTimeoutMs: options.idleTimeout ?? file.idleTimeoutMs,
    callTimeoutMs: options.callTimeout ?? file.callTimeoutMs,
    redis: options.redis ?? file.redis,
    logLevel: options.logLevel ?? file.logLevel,
  };
}

/** Publisher plus a duplicated subscriber connection. */
export async function connectRedis(
  url: string,
  logging: LoggingConfig,
): Promise<RedisAdapter> {
  const pubClient = createClient({ url });
  const subClient = pubClient.duplicate();
  await Promise.all([pubClient.connect(), subClient.connect()]);
  return new RedisAdapter({ pubClient, subClient, logging });
}

export async function runServe(options: ServeOptions = {}): Promise<Gateway> {
  p.intro(pc.bgCyan(pc.black(" ⚡ OCPP Bridge ")));

  const config = await resolveServeConfig(options);
  const logging: LoggingConfig = {
    level: parseLogLevel(config.logLevel),
    prettify: options.pretty ?? true,
    prettifySource: true,
  };

  if (config.devices.length === 0) {
    p.log.warn(
      `No devices registered, every connection will be closed with ${pc.yellow("4001")}`,
    );
  }

  let adapter: EventAdapterInterface | undefined;
  if (config.redis) {
    const s = p.spinner();
    s.start(`Connecting to ${config.redis}`);
    try {
      adapter = await connectRedis(config.redis, logging);
    } catch (err) {
      s.stop(pc.red("Redis connection failed"));
      throw err;
    }
    s.stop(`Backend: ${pc.cyan(config.redis)}`);
  }

  const gateway = createGateway({
    registry: new InMemoryDeviceRegistry(config.devices),
    shadow: new InMemoryShadowStore(),
    adapter,
    protocols: config.protocols,
    heartbeatInterval: config.heartbeatInterval,
    idleTimeoutMs: config.idleTimeoutMs,
    callTimeoutMs: config.callTimeoutMs,
    logging,
  });

  const server = await gateway.listen(config.port, config.host);
  const addr = server.address();
  const port = addr && typeof addr !== "string" ? addr.port : config.port;
  const host = config.host ?? "localhost";

  p.log.success(
    `Devices connect to ${pc.cyan(`ws://${host}:${port}/ocpp/{deviceId}`)}`,
  );
  p.log.info(
    `Commands at ${pc.cyan(`http://${host}:${port}/commands/{start,stop,call}`)}`,
  );
  p.log.info(`${config.devices.length} device(s) registered`);

  return gateway;
}

/** Close the gateway on SIGINT / SIGTERM, then exit. */
export function installShutdownHandlers(gateway: Gateway): void {
  const shutdown = (signal: NodeJS.Signals) => {
    p.log.warn(`${signal} received, closing sessions...`);
    gateway.close().then(
      () => {
        p.outro("Bridge stopped");
        process.exit(0);
      },
      (err: unknown) => {
        p.log.error(
          `Shutdown failed: ${err instanceof Error ? err.message : String(err)}`,
        );
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}
