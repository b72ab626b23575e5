import { initLogger } from "../../init-logger.js";
import type {
  EventAdapterInterface,
  LoggerLike,
  LoggingConfig,
} from "../../types.js";
import {
  createDriver,
  type RedisLikeClient,
  type RedisPubSubDriver,
} from "./helpers.js";

export interface RedisAdapterOptions {
  /** Redis client for publishing */
  pubClient: RedisLikeClient;
  /** Redis client for subscribing (must be a separate connection) */
  subClient: RedisLikeClient;
  /** Key prefix for channels (default: 'ocpp-bridge:') */
  prefix?: string;
  logging?: LoggingConfig | false;
}

/**
 * Redis Pub/Sub adapter, so the backend can run in other processes.
 * Supports `ioredis` and `node-redis` (v4+). Messages are JSON encoded.
 */
export class RedisAdapter implements EventAdapterInterface {
  private _driver: RedisPubSubDriver;
  private _prefix: string;
  private _handlers = new Map<string, Set<(data: unknown) => void>>();
  private _logger: LoggerLike | null;

  constructor(options: RedisAdapterOptions) {
    this._prefix = options.prefix ?? "ocpp-bridge:";
    this._driver = createDriver(options.pubClient, options.subClient);
    this._logger = initLogger(options.logging, {
      component: "RedisAdapter",
    });
  }

  async publish(channel: string, data: unknown): Promise<void> {
    await this._driver.publish(this._prefix + channel, JSON.stringify(data));
  }

  async subscribe(
    channel: string,
    handler: (data: unknown) => void,
  ): Promise<void> {
    let handlers = this._handlers.get(channel);
    if (!handlers) {
      handlers = new Set();
      this._handlers.set(channel, handlers);
      await this._driver.subscribe(this._prefix + channel, (message) => {
        this._handleMessage(channel, message);
      });
    }
    handlers.add(handler);
  }

  async unsubscribe(
    channel: string,
    handler?: (data: unknown) => void,
  ): Promise<void> {
    const handlers = this._handlers.get(channel);
    if (!handlers) return;
    if (handler) {
      handlers.delete(handler);
      if (handlers.size > 0) return;
    }
    this._handlers.delete(channel);
    await this._driver.unsubscribe(this._prefix + channel);
  }

  async disconnect(): Promise<void> {
    this._handlers.clear();
    await this._driver.disconnect();
  }

  private _handleMessage(channel: string, message: string): void {
    const handlers = this._handlers.get(channel);
    if (!handlers) return;

    let data: unknown;
    try {
      data = JSON.parse(message);
    } catch {
      data = message;
    }

    for (const handler of handlers) {
      try {
        handler(data);
      } catch (err) {
        this._logger?.error?.("Subscriber threw", {
          channel,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
  }
}
