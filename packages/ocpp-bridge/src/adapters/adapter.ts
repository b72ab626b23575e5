import { initLogger } from "../init-logger.js";
import type {
  EventAdapterInterface,
  LoggerLike,
  LoggingConfig,
} from "../types.js";

/**
 * In-memory event adapter for single-process use.
 * Events are dispatched synchronously within the same process.
 */
export class InMemoryAdapter implements EventAdapterInterface {
  private _channels = new Map<string, Set<(data: unknown) => void>>();
  private _logger: LoggerLike | null;

  constructor(options: { logging?: LoggingConfig | false } = {}) {
    this._logger = initLogger(options.logging, {
      component: "InMemoryAdapter",
    });
  }

  /** Channels with at least one subscriber. */
  get channels(): string[] {
    return [...this._channels.keys()];
  }

  async publish(channel: string, data: unknown): Promise<void> {
    const handlers = this._channels.get(channel);
    if (!handlers) return;
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

  async subscribe(
    channel: string,
    handler: (data: unknown) => void,
  ): Promise<void> {
    let handlers = this._channels.get(channel);
    if (!handlers) {
      handlers = new Set();
      this._channels.set(channel, handlers);
    }
    handlers.add(handler);
  }

  async unsubscribe(
    channel: string,
    handler?: (data: unknown) => void,
  ): Promise<void> {
    const handlers = this._channels.get(channel);
    if (handler && handlers) {
      handlers.delete(handler);
      if (handlers.size > 0) return;
    }
    this._channels.delete(channel);
  }

  async disconnect(): Promise<void> {
    this._channels.clear();
  }
}

/**
 * Helper to create a custom EventAdapter without defining a class.
 *
 * @example
 * ```typescript
 * const adapter = defineAdapter({
 *   publish: async (channel, data) => { ... },
 *   subscribe: async (channel, handler) => { ... },
 *   unsubscribe: async (channel, handler) => { ... },
 *   disconnect: async () => { ... },
 * });
 * createGateway({ registry, shadow, adapter });
 * ```
 */
export function defineAdapter(
  adapter: EventAdapterInterface,
): EventAdapterInterface {
  return adapter;
}
