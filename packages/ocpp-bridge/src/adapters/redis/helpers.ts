/**
 * Duck-typed subset of an `ioredis` or `node-redis` (v4+) client.
 * Neither library is a dependency; callers pass their own clients.
 */
export interface RedisLikeClient {
  publish(channel: string, message: string): Promise<unknown>;
  subscribe(channel: string, ...args: unknown[]): Promise<unknown>;
  unsubscribe(channel: string, ...args: unknown[]): Promise<unknown>;
  on?(
    event: "message",
    callback: (channel: string, message: string) => void,
  ): unknown;
  disconnect?(): Promise<unknown> | unknown;
  quit?(): Promise<unknown>;
  // Node Redis v4 specific
  isOpen?: boolean;
}

// ─── Driver ─────────────────────────────────────────────────────

export interface RedisPubSubDriver {
  publish(channel: string, message: string): Promise<void>;
  subscribe(channel: string, handler: (message: string) => void): Promise<void>;
  unsubscribe(channel: string): Promise<void>;
  disconnect(): Promise<void>;
}

async function closeClient(client: RedisLikeClient): Promise<void> {
  if (client.quit) await client.quit();
  else if (client.disconnect) await client.disconnect();
}

/** ioredis delivers every subscribed channel through one `message` event. */
export class IoRedisDriver implements RedisPubSubDriver {
  private _handlers = new Map<string, (message: string) => void>();

  constructor(
    private pub: RedisLikeClient,
    private sub: RedisLikeClient,
  ) {
    this.sub.on?.("message", (channel: string, message: string) => {
      const handler = this._handlers.get(channel);
      if (handler) handler(message);
    });
  }

  async publish(channel: string, message: string): Promise<void> {
    await this.pub.publish(channel, message);
  }

  async subscribe(
    channel: string,
    handler: (message: string) => void,
  ): Promise<void> {
    this._handlers.set(channel, handler);
    await this.sub.subscribe(channel);
  }

  async unsubscribe(channel: string): Promise<void> {
    await this.sub.unsubscribe(channel);
    this._handlers.delete(channel);
  }

  async disconnect(): Promise<void> {
    this._handlers.clear();
    await Promise.all([closeClient(this.pub), closeClient(this.sub)]);
  }
}

/** node-redis takes the listener in `subscribe` itself. */
export class NodeRedisDriver implements RedisPubSubDriver {
  constructor(
    private pub: RedisLikeClient,
    private sub: RedisLikeClient,
  ) {}

  async publish(channel: string, message: string): Promise<void> {
    await this.pub.publish(channel, message);
  }

  async subscribe(
    channel: string,
    handler: (message: string) => void,
  ): Promise<void> {
    await this.sub.subscribe(channel, handler);
  }

  async unsubscribe(channel: string): Promise<void> {
    await this.sub.unsubscribe(channel);
  }

  async disconnect(): Promise<void> {
    await Promise.all([closeClient(this.pub), closeClient(this.sub)]);
  }
}

export function createDriver(
  pub: RedisLikeClient,
  sub: RedisLikeClient,
): RedisPubSubDriver {
  // Node Redis v4 clients carry an `isOpen` boolean
  if (sub.isOpen !== undefined && typeof sub.subscribe === "function") {
    return new NodeRedisDriver(pub, sub);
  }
  return new IoRedisDriver(pub, sub);
}
