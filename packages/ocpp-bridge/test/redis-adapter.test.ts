import { describe, expect, it, vi } from "vitest";
import {
  createDriver,
  IoRedisDriver,
  NodeRedisDriver,
} from "../src/adapters/redis/helpers.js";
import { RedisAdapter } from "../src/adapters/redis/index.js";

// Mock ioredis-style client
const createMockRedis = () => ({
  publish: vi.fn().mockResolvedValue(1),
  subscribe: vi.fn().mockResolvedValue(undefined),
  unsubscribe: vi.fn().mockResolvedValue(undefined),
  on: vi.fn(),
  disconnect: vi.fn().mockResolvedValue(undefined),
  quit: vi.fn().mockResolvedValue("OK"),
});

// Mock node-redis v4 client
const createMockNodeRedis = () => ({
  publish: vi.fn().mockResolvedValue(1),
  subscribe: vi.fn().mockResolvedValue(undefined),
  unsubscribe: vi.fn().mockResolvedValue(undefined),
  disconnect: vi.fn().mockResolvedValue(undefined),
  isOpen: true,
});

describe("createDriver", () => {
  it("should pick the node-redis driver for clients with isOpen", () => {
    const driver = createDriver(createMockNodeRedis(), createMockNodeRedis());
    expect(driver).toBeInstanceOf(NodeRedisDriver);
  });

  it("should pick the ioredis driver otherwise", () => {
    const driver = createDriver(createMockRedis(), createMockRedis());
    expect(driver).toBeInstanceOf(IoRedisDriver);
  });
});

describe("RedisAdapter", () => {
  it("should publish JSON to the prefixed channel", async () => {
    const pub = createMockRedis();
    const adapter = new RedisAdapter({
      pubClient: pub,
      subClient: createMockRedis(),
      prefix: "test:",
      logging: false,
    });

    await adapter.publish("CP1/in", '[2,"m1","Heartbeat",{}]');

    expect(pub.publish).toHaveBeenCalledWith(
      "test:CP1/in",
      JSON.stringify('[2,"m1","Heartbeat",{}]'),
    );
  });

  it("should use the default prefix", async () => {
    const pub = createMockRedis();
    const adapter = new RedisAdapter({
      pubClient: pub,
      subClient: createMockRedis(),
      logging: false,
    });

    await adapter.publish("CP1/out", { a: 1 });

    expect(pub.publish).toHaveBeenCalledWith("ocpp-bridge:CP1/out", '{"a":1}');
  });

  it("should route ioredis messages to the channel's handlers", async () => {
    const sub = createMockRedis();
    let onMessage: ((channel: string, message: string) => void) | undefined;
    sub.on.mockImplementation(
      (event: string, handler: (channel: string, message: string) => void) => {
        if (event === "message") onMessage = handler;
      },
    );
    const adapter = new RedisAdapter({
      pubClient: createMockRedis(),
      subClient: sub,
      prefix: "test:",
      logging: false,
    });
    const received: unknown[] = [];
    await adapter.subscribe("CP1/out", (data) => received.push(data));

    onMessage?.("test:CP1/out", JSON.stringify('[2,"c1","Reset",{}]'));
    onMessage?.("test:CP2/out", JSON.stringify("ignored"));
    onMessage?.("test:CP1/out", "not json");

    expect(sub.subscribe).toHaveBeenCalledWith("test:CP1/out");
    expect(received).toEqual(['[2,"c1","Reset",{}]', "not json"]);
  });

  it("should subscribe a node-redis client with a listener", async () => {
    const sub = createMockNodeRedis();
    let listener: ((message: string) => void) | undefined;
    sub.subscribe.mockImplementation(
      async (_channel: string, handler: (message: string) => void) => {
        listener = handler;
      },
    );
    const adapter = new RedisAdapter({
      pubClient: createMockNodeRedis(),
      subClient: sub,
      logging: false,
    });
    const received: unknown[] = [];
    await adapter.subscribe("CP1/out", (data) => received.push(data));

    listener?.(JSON.stringify({ ok: true }));

    expect(sub.subscribe).toHaveBeenCalledWith(
      "ocpp-bridge:CP1/out",
      expect.any(Function),
    );
    expect(received).toEqual([{ ok: true }]);
  });

  it("should subscribe to Redis once per channel", async () => {
    const sub = createMockRedis();
    const adapter = new RedisAdapter({
      pubClient: createMockRedis(),
      subClient: sub,
      logging: false,
    });

    await adapter.subscribe("ch", () => {});
    await adapter.subscribe("ch", () => {});

    expect(sub.subscribe).toHaveBeenCalledTimes(1);
  });

  it("should unsubscribe only channels it holds", async () => {
    const sub = createMockRedis();
    const adapter = new RedisAdapter({
      pubClient: createMockRedis(),
      subClient: sub,
      prefix: "test:",
      logging: false,
    });

    await adapter.unsubscribe("never");
    expect(sub.unsubscribe).not.toHaveBeenCalled();

    await adapter.subscribe("ch", () => {});
    await adapter.unsubscribe("ch");
    expect(sub.unsubscribe).toHaveBeenCalledWith("test:ch");
  });

  it("should keep the Redis subscription while a handler remains", async () => {
    const sub = createMockRedis();
    const adapter = new RedisAdapter({
      pubClient: createMockRedis(),
      subClient: sub,
      prefix: "test:",
      logging: false,
    });
    const first = () => {};
    const second = () => {};
    await adapter.subscribe("ch", first);
    await adapter.subscribe("ch", second);

    await adapter.unsubscribe("ch", first);
    expect(sub.unsubscribe).not.toHaveBeenCalled();

    await adapter.unsubscribe("ch", second);
    expect(sub.unsubscribe).toHaveBeenCalledWith("test:ch");
  });

  it("should quit both clients on disconnect", async () => {
    const pub = createMockRedis();
    const sub = createMockRedis();
    const adapter = new RedisAdapter({
      pubClient: pub,
      subClient: sub,
      logging: false,
    });

    await adapter.disconnect();

    expect(pub.quit).toHaveBeenCalled();
    expect(sub.quit).toHaveBeenCalled();
    expect(pub.disconnect).not.toHaveBeenCalled();
  });

  it("should fall back to disconnect when a client has no quit", async () => {
    const pub = createMockNodeRedis();
    const sub = createMockNodeRedis();
    const adapter = new RedisAdapter({
      pubClient: pub,
      subClient: sub,
      logging: false,
    });

    await adapter.disconnect();

    expect(pub.disconnect).toHaveBeenCalled();
    expect(sub.disconnect).toHaveBeenCalled();
  });
});
