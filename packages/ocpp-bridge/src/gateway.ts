import {
  createServer as createHttpServer,
  type Server as HttpServer,
} from "node:http";
import { InMemoryAdapter } from "./adapters/adapter.js";
import { CommandServer } from "./command-server.js";
import { CommandIngress } from "./ingress.js";
import { initLogger } from "./init-logger.js";
import { PendingCallTable } from "./pending-calls.js";
import { MessageRouter } from "./router.js";
import { SessionManager } from "./session-manager.js";
import type { DeviceRegistry } from "./stores/registry.js";
import { ShadowWriter, type ShadowStore } from "./stores/shadow.js";
import { TransactionStateMachine } from "./transactions.js";
import type { TransportServer } from "./transport.js";
import type {
  EventAdapterInterface,
  LoggerLike,
  RetryOptions,
  SessionManagerOptions,
} from "./types.js";
import { getPackageIdent } from "./util.js";
import { createValidator, type Validator } from "./validator.js";

export interface GatewayOptions extends SessionManagerOptions {
  registry: DeviceRegistry;
  shadow: ShadowStore;
  /** Backend pub/sub transport (default: InMemoryAdapter) */
  adapter?: EventAdapterInterface;
  /** Device transport (default: `ws` in noServer mode) */
  transport?: TransportServer;
  validator?: Validator;
  /** Timeout of Calls issued to devices (default: 30000) */
  callTimeoutMs?: number;
  /** Pending-call timeout sweep interval (default: 1000) */
  sweepIntervalMs?: number;
  /** Heartbeat interval returned to booting devices, in seconds (default: 10) */
  heartbeatInterval?: number;
  /** Include serialized handler errors in CallError details (default: false) */
  respondWithDetailedErrors?: boolean;
  /** Retry policy for shadow writes */
  shadowRetry?: RetryOptions;
  /** Retry policy for command publishes and registry lookups */
  commandRetry?: RetryOptions;
  /** Largest accepted command body in bytes (default: 1 MiB) */
  maxBodyBytes?: number;
}

export interface Gateway {
  readonly sessions: SessionManager;
  readonly pendingCalls: PendingCallTable;
  readonly transactions: TransactionStateMachine;
  readonly router: MessageRouter;
  readonly ingress: CommandIngress;
  readonly commands: CommandServer;
  readonly adapter: EventAdapterInterface;
  /**
   * Serve WebSocket upgrades and the command endpoints on one HTTP server.
   * Port 0 picks a free port.
   */
  listen(port?: number, host?: string): Promise<HttpServer>;
  /** Close every session, stop the sweepers and the HTTP server. */
  close(): Promise<void>;
}

/**
 * Wire every component of the bridge together.
 *
 * @example
 * ```ts
 * const gateway = createGateway({
 *   registry: new InMemoryDeviceRegistry(["CP1"]),
 *   shadow: new InMemoryShadowStore(),
 * });
 * await gateway.listen(9220);
 * ```
 */
export function createGateway(options: GatewayOptions): Gateway {
  const logger: LoggerLike | null = initLogger(options.logging, {
    component: "Gateway",
  });
  const adapter =
    options.adapter ?? new InMemoryAdapter({ logging: options.logging });
  const validator = options.validator ?? createValidator();
  const shadow = new ShadowWriter(options.shadow, {
    retry: options.shadowRetry,
    logging: options.logging,
  });

  const pendingCalls = new PendingCallTable({
    defaultTimeoutMs: options.callTimeoutMs,
    logging: options.logging,
  });
  const transactions = new TransactionStateMachine(shadow, {
    logging: options.logging,
  });
  const router = new MessageRouter({
    pendingCalls,
    transactions,
    shadow,
    validator,
    heartbeatInterval: options.heartbeatInterval,
    respondWithDetailedErrors: options.respondWithDetailedErrors,
    logging: options.logging,
  });
  const sessions = new SessionManager(
    {
      registry: options.registry,
      adapter,
      router,
      pendingCalls,
      transport: options.transport,
    },
    {
      protocols: options.protocols,
      idleTimeoutMs: options.idleTimeoutMs,
      idleSweepIntervalMs: options.idleSweepIntervalMs,
      maxFormatViolations: options.maxFormatViolations,
      queueDepth: options.queueDepth,
      registryRetry: options.registryRetry,
      logging: options.logging,
    },
  );
  const ingress = new CommandIngress(
    { registry: options.registry, sessions, pendingCalls, adapter, transactions },
    { retry: options.commandRetry, logging: options.logging },
  );
  const commands = new CommandServer(
    { ingress, validator, pendingCalls, sessions },
    { maxBodyBytes: options.maxBodyBytes, logging: options.logging },
  );

  pendingCalls.startSweeper(options.sweepIntervalMs ?? 1000);

  const httpServers = new Set<HttpServer>();

  return {
    sessions,
    pendingCalls,
    transactions,
    router,
    ingress,
    commands,
    adapter,

    async listen(port = 0, host?: string): Promise<HttpServer> {
      const httpServer = createHttpServer(commands.handleRequest);
      sessions.attach(httpServer);
      httpServers.add(httpServer);

      await new Promise<void>((resolve, reject) => {
        httpServer.on("error", reject);
        httpServer.listen(port, host, () => {
          httpServer.removeListener("error", reject);
          const addr = httpServer.address();
          logger?.info?.("Gateway listening", {
            port: typeof addr === "object" ? addr?.port : port,
            host: host ?? "0.0.0.0",
            server: getPackageIdent(),
          });
          resolve();
        });
      });
      return httpServer;
    },

    async close(): Promise<void> {
      pendingCalls.stopSweeper();
      await sessions.close();
      await Promise.all(
        [...httpServers].map(
          (server) =>
            new Promise<void>((resolve) => {
              server.close(() => resolve());
              server.closeAllConnections();
            }),
        ),
      );
      httpServers.clear();
      await adapter.disconnect();
      logger?.info?.("Gateway closed");
    },
  };
}
