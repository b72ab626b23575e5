// ─── Gateway ─────────────────────────────────────────────────────
export {
  createGateway,
  type Gateway,
  type GatewayOptions,
} from "./gateway.js";

// ─── Adapters ────────────────────────────────────────────────────
export { defineAdapter, InMemoryAdapter } from "./adapters/adapter.js";
export {
  type RedisLikeClient,
  type RedisPubSubDriver,
} from "./adapters/redis/helpers.js";
export {
  RedisAdapter,
  type RedisAdapterOptions,
} from "./adapters/redis/index.js";

// ─── Codec ───────────────────────────────────────────────────────
export {
  call,
  callError,
  callResult,
  type DecodeResult,
  decode,
  encode,
  toWire,
} from "./codec.js";

// ─── Commands ────────────────────────────────────────────────────
export {
  type CallCommand,
  CommandServer,
  type CommandServerDeps,
  type CommandServerOptions,
} from "./command-server.js";
export {
  CommandIngress,
  type CommandIngressDeps,
  type CommandIngressOptions,
  type CommandTicket,
  type SessionLookup,
  type StartTransactionCommand,
  type StopTransactionCommand,
} from "./ingress.js";

// ─── Errors ──────────────────────────────────────────────────────
export {
  AdapterError,
  DispatchError,
  DuplicatePendingCallError,
  FormationViolation,
  HandlerExecutionError,
  isRPCError,
  NoActiveSessionError,
  ProtocolNegotiationError,
  RegistrationError,
  type RPCError,
  RPCFormationViolationError,
  RPCFormatViolationError,
  RPCFrameworkError,
  RPCGenericError,
  RPCInternalError,
  RPCMessageTypeNotSupportedError,
  RPCNotImplementedError,
  RPCNotSupportedError,
  RPCOccurrenceConstraintViolationError,
  RPCPropertyConstraintViolationError,
  RPCProtocolError,
  RPCSecurityError,
  RPCTypeConstraintViolationError,
  UnknownDeviceError,
} from "./errors.js";

// ─── Handlers ────────────────────────────────────────────────────
export {
  type CallContext,
  type CallHandler,
  callHandlers,
  type DeviceAction,
  type HandlerResult,
  type HandlerServices,
  type ResultContext,
  type RemoteCommandAction,
  type ResultHandler,
  resultHandlers,
} from "./handlers/index.js";

// ─── Correlation & Transactions ──────────────────────────────────
export {
  type PendingCall,
  PendingCallTable,
  type PendingCallTableOptions,
  type PendingCallToken,
} from "./pending-calls.js";
export {
  type IdToken,
  snapshotOf,
  type StopRequest,
  type Transaction,
  type TransactionEventInput,
  type TransactionEventType,
  TransactionState,
  TransactionStateMachine,
} from "./transactions.js";

// ─── Routing & Sessions ──────────────────────────────────────────
export { MessageRouter, type MessageRouterOptions } from "./router.js";
export { DeviceSession, type DeviceSessionOptions } from "./session.js";
export { SessionManager, type SessionManagerDeps } from "./session-manager.js";

// ─── Stores ──────────────────────────────────────────────────────
export {
  type DeviceRegistry,
  InMemoryDeviceRegistry,
} from "./stores/registry.js";
export {
  InMemoryShadowStore,
  mergePatch,
  type ShadowDocument,
  type ShadowPatch,
  type ShadowStore,
  ShadowWriter,
} from "./stores/shadow.js";

// ─── Transport Abstraction ───────────────────────────────────────
export {
  type TransportServer,
  type TransportSocket,
  TransportState,
  type TransportStateValue,
} from "./transport.js";
export {
  WsTransportServer,
  WsTransportSocket,
} from "./transports/ws-transport.js";

// ─── Types ───────────────────────────────────────────────────────
export {
  BackendChannel,
  type CallEnvelope,
  type CallErrorEnvelope,
  type CallOutcome,
  type CallResultEnvelope,
  CloseCode,
  type Envelope,
  type EventAdapterInterface,
  type FormatViolationInfo,
  type LoggerLike,
  type LoggingConfig,
  MessageType,
  type OCPPCall,
  type OCPPCallError,
  type OCPPCallResult,
  type OCPPMessage,
  type OrphanResponse,
  type RejectedConnectionInfo,
  type RetryOptions,
  type SessionClosedInfo,
  type SessionManagerOptions,
  SessionState,
  type TypedEventEmitter,
} from "./types.js";

// ─── Utilities ───────────────────────────────────────────────────
export {
  createRPCError,
  getErrorPlainObject,
  getPackageIdent,
  withRetry,
} from "./util.js";

// ─── Validation ──────────────────────────────────────────────────
export {
  createValidator,
  loadBundledSchemas,
  SchemaId,
  Validator,
} from "./validator.js";
