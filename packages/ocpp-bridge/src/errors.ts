// ─── RPC Error Base ──────────────────────────────────────────────

export interface RPCError extends Error {
  readonly rpcErrorCode: string;
  readonly rpcErrorMessage: string;
  readonly details: Record<string, unknown>;
}

export class RPCGenericError extends Error implements RPCError {
  readonly rpcErrorCode: string = "GenericError";
  readonly rpcErrorMessage: string = "";
  readonly details: Record<string, unknown>;

  constructor(message?: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = "RPCGenericError";
    this.details = details;
  }
}

export function isRPCError(err: unknown): err is RPCError {
  return (
    err instanceof RPCGenericError ||
    (err instanceof Error &&
      "rpcErrorCode" in err &&
      typeof err.rpcErrorCode === "string")
  );
}

// ─── Specific RPC Errors ─────────────────────────────────────────

export class RPCNotImplementedError extends RPCGenericError {
  override readonly rpcErrorCode = "NotImplemented";
  override readonly rpcErrorMessage = "Requested action is not known";

  constructor(message?: string, details: Record<string, unknown> = {}) {
    super(message, details);
    this.name = "RPCNotImplementedError";
  }
}

export class RPCNotSupportedError extends RPCGenericError {
  override readonly rpcErrorCode = "NotSupported";
  override readonly rpcErrorMessage =
    "Requested action is recognised but not supported";

  constructor(message?: string, details: Record<string, unknown> = {}) {
    super(message, details);
    this.name = "RPCNotSupportedError";
  }
}

export class RPCInternalError extends RPCGenericError {
  override readonly rpcErrorCode = "InternalError";
  override readonly rpcErrorMessage =
    "An internal error occurred and the receiver was not able to process the requested action successfully";

  constructor(message?: string, details: Record<string, unknown> = {}) {
    super(message, details);
    this.name = "RPCInternalError";
  }
}

export class RPCProtocolError extends RPCGenericError {
  override readonly rpcErrorCode = "ProtocolError";
  override readonly rpcErrorMessage = "Payload for action is incomplete";

  constructor(message?: string, details: Record<string, unknown> = {}) {
    super(message, details);
    this.name = "RPCProtocolError";
  }
}

export class RPCSecurityError extends RPCGenericError {
  override readonly rpcErrorCode = "SecurityError";
  override readonly rpcErrorMessage =
    "During the processing of action a security issue occurred preventing receiver from completing the action successfully";

  constructor(message?: string, details: Record<string, unknown> = {}) {
    super(message, details);
    this.name = "RPCSecurityError";
  }
}

export class RPCFormationViolationError extends RPCGenericError {
  override readonly rpcErrorCode = "FormationViolation";
  override readonly rpcErrorMessage =
    "Payload for action is syntactically incorrect or not conform the PDU structure for action";

  constructor(message?: string, details: Record<string, unknown> = {}) {
    super(message, details);
    this.name = "RPCFormationViolationError";
  }
}

export class RPCFormatViolationError extends RPCGenericError {
  override readonly rpcErrorCode = "FormatViolation";
  override readonly rpcErrorMessage =
    "Payload is syntactically correct but at least one field contains an invalid value";

  constructor(message?: string, details: Record<string, unknown> = {}) {
    super(message, details);
    this.name = "RPCFormatViolationError";
  }
}

export class RPCPropertyConstraintViolationError extends RPCGenericError {
  override readonly rpcErrorCode = "PropertyConstraintViolation";
  override readonly rpcErrorMessage =
    "Payload is syntactically correct but at least one of the fields violates data type constraints";

  constructor(message?: string, details: Record<string, unknown> = {}) {
    super(message, details);
    this.name = "RPCPropertyConstraintViolationError";
  }
}

export class RPCOccurrenceConstraintViolationError extends RPCGenericError {
  override readonly rpcErrorCode = "OccurrenceConstraintViolation";
  override readonly rpcErrorMessage =
    "Payload for action is syntactically correct but at least one of the fields violates occurrence constraints";

  constructor(message?: string, details: Record<string, unknown> = {}) {
    super(message, details);
    this.name = "RPCOccurrenceConstraintViolationError";
  }
}

export class RPCTypeConstraintViolationError extends RPCGenericError {
  override readonly rpcErrorCode = "TypeConstraintViolation";
  override readonly rpcErrorMessage =
    "Payload for action is syntactically correct but at least one of the fields violates type constraints";

  constructor(message?: string, details: Record<string, unknown> = {}) {
    super(message, details);
    this.name = "RPCTypeConstraintViolationError";
  }
}

export class RPCMessageTypeNotSupportedError extends RPCGenericError {
  override readonly rpcErrorCode = "MessageTypeNotSupported";
  override readonly rpcErrorMessage =
    "A message with a Message Type Number received that is not supported by this implementation";

  constructor(message?: string, details: Record<string, unknown> = {}) {
    super(message, details);
    this.name = "RPCMessageTypeNotSupportedError";
  }
}

export class RPCFrameworkError extends RPCGenericError {
  override readonly rpcErrorCode = "RpcFrameworkError";
  override readonly rpcErrorMessage =
    "Content of the call is not a valid RPC request";

  constructor(message?: string, details: Record<string, unknown> = {}) {
    super(message, details);
    this.name = "RPCFrameworkError";
  }
}

// ─── Gateway Errors ──────────────────────────────────────────────

/** Malformed envelope. Alias kept for readability at the codec boundary. */
export const FormationViolation = RPCFormationViolationError;
export type FormationViolation = RPCFormationViolationError;

/** No handler registered for a Call action. */
export const DispatchError = RPCNotImplementedError;
export type DispatchError = RPCNotImplementedError;

/**
 * A handler failed unexpectedly. Reported to the device as `InternalError`;
 * the original failure is kept as `cause`.
 */
export class HandlerExecutionError extends RPCInternalError {
  readonly action: string;

  constructor(action: string, cause: unknown) {
    super(
      `Handler for "${action}" failed: ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
    );
    this.name = "HandlerExecutionError";
    this.action = action;
    this.cause = cause;
  }
}

/** The device is not known to the registry at connect time. */
export class RegistrationError extends Error {
  readonly deviceId: string;

  constructor(deviceId: string, message = "Device not registered") {
    super(message);
    this.name = "RegistrationError";
    this.deviceId = deviceId;
  }
}

/** No subprotocol in common between device and gateway. */
export class ProtocolNegotiationError extends Error {
  readonly offered: string[];
  readonly accepted: string[];

  constructor(offered: string[], accepted: string[]) {
    super(
      offered.length === 0
        ? "Missing subprotocol"
        : "No matching subprotocol",
    );
    this.name = "ProtocolNegotiationError";
    this.offered = offered;
    this.accepted = accepted;
  }
}

/** A registry, shadow store or backend call failed after all retries. */
export class AdapterError extends Error {
  readonly adapter: "registry" | "shadow" | "backend";
  readonly attempts: number;

  constructor(
    adapter: "registry" | "shadow" | "backend",
    attempts: number,
    cause: unknown,
  ) {
    super(
      `${adapter} adapter failed after ${attempts} attempt(s): ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
    );
    this.name = "AdapterError";
    this.adapter = adapter;
    this.attempts = attempts;
    this.cause = cause;
  }
}

/** Command rejected: the registry does not know this device. */
export class UnknownDeviceError extends Error {
  readonly deviceId: string;

  constructor(deviceId: string) {
    super(`Device ${deviceId} is not registered`);
    this.name = "UnknownDeviceError";
    this.deviceId = deviceId;
  }
}

/** Command rejected: the device is registered but not connected. */
export class NoActiveSessionError extends Error {
  readonly deviceId: string;

  constructor(deviceId: string) {
    super(`Device ${deviceId} has no active session`);
    this.name = "NoActiveSessionError";
    this.deviceId = deviceId;
  }
}

export class DuplicatePendingCallError extends Error {
  constructor(deviceId: string, messageId: string) {
    super(`Call ${messageId} is already pending for device ${deviceId}`);
    this.name = "DuplicatePendingCallError";
  }
}
