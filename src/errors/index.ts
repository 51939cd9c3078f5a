/**
 * Base class for errors raised by the bridge layer itself.
 * Ad load failures are not errors of this layer, they reach
 * the ad listeners as LoadAdError values.
 */
export class BridgeError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'BridgeError';
    this.code = code;
    this.context = context;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * The bridge sent something this layer does not understand:
 * unknown event name, malformed message or undecodable payload.
 * Means both sides run incompatible protocol versions.
 */
export class ProtocolViolationError extends BridgeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'PROTOCOL_VIOLATION', context);
    this.name = 'ProtocolViolationError';
  }
}

/**
 * Programming error at the call site, e.g. showing an ad that was
 * never loaded or mounting the same ad twice.
 */
export class PreconditionViolationError extends BridgeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'PRECONDITION_VIOLATION', context);
    this.name = 'PreconditionViolationError';
  }
}

/**
 * A request to the bridge was rejected or never acknowledged.
 */
export class TransportError extends BridgeError {
  public readonly method: string;

  constructor(message: string, method: string, context?: Record<string, unknown>) {
    super(message, 'TRANSPORT_ERROR', { ...context, method });
    this.name = 'TransportError';
    this.method = method;
  }
}
