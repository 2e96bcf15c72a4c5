/**
 * Typed failures of the forwarding pipeline.
 *
 * The forwarder decides between reconnect, retry and skip by error class, so
 * every component converts whatever its client library throws into one of these.
 */

export type RelayErrorKind = 'connection' | 'protocol' | 'delivery' | 'composition';

/** Which live session a connection failure belongs to. */
export type SessionOrigin = 'mailbox' | 'relay';

export abstract class RelayError extends Error {
  abstract readonly kind: RelayErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Session establishment or liveness failed.
 */
export class ConnectionError extends RelayError {
  readonly kind = 'connection';

  constructor(
    public readonly origin: SessionOrigin,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/**
 * A working session rejected a command (listing, fetch, flag update).
 */
export class ProtocolError extends RelayError {
  readonly kind = 'protocol';
}

/**
 * The outbound transport refused the message, including size limits.
 */
export class DeliveryError extends RelayError {
  readonly kind = 'delivery';

  constructor(
    message: string,
    public readonly responseCode?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/**
 * Source bytes could not be parsed into a structured message.
 */
export class CompositionError extends RelayError {
  readonly kind = 'composition';
}

/**
 * A network operation exceeded its time budget.
 * Components rethrow it as the error class of the operation that timed out.
 */
export class OperationTimeoutError extends Error {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'OperationTimeoutError';
  }
}

export function isRelayError(error: unknown): error is RelayError {
  return error instanceof RelayError;
}
