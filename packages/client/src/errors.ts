/**
 * @fileoverview Errors raised by the socket manager.
 * Codec errors (EncodingError, DecodeError) live in the protocol package.
 */

/**
 * Error thrown when the socket manager or its configuration is given invalid input.
 */
export class ValidationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(`Invalid configuration: ${message}`, options);
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when the connection to the mixnet client cannot be established.
 */
export class ConnectionError extends Error {
  constructor(
    readonly uri: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Failed to connect to ${uri}: ${reason}`, options);
    this.name = 'ConnectionError';
  }
}

/**
 * Error thrown when the mixnet client does not report our address in time.
 */
export class HandshakeTimeoutError extends Error {
  constructor(
    readonly uri: string,
    readonly timeoutMs: number
  ) {
    super(`Failed to collect client address from ${uri} within ${timeoutMs}ms`);
    this.name = 'HandshakeTimeoutError';
  }
}

/**
 * Error thrown when sending while no connection is open.
 */
export class NotStartedError extends Error {
  constructor() {
    super('Connection is not open. Is the socket manager started?');
    this.name = 'NotStartedError';
  }
}

/**
 * Error thrown when the transport rejects a write.
 */
export class WriteError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'WriteError';
  }
}

/**
 * Render an unknown thrown value for a log entry.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
