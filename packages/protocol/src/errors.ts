/**
 * Error thrown when an outbound message does not match the wire schema
 * or cannot be serialized.
 */
export class EncodingError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(`Failed to encode message: ${message}`, options);
    this.name = 'EncodingError';
  }
}

/**
 * Error thrown when an inbound frame cannot be decoded.
 */
export class DecodeError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(`Failed to decode frame: ${message}`, options);
    this.name = 'DecodeError';
  }
}
