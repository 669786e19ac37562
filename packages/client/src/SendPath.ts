import { encodeMessage, type OutboundMessage, type Transport } from '@mixnet-socket/protocol';
import { describeError, NotStartedError, WriteError } from './errors.js';
import { Mutex } from './Mutex.js';
import type { Logger } from './utils/logger.js';

/**
 * Single writer for a connection.
 *
 * Every frame (application messages and the close frame) goes through one
 * lock, separate from the manager's state lock, so two writes never
 * interleave on the wire and a write in progress never blocks state reads.
 */
export class SendPath {
  private readonly lock = new Mutex();

  constructor(
    private readonly getTransport: () => Transport | null,
    private readonly logger: Logger
  ) {}

  /**
   * Encode and write an outbound message.
   * @throws {NotStartedError} if no transport is open
   * @throws {EncodingError} if the message does not match the wire schema
   * @throws {WriteError} if the transport rejects the write
   */
  send(message: OutboundMessage): Promise<void> {
    return this.lock.runExclusive(async () => {
      const transport = this.requireTransport();

      let data: string;
      try {
        data = encodeMessage(message);
      } catch (error) {
        this.logger.warn('Failed to encode outbound message', {
          type: message.type,
          error: describeError(error),
        });
        throw error;
      }

      try {
        await transport.write('data', data);
      } catch (error) {
        const err = new WriteError(`Failed to send message: ${describeError(error)}`, {
          cause: error,
        });
        this.logger.warn(err.message, { type: message.type });
        throw err;
      }
    });
  }

  /**
   * Write the close frame that asks the peer to end the connection.
   * @throws {NotStartedError} if no transport is open
   * @throws {WriteError} if the transport rejects the write
   */
  sendClose(): Promise<void> {
    return this.lock.runExclusive(async () => {
      const transport = this.requireTransport();

      try {
        await transport.write('close', '');
      } catch (error) {
        const err = new WriteError(`Failed to write close frame: ${describeError(error)}`, {
          cause: error,
        });
        this.logger.warn(err.message);
        throw err;
      }

      this.logger.debug('Sent close frame');
    });
  }

  private requireTransport(): Transport {
    const transport = this.getTransport();
    if (!transport) {
      const err = new NotStartedError();
      this.logger.warn(err.message);
      throw err;
    }
    return transport;
  }
}
