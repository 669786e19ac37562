/**
 * @fileoverview Routes inbound frames by their `type` discriminator.
 */

import {
  decodeAs,
  decodeEnvelope,
  type Envelope,
  ErrorReply,
  MessageType,
  ReceivedMessage,
  SelfAddressReply,
} from '@mixnet-socket/protocol';
import type { z } from 'zod';
import { describeError } from './errors.js';
import type { Logger } from './utils/logger.js';

/**
 * Receivers of the dispatched messages. Implemented by the socket manager.
 */
export interface DispatchTarget {
  /** Called with the address from every `selfAddress` reply */
  onSelfAddress(address: string): void;

  /** Called with every decoded `received` message */
  onReceived(message: ReceivedMessage): void;
}

/**
 * Decodes inbound frames and hands them to the right target method.
 *
 * Dispatch is synchronous: the receive loop does not read the next frame
 * until the current one, including the application handler, has returned.
 * A slow handler therefore delays every frame behind it.
 *
 * Frames that cannot be decoded, peer error replies, and unknown message
 * types are logged and dropped. None of them affects the connection.
 */
export class MessageDispatcher {
  constructor(
    private readonly target: DispatchTarget,
    private readonly logger: Logger
  ) {}

  dispatch(frame: string): void {
    let envelope: Envelope;
    try {
      envelope = decodeEnvelope(frame);
    } catch (error) {
      this.logger.warn('Dropping undecodable frame', { error: describeError(error) });
      return;
    }

    switch (envelope.type) {
      case MessageType.SelfAddress: {
        const reply = this.decode(SelfAddressReply, envelope);
        if (reply) {
          this.logger.debug('Got selfAddress reply', { address: reply.address });
          this.target.onSelfAddress(reply.address);
        }
        break;
      }

      case MessageType.Error: {
        const reply = this.decode(ErrorReply, envelope);
        if (reply) {
          this.logger.error('Got error from mixnet', { message: reply.message });
        }
        break;
      }

      case MessageType.Received: {
        const message = this.decode(ReceivedMessage, envelope);
        if (message) {
          this.logger.debug('Got message from mixnet', { senderTag: message.senderTag });
          this.target.onReceived(message);
        }
        break;
      }

      default:
        this.logger.warn('Dropping message of unknown type', { type: envelope.type });
    }
  }

  private decode<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, envelope: Envelope): T | null {
    try {
      return decodeAs(schema, envelope);
    } catch (error) {
      this.logger.warn('Dropping malformed message', {
        type: envelope.type,
        error: describeError(error),
      });
      return null;
    }
  }
}
