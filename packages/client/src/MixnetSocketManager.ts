/**
 * @fileoverview Lifecycle manager for the WebSocket connection to a mixnet client.
 *
 * Handles:
 * - Connecting and collecting our client address (selfAddress handshake)
 * - Serialized sends, for the application and for replies from the handler
 * - Routing inbound messages to the application handler
 * - Close handshake with the peer and release of every resource on stop
 */

import {
  type Dialer,
  type OutboundMessage,
  type ReceivedMessage,
  selfAddressRequest,
  type Transport,
} from '@mixnet-socket/protocol';
import { z } from 'zod';
import {
  ConnectionError,
  describeError,
  HandshakeTimeoutError,
  ValidationError,
} from './errors.js';
import { MessageDispatcher } from './MessageDispatcher.js';
import { Mutex } from './Mutex.js';
import { SendPath } from './SendPath.js';
import { createTimeout, type ReadonlySignal, Signal, waitForAny } from './Signal.js';
import { SocketListener } from './SocketListener.js';
import type { Logger } from './utils/logger.js';
import { dialWebSocket } from './WebSocketTransport.js';

/** How long start() waits for the connection to open, and then for the selfAddress reply */
export const DEFAULT_HANDSHAKE_TIMEOUT_MS = 5000;

/** How long teardown waits for the receive loop to end after the close frame */
export const DEFAULT_CLOSE_TIMEOUT_MS = 5000;

/**
 * Sends a message on the connection the handled message arrived on.
 */
export type ReplyFunction = (message: OutboundMessage) => Promise<void>;

/**
 * Application callback for inbound `received` messages.
 * Runs synchronously inside the receive loop.
 */
export type MessageHandler = (message: ReceivedMessage, reply: ReplyFunction) => void;

export type ManagerState = 'idle' | 'connecting' | 'awaitingIdentity' | 'ready' | 'closing';

const isFunction = (value: unknown): boolean => typeof value === 'function';

const ManagerOptionsSchema = z.object({
  uri: z
    .string({ required_error: 'connection URI cannot be empty' })
    .min(1, 'connection URI cannot be empty'),
  messageHandler: z.custom<MessageHandler>(isFunction, 'message handler needs to be defined'),
  logger: z.custom<Logger>(
    (value) =>
      typeof value === 'object' && value !== null && 'child' in value && isFunction(value.child),
    'logger needs to be defined'
  ),
  dialer: z.custom<Dialer>(isFunction, 'dialer must be a function').optional(),
  handshakeTimeoutMs: z.number().int().positive().default(DEFAULT_HANDSHAKE_TIMEOUT_MS),
  closeTimeoutMs: z.number().int().positive().default(DEFAULT_CLOSE_TIMEOUT_MS),
});

export type MixnetSocketManagerOptions = z.input<typeof ManagerOptionsSchema>;

/**
 * Owns one connection to a mixnet client.
 *
 * State lives in plain fields. Every start/stop/teardown sequence runs under
 * `stateLock`, so at most one transport is open and only one teardown runs at
 * a time. Writes go through `SendPath`, which has its own lock and never takes
 * `stateLock`. The dispatcher updates `clientId` and `selfAddressReceived`
 * synchronously on the event loop, between the awaits of those sequences.
 *
 * @example
 * ```typescript
 * const manager = new MixnetSocketManager({
 *   uri: 'ws://127.0.0.1:1977',
 *   messageHandler: (message, reply) => {
 *     if (message.senderTag) {
 *       void reply(replyRequest(message.senderTag, 'pong'));
 *     }
 *   },
 *   logger: createLogger({ level: 'debug' }),
 * });
 *
 * const stopped = await manager.start();
 * console.log(manager.getClientId());
 * await stopped?.wait();
 * ```
 */
export class MixnetSocketManager {
  private readonly uri: string;
  private readonly messageHandler: MessageHandler;
  private readonly logger: Logger;
  private readonly dialer: Dialer;
  private readonly handshakeTimeoutMs: number;
  private readonly closeTimeoutMs: number;

  private readonly stateLock = new Mutex();
  private readonly sendPath: SendPath;
  private readonly dispatcher: MessageDispatcher;

  private currentState: ManagerState = 'idle';
  private clientId = '';
  private transport: Transport | null = null;
  private listener: SocketListener | null = null;
  private stopped: Signal | null = null;
  private selfAddressReceived: Signal | null = null;

  /**
   * @throws {ValidationError} if the URI is empty or the handler or logger is missing
   */
  constructor(options: MixnetSocketManagerOptions) {
    const result = ManagerOptionsSchema.safeParse(options);
    if (!result.success) {
      throw new ValidationError(result.error.issues.map((issue) => issue.message).join('; '), {
        cause: result.error,
      });
    }
    const config = result.data;

    this.uri = config.uri;
    this.messageHandler = config.messageHandler;
    this.logger = config.logger.child({ component: 'MixnetSocketManager' });
    this.dialer = config.dialer ?? dialWebSocket;
    this.handshakeTimeoutMs = config.handshakeTimeoutMs;
    this.closeTimeoutMs = config.closeTimeoutMs;

    this.sendPath = new SendPath(() => this.transport, this.logger);
    this.dispatcher = new MessageDispatcher(
      {
        onSelfAddress: (address) => this.handleSelfAddress(address),
        onReceived: (message) => this.handleReceived(message),
      },
      this.logger
    );
  }

  /** Current lifecycle state */
  get state(): ManagerState {
    return this.currentState;
  }

  /**
   * Whether a transport is open.
   */
  isRunning(): boolean {
    return this.transport !== null;
  }

  /**
   * The address reported by the most recent selfAddress reply, or '' if none arrived yet.
   */
  getClientId(): string {
    return this.clientId;
  }

  /**
   * Connect, start the receive loop and collect our client address.
   *
   * @returns a signal that fires when this session ends, or null if a session
   *   was already running (it is left untouched)
   * @throws {ConnectionError} if the endpoint is unreachable or does not open
   *   in time, the selfAddress request cannot be written, or the connection
   *   closes during the handshake
   * @throws {HandshakeTimeoutError} if no selfAddress reply arrives in time
   */
  start(): Promise<ReadonlySignal | null> {
    return this.stateLock.runExclusive(async () => {
      this.logger.debug('Starting socket manager');

      if (this.transport) {
        this.logger.warn(`Connection to ${this.uri} already established. Resuming...`);
        return null;
      }

      this.currentState = 'connecting';
      let transport: Transport;
      try {
        transport = await this.dial();
      } catch (error) {
        this.currentState = 'idle';
        const err = new ConnectionError(
          this.uri,
          `${describeError(error)}. Is the mixnet client up and running?`,
          { cause: error }
        );
        this.logger.warn(err.message);
        throw err;
      }

      this.transport = transport;

      const listener = new SocketListener(
        transport,
        (frame) => this.dispatcher.dispatch(frame),
        () => this.handleListenerClosed(listener),
        this.logger
      );
      this.listener = listener;
      listener.listen();
      this.currentState = 'awaitingIdentity';

      const selfAddressReceived = new Signal();
      this.selfAddressReceived = selfAddressReceived;

      try {
        await this.sendPath.send(selfAddressRequest());
      } catch (error) {
        const err = new ConnectionError(
          this.uri,
          `failed to request the client address: ${describeError(error)}`,
          { cause: error }
        );
        this.logger.warn(err.message);
        this.selfAddressReceived = null;
        await this.selfDestruct();
        throw err;
      }

      const outcome = await waitForAny(
        [selfAddressReceived, listener.closed],
        this.handshakeTimeoutMs
      );
      this.selfAddressReceived = null;

      if (outcome !== selfAddressReceived) {
        const err =
          outcome === null
            ? new HandshakeTimeoutError(this.uri, this.handshakeTimeoutMs)
            : new ConnectionError(this.uri, 'connection closed before the client address was received');
        this.logger.warn(err.message);
        await this.selfDestruct();
        throw err;
      }

      this.logger.debug('Collected client address', { clientId: this.clientId });

      const stopped = new Signal();
      this.stopped = stopped;
      this.currentState = 'ready';

      this.logger.debug('Started socket manager');
      return stopped;
    });
  }

  /**
   * Close the connection, if one is open, and wait for teardown to finish.
   */
  stop(): Promise<void> {
    return this.stateLock.runExclusive(async () => {
      this.logger.debug('Stopping socket manager');

      if (!this.transport) {
        return;
      }

      await this.selfDestruct();
      this.logger.debug('Stopped socket manager');
    });
  }

  /**
   * Send a message to the mixnet client.
   * @throws {NotStartedError} if no connection is open
   * @throws {EncodingError} if the message does not match the wire schema
   * @throws {WriteError} if the write fails
   */
  send(message: OutboundMessage): Promise<void> {
    return this.sendPath.send(message);
  }

  // ============ Private Methods ============

  private handleSelfAddress(address: string): void {
    this.clientId = address;
    this.selfAddressReceived?.fire();
  }

  private handleReceived(message: ReceivedMessage): void {
    try {
      this.messageHandler(message, this.reply);
    } catch (error) {
      this.logger.error('Message handler failed', { error: describeError(error) });
    }
  }

  private readonly reply: ReplyFunction = (message) => this.send(message);

  /**
   * Dial the endpoint, giving up after `handshakeTimeoutMs` even if the dialer
   * itself never settles. A connection that opens after that is closed.
   */
  private async dial(): Promise<Transport> {
    const dialing = this.dialer(this.uri, this.handshakeTimeoutMs);
    const timeout = createTimeout(this.handshakeTimeoutMs);

    let transport: Transport | null;
    try {
      transport = await Promise.race([dialing, timeout.expired]);
    } finally {
      timeout.cancel();
    }
    if (transport) {
      return transport;
    }

    void dialing.then(
      (late) => this.closeLateConnection(late),
      (error: unknown) => {
        this.logger.debug('Dial failed after timing out', { error: describeError(error) });
      }
    );
    throw new Error(`connection did not open within ${this.handshakeTimeoutMs}ms`);
  }

  private closeLateConnection(transport: Transport): void {
    this.logger.debug('Closing connection that opened after the dial timed out');
    try {
      transport.close();
    } catch (error) {
      this.logger.warn('Error while closing connection', { error: describeError(error) });
    }
  }

  /**
   * The receive loop ended. If it was not ended by our own teardown (peer
   * closed, transport error), tear down now so the stopped signal fires.
   */
  private handleListenerClosed(listener: SocketListener): void {
    this.stateLock
      .runExclusive(async () => {
        if (this.listener !== listener) {
          return;
        }
        this.logger.debug('Receive loop ended, tearing down');
        await this.selfDestruct();
      })
      .catch((error: unknown) => {
        this.logger.error('Teardown after receive loop closure failed', {
          error: describeError(error),
        });
      });
  }

  /**
   * Release everything this session holds: notify the peer, wait (bounded)
   * for the receive loop, close the transport, fire the stopped signal.
   *
   * Must be called with `stateLock` held. Never throws.
   */
  private async selfDestruct(): Promise<void> {
    this.logger.debug('Self-destructing');

    if (!this.transport && !this.listener && !this.stopped) {
      this.logger.debug('Already self-destructed');
      return;
    }

    this.currentState = 'closing';

    // The peer only sees a normal closure if we send the close frame first;
    // on this side the socket may still report an abnormal closure.
    const listener = this.listener;
    if (listener) {
      try {
        await this.sendPath.sendClose();
      } catch (error) {
        this.logger.warn('Could not notify peer of close', { error: describeError(error) });
      }

      if (await listener.closed.waitFor(this.closeTimeoutMs)) {
        this.logger.debug('Underlying connection closed');
      } else {
        this.logger.debug(
          `Timed out (${this.closeTimeoutMs}ms) waiting for underlying connection to close`
        );
      }
      this.listener = null;
    }

    if (this.transport) {
      try {
        this.transport.close();
      } catch (error) {
        this.logger.warn('Error while closing connection', { error: describeError(error) });
      }
      this.transport = null;
    }

    if (this.stopped) {
      this.stopped.fire();
      this.stopped = null;
    }

    this.currentState = 'idle';
    this.logger.debug('Self-destructed');
  }
}
