import type { Transport } from '@mixnet-socket/protocol';
import { describeError } from './errors.js';
import { Signal } from './Signal.js';
import type { Logger } from './utils/logger.js';

/**
 * Receive loop for one transport.
 *
 * Reads frames until the transport reports end of stream or an error and
 * passes each one to `onFrame`. When the loop ends, for whatever reason,
 * `closed` fires and `onClose` is called, each exactly once.
 */
export class SocketListener {
  private readonly closedSignal = new Signal();
  private running: Promise<void> | null = null;

  constructor(
    private readonly transport: Transport,
    private readonly onFrame: (frame: string) => void,
    private readonly onClose: () => void,
    private readonly logger: Logger
  ) {}

  /** Fires once the loop has terminated */
  get closed(): Signal {
    return this.closedSignal;
  }

  /**
   * Start the loop. Calling it again while it runs has no effect.
   */
  listen(): void {
    if (this.running) {
      return;
    }
    this.running = this.loop();
  }

  private async loop(): Promise<void> {
    this.logger.debug('Listening for frames');
    try {
      for (;;) {
        const frame = await this.transport.read();
        if (frame === null) {
          this.logger.debug('Transport reached end of stream');
          break;
        }
        this.deliver(frame);
      }
    } catch (error) {
      this.logger.warn('Transport read failed', { error: describeError(error) });
    } finally {
      this.closedSignal.fire();
      this.notifyClosed();
    }
  }

  private notifyClosed(): void {
    try {
      this.onClose();
    } catch (error) {
      this.logger.error('Close handler failed', { error: describeError(error) });
    }
  }

  private deliver(frame: string): void {
    try {
      this.onFrame(frame);
    } catch (error) {
      this.logger.error('Frame handler failed', { error: describeError(error) });
    }
  }
}
