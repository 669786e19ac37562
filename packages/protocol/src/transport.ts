/**
 * @fileoverview Contract of the duplex connection primitive the socket manager drives.
 * Implementations: the `ws` transport in the client package, mocks in the testing package.
 */

/**
 * A normal data frame, or the protocol-level close frame that starts the close handshake.
 */
export type FrameKind = 'data' | 'close';

/**
 * An open duplex text-frame connection.
 */
export interface Transport {
  /** Write one frame. Rejects if the connection is not open or the write fails. */
  write(kind: FrameKind, data: string): Promise<void>;

  /** Force the connection closed. Pending and later reads resolve to end-of-stream. */
  close(): void;

  /**
   * Wait for the next inbound frame.
   * Resolves `null` at end of stream and rejects on a transport error.
   */
  read(): Promise<string | null>;
}

/**
 * Opens a transport to the given address, rejecting if the peer is unreachable
 * or the connection is not open within `timeoutMs`.
 */
export type Dialer = (uri: string, timeoutMs?: number) => Promise<Transport>;
