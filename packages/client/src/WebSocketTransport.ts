/**
 * @fileoverview `ws`-backed transport to the mixnet client's WebSocket endpoint.
 */

import type { FrameKind, Transport } from '@mixnet-socket/protocol';
import WebSocket from 'ws';

/** Close code sent with the close frame (normal closure) */
export const NORMAL_CLOSURE = 1000;

/** Opening handshake limit when the caller gives none */
export const DEFAULT_DIAL_TIMEOUT_MS = 45000;

interface PendingRead {
  resolve: (frame: string | null) => void;
  reject: (error: Error) => void;
}

function rawDataToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
}

/**
 * Adapts an open `ws` socket to the pull-based Transport contract.
 * Inbound messages are buffered until read.
 */
export class WebSocketTransport implements Transport {
  private readonly frames: string[] = [];
  private pendingRead: PendingRead | null = null;
  private ended = false;
  private failure: Error | null = null;

  constructor(private readonly ws: WebSocket) {
    ws.on('message', (data: WebSocket.RawData) => {
      this.push(rawDataToString(data));
    });

    ws.on('error', (error: Error) => {
      this.failure = error;
      this.settlePendingRead();
    });

    ws.on('close', () => {
      this.ended = true;
      this.settlePendingRead();
    });
  }

  write(kind: FrameKind, data: string): Promise<void> {
    if (this.ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new Error(`WebSocket is not open (readyState ${this.ws.readyState})`));
    }

    if (kind === 'close') {
      this.ws.close(NORMAL_CLOSURE, data);
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      this.ws.send(data, (error?: Error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  close(): void {
    this.ws.terminate();
    this.ended = true;
    this.settlePendingRead();
  }

  read(): Promise<string | null> {
    const frame = this.frames.shift();
    if (frame !== undefined) {
      return Promise.resolve(frame);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.ended) {
      return Promise.resolve(null);
    }
    if (this.pendingRead) {
      return Promise.reject(new Error('Concurrent reads are not supported'));
    }
    return new Promise<string | null>((resolve, reject) => {
      this.pendingRead = { resolve, reject };
    });
  }

  private push(frame: string): void {
    const pending = this.pendingRead;
    if (pending) {
      this.pendingRead = null;
      pending.resolve(frame);
      return;
    }
    this.frames.push(frame);
  }

  private settlePendingRead(): void {
    const pending = this.pendingRead;
    if (!pending) {
      return;
    }
    this.pendingRead = null;
    if (this.failure) {
      pending.reject(this.failure);
    } else if (this.ended) {
      pending.resolve(null);
    }
  }
}

/**
 * Open a WebSocket to `uri` and resolve with a transport once it is open.
 * Rejects with the socket's error if the endpoint cannot be reached or the
 * opening handshake does not complete within `timeoutMs`.
 */
export function dialWebSocket(
  uri: string,
  timeoutMs: number = DEFAULT_DIAL_TIMEOUT_MS
): Promise<Transport> {
  return new Promise<Transport>((resolve, reject) => {
    const ws = new WebSocket(uri, { handshakeTimeout: timeoutMs });

    const onOpen = (): void => {
      ws.off('error', onError);
      resolve(new WebSocketTransport(ws));
    };
    const onError = (error: Error): void => {
      ws.off('open', onOpen);
      reject(error);
    };

    ws.once('open', onOpen);
    ws.once('error', onError);
  });
}
