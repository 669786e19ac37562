import { createServer, type Server, type Socket } from 'node:net';
import type { Transport } from '@mixnet-socket/protocol';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type WebSocket from 'ws';
import { WebSocketServer } from 'ws';
import {
  ConnectionError,
  dialWebSocket,
  MixnetSocketManager,
  NORMAL_CLOSURE,
} from '../src/index.js';
import { createRecordingLogger } from './helpers.js';

interface TestServer {
  uri: string;
  connections: WebSocket[];
  received: string[];
  closeCodes: number[];
}

/**
 * Local stand-in for a mixnet client: answers selfAddress requests, records
 * everything else.
 */
function startServer(wss: WebSocketServer): Promise<TestServer> {
  const server: TestServer = { uri: '', connections: [], received: [], closeCodes: [] };

  wss.on('connection', (ws) => {
    server.connections.push(ws);
    ws.on('message', (data) => {
      const text = data.toString();
      server.received.push(text);
      if (text === '{"type":"selfAddress"}') {
        ws.send(JSON.stringify({ type: 'selfAddress', address: 'client-a.gateway' }));
      }
    });
    ws.on('close', (code) => {
      server.closeCodes.push(code);
    });
  });

  return new Promise((resolve) => {
    wss.once('listening', () => {
      const address = wss.address();
      if (typeof address === 'object' && address !== null) {
        server.uri = `ws://127.0.0.1:${address.port}`;
      }
      resolve(server);
    });
  });
}

function waitUntil(condition: () => boolean, timeoutMs = 1000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  return new Promise((resolve, reject) => {
    const check = (): void => {
      if (condition()) {
        resolve();
      } else if (Date.now() > deadline) {
        reject(new Error('Condition not met in time'));
      } else {
        setTimeout(check, 5);
      }
    };
    check();
  });
}

describe('WebSocketTransport', () => {
  let wss: WebSocketServer;
  let server: TestServer;
  const transports: Transport[] = [];

  beforeEach(async () => {
    wss = new WebSocketServer({ host: '127.0.0.1', port: 0 });
    server = await startServer(wss);
  });

  afterEach(async () => {
    for (const transport of transports.splice(0)) {
      transport.close();
    }
    for (const ws of server.connections) {
      ws.terminate();
    }
    await new Promise<void>((resolve) => wss.close(() => resolve()));
  });

  it('should write data frames and read replies', async () => {
    const transport = await dialWebSocket(server.uri);
    transports.push(transport);

    await transport.write('data', '{"type":"selfAddress"}');

    expect(await transport.read()).toBe('{"type":"selfAddress","address":"client-a.gateway"}');
    expect(server.received).toEqual(['{"type":"selfAddress"}']);
  });

  it('should send a normal closure on a close frame and then end the stream', async () => {
    const transport = await dialWebSocket(server.uri);
    transports.push(transport);

    await transport.write('close', '');

    expect(await transport.read()).toBeNull();
    await waitUntil(() => server.closeCodes.length > 0);
    expect(server.closeCodes).toEqual([NORMAL_CLOSURE]);
  });

  it('should end the stream when the server closes', async () => {
    const transport = await dialWebSocket(server.uri);
    transports.push(transport);
    await waitUntil(() => server.connections.length > 0);

    server.connections[0]?.close();

    expect(await transport.read()).toBeNull();
    await expect(transport.write('data', 'late')).rejects.toThrow('WebSocket is not open');
  });

  it('should end the stream on close', async () => {
    const transport = await dialWebSocket(server.uri);

    const read = transport.read();
    transport.close();

    expect(await read).toBeNull();
  });

  it('should reject when nothing listens', async () => {
    const closed = new WebSocketServer({ host: '127.0.0.1', port: 0 });
    const { uri } = await startServer(closed);
    await new Promise<void>((resolve) => closed.close(() => resolve()));

    await expect(dialWebSocket(uri)).rejects.toThrow();
  });

  it('should run a full session against a real socket', async () => {
    const manager = new MixnetSocketManager({
      uri: server.uri,
      messageHandler: () => undefined,
      logger: createRecordingLogger(),
    });

    const stopped = await manager.start();
    expect(manager.getClientId()).toBe('client-a.gateway');

    await manager.stop();
    expect(stopped?.fired).toBe(true);
    await waitUntil(() => server.closeCodes.length > 0);
    expect(server.closeCodes).toEqual([NORMAL_CLOSURE]);
  });
});

describe('dialWebSocket against an endpoint that never upgrades', () => {
  let tcp: Server;
  let uri: string;
  const sockets: Socket[] = [];

  beforeEach(async () => {
    tcp = createServer((socket) => {
      sockets.push(socket);
    });
    await new Promise<void>((resolve) => tcp.listen(0, '127.0.0.1', () => resolve()));
    const address = tcp.address();
    uri = typeof address === 'object' && address !== null ? `ws://127.0.0.1:${address.port}` : '';
  });

  afterEach(async () => {
    for (const socket of sockets.splice(0)) {
      socket.destroy();
    }
    await new Promise<void>((resolve) => tcp.close(() => resolve()));
  });

  it('should reject once the opening handshake times out', async () => {
    await expect(dialWebSocket(uri, 100)).rejects.toThrow('Opening handshake has timed out');
  });

  it('should let start fail and stop return', async () => {
    const manager = new MixnetSocketManager({
      uri,
      messageHandler: () => undefined,
      logger: createRecordingLogger(),
      handshakeTimeoutMs: 100,
    });

    await expect(manager.start()).rejects.toBeInstanceOf(ConnectionError);
    await manager.stop();

    expect(manager.isRunning()).toBe(false);
    expect(manager.state).toBe('idle');
  });
});
