/**
 * @fileoverview Connection manager for a mixnet client's WebSocket endpoint.
 */

export {
  type ClientConfig,
  createSocketManagerFromConfig,
  DEFAULT_CLIENT_URI,
  loadClientConfig,
  parseClientConfig,
} from './config/clientConfig.js';

export {
  ConnectionError,
  describeError,
  HandshakeTimeoutError,
  NotStartedError,
  ValidationError,
  WriteError,
} from './errors.js';

export { type DispatchTarget, MessageDispatcher } from './MessageDispatcher.js';

export {
  DEFAULT_CLOSE_TIMEOUT_MS,
  DEFAULT_HANDSHAKE_TIMEOUT_MS,
  type ManagerState,
  type MessageHandler,
  MixnetSocketManager,
  type MixnetSocketManagerOptions,
  type ReplyFunction,
} from './MixnetSocketManager.js';

export { Mutex } from './Mutex.js';
export { SendPath } from './SendPath.js';
export { type ReadonlySignal, Signal, waitForAny } from './Signal.js';
export { SocketListener } from './SocketListener.js';
export {
  createLogger,
  formatLog,
  type LogData,
  type LogEntry,
  type Logger,
  type LoggerOptions,
  type LogLevel,
} from './utils/logger.js';
export {
  DEFAULT_DIAL_TIMEOUT_MS,
  dialWebSocket,
  NORMAL_CLOSURE,
  WebSocketTransport,
} from './WebSocketTransport.js';

export { DecodeError, EncodingError } from '@mixnet-socket/protocol';
