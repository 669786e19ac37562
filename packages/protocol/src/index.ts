/**
 * @fileoverview Mixnet client protocol definitions.
 *
 * This package defines the JSON messages exchanged with a mixnet client's
 * WebSocket endpoint, the codec that turns them into wire text, and the
 * transport contract the connection layer is written against.
 */

export {
  decodeAs,
  decodeEnvelope,
  encodeMessage,
} from './codec.js';

export { DecodeError, EncodingError } from './errors.js';

export {
  Envelope,
  ErrorReply,
  MessageType,
  OutboundMessage,
  ReceivedMessage,
  ReplyRequest,
  replyRequest,
  SelfAddressReply,
  SelfAddressRequest,
  selfAddressRequest,
  SendRequest,
  sendRequest,
} from './messages.js';

export type { Dialer, FrameKind, Transport } from './transport.js';
