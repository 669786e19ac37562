/**
 * @fileoverview Mixnet client wire message definitions.
 * Uses Zod for runtime validation of both directions of the protocol.
 */

import { z } from 'zod';

/**
 * Values of the `type` discriminator used on the wire.
 */
export const MessageType = {
  SelfAddress: 'selfAddress',
  Send: 'send',
  Reply: 'reply',
  Received: 'received',
  Error: 'error',
} as const;

export type MessageType = (typeof MessageType)[keyof typeof MessageType];

// ============ Envelope ============

/**
 * Minimal view of any inbound frame: only the discriminator is checked,
 * everything else is kept for the variant decode.
 */
export const Envelope = z
  .object({
    type: z.string(),
  })
  .passthrough();

export type Envelope = z.infer<typeof Envelope>;

// ============ Client -> Mixnet Messages ============

/**
 * Request for the address the mixnet client assigned to this connection.
 */
export const SelfAddressRequest = z.object({
  type: z.literal(MessageType.SelfAddress),
});

/**
 * Request to route a message through the mixnet to a recipient address.
 */
export const SendRequest = z.object({
  type: z.literal(MessageType.Send),
  recipient: z.string().min(1),
  message: z.string(),
  withReplySurb: z.boolean().optional(),
});

/**
 * Anonymous reply to a previously received message, addressed by its sender tag.
 */
export const ReplyRequest = z.object({
  type: z.literal(MessageType.Reply),
  senderTag: z.string().min(1),
  message: z.string(),
});

/**
 * Union of all valid outbound messages.
 */
export const OutboundMessage = z.discriminatedUnion('type', [
  SelfAddressRequest,
  SendRequest,
  ReplyRequest,
]);

export type SelfAddressRequest = z.infer<typeof SelfAddressRequest>;
export type SendRequest = z.infer<typeof SendRequest>;
export type ReplyRequest = z.infer<typeof ReplyRequest>;
export type OutboundMessage = z.infer<typeof OutboundMessage>;

// ============ Mixnet -> Client Messages ============

/**
 * Reply carrying the address assigned to this connection.
 */
export const SelfAddressReply = z.object({
  type: z.literal(MessageType.SelfAddress),
  address: z.string(),
});

/**
 * Error reported by the mixnet client.
 */
export const ErrorReply = z.object({
  type: z.literal(MessageType.Error),
  message: z.string(),
});

/**
 * Application data routed to us through the mixnet.
 * Fields other than `type` are opaque to the connection layer and kept as-is;
 * `senderTag` is absent or null when the sender attached no reply SURBs.
 */
export const ReceivedMessage = z
  .object({
    type: z.literal(MessageType.Received),
    message: z.unknown(),
    senderTag: z.string().nullish(),
  })
  .passthrough();

export type SelfAddressReply = z.infer<typeof SelfAddressReply>;
export type ErrorReply = z.infer<typeof ErrorReply>;
export type ReceivedMessage = z.infer<typeof ReceivedMessage>;

// ============ Builders ============

export function selfAddressRequest(): SelfAddressRequest {
  return { type: MessageType.SelfAddress };
}

export function sendRequest(recipient: string, message: string, withReplySurb = false): SendRequest {
  return { type: MessageType.Send, recipient, message, withReplySurb };
}

export function replyRequest(senderTag: string, message: string): ReplyRequest {
  return { type: MessageType.Reply, senderTag, message };
}
