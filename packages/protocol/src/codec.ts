/**
 * @fileoverview Wire codec: JSON text frames in both directions.
 */

import type { z } from 'zod';
import { DecodeError, EncodingError } from './errors.js';
import { Envelope, OutboundMessage } from './messages.js';

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validate an outbound message and serialize it to its wire text.
 * @throws {EncodingError} if the message does not match any outbound variant
 */
export function encodeMessage(message: OutboundMessage): string {
  const result = OutboundMessage.safeParse(message);
  if (!result.success) {
    throw new EncodingError(formatIssues(result.error), { cause: result.error });
  }
  return JSON.stringify(result.data);
}

/**
 * Decode a raw frame just far enough to read its `type` discriminator.
 * @throws {DecodeError} if the frame is not JSON or carries no string `type`
 */
export function decodeEnvelope(frame: string): Envelope {
  let raw: unknown;
  try {
    raw = JSON.parse(frame);
  } catch (error) {
    throw new DecodeError('frame is not valid JSON', { cause: error });
  }

  const result = Envelope.safeParse(raw);
  if (!result.success) {
    throw new DecodeError('message has no "type" attribute', { cause: result.error });
  }
  return result.data;
}

/**
 * Decode an envelope into a specific message variant.
 * @throws {DecodeError} if the envelope does not match the schema
 */
export function decodeAs<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, envelope: Envelope): T {
  const result = schema.safeParse(envelope);
  if (!result.success) {
    throw new DecodeError(`invalid "${envelope.type}" message (${formatIssues(result.error)})`, {
      cause: result.error,
    });
  }
  return result.data;
}
