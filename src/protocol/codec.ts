/**
 * Envelope codec: envelope <-> JSON text frame.
 */

import { DecodeError } from '../utils/errors.js';
import { createEnvelope, envelopeSchema, type Envelope } from './types.js';

const textDecoder = new TextDecoder();

export function encodeEnvelope(envelope: Envelope): string {
  return JSON.stringify({
    topic: envelope.topic,
    type: envelope.type,
    payload: envelope.payload,
    silent: envelope.silent,
  });
}

/**
 * Decode one frame.
 * @throws DecodeError if the frame is not valid JSON or not envelope-shaped
 */
export function decodeEnvelope(data: string | Uint8Array): Envelope {
  const raw = typeof data === 'string' ? data : textDecoder.decode(data);

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new DecodeError('Frame is not valid JSON', raw, err);
  }

  const result = envelopeSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new DecodeError(`Frame is not an envelope${where}: ${issue?.message ?? 'invalid'}`, raw, result.error);
  }

  const { topic, type, payload, silent } = result.data;
  return createEnvelope(topic, type, payload, silent);
}
