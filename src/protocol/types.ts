/**
 * Wire envelope for topic-addressed messages.
 *
 * Every frame on the socket is one JSON-encoded envelope:
 *   { "topic": "...", "type": "sub", "payload": "", "silent": true }
 */

import { z } from 'zod';

/** Known envelope types. The protocol is open-ended, so any string is accepted on the wire. */
export type KnownEnvelopeType = 'sub' | 'ack' | 'pub' | 'data';

export type EnvelopeType = KnownEnvelopeType | (string & {});

export interface Envelope {
  readonly topic: string;
  readonly type: EnvelopeType;
  /** Opaque payload, typically serialized JSON */
  readonly payload: string;
  /** Control envelopes are silent and never surface as caller-visible messages */
  readonly silent: boolean;
}

export const envelopeSchema = z.object({
  topic: z.string().min(1),
  type: z.string().min(1),
  payload: z.string().default(''),
  silent: z.boolean().default(false),
});

export function createEnvelope(
  topic: string,
  type: EnvelopeType,
  payload = '',
  silent = false
): Envelope {
  return Object.freeze({ topic, type, payload, silent });
}

export function subscribeEnvelope(topic: string): Envelope {
  return createEnvelope(topic, 'sub', '', true);
}

export function ackEnvelope(topic: string): Envelope {
  return createEnvelope(topic, 'ack', '', true);
}

export function isSubscribeEnvelope(envelope: Envelope): boolean {
  return envelope.type === 'sub';
}
