/**
 * FIFO buffer of envelopes waiting for an active connection.
 */

import { isSubscribeEnvelope, type Envelope } from '../protocol/types.js';

export class OutboundQueue {
  private items: Envelope[] = [];

  get size(): number {
    return this.items.length;
  }

  get isEmpty(): boolean {
    return this.items.length === 0;
  }

  enqueue(envelope: Envelope): void {
    this.items.push(envelope);
  }

  /** Put an envelope back at the head, e.g. after a failed transmit. */
  prepend(envelope: Envelope): void {
    this.items.unshift(envelope);
  }

  dequeue(): Envelope | undefined {
    return this.items.shift();
  }

  /** True when a subscribe-envelope for the topic is already waiting. */
  hasSubscription(topic: string): boolean {
    return this.items.some((item) => isSubscribeEnvelope(item) && item.topic === topic);
  }

  clear(): void {
    this.items = [];
  }

  toArray(): readonly Envelope[] {
    return [...this.items];
  }
}
