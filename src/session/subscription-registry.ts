/**
 * Topics the caller wants to receive. Each topic is held once, in the order
 * it was first subscribed, so replays are deterministic.
 */
export class SubscriptionRegistry {
  private readonly topics = new Set<string>();

  get size(): number {
    return this.topics.size;
  }

  /** @returns true if the topic was not registered before */
  add(topic: string): boolean {
    if (this.topics.has(topic)) return false;
    this.topics.add(topic);
    return true;
  }

  remove(topic: string): boolean {
    return this.topics.delete(topic);
  }

  has(topic: string): boolean {
    return this.topics.has(topic);
  }

  list(): string[] {
    return [...this.topics];
  }

  /** Empty the registry and return what it held. */
  clear(): string[] {
    const removed = this.list();
    this.topics.clear();
    return removed;
  }
}
