/**
 * Transport Session
 *
 * Keeps one topic-based pub/sub session alive over a WebSocket while the
 * underlying connections come and go.
 *
 * Connection slots:
 *   candidate - the next connection, in flight
 *   active    - the connection traffic goes over
 * A candidate is promoted only after the previous active connection has
 * been closed, so there is never more than one live socket carrying
 * traffic.
 *
 * States:
 *   disconnected -> connecting -> open -> disconnected (on close)
 * with a paused overlay that suppresses reconnects.
 *
 * Events:
 *   'message'      (envelope)  non-silent envelope received
 *   'opened'       ()          a connection was promoted and the queue flushed
 *   'closed'       ()          close() finished (always exactly once per call)
 *   'disconnected' (code)      a connection closed underneath the session
 */

import { EventEmitter } from 'node:events';

import { decodeEnvelope, encodeEnvelope } from '../protocol/codec.js';
import {
  ackEnvelope,
  createEnvelope,
  subscribeEnvelope,
  type Envelope,
  type EnvelopeType,
} from '../protocol/types.js';
import type { EventDelegator, TopicBinding } from '../dispatch/event-delegator.js';
import { isAbnormalClose, type ConnectionFactory, type ConnectionHandle } from '../transports/types.js';
import { normalizeSocketUrl } from '../transports/url.js';
import { createWebSocketConnection } from '../transports/websocket-connection.js';
import {
  ConnectError,
  DecodeError,
  SessionClosedError,
  TopicwireError,
  isNotConnectedError,
  toError,
  toErrorMessage,
} from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { OutboundQueue } from './outbound-queue.js';
import { SerialExecutor } from './serial-executor.js';
import { SubscriptionRegistry } from './subscription-registry.js';

const log = createLogger('session');

export type SessionState = 'disconnected' | 'connecting' | 'open';

export interface SessionOptions {
  /** Wait before reconnecting after an abnormal close (default: 2000) */
  reconnectDelayMs: number;
  /** Upper bound on a graceful close before the socket is terminated (default: 5000) */
  closeTimeoutMs: number;
  /** Handshake timeout for each connection attempt (default: 10000) */
  connectTimeoutMs: number;
  /** Builds the handle for each attempt; defaults to a 'ws' connection */
  createConnection?: ConnectionFactory;
  /** Error sink for non-fatal transport errors (default: log) */
  onError?: (error: Error) => void;
}

export const DEFAULT_SESSION_OPTIONS: SessionOptions = {
  reconnectDelayMs: 2000,
  closeTimeoutMs: 5000,
  connectTimeoutMs: 10_000,
};

interface ConnectionSlot {
  handle: ConnectionHandle;
  detach: () => void;
}

interface OpenSignal {
  promise: Promise<void>;
  resolve: () => void;
  reject: (error: Error) => void;
}

interface Backoff {
  timer: ReturnType<typeof setTimeout>;
  finish: (completed: boolean) => void;
}

function createOpenSignal(): OpenSignal {
  let resolve: () => void = () => undefined;
  let reject: (error: Error) => void = () => undefined;
  const promise = new Promise<void>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  // Rejections are observed by whoever awaits the signal; none may be waiting.
  promise.catch(() => undefined);
  return { promise, resolve, reject };
}

export class TransportSession extends EventEmitter {
  private readonly options: SessionOptions;
  private readonly createConnection: ConnectionFactory;
  private readonly queue = new OutboundQueue();
  private readonly registry = new SubscriptionRegistry();
  private readonly executor = new SerialExecutor();

  private _url?: string;
  private active?: ConnectionSlot;
  private candidate?: ConnectionSlot;
  private opened = false;
  private _paused = false;
  private disposed = false;
  private openSignal?: OpenSignal;
  private backoff?: Backoff;
  private lifecycleChain: Promise<void> = Promise.resolve();
  private pauseEpoch = 0;
  private delegator?: EventDelegator;

  constructor(options: Partial<SessionOptions> = {}) {
    super();
    this.options = { ...DEFAULT_SESSION_OPTIONS, ...options };
    this.createConnection =
      this.options.createConnection ??
      ((url) => createWebSocketConnection(url, { connectTimeoutMs: this.options.connectTimeoutMs }));
  }

  /** Last URL passed to open(), as given (before scheme normalization) */
  get url(): string | undefined {
    return this._url;
  }

  get connected(): boolean {
    return this.opened && this.active?.handle.state === 'open';
  }

  get state(): SessionState {
    if (this.connected) return 'open';
    if (this.candidate || this.backoff) return 'connecting';
    return 'disconnected';
  }

  get paused(): boolean {
    return this._paused;
  }

  get topics(): string[] {
    return this.registry.list();
  }

  get queuedCount(): number {
    return this.queue.size;
  }

  /** Route received envelopes to typed topic bindings. */
  attachEventDelegator(delegator: EventDelegator): void {
    this.delegator = delegator;
  }

  /**
   * Open the session against a URL.
   *
   * Subscriptions and queued envelopes are dropped when the URL changes or
   * `clearSubscriptions` is set. Resolves once a connection is open and the
   * queue has been flushed; concurrent callers share the same attempt.
   */
  async open(url: string, clearSubscriptions = true): Promise<void> {
    if (this.disposed) {
      throw new SessionClosedError('Session has been disposed');
    }

    const sameUrl = this._url === url;
    if (!sameUrl || clearSubscriptions) {
      this.clearSubscriptions();
    }

    this._url = url;
    // Clearing subscriptions always replaces the live socket.
    if (sameUrl && !clearSubscriptions && this.connected) {
      return;
    }
    await this.socketOpen();
  }

  /**
   * Send an envelope. While disconnected it is queued and a connection
   * attempt is started (or joined); it goes out when that attempt opens.
   */
  async send(envelope: Envelope): Promise<void> {
    if (!this.connected) {
      this.enqueueAndConnect(envelope);
      await this.waitForOpen();
      return;
    }

    const delivered = await this.executor.run(() => this.transmitOrRequeue(envelope, false));
    if (!delivered) {
      await this.waitForOpen();
    }
  }

  /** Publish application data on a topic. */
  publish(topic: string, payload: string, type: EnvelopeType = 'pub'): Promise<void> {
    return this.send(createEnvelope(topic, type, payload, false));
  }

  /**
   * Subscribe to a topic. The topic is registered once no matter how often
   * this is called; a subscribe-envelope is sent every time.
   */
  async subscribe(topic: string, binding?: TopicBinding): Promise<void> {
    log.debug('Subscribe', { topic });
    if (binding && !this.delegator) {
      throw new TopicwireError(`Cannot bind a listener for ${topic}: no event delegator attached`);
    }

    this.registry.add(topic);
    if (binding) {
      this.delegator?.listenFor(topic, binding);
    }

    await this.send(subscribeEnvelope(topic));
  }

  /** Forget one topic. The wire protocol has no unsubscribe envelope. */
  unsubscribe(topic: string): void {
    this.registry.remove(topic);
    this.delegator?.unsubscribeProvider(topic);
  }

  /** Drop every subscription and every queued envelope. */
  clearSubscriptions(): void {
    const removed = this.registry.clear();
    if (this.delegator) {
      for (const topic of removed) {
        this.delegator.unsubscribeProvider(topic);
      }
    }
    this.queue.clear();
  }

  /**
   * Close the active connection without reconnecting.
   *
   * Emits 'closed' exactly once, even if the socket was already gone. Only
   * errors other than "not connected" are rethrown.
   */
  async close(): Promise<void> {
    this.cancelBackoff();
    this.abandonCandidate();
    this.rejectOpenSignal(new SessionClosedError());

    try {
      await this.executor.run(() => this.closeActive());
    } catch (err) {
      if (isNotConnectedError(err)) {
        log.warn('Tried to close a connection that is already closed');
      } else {
        throw err;
      }
    } finally {
      this.emit('closed');
    }
  }

  /**
   * Suspend the session: close and stop reconnecting until resume().
   *
   * Takes effect immediately, even while a resume is still waiting for a
   * connection; that resume gives up instead of holding the pause back.
   */
  pause(): Promise<void> {
    this._paused = true;
    this.pauseEpoch++;
    this.cancelBackoff();
    this.rejectOpenSignal(new SessionClosedError('Session paused before the connection opened'));

    return this.serializeLifecycle(async () => {
      log.info('Pausing');
      this._paused = true;
      await this.close();
    });
  }

  /** Reopen against the last URL and re-issue every subscription. */
  resume(): Promise<void> {
    const epoch = this.pauseEpoch;
    return this.serializeLifecycle(async () => {
      if (!this._paused || epoch !== this.pauseEpoch) return;
      this._paused = false;

      const url = this._url;
      if (!url) {
        log.info('Resumed before any open; nothing to reconnect');
        return;
      }

      log.info('Resuming', { url });
      try {
        await this.open(url, false);
        for (const topic of this.registry.list()) {
          await this.subscribe(topic);
        }
      } catch (err) {
        if (err instanceof SessionClosedError && epoch !== this.pauseEpoch) {
          log.info('Resume interrupted by pause');
          return;
        }
        throw err;
      }
    });
  }

  /** Drop the active socket abruptly. The session reconnects after backoff. */
  cancelConnection(): void {
    this.active?.handle.terminate();
  }

  /** Close for good. The session cannot be reopened. */
  async dispose(): Promise<void> {
    if (this.disposed) return;
    try {
      await this.close();
    } finally {
      this.disposed = true;
      this.clearSubscriptions();
      this.removeAllListeners();
    }
  }

  // ─── Attempt sequence ─────────────────────────────────────────────

  private socketOpen(): Promise<void> {
    if (this.disposed) {
      return Promise.reject(new SessionClosedError('Session has been disposed'));
    }

    const signal = this.openSignal ?? (this.openSignal = createOpenSignal());

    if (this.candidate) {
      if (this.candidate.handle.state === 'closed') {
        log.error('Candidate connection was closed but not cleared; discarding it');
        this.candidate.detach();
        this.candidate = undefined;
      } else {
        log.debug('Open already in progress', { state: this.candidate.handle.state });
        return signal.promise;
      }
    }

    // A pending reconnect backoff will start the next attempt itself.
    if (this.backoff) {
      return signal.promise;
    }

    const url = this._url;
    if (!url) {
      return Promise.reject(new TopicwireError('No URL to connect to; call open(url) first'));
    }

    const target = normalizeSocketUrl(url);
    log.info('Opening connection', { url: target });

    const slot = this.createSlot(this.createConnection(target));
    this.candidate = slot;

    slot.handle.connect().catch((err: unknown) => {
      this.reportError(err instanceof ConnectError ? err : new ConnectError(target, err));
    });

    return signal.promise;
  }

  private createSlot(handle: ConnectionHandle): ConnectionSlot {
    const onOpen = (): void => {
      this.executor
        .run(() => this.completeOpen(slot))
        .then((promoted) => {
          if (promoted) this.finishOpen();
        })
        .catch((err: unknown) => this.reportError(toError(err)));
    };
    const onMessage = (data: string): void => {
      this.handleMessage(data);
    };
    const onClose = (code: number): void => {
      this.handleClose(slot, code).catch((err: unknown) => this.reportError(toError(err)));
    };
    const onError = (error: Error): void => {
      this.reportError(error);
    };

    handle.on('open', onOpen);
    handle.on('message', onMessage);
    handle.on('close', onClose);
    handle.on('error', onError);

    const slot: ConnectionSlot = {
      handle,
      detach: () => {
        handle.off('open', onOpen);
        handle.off('message', onMessage);
        handle.off('close', onClose);
        handle.off('error', onError);
      },
    };
    return slot;
  }

  /**
   * Promote the candidate and flush. Runs inside the executor.
   * @returns false if the slot was abandoned or the flush was cut short
   */
  private async completeOpen(slot: ConnectionSlot): Promise<boolean> {
    if (this.candidate !== slot) {
      log.debug('Ignoring open from an abandoned connection');
      slot.detach();
      slot.handle.terminate();
      return false;
    }

    await this.closeActive().catch((err: unknown) => {
      if (!isNotConnectedError(err)) throw err;
    });

    // close() may have abandoned this slot while the previous socket was closing.
    if (this.candidate !== slot) {
      log.debug('Connection abandoned during promotion');
      slot.detach();
      slot.handle.terminate();
      return false;
    }

    this.active = slot;
    this.candidate = undefined;
    this.queueSubscriptions();
    this.opened = true;
    return this.flushQueue();
  }

  private finishOpen(): void {
    log.info('Open completed', { url: this.active?.handle.url });
    const signal = this.openSignal;
    this.openSignal = undefined;
    this.emit('opened');
    signal?.resolve();
  }

  private queueSubscriptions(): void {
    let queued = 0;
    for (const topic of this.registry.list()) {
      if (this.queue.hasSubscription(topic)) continue;
      this.queue.enqueue(subscribeEnvelope(topic));
      queued++;
    }
    log.debug('Queued subscriptions', { count: queued });
  }

  /** @returns false if a transmit failed and the rest stays queued */
  private async flushQueue(): Promise<boolean> {
    log.debug('Flushing queue', { count: this.queue.size });
    let envelope = this.queue.dequeue();
    while (envelope) {
      const delivered = await this.transmitOrRequeue(envelope, true);
      if (!delivered) return false;
      envelope = this.queue.dequeue();
    }
    log.debug('Queue flushed');
    return true;
  }

  /**
   * Write one envelope on the active connection. Runs inside the executor.
   * On failure the envelope is queued again: at the head when it came from
   * the queue, at the tail when it is a fresh send.
   */
  private async transmitOrRequeue(envelope: Envelope, fromQueue: boolean): Promise<boolean> {
    const active = this.active;
    if (!this.opened || !active || active.handle.state !== 'open') {
      this.enqueueAndConnect(envelope, fromQueue);
      return false;
    }

    try {
      await active.handle.send(encodeEnvelope(envelope));
      return true;
    } catch (err) {
      log.warn('Send failed; envelope requeued', { topic: envelope.topic, error: toErrorMessage(err) });
      this.enqueueAndConnect(envelope, fromQueue);
      return false;
    }
  }

  private enqueueAndConnect(envelope: Envelope, atHead = false): void {
    if (atHead) {
      this.queue.prepend(envelope);
    } else {
      this.queue.enqueue(envelope);
    }

    if (this._paused || this.disposed || !this._url) return;
    this.socketOpen().catch(() => undefined);
  }

  /**
   * Wait for the current open attempt. A session that is paused, closed or
   * never given a URL keeps the envelope queued and returns.
   */
  private async waitForOpen(): Promise<void> {
    const signal = this.openSignal;
    if (!signal) return;
    try {
      await signal.promise;
    } catch (err) {
      if (!(err instanceof SessionClosedError)) throw err;
    }
  }

  private rejectOpenSignal(error: Error): void {
    const signal = this.openSignal;
    this.openSignal = undefined;
    signal?.reject(error);
  }

  // ─── Close paths ──────────────────────────────────────────────────

  /** Gracefully close the active connection. Runs inside the executor. */
  private async closeActive(): Promise<void> {
    const slot = this.active;
    if (!slot) return;

    this.opened = false;
    this.active = undefined;
    // Detach first so an explicit close never schedules a reconnect.
    slot.detach();

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), this.options.closeTimeoutMs);
    });

    try {
      const outcome = await Promise.race([slot.handle.close().then(() => 'closed' as const), timedOut]);
      if (outcome === 'timeout') {
        log.warn('Close timed out; terminating connection', { timeoutMs: this.options.closeTimeoutMs });
        slot.handle.terminate();
      }
    } finally {
      clearTimeout(timer);
    }
  }

  private abandonCandidate(): void {
    const slot = this.candidate;
    if (!slot) return;
    this.candidate = undefined;
    slot.detach();
    slot.handle.terminate();
  }

  private async handleClose(slot: ConnectionSlot, code: number): Promise<void> {
    slot.detach();
    if (this.candidate === slot) {
      this.candidate = undefined;
    }
    if (this.active === slot) {
      this.active = undefined;
      this.opened = false;
    }
    this.emit('disconnected', code);

    if (this._paused) {
      log.info('Session paused; reconnect skipped', { code });
      return;
    }
    if (this.disposed || !this._url) return;

    if (isAbnormalClose(code)) {
      log.warn(`Abnormal close detected; reconnecting in ${this.options.reconnectDelayMs}ms`, { code });
      const completed = await this.waitBackoff(this.options.reconnectDelayMs);
      if (!completed || this._paused || this.disposed) return;
    } else {
      log.info('Connection closed; reconnecting', { code });
    }

    // Pending waiters are rejected by close(); a reconnect started by the
    // close path has no caller of its own.
    await this.socketOpen().catch((err: unknown) => {
      if (!(err instanceof SessionClosedError)) throw err;
    });
  }

  private waitBackoff(ms: number): Promise<boolean> {
    this.cancelBackoff();
    return new Promise((resolve) => {
      const backoff: Backoff = {
        timer: setTimeout(() => backoff.finish(true), ms),
        finish: (completed) => {
          clearTimeout(backoff.timer);
          if (this.backoff === backoff) this.backoff = undefined;
          resolve(completed);
        },
      };
      this.backoff = backoff;
    });
  }

  private cancelBackoff(): void {
    this.backoff?.finish(false);
  }

  // ─── Inbound ──────────────────────────────────────────────────────

  private handleMessage(data: string): void {
    let envelope: Envelope;
    try {
      envelope = decodeEnvelope(data);
    } catch (err) {
      if (err instanceof DecodeError) {
        log.warn('Dropping malformed frame', { error: err.message });
      } else {
        this.reportError(toError(err));
      }
      return;
    }

    this.send(ackEnvelope(envelope.topic)).catch((err: unknown) => {
      log.warn('Ack failed', { topic: envelope.topic, error: toErrorMessage(err) });
    });

    if (envelope.silent) {
      log.debug('Silent envelope received', { topic: envelope.topic, type: envelope.type });
      return;
    }

    this.emit('message', envelope);
    this.delegator?.dispatch(envelope);
  }

  // ─── Helpers ──────────────────────────────────────────────────────

  private serializeLifecycle(task: () => Promise<void>): Promise<void> {
    const run = this.lifecycleChain.then(task);
    this.lifecycleChain = run.catch(() => undefined);
    return run;
  }

  private reportError(error: Error): void {
    log.error(error.message, { name: error.name });
    this.options.onError?.(error);
  }
}
