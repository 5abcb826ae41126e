/**
 * Event Delegator
 *
 * Topic-keyed registry of typed listeners. Received envelopes are routed by
 * topic; each binding parses the payload as JSON and validates it against a
 * JSON-RPC schema before invoking its callback.
 *
 * @example
 * ```ts
 * const delegator = new EventDelegator();
 * session.attachEventDelegator(delegator);
 *
 * await session.subscribe('rpc-responses', onResponse((event) => {
 *   console.log(event.response.result);
 * }));
 * ```
 */

import type { z } from 'zod';

import {
  jsonRpcRequestSchema,
  jsonRpcResponseSchema,
  type JsonRpcRequest,
  type JsonRpcRequestEvent,
  type JsonRpcResponse,
  type JsonRpcResponseEvent,
} from '../protocol/json-rpc.js';
import type { Envelope } from '../protocol/types.js';
import { toErrorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('delegator');

export type PayloadSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export type BindingKind = 'request' | 'response';

export interface TopicBinding {
  readonly kind: BindingKind;
  /** @returns true if the envelope's payload matched and the callback ran */
  handle(envelope: Envelope): boolean;
}

export type RequestCallback<T extends JsonRpcRequest> = (event: JsonRpcRequestEvent<T>) => void;
export type ResponseCallback<T extends JsonRpcResponse> = (event: JsonRpcResponseEvent<T>) => void;

function parsePayload(payload: string): unknown {
  try {
    return JSON.parse(payload);
  } catch {
    return undefined;
  }
}

function createBinding<T>(
  kind: BindingKind,
  schema: PayloadSchema<T>,
  deliver: (topic: string, value: T) => void
): TopicBinding {
  return {
    kind,
    handle(envelope: Envelope): boolean {
      const result = schema.safeParse(parsePayload(envelope.payload));
      if (!result.success) {
        log.debug('Payload did not match binding', { topic: envelope.topic, kind });
        return false;
      }
      deliver(envelope.topic, result.data);
      return true;
    },
  };
}

/** Bind a callback to JSON-RPC responses published on a topic. */
export function onResponse(callback: ResponseCallback<JsonRpcResponse>): TopicBinding;
export function onResponse<T extends JsonRpcResponse>(schema: PayloadSchema<T>, callback: ResponseCallback<T>): TopicBinding;
export function onResponse<T extends JsonRpcResponse>(
  schemaOrCallback: PayloadSchema<T> | ResponseCallback<JsonRpcResponse>,
  callback?: ResponseCallback<T>
): TopicBinding {
  if (typeof schemaOrCallback === 'function') {
    return createBinding('response', jsonRpcResponseSchema, (topic, response) => schemaOrCallback({ topic, response }));
  }
  if (!callback) {
    throw new TypeError('onResponse(schema, callback) requires a callback');
  }
  return createBinding('response', schemaOrCallback, (topic, response) => callback({ topic, response }));
}

/** Bind a callback to JSON-RPC requests published on a topic. */
export function onRequest(callback: RequestCallback<JsonRpcRequest>): TopicBinding;
export function onRequest<T extends JsonRpcRequest>(schema: PayloadSchema<T>, callback: RequestCallback<T>): TopicBinding;
export function onRequest<T extends JsonRpcRequest>(
  schemaOrCallback: PayloadSchema<T> | RequestCallback<JsonRpcRequest>,
  callback?: RequestCallback<T>
): TopicBinding {
  if (typeof schemaOrCallback === 'function') {
    return createBinding('request', jsonRpcRequestSchema, (topic, request) => schemaOrCallback({ topic, request }));
  }
  if (!callback) {
    throw new TypeError('onRequest(schema, callback) requires a callback');
  }
  return createBinding('request', schemaOrCallback, (topic, request) => callback({ topic, request }));
}

export class EventDelegator {
  private readonly bindings = new Map<string, TopicBinding[]>();

  /**
   * Register a binding for a topic.
   * @returns function that removes just this binding
   */
  listenFor(topic: string, binding: TopicBinding): () => void {
    const list = this.bindings.get(topic) ?? [];
    list.push(binding);
    this.bindings.set(topic, list);

    return () => {
      const current = this.bindings.get(topic);
      if (!current) return;
      const remaining = current.filter((entry) => entry !== binding);
      if (remaining.length > 0) {
        this.bindings.set(topic, remaining);
      } else {
        this.bindings.delete(topic);
      }
    };
  }

  /** Drop every binding for a topic. */
  unsubscribeProvider(topic: string): void {
    this.bindings.delete(topic);
  }

  has(topic: string): boolean {
    return this.bindings.has(topic);
  }

  topics(): string[] {
    return [...this.bindings.keys()];
  }

  /**
   * Route an envelope to the bindings of its topic.
   * @returns number of bindings that accepted the payload
   */
  dispatch(envelope: Envelope): number {
    const list = this.bindings.get(envelope.topic);
    if (!list) return 0;

    let handled = 0;
    for (const binding of [...list]) {
      try {
        if (binding.handle(envelope)) {
          handled++;
        }
      } catch (err) {
        log.error('Topic listener threw', { topic: envelope.topic, error: toErrorMessage(err) });
      }
    }
    return handled;
  }
}
