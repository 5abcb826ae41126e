/**
 * WebSocket connection handle backed by the 'ws' package.
 *
 * One instance wraps one socket for its whole life: idle -> connecting ->
 * open -> closing -> closed. Reconnecting means building a new handle.
 */

import { EventEmitter } from 'node:events';
import WebSocket from 'ws';

import { AlreadyClosedError, ConnectError, toError } from '../utils/errors.js';
import type { ConnectionHandle, ConnectionOptions, ConnectionState } from './types.js';

const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;

function rawDataToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf8');
  }
  return data.toString('utf8');
}

export class WebSocketConnection extends EventEmitter implements ConnectionHandle {
  readonly url: string;
  private ws?: WebSocket;
  private _state: ConnectionState = 'idle';
  private readonly connectTimeoutMs: number;

  constructor(url: string, options: ConnectionOptions = {}) {
    super();
    this.url = url;
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
  }

  get state(): ConnectionState {
    return this._state;
  }

  connect(): Promise<void> {
    if (this._state !== 'idle') {
      return Promise.reject(new ConnectError(this.url, `handle already used (state: ${this._state})`));
    }

    this._state = 'connecting';

    return new Promise((resolve, reject) => {
      let settled = false;

      const timeout = setTimeout(() => {
        settle(new Error(`Connection timeout after ${this.connectTimeoutMs}ms`));
        this.ws?.terminate();
      }, this.connectTimeoutMs);

      const settle = (error?: Error): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timeout);
        if (error) {
          reject(new ConnectError(this.url, error));
        } else {
          resolve();
        }
      };

      let ws: WebSocket;
      try {
        ws = new WebSocket(this.url);
      } catch (err) {
        this._state = 'closed';
        settle(toError(err));
        return;
      }
      this.ws = ws;

      ws.on('open', () => {
        this._state = 'open';
        settle();
        this.emit('open');
      });

      ws.on('message', (data: WebSocket.RawData) => {
        this.emit('message', rawDataToString(data));
      });

      ws.on('close', (code: number, reason: Buffer) => {
        this._state = 'closed';
        settle(new Error(`Socket closed during handshake (code ${code})`));
        this.emit('close', code, reason.toString('utf8'));
      });

      ws.on('error', (err: Error) => {
        if (!settled) {
          settle(err);
          return;
        }
        if (this.listenerCount('error') > 0) {
          this.emit('error', err);
        }
      });
    });
  }

  send(data: string): Promise<void> {
    const ws = this.ws;
    if (!ws || this._state !== 'open') {
      return Promise.reject(new AlreadyClosedError());
    }

    return new Promise((resolve, reject) => {
      ws.send(data, (err?: Error) => {
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }

  close(code = 1000, reason?: string): Promise<void> {
    const ws = this.ws;
    if (!ws || this._state === 'idle' || this._state === 'closed') {
      return Promise.reject(new AlreadyClosedError());
    }

    return new Promise((resolve) => {
      this.once('close', () => resolve());
      if (this._state !== 'closing') {
        this._state = 'closing';
        ws.close(code, reason);
      }
    });
  }

  terminate(): void {
    if (!this.ws) {
      this._state = 'closed';
      return;
    }
    this.ws.terminate();
  }
}

export function createWebSocketConnection(url: string, options: ConnectionOptions = {}): WebSocketConnection {
  return new WebSocketConnection(url, options);
}
