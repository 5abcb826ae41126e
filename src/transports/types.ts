/**
 * Connection handle abstraction.
 *
 * A handle wraps exactly one underlying socket. It has no retry or queuing
 * logic of its own; the session decides when to open, promote and replace
 * handles.
 */

export type ConnectionState = 'idle' | 'connecting' | 'open' | 'closing' | 'closed';

export interface ConnectionHandle {
  /** URL the handle connects to (already normalized to ws/wss) */
  readonly url: string;
  readonly state: ConnectionState;

  /**
   * Open the socket.
   * @throws ConnectError if the handshake fails or times out
   */
  connect(): Promise<void>;

  /**
   * Write one text frame.
   * @throws AlreadyClosedError if the socket is not open
   */
  send(data: string): Promise<void>;

  /**
   * Gracefully close the socket and wait for the close handshake.
   * @throws AlreadyClosedError if the socket was never opened or is already closed
   */
  close(code?: number, reason?: string): Promise<void>;

  /** Tear the socket down without a close handshake. */
  terminate(): void;

  on(event: 'open', listener: () => void): this;
  on(event: 'message', listener: (data: string) => void): this;
  on(event: 'close', listener: (code: number, reason: string) => void): this;
  on(event: 'error', listener: (error: Error) => void): this;

  off(event: 'open', listener: () => void): this;
  off(event: 'message', listener: (data: string) => void): this;
  off(event: 'close', listener: (code: number, reason: string) => void): this;
  off(event: 'error', listener: (error: Error) => void): this;
}

export interface ConnectionOptions {
  /** Handshake timeout in milliseconds */
  connectTimeoutMs?: number;
}

export type ConnectionFactory = (url: string) => ConnectionHandle;

/** WebSocket close codes the session treats as clean (no backoff before reconnect). */
export const CLEAN_CLOSE_CODES: ReadonlySet<number> = new Set([1000, 1001, 1005]);

export const ABNORMAL_CLOSE_CODE = 1006;

export function isAbnormalClose(code: number): boolean {
  return !CLEAN_CLOSE_CODES.has(code);
}
