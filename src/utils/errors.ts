/**
 * Error Types for topicwire
 *
 * Transport-internal failures (connect, decode) are absorbed by the session
 * and reported to its error sink. Only unexpected close-path errors reach
 * the caller.
 */

export class TopicwireError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TopicwireError';
  }
}

/** The underlying socket could not be opened. */
export class ConnectError extends TopicwireError {
  readonly url: string;

  constructor(url: string, cause?: unknown) {
    super(`Failed to connect to ${url}: ${toErrorMessage(cause)}`, { cause });
    this.name = 'ConnectError';
    this.url = url;
  }
}

/** An inbound frame was not a well-formed envelope. */
export class DecodeError extends TopicwireError {
  readonly raw: string;

  constructor(message: string, raw: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'DecodeError';
    this.raw = raw;
  }
}

/** A close or send was requested on a connection that is not open. */
export class AlreadyClosedError extends TopicwireError {
  constructor(message = 'WebSocket is not connected') {
    super(message);
    this.name = 'AlreadyClosedError';
  }
}

/** The session was closed, paused or disposed while the caller was waiting. */
export class SessionClosedError extends TopicwireError {
  constructor(message = 'Session closed before the connection opened') {
    super(message);
    this.name = 'SessionClosedError';
  }
}

export class ConfigError extends TopicwireError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ConfigError';
  }
}

/**
 * The one close-path failure that is benign: closing a socket that is
 * already gone.
 */
export function isNotConnectedError(error: unknown): boolean {
  return error instanceof AlreadyClosedError && error.message.includes('not connected');
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
