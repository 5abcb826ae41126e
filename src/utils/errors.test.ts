import { describe, expect, it } from 'vitest';

import {
  AlreadyClosedError,
  ConnectError,
  DecodeError,
  SessionClosedError,
  TopicwireError,
  isNotConnectedError,
  toError,
  toErrorMessage,
} from './errors.js';

describe('errors', () => {
  it('builds connect errors from the cause', () => {
    const error = new ConnectError('ws://localhost:9000', new Error('ECONNREFUSED'));
    expect(error).toBeInstanceOf(TopicwireError);
    expect(error.name).toBe('ConnectError');
    expect(error.message).toBe('Failed to connect to ws://localhost:9000: ECONNREFUSED');
    expect(error.url).toBe('ws://localhost:9000');
    expect(error.cause).toEqual(new Error('ECONNREFUSED'));
  });

  it('keeps the raw frame on decode errors', () => {
    const error = new DecodeError('Frame is not valid JSON', '{oops');
    expect(error.raw).toBe('{oops');
  });

  it('recognises only the not-connected close failure as benign', () => {
    expect(isNotConnectedError(new AlreadyClosedError())).toBe(true);
    expect(isNotConnectedError(new AlreadyClosedError('socket is closing'))).toBe(false);
    expect(isNotConnectedError(new SessionClosedError())).toBe(false);
    expect(isNotConnectedError(new Error('WebSocket is not connected'))).toBe(false);
  });

  it('normalises unknown throwables', () => {
    expect(toErrorMessage('plain')).toBe('plain');
    expect(toErrorMessage(new Error('wrapped'))).toBe('wrapped');
    expect(toError(42)).toEqual(new Error('42'));
  });
});
