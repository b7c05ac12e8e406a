/**
 * Transport Error Classifier Tests
 */

import { describe, it, expect } from 'vitest';
import { WebSocketErrorKind, classifyTransportError } from '@/modules/protocol';

function systemError(code: string, message = `${code} happened`): Error {
  return Object.assign(new Error(message), { code });
}

describe('classifyTransportError', () => {
  it.each(['ECONNRESET', 'EPIPE', 'ECONNABORTED', 'ERR_STREAM_DESTROYED', 'ERR_STREAM_WRITE_AFTER_END'])(
    'should treat %s as the peer going away',
    (code) => {
      expect(classifyTransportError(systemError(code))).toEqual({
        kind: WebSocketErrorKind.TRANSPORT,
        message: 'Peer closed the connection',
        code,
        expected: true,
      });
    }
  );

  it('should classify socket timeouts', () => {
    expect(classifyTransportError(systemError('ETIMEDOUT'))).toEqual({
      kind: WebSocketErrorKind.TIMEOUT,
      message: 'Transport timed out',
      code: 'ETIMEDOUT',
      expected: true,
    });
  });

  it('should flag unknown errors as unexpected', () => {
    const classified = classifyTransportError(systemError('EACCES', 'permission denied'));

    expect(classified.kind).toBe(WebSocketErrorKind.TRANSPORT);
    expect(classified.expected).toBe(false);
    expect(classified.message).toBe('permission denied');
    expect(classified.code).toBe('EACCES');
  });

  it('should handle errors without a code', () => {
    expect(classifyTransportError(new Error(''))).toEqual({
      kind: WebSocketErrorKind.TRANSPORT,
      message: 'Unknown transport error',
      code: undefined,
      expected: false,
    });
  });

  it('should handle thrown non-errors', () => {
    expect(classifyTransportError('socket hung up')).toEqual({
      kind: WebSocketErrorKind.TRANSPORT,
      message: 'socket hung up',
      expected: false,
    });
  });
});
