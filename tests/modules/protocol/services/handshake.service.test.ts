/**
 * Handshake Negotiator Tests
 */

import { describe, it, expect, vi } from 'vitest';
import {
  computeAcceptKey,
  createHandshakeRequest,
  createHeaderMap,
  isValidWebSocketKey,
  negotiateHandshake,
  parseHeaderTokens,
  serializeHandshakeResponse,
  type HandshakeResult,
} from '@/modules/protocol';
import {
  SWITCHING_PROTOCOLS_RESPONSE,
  TEST_ACCEPT_KEY,
  TEST_WEBSOCKET_KEY,
  UPGRADE_HEADERS,
} from '../../../helpers/frames';

function request(overrides: Record<string, string | undefined> = {}) {
  return createHandshakeRequest('GET', '/ws', { ...UPGRADE_HEADERS, ...overrides });
}

function rejectionOf(result: HandshakeResult) {
  if (result.accepted) {
    throw new Error('Expected the handshake to be rejected');
  }
  return result.rejection;
}

describe('Handshake Negotiator', () => {
  describe('computeAcceptKey', () => {
    it('should derive the accept value from the client nonce', () => {
      expect(computeAcceptKey(TEST_WEBSOCKET_KEY)).toBe(TEST_ACCEPT_KEY);
    });
  });

  describe('isValidWebSocketKey', () => {
    it('should accept base64 of exactly 16 bytes', () => {
      expect(isValidWebSocketKey(TEST_WEBSOCKET_KEY)).toBe(true);
      expect(isValidWebSocketKey(Buffer.alloc(16, 0xff).toString('base64'))).toBe(true);
    });

    it('should reject keys of the wrong decoded length', () => {
      expect(isValidWebSocketKey(Buffer.alloc(15).toString('base64'))).toBe(false);
      expect(isValidWebSocketKey(Buffer.alloc(17).toString('base64'))).toBe(false);
    });

    it('should reject missing, unpadded or non-base64 keys', () => {
      expect(isValidWebSocketKey(undefined)).toBe(false);
      expect(isValidWebSocketKey('')).toBe(false);
      expect(isValidWebSocketKey('dGhlIHNhbXBsZSBub25jZQ')).toBe(false);
      expect(isValidWebSocketKey('dGhlIHNhbXBsZSBub25jZ!==')).toBe(false);
    });
  });

  describe('negotiateHandshake', () => {
    it('should accept a valid upgrade request', () => {
      const result = negotiateHandshake(request());

      expect(result).toEqual({
        accepted: true,
        response: {
          statusCode: 101,
          statusText: 'Switching Protocols',
          headers: {
            Upgrade: 'websocket',
            Connection: 'Upgrade',
            'Sec-WebSocket-Accept': TEST_ACCEPT_KEY,
          },
        },
        protocol: undefined,
      });
    });

    it('should match header names and values case-insensitively', () => {
      const result = negotiateHandshake(
        createHandshakeRequest('GET', '/ws', {
          Upgrade: 'WebSocket',
          Connection: 'keep-alive, upgrade',
          'Sec-WebSocket-Key': TEST_WEBSOCKET_KEY,
          'Sec-WebSocket-Version': '13',
        })
      );

      expect(result.accepted).toBe(true);
    });

    it('should reject a missing or wrong Upgrade header with 400', () => {
      expect(rejectionOf(negotiateHandshake(request({ upgrade: undefined }))).statusCode).toBe(400);
      expect(rejectionOf(negotiateHandshake(request({ upgrade: 'h2c' }))).statusCode).toBe(400);
    });

    it('should reject a Connection header without the upgrade token with 400', () => {
      const rejection = rejectionOf(negotiateHandshake(request({ connection: 'keep-alive' })));

      expect(rejection.statusCode).toBe(400);
      expect(rejection.reason).toBe('Connection header must include "Upgrade"');
    });

    it('should answer an unsupported version with 426 and the supported version', () => {
      const rejection = rejectionOf(negotiateHandshake(request({ 'sec-websocket-version': '8' })));

      expect(rejection).toEqual({
        statusCode: 426,
        reason: 'Unsupported WebSocket version',
        headers: { 'Sec-WebSocket-Version': '13' },
      });
    });

    it('should check the version before the key', () => {
      const rejection = rejectionOf(
        negotiateHandshake(request({ 'sec-websocket-version': undefined, 'sec-websocket-key': undefined }))
      );

      expect(rejection.statusCode).toBe(426);
    });

    it('should check Upgrade before the version', () => {
      const rejection = rejectionOf(
        negotiateHandshake(request({ upgrade: 'h2c', 'sec-websocket-version': '8' }))
      );

      expect(rejection.statusCode).toBe(400);
    });

    it('should reject an invalid key with 400 and no extra headers', () => {
      const rejection = rejectionOf(negotiateHandshake(request({ 'sec-websocket-key': 'short' })));

      expect(rejection).toEqual({
        statusCode: 400,
        reason: 'Sec-WebSocket-Key must be base64 of 16 bytes',
        headers: {},
      });
    });

    it('should echo the sub-protocol chosen by the selector', () => {
      const selectProtocol = vi.fn((requested: readonly string[]) => requested[1]);

      const result = negotiateHandshake(request({ 'sec-websocket-protocol': 'chat, superchat' }), {
        selectProtocol,
      });

      expect(selectProtocol).toHaveBeenCalledWith(['chat', 'superchat'], expect.anything());
      if (!result.accepted) {
        throw new Error('Expected the handshake to be accepted');
      }
      expect(result.protocol).toBe('superchat');
      expect(result.response.headers['Sec-WebSocket-Protocol']).toBe('superchat');
    });

    it('should ignore a selection the client did not offer', () => {
      const result = negotiateHandshake(request({ 'sec-websocket-protocol': 'chat' }), {
        selectProtocol: () => 'other',
      });

      if (!result.accepted) {
        throw new Error('Expected the handshake to be accepted');
      }
      expect(result.protocol).toBeUndefined();
      expect(result.response.headers).not.toHaveProperty('Sec-WebSocket-Protocol');
    });

    it('should not call the selector when no protocol was requested', () => {
      const selectProtocol = vi.fn(() => 'chat');

      negotiateHandshake(request(), { selectProtocol });

      expect(selectProtocol).not.toHaveBeenCalled();
    });
  });

  describe('serializeHandshakeResponse', () => {
    it('should render the 101 response', () => {
      expect(serializeHandshakeResponse(negotiateHandshake(request()))).toBe(SWITCHING_PROTOCOLS_RESPONSE);
    });

    it('should render a rejection with a plain-text body', () => {
      const raw = serializeHandshakeResponse(negotiateHandshake(request({ 'sec-websocket-version': '7' })));

      expect(raw).toBe(
        'HTTP/1.1 426 Upgrade Required\r\n' +
          'Sec-WebSocket-Version: 13\r\n' +
          'Connection: close\r\n' +
          'Content-Type: text/plain; charset=utf-8\r\n' +
          'Content-Length: 29\r\n' +
          '\r\n' +
          'Unsupported WebSocket version'
      );
    });
  });

  describe('header helpers', () => {
    it('should look up headers case-insensitively and join repeated values', () => {
      const headers = createHeaderMap({ 'X-Forwarded-For': ['10.0.0.1', '10.0.0.2'], Host: ' example.test ' });

      expect(headers.get('x-forwarded-for')).toBe('10.0.0.1, 10.0.0.2');
      expect(headers.get('HOST')).toBe('example.test');
      expect(headers.has('host')).toBe(true);
      expect(headers.has('origin')).toBe(false);
      expect(Array.from(headers.entries())).toEqual([
        ['X-Forwarded-For', '10.0.0.1, 10.0.0.2'],
        ['Host', 'example.test'],
      ]);
    });

    it('should build a frozen request', () => {
      const built = request();

      expect(Object.isFrozen(built)).toBe(true);
      expect(built.method).toBe('GET');
      expect(built.path).toBe('/ws');
    });

    it('should split comma-separated tokens and drop empty ones', () => {
      expect(parseHeaderTokens(' keep-alive, ,Upgrade ')).toEqual(['keep-alive', 'Upgrade']);
      expect(parseHeaderTokens(undefined)).toEqual([]);
    });
  });
});
