/**
 * Handshake Negotiator
 * Validates an HTTP Upgrade request and builds the 101 response or a 4xx rejection.
 * Pure: no I/O, no connection state.
 */

import { createHash } from 'crypto';
import { STATUS_CODES } from 'http';
import { CRLF, WEBSOCKET_GUID, WEBSOCKET_KEY_BYTES, WEBSOCKET_VERSION } from '../config';
import type {
  HandshakeOptions,
  HandshakeRejection,
  HandshakeRequest,
  HandshakeResult,
  HeaderMap,
} from '../types';

// 16 bytes encode to 22 significant characters plus "=="; the last one carries 4 zero bits
const WEBSOCKET_KEY_PATTERN = /^[A-Za-z0-9+/]{21}[AQgw]==$/;

type RawHeaders = Record<string, string | string[] | undefined>;

// ============================================================================
// Header map
// ============================================================================

class CaseInsensitiveHeaders implements HeaderMap {
  private readonly values = new Map<string, [name: string, value: string]>();

  constructor(headers: RawHeaders) {
    for (const [name, value] of Object.entries(headers)) {
      if (value === undefined) {
        continue;
      }
      const joined = Array.isArray(value) ? value.join(', ') : value;
      this.values.set(name.toLowerCase(), [name, joined.trim()]);
    }
  }

  get(name: string): string | undefined {
    return this.values.get(name.toLowerCase())?.[1];
  }

  has(name: string): boolean {
    return this.values.has(name.toLowerCase());
  }

  *entries(): IterableIterator<[string, string]> {
    for (const [name, value] of this.values.values()) {
      yield [name, value];
    }
  }
}

export function createHeaderMap(headers: RawHeaders): HeaderMap {
  return new CaseInsensitiveHeaders(headers);
}

/**
 * Build the immutable request from what the HTTP parser extracted
 */
export function createHandshakeRequest(method: string, path: string, headers: RawHeaders): HandshakeRequest {
  return Object.freeze({
    method,
    path,
    headers: createHeaderMap(headers),
  });
}

/**
 * Split a comma-separated header into trimmed, non-empty tokens
 */
export function parseHeaderTokens(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map((token) => token.trim())
    .filter((token) => token.length > 0);
}

// ============================================================================
// Key exchange
// ============================================================================

/**
 * Sec-WebSocket-Accept = base64(SHA-1(key + GUID))
 */
export function computeAcceptKey(key: string): string {
  return createHash('sha1').update(key + WEBSOCKET_GUID).digest('base64');
}

/**
 * Valid when the key is canonical base64 of exactly 16 bytes
 */
export function isValidWebSocketKey(key: string | undefined): key is string {
  if (key === undefined || !WEBSOCKET_KEY_PATTERN.test(key)) {
    return false;
  }
  return Buffer.from(key, 'base64').length === WEBSOCKET_KEY_BYTES;
}

// ============================================================================
// Negotiation
// ============================================================================

export function rejectHandshake(
  statusCode: number,
  reason: string,
  headers: Record<string, string> = {}
): HandshakeResult {
  const rejection: HandshakeRejection = { statusCode, reason, headers };
  return { accepted: false, rejection };
}

export function negotiateHandshake(request: HandshakeRequest, options: HandshakeOptions = {}): HandshakeResult {
  const { headers } = request;

  if (headers.get('upgrade')?.toLowerCase() !== 'websocket') {
    return rejectHandshake(400, 'Upgrade header must be "websocket"');
  }

  const connectionTokens = parseHeaderTokens(headers.get('connection')).map((token) => token.toLowerCase());
  if (!connectionTokens.includes('upgrade')) {
    return rejectHandshake(400, 'Connection header must include "Upgrade"');
  }

  if (headers.get('sec-websocket-version') !== WEBSOCKET_VERSION) {
    return rejectHandshake(426, 'Unsupported WebSocket version', {
      'Sec-WebSocket-Version': WEBSOCKET_VERSION,
    });
  }

  const key = headers.get('sec-websocket-key');
  if (!isValidWebSocketKey(key)) {
    return rejectHandshake(400, 'Sec-WebSocket-Key must be base64 of 16 bytes');
  }

  const responseHeaders: Record<string, string> = {
    Upgrade: 'websocket',
    Connection: 'Upgrade',
    'Sec-WebSocket-Accept': computeAcceptKey(key),
  };

  const requested = parseHeaderTokens(headers.get('sec-websocket-protocol'));
  let protocol: string | undefined;
  if (requested.length > 0 && options.selectProtocol) {
    const selected = options.selectProtocol(requested, request);
    if (selected !== undefined && requested.includes(selected)) {
      protocol = selected;
      responseHeaders['Sec-WebSocket-Protocol'] = selected;
    }
  }

  return {
    accepted: true,
    response: {
      statusCode: 101,
      statusText: 'Switching Protocols',
      headers: responseHeaders,
    },
    protocol,
  };
}

/**
 * Render the result as raw HTTP/1.1 bytes for the transport
 */
export function serializeHandshakeResponse(result: HandshakeResult): string {
  if (result.accepted) {
    const { statusCode, statusText, headers } = result.response;
    const lines = [`HTTP/1.1 ${statusCode} ${statusText}`, ...formatHeaders(headers)];
    return lines.join(CRLF) + CRLF + CRLF;
  }

  const { statusCode, reason, headers } = result.rejection;
  const statusText = STATUS_CODES[statusCode] ?? 'Unknown';
  const lines = [
    `HTTP/1.1 ${statusCode} ${statusText}`,
    ...formatHeaders({
      ...headers,
      Connection: 'close',
      'Content-Type': 'text/plain; charset=utf-8',
      'Content-Length': String(Buffer.byteLength(reason, 'utf-8')),
    }),
  ];
  return lines.join(CRLF) + CRLF + CRLF + reason;
}

function formatHeaders(headers: Record<string, string>): string[] {
  return Object.entries(headers).map(([name, value]) => `${name}: ${value}`);
}
