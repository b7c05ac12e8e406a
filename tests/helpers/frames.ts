/**
 * Client frame builders
 * Frames are assembled byte by byte so tests do not depend on the server encoder
 */

import { Opcode } from '@/modules/protocol';

export const TEST_MASKING_KEY = Buffer.from([0x37, 0xfa, 0x21, 0x3d]);

export const TEST_WEBSOCKET_KEY = 'dGhlIHNhbXBsZSBub25jZQ==';
export const TEST_ACCEPT_KEY = 's3pPLMBiTxaQ9kYGzzhZRbK+xOo=';

export const UPGRADE_HEADERS: Record<string, string> = {
  host: 'localhost:3001',
  upgrade: 'websocket',
  connection: 'Upgrade',
  'sec-websocket-key': TEST_WEBSOCKET_KEY,
  'sec-websocket-version': '13',
};

export const SWITCHING_PROTOCOLS_RESPONSE =
  'HTTP/1.1 101 Switching Protocols\r\n' +
  'Upgrade: websocket\r\n' +
  'Connection: Upgrade\r\n' +
  `Sec-WebSocket-Accept: ${TEST_ACCEPT_KEY}\r\n` +
  '\r\n';

interface FrameOptions {
  fin?: boolean;
  masked?: boolean;
  maskingKey?: Buffer;
  rsv?: number;
}

function lengthHeader(length: number): Buffer {
  if (length <= 125) {
    return Buffer.from([length]);
  }
  if (length <= 0xffff) {
    const header = Buffer.alloc(3);
    header[0] = 126;
    header.writeUInt16BE(length, 1);
    return header;
  }
  const header = Buffer.alloc(9);
  header[0] = 127;
  header.writeUInt32BE(Math.floor(length / 2 ** 32), 1);
  header.writeUInt32BE(length >>> 0, 5);
  return header;
}

/**
 * Build a frame the way a client sends it (masked unless told otherwise)
 */
export function clientFrame(opcode: Opcode, payload: Buffer | string = '', options: FrameOptions = {}): Buffer {
  const { fin = true, masked = true, maskingKey = TEST_MASKING_KEY, rsv = 0 } = options;
  const data = typeof payload === 'string' ? Buffer.from(payload, 'utf-8') : payload;

  const first = Buffer.from([(fin ? 0x80 : 0) | (rsv << 4) | opcode]);
  const length = lengthHeader(data.length);
  if (masked) {
    length[0] |= 0x80;
  }

  if (!masked) {
    return Buffer.concat([first, length, data]);
  }

  const body = Buffer.alloc(data.length);
  for (let i = 0; i < data.length; i++) {
    body[i] = data[i] ^ maskingKey[i % 4];
  }
  return Buffer.concat([first, length, maskingKey, body]);
}

export function closePayload(code: number, reason = ''): Buffer {
  const payload = Buffer.alloc(2);
  payload.writeUInt16BE(code, 0);
  return Buffer.concat([payload, Buffer.from(reason, 'utf-8')]);
}
