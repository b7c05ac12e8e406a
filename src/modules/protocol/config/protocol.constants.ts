/**
 * RFC 6455 Protocol Constants
 */

/**
 * Fixed GUID appended to Sec-WebSocket-Key before hashing (RFC 6455 §1.3)
 */
export const WEBSOCKET_GUID = '258EAFA5-E914-47DA-95CA-C5AB0DC85B11';

/**
 * The only protocol version this server speaks
 */
export const WEBSOCKET_VERSION = '13';

/**
 * Decoded length of a valid Sec-WebSocket-Key nonce
 */
export const WEBSOCKET_KEY_BYTES = 16;

export const CRLF = '\r\n';

/**
 * Frame layout limits
 */
export const FRAME_CONSTANTS = {
  /** Largest length that fits the 7-bit field */
  MAX_7BIT_LENGTH: 125,

  /** Marker values in the 7-bit length field */
  LENGTH_16BIT_MARKER: 126,
  LENGTH_64BIT_MARKER: 127,

  /** Largest length carried by the 16-bit extended field */
  MAX_16BIT_LENGTH: 0xffff,

  /** Control frames never carry more than this */
  MAX_CONTROL_PAYLOAD: 125,

  /** Close reason budget: control payload minus the 2-byte status code */
  MAX_CLOSE_REASON_BYTES: 123,

  MASKING_KEY_BYTES: 4,

  /** Bit masks for the first two header bytes */
  FIN_BIT: 0x80,
  RSV1_BIT: 0x40,
  RSV2_BIT: 0x20,
  RSV3_BIT: 0x10,
  OPCODE_MASK: 0x0f,
  MASK_BIT: 0x80,
  LENGTH_MASK: 0x7f,
} as const;

/**
 * Close status codes (RFC 6455 §7.4.1)
 */
export enum CloseCode {
  NORMAL = 1000,
  GOING_AWAY = 1001,
  PROTOCOL_ERROR = 1002,
  UNSUPPORTED_DATA = 1003,
  /** Reported locally when a close frame carried no status; never sent */
  NO_STATUS = 1005,
  /** Reported locally when the transport dropped without a close frame; never sent */
  ABNORMAL = 1006,
  INVALID_PAYLOAD = 1007,
  POLICY_VIOLATION = 1008,
  MESSAGE_TOO_BIG = 1009,
  MANDATORY_EXTENSION = 1010,
  INTERNAL_ERROR = 1011,
}
