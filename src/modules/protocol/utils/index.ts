/**
 * Protocol Utilities
 */

export { decodeFrame, encodeFrame, unmask } from './frame-codec';
export { FrameDecoder } from './frame-decoder';
export {
  isValidCloseCode,
  parseClosePayload,
  encodeClosePayload,
  truncateCloseReason,
} from './close-payload';
export { ProtocolError, isProtocolError, kindForCloseCode } from './protocol-error';
export { decodeUtf8, isValidUtf8 } from './utf8';
export { classifyTransportError } from './error-classifier';
