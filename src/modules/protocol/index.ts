/**
 * Protocol Module - Public API
 *
 * RFC 6455 engine: handshake negotiation, frame codec, message reassembly,
 * control frames and the per-connection session state machine.
 * Transport acceptance lives in the socket module.
 */

export {
  ConnectionSession,
  FrameWriter,
  MessageReassembler,
  computeAcceptKey,
  createHandshakeRequest,
  createHeaderMap,
  isValidWebSocketKey,
  negotiateHandshake,
  parseHeaderTokens,
  rejectHandshake,
  serializeHandshakeResponse,
} from './services';
export type { ConnectionStats, WriteQueueLimits } from './services';

export { handleControlFrame } from './handlers';

export {
  FrameDecoder,
  ProtocolError,
  classifyTransportError,
  decodeFrame,
  decodeUtf8,
  encodeClosePayload,
  encodeFrame,
  isProtocolError,
  isValidCloseCode,
  isValidUtf8,
  kindForCloseCode,
  parseClosePayload,
  truncateCloseReason,
  unmask,
} from './utils';

export { CloseCode, FRAME_CONSTANTS, WEBSOCKET_GUID, WEBSOCKET_VERSION } from './config';

export {
  ConnectionState,
  DEFAULT_CONNECTION_OPTIONS,
  Opcode,
  ReassemblyState,
  WebSocketErrorKind,
  isControlOpcode,
  toOpcode,
} from './types';

export type {
  ClassifiedTransportError,
  CloseInfo,
  ConnectionHandlers,
  ConnectionSessionOptions,
  ControlAction,
  DecodeResult,
  Frame,
  HandshakeOptions,
  HandshakeRequest,
  HandshakeResult,
  HeaderMap,
  Message,
  MessageType,
  ReassemblyResult,
  Transport,
} from './types';
