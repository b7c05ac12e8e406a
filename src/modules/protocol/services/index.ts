/**
 * Protocol Services
 * Centralized exports for all protocol services
 */

export {
  computeAcceptKey,
  createHandshakeRequest,
  createHeaderMap,
  isValidWebSocketKey,
  negotiateHandshake,
  parseHeaderTokens,
  rejectHandshake,
  serializeHandshakeResponse,
} from './handshake.service';
export { MessageReassembler } from './message-reassembler.service';
export { FrameWriter } from './frame-writer.service';
export type { WriteQueueLimits } from './frame-writer.service';
export { ConnectionSession } from './connection-session.service';
export type { ConnectionStats } from './connection-session.service';
