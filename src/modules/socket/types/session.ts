/**
 * Session Tracking Types
 */

import type { ConnectionState } from '@/modules/protocol';

// ============================================================================
// Session Interface
// ============================================================================

export interface Session {
  connectionId: string;      // Same id as the ConnectionSession
  state: ConnectionState;    // Last state observed by the server
  createdAt: number;         // Unix timestamp
  lastActivity: number;      // Last inbound message or pong
  messagesReceived: number;
  messagesSent: number;
  metadata: SessionMetadata;
}

// ============================================================================
// Session Metadata
// ============================================================================

export interface SessionMetadata {
  ipAddress?: string;        // Client IP address
  userAgent?: string;        // Client user agent
  path?: string;             // Request path including query
  protocol?: string;         // Accepted sub-protocol
}

// ============================================================================
// Session Statistics
// ============================================================================

export interface SessionStats {
  total: number;
  open: number;
  closing: number;
  messagesReceived: number;
  messagesSent: number;
  avgDuration: number;
}
