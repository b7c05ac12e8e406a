/**
 * Session Service
 * Per-connection metadata and activity counters for monitoring
 */

import { logger } from '@/shared/utils';
import { ConnectionState } from '@/modules/protocol';
import type { Session, SessionMetadata, SessionStats } from '../types';

/**
 * Session Service Class
 * One record per accepted connection, keyed by connection id
 */
export class SessionService {
  private sessions: Map<string, Session> = new Map();

  /**
   * Create a new session
   */
  createSession(connectionId: string, metadata: Partial<SessionMetadata> = {}): Session {
    const existing = this.sessions.get(connectionId);
    if (existing) {
      logger.warn('Session already exists for connection', { connectionId });
      return existing;
    }

    const now = Date.now();
    const session: Session = {
      connectionId,
      state: ConnectionState.CONNECTING,
      createdAt: now,
      lastActivity: now,
      messagesReceived: 0,
      messagesSent: 0,
      metadata: { ...metadata },
    };

    this.sessions.set(connectionId, session);
    logger.debug('Session created', { connectionId, ipAddress: metadata.ipAddress });

    return session;
  }

  getSession(connectionId: string): Session | undefined {
    return this.sessions.get(connectionId);
  }

  /**
   * Update session (read, merge, write in one step)
   */
  updateSession(connectionId: string, updates: Partial<Omit<Session, 'connectionId'>>): Session | undefined {
    const session = this.sessions.get(connectionId);
    if (!session) {
      logger.warn('Session not found for update', { connectionId });
      return undefined;
    }

    const updated: Session = {
      ...session,
      ...updates,
      metadata: updates.metadata ? { ...session.metadata, ...updates.metadata } : session.metadata,
    };

    this.sessions.set(connectionId, updated);
    return updated;
  }

  updateSessionState(connectionId: string, state: ConnectionState): Session | undefined {
    return this.updateSession(connectionId, { state });
  }

  /**
   * Update last activity timestamp
   */
  touchSession(connectionId: string): void {
    const session = this.sessions.get(connectionId);
    if (session) {
      session.lastActivity = Date.now();
    }
  }

  recordReceived(connectionId: string): void {
    const session = this.sessions.get(connectionId);
    if (session) {
      session.messagesReceived++;
      session.lastActivity = Date.now();
    }
  }

  recordSent(connectionId: string): void {
    const session = this.sessions.get(connectionId);
    if (session) {
      session.messagesSent++;
    }
  }

  deleteSession(connectionId: string): boolean {
    const session = this.sessions.get(connectionId);
    if (!session) {
      return false;
    }

    this.sessions.delete(connectionId);
    logger.debug('Session deleted', {
      connectionId,
      duration: Date.now() - session.createdAt,
      messagesReceived: session.messagesReceived,
      messagesSent: session.messagesSent,
    });
    return true;
  }

  getAllSessions(): Session[] {
    return Array.from(this.sessions.values());
  }

  getSessionCount(): number {
    return this.sessions.size;
  }

  getSessionsByState(state: ConnectionState): Session[] {
    return this.getAllSessions().filter((session) => session.state === state);
  }

  /**
   * Cleanup all sessions (for graceful shutdown)
   */
  cleanup(): void {
    const count = this.sessions.size;
    this.sessions.clear();
    logger.info('All sessions cleared', { count });
  }

  getStats(): SessionStats {
    const sessions = this.getAllSessions();
    const now = Date.now();

    const stats: SessionStats = {
      total: sessions.length,
      open: 0,
      closing: 0,
      messagesReceived: 0,
      messagesSent: 0,
      avgDuration: 0,
    };

    if (sessions.length === 0) {
      return stats;
    }

    let totalDuration = 0;

    sessions.forEach((session) => {
      switch (session.state) {
        case ConnectionState.OPEN:
          stats.open++;
          break;
        case ConnectionState.CLOSING_SENT:
        case ConnectionState.CLOSING_RECEIVED:
          stats.closing++;
          break;
        default:
          break;
      }

      stats.messagesReceived += session.messagesReceived;
      stats.messagesSent += session.messagesSent;
      totalDuration += now - session.createdAt;
    });

    stats.avgDuration = Math.floor(totalDuration / sessions.length);

    return stats;
  }
}
