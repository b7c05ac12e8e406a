/**
 * Connection Service
 * Tracks live connection sessions for sending, broadcasting and shutdown
 */

import { logger } from '@/shared/utils';
import { CloseCode, type ConnectionSession } from '@/modules/protocol';

/**
 * Connection Service Class
 * Owns the id -> ConnectionSession map for one socket server
 */
export class ConnectionService {
  private activeConnections: Map<string, ConnectionSession> = new Map();
  private closeWaiters: Map<string, Array<() => void>> = new Map();

  registerConnection(connection: ConnectionSession): void {
    const existing = this.activeConnections.get(connection.id);
    if (existing) {
      if (existing === connection) {
        logger.debug('Connection already registered', { connectionId: connection.id });
        return;
      }
      logger.warn('Replacing existing connection with the same id', { connectionId: connection.id });
      existing.terminate();
    }

    this.activeConnections.set(connection.id, connection);
    logger.debug('Connection registered', { connectionId: connection.id });
  }

  getConnection(connectionId: string): ConnectionSession | undefined {
    return this.activeConnections.get(connectionId);
  }

  /**
   * Forget a connection and wake anyone waiting for it to close
   */
  removeConnection(connectionId: string): void {
    if (this.activeConnections.delete(connectionId)) {
      logger.debug('Connection removed', { connectionId });
    }

    const waiters = this.closeWaiters.get(connectionId);
    if (waiters) {
      this.closeWaiters.delete(connectionId);
      waiters.forEach((resolve) => resolve());
    }
  }

  hasConnection(connectionId: string): boolean {
    const connection = this.activeConnections.get(connectionId);
    return connection !== undefined && connection.isOpen();
  }

  getActiveCount(): number {
    return this.activeConnections.size;
  }

  getAllConnections(): ConnectionSession[] {
    return Array.from(this.activeConnections.values());
  }

  /**
   * Resolves once removeConnection runs for this id (immediately if unknown)
   */
  waitForClose(connectionId: string): Promise<void> {
    if (!this.activeConnections.has(connectionId)) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      const waiters = this.closeWaiters.get(connectionId) ?? [];
      waiters.push(resolve);
      this.closeWaiters.set(connectionId, waiters);
    });
  }

  /**
   * Send data to a specific connection
   * Checks state immediately before sending
   */
  async sendToConnection(connectionId: string, data: string | Buffer): Promise<boolean> {
    const connection = this.activeConnections.get(connectionId);
    if (!connection) {
      logger.warn('No active connection', { connectionId });
      return false;
    }

    if (!connection.isOpen()) {
      logger.warn('Connection not open', { connectionId, state: connection.getState() });
      return false;
    }

    return connection.send(data);
  }

  /**
   * Send to every open connection; resolves to the number of successful sends
   */
  async broadcast(data: string | Buffer): Promise<number> {
    const open = this.getAllConnections().filter((connection) => connection.isOpen());
    const results = await Promise.all(open.map((connection) => connection.send(data)));
    return results.filter(Boolean).length;
  }

  /**
   * Start the closing handshake on every connection
   */
  closeAll(code: number = CloseCode.GOING_AWAY, reason = 'Server shutting down'): void {
    logger.info('Closing all connections', { count: this.activeConnections.size, code });

    this.activeConnections.forEach((connection) => {
      connection.close(code, reason);
    });
  }

  /**
   * Drop every remaining transport without a handshake (shutdown fallback)
   */
  terminateAll(): void {
    const remaining = this.getAllConnections();
    if (remaining.length > 0) {
      logger.warn('Terminating connections that did not close in time', { count: remaining.length });
    }

    remaining.forEach((connection) => {
      connection.terminate();
      this.removeConnection(connection.id);
    });
  }
}
