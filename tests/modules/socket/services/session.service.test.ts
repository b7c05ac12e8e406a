/**
 * Session Service Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ConnectionState } from '@/modules/protocol';
import { SessionService } from '@/modules/socket';

describe('SessionService', () => {
  let service: SessionService;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00.000Z'));
    service = new SessionService();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should create a session in the connecting state', () => {
    const session = service.createSession('conn-1', { ipAddress: '127.0.0.1', userAgent: 'vitest' });

    expect(session).toEqual({
      connectionId: 'conn-1',
      state: ConnectionState.CONNECTING,
      createdAt: Date.parse('2026-01-01T00:00:00.000Z'),
      lastActivity: Date.parse('2026-01-01T00:00:00.000Z'),
      messagesReceived: 0,
      messagesSent: 0,
      metadata: { ipAddress: '127.0.0.1', userAgent: 'vitest' },
    });
    expect(service.getSessionCount()).toBe(1);
  });

  it('should return the existing session for a duplicate id', () => {
    const first = service.createSession('conn-1');
    const second = service.createSession('conn-1', { path: '/other' });

    expect(second).toBe(first);
    expect(service.getSessionCount()).toBe(1);
  });

  it('should merge metadata on update', () => {
    service.createSession('conn-1', { ipAddress: '127.0.0.1' });

    const updated = service.updateSession('conn-1', { metadata: { protocol: 'chat' } });

    expect(updated?.metadata).toEqual({ ipAddress: '127.0.0.1', protocol: 'chat' });
    expect(service.getSession('conn-1')?.metadata.protocol).toBe('chat');
  });

  it('should return undefined when updating an unknown session', () => {
    expect(service.updateSessionState('missing', ConnectionState.OPEN)).toBeUndefined();
  });

  it('should count messages and activity', () => {
    service.createSession('conn-1');
    vi.advanceTimersByTime(1500);

    service.recordReceived('conn-1');
    service.recordReceived('conn-1');
    service.recordSent('conn-1');

    const session = service.getSession('conn-1');
    expect(session?.messagesReceived).toBe(2);
    expect(session?.messagesSent).toBe(1);
    expect(session?.lastActivity).toBe(Date.parse('2026-01-01T00:00:01.500Z'));
  });

  it('should touch the activity timestamp', () => {
    service.createSession('conn-1');
    vi.advanceTimersByTime(250);

    service.touchSession('conn-1');

    expect(service.getSession('conn-1')?.lastActivity).toBe(Date.parse('2026-01-01T00:00:00.250Z'));
  });

  it('should filter sessions by state', () => {
    service.createSession('conn-1');
    service.createSession('conn-2');
    service.updateSessionState('conn-2', ConnectionState.OPEN);

    expect(service.getSessionsByState(ConnectionState.OPEN).map((session) => session.connectionId)).toEqual([
      'conn-2',
    ]);
  });

  it('should delete sessions', () => {
    service.createSession('conn-1');

    expect(service.deleteSession('conn-1')).toBe(true);
    expect(service.deleteSession('conn-1')).toBe(false);
    expect(service.getSession('conn-1')).toBeUndefined();
  });

  it('should aggregate stats', () => {
    service.createSession('conn-1');
    vi.advanceTimersByTime(1000);
    service.createSession('conn-2');
    service.createSession('conn-3');
    service.updateSessionState('conn-1', ConnectionState.OPEN);
    service.updateSessionState('conn-2', ConnectionState.CLOSING_SENT);
    service.updateSessionState('conn-3', ConnectionState.CLOSING_RECEIVED);
    service.recordReceived('conn-1');
    service.recordSent('conn-2');
    vi.advanceTimersByTime(1000);

    expect(service.getStats()).toEqual({
      total: 3,
      open: 1,
      closing: 2,
      messagesReceived: 1,
      messagesSent: 1,
      avgDuration: Math.floor((2000 + 1000 + 1000) / 3),
    });
  });

  it('should report empty stats', () => {
    expect(service.getStats()).toEqual({
      total: 0,
      open: 0,
      closing: 0,
      messagesReceived: 0,
      messagesSent: 0,
      avgDuration: 0,
    });
  });

  it('should clear everything on cleanup', () => {
    service.createSession('conn-1');
    service.createSession('conn-2');

    service.cleanup();

    expect(service.getSessionCount()).toBe(0);
    expect(service.getAllSessions()).toEqual([]);
  });
});
