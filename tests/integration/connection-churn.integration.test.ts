/**
 * Connection Churn - Integration Tests
 * Many clients connect, talk and leave through one server; registries must end empty
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createServer, type Server } from 'http';
import { Opcode } from '@/modules/protocol';
import { getSocketStats, initializeSocketServer, type SocketServer } from '@/modules/socket';
import { FakeTransport, flushMicrotasks } from '../helpers/fake-transport';
import { UPGRADE_HEADERS, clientFrame, closePayload } from '../helpers/frames';

function connect(httpServer: Server): FakeTransport {
  const socket = new FakeTransport();
  httpServer.emit(
    'upgrade',
    { method: 'GET', url: '/ws', headers: UPGRADE_HEADERS, socket: { remoteAddress: '10.0.0.1' } },
    socket,
    Buffer.alloc(0)
  );
  return socket;
}

describe('Integration: Connection Churn', () => {
  let httpServer: Server;
  let server: SocketServer;

  beforeEach(() => {
    httpServer = createServer();
    server = initializeSocketServer(httpServer, {
      path: '/ws',
      maxConnections: 50,
      pingInterval: 0,
      closeTimeout: 0,
    });
  });

  afterEach(() => {
    server.detach();
  });

  it('should release every connection and session after mixed clean and abrupt exits', async () => {
    const sockets = Array.from({ length: 20 }, () => connect(httpServer));
    await flushMicrotasks();
    expect(server.connections.getActiveCount()).toBe(20);

    sockets.forEach((socket, index) => {
      socket.receive(clientFrame(Opcode.TEXT, `hello ${index}`));
    });
    await flushMicrotasks();

    expect(getSocketStats(server).sessionStats.messagesReceived).toBe(20);

    sockets.forEach((socket, index) => {
      if (index % 2 === 0) {
        socket.receive(clientFrame(Opcode.CLOSE, closePayload(1000)));
      } else {
        socket.emit('close');
      }
    });
    await flushMicrotasks();

    expect(server.connections.getActiveCount()).toBe(0);
    expect(server.sessions.getSessionCount()).toBe(0);
    expect(sockets.filter((socket) => socket.ended)).toHaveLength(10);
    expect(sockets.filter((socket) => socket.destroyed)).toHaveLength(10);
  });

  it('should reassemble a fragmented message delivered one byte at a time', async () => {
    const socket = connect(httpServer);
    await flushMicrotasks();

    const bytes = Buffer.concat([
      clientFrame(Opcode.TEXT, 'Hel', { fin: false }),
      clientFrame(Opcode.PING, 'mid'),
      clientFrame(Opcode.CONTINUATION, 'lo'),
    ]);
    for (const byte of bytes) {
      socket.receive(Buffer.from([byte]));
    }
    await flushMicrotasks();

    const frames = socket.sentFrames();
    expect(frames.map((frame) => frame.opcode)).toEqual([Opcode.PONG, Opcode.TEXT]);
    expect(frames[0].payload.toString()).toBe('mid');
    expect(frames[1].payload.toString()).toBe('Hello');
  });

  it('should admit new clients once earlier ones have left', async () => {
    server.detach();
    server = initializeSocketServer(httpServer, { path: '/ws', maxConnections: 1, pingInterval: 0, closeTimeout: 0 });

    const first = connect(httpServer);
    await flushMicrotasks();
    first.emit('close');
    await flushMicrotasks();

    const second = connect(httpServer);
    await flushMicrotasks();

    expect(second.httpResponse?.startsWith('HTTP/1.1 101')).toBe(true);
    expect(server.connections.getActiveCount()).toBe(1);
  });
});
