/**
 * Connection Session
 * Per-connection state machine: handshake, frame dispatch, liveness and the closing handshake.
 *
 *   CONNECTING ──handshake ok──▶ OPEN ──close()──────────▶ CLOSING_SENT ──peer close──▶ CLOSED
 *        │                         │ ──peer close──────────▶ CLOSING_RECEIVED ──echo flushed──▶ CLOSED
 *        └──rejected──▶ CLOSED     └──protocol error / timeout──▶ close frame flushed ──▶ CLOSED
 */

import { logger as rootLogger, generateId, type Logger } from '@/shared/utils';
import { CloseCode } from '../config';
import {
  ConnectionState,
  DEFAULT_CONNECTION_OPTIONS,
  Opcode,
  WebSocketErrorKind,
  isControlOpcode,
  type CloseInfo,
  type ConnectionHandlers,
  type ConnectionSessionOptions,
  type ControlAction,
  type Frame,
  type HandshakeRequest,
  type HandshakeResult,
  type Message,
  type Transport,
} from '../types';
import {
  FrameDecoder,
  ProtocolError,
  classifyTransportError,
  encodeClosePayload,
  encodeFrame,
  isProtocolError,
  isValidUtf8,
  kindForCloseCode,
  truncateCloseReason,
} from '../utils';
import { handleControlFrame } from '../handlers';
import { FrameWriter } from './frame-writer.service';
import { MessageReassembler } from './message-reassembler.service';
import { negotiateHandshake, serializeHandshakeResponse } from './handshake.service';

const EMPTY = Buffer.alloc(0);

type ReleaseMode = 'end' | 'destroy';

export interface ConnectionStats {
  framesReceived: number;
  messagesReceived: number;
  bytesReceived: number;
  messagesSent: number;
}

export class ConnectionSession {
  readonly id: string;

  private state: ConnectionState = ConnectionState.CONNECTING;
  private readonly transport: Transport;
  private readonly handlers: ConnectionHandlers;
  private readonly options: ConnectionSessionOptions;
  private readonly log: Logger;
  private readonly decoder: FrameDecoder;
  private readonly reassembler: MessageReassembler;
  private readonly writer: FrameWriter;

  private protocol: string | undefined;
  private closeInfo: CloseInfo | undefined;
  private failureInfo: CloseInfo | undefined;
  private failing = false;
  private released = false;

  private pingTimer: NodeJS.Timeout | undefined;
  private pongTimer: NodeJS.Timeout | undefined;
  private closeTimer: NodeJS.Timeout | undefined;

  private readonly stats: ConnectionStats = {
    framesReceived: 0,
    messagesReceived: 0,
    bytesReceived: 0,
    messagesSent: 0,
  };

  constructor(
    transport: Transport,
    handlers: ConnectionHandlers = {},
    options: Partial<ConnectionSessionOptions> = {}
  ) {
    this.options = { ...DEFAULT_CONNECTION_OPTIONS, id: generateId(), ...options };
    this.id = this.options.id;
    this.transport = transport;
    this.handlers = handlers;
    this.log = this.options.logger ?? rootLogger.child({ connectionId: this.id });

    // A single frame can never legally exceed the message cap, so reject it before buffering
    this.decoder = new FrameDecoder({ maxPayloadLength: this.options.maxMessageSize });
    this.reassembler = new MessageReassembler(this.options.maxMessageSize);
    this.writer = new FrameWriter(transport, (error) => this.onWriteFailure(error), {
      maxBytes: this.options.maxQueuedBytes,
      maxFrames: this.options.maxQueuedFrames,
    });

    transport.on('data', (chunk) => this.onData(chunk));
    transport.on('error', (error) => this.onTransportError(error));
    transport.on('close', () => this.onTransportClose());
  }

  // ==========================================================================
  // Accessors
  // ==========================================================================

  getState(): ConnectionState {
    return this.state;
  }

  isOpen(): boolean {
    return this.state === ConnectionState.OPEN;
  }

  /**
   * Sub-protocol accepted during the handshake, if any
   */
  getProtocol(): string | undefined {
    return this.protocol;
  }

  /**
   * Close status recorded for this connection, once closing has begun
   */
  getCloseInfo(): CloseInfo | undefined {
    return this.closeInfo;
  }

  getStats(): ConnectionStats {
    return { ...this.stats };
  }

  // ==========================================================================
  // Handshake
  // ==========================================================================

  /**
   * Answer the upgrade request. `head` holds bytes the HTTP parser read past the
   * request, which may already contain frames.
   */
  handshake(request: HandshakeRequest, head?: Buffer): HandshakeResult {
    if (this.state !== ConnectionState.CONNECTING) {
      throw new Error(`Handshake already completed (state: ${this.state})`);
    }

    const result = negotiateHandshake(request, this.options.handshake);
    const response = serializeHandshakeResponse(result);

    if (!result.accepted) {
      const { statusCode, reason } = result.rejection;
      this.log.warn('Handshake rejected', { statusCode, reason, path: request.path });

      this.failing = true;
      void this.writer.write(response);
      this.runHandler('onError', () =>
        this.handlers.onError?.(WebSocketErrorKind.HANDSHAKE_REJECTED, new Error(reason))
      );
      void this.writer.drain().then(() => this.release('end', undefined));
      return result;
    }

    this.protocol = result.protocol;
    void this.writer.write(response);
    this.transition(ConnectionState.OPEN);

    this.log.info('WebSocket connection open', { path: request.path, protocol: this.protocol });
    this.runHandler('onOpen', () => this.handlers.onOpen?.());

    if (head && head.length > 0) {
      this.decoder.push(head);
    }
    this.armLiveness();
    this.processFrames();

    return result;
  }

  // ==========================================================================
  // Outbound
  // ==========================================================================

  /**
   * Send a complete message: strings go out as text, buffers as binary
   */
  send(data: string | Buffer): Promise<boolean> {
    return typeof data === 'string' ? this.sendText(data) : this.sendBinary(data);
  }

  sendText(text: string): Promise<boolean> {
    return this.sendMessage(Opcode.TEXT, Buffer.from(text, 'utf-8'));
  }

  sendBinary(data: Buffer): Promise<boolean> {
    return this.sendMessage(Opcode.BINARY, data);
  }

  /**
   * Send one message split into several frames (first frame carries the opcode)
   */
  sendFragmented(type: 'text' | 'binary', fragments: Buffer[]): Promise<boolean> {
    if (!this.canSend('fragmented message')) {
      return Promise.resolve(false);
    }
    if (fragments.length === 0) {
      return this.sendMessage(type === 'text' ? Opcode.TEXT : Opcode.BINARY, EMPTY);
    }

    const writes = fragments.map((fragment, index) => {
      const opcode = index === 0 ? (type === 'text' ? Opcode.TEXT : Opcode.BINARY) : Opcode.CONTINUATION;
      return this.writer.write(encodeFrame(opcode, fragment, { fin: index === fragments.length - 1 }));
    });
    this.stats.messagesSent++;

    return Promise.all(writes).then((results) => results.every(Boolean));
  }

  ping(payload: Buffer = EMPTY): Promise<boolean> {
    if (!this.canSend('ping')) {
      return Promise.resolve(false);
    }
    return this.writer.write(encodeFrame(Opcode.PING, payload));
  }

  /**
   * Start the closing handshake. No-op unless the connection is open.
   */
  close(code: number = CloseCode.NORMAL, reason = ''): void {
    if (this.state === ConnectionState.CONNECTING) {
      this.release('destroy', { code: CloseCode.ABNORMAL, reason: '' });
      return;
    }
    if (this.state !== ConnectionState.OPEN) {
      return;
    }

    // Validates code and reason before any state changes
    const payload = encodeClosePayload(code, reason);

    this.closeInfo = { code, reason };
    this.transition(ConnectionState.CLOSING_SENT);
    this.stopLiveness();
    this.reassembler.reset();

    void this.writer.write(encodeFrame(Opcode.CLOSE, payload));

    if (this.options.closeTimeout > 0) {
      this.closeTimer = setTimeout(() => {
        this.log.warn('Close handshake timed out', { timeout: this.options.closeTimeout });
        this.release('destroy', { code: CloseCode.ABNORMAL, reason: '' });
      }, this.options.closeTimeout);
    }
  }

  /**
   * Drop the transport immediately without a closing handshake
   */
  terminate(): void {
    this.release('destroy', { code: CloseCode.ABNORMAL, reason: '' });
  }

  private sendMessage(opcode: Opcode.TEXT | Opcode.BINARY, payload: Buffer): Promise<boolean> {
    if (!this.canSend('message')) {
      return Promise.resolve(false);
    }
    this.stats.messagesSent++;
    return this.writer.write(encodeFrame(opcode, payload));
  }

  private canSend(label: string): boolean {
    if (this.state !== ConnectionState.OPEN || this.writer.isClosed()) {
      this.log.warn(`Cannot send ${label} - connection not open`, { state: this.state });
      return false;
    }
    return true;
  }

  // ==========================================================================
  // Inbound
  // ==========================================================================

  private onData(chunk: Buffer): void {
    if (this.released || this.failing) {
      return;
    }

    this.stats.bytesReceived += chunk.length;
    this.decoder.push(chunk);

    if (this.state !== ConnectionState.CONNECTING) {
      this.processFrames();
    }
  }

  /**
   * Dispatch every complete buffered frame, in arrival order
   */
  private processFrames(): void {
    while (!this.released && !this.failing) {
      let frame: Frame | undefined;
      try {
        frame = this.decoder.next();
      } catch (error) {
        if (isProtocolError(error)) {
          this.fail(error.closeCode, error.message, error.kind);
        } else {
          this.fail(CloseCode.INTERNAL_ERROR, 'Frame decoding failed', WebSocketErrorKind.INTERNAL, error);
        }
        return;
      }

      if (!frame) {
        return;
      }
      this.handleFrame(frame);
    }
  }

  private handleFrame(frame: Frame): void {
    this.stats.framesReceived++;
    this.armLiveness();

    // Clients must mask every frame they send
    if (!frame.masked) {
      this.fail(CloseCode.PROTOCOL_ERROR, 'Received unmasked frame from client');
      return;
    }

    this.log.debug('Frame received', {
      opcode: frame.opcode,
      fin: frame.fin,
      length: frame.payloadLength,
    });

    if (isControlOpcode(frame.opcode)) {
      this.applyControlAction(handleControlFrame(frame, this.state));
      return;
    }

    // After our close frame only the peer's close matters
    if (this.state !== ConnectionState.OPEN) {
      this.log.debug('Discarding data frame while closing', { state: this.state });
      return;
    }

    const result = this.reassembler.push(frame);
    switch (result.status) {
      case 'pending':
        return;
      case 'error':
        this.fail(result.closeCode, result.reason);
        return;
      case 'complete':
        this.deliver(result.message);
        return;
    }
  }

  private deliver(message: Message): void {
    if (message.type === 'text' && !isValidUtf8(message.payload)) {
      this.fail(CloseCode.INVALID_PAYLOAD, 'Text message is not valid UTF-8');
      return;
    }

    this.stats.messagesReceived++;
    const delivered = this.runHandler('onMessage', () =>
      this.handlers.onMessage?.(message.type, message.payload)
    );
    if (!delivered) {
      this.fail(CloseCode.INTERNAL_ERROR, 'Message handler failed', WebSocketErrorKind.INTERNAL);
    }
  }

  private applyControlAction(action: ControlAction): void {
    switch (action.type) {
      case 'pong':
        void this.writer.write(encodeFrame(Opcode.PONG, action.payload));
        return;

      case 'ignore':
        this.log.debug('Control frame ignored', { reason: action.reason });
        return;

      case 'liveness': {
        const { payload } = action;
        this.runHandler('onPong', () => this.handlers.onPong?.(payload));
        return;
      }

      case 'echo-close': {
        this.closeInfo = action.received;
        this.transition(ConnectionState.CLOSING_RECEIVED);
        this.stopLiveness();
        this.reassembler.reset();

        const { reply, received } = action;
        void this.writer.write(encodeFrame(Opcode.CLOSE, encodeClosePayload(reply.code, reply.reason)));
        void this.writer.drain().then(() => this.release('end', received));
        return;
      }

      case 'complete-close':
        this.release('end', action.received);
        return;

      case 'fail':
        this.fail(action.closeCode, action.reason, action.kind);
        return;

      default: {
        const unreachable: never = action;
        this.log.error('Unknown control action', { action: unreachable });
      }
    }
  }

  // ==========================================================================
  // Liveness
  // ==========================================================================

  /**
   * Restart the idle countdown; any inbound frame counts as activity
   */
  private armLiveness(): void {
    this.stopLiveness();
    if (this.state !== ConnectionState.OPEN || this.options.pingInterval <= 0) {
      return;
    }

    this.pingTimer = setTimeout(() => this.onIdle(), this.options.pingInterval);
  }

  private onIdle(): void {
    this.pingTimer = undefined;
    if (this.state !== ConnectionState.OPEN) {
      return;
    }

    this.log.debug('Connection idle, sending ping', { interval: this.options.pingInterval });
    void this.writer.write(encodeFrame(Opcode.PING, EMPTY));

    if (this.options.pongTimeout > 0) {
      this.pongTimer = setTimeout(() => {
        this.pongTimer = undefined;
        this.fail(CloseCode.GOING_AWAY, 'Peer did not respond to ping', WebSocketErrorKind.TIMEOUT);
      }, this.options.pongTimeout);
    }
  }

  private stopLiveness(): void {
    if (this.pingTimer) {
      clearTimeout(this.pingTimer);
      this.pingTimer = undefined;
    }
    if (this.pongTimer) {
      clearTimeout(this.pongTimer);
      this.pongTimer = undefined;
    }
  }

  // ==========================================================================
  // Failure and teardown
  // ==========================================================================

  /**
   * Close with `code` after a violation or timeout: send the close frame, wait for it
   * to flush, then release the transport without waiting for the peer's echo.
   */
  private fail(
    code: CloseCode,
    reason: string,
    kind: WebSocketErrorKind = kindForCloseCode(code),
    cause?: unknown
  ): void {
    if (this.released || this.failing) {
      return;
    }
    this.failing = true;

    const error = new ProtocolError(reason, code, kind);
    if (cause !== undefined) {
      error.cause = cause;
    }

    this.log.warn('Failing connection', { code, reason, kind, state: this.state });

    this.stopLiveness();
    this.reassembler.reset();
    this.decoder.reset();

    const info: CloseInfo = { code, reason: truncateCloseReason(reason) };
    this.failureInfo = info;

    // A close frame already went out if we started or answered a closing handshake
    const closeAlreadySent =
      this.state === ConnectionState.CLOSING_SENT || this.state === ConnectionState.CLOSING_RECEIVED;

    this.runHandler('onError', () => this.handlers.onError?.(kind, error));

    if (!closeAlreadySent) {
      this.closeInfo = info;
      this.transition(ConnectionState.CLOSING_SENT);
      void this.writer.write(encodeFrame(Opcode.CLOSE, encodeClosePayload(info.code, info.reason)));
    }

    // Covers a transport that never acknowledges the write
    if (this.options.closeTimeout > 0 && !this.closeTimer) {
      this.closeTimer = setTimeout(() => this.release('destroy', info), this.options.closeTimeout);
    }

    void this.writer.drain().then(() => this.release('destroy', info));
  }

  /**
   * A peer that stops reading gets no close frame: nothing more can reach it
   */
  private onWriteFailure(error: Error): void {
    if (!isProtocolError(error) || error.kind !== WebSocketErrorKind.BACKPRESSURE) {
      this.onTransportError(error);
      return;
    }
    if (this.released) {
      return;
    }

    const backpressure: ProtocolError = error;
    this.log.warn('Peer is not reading, dropping connection', { reason: backpressure.message, state: this.state });
    this.runHandler('onError', () => this.handlers.onError?.(backpressure.kind, backpressure));
    this.release('destroy', { code: CloseCode.ABNORMAL, reason: '' });
  }

  private onTransportError(error: Error): void {
    if (this.released) {
      return;
    }

    const classified = classifyTransportError(error);
    if (classified.expected) {
      this.log.info('Transport closed by peer', { code: classified.code });
    } else {
      this.log.error('Transport error', error);
    }

    this.runHandler('onError', () => this.handlers.onError?.(WebSocketErrorKind.TRANSPORT, error));
    this.release('destroy', { code: CloseCode.ABNORMAL, reason: '' });
  }

  private onTransportClose(): void {
    if (this.released) {
      return;
    }

    // A close already decided on counts even if the socket went away before it flushed
    let info: CloseInfo = { code: CloseCode.ABNORMAL, reason: '' };
    if (this.failureInfo) {
      info = this.failureInfo;
    } else if (this.state === ConnectionState.CLOSING_RECEIVED && this.closeInfo) {
      info = this.closeInfo;
    }

    this.log.debug('Transport closed', { state: this.state });
    this.release('destroy', info);
  }

  /**
   * Release the transport exactly once and report the close.
   * `info` is undefined when the connection never opened.
   */
  private release(mode: ReleaseMode, info: CloseInfo | undefined): void {
    if (this.released) {
      return;
    }
    this.released = true;
    const wasOpened = this.state !== ConnectionState.CONNECTING;

    this.stopLiveness();
    if (this.closeTimer) {
      clearTimeout(this.closeTimer);
      this.closeTimer = undefined;
    }
    this.writer.close();
    this.decoder.reset();
    this.reassembler.reset();
    this.transition(ConnectionState.CLOSED);

    try {
      if (mode === 'end' && !this.transport.destroyed) {
        this.transport.end();
      } else {
        this.transport.destroy();
      }
    } catch (error) {
      this.log.warn('Error releasing transport', { error });
    }

    if (!wasOpened || !info) {
      return;
    }

    this.closeInfo = info;
    this.log.info('WebSocket connection closed', { code: info.code, reason: info.reason });
    this.runHandler('onClose', () => this.handlers.onClose?.(info.code, info.reason));
  }

  private transition(next: ConnectionState): void {
    if (this.state === next) {
      return;
    }
    this.log.debug('State transition', { from: this.state, to: next });
    this.state = next;
  }

  /**
   * Run an application callback; a throwing handler is logged and reported as false
   */
  private runHandler(label: string, callback: () => void): boolean {
    try {
      callback();
      return true;
    } catch (error) {
      this.log.error(`Error in ${label} handler`, error instanceof Error ? error : { error });
      return false;
    }
  }
}
