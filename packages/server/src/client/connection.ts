/**
 * Chat Connection
 *
 * Per-socket worker: frames inbound bytes into lines, runs the idle timer,
 * bounds outbound back-pressure and tears the socket down exactly once.
 *
 * Lifecycle events:
 * - `closing` fires once, as soon as teardown starts for any reason
 * - `closed` fires once, after the socket is gone
 */

import { EventEmitter } from 'events';
import type { Socket } from 'net';
import { PROTOCOL, TIMEOUTS } from '../constants.js';
import { NetworkError, ProtocolError } from '../errors.js';
import { encodeFrame, LineDecoder } from '../protocol/codec.js';
import type { DisconnectReason, SessionTransport } from '../types.js';
import type { ChatConnectionEvents, ChatConnectionOptions } from './types.js';

const DEFAULT_OPTIONS: ChatConnectionOptions = {
  maxLineBytes: PROTOCOL.MAX_LINE_BYTES,
  idleTimeoutMs: TIMEOUTS.IDLE_MS,
  writeTimeoutMs: TIMEOUTS.WRITE_MS,
};

export interface ChatConnection {
  on<K extends keyof ChatConnectionEvents>(event: K, listener: ChatConnectionEvents[K]): this;
  once<K extends keyof ChatConnectionEvents>(event: K, listener: ChatConnectionEvents[K]): this;
  off<K extends keyof ChatConnectionEvents>(event: K, listener: ChatConnectionEvents[K]): this;
  emit<K extends keyof ChatConnectionEvents>(event: K, ...args: Parameters<ChatConnectionEvents[K]>): boolean;
}

export class ChatConnection extends EventEmitter implements SessionTransport {
  /** Remote IP, used for admission accounting */
  readonly ip: string;
  /** Remote `ip:port`, shown in the roster */
  readonly address: string;
  /** Resolves with the disconnect reason once the socket has closed */
  readonly closed: Promise<DisconnectReason>;

  private readonly options: ChatConnectionOptions;
  private readonly decoder: LineDecoder;
  private readonly resolveClosed: (reason: DisconnectReason) => void;

  private idleTimer: NodeJS.Timeout | null = null;
  private writeTimer: NodeJS.Timeout | null = null;
  private lingerTimer: NodeJS.Timeout | null = null;
  private closeReason: DisconnectReason | null = null;
  private finished = false;

  constructor(
    private readonly socket: Socket,
    options: Partial<ChatConnectionOptions> = {}
  ) {
    super();
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.decoder = new LineDecoder(this.options.maxLineBytes);

    this.ip = socket.remoteAddress ?? 'unknown';
    this.address = socket.remotePort !== undefined ? `${this.ip}:${socket.remotePort}` : this.ip;

    let resolve: (reason: DisconnectReason) => void = () => {};
    this.closed = new Promise<DisconnectReason>((r) => {
      resolve = r;
    });
    this.resolveClosed = resolve;
  }

  /**
   * Attach socket listeners and arm the idle timer
   */
  start(): void {
    this.socket.setNoDelay(true);

    this.socket.on('data', (chunk: Buffer) => this.handleData(chunk));
    this.socket.on('end', () => this.close('client_closed'));
    this.socket.on('error', (error: Error) => {
      this.close('network_error', undefined, new NetworkError(`Socket error: ${error.message}`, { cause: error }));
    });
    this.socket.on('close', () => this.handleSocketClosed());

    this.resetIdleTimer();
  }

  /**
   * Queue an encoded frame. Returns false once the connection is closing.
   * When the kernel buffer is full the write is still queued, and the
   * session is dropped if it does not drain within the write timeout.
   */
  send(line: string): boolean {
    if (this.closeReason !== null || this.socket.destroyed || !this.socket.writable) {
      return false;
    }

    const flushed = this.socket.write(line);
    if (!flushed) {
      this.awaitDrain();
    }
    return true;
  }

  /**
   * Begin teardown. An optional notice is sent as a final `SRV` frame.
   * Only the first call has any effect.
   */
  close(reason: DisconnectReason, notice?: string, error?: Error): void {
    if (this.closeReason !== null) return;
    this.closeReason = reason;
    this.clearTimer('idle');

    this.emit('closing', reason, error);

    if (this.finished) return;

    // Nothing more can be written to a failed or stalled socket
    if (reason === 'network_error' || reason === 'write_timeout') {
      this.socket.destroy();
      return;
    }

    if (notice !== undefined && this.socket.writable) {
      this.socket.write(encodeFrame('SRV', notice));
    }
    this.socket.end();

    this.lingerTimer = setTimeout(() => this.socket.destroy(), this.options.writeTimeoutMs);
    this.lingerTimer.unref();
  }

  /**
   * Drop the socket immediately
   */
  destroy(reason: DisconnectReason = 'shutdown'): void {
    this.close(reason);
    this.socket.destroy();
  }

  /**
   * Restart the idle window (called after every valid frame)
   */
  resetIdleTimer(): void {
    if (this.closeReason !== null) return;
    this.clearTimer('idle');
    this.idleTimer = setTimeout(() => {
      this.idleTimer = null;
      this.close('idle_timeout');
    }, this.options.idleTimeoutMs);
  }

  get isClosing(): boolean {
    return this.closeReason !== null;
  }

  get isClosed(): boolean {
    return this.finished;
  }

  private handleData(chunk: Buffer): void {
    if (this.closeReason !== null) return;

    const { lines, overflow } = this.decoder.write(chunk);
    for (const line of lines) {
      if (this.closeReason !== null) return;
      this.emit('line', line);
    }

    if (overflow && this.closeReason === null) {
      this.emit('protocol-error', new ProtocolError(`Line exceeds ${this.options.maxLineBytes} bytes`));
    }
  }

  private awaitDrain(): void {
    if (this.writeTimer) return;

    this.writeTimer = setTimeout(() => {
      this.writeTimer = null;
      this.close(
        'write_timeout',
        undefined,
        new NetworkError(`Write did not drain within ${this.options.writeTimeoutMs}ms`)
      );
    }, this.options.writeTimeoutMs);

    this.socket.once('drain', () => this.clearTimer('write'));
  }

  private handleSocketClosed(): void {
    if (this.finished) return;
    this.finished = true;

    if (this.closeReason === null) {
      this.close('client_closed');
    }
    this.clearTimer('idle');
    this.clearTimer('write');
    this.clearTimer('linger');

    this.decoder.reset();
    const reason = this.closeReason ?? 'client_closed';
    this.emit('closed', reason);
    this.resolveClosed(reason);
  }

  private clearTimer(which: 'idle' | 'write' | 'linger'): void {
    switch (which) {
      case 'idle':
        if (this.idleTimer) clearTimeout(this.idleTimer);
        this.idleTimer = null;
        break;
      case 'write':
        if (this.writeTimer) clearTimeout(this.writeTimer);
        this.writeTimer = null;
        break;
      case 'linger':
        if (this.lingerTimer) clearTimeout(this.lingerTimer);
        this.lingerTimer = null;
        break;
    }
  }
}
