/**
 * Server Orchestrator
 *
 * Owns the listening socket and every connection worker, and moves the
 * server through INIT -> LISTENING -> SHUTTING_DOWN -> STOPPED.
 *
 * Events:
 * - `listening` ({ host, port }) once bound, for discovery collaborators
 * - `rejected` (AdmissionRejectedError) for each refused connection
 * - `stopped` after shutdown completes
 */

import { EventEmitter } from 'events';
import { createServer, type AddressInfo, type Server, type Socket } from 'net';
import { MessageBroker, type MessageBrokerStats } from '../broker/message-broker.js';
import { ChatConnection } from '../client/connection.js';
import { NOTICES, SessionHandler } from '../client/handler.js';
import { validateConfig } from '../config.js';
import {
  AdmissionRejectedError,
  ChatServerError,
  ErrorCodes,
  ProtocolError,
  ShutdownError,
  isErrnoException,
} from '../errors.js';
import { ClientRegistry, type ClientRegistryStats } from '../registry/client-registry.js';
import { ConnectionGate, type AdmissionTicket, type ConnectionGateStats } from '../security/connection-gate.js';
import { RateLimiter, type RateLimiterStats } from '../security/rate-limiter.js';
import { InputValidator } from '../security/validator.js';
import type { ChatEventSink, DisconnectReason, ServerConfig, ServerState } from '../types.js';
import { createLoggerSink, logger } from '../utils/logger.js';

export interface ChatServerDeps {
  /** Structured event sink (defaults to the logger) */
  events?: ChatEventSink;
  now?: () => number;
}

export interface BoundAddress {
  host: string;
  port: number;
}

export interface ServerStats {
  state: ServerState;
  address: BoundAddress | null;
  uptimeMs: number;
  connections: number;
  sessions: ClientRegistryStats;
  broker: MessageBrokerStats;
  rateLimiter: RateLimiterStats;
  gate: ConnectionGateStats;
}

export interface ChatServerEvents {
  listening: (address: BoundAddress) => void;
  rejected: (error: AdmissionRejectedError) => void;
  stopped: () => void;
}

interface Worker {
  sessionId: string;
  ticket: AdmissionTicket;
}

function freezeConfig(config: ServerConfig): Readonly<ServerConfig> {
  return Object.freeze({
    network: Object.freeze({ ...config.network }),
    limits: Object.freeze({ ...config.limits }),
    rateLimit: Object.freeze({ ...config.rateLimit }),
    messages: Object.freeze({ ...config.messages }),
    timeouts: Object.freeze({ ...config.timeouts }),
    admin: Object.freeze({ ...config.admin }),
  });
}

export interface ChatServer {
  on<K extends keyof ChatServerEvents>(event: K, listener: ChatServerEvents[K]): this;
  once<K extends keyof ChatServerEvents>(event: K, listener: ChatServerEvents[K]): this;
  off<K extends keyof ChatServerEvents>(event: K, listener: ChatServerEvents[K]): this;
  emit<K extends keyof ChatServerEvents>(event: K, ...args: Parameters<ChatServerEvents[K]>): boolean;
}

export class ChatServer extends EventEmitter {
  readonly config: Readonly<ServerConfig>;
  readonly registry: ClientRegistry;
  readonly broker: MessageBroker;
  readonly rateLimiter: RateLimiter;
  readonly gate: ConnectionGate;
  readonly handler: SessionHandler;

  private readonly server: Server;
  private readonly events: ChatEventSink;
  private readonly now: () => number;
  private readonly workers: Map<ChatConnection, Worker> = new Map();

  private currentState: ServerState = 'INIT';
  private boundAddress: BoundAddress | null = null;
  private startedAt: number | null = null;
  private sweepInterval: NodeJS.Timeout | null = null;
  private shutdownPromise: Promise<void> | null = null;

  constructor(config: ServerConfig, deps: ChatServerDeps = {}) {
    super();
    validateConfig(config);

    this.config = freezeConfig(config);
    this.events = deps.events ?? createLoggerSink();
    this.now = deps.now ?? Date.now;

    const validator = new InputValidator({
      maxUsernameLength: config.messages.maxUsernameLength,
      maxMessageLength: config.messages.maxMessageLength,
    });

    this.registry = new ClientRegistry({ validator, now: this.now });
    this.broker = new MessageBroker(this.registry, { historySize: config.messages.historySize, now: this.now });
    this.rateLimiter = new RateLimiter({
      capacity: config.rateLimit.capacity,
      refillPerMinute: config.rateLimit.refillPerMinute,
      now: this.now,
    });
    this.gate = new ConnectionGate({
      maxClients: config.limits.maxClients,
      maxConnectionsPerIp: config.limits.maxConnectionsPerIp,
      maxConnectionsPerMinute: config.limits.maxConnectionsPerMinute,
      blockDurationMs: config.limits.blockDurationMs,
      now: this.now,
    });
    this.handler = new SessionHandler(
      {
        registry: this.registry,
        broker: this.broker,
        rateLimiter: this.rateLimiter,
        validator,
        events: this.events,
      },
      { idleTimeoutMs: config.timeouts.idleMs }
    );

    this.broker.on('delivery-failed', (sessionId: string) => {
      this.registry.get(sessionId)?.transport.close('network_error');
    });

    this.server = createServer((socket) => this.handleSocket(socket));
  }

  get state(): ServerState {
    return this.currentState;
  }

  get address(): BoundAddress | null {
    return this.boundAddress;
  }

  get connectionCount(): number {
    return this.workers.size;
  }

  /**
   * Bind the listening socket. Bind failures are fatal.
   */
  async start(): Promise<BoundAddress> {
    if (this.currentState !== 'INIT') {
      throw new ChatServerError(`Cannot start server in state ${this.currentState}`, ErrorCodes.INVALID_STATE);
    }

    const { host, port } = this.config.network;

    try {
      await new Promise<void>((resolve, reject) => {
        this.server.once('error', reject);
        this.server.listen(port, host, () => {
          this.server.off('error', reject);
          resolve();
        });
      });
    } catch (error) {
      this.currentState = 'STOPPED';
      const code = isErrnoException(error) ? error.code : undefined;
      throw new ChatServerError(
        `Failed to bind ${host}:${port}${code ? ` (${code})` : ''}`,
        ErrorCodes.BIND_FAILED,
        { cause: error }
      );
    }

    this.server.on('error', (error) => {
      logger.error('[Server] Listener error', error);
    });

    const address = this.server.address();
    this.boundAddress = { host, port: isAddressInfo(address) ? address.port : port };
    this.startedAt = this.now();
    this.currentState = 'LISTENING';

    this.sweepInterval = setInterval(() => this.sweep(), this.config.timeouts.cleanupIntervalMs);
    this.sweepInterval.unref();

    logger.info(`[Server] Listening on ${this.boundAddress.host}:${this.boundAddress.port}`);
    this.emit('listening', this.boundAddress);
    return this.boundAddress;
  }

  /**
   * Stop accepting, notify and close every session, wait (bounded) for
   * the workers, then release the listener. Repeated calls share one run.
   */
  shutdown(): Promise<void> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.performShutdown();
    }
    return this.shutdownPromise;
  }

  getStats(): ServerStats {
    return {
      state: this.currentState,
      address: this.boundAddress,
      uptimeMs: this.startedAt === null ? 0 : this.now() - this.startedAt,
      connections: this.workers.size,
      sessions: this.registry.getStats(),
      broker: this.broker.getStats(),
      rateLimiter: this.rateLimiter.getStats(),
      gate: this.gate.getStats(),
    };
  }

  // ---------------------------------------------------------------------------
  // Connections
  // ---------------------------------------------------------------------------

  private handleSocket(socket: Socket): void {
    if (this.currentState !== 'LISTENING') {
      socket.destroy();
      return;
    }

    const ip = socket.remoteAddress ?? 'unknown';
    const admission = this.gate.admit(ip);

    if (!admission.allowed) {
      const rejection = new AdmissionRejectedError(`Connection from ${ip} rejected`, admission.reason);
      this.events.emit({ type: 'reject', address: ip, reason: admission.reason });
      this.emit('rejected', rejection);
      socket.destroy();
      return;
    }

    const connection = new ChatConnection(socket, {
      maxLineBytes: this.config.messages.maxLineBytes,
      idleTimeoutMs: this.config.timeouts.idleMs,
      writeTimeoutMs: this.config.timeouts.writeMs,
    });

    const sessionId = this.handler.handleConnection(connection, connection.address);
    this.workers.set(connection, { sessionId, ticket: admission.ticket });

    connection.on('line', (line: string) => {
      if (this.handler.handleLine(sessionId, line)) {
        connection.resetIdleTimer();
      }
    });

    connection.on('protocol-error', (error: ProtocolError) => {
      this.handler.handleProtocolError(sessionId, error);
    });

    connection.on('closing', (reason: DisconnectReason, error?: Error) => {
      if (error) {
        logger.debug(`[Client] ${error.message}`, { sessionId, code: ErrorCodes.NETWORK_ERROR });
      }
      this.handler.handleDisconnect(sessionId, reason);
    });

    connection.on('closed', () => {
      this.workers.get(connection)?.ticket.release();
      this.workers.delete(connection);
    });

    connection.start();
  }

  private sweep(): void {
    const closed = this.handler.sweepIdle(this.now());
    const pruned = this.gate.cleanup();
    if (closed > 0 || pruned > 0) {
      logger.debug('[Server] Cleanup', { idleSessionsClosed: closed, gateRecordsPruned: pruned });
    }
  }

  // ---------------------------------------------------------------------------
  // Shutdown
  // ---------------------------------------------------------------------------

  private async performShutdown(): Promise<void> {
    if (this.currentState === 'INIT') {
      this.currentState = 'STOPPED';
      this.emit('stopped');
      return;
    }

    logger.info('[Server] Shutting down...');
    this.currentState = 'SHUTTING_DOWN';

    if (this.sweepInterval) {
      clearInterval(this.sweepInterval);
      this.sweepInterval = null;
    }

    // Resolves once the listener and every accepted socket are gone
    const listenerClosed = new Promise<void>((resolve) => {
      this.server.close(() => resolve());
    });

    this.broker.announce(NOTICES.SHUTTING_DOWN);

    const pending = [...this.workers.keys()];
    for (const connection of pending) {
      connection.close('shutdown');
    }

    await this.joinWorkers(pending);

    this.broker.shutdown();
    this.rateLimiter.clear();
    this.registry.clear();

    await listenerClosed;

    this.currentState = 'STOPPED';
    logger.info('[Server] Shutdown complete');
    this.emit('stopped');
  }

  /**
   * Wait for workers to finish, destroying any still open after the
   * shutdown timeout.
   */
  private async joinWorkers(connections: ChatConnection[]): Promise<void> {
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), this.config.timeouts.shutdownMs);
    });

    const finished = Promise.all(connections.map((c) => c.closed)).then(() => 'done' as const);
    const outcome = await Promise.race([finished, timedOut]);
    clearTimeout(timer);

    if (outcome === 'done') return;

    const stragglers = connections.filter((c) => !c.isClosed);
    for (const connection of stragglers) {
      const sessionId = this.workers.get(connection)?.sessionId ?? 'unknown';
      const error = new ShutdownError(
        `Session did not close within ${this.config.timeouts.shutdownMs}ms`,
        sessionId
      );
      logger.error('[Shutdown] Forcing connection closed', error, { sessionId });
      this.events.emit({ type: 'shutdown_timeout', sessionId, address: connection.address });
      connection.destroy();
    }

    await Promise.all(stragglers.map((c) => c.closed));
  }
}

function isAddressInfo(address: string | AddressInfo | null): address is AddressInfo {
  return address !== null && typeof address === 'object';
}
