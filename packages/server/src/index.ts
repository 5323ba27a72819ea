/**
 * linechat server
 *
 * Multi-client TCP chat over a newline-delimited text protocol. Admits
 * connections under global and per-IP limits, tracks nicknames, rate-limits
 * inbound messages and fans chat out to every session, keeping a short
 * history for newcomers.
 */

import { loadConfig, mergeConfig, type ServerConfig, type ServerConfigOverrides } from './config.js';
import { ChatServer, type BoundAddress, type ChatServerDeps } from './server/index.js';
import { createAdminServer, type AdminServer } from './admin/index.js';
import { logger } from './utils/logger.js';

export interface LineChatServer {
  chatServer: ChatServer;
  adminServer: AdminServer | null;
  config: Readonly<ServerConfig>;
  address: BoundAddress;
  adminAddress: BoundAddress | null;
  shutdown: () => Promise<void>;
}

/**
 * Create and start the chat server (and the admin endpoint when configured)
 */
export async function createChatServer(
  configOverrides: ServerConfigOverrides = {},
  deps: ChatServerDeps = {}
): Promise<LineChatServer> {
  const config = mergeConfig(loadConfig(), configOverrides);

  logger.info('[Server] Starting...');

  const chatServer = new ChatServer(config, deps);
  const address = await chatServer.start();

  let adminServer: AdminServer | null = null;
  let adminAddress: BoundAddress | null = null;

  if (config.admin.port !== null) {
    adminServer = createAdminServer({
      host: config.admin.host,
      port: config.admin.port,
      source: chatServer,
    });
    try {
      adminAddress = await adminServer.start();
    } catch (error) {
      await chatServer.shutdown();
      throw error;
    }
  }

  const shutdown = async () => {
    await chatServer.shutdown();
    if (adminServer) {
      await adminServer.stop();
    }
  };

  return {
    chatServer,
    adminServer,
    config: chatServer.config,
    address,
    adminAddress,
    shutdown,
  };
}

export * from './server/index.js';
export * from './broker/index.js';
export * from './client/index.js';
export * from './registry/index.js';
export * from './security/index.js';
export * from './protocol/index.js';
export * from './errors.js';
export { createAdminServer, type AdminServer, type AdminServerOptions, type StatsSource } from './admin/index.js';
export { loadConfig, mergeConfig, validateConfig } from './config.js';
export type { ServerConfigOverrides } from './config.js';
export type {
  ChatEvent,
  ChatEventSink,
  ChatMessage,
  ConnectionState,
  DisconnectReason,
  Frame,
  FrameType,
  MessageType,
  RejectReason,
  ServerConfig,
  ServerState,
  SessionTransport,
} from './types.js';

// Main entry point when run directly
if (import.meta.url === `file://${process.argv[1]}`) {
  createChatServer()
    .then((server) => {
      // Handle graceful shutdown
      const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

      for (const signal of signals) {
        process.on(signal, () => {
          logger.info(`[Server] Received ${signal}`);
          server
            .shutdown()
            .then(() => process.exit(0))
            .catch((error: unknown) => {
              logger.error('[Server] Shutdown failed', error);
              process.exit(1);
            });
        });
      }
    })
    .catch((error: unknown) => {
      logger.error('[Server] Failed to start', error);
      process.exit(1);
    });
}
