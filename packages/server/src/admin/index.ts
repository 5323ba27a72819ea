/**
 * Admin HTTP endpoint
 *
 * Optional side server exposing health and statistics as JSON. It listens
 * on its own port, normally on loopback, and never touches chat traffic.
 */

import { createServer, type Server as HttpServer } from 'http';
import type { AddressInfo } from 'net';
import { ChatServerError, ErrorCodes, isErrnoException } from '../errors.js';
import { logger } from '../utils/logger.js';
import { AdminRoutes } from './routes.js';
import type { AdminServerOptions } from './types.js';

export { AdminRoutes, sendJson } from './routes.js';
export type { AdminServerOptions, ApiResponse, HealthReport, StatsSource } from './types.js';

export interface AdminServer {
  readonly httpServer: HttpServer;
  /** Bind and resolve with the bound address */
  start(): Promise<{ host: string; port: number }>;
  stop(): Promise<void>;
}

export function createAdminServer(options: AdminServerOptions): AdminServer {
  const routes = new AdminRoutes(options.source);

  const httpServer = createServer((req, res) => {
    try {
      routes.handleRequest(req, res);
    } catch (error) {
      logger.error('[Admin] request failed', error);
      if (!res.headersSent) {
        res.writeHead(500, { 'Content-Type': 'application/json' });
      }
      res.end(JSON.stringify({ success: false, error: 'Internal server error' }));
    }
  });

  const start = (): Promise<{ host: string; port: number }> =>
    new Promise((resolve, reject) => {
      const onError = (error: Error) => {
        const code = isErrnoException(error) ? error.code : undefined;
        reject(
          new ChatServerError(
            `Admin endpoint could not bind ${options.host}:${options.port}${code ? ` (${code})` : ''}`,
            ErrorCodes.BIND_FAILED,
            { cause: error }
          )
        );
      };

      httpServer.once('error', onError);
      httpServer.listen(options.port, options.host, () => {
        httpServer.off('error', onError);
        const address = httpServer.address();
        const port = isAddressInfo(address) ? address.port : options.port;
        logger.info(`[Admin] Listening on ${options.host}:${port}`);
        resolve({ host: options.host, port });
      });
    });

  const stop = (): Promise<void> =>
    new Promise((resolve) => {
      if (!httpServer.listening) {
        resolve();
        return;
      }
      httpServer.close(() => resolve());
      httpServer.closeAllConnections();
    });

  return { httpServer, start, stop };
}

function isAddressInfo(address: string | AddressInfo | null): address is AddressInfo {
  return address !== null && typeof address === 'object';
}
