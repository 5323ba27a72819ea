/**
 * Admin Routes
 *
 * Read-only JSON endpoints:
 * - GET /health: liveness and server state
 * - GET /stats: aggregated server statistics
 */

import type { IncomingMessage, ServerResponse } from 'http';
import type { ApiResponse, HealthReport, StatsSource } from './types.js';

export function sendJson<T>(
  res: ServerResponse,
  data: ApiResponse<T>,
  status = 200,
  headers: Record<string, string> = {}
): void {
  res.writeHead(status, {
    'Content-Type': 'application/json',
    'Cache-Control': 'no-store',
    ...headers,
  });
  res.end(JSON.stringify(data));
}

export class AdminRoutes {
  constructor(private readonly source: StatsSource) {}

  /**
   * Handle a request. Every request gets a response.
   */
  handleRequest(req: IncomingMessage, res: ServerResponse): void {
    const path = new URL(req.url || '/', 'http://localhost').pathname;

    if (path !== '/health' && path !== '/stats') {
      sendJson(res, { success: false, error: 'Not found' }, 404);
      return;
    }

    if (req.method !== 'GET' && req.method !== 'HEAD') {
      sendJson(res, { success: false, error: 'Method not allowed' }, 405, { Allow: 'GET, HEAD' });
      return;
    }

    if (path === '/health') {
      this.handleHealth(res);
    } else {
      this.handleStats(res);
    }
  }

  private handleHealth(res: ServerResponse): void {
    const state = this.source.state;
    const report: HealthReport = {
      status: state === 'LISTENING' ? 'healthy' : 'stopping',
      state,
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
    };
    sendJson(res, { success: true, data: report }, state === 'LISTENING' ? 200 : 503);
  }

  private handleStats(res: ServerResponse): void {
    sendJson(res, { success: true, data: this.source.getStats() });
  }
}
