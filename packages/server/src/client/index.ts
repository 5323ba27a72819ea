/**
 * Client Module Exports
 */

export { ChatConnection } from './connection.js';
export {
  SessionHandler,
  NOTICES,
  type SessionHandlerDeps,
  type SessionHandlerEvents,
} from './handler.js';
export type { ChatConnectionOptions, ChatConnectionEvents, SessionHandlerConfig } from './types.js';
