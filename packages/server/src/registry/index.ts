/**
 * Registry Module Exports
 */

export {
  ClientRegistry,
  displayName,
  type Session,
  type SessionView,
  type UsernameResult,
  type UsernameRejection,
  type ClientRegistryEvents,
  type ClientRegistryOptions,
  type ClientRegistryStats,
} from './client-registry.js';
