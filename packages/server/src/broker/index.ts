/**
 * Broker Module Exports
 */

export {
  MessageBroker,
  encodeMessage,
  createMessage,
  type MessageBrokerOptions,
  type MessageBrokerEvents,
  type MessageBrokerStats,
} from './message-broker.js';
export { RingBuffer } from './ring-buffer.js';
