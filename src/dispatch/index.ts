/**
 * Dispatch module exports
 */

export { ReadWriteLock } from './rw-lock.js';
export { type Addressing, createBotNamePattern, detectAddressing } from './addressing.js';
export {
  type DispatchOutcome,
  type DispatcherOptions,
  Dispatcher,
  createDispatcher,
  errorContextFor,
} from './dispatcher.js';
