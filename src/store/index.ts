/**
 * Store exports
 */

export { type StoreAdapter } from './types.js';
export { MemoryStore, createMemoryStore } from './memory.js';
export { SqliteStore, createSqliteStore } from './sqlite.js';
