/**
 * Database exports
 */

export { type DatabaseConnection, createDatabase } from './connection.js';
export { kvStore, type KvEntry, type NewKvEntry } from './schema.js';
