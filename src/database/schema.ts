/**
 * Database Schema Definitions
 */

import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core';

/**
 * Key/value pairs handlers keep between restarts
 */
export const kvStore = sqliteTable('kv_store', {
  key: text('key').primaryKey(),
  value: text('value').notNull(),
  updatedAt: integer('updated_at', { mode: 'timestamp' }).notNull(),
});

export type KvEntry = typeof kvStore.$inferSelect;
export type NewKvEntry = typeof kvStore.$inferInsert;
