/**
 * Database Connection and Migration
 */

import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { sql } from 'drizzle-orm';
import * as schema from './schema.js';

export interface DatabaseConnection {
  db: BetterSQLite3Database<typeof schema>;
  sqlite: Database.Database;
  /** Creates missing tables; safe to run on every start */
  migrate(): void;
  close(): void;
}

/**
 * Opens the database at dbPath, or an in-memory one for ':memory:'
 */
export function createDatabase(dbPath: string): DatabaseConnection {
  const sqlite = new Database(dbPath);
  const db = drizzle(sqlite, { schema });

  return {
    db,
    sqlite,
    migrate() {
      db.run(sql`
        CREATE TABLE IF NOT EXISTS kv_store (
          key TEXT PRIMARY KEY NOT NULL,
          value TEXT NOT NULL,
          updated_at INTEGER NOT NULL
        )
      `);
    },
    close() {
      sqlite.close();
    },
  };
}

export * from './schema.js';
