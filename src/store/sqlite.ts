/**
 * SQLite key/value store on drizzle-orm
 */

import { asc, eq } from 'drizzle-orm';
import { type DatabaseConnection, createDatabase } from '../database/connection.js';
import { kvStore } from '../database/schema.js';
import type { StoreAdapter } from './types.js';

export class SqliteStore implements StoreAdapter {
  constructor(private readonly connection: DatabaseConnection) {}

  get(key: string): string | undefined {
    const row = this.connection.db.select().from(kvStore).where(eq(kvStore.key, key)).get();
    return row?.value;
  }

  set(key: string, value: string): void {
    const updatedAt = new Date();
    this.connection.db
      .insert(kvStore)
      .values({ key, value, updatedAt })
      .onConflictDoUpdate({ target: kvStore.key, set: { value, updatedAt } })
      .run();
  }

  delete(key: string): void {
    this.connection.db.delete(kvStore).where(eq(kvStore.key, key)).run();
  }

  all(): Record<string, string> {
    const rows = this.connection.db.select().from(kvStore).orderBy(asc(kvStore.key)).all();
    return Object.fromEntries(rows.map(row => [row.key, row.value]));
  }

  close(): void {
    this.connection.close();
  }
}

/**
 * Opens the database at path and creates the table if missing
 */
export function createSqliteStore(path: string): SqliteStore {
  const connection = createDatabase(path);
  connection.migrate();
  return new SqliteStore(connection);
}
