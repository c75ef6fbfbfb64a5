/**
 * In-memory key/value store, lost on restart
 */

import type { StoreAdapter } from './types.js';

export class MemoryStore implements StoreAdapter {
  private readonly data = new Map<string, string>();

  get(key: string): string | undefined {
    return this.data.get(key);
  }

  set(key: string, value: string): void {
    this.data.set(key, value);
  }

  delete(key: string): void {
    this.data.delete(key);
  }

  all(): Record<string, string> {
    return Object.fromEntries(this.data);
  }

  close(): void {
    this.data.clear();
  }
}

export function createMemoryStore(): StoreAdapter {
  return new MemoryStore();
}
