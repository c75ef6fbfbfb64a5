/**
 * Tests for the key/value stores
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fc from 'fast-check';
import type { StoreAdapter } from './types.js';
import { MemoryStore } from './memory.js';
import { createSqliteStore } from './sqlite.js';

const stores: Array<[string, () => StoreAdapter]> = [
  ['MemoryStore', () => new MemoryStore()],
  ['SqliteStore', () => createSqliteStore(':memory:')],
];

describe.each(stores)('%s', (_name, create) => {
  let store: StoreAdapter;

  beforeEach(() => {
    store = create();
  });

  afterEach(() => {
    store.close();
  });

  it('should return undefined for missing keys', () => {
    expect(store.get('missing')).toBeUndefined();
  });

  it('should overwrite existing values', () => {
    store.set('color', 'red');
    store.set('color', 'blue');

    expect(store.get('color')).toBe('blue');
    expect(store.all()).toEqual({ color: 'blue' });
  });

  it('should delete keys and ignore missing ones', () => {
    store.set('a', '1');
    store.delete('a');
    store.delete('never-set');

    expect(store.get('a')).toBeUndefined();
    expect(store.all()).toEqual({});
  });

  it('should hand out copies from all()', () => {
    store.set('a', '1');
    const copy = store.all();
    copy.a = 'changed';

    expect(store.get('a')).toBe('1');
  });

  it('should keep the last value written for every key', () => {
    fc.assert(
      fc.property(
        fc.array(fc.tuple(fc.string({ minLength: 1, maxLength: 8 }), fc.string({ maxLength: 20 })), { maxLength: 20 }),
        (writes) => {
          const fresh = create();
          const expected = new Map<string, string>();
          for (const [key, value] of writes) {
            fresh.set(key, value);
            expected.set(key, value);
          }

          for (const [key, value] of expected) {
            expect(fresh.get(key)).toBe(value);
          }
          expect(Object.keys(fresh.all()).length).toBe(expected.size);
          fresh.close();
        }
      ),
      { numRuns: 30 }
    );
  });
});
