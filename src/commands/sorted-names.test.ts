/**
 * Tests for sorted name lists
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { insertSorted, insertSortedName, searchSorted } from './sorted-names.js';

describe('sorted name lists', () => {
  it('should keep the list sorted and duplicate free', () => {
    fc.assert(
      fc.property(fc.array(fc.string({ maxLength: 6 }), { maxLength: 30 }), (values) => {
        const list: string[] = [];
        for (const value of values) {
          insertSorted(list, value);
        }

        const expected = [...new Set(values)].sort();
        expect(list).toEqual(expected);
      }),
      { numRuns: 200 }
    );
  });

  it('should report whether a value was added', () => {
    const list: string[] = [];

    expect(insertSorted(list, 'pong')).toBe(true);
    expect(insertSorted(list, 'ping')).toBe(true);
    expect(insertSorted(list, 'pong')).toBe(false);
    expect(list).toEqual(['ping', 'pong']);
  });

  it('should be case sensitive', () => {
    const list: string[] = [];
    insertSorted(list, 'echo');
    insertSorted(list, 'Echo');

    expect(list).toEqual(['Echo', 'echo']);
  });

  describe('insertSortedName', () => {
    it('should order names without regard to case', () => {
      const list: string[] = [];
      for (const name of ['Zeta', 'alpha', 'Mid']) {
        insertSortedName(list, name);
      }

      expect(list).toEqual(['alpha', 'Mid', 'Zeta']);
    });

    it('should replace a name that differs only in case', () => {
      const list: string[] = [];

      expect(insertSortedName(list, 'Echo')).toBe(true);
      expect(insertSortedName(list, 'ping')).toBe(true);
      expect(insertSortedName(list, 'echo')).toBe(false);
      expect(list).toEqual(['echo', 'ping']);
    });

    it('should hold one entry per folded name', () => {
      fc.assert(
        fc.property(fc.array(fc.stringMatching(/^[a-zA-Z]{1,4}$/), { maxLength: 30 }), (values) => {
          const list: string[] = [];
          for (const value of values) {
            insertSortedName(list, value);
          }

          const folded = list.map(name => name.toLowerCase());
          expect(folded).toEqual([...new Set(values.map(value => value.toLowerCase()))].sort());
          for (const name of list) {
            const latest = values.filter(value => value.toLowerCase() === name.toLowerCase()).pop();
            expect(name).toBe(latest);
          }
        }),
        { numRuns: 200 }
      );
    });
  });

  it('should find the insertion point', () => {
    expect(searchSorted([], 'a')).toBe(0);
    expect(searchSorted(['a', 'c'], 'b')).toBe(1);
    expect(searchSorted(['a', 'c'], 'd')).toBe(2);
    expect(searchSorted(['alpha', 'Zeta'], 'beta', name => name.toLowerCase())).toBe(1);
  });
});
