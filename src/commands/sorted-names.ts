const identity = (value: string): string => value;
const fold = (value: string): string => value.toLowerCase();

/**
 * Index of the first element whose key is not less than the key of value
 * (code-unit order)
 */
export function searchSorted(
  list: readonly string[],
  value: string,
  key: (value: string) => string = identity
): number {
  const target = key(value);
  let low = 0;
  let high = list.length;

  while (low < high) {
    const mid = (low + high) >>> 1;
    if (key(list[mid]) < target) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }

  return low;
}

/**
 * Inserts value into an already sorted list in place, keeping it sorted
 * and free of duplicates. Case sensitive.
 * @returns false if the value was already present
 */
export function insertSorted(list: string[], value: string): boolean {
  const pos = searchSorted(list, value);
  if (pos < list.length && list[pos] === value) {
    return false;
  }
  list.splice(pos, 0, value);
  return true;
}

/**
 * Case-insensitive insert for display names. A name equal to an existing
 * entry up to case replaces it, so the list holds the latest spelling.
 * @returns false if the name was already present in some case
 */
export function insertSortedName(list: string[], value: string): boolean {
  const pos = searchSorted(list, value, fold);
  if (pos < list.length && fold(list[pos]) === fold(value)) {
    list[pos] = value;
    return false;
  }
  list.splice(pos, 0, value);
  return true;
}
