/**
 * Process-wide memoization for loaders and aggregations.
 *
 * Entries are keyed by the registered function name plus a key derived from
 * the arguments, and are never invalidated on their own: the dataset is
 * immutable for the life of the process. `clear()` exists for tests.
 * A rejected promise is evicted so a failed load can be retried.
 */
export class MemoCache {
  private readonly tables = new Map<string, Map<string, { value: unknown }>>();

  memoize<A extends unknown[], R>(
    name: string,
    fn: (...args: A) => R,
    keyOf: (...args: A) => string
  ): (...args: A) => R {
    if (this.tables.has(name)) {
      throw new Error(`A function named "${name}" is already memoized in this cache`);
    }
    const entries = new Map<string, { value: R }>();
    this.tables.set(name, entries);

    return (...args: A): R => {
      const key = keyOf(...args);
      const hit = entries.get(key);
      if (hit) return hit.value;

      const value = fn(...args);
      entries.set(key, { value });
      if (value instanceof Promise) {
        void value.then(undefined, () => {
          entries.delete(key);
        });
      }
      return value;
    };
  }

  get size(): number {
    let total = 0;
    for (const entries of this.tables.values()) {
      total += entries.size;
    }
    return total;
  }

  clear(): void {
    for (const entries of this.tables.values()) {
      entries.clear();
    }
  }
}

const objectIds = new WeakMap<object, number>();
let nextObjectId = 1;

// Stable per-object id, for keying on identity without holding the object
export function identityKey(value: object): string {
  let id = objectIds.get(value);
  if (id === undefined) {
    id = nextObjectId++;
    objectIds.set(value, id);
  }
  return `#${id}`;
}
