/**
 * Memoizes a thunk.  Object subclasses are defined lazily through
 * this so that modules which reference each other's classes can load
 * in any order.
 */
export function memoize<T>(f: () => T): () => T {
  let get = () => {
    const value = f();
    get = () => value;
    return value;
  };
  return () => get();
}

/** Formats a number of items with a noun for diagnostics. */
export function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
