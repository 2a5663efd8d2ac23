/**
 * Insertion-ordered collection that ignores values it has already seen.
 * Equality is decided by `keyOf`, which defaults to the value itself.
 */
export class OrderedSet<T> {
  private readonly keys = new Set<unknown>();
  private readonly items: T[] = [];

  constructor(private readonly keyOf: (value: T) => unknown = (value) => value) {}

  /** Adds `value` unless an equal one is present. Returns true when it was added. */
  add(value: T): boolean {
    const key = this.keyOf(value);
    if (this.keys.has(key)) return false;
    this.keys.add(key);
    this.items.push(value);
    return true;
  }

  toArray(): T[] {
    return [...this.items];
  }
}
