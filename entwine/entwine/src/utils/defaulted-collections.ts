/** WeakMap whose missing entries are created by `factory` on first read. */
export class DefaultedWeakMap<K extends object, V> extends WeakMap<K, V> {
  constructor(private readonly factory: (key: K) => V) {
    super();
  }

  get(key: K): V {
    const existing = super.get(key);
    if (existing !== undefined) {
      return existing;
    }
    const created = this.factory(key);
    super.set(key, created);
    return created;
  }
}
