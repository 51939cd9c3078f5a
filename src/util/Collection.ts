/**
 * Keyed collection that also resolves a value back to its key.
 * Keys and values are both unique.
 */
export class Collection<K, V> {
  private readonly byKey = new Map<K, V>();
  // looked up by identity, any value can be asked for
  private readonly byValue = new Map<unknown, K>();

  get(key: K): V | null {
    return this.byKey.get(key) ?? null;
  }

  keyOf(value: unknown): K | null {
    return this.byValue.get(value) ?? null;
  }

  add(key: K, element: V) {
    if (this.byKey.has(key)) {
      throw new Error(`Key ${key} already exists`);
    }

    if (this.byValue.has(element)) {
      throw new Error(`Element already stored under key ${this.byValue.get(element)}`);
    }

    this.byKey.set(key, element);
    this.byValue.set(element, key);
  }

  remove(key: K): V | null {
    const element = this.byKey.get(key);
    if (element === undefined) {
      return null;
    }

    this.byKey.delete(key);
    this.byValue.delete(element);
    return element;
  }

  clear() {
    this.byKey.clear();
    this.byValue.clear();
  }

  count(): number {
    return this.byKey.size;
  }
}
