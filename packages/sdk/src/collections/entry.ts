/**
 * MapEntry: one key's place in a map, whether or not it holds a value
 */

/**
 * Map operations an entry needs
 */
export interface EntryHost<K, V> {
  contains(key: K): boolean;
  get(key: K): V | undefined;
  getMut(key: K): V | undefined;
  insert(key: K, value: V): V | undefined;
  remove(key: K): V | undefined;
}

/**
 * Handle on a single key for get-or-insert and update-in-place patterns
 *
 * Values returned for mutation are written back on the map's next flush, and
 * are only safe to mutate until then.
 *
 * @example
 * ```typescript
 * visits.entry("home").andModify((n) => n + 1).orInsert(1);
 * tags.entry(7).orInsertWith(() => ({ labels: [] })).labels.push("new");
 * ```
 */
export class MapEntry<K, V> {
  readonly key: K;
  #host: EntryHost<K, V>;

  constructor(host: EntryHost<K, V>, key: K) {
    this.#host = host;
    this.key = key;
  }

  isOccupied(): boolean {
    return this.#host.contains(this.key);
  }

  get(): V | undefined {
    return this.#host.get(this.key);
  }

  /**
   * Existing value for mutation, or `value` stored under the key
   */
  orInsert(value: V): V {
    return this.orInsertWith(() => value);
  }

  /**
   * Existing value for mutation, or the result of `make` stored under the key.
   * `make` runs only when the key is vacant.
   */
  orInsertWith(make: () => V): V {
    return this.orInsertWithKey(make);
  }

  orInsertWithKey(make: (key: K) => V): V {
    const existing = this.#host.getMut(this.key);
    if (existing !== undefined) return existing;

    const value = make(this.key);
    this.#host.insert(this.key, value);
    return value;
  }

  /**
   * Replace an existing value with `fn(value)`; a vacant key is left vacant
   */
  andModify(fn: (value: V) => V): this {
    const existing = this.#host.get(this.key);
    if (existing !== undefined) {
      this.#host.insert(this.key, fn(existing));
    }
    return this;
  }

  /**
   * @returns The previous value
   */
  insert(value: V): V | undefined {
    return this.#host.insert(this.key, value);
  }

  /**
   * @returns The removed value
   */
  remove(): V | undefined {
    return this.#host.remove(this.key);
  }
}
