/**
 * Keyed map whose keys are also kept in an ordered list, with each entry
 * storing its 1-based list position (0 means absent).
 *
 * Removal is swap-and-pop: the last key moves into the freed slot and its
 * stored position is rewritten, so list order is not insertion order after a
 * removal. All mutation goes through `set` and `delete`, which keep the list
 * and the positions in lockstep.
 */
export class EnumerableMap<V> {
  private keys: string[] = [];
  private entries = new Map<string, { value: V; position: number }>();

  get size(): number {
    return this.keys.length;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get(key: string): V | undefined {
    return this.entries.get(key)?.value;
  }

  /** 1-based list position, 0 when absent. */
  positionOf(key: string): number {
    return this.entries.get(key)?.position ?? 0;
  }

  /**
   * Inserts at the end of the list, or replaces the value in place.
   * Returns true when a new entry was appended.
   */
  set(key: string, value: V): boolean {
    const entry = this.entries.get(key);
    if (entry) {
      entry.value = value;
      return false;
    }
    this.keys.push(key);
    this.entries.set(key, { value, position: this.keys.length });
    return true;
  }

  /** Returns the removed value, or undefined when the key was absent. */
  delete(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    const lastIndex = this.keys.length - 1;
    const index = entry.position - 1;
    if (index !== lastIndex) {
      const movedKey = this.keys[lastIndex];
      this.keys[index] = movedKey;
      const moved = this.entries.get(movedKey);
      if (moved) {
        moved.position = entry.position;
      }
    }
    this.keys.pop();
    this.entries.delete(key);
    return entry.value;
  }

  keyList(): string[] {
    return [...this.keys];
  }

  entryList(): Array<[string, V]> {
    return this.keys.map((key): [string, V] => [key, this.getExisting(key)]);
  }

  snapshot(): EnumerableMapSnapshot<V> {
    return {
      keys: [...this.keys],
      entries: this.keys.map(key => ({ key, value: this.getExisting(key), position: this.positionOf(key) }))
    };
  }

  restore(snapshot: EnumerableMapSnapshot<V>): void {
    this.keys = [...snapshot.keys];
    this.entries = new Map(snapshot.entries.map(({ key, value, position }) => [key, { value, position }]));
  }

  private getExisting(key: string): V {
    const entry = this.entries.get(key);
    if (!entry) {
      throw new Error(`EnumerableMap out of sync for key ${key}`);
    }
    return entry.value;
  }
}

export interface EnumerableMapSnapshot<V> {
  readonly keys: readonly string[];
  readonly entries: ReadonlyArray<{ key: string; value: V; position: number }>;
}
