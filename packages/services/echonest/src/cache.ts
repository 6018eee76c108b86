// ABOUTME: Per-instance memo of fetched attributes, keyed by attribute name.
// ABOUTME: Entries are only ever added or overwritten; a failed fetch leaves them untouched.

type Entries<S> = { [K in keyof S]?: { value: S[K] } };

export class AttributeCache<S extends object> {
  private readonly entries: Entries<S> = {};

  has(key: keyof S): boolean {
    return this.entries[key] !== undefined;
  }

  get<K extends keyof S>(key: K): S[K] | undefined {
    return this.entries[key]?.value;
  }

  set<K extends keyof S>(key: K, value: S[K]): void {
    this.entries[key] = { value };
  }

  /**
   * Return the entry for `key` when `useCache` is set and it exists;
   * otherwise run `fetch`, store its result and return it.
   */
  async resolve<K extends keyof S>(key: K, useCache: boolean, fetch: () => Promise<S[K]>): Promise<S[K]> {
    const entry = this.entries[key];
    if (useCache && entry) {
      return entry.value;
    }

    const value = await fetch();
    this.entries[key] = { value };
    return value;
  }
}
