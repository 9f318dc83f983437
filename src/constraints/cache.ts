interface CacheEntry<V> {
  value: V;
  cachedAt: number;
  epoch: string;
}

export interface CacheStats {
  hits: number;
  misses: number;
  size: number;
}

/**
 * TTL cache whose entries are also tagged with the registry epoch they were
 * computed against. A lookup under a different epoch is a miss.
 */
export class TtlCache<V> {
  private entries = new Map<string, CacheEntry<V>>();
  private hits = 0;
  private misses = 0;

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now
  ) {}

  get(key: string, epoch: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses += 1;
      return undefined;
    }
    const age = this.now() - entry.cachedAt;
    if (age >= this.ttlMs || entry.epoch !== epoch) {
      this.entries.delete(key);
      this.misses += 1;
      return undefined;
    }
    this.hits += 1;
    return entry.value;
  }

  set(key: string, epoch: string, value: V): void {
    this.entries.set(key, { value, epoch, cachedAt: this.now() });
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  deleteMatching(predicate: (key: string) => boolean): number {
    let dropped = 0;
    for (const key of [...this.entries.keys()]) {
      if (predicate(key) && this.entries.delete(key)) dropped += 1;
    }
    return dropped;
  }

  clear(): number {
    const size = this.entries.size;
    this.entries.clear();
    return size;
  }

  stats(): CacheStats {
    return { hits: this.hits, misses: this.misses, size: this.entries.size };
  }
}
