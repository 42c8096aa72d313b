export type Clock = () => number;

export interface ExpiringStore<K, V> {
  get(key: K): V | undefined;
  set(key: K, value: V): void;
  delete(key: K): boolean;
  /** Restarts the inactivity window of a live entry. */
  touch(key: K): boolean;
  sweep(): number;
  size(): number;
  values(): V[];
}

interface Entry<V> {
  value: V;
  touchedAt: number;
}

/**
 * Map whose entries lapse after `ttlMs` of inactivity. Expiry is checked on
 * read, so a lapsed entry behaves exactly like one that was never stored.
 */
export class ExpiringMap<K, V> implements ExpiringStore<K, V> {
  private readonly entries = new Map<K, Entry<V>>();

  constructor(
    private readonly ttlMs: number,
    private readonly clock: Clock = Date.now,
  ) {
    if (!Number.isFinite(ttlMs) || ttlMs <= 0) {
      throw new Error(`ExpiringMap ttl must be positive, got ${ttlMs}`);
    }
  }

  get(key: K): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.isExpired(entry, this.clock())) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: K, value: V): void {
    this.entries.set(key, { value, touchedAt: this.clock() });
  }

  delete(key: K): boolean {
    return this.entries.delete(key);
  }

  touch(key: K): boolean {
    const entry = this.entries.get(key);
    const now = this.clock();
    if (!entry || this.isExpired(entry, now)) return false;
    entry.touchedAt = now;
    return true;
  }

  sweep(): number {
    const now = this.clock();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry, now)) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  /** Counts stored entries, including lapsed ones not yet swept. */
  size(): number {
    return this.entries.size;
  }

  values(): V[] {
    const now = this.clock();
    return [...this.entries.values()]
      .filter((entry) => !this.isExpired(entry, now))
      .map((entry) => entry.value);
  }

  private isExpired(entry: Entry<V>, now: number): boolean {
    return now - entry.touchedAt > this.ttlMs;
  }
}

export interface StoreOptions<K, V> {
  ttlMs?: number;
  clock?: Clock;
  /** Backing store; when given, `ttlMs` is ignored. */
  store?: ExpiringStore<K, V>;
}

export const resolveStore = <K, V>(
  options: StoreOptions<K, V>,
  defaultTtlMs: number,
): { store: ExpiringStore<K, V>; clock: Clock } => {
  const clock = options.clock ?? Date.now;
  return {
    clock,
    store: options.store ?? new ExpiringMap<K, V>(options.ttlMs ?? defaultTtlMs, clock),
  };
};
