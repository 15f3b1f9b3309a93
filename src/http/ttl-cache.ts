/**
 * In-memory cache with per-entry expiry and a size bound.
 *
 * Over the bound, expired entries go first, then the oldest.
 */
export class TTLCache<T> {
  private readonly entries = new Map<string, { storedAt: number; value: T }>();

  constructor(
    private readonly ttlMs: number,
    private readonly maxSize = 5000,
    private readonly now: () => number = Date.now,
  ) {}

  get size(): number {
    return this.entries.size;
  }

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.now() - entry.storedAt < this.ttlMs) {
      return entry.value;
    }
    this.entries.delete(key);
    return undefined;
  }

  set(key: string, value: T): void {
    // re-insert so Map order tracks write time
    this.entries.delete(key);
    this.entries.set(key, { storedAt: this.now(), value });
    if (this.entries.size > this.maxSize) {
      this.evict();
    }
  }

  clear(): void {
    this.entries.clear();
  }

  private evict(): void {
    const now = this.now();
    for (const [key, entry] of this.entries) {
      if (now - entry.storedAt >= this.ttlMs) {
        this.entries.delete(key);
      }
    }
    for (const key of this.entries.keys()) {
      if (this.entries.size <= this.maxSize) break;
      this.entries.delete(key);
    }
  }
}
