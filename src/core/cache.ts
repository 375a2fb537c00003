import { Clock } from "../types/contracts.js";

export interface CacheEntry<T> {
  value: T;
  fetchedAt: number; // epoch ms
}

export type CacheRead<T> =
  | { ok: true; value: T; stale: boolean }
  | { ok: false; error: unknown };

/**
 * Single-value TTL cache with stale-on-error. A failed refresh never clears
 * the entry: the last good value is served until a refresh succeeds.
 * Concurrent callers during a refresh share one loader call.
 */
export class TtlCache<T> {
  private entry: CacheEntry<T> | null = null;
  private inflight: Promise<CacheRead<T>> | null = null;
  private readonly ttlMs: number;
  private readonly load: () => Promise<T>;
  private readonly now: Clock;

  constructor(args: { ttlSeconds: number; load: () => Promise<T>; now?: Clock }) {
    this.ttlMs = args.ttlSeconds * 1000;
    this.load = args.load;
    this.now = args.now ?? Date.now;
  }

  peek(): CacheEntry<T> | null {
    return this.entry;
  }

  isFresh(): boolean {
    return this.entry !== null && this.now() - this.entry.fetchedAt < this.ttlMs;
  }

  async read(): Promise<CacheRead<T>> {
    if (this.entry && this.isFresh()) return { ok: true, value: this.entry.value, stale: false };
    if (!this.inflight) {
      this.inflight = this.refresh().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  invalidate(): void {
    this.entry = null;
  }

  private async refresh(): Promise<CacheRead<T>> {
    try {
      const value = await this.load();
      this.entry = { value, fetchedAt: this.now() };
      return { ok: true, value, stale: false };
    } catch (error) {
      if (this.entry) return { ok: true, value: this.entry.value, stale: true };
      return { ok: false, error };
    }
  }
}
