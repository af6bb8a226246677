import type { Clock } from "../utils/clock.ts";
import { systemClock } from "../utils/clock.ts";

interface CacheEntry<T> {
  capturedAt: number;
  value: T;
}

type Entries<V> = { [K in keyof V]?: CacheEntry<V[K]> };
type Pending<V> = { [K in keyof V]?: Promise<V[K]> };

/**
 * Short-TTL memoizer for status probes that each cost one external process.
 * `V` maps every cache key to the type of value stored under it.
 *
 * Entries are replaced whole, so a reader sees either the old or the new value.
 * Failed fetches are never stored. `invalidateAll()` bumps a generation counter:
 * fetches that started before it still resolve for their own callers but do
 * not populate the cache.
 */
export class StatusCache<V extends object> {
  private entries: Entries<V> = {};
  private inFlight: Pending<V> = {};
  private generation = 0;

  constructor(
    private readonly ttlMs: number = 5_000,
    private readonly clock: Clock = systemClock,
  ) {}

  async getOrFetch<K extends keyof V>(key: K, fetch: () => Promise<V[K]>): Promise<V[K]> {
    const entry = this.entries[key];
    if (entry && this.clock.now() - entry.capturedAt < this.ttlMs) {
      return entry.value;
    }

    const pending: Promise<V[K]> | undefined = this.inFlight[key];
    if (pending) {
      return pending;
    }

    const generation = this.generation;
    const promise = this.fetchAndStore(key, fetch, generation);
    this.inFlight[key] = promise;
    return promise;
  }

  invalidateAll(): void {
    this.generation++;
    this.entries = {};
    this.inFlight = {};
  }

  get size(): number {
    return Object.keys(this.entries).length;
  }

  private async fetchAndStore<K extends keyof V>(
    key: K,
    fetch: () => Promise<V[K]>,
    generation: number,
  ): Promise<V[K]> {
    try {
      const value = await fetch();
      if (generation === this.generation) {
        this.entries[key] = { capturedAt: this.clock.now(), value };
      }
      return value;
    } finally {
      if (generation === this.generation) {
        delete this.inFlight[key];
      }
    }
  }
}
