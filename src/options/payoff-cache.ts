import { InvalidArgumentException } from '../common/errors/option.exceptions';

/** Milliseconds since the epoch. Injected so tests can drive expiry. */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

interface CacheEntry<T> {
  value: T;
  computedAt: number;
}

type CacheSlots<V> = { [K in keyof V]?: CacheEntry<V[K]> };

/**
 * One slot per derived value of an owning entity, each with its own timestamp.
 *
 * A read returns the stored value while its age is within the TTL, otherwise
 * it recomputes and replaces the slot in a single assignment. TTL 0 means
 * the value never expires. Promise values are stored as soon as the
 * computation starts, so concurrent readers share one in-flight lookup; a
 * rejected promise is evicted instead of being served from the cache.
 */
export class PayoffCache<V extends object> {
  private slots: CacheSlots<V> = {};

  constructor(
    readonly ttlSeconds: number,
    private readonly clock: Clock = systemClock,
  ) {
    if (!Number.isFinite(ttlSeconds) || ttlSeconds < 0) {
      throw new InvalidArgumentException(`Cache TTL must be a non-negative number of seconds, got ${ttlSeconds}`);
    }
  }

  getOrCompute<K extends keyof V>(key: K, compute: () => V[K]): V[K] {
    const now = this.clock();
    const entry = this.slots[key];
    if (entry && this.isFresh(entry, now)) {
      return entry.value;
    }

    const value = compute();
    this.slots[key] = { value, computedAt: now };

    if (value instanceof Promise) {
      void value.catch(() => this.evict(key, value));
    }
    return value;
  }

  /** True when the slot holds a value that a read would return without recomputing. */
  isCached(key: keyof V): boolean {
    const entry = this.slots[key];
    return entry !== undefined && this.isFresh(entry, this.clock());
  }

  invalidate(key: keyof V): void {
    delete this.slots[key];
  }

  invalidateAll(): void {
    this.slots = {};
  }

  private evict<K extends keyof V>(key: K, value: V[K]): void {
    if (this.slots[key]?.value === value) {
      delete this.slots[key];
    }
  }

  private isFresh(entry: CacheEntry<unknown>, now: number): boolean {
    return this.ttlSeconds === 0 || now - entry.computedAt <= this.ttlSeconds * 1000;
  }
}
