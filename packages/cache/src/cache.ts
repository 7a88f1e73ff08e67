import { CacheError, Err, ErrorCode, Logger, Ok, type Result } from "@recency/shared";
import { type Clock, systemClock } from "./clock.js";
import type { CacheEntry } from "./entry.js";
import { type LedgerHandle, RecencyLedger } from "./ledger.js";
import { type ExpirationPolicy, noExpiration, type Validity } from "./policy.js";
import { Mutex } from "./mutex.js";

export const DEFAULT_CAPACITY = 100;

/**
 * Called synchronously with each entry removed to make room for a new one.
 * Exceptions thrown here propagate to the caller of the cache operation.
 */
export type EvictionObserver<V> = (entry: CacheEntry<V>) => void;

export type Producer<V> = () => V;

export type AsyncProducer<V> = () => V | PromiseLike<V>;

export interface CacheOptions<V> {
  /** Maximum number of live entries (default: 100; non-positive values fall back to it) */
  capacity?: number;
  /** Expiration strategy shared by every key (default: never expires) */
  policy?: ExpirationPolicy;
  onEvict?: EvictionObserver<V>;
  /** Time source used for every expiry computation (default: Date.now) */
  clock?: Clock;
  /** Receives debug entries for evictions and expirations; silent when omitted */
  logger?: Logger;
  /** Attached to log entries as `context.cache` */
  name?: string;
}

export interface CacheStats {
  hits: number;
  misses: number;
  evictions: number;
  expirations: number;
  size: number;
  capacity: number;
}

type Counters = Omit<CacheStats, "size" | "capacity">;

type Lookup<V> = { status: "hit"; value: V } | { status: "miss"; expiresAt: number };

/**
 * Map a requested capacity onto a usable one: positive values are floored,
 * anything else becomes {@link DEFAULT_CAPACITY}.
 */
export function normalizeCapacity(capacity: number | undefined): number {
  if (capacity === undefined || !Number.isFinite(capacity) || capacity < 1) {
    return DEFAULT_CAPACITY;
  }
  return Math.floor(capacity);
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function emptyCounters(): Counters {
  return { hits: 0, misses: 0, evictions: 0, expirations: 0 };
}

/**
 * Capacity-bounded key/value cache with least-recently-used eviction.
 *
 * Entries are ordered in a {@link RecencyLedger} and indexed by key. A hit is
 * checked against the expiration policy (which may slide its expiry) and then
 * promoted; a miss evicts the least recently used entry when the cache is full,
 * runs the producer and stores the result as most recent.
 *
 * Both entry points share one cache-wide lock, so at most one producer runs
 * per cache. `getOrAdd` runs to completion without yielding; while a
 * `getOrAddAsync` call holds the lock it still serves hits, but a miss is
 * refused with `CACHE_BUSY` instead of running a second producer.
 *
 * @example
 * ```typescript
 * const cache = new LruCache<User>({ capacity: 500, policy: slidingExpiration(60_000) });
 * const result = cache.getOrAdd('user:42', 60_000, () => loadUser(42));
 * if (result.ok) render(result.value);
 * ```
 */
export class LruCache<V> {
  readonly capacity: number;
  readonly policy: ExpirationPolicy;
  private readonly onEvict: EvictionObserver<V>;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly index = new Map<string, LedgerHandle<CacheEntry<V>>>();
  private readonly ledger = new RecencyLedger<CacheEntry<V>>();
  private readonly mutex = new Mutex();
  private counters: Counters = emptyCounters();

  constructor(options: CacheOptions<V> = {}) {
    this.capacity = normalizeCapacity(options.capacity);
    this.policy = options.policy ?? noExpiration();
    this.onEvict = options.onEvict ?? (() => {});
    this.clock = options.clock ?? systemClock;
    this.logger = (options.logger ?? new Logger()).child(
      options.name ? { component: "lru-cache", cache: options.name } : { component: "lru-cache" }
    );
  }

  get size(): number {
    return this.index.size;
  }

  /**
   * Return the live value for `key`, or run `create` once and cache its result.
   *
   * A producer that throws yields `Err(PRODUCER_FAILED)` and nothing is stored.
   * An empty key or a NaN TTL is rejected without running the producer, and so
   * is a miss while an async producer holds the lock (`CACHE_BUSY`).
   */
  getOrAdd(key: string, ttlMs: number, create: Producer<V>): Result<V, CacheError> {
    const lookup = this.lookup(key, ttlMs);
    if (!lookup.ok) {
      return lookup;
    }
    if (lookup.value.status === "hit") {
      return Ok(lookup.value.value);
    }
    if (this.mutex.isLocked) {
      this.logger.debug("cache miss refused while locked", { key });
      return Err(
        new CacheError(`Cannot produce "${key}" while an async producer holds the cache`, ErrorCode.CACHE_BUSY, {
          context: { key },
        })
      );
    }

    this.evictOverflow();
    const { expiresAt } = lookup.value;
    let value: V;
    try {
      value = create();
    } catch (error) {
      return this.producerFailed(key, error);
    }

    this.admit(key, value, expiresAt);
    return Ok(value);
  }

  /**
   * Async counterpart of {@link getOrAdd}. Calls are serialized in arrival
   * order; eviction happens before the producer starts, and the key is
   * admitted once the producer resolves.
   */
  getOrAddAsync(key: string, ttlMs: number, create: AsyncProducer<V>): Promise<Result<V, CacheError>> {
    return this.mutex.runExclusive<Result<V, CacheError>>(() => {
      const lookup = this.lookup(key, ttlMs);
      if (!lookup.ok) {
        return lookup;
      }
      if (lookup.value.status === "hit") {
        return Ok(lookup.value.value);
      }

      this.evictOverflow();
      const { expiresAt } = lookup.value;
      const timer = this.logger.time("cache producer");
      return Promise.resolve()
        .then(create)
        .then(
          (value): Result<V, CacheError> => {
            this.logger.debug("cache producer resolved", { key, durationMs: timer.stop() });
            this.admit(key, value, expiresAt);
            return Ok(value);
          },
          (error: unknown) => this.producerFailed(key, error)
        );
    });
  }

  /**
   * Whether `key` is indexed. Neither checks the policy nor touches recency.
   */
  has(key: string): boolean {
    return this.index.has(key);
  }

  /**
   * The stored entry for `key` without a policy check or promotion.
   */
  peek(key: string): Readonly<CacheEntry<V>> | undefined {
    return this.index.get(key)?.value;
  }

  /**
   * Remove `key` without notifying the eviction observer.
   */
  delete(key: string): boolean {
    const handle = this.index.get(key);
    if (!handle) {
      return false;
    }
    this.ledger.remove(handle);
    this.index.delete(key);
    return true;
  }

  clear(): void {
    this.ledger.clear();
    this.index.clear();
  }

  /**
   * Keys from least to most recently used.
   */
  keys(): string[] {
    return Array.from(this.ledger, (entry) => entry.key);
  }

  getStats(): CacheStats {
    return { ...this.counters, size: this.size, capacity: this.capacity };
  }

  resetStats(): void {
    this.counters = emptyCounters();
  }

  /**
   * Validate the request and resolve a hit, dropping an expired entry on the way.
   * A miss carries the expiry for the entry its producer will create.
   */
  private lookup(key: string, ttlMs: number): Result<Lookup<V>, CacheError> {
    if (typeof key !== "string" || key.length === 0) {
      return Err(new CacheError("Cache key must be a non-empty string", ErrorCode.INVALID_KEY));
    }
    if (Number.isNaN(ttlMs)) {
      return Err(
        new CacheError(`TTL must be a number, got ${ttlMs}`, ErrorCode.INVALID_TTL, {
          context: { key, ttlMs },
        })
      );
    }

    const now = this.clock();
    const handle = this.index.get(key);

    if (handle) {
      let validity: Validity;
      try {
        validity = this.policy.apply(handle.value, now);
      } catch (error) {
        this.logger.warn("expiration policy failed", { key, error: describe(error) });
        return Err(
          new CacheError(`Expiration policy "${this.policy.kind}" failed`, ErrorCode.POLICY_FAILED, {
            cause: error,
            context: { key, policy: this.policy.kind },
          })
        );
      }

      if (validity === "valid") {
        this.ledger.moveToMostRecent(handle);
        this.counters.hits++;
        const hit: Lookup<V> = { status: "hit", value: handle.value.value };
        return Ok(hit);
      }

      this.ledger.remove(handle);
      this.index.delete(key);
      this.counters.expirations++;
      this.logger.debug("cache entry expired", { key, expiresAt: handle.value.expiresAt });
    }

    this.counters.misses++;
    const miss: Lookup<V> = { status: "miss", expiresAt: now + ttlMs };
    return Ok(miss);
  }

  /**
   * Store a produced value as most recent. An entry for the same key stored by
   * a producer that re-entered the cache is replaced.
   */
  private admit(key: string, value: V, expiresAt: number): void {
    const existing = this.index.get(key);
    if (existing) {
      this.ledger.remove(existing);
      this.index.delete(key);
    }
    this.evictOverflow();

    const entry: CacheEntry<V> = { key, value, expiresAt };
    this.index.set(key, this.ledger.append(entry));
  }

  private evictOverflow(): void {
    while (this.index.size >= this.capacity) {
      const entry = this.ledger.removeLeastRecent();
      if (entry === undefined) {
        return;
      }
      this.index.delete(entry.key);
      this.counters.evictions++;
      this.logger.debug("cache entry evicted", { key: entry.key });
      this.onEvict(entry);
    }
  }

  private producerFailed(key: string, error: unknown): Result<V, CacheError> {
    this.logger.warn("cache producer failed", { key, error: describe(error) });
    return Err(
      new CacheError(`Producer for "${key}" failed`, ErrorCode.PRODUCER_FAILED, {
        cause: error,
        context: { key },
      })
    );
  }
}
