import { CacheError, ErrorCode } from "@recency/shared";
import type { CacheEntry } from "./entry.js";

/**
 * Outcome of checking a found entry against the active policy.
 */
export type Validity = "valid" | "expired";

export type ExpirationPolicyKind = "none" | "fixed" | "sliding";

/**
 * Expiry is exclusive of the boundary instant: an entry is stale at `expiresAt`.
 */
function isExpired(entry: CacheEntry<unknown>, now: number): boolean {
  return now >= entry.expiresAt;
}

/**
 * Entries never expire; `expiresAt` is left untouched.
 */
export class NoExpirationPolicy {
  readonly kind = "none";

  apply(_entry: CacheEntry<unknown>, _now: number): Validity {
    return "valid";
  }
}

/**
 * Entries expire at the absolute instant set when they were created.
 */
export class FixedExpirationPolicy {
  readonly kind = "fixed";

  apply(entry: CacheEntry<unknown>, now: number): Validity {
    return isExpired(entry, now) ? "expired" : "valid";
  }
}

/**
 * Every successful check pushes the entry's expiry to `now + ttlMs`.
 */
export class SlidingExpirationPolicy {
  readonly kind = "sliding";
  readonly ttlMs: number;

  constructor(ttlMs: number) {
    if (!Number.isFinite(ttlMs) || ttlMs < 0) {
      throw new CacheError(
        `Sliding expiration TTL must be a non-negative number, got ${ttlMs}`,
        ErrorCode.INVALID_TTL,
        { context: { ttlMs } }
      );
    }
    this.ttlMs = ttlMs;
  }

  apply(entry: CacheEntry<unknown>, now: number): Validity {
    if (isExpired(entry, now)) {
      return "expired";
    }
    entry.expiresAt = now + this.ttlMs;
    return "valid";
  }
}

/**
 * The closed set of expiration strategies a cache can run with.
 * One instance is shared by every key of a cache.
 */
export type ExpirationPolicy = NoExpirationPolicy | FixedExpirationPolicy | SlidingExpirationPolicy;

export function noExpiration(): NoExpirationPolicy {
  return new NoExpirationPolicy();
}

export function fixedExpiration(): FixedExpirationPolicy {
  return new FixedExpirationPolicy();
}

/**
 * @throws CacheError with `INVALID_TTL` when `ttlMs` is negative or not finite
 */
export function slidingExpiration(ttlMs: number): SlidingExpirationPolicy {
  return new SlidingExpirationPolicy(ttlMs);
}
