/**
 * One cached item.
 *
 * `key` and `value` are fixed at creation; `expiresAt` (epoch ms) may be moved
 * by the active expiration policy on a hit.
 */
export interface CacheEntry<V> {
  readonly key: string;
  readonly value: V;
  expiresAt: number;
}
