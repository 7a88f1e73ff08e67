// ============================================
// Recency Cache
// ============================================

export {
  type AsyncProducer,
  type CacheOptions,
  type CacheStats,
  DEFAULT_CAPACITY,
  type EvictionObserver,
  LruCache,
  normalizeCapacity,
  type Producer,
} from "./cache.js";
export { type Clock, systemClock } from "./clock.js";
export {
  type CacheConfig,
  type CacheConfigInput,
  CacheConfigSchema,
  type CacheExtras,
  createCacheFromConfig,
  createPolicy,
  type LoadCacheConfigOptions,
  loadCacheConfig,
  LogLevelSchema,
  parseEnvConfig,
  PolicyKindSchema,
} from "./config.js";
export type { CacheEntry } from "./entry.js";
export { type LedgerHandle, RecencyLedger } from "./ledger.js";
export { Mutex, type MutexRelease } from "./mutex.js";
export {
  type ExpirationPolicy,
  type ExpirationPolicyKind,
  FixedExpirationPolicy,
  fixedExpiration,
  NoExpirationPolicy,
  noExpiration,
  SlidingExpirationPolicy,
  slidingExpiration,
  type Validity,
} from "./policy.js";
