// ============================================
// Recency Error Codes
// ============================================

/**
 * Error codes raised by the cache packages.
 * Error code ranges:
 * - 1xxx: Configuration errors
 * - 2xxx: Request errors
 * - 3xxx: Producer errors
 * - 4xxx: Expiration policy errors
 */
export enum ErrorCode {
  // Configuration Errors (1xxx)
  CONFIG_INVALID = 1001,

  // Request Errors (2xxx)
  INVALID_KEY = 2001,
  INVALID_TTL = 2002,

  // Producer Errors (3xxx)
  PRODUCER_FAILED = 3001,
  /** A synchronous miss arrived while an async producer held the cache lock */
  CACHE_BUSY = 3002,

  // Policy Errors (4xxx)
  POLICY_FAILED = 4001,
}
