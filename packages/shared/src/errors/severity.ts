/**
 * Error Severity Types
 *
 * @module @recency/shared/errors/severity
 */

import { ErrorCode } from "./codes.js";

/**
 * Error severity levels that determine handling strategy.
 * - recoverable: the same request may succeed if retried
 * - user_action: the caller passed something that has to be fixed
 * - fatal: the cache cannot satisfy the request
 */
export type ErrorSeverity = "recoverable" | "user_action" | "fatal";

export function inferSeverity(code: ErrorCode): ErrorSeverity {
  switch (code) {
    case ErrorCode.PRODUCER_FAILED:
    case ErrorCode.CACHE_BUSY:
      return "recoverable";

    case ErrorCode.CONFIG_INVALID:
    case ErrorCode.INVALID_KEY:
    case ErrorCode.INVALID_TTL:
      return "user_action";

    case ErrorCode.POLICY_FAILED:
      return "fatal";

    default:
      return "fatal";
  }
}
