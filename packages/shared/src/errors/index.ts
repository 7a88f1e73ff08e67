export { type CacheErrorOptions, CacheError, isCacheError } from "./cache-error.js";
export { ErrorCode } from "./codes.js";
export { type ErrorSeverity, inferSeverity } from "./severity.js";
