// ============================================
// Recency Shared
// ============================================

export {
  type CacheErrorOptions,
  CacheError,
  ErrorCode,
  type ErrorSeverity,
  inferSeverity,
  isCacheError,
} from "./errors/index.js";
export {
  type ConsoleTransportOptions,
  ConsoleTransport,
  type CreateLoggerOptions,
  createLogger,
  type JsonTransportOptions,
  JsonTransport,
  LOG_LEVEL_COLORS,
  LOG_LEVEL_PRIORITY,
  type LogEntry,
  Logger,
  type LoggerOptions,
  type LogLevel,
  type LogTransport,
  type TimerResult,
} from "./logger/index.js";
export type { ErrResult, OkResult, Result } from "./types/result.js";
export {
  Err,
  isErr,
  isOk,
  map,
  mapErr,
  Ok,
  tryCatch,
  tryCatchAsync,
  unwrap,
  unwrapOr,
} from "./types/result.js";
