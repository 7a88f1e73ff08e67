import { CacheError, createLogger, Err, ErrorCode, Ok, type Result } from "@recency/shared";
import { z } from "zod";
import { type CacheOptions, LruCache, normalizeCapacity } from "./cache.js";
import {
  type ExpirationPolicy,
  fixedExpiration,
  noExpiration,
  slidingExpiration,
} from "./policy.js";

// ============================================
// Cache Configuration Schema
// ============================================

export const PolicyKindSchema = z.enum(["none", "fixed", "sliding"]);

export const LogLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal"]);

export const CacheConfigSchema = z
  .object({
    /** Non-positive or missing capacities become the default of 100 */
    capacity: z.number().int().optional().transform(normalizeCapacity),
    policy: PolicyKindSchema.optional().default("none"),
    /** Window applied on every hit by the sliding policy */
    slidingTtlMs: z.number().finite().nonnegative().optional(),
    logLevel: LogLevelSchema.optional().default("info"),
  })
  .superRefine((config, ctx) => {
    if (config.policy === "sliding" && config.slidingTtlMs === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["slidingTtlMs"],
        message: 'Required when policy is "sliding"',
      });
    }
  });

export type CacheConfig = z.output<typeof CacheConfigSchema>;
export type CacheConfigInput = z.input<typeof CacheConfigSchema>;

// ============================================
// Environment Variables
// ============================================

/**
 * Environment variable to config key mappings
 */
const ENV_MAPPINGS = {
  RECENCY_CACHE_CAPACITY: "capacity",
  RECENCY_CACHE_POLICY: "policy",
  RECENCY_CACHE_SLIDING_TTL_MS: "slidingTtlMs",
  RECENCY_LOG_LEVEL: "logLevel",
} as const satisfies Record<string, keyof CacheConfigInput>;

const NUMERIC_KEYS: ReadonlySet<keyof CacheConfigInput> = new Set<keyof CacheConfigInput>([
  "capacity",
  "slidingTtlMs",
]);

const NUMERIC_PATTERN = /^-?\d+(\.\d+)?$/;

/**
 * Coerce a raw variable: numeric keys become numbers when they look like one,
 * enum keys are lower-cased. Anything else is left for the schema to reject.
 */
function coerceValue(key: keyof CacheConfigInput, raw: string): unknown {
  const value = raw.trim();
  if (NUMERIC_KEYS.has(key)) {
    return NUMERIC_PATTERN.test(value) ? Number(value) : value;
  }
  return value.toLowerCase();
}

/**
 * Read cache settings from environment variables. Unset and empty
 * variables are skipped.
 */
export function parseEnvConfig(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  for (const [envKey, configKey] of Object.entries(ENV_MAPPINGS)) {
    const raw = env[envKey];
    if (raw === undefined || raw.trim() === "") {
      continue;
    }
    config[configKey] = coerceValue(configKey, raw);
  }

  return config;
}

// ============================================
// Loader
// ============================================

export interface LoadCacheConfigOptions {
  /** Environment to read (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Values applied over the environment (highest priority) */
  overrides?: CacheConfigInput;
  /** Skip loading environment variables */
  skipEnv?: boolean;
}

function definedEntries(values: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

/**
 * Merge environment and overrides, then validate and apply defaults.
 *
 * @example
 * ```typescript
 * const config = loadCacheConfig({ overrides: { capacity: 500 } });
 * if (!config.ok) {
 *   console.error(config.error.message);
 *   process.exit(1);
 * }
 * const cache = createCacheFromConfig<string>(config.value);
 * ```
 */
export function loadCacheConfig(options: LoadCacheConfigOptions = {}): Result<CacheConfig, CacheError> {
  const { env = process.env, overrides = {}, skipEnv = false } = options;

  const merged = {
    ...(skipEnv ? {} : parseEnvConfig(env)),
    ...definedEntries(overrides),
  };

  const parseResult = CacheConfigSchema.safeParse(merged);

  if (!parseResult.success) {
    const issues = parseResult.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    return Err(
      new CacheError(`Invalid cache configuration: ${issues.join("; ")}`, ErrorCode.CONFIG_INVALID, {
        cause: parseResult.error,
        context: { issues },
      })
    );
  }

  return Ok(parseResult.data);
}

// ============================================
// Factories
// ============================================

/**
 * Build the expiration policy named by a validated config.
 */
export function createPolicy(config: Pick<CacheConfig, "policy" | "slidingTtlMs">): ExpirationPolicy {
  switch (config.policy) {
    case "none":
      return noExpiration();
    case "fixed":
      return fixedExpiration();
    case "sliding":
      if (config.slidingTtlMs === undefined) {
        throw new CacheError('slidingTtlMs is required when policy is "sliding"', ErrorCode.CONFIG_INVALID);
      }
      return slidingExpiration(config.slidingTtlMs);
  }
}

export type CacheExtras<V> = Pick<CacheOptions<V>, "onEvict" | "clock" | "logger" | "name">;

/**
 * Build a cache from a validated config. Without an explicit logger the cache
 * logs to the console at the configured level.
 */
export function createCacheFromConfig<V>(config: CacheConfig, extras: CacheExtras<V> = {}): LruCache<V> {
  return new LruCache<V>({
    ...extras,
    capacity: config.capacity,
    policy: createPolicy(config),
    logger: extras.logger ?? createLogger({ name: "recency", level: config.logLevel }),
  });
}
