/**
 * Feed engine configuration.
 *
 * Defaults can be overridden per process through environment variables
 * (FEED_LOADING_TIMEOUT_MS, FEED_PAGE_LIMIT, FEED_DIVERSIFY) and per
 * aggregator through explicit overrides, which win over both.
 */

export interface FeedEngineConfig {
  /** How long a session may stay in the loading state without any batch */
  loadingTimeoutMs: number;
  /** Default `limit` of every query the engine issues */
  pageLimit: number;
  /** Push back bursts of consecutive items from the same author */
  diversify: boolean;
  /** Same-author run length tolerated before diversification kicks in */
  maxConsecutive: number;
}

export const DEFAULT_FEED_ENGINE_CONFIG: FeedEngineConfig = {
  loadingTimeoutMs: 10_000, // 10 seconds
  pageLimit: 50,
  diversify: false,
  maxConsecutive: 3,
};

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${key} must be a number, got "${raw}"`);
  }
  return value;
}

function readBoolean(env: Env, key: string): boolean | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return undefined;
  return raw.trim().toLowerCase() === 'true';
}

function fromEnv(env: Env): Partial<FeedEngineConfig> {
  const config: Partial<FeedEngineConfig> = {};
  const loadingTimeoutMs = readNumber(env, 'FEED_LOADING_TIMEOUT_MS');
  const pageLimit = readNumber(env, 'FEED_PAGE_LIMIT');
  const diversify = readBoolean(env, 'FEED_DIVERSIFY');
  if (loadingTimeoutMs !== undefined) config.loadingTimeoutMs = loadingTimeoutMs;
  if (pageLimit !== undefined) config.pageLimit = pageLimit;
  if (diversify !== undefined) config.diversify = diversify;
  return config;
}

function validateConfig(config: FeedEngineConfig): FeedEngineConfig {
  if (!Number.isFinite(config.loadingTimeoutMs) || config.loadingTimeoutMs <= 0) {
    throw new Error('loadingTimeoutMs must be > 0');
  }
  if (!Number.isInteger(config.pageLimit) || config.pageLimit < 1) {
    throw new Error('pageLimit must be a positive integer');
  }
  if (!Number.isInteger(config.maxConsecutive) || config.maxConsecutive < 1) {
    throw new Error('maxConsecutive must be a positive integer');
  }
  return config;
}

/**
 * Merge defaults, environment and explicit overrides into a validated config.
 *
 * @param overrides Per-aggregator settings
 * @param env Environment to read (default: process.env)
 */
export function resolveFeedEngineConfig(
  overrides: Partial<FeedEngineConfig> = {},
  env: Env = process.env
): FeedEngineConfig {
  return validateConfig({
    ...DEFAULT_FEED_ENGINE_CONFIG,
    ...fromEnv(env),
    ...overrides,
  });
}
