/**
 * Area Audit Engine Configuration
 *
 * Defaults for the lint cache and the built-in lint rules, with environment
 * overrides. Every value is validated with zod before the engine sees it.
 *
 * Environment variables:
 * - AREA_AUDIT_CACHE_TTL_MS
 * - AREA_AUDIT_CACHE_MAX_ENTRIES
 * - AREA_AUDIT_CACHE_SWEEP_INTERVAL_MS (0 disables the sweeper)
 * - AREA_AUDIT_ICON_BASE_URL
 * - AREA_AUDIT_STALE_AFTER_DAYS
 * - AREA_AUDIT_RULESET_VERSION
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';

// ============================================================================
// Types
// ============================================================================

export interface CacheConfig {
  /** Entries older than this are reclaimed */
  readonly ttlMs: number;
  /** LRU bound on the number of cached areas */
  readonly maxEntries: number;
  /** Background prune interval; 0 disables it */
  readonly sweepIntervalMs: number;
}

export interface LintConfig {
  /** Base URL icons are expected to live under */
  readonly iconBaseUrl: string;
  /** Age after which a verification is stale */
  readonly staleAfterDays: number;
  /** Bumped whenever rule behaviour changes; part of the cache identity */
  readonly ruleSetVersion: string;
}

export interface EngineConfig {
  readonly cache: CacheConfig;
  readonly lint: LintConfig;
}

export interface EngineConfigOverrides {
  readonly cache?: Partial<CacheConfig>;
  readonly lint?: Partial<LintConfig>;
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  cache: {
    ttlMs: 60 * 60 * 1000,
    maxEntries: 50_000,
    sweepIntervalMs: 5 * 60 * 1000,
  },
  lint: {
    iconBaseUrl: 'https://static.btcmap.org/images/areas',
    staleAfterDays: 365,
    ruleSetVersion: '1',
  },
};

// ============================================================================
// Schema
// ============================================================================

const EngineConfigSchema = z.object({
  cache: z.object({
    ttlMs: z.number().int().positive('cache.ttlMs must be positive'),
    maxEntries: z.number().int().positive('cache.maxEntries must be positive'),
    sweepIntervalMs: z.number().int().nonnegative('cache.sweepIntervalMs must be >= 0'),
  }),
  lint: z.object({
    iconBaseUrl: z
      .string()
      .url('lint.iconBaseUrl must be a URL')
      .transform((url) => url.replace(/\/+$/, '')),
    staleAfterDays: z.number().int().positive('lint.staleAfterDays must be positive'),
    ruleSetVersion: z.string().min(1, 'lint.ruleSetVersion cannot be empty'),
  }),
});

// ============================================================================
// Loading
// ============================================================================

function envNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  // NaN is left for the schema to reject with a readable message
  return Number(value);
}

function envString(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

/**
 * Resolve configuration: explicit overrides > environment > file values > defaults
 *
 * @param file - Values read from a config file, if any
 * @throws ConfigError when the merged values fail validation
 */
export function loadEngineConfig(
  overrides: EngineConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
  file: EngineConfigOverrides = {}
): EngineConfig {
  const defaults = DEFAULT_ENGINE_CONFIG;

  const merged = {
    cache: {
      ttlMs:
        overrides.cache?.ttlMs ??
        envNumber(env.AREA_AUDIT_CACHE_TTL_MS) ??
        file.cache?.ttlMs ??
        defaults.cache.ttlMs,
      maxEntries:
        overrides.cache?.maxEntries ??
        envNumber(env.AREA_AUDIT_CACHE_MAX_ENTRIES) ??
        file.cache?.maxEntries ??
        defaults.cache.maxEntries,
      sweepIntervalMs:
        overrides.cache?.sweepIntervalMs ??
        envNumber(env.AREA_AUDIT_CACHE_SWEEP_INTERVAL_MS) ??
        file.cache?.sweepIntervalMs ??
        defaults.cache.sweepIntervalMs,
    },
    lint: {
      iconBaseUrl:
        overrides.lint?.iconBaseUrl ??
        envString(env.AREA_AUDIT_ICON_BASE_URL) ??
        file.lint?.iconBaseUrl ??
        defaults.lint.iconBaseUrl,
      staleAfterDays:
        overrides.lint?.staleAfterDays ??
        envNumber(env.AREA_AUDIT_STALE_AFTER_DAYS) ??
        file.lint?.staleAfterDays ??
        defaults.lint.staleAfterDays,
      ruleSetVersion:
        overrides.lint?.ruleSetVersion ??
        envString(env.AREA_AUDIT_RULESET_VERSION) ??
        file.lint?.ruleSetVersion ??
        defaults.lint.ruleSetVersion,
    },
  };

  const result = EngineConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.errors.map((issue) => issue.message);
    throw new ConfigError(`Invalid engine configuration: ${issues.join('; ')}`, issues);
  }

  return result.data;
}
