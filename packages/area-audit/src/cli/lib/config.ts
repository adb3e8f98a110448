/**
 * Area Audit CLI Configuration Management
 *
 * Loads configuration from .area-auditrc (YAML) and layers it under the
 * engine's environment variables and the command-line flags.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (AREA_AUDIT_*)
 * 3. Config file (.area-auditrc or --config path)
 * 4. Default values
 *
 * Example .area-auditrc:
 * ```yaml
 * version: 1
 * cache:
 *   ttl_ms: 600000
 * lint:
 *   icon_base_url: https://static.example.org/areas
 *   stale_after_days: 180
 * output:
 *   json: false
 * ```
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import {
  loadEngineConfig,
  type EngineConfig,
  type EngineConfigOverrides,
} from '../../core/config.js';
import { ConfigError } from '../../core/errors.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface CLIConfig {
  readonly engine: EngineConfig;
  /** Enable verbose output */
  readonly verbose: boolean;
  /** Output as JSON */
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  readonly configPath?: string;
  /** Directory to start the config file search from */
  readonly cwd?: string;
  readonly env?: NodeJS.ProcessEnv;
  /** CLI flag overrides */
  readonly overrides?: {
    readonly verbose?: boolean;
    readonly json?: boolean;
    readonly engine?: EngineConfigOverrides;
  };
}

/**
 * Config file structure (YAML)
 */
const ConfigFileSchema = z
  .object({
    version: z.literal(1).optional(),
    cache: z
      .object({
        ttl_ms: z.number().optional(),
        max_entries: z.number().optional(),
        sweep_interval_ms: z.number().optional(),
      })
      .strict()
      .optional(),
    lint: z
      .object({
        icon_base_url: z.string().optional(),
        stale_after_days: z.number().optional(),
        ruleset_version: z.union([z.string(), z.number()]).transform(String).optional(),
      })
      .strict()
      .optional(),
    output: z
      .object({
        json: z.boolean().optional(),
        verbose: z.boolean().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Standard config file names to search for
 */
export const CONFIG_FILE_NAMES = [
  '.area-auditrc',
  '.area-auditrc.yaml',
  '.area-auditrc.yml',
  '.area-auditrc.json',
] as const;

/**
 * Find config file in the start directory or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = resolve(dir, '..');
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

/**
 * Read and validate a config file. YAML is a superset of JSON, so one parser
 * covers every supported extension.
 *
 * @throws ConfigError when the file cannot be parsed or has unknown keys
 */
export function parseConfigFile(filePath: string): ConfigFile {
  let content: unknown;
  try {
    content = parseYaml(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(
      `Cannot read config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  // An empty file parses to null
  const result = ConfigFileSchema.safeParse(content ?? {});
  if (!result.success) {
    const issues = result.error.errors.map(
      (issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`
    );
    throw new ConfigError(`Invalid config file ${filePath}: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

function toEngineOverrides(file: ConfigFile): EngineConfigOverrides {
  return {
    cache: {
      ttlMs: file.cache?.ttl_ms,
      maxEntries: file.cache?.max_entries,
      sweepIntervalMs: file.cache?.sweep_interval_ms,
    },
    lint: {
      iconBaseUrl: file.lint?.icon_base_url,
      staleAfterDays: file.lint?.stale_after_days,
      ruleSetVersion: file.lint?.ruleset_version,
    },
  };
}

function envBool(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Load and merge configuration from all sources
 *
 * @throws ConfigError on a missing explicit file or invalid values
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<CLIConfig> {
  const env = options.env ?? process.env;
  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  if (options.configPath) {
    configPath = resolve(options.configPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    fileConfig = parseConfigFile(configPath);
  } else if (env.AREA_AUDIT_CONFIG) {
    configPath = resolve(env.AREA_AUDIT_CONFIG);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    configPath = findConfigFile(options.cwd ?? process.cwd());
    if (configPath) {
      fileConfig = parseConfigFile(configPath);
    }
  }

  const engine = loadEngineConfig(
    options.overrides?.engine ?? {},
    env,
    toEngineOverrides(fileConfig)
  );

  return {
    engine,
    verbose:
      options.overrides?.verbose ??
      envBool(env.AREA_AUDIT_VERBOSE) ??
      fileConfig.output?.verbose ??
      false,
    json: options.overrides?.json ?? envBool(env.AREA_AUDIT_JSON) ?? fileConfig.output?.json ?? false,
    configPath,
  };
}
