/**
 * Per-command setup shared by every subcommand: configuration, logger and
 * the records file.
 */

import { readFile } from 'node:fs/promises';
import { loadConfig, type CLIConfig } from './config.js';
import { createCLILogger, type CLILogger } from './logger.js';

/**
 * Options registered on the root program
 */
export type GlobalOptions = {
  readonly json?: boolean;
  readonly verbose?: boolean;
  readonly config?: string;
};

export interface CommandContext {
  readonly config: CLIConfig;
  readonly logger: CLILogger;
}

/**
 * Thrown when the records file is unreadable or not a JSON array
 */
export class InputFileError extends Error {
  public readonly name = 'InputFileError' as const;

  constructor(
    message: string,
    public readonly filePath: string
  ) {
    super(message);
    Object.setPrototypeOf(this, InputFileError.prototype);
  }
}

export function isInputFileError(error: unknown): error is InputFileError {
  return error instanceof InputFileError;
}

/**
 * @throws ConfigError when configuration is invalid
 */
export async function createCommandContext(
  options: GlobalOptions,
  env: NodeJS.ProcessEnv = process.env
): Promise<CommandContext> {
  const config = await loadConfig({
    configPath: options.config,
    env,
    overrides: {
      verbose: options.verbose,
      json: options.json,
    },
  });

  const logger = createCLILogger({
    level: config.verbose ? 'debug' : 'warn',
    json: config.json,
  });

  if (config.configPath) {
    logger.debug('Loaded config file', { path: config.configPath });
  }

  return { config, logger };
}

/**
 * Read a JSON array of raw area records
 */
export async function readRecordsFile(filePath: string): Promise<unknown[]> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new InputFileError(
      `Cannot read ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new InputFileError(
      `Invalid JSON in ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath
    );
  }

  if (!Array.isArray(parsed)) {
    throw new InputFileError(`${filePath} must contain a JSON array of area records`, filePath);
  }
  return parsed;
}
