/**
 * Area Audit CLI Logging
 *
 * JSON lines for machine consumption, coloured single lines for interactive
 * use. Tracks the running command and its duration. Implements EngineLogger
 * so the engine can log through it during a CLI run.
 *
 * @module cli/lib/logger
 */

import type { EngineLogger, LogLevel, LogMetadata } from '../../core/utils/logger.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Structured log entry for JSON output
 */
export interface StructuredLogEntry {
  readonly timestamp: string;
  readonly level: LogLevel;
  readonly message: string;
  readonly command?: string;
  readonly duration_ms?: number;
  readonly [key: string]: unknown;
}

export interface CLILoggerConfig {
  /** Minimum log level to output */
  readonly level: LogLevel;
  /** Output as JSON */
  readonly json: boolean;
  readonly service?: string;
}

// ============================================================================
// Constants
// ============================================================================

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * ANSI color codes for terminal output
 */
export const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: COLORS.gray,
  info: COLORS.blue,
  warn: COLORS.yellow,
  error: COLORS.red,
};

const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: 'DEBUG',
  info: 'INFO ',
  warn: 'WARN ',
  error: 'ERROR',
};

// ============================================================================
// CLI Logger Class
// ============================================================================

export class CLILogger implements EngineLogger {
  private readonly config: CLILoggerConfig;
  private startTime: number;
  private commandContext: string | null = null;

  constructor(config: CLILoggerConfig) {
    this.config = {
      service: 'area-audit',
      ...config,
    };
    this.startTime = Date.now();
  }

  get json(): boolean {
    return this.config.json;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }

  private formatJson(level: LogLevel, message: string, metadata?: LogMetadata): string {
    const entry: StructuredLogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(this.config.service !== undefined && { service: this.config.service }),
      ...(this.commandContext !== null && { command: this.commandContext }),
      ...(metadata && Object.keys(metadata).length > 0 ? metadata : {}),
    };
    return JSON.stringify(entry);
  }

  private formatHuman(level: LogLevel, message: string, metadata?: LogMetadata): string {
    let line = `${COLORS.dim}${new Date().toISOString()}${COLORS.reset} `;
    line += `${LEVEL_COLORS[level]}${LEVEL_LABELS[level]}${COLORS.reset} `;
    line += message;

    if (metadata && Object.keys(metadata).length > 0) {
      const metaStr = Object.entries(metadata)
        .map(([key, value]) => {
          const valueStr = typeof value === 'object' ? JSON.stringify(value) : String(value);
          return `${COLORS.cyan}${key}${COLORS.reset}=${valueStr}`;
        })
        .join(' ');
      line += ` ${COLORS.dim}(${metaStr})${COLORS.reset}`;
    }

    return line;
  }

  /**
   * Log lines go to stderr so stdout carries only command output
   */
  private log(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog(level)) return;

    const formatted = this.config.json
      ? this.formatJson(level, message, metadata)
      : this.formatHuman(level, message, metadata);

    console.error(formatted);
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.log('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.log('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.log('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.log('error', message, metadata);
  }

  /**
   * Set command context and restart the duration timer
   */
  commandStart(command: string, options?: LogMetadata): void {
    this.commandContext = command;
    this.startTime = Date.now();
    this.debug(`Starting ${command}`, options);
  }

  commandEnd(success: boolean, metadata?: LogMetadata): void {
    const baseMetadata = { duration_ms: Date.now() - this.startTime, ...metadata };

    if (success) {
      this.debug('Command completed', baseMetadata);
    } else {
      this.error('Command failed', baseMetadata);
    }
  }

  /**
   * Print rows as an aligned table (JSON array in JSON mode)
   */
  table(data: readonly Record<string, unknown>[], columns?: readonly string[]): void {
    if (this.config.json) {
      console.log(JSON.stringify(data));
      return;
    }

    const first = data[0];
    if (first === undefined) {
      console.log('No data to display');
      return;
    }

    const cols = columns ?? Object.keys(first);
    const cell = (row: Record<string, unknown>, col: string): string => String(row[col] ?? '');
    const widths = cols.map((col) => Math.max(col.length, ...data.map((row) => cell(row, col).length)));

    console.log(cols.map((col, i) => col.padEnd(widths[i] ?? 0)).join(' | '));
    console.log(widths.map((width) => '-'.repeat(width)).join('-+-'));
    for (const row of data) {
      console.log(cols.map((col, i) => cell(row, col).padEnd(widths[i] ?? 0)).join(' | '));
    }
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

export function createCLILogger(config: Partial<CLILoggerConfig> = {}): CLILogger {
  return new CLILogger({
    level: config.level ?? 'info',
    json: config.json ?? false,
    service: config.service ?? 'area-audit',
  });
}
