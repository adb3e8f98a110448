/**
 * Validate Command
 *
 * Check every record in a JSON file against its area schema.
 *
 * Usage:
 *   area-audit validate <file> [options]
 *
 * Options:
 *   --json             Output as JSON
 *   -v, --verbose      Also list valid records
 *
 * Exit codes: 0 all valid, 2 any invalid record, 3 configuration error.
 */

import type { Command } from 'commander';
import { isConfigError } from '../../core/errors.js';
import type { ValidationError } from '../../core/types/index.js';
import { parseAreaRecord } from '../../schemas/raw-record.js';
import { validateAreaRecord } from '../../validators/schema-validator.js';
import {
  createCommandContext,
  isInputFileError,
  readRecordsFile,
  type CommandContext,
  type GlobalOptions,
} from '../lib/context.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';
import { COLORS } from '../lib/logger.js';

export interface RecordValidation {
  readonly index: number;
  readonly areaId: string | null;
  readonly areaName: string | null;
  readonly valid: boolean;
  readonly errors: readonly ValidationError[];
}

export interface ValidateReport {
  readonly file: string;
  readonly total: number;
  readonly valid: number;
  readonly invalid: number;
  readonly records: readonly RecordValidation[];
}

export function registerValidateCommand(program: Command): void {
  program
    .command('validate <file>')
    .description('Validate area records against their schema')
    .action(async (file: string, _options: unknown, command: Command) => {
      process.exitCode = await executeValidate(file, command.optsWithGlobals<GlobalOptions>());
    });
}

/**
 * Validate every record in `file`
 */
export function validateRecords(file: string, rawRecords: readonly unknown[]): ValidateReport {
  const records = rawRecords.map((input, index): RecordValidation => {
    const parsed = parseAreaRecord(input);
    if (!parsed.success) {
      return { index, areaId: null, areaName: null, valid: false, errors: parsed.error };
    }

    const name = parsed.data.tags.name;
    const result = validateAreaRecord(parsed.data);
    return {
      index,
      areaId: parsed.data.id,
      areaName: typeof name === 'string' ? name : null,
      valid: result.success,
      errors: result.success ? [] : result.error,
    };
  });

  const valid = records.filter((record) => record.valid).length;
  return { file, total: records.length, valid, invalid: records.length - valid, records };
}

export async function executeValidate(
  file: string,
  options: GlobalOptions,
  env: NodeJS.ProcessEnv = process.env
): Promise<ExitCode> {
  let context: CommandContext;
  try {
    context = await createCommandContext(options, env);
  } catch (error) {
    if (isConfigError(error)) {
      console.error(`Configuration error: ${error.message}`);
      return EXIT_CODES.CONFIG_ERROR;
    }
    throw error;
  }

  const { config, logger } = context;
  logger.commandStart('validate', { file });

  let rawRecords: unknown[];
  try {
    rawRecords = await readRecordsFile(file);
  } catch (error) {
    if (isInputFileError(error)) {
      logger.error(error.message);
      logger.commandEnd(false);
      return EXIT_CODES.VALIDATION_ERRORS;
    }
    throw error;
  }

  const report = validateRecords(file, rawRecords);

  if (config.json) {
    const records = config.verbose ? report.records : report.records.filter((r) => !r.valid);
    console.log(JSON.stringify({ ...report, records }, null, 2));
  } else {
    printValidateReport(report, config.verbose);
  }

  logger.commandEnd(true, { total: report.total, invalid: report.invalid });
  return report.invalid > 0 ? EXIT_CODES.VALIDATION_ERRORS : EXIT_CODES.SUCCESS;
}

function label(record: RecordValidation): string {
  const id = record.areaId ?? `record[${record.index}]`;
  return record.areaName ? `${id} (${record.areaName})` : id;
}

function printValidateReport(report: ValidateReport, verbose: boolean): void {
  for (const record of report.records) {
    if (record.valid) {
      if (verbose) {
        console.log(`${COLORS.green}✓${COLORS.reset} ${label(record)}`);
      }
      continue;
    }

    console.log(`${COLORS.red}✗${COLORS.reset} ${label(record)}`);
    for (const error of record.errors) {
      console.log(`    ${error.field} [${error.kind}] ${error.message}`);
    }
  }

  console.log('');
  console.log(`${report.total} records: ${report.valid} valid, ${report.invalid} invalid`);
}
