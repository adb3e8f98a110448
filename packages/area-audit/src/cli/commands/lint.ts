/**
 * Lint Command
 *
 * Validate and lint every record in a JSON file, including corpus-wide checks
 * (url_alias clashes) and country derivation.
 *
 * Usage:
 *   area-audit lint <file> [options]
 *
 * Options:
 *   --rule <id>          Only report this rule
 *   --severity <level>   Only report error|warning|info
 *   --type <type>        Only areas of this type (community|country)
 *   --country <id>       Only areas inside this country
 *   --tag <filter>       Tag filter, `key` or `key=value` (`*` wildcard); repeatable
 *   --include-deleted    Include soft-deleted areas
 *   --all                Include areas without issues
 *
 * Exit codes: 0 no issues, 1 issues found, 2 invalid records, 3 bad options
 * or configuration.
 */

import type { Command } from 'commander';
import {
  URL_ALIAS_CLASH_RULE,
  type AreaAuditResult,
} from '../../audit/corpus-auditor.js';
import {
  filterResults,
  summarizeResults,
  type AuditSummary,
  type ResultFilters,
} from '../../audit/report-filters.js';
import { isConfigError } from '../../core/errors.js';
import { AREA_TYPES, isAreaType, isSeverity } from '../../core/types/index.js';
import { createAuditEngine } from '../../engine.js';
import {
  createCommandContext,
  isInputFileError,
  readRecordsFile,
  type CommandContext,
  type GlobalOptions,
} from '../lib/context.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';
import type { CLILogger } from '../lib/logger.js';

export type LintOptions = GlobalOptions & {
  readonly rule?: string;
  readonly severity?: string;
  readonly type?: string;
  readonly country?: string;
  readonly tag?: readonly string[];
  readonly includeDeleted?: boolean;
  readonly all?: boolean;
};

export interface LintDependencies {
  readonly now?: () => Date;
  readonly env?: NodeJS.ProcessEnv;
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function registerLintCommand(program: Command): void {
  program
    .command('lint <file>')
    .description('Lint area records and report issues')
    .option('--rule <id>', 'Only report this rule')
    .option('--severity <level>', 'Only report issues of this severity (error|warning|info)')
    .option('--type <type>', 'Only areas of this type (community|country)')
    .option('--country <id>', 'Only areas inside this country')
    .option('--tag <filter>', 'Tag filter: key or key=value, * as wildcard (repeatable)', collect)
    .option('--include-deleted', 'Include soft-deleted areas')
    .option('--all', 'Include areas without issues')
    .action(async (file: string, _options: unknown, command: Command) => {
      process.exitCode = await executeLint(file, command.optsWithGlobals<LintOptions>());
    });
}

/**
 * Parse `key` / `key=value` tag filters
 */
export function parseTagFilters(filters: readonly string[]): Record<string, string | null> {
  const parsed: Record<string, string | null> = {};
  for (const filter of filters) {
    const separator = filter.indexOf('=');
    if (separator === -1) {
      parsed[filter.trim()] = null;
    } else {
      parsed[filter.slice(0, separator).trim()] = filter.slice(separator + 1);
    }
  }
  return parsed;
}

export async function executeLint(
  file: string,
  options: LintOptions,
  deps: LintDependencies = {}
): Promise<ExitCode> {
  let context: CommandContext;
  try {
    context = await createCommandContext(options, deps.env);
  } catch (error) {
    if (isConfigError(error)) {
      console.error(`Configuration error: ${error.message}`);
      return EXIT_CODES.CONFIG_ERROR;
    }
    throw error;
  }

  const { config, logger } = context;
  logger.commandStart('lint', { file });

  const engine = createAuditEngine(config.engine, { logger, now: deps.now });
  const knownRules = [...engine.ruleSet.rules().map((rule) => rule.id), URL_ALIAS_CLASH_RULE.id];

  if (options.rule !== undefined && !knownRules.includes(options.rule)) {
    console.error(`Unknown rule "${options.rule}". Known rules: ${knownRules.join(', ')}`);
    return EXIT_CODES.CONFIG_ERROR;
  }
  if (options.severity !== undefined && !isSeverity(options.severity)) {
    console.error(`Unknown severity "${options.severity}". Use error, warning or info`);
    return EXIT_CODES.CONFIG_ERROR;
  }
  if (options.type !== undefined && !isAreaType(options.type)) {
    console.error(`Unknown area type "${options.type}". Use ${AREA_TYPES.join(' or ')}`);
    return EXIT_CODES.CONFIG_ERROR;
  }

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

  const report = await engine.auditor.audit(rawRecords);
  engine.dispose();

  const filters: ResultFilters = {
    ruleId: options.rule,
    severity: isSeverity(options.severity) ? options.severity : undefined,
    areaType: options.type,
    countryId: options.country,
    includeDeleted: options.includeDeleted ?? false,
    ...(options.tag !== undefined && { tags: parseTagFilters(options.tag) }),
  };

  const results = filterResults(report.results, { ...filters, issuesOnly: !options.all });
  const summary = summarizeResults(report.results, filters);

  if (config.json) {
    console.log(
      JSON.stringify({ file, auditedAt: report.auditedAt, summary, results: results.map(toOutput) }, null, 2)
    );
  } else {
    printLintReport(results, summary, logger);
  }

  logger.commandEnd(true, { areas: summary.totalAreas, issues: summary.totalIssues });

  if (summary.invalidAreas > 0) {
    return EXIT_CODES.VALIDATION_ERRORS;
  }
  return results.some((result) => result.issues.length > 0) ? EXIT_CODES.ISSUES : EXIT_CODES.SUCCESS;
}

/**
 * Result without its tags; geometries make them too large to print
 */
function toOutput({ tags: _tags, ...result }: AreaAuditResult): Omit<AreaAuditResult, 'tags'> {
  return result;
}

function printLintReport(
  results: readonly AreaAuditResult[],
  summary: AuditSummary,
  logger: CLILogger
): void {
  const rows = results.flatMap((result) =>
    result.issues.map((issue) => ({
      id: result.areaId,
      name: result.areaName,
      country: result.countryName ?? '',
      severity: issue.severity,
      rule: issue.ruleId,
      message: issue.message,
    }))
  );

  if (rows.length > 0) {
    logger.table(rows, ['id', 'name', 'country', 'severity', 'rule', 'message']);
    console.log('');
  }

  const bySeverity = summary.issuesBySeverity;
  console.log(
    `${summary.totalAreas} areas checked, ${summary.areasWithIssues} with issues: ` +
      `${bySeverity.error} errors, ${bySeverity.warning} warnings, ${bySeverity.info} info`
  );
  if (summary.invalidAreas > 0) {
    console.log(`${summary.invalidAreas} areas failed validation; run "area-audit validate" for details`);
  }
}
