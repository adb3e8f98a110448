#!/usr/bin/env tsx
/**
 * Area Audit CLI Entry Point
 *
 * Validates and lints area record exports from the command line.
 *
 * @module area-audit-cli
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { registerCommands } from '../src/cli/commands/index.js';
import { EXIT_CODES } from '../src/cli/lib/exit-codes.js';

export { EXIT_CODES, type ExitCode } from '../src/cli/lib/exit-codes.js';

// ============================================================================
// CLI Setup
// ============================================================================

function getVersion(): string {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
      return typeof packageJson.version === 'string' ? packageJson.version : '0.0.0';
    }
    return '0.0.0';
  } catch (error) {
    console.error(
      `Could not read package version: ${error instanceof Error ? error.message : String(error)}`
    );
    return '0.0.0';
  }
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('area-audit')
    .description('Validate and lint community and country area records')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .area-auditrc)');

  registerCommands(program);

  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(EXIT_CODES.VALIDATION_ERRORS);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.VALIDATION_ERRORS);
});
