/**
 * Registers the area-audit subcommands:
 * - validate: schema validation only
 * - lint: validation, lint rules and corpus checks
 */

import type { Command } from 'commander';
import { registerLintCommand } from './lint.js';
import { registerValidateCommand } from './validate.js';

export function registerCommands(program: Command): void {
  registerValidateCommand(program);
  registerLintCommand(program);
}
