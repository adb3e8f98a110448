/**
 * Apply a rule's autofix and re-validate the corrected record
 */

import { AutofixUnavailableError, LintRuleFaultError } from '../core/errors.js';
import type { NormalizedRecord } from '../core/types/index.js';
import { denormalizeRecord, validateAreaRecord, type SchemaResult } from '../validators/schema-validator.js';
import type { LintRuleSet } from './rule-set.js';

/**
 * Run the autofix of `ruleId` against `record`
 *
 * The fixed record goes back through the schema validator, so a fix that
 * breaks the schema comes back as validation errors rather than being written.
 *
 * @throws AutofixUnavailableError when the rule is unknown or not fixable
 * @throws LintRuleFaultError when the autofix throws
 */
export function applyAutofix(
  ruleSet: LintRuleSet,
  ruleId: string,
  record: NormalizedRecord
): SchemaResult {
  const rule = ruleSet.get(ruleId);
  if (!rule?.autofix) {
    throw new AutofixUnavailableError(ruleId);
  }

  let fixed: NormalizedRecord;
  try {
    fixed = rule.autofix(record);
  } catch (error) {
    throw new LintRuleFaultError(
      `Autofix for "${rule.id}" threw on area ${record.id}`,
      rule.id,
      record.id,
      error
    );
  }

  return validateAreaRecord(denormalizeRecord(fixed));
}
