/**
 * Lint Rule Set
 *
 * Fixed, ordered registry of lint rules. Issues come back in registry order so
 * results are reproducible. A rule that throws is a defect: it surfaces as a
 * LintRuleFaultError, never as an empty issue list.
 *
 * Staleness rules compare against the current UTC day, so the evaluation key
 * pairs the version with that day.
 */

import { LintRuleFaultError } from '../core/errors.js';
import type { LintConfig } from '../core/config.js';
import type {
  LintEvaluator,
  LintIssue,
  LintRule,
  NormalizedRecord,
} from '../core/types/index.js';
import { createDefaultRules, isoDay } from './rules.js';

export class LintRuleSet implements LintEvaluator {
  private readonly registry: readonly LintRule[];
  private readonly byId: ReadonlyMap<string, LintRule>;

  /**
   * @param rules - Rules in evaluation order; ids must be unique
   * @param version - Identifies rule behaviour for cache keys
   * @param now - Clock the rules read
   */
  constructor(
    rules: readonly LintRule[],
    public readonly version: string,
    private readonly now: () => Date = () => new Date()
  ) {
    const byId = new Map<string, LintRule>();
    for (const rule of rules) {
      if (byId.has(rule.id)) {
        throw new Error(`Duplicate lint rule id: ${rule.id}`);
      }
      byId.set(rule.id, rule);
    }
    this.registry = Object.freeze([...rules]);
    this.byId = byId;
  }

  /**
   * Version plus the UTC day results are valid for, e.g. `1@2025-06-01`
   */
  evaluationKey(): string {
    return `${this.version}@${isoDay(this.now())}`;
  }

  rules(): readonly LintRule[] {
    return this.registry;
  }

  get(ruleId: string): LintRule | undefined {
    return this.byId.get(ruleId);
  }

  /**
   * Apply every rule and collect findings in registry order.
   * Soft-deleted records are not linted.
   *
   * @throws LintRuleFaultError when a rule throws
   */
  evaluate(record: NormalizedRecord): readonly LintIssue[] {
    const issues: LintIssue[] = [];
    if (record.deletedAt !== undefined) {
      return issues;
    }

    for (const rule of this.registry) {
      let finding: ReturnType<LintRule['evaluate']>;
      try {
        finding = rule.evaluate(record);
      } catch (error) {
        throw new LintRuleFaultError(
          `Lint rule "${rule.id}" threw while evaluating area ${record.id}`,
          rule.id,
          record.id,
          error
        );
      }

      if (finding) {
        issues.push({
          ruleId: rule.id,
          areaId: record.id,
          severity: rule.severity,
          message: finding.message,
          fixable: rule.autofix !== undefined,
          ...(finding.currentValue !== undefined && { currentValue: finding.currentValue }),
          ...(finding.details !== undefined && { details: finding.details }),
        });
      }
    }

    return issues;
  }
}

/**
 * Rule set with the built-in rules configured from LintConfig
 */
export function createDefaultRuleSet(
  config: LintConfig,
  now: () => Date = () => new Date()
): LintRuleSet {
  const rules = createDefaultRules({
    iconBaseUrl: config.iconBaseUrl,
    staleAfterDays: config.staleAfterDays,
    now,
  });
  return new LintRuleSet(rules, config.ruleSetVersion, now);
}
