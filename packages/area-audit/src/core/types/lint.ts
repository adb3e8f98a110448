/**
 * Lint Types
 *
 * Rules are pure predicates over a NormalizedRecord. The registry is built once
 * at startup and never mutated.
 */

import type { NormalizedRecord } from './area.js';

export type Severity = 'info' | 'warning' | 'error';

export const SEVERITIES: readonly Severity[] = ['error', 'warning', 'info'];

export function isSeverity(value: unknown): value is Severity {
  return value === 'error' || value === 'warning' || value === 'info';
}

/**
 * Issue reported by a lint rule for one area
 */
export interface LintIssue {
  readonly ruleId: string;
  readonly areaId: string;
  readonly severity: Severity;
  readonly message: string;
  /** True when the rule offers an autofix */
  readonly fixable: boolean;
  /** Offending value, when there is one to show */
  readonly currentValue?: string;
  /** Rule-specific detail (e.g. clashing area ids) */
  readonly details?: Readonly<Record<string, unknown>>;
}

/**
 * Finding returned by a rule's evaluate(); the rule set fills in the rest
 */
export interface LintFinding {
  readonly message: string;
  readonly currentValue?: string;
  readonly details?: Readonly<Record<string, unknown>>;
}

/**
 * Lint rule descriptor
 */
export interface LintRule {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly severity: Severity;
  /**
   * Return a finding, or null when the record passes.
   * Throwing is a defect in the rule, never a reportable condition.
   */
  evaluate(record: NormalizedRecord): LintFinding | null;
  /**
   * Produce a corrected copy of the record. The result must be re-validated
   * before it is persisted.
   */
  autofix?(record: NormalizedRecord): NormalizedRecord;
}

/**
 * Anything the cache can ask for issues
 */
export interface LintEvaluator {
  readonly version: string;
  /**
   * Identifies what evaluate() would return for an unchanged record right now.
   * Evaluators whose rules read a clock change it when their results may.
   * Defaults to `version`.
   */
  evaluationKey?(): string;
  evaluate(record: NormalizedRecord): readonly LintIssue[] | Promise<readonly LintIssue[]>;
}

/**
 * Memoized lint result for one area
 */
export interface CacheEntry {
  readonly areaId: string;
  readonly fingerprint: string;
  /** Version of the evaluator that produced the issues */
  readonly ruleSetVersion: string;
  /** Evaluation key at computation time; a hit requires it to be current */
  readonly evaluationKey: string;
  readonly issues: readonly LintIssue[];
  /** Epoch milliseconds */
  readonly computedAt: number;
  /** Epoch milliseconds, drives LRU order */
  readonly lastAccessed: number;
}
