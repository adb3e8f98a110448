/**
 * Rule set and autofix tests
 */

import { describe, it, expect } from 'vitest';
import {
  AutofixUnavailableError,
  LintRuleFaultError,
  isLintRuleFaultError,
} from '../../../core/errors.js';
import { DEFAULT_ENGINE_CONFIG } from '../../../core/config.js';
import type { LintRule } from '../../../core/types/index.js';
import { applyAutofix } from '../../../lint/autofix.js';
import { LintRuleSet, createDefaultRuleSet } from '../../../lint/rule-set.js';
import { TEST_NOW, communityRecord, normalized } from '../../fixtures/areas.js';

function rule(id: string, overrides: Partial<LintRule> = {}): LintRule {
  return {
    id,
    name: id,
    description: id,
    severity: 'warning',
    evaluate: () => ({ message: `${id} fired` }),
    ...overrides,
  };
}

describe('LintRuleSet', () => {
  it('should reject duplicate rule ids', () => {
    expect(() => new LintRuleSet([rule('a'), rule('a')], '1')).toThrow('Duplicate lint rule id: a');
  });

  it('should look rules up by id', () => {
    const ruleSet = new LintRuleSet([rule('a'), rule('b')], '1');
    expect(ruleSet.get('b')?.id).toBe('b');
    expect(ruleSet.get('c')).toBeUndefined();
    expect(ruleSet.rules().map((r) => r.id)).toEqual(['a', 'b']);
  });

  it('should copy finding details onto the issue', () => {
    const ruleSet = new LintRuleSet(
      [rule('a', { evaluate: () => ({ message: 'm', currentValue: 'v', details: { n: 1 } }) })],
      '1'
    );

    expect(ruleSet.evaluate(normalized(communityRecord('a1')))).toEqual([
      { ruleId: 'a', areaId: 'a1', severity: 'warning', message: 'm', fixable: false, currentValue: 'v', details: { n: 1 } },
    ]);
  });

  it('should key evaluations by version and UTC day', () => {
    let clock = new Date('2025-06-01T23:59:59Z');
    const ruleSet = new LintRuleSet([rule('a')], '3', () => clock);
    expect(ruleSet.evaluationKey()).toBe('3@2025-06-01');

    clock = new Date('2025-06-02T00:00:00Z');
    expect(ruleSet.evaluationKey()).toBe('3@2025-06-02');
  });

  it('should skip soft-deleted records', () => {
    const ruleSet = new LintRuleSet([rule('a')], '1');
    const deleted = normalized(communityRecord('a1', {}, { deletedAt: '2025-01-01T00:00:00Z' }));
    expect(ruleSet.evaluate(deleted)).toEqual([]);
  });

  it('should turn a throwing rule into a LintRuleFaultError', () => {
    const cause = new Error('boom');
    const ruleSet = new LintRuleSet(
      [
        rule('ok'),
        rule('broken', {
          evaluate: () => {
            throw cause;
          },
        }),
      ],
      '1'
    );

    let caught: unknown;
    try {
      ruleSet.evaluate(normalized(communityRecord('a1')));
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(LintRuleFaultError);
    expect(isLintRuleFaultError(caught)).toBe(true);
    if (isLintRuleFaultError(caught)) {
      expect(caught.ruleId).toBe('broken');
      expect(caught.areaId).toBe('a1');
      expect(caught.cause).toBe(cause);
      expect(caught.message).toBe('Lint rule "broken" threw while evaluating area a1');
      expect(caught.toLogString()).toBe(
        [
          'LintRuleFaultError: Lint rule "broken" threw while evaluating area a1',
          '  Rule: broken',
          '  Area: a1',
          '  Cause: boom',
        ].join('\n')
      );
    }
  });
});

describe('applyAutofix', () => {
  const ruleSet = createDefaultRuleSet(DEFAULT_ENGINE_CONFIG.lint, () => TEST_NOW);

  it('should stamp today as the verification date and re-validate', () => {
    const stale = normalized(communityRecord('a1', { 'verified:date': '2020-01-01' }));
    const result = applyAutofix(ruleSet, 'verified-stale', stale);

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.tags['verified:date']).toBe('2025-06-01');
      expect(ruleSet.evaluate(result.data)).toEqual([]);
    }
  });

  it('should not modify the record it was given', () => {
    const stale = normalized(communityRecord('a1', { 'verified:date': '2020-01-01' }));
    applyAutofix(ruleSet, 'verified-stale', stale);
    expect(stale.tags['verified:date']).toBe('2020-01-01');
  });

  it('should refuse rules without an autofix', () => {
    const record = normalized(communityRecord('a1'));
    expect(() => applyAutofix(ruleSet, 'icon-missing', record)).toThrow(AutofixUnavailableError);
    expect(() => applyAutofix(ruleSet, 'no-such-rule', record)).toThrow(
      'Rule "no-such-rule" is unknown or has no autofix'
    );
  });

  it('should return validation errors when the fix breaks the schema', () => {
    const breaking = new LintRuleSet(
      [rule('negative', { autofix: (record) => ({ ...record, tags: { ...record.tags, population: -5 } }) })],
      '1'
    );

    expect(applyAutofix(breaking, 'negative', normalized(communityRecord('a1')))).toMatchObject({
      success: false,
      error: [{ field: 'population', kind: 'out_of_range' }],
    });
  });

  it('should wrap a throwing autofix', () => {
    const throwing = new LintRuleSet(
      [
        rule('bad-fix', {
          autofix: () => {
            throw new Error('nope');
          },
        }),
      ],
      '1'
    );

    expect(() => applyAutofix(throwing, 'bad-fix', normalized(communityRecord('a1')))).toThrow(
      'Autofix for "bad-fix" threw on area a1'
    );
  });
});
