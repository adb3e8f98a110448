/**
 * Built-in lint rule tests
 *
 * The clock is fixed at 2025-06-01T00:00:00Z.
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_ENGINE_CONFIG } from '../../../core/config.js';
import type { AreaRecord, LintIssue } from '../../../core/types/index.js';
import { createDefaultRuleSet } from '../../../lint/rule-set.js';
import { isoDay, verificationDate } from '../../../lint/rules.js';
import {
  TEST_ICON_BASE,
  TEST_NOW,
  communityRecord,
  countryRecord,
  normalized,
} from '../../fixtures/areas.js';

const ruleSet = createDefaultRuleSet(DEFAULT_ENGINE_CONFIG.lint, () => TEST_NOW);

function lint(
  overrides: Record<string, unknown>,
  extra: Pick<AreaRecord, 'updatedAt'> = {}
): readonly LintIssue[] {
  return ruleSet.evaluate(normalized(communityRecord('a1', overrides, extra)));
}

function ruleIds(issues: readonly LintIssue[]): string[] {
  return issues.map((issue) => issue.ruleId);
}

describe('default rules', () => {
  it('should report nothing for a clean community', () => {
    expect(lint({})).toEqual([]);
  });

  describe('icon-missing', () => {
    it('should flag an absent icon', () => {
      expect(lint({ 'icon:square': undefined })).toEqual([
        {
          ruleId: 'icon-missing',
          areaId: 'a1',
          severity: 'error',
          message: 'No icon is set for this area',
          fixable: false,
        },
      ]);
    });

    it('should flag the pending upload placeholder', () => {
      expect(ruleIds(lint({ 'icon:square': 'pending-upload' }))).toEqual(['icon-missing']);
    });
  });

  describe('icon-legacy-url', () => {
    it('should flag icons hosted elsewhere', () => {
      expect(lint({ 'icon:square': 'https://old.example.org/icon.png' })).toEqual([
        {
          ruleId: 'icon-legacy-url',
          areaId: 'a1',
          severity: 'warning',
          message: 'Icon URL does not match expected format',
          fixable: false,
          currentValue: 'https://old.example.org/icon.png',
          details: { expected: `${TEST_ICON_BASE}/a1.<ext>` },
        },
      ]);
    });

    it('should flag icons named after another area', () => {
      expect(ruleIds(lint({ 'icon:square': `${TEST_ICON_BASE}/a2.png` }))).toEqual(['icon-legacy-url']);
    });

    it('should accept any file extension', () => {
      expect(lint({ 'icon:square': `${TEST_ICON_BASE}/a1.webp` })).toEqual([]);
    });
  });

  describe('verified-stale', () => {
    it('should flag a verification older than the threshold', () => {
      expect(lint({ 'verified:date': '2024-01-01' })).toEqual([
        {
          ruleId: 'verified-stale',
          areaId: 'a1',
          severity: 'warning',
          message: 'Last verified 2024-01-01, over 365 days ago',
          fixable: true,
          currentValue: '2024-01-01',
        },
      ]);
    });

    it('should accept a verification exactly at the threshold', () => {
      // 2025-06-01 minus 365 days
      expect(lint({ 'verified:date': '2024-06-01' })).toEqual([]);
    });

    it('should judge staleness by the UTC day, not the time of day', () => {
      const evening = createDefaultRuleSet(DEFAULT_ENGINE_CONFIG.lint, () => new Date('2025-06-01T18:00:00Z'));
      const record = normalized(
        communityRecord('a1', { 'verified:date': undefined }, { updatedAt: '2024-06-01T12:00:00Z' })
      );
      expect(evening.evaluate(record)).toEqual([]);
    });

    it('should fall back to updatedAt', () => {
      expect(lint({ 'verified:date': undefined }, { updatedAt: '2025-05-01T00:00:00Z' })).toEqual([]);
      expect(ruleIds(lint({ 'verified:date': undefined }, { updatedAt: '2023-05-01T00:00:00Z' }))).toEqual([
        'verified-stale',
      ]);
    });

    it('should flag areas without any verification date', () => {
      const issues = lint({ 'verified:date': undefined });
      expect(issues).toHaveLength(1);
      expect(issues[0]?.message).toBe('No verification date found');
    });
  });

  describe('population-date-future', () => {
    it('should flag population dates after today', () => {
      expect(lint({ 'population:date': '2026-01-01' })).toEqual([
        {
          ruleId: 'population-date-future',
          areaId: 'a1',
          severity: 'warning',
          message: 'Population date 2026-01-01 is in the future',
          fixable: false,
          currentValue: '2026-01-01',
        },
      ]);
    });

    it('should accept today', () => {
      expect(lint({ 'population:date': '2025-06-01' })).toEqual([]);
    });
  });

  describe('geometry-missing', () => {
    it('should flag areas without a boundary', () => {
      const country = normalized(
        countryRecord('c1', {
          name: 'Testland',
          'icon:square': `${TEST_ICON_BASE}/c1.png`,
          'verified:date': '2025-01-01',
        })
      );

      expect(ruleSet.evaluate(country)).toEqual([
        {
          ruleId: 'geometry-missing',
          areaId: 'c1',
          severity: 'info',
          message: 'No boundary geometry is set for this area',
          fixable: false,
        },
      ]);
    });
  });

  it('should report issues in registry order', () => {
    const country = normalized(countryRecord('c1', { name: 'Testland', 'population:date': '2030-01-01' }));
    expect(ruleIds(ruleSet.evaluate(country))).toEqual([
      'icon-missing',
      'verified-stale',
      'population-date-future',
      'geometry-missing',
    ]);
  });

  it('should honour a configured icon base URL and staleness threshold', () => {
    const custom = createDefaultRuleSet(
      { iconBaseUrl: 'https://cdn.example.org/icons/', staleAfterDays: 30, ruleSetVersion: '2' },
      () => TEST_NOW
    );
    const record = normalized(
      communityRecord('a1', {
        'icon:square': 'https://cdn.example.org/icons/a1.svg',
        'verified:date': '2025-04-01',
      })
    );

    expect(custom.version).toBe('2');
    expect(ruleIds(custom.evaluate(record))).toEqual(['verified-stale']);
  });
});

describe('verificationDate', () => {
  it('should prefer verified:date over updatedAt', () => {
    const record = normalized(communityRecord('a1', {}, { updatedAt: '2020-01-01T00:00:00Z' }));
    expect(verificationDate(record)).toEqual({ at: new Date('2025-03-01T00:00:00Z'), source: '2025-03-01' });
  });

  it('should return null for an unparseable updatedAt', () => {
    const record = normalized(communityRecord('a1', { 'verified:date': undefined }, { updatedAt: 'yesterday' }));
    expect(verificationDate(record)).toBeNull();
  });
});

describe('isoDay', () => {
  it('should format the UTC calendar day', () => {
    expect(isoDay(new Date('2025-06-01T23:59:59Z'))).toBe('2025-06-01');
  });
});
