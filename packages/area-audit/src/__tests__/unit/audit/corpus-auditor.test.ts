/**
 * Corpus Auditor Unit Tests
 *
 * See buildCorpus() for the corpus layout.
 */

import { describe, it, expect, vi } from 'vitest';
import { DEFAULT_ENGINE_CONFIG } from '../../../core/config.js';
import { LintRuleFaultError } from '../../../core/errors.js';
import { silentLogger } from '../../../core/utils/logger.js';
import {
  CorpusAuditor,
  deriveCountry,
  toBoundary,
  type AreaAuditResult,
} from '../../../audit/corpus-auditor.js';
import { LintCache } from '../../../lint/lint-cache.js';
import { LintRuleSet, createDefaultRuleSet } from '../../../lint/rule-set.js';
import { createAuditEngine } from '../../../engine.js';
import { normalizeGeometry } from '../../../validators/geometry-normalizer.js';
import { TEST_NOW, buildCorpus, square } from '../../fixtures/areas.js';

vi.mock('../../../validators/geometry-normalizer.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../../validators/geometry-normalizer.js')>();
  return { ...actual, normalizeGeometry: vi.fn(actual.normalizeGeometry) };
});

function createAuditor(ruleSet = createDefaultRuleSet(DEFAULT_ENGINE_CONFIG.lint, () => TEST_NOW)) {
  const cache = new LintCache({ evaluator: ruleSet, logger: silentLogger });
  return { cache, auditor: new CorpusAuditor({ cache, logger: silentLogger, now: () => TEST_NOW }) };
}

function byId(results: readonly AreaAuditResult[], id: string): AreaAuditResult {
  const result = results.find((r) => r.areaId === id);
  if (!result) {
    throw new Error(`No result for ${id}`);
  }
  return result;
}

describe('CorpusAuditor', () => {
  it('should return one result per record in input order', async () => {
    const { auditor } = createAuditor();
    const report = await auditor.audit(buildCorpus());

    expect(report.results.map((r) => r.areaId)).toEqual(['c1', 'a1', 'a2', 'a3', 'a4', 'a5', 'record[6]']);
    expect(report.auditedAt).toBe('2025-06-01T00:00:00.000Z');
    expect(report.durationMs).toBeGreaterThanOrEqual(0);
  });

  it('should flag every live area sharing a url_alias', async () => {
    const { auditor } = createAuditor();
    const { results } = await auditor.audit(buildCorpus());

    expect(byId(results, 'a1').issues).toEqual([
      {
        ruleId: 'url-alias-clash',
        areaId: 'a1',
        severity: 'error',
        message: 'Duplicate url_alias shared by 2 areas',
        fixable: false,
        currentValue: 'shared',
        details: { clashingAreaIds: ['a3'], clashingAreaNames: ['Gamma'] },
      },
    ]);
    expect(byId(results, 'a3').issues).toEqual([
      {
        ruleId: 'url-alias-clash',
        areaId: 'a3',
        severity: 'error',
        message: 'Duplicate url_alias shared by 2 areas',
        fixable: false,
        currentValue: 'shared',
        details: { clashingAreaIds: ['a1'], clashingAreaNames: ['Alpha'] },
      },
    ]);
  });

  it('should neither lint nor flag deleted areas', async () => {
    const { auditor } = createAuditor();
    const a4 = byId((await auditor.audit(buildCorpus())).results, 'a4');

    expect(a4.isDeleted).toBe(true);
    expect(a4.issues).toEqual([]);
  });

  it('should derive the containing country from the centroid', async () => {
    const { auditor } = createAuditor();
    const { results } = await auditor.audit(buildCorpus());

    expect(byId(results, 'a1')).toMatchObject({ countryId: 'c1', countryName: 'Testland' });
    expect(byId(results, 'a3')).toMatchObject({ countryId: 'c1', countryName: 'Testland' });
    expect(byId(results, 'a2')).toMatchObject({ countryId: null, countryName: null });
    expect(byId(results, 'c1')).toMatchObject({ countryId: null, countryName: null });
  });

  it('should reuse validated geometry when deriving countries', async () => {
    const { auditor } = createAuditor();
    vi.mocked(normalizeGeometry).mockClear();

    // c1 and a1, both valid
    const { results } = await auditor.audit(buildCorpus().slice(0, 2));

    expect(byId(results, 'a1').countryId).toBe('c1');
    // Once per record, during validation
    expect(normalizeGeometry).toHaveBeenCalledTimes(2);
  });

  it('should derive a country for areas that fail validation', async () => {
    const { auditor } = createAuditor();
    const a5 = byId((await auditor.audit(buildCorpus())).results, 'a5');

    expect(a5.countryId).toBe('c1');
    expect(a5.validationErrors).toEqual([{ field: 'population', kind: 'missing', message: 'population is required' }]);
    expect(a5.issues).toEqual([]);
  });

  it('should keep records that cannot be parsed', async () => {
    const { auditor } = createAuditor();
    const nameless = byId((await auditor.audit(buildCorpus())).results, 'record[6]');

    expect(nameless).toEqual({
      areaId: 'record[6]',
      areaName: 'Nameless',
      areaType: 'unknown',
      isDeleted: false,
      countryId: null,
      countryName: null,
      tags: { name: 'Nameless' },
      validationErrors: [{ field: 'id', kind: 'missing', message: 'id is required' }],
      issues: [],
    });
  });

  it('should reuse cached lint results on a second audit', async () => {
    const { auditor, cache } = createAuditor();

    await auditor.audit(buildCorpus());
    await auditor.audit(buildCorpus());

    // c1, a1, a2, a3 are valid and live
    expect(cache.getStats()).toMatchObject({ evaluations: 4, hits: 4 });
  });

  it('should not report clash issues twice on a second audit', async () => {
    const { auditor } = createAuditor();

    await auditor.audit(buildCorpus());
    const { results } = await auditor.audit(buildCorpus());

    expect(byId(results, 'a1').issues.map((issue) => issue.ruleId)).toEqual(['url-alias-clash']);
  });

  it('should propagate rule faults', async () => {
    const broken = new LintRuleSet(
      [
        {
          id: 'broken',
          name: 'Broken',
          description: 'Always throws',
          severity: 'error',
          evaluate: () => {
            throw new Error('boom');
          },
        },
      ],
      '1'
    );
    const { auditor } = createAuditor(broken);

    await expect(auditor.audit(buildCorpus())).rejects.toBeInstanceOf(LintRuleFaultError);
  });
});

describe('deriveCountry', () => {
  const countries = [toBoundary('c1', 'Testland', square(0, 40, 10)), toBoundary('c2', 'Otherland', square(10, 40, 10))];

  it('should pick the country containing the centroid', () => {
    expect(deriveCountry(square(12, 45, 1), countries)).toEqual({ id: 'c2', name: 'Otherland' });
  });

  it('should return null outside every country', () => {
    expect(deriveCountry(square(-20, 0, 1), countries)).toBeNull();
  });

  it('should compute a bounding box for each boundary', () => {
    expect(countries[0]?.bbox).toEqual([0, 40, 10, 50]);
  });
});

describe('createAuditEngine', () => {
  it('should wire the rule set, cache and auditor from one config', async () => {
    const engine = createAuditEngine(DEFAULT_ENGINE_CONFIG, { logger: silentLogger, now: () => TEST_NOW });

    const report = await engine.auditor.audit(buildCorpus());
    engine.dispose();

    expect(engine.ruleSet.version).toBe('1');
    expect(engine.ruleSet.rules().map((rule) => rule.id)).toEqual([
      'icon-missing',
      'icon-legacy-url',
      'verified-stale',
      'population-date-future',
      'geometry-missing',
    ]);
    expect(report.auditedAt).toBe('2025-06-01T00:00:00.000Z');
    expect(engine.cache.getStats().size).toBe(4);
  });
});
