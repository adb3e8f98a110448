/**
 * Corpus Auditor
 *
 * Validates and lints a whole set of area records in one pass, then adds the
 * findings that need the whole corpus:
 * - url-alias-clash: non-deleted areas sharing a url_alias
 * - country derivation: the country whose boundary contains an area's centroid
 *
 * Per-area lint results go through LintCache, so re-auditing an unchanged
 * corpus costs one fingerprint per area.
 */

import { booleanPointInPolygon, bbox, centroid } from '@turf/turf';
import type {
  AreaGeometry,
  AreaType,
  LintIssue,
  LintRule,
  NormalizedRecord,
  ValidationError,
} from '../core/types/index.js';
import { createLogger, type EngineLogger } from '../core/utils/logger.js';
import type { LintCache } from '../lint/lint-cache.js';
import { GEOMETRY_KEY } from '../schemas/area-types.js';
import { parseAreaRecord } from '../schemas/raw-record.js';
import { normalizeGeometry } from '../validators/geometry-normalizer.js';
import { validateAreaRecord } from '../validators/schema-validator.js';

// ============================================================================
// Types
// ============================================================================

export type AuditedAreaType = AreaType | 'unknown';

export interface AreaAuditResult {
  readonly areaId: string;
  readonly areaName: string;
  readonly areaType: AuditedAreaType;
  readonly isDeleted: boolean;
  /** Containing country; always null for countries */
  readonly countryId: string | null;
  readonly countryName: string | null;
  /** Tags as received, for tag search */
  readonly tags: Readonly<Record<string, unknown>>;
  readonly validationErrors: readonly ValidationError[];
  readonly issues: readonly LintIssue[];
}

export interface CorpusAuditReport {
  readonly results: readonly AreaAuditResult[];
  /** ISO 8601 */
  readonly auditedAt: string;
  readonly durationMs: number;
}

export interface CorpusAuditorOptions {
  readonly cache: LintCache;
  readonly logger?: EngineLogger;
  readonly now?: () => Date;
}

export const URL_ALIAS_KEY = 'url_alias';

export const URL_ALIAS_CLASH_RULE: Pick<LintRule, 'id' | 'name' | 'description' | 'severity'> = {
  id: 'url-alias-clash',
  name: 'URL Alias Clash',
  description: 'Multiple areas share the same url_alias',
  severity: 'error',
};

export interface CountryBoundary {
  readonly id: string;
  readonly name: string;
  readonly geometry: AreaGeometry;
  readonly bbox: readonly [number, number, number, number];
}

interface WorkingResult {
  areaId: string;
  areaName: string;
  areaType: AuditedAreaType;
  isDeleted: boolean;
  countryId: string | null;
  countryName: string | null;
  tags: Readonly<Record<string, unknown>>;
  validationErrors: readonly ValidationError[];
  issues: LintIssue[];
  normalized: NormalizedRecord | null;
}

// ============================================================================
// Helpers
// ============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fallbackId(input: unknown, index: number): string {
  if (isPlainObject(input)) {
    const id = input.id;
    if (typeof id === 'string' && id.trim() !== '') return id.trim();
    if (typeof id === 'number') return String(id);
  }
  return `record[${index}]`;
}

function tagText(tags: Readonly<Record<string, unknown>>, key: string): string | undefined {
  const value = tags[key];
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

/**
 * Boundary of a result: the normalized geometry when the record validated,
 * otherwise whatever still parses from its raw tags
 */
function geometryOf(result: WorkingResult): AreaGeometry | null {
  if (result.normalized) {
    const geometry = result.normalized.tags[GEOMETRY_KEY];
    return typeof geometry === 'object' ? geometry : null;
  }

  const raw = result.tags[GEOMETRY_KEY];
  if (raw === undefined || raw === null || raw === '') {
    return null;
  }
  const normalized = normalizeGeometry(raw);
  return normalized.success ? normalized.data.geometry : null;
}

export function toBoundary(id: string, name: string, geometry: AreaGeometry): CountryBoundary {
  const [minX, minY, maxX, maxY] = bbox(geometry);
  return { id, name, geometry, bbox: [minX, minY, maxX, maxY] };
}

/**
 * Country whose boundary contains the centroid of `geometry`
 */
export function deriveCountry(
  geometry: AreaGeometry,
  countries: readonly CountryBoundary[]
): { readonly id: string; readonly name: string } | null {
  const point = centroid(geometry);
  const [lon, lat] = point.geometry.coordinates;

  for (const country of countries) {
    const [minX, minY, maxX, maxY] = country.bbox;
    if (lon < minX || lon > maxX || lat < minY || lat > maxY) {
      continue;
    }
    if (booleanPointInPolygon(point, country.geometry)) {
      return { id: country.id, name: country.name };
    }
  }
  return null;
}

// ============================================================================
// Auditor
// ============================================================================

export class CorpusAuditor {
  private readonly cache: LintCache;
  private readonly log: EngineLogger;
  private readonly now: () => Date;

  constructor(options: CorpusAuditorOptions) {
    this.cache = options.cache;
    this.log = options.logger ?? createLogger({ module: 'corpus-auditor' });
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Validate, lint and cross-check every record
   *
   * @param rawRecords - Untyped records as the adapter delivered them
   * @throws LintRuleFaultError when a lint rule faults
   */
  async audit(rawRecords: readonly unknown[]): Promise<CorpusAuditReport> {
    const startTime = performance.now();
    const working = rawRecords.map((input, index) => this.prepare(input, index));

    await Promise.all(
      working.map(async (result) => {
        const record = result.normalized;
        if (!record || result.isDeleted) {
          return;
        }
        const issues = await this.cache.getOrCompute(record.id, record);
        result.issues.push(...issues);
      })
    );

    this.deriveCountries(working);
    const clashes = this.detectUrlAliasClashes(working);

    const durationMs = Math.round(performance.now() - startTime);
    const results = working.map(({ normalized: _normalized, ...result }): AreaAuditResult => result);

    this.log.info('Corpus audit complete', {
      areas: results.length,
      invalid: results.filter((r) => r.validationErrors.length > 0).length,
      issues: results.reduce((sum, r) => sum + r.issues.length, 0),
      urlAliasClashes: clashes,
      durationMs,
    });

    return {
      results,
      auditedAt: this.now().toISOString(),
      durationMs,
    };
  }

  private prepare(input: unknown, index: number): WorkingResult {
    const parsed = parseAreaRecord(input);
    if (!parsed.success) {
      const rawTags = isPlainObject(input) && isPlainObject(input.tags) ? input.tags : {};
      return {
        areaId: fallbackId(input, index),
        areaName: tagText(rawTags, 'name') ?? 'Unknown',
        areaType: 'unknown',
        isDeleted: false,
        countryId: null,
        countryName: null,
        tags: rawTags,
        validationErrors: parsed.error,
        issues: [],
        normalized: null,
      };
    }

    const record = parsed.data;
    const validated = validateAreaRecord(record);

    return {
      areaId: record.id,
      areaName: tagText(record.tags, 'name') ?? 'Unknown',
      areaType: record.type,
      isDeleted: record.deletedAt !== undefined,
      countryId: null,
      countryName: null,
      tags: record.tags,
      validationErrors: validated.success ? [] : validated.error,
      issues: [],
      normalized: validated.success ? validated.data : null,
    };
  }

  private deriveCountries(results: readonly WorkingResult[]): void {
    const countries: CountryBoundary[] = [];
    for (const result of results) {
      if (result.areaType !== 'country' || result.isDeleted) continue;
      const geometry = geometryOf(result);
      if (geometry) {
        countries.push(toBoundary(result.areaId, result.areaName, geometry));
      }
    }

    if (countries.length === 0) {
      this.log.debug('No country boundaries in corpus; skipping country derivation');
      return;
    }

    let located = 0;
    for (const result of results) {
      if (result.areaType === 'country') continue;
      const geometry = geometryOf(result);
      if (!geometry) continue;

      const country = deriveCountry(geometry, countries);
      if (country) {
        result.countryId = country.id;
        result.countryName = country.name;
        located++;
      }
    }

    this.log.debug('Derived countries', { countries: countries.length, located });
  }

  private detectUrlAliasClashes(results: readonly WorkingResult[]): number {
    const byAlias = new Map<string, WorkingResult[]>();
    for (const result of results) {
      if (result.isDeleted) continue;
      const alias = tagText(result.tags, URL_ALIAS_KEY);
      if (alias === undefined) continue;
      const group = byAlias.get(alias);
      if (group) {
        group.push(result);
      } else {
        byAlias.set(alias, [result]);
      }
    }

    let clashes = 0;
    for (const [alias, group] of byAlias) {
      if (group.length < 2) continue;
      clashes++;

      for (const current of group) {
        const others = group.filter((other) => other !== current);
        current.issues.push({
          ruleId: URL_ALIAS_CLASH_RULE.id,
          areaId: current.areaId,
          severity: URL_ALIAS_CLASH_RULE.severity,
          message: `Duplicate url_alias shared by ${group.length} areas`,
          fixable: false,
          currentValue: alias,
          details: {
            clashingAreaIds: others.map((other) => other.areaId),
            clashingAreaNames: others.map((other) => other.areaName),
          },
        });
      }
    }

    if (clashes > 0) {
      this.log.warn('URL alias clashes detected', { clashes });
    }
    return clashes;
  }
}
