/**
 * Report filtering and summary over corpus audit results
 */

import { SEVERITIES, type Severity } from '../core/types/index.js';
import { GEOMETRY_KEY } from '../schemas/area-types.js';
import type { AreaAuditResult } from './corpus-auditor.js';

export interface ResultFilters {
  readonly ruleId?: string;
  readonly severity?: Severity;
  readonly areaType?: string;
  /** Applies to non-country areas only */
  readonly countryId?: string;
  readonly includeDeleted?: boolean;
  /** Drop areas left with no issues after rule/severity filtering */
  readonly issuesOnly?: boolean;
  /**
   * Tag name to required value. `null` only requires the tag to be present;
   * a value containing `*` is matched as a glob, where `?` also
   * matches one character. Without `*` the value must match exactly.
   */
  readonly tags?: Readonly<Record<string, string | null>>;
}

export interface AuditSummary {
  /** Areas passing the filters */
  readonly totalAreas: number;
  readonly totalAllAreas: number;
  readonly deletedAreas: number;
  readonly invalidAreas: number;
  readonly areasWithIssues: number;
  readonly totalIssues: number;
  readonly issuesByRule: Readonly<Record<string, number>>;
  readonly issuesBySeverity: Readonly<Record<Severity, number>>;
  readonly areasByType: Readonly<Record<string, number>>;
}

export interface CountryRef {
  readonly id: string;
  readonly name: string;
}

function globToRegExp(pattern: string): RegExp {
  const source = pattern
    .split('')
    .map((char) => {
      if (char === '*') return '.*';
      if (char === '?') return '.';
      return char.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    })
    .join('');
  return new RegExp(`^${source}$`, 's');
}

function tagValueText(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * True when the result's tags satisfy every tag filter
 */
export function matchesTagFilters(
  tags: Readonly<Record<string, unknown>>,
  filters: Readonly<Record<string, string | null>>
): boolean {
  for (const [name, expected] of Object.entries(filters)) {
    const actual = tags[name];
    if (actual === undefined || actual === null) {
      return false;
    }
    if (expected === null) {
      continue;
    }

    const actualText = tagValueText(actual);
    const matches = expected.includes('*')
      ? globToRegExp(expected).test(actualText)
      : actualText === expected;
    if (!matches) {
      return false;
    }
  }
  return true;
}

/**
 * Apply area- and issue-level filters
 *
 * `issuesOnly` defaults to true: areas without matching issues are dropped.
 */
export function filterResults(
  results: readonly AreaAuditResult[],
  filters: ResultFilters = {}
): AreaAuditResult[] {
  const issuesOnly = filters.issuesOnly ?? true;
  const filtered: AreaAuditResult[] = [];

  for (const result of results) {
    if (!filters.includeDeleted && result.isDeleted) continue;
    if (filters.areaType && result.areaType !== filters.areaType) continue;
    if (filters.countryId && result.areaType !== 'country' && result.countryId !== filters.countryId) {
      continue;
    }
    if (filters.tags && !matchesTagFilters(result.tags, filters.tags)) continue;

    const issues = result.issues.filter(
      (issue) =>
        (!filters.ruleId || issue.ruleId === filters.ruleId) &&
        (!filters.severity || issue.severity === filters.severity)
    );

    if (issuesOnly && issues.length === 0) continue;

    filtered.push({ ...result, issues });
  }

  return filtered;
}

/**
 * Totals over the filtered results
 *
 * Unlike filterResults, `issuesOnly` defaults to false so clean areas count.
 * `totalAllAreas` and `deletedAreas` always describe the unfiltered input.
 */
export function summarizeResults(
  results: readonly AreaAuditResult[],
  filters: ResultFilters = {}
): AuditSummary {
  const filtered = filterResults(results, { ...filters, issuesOnly: filters.issuesOnly ?? false });

  const issuesByRule: Record<string, number> = {};
  const issuesBySeverity: Record<Severity, number> = { error: 0, warning: 0, info: 0 };
  const areasByType: Record<string, number> = {};
  let totalIssues = 0;

  for (const result of filtered) {
    areasByType[result.areaType] = (areasByType[result.areaType] ?? 0) + 1;
    for (const issue of result.issues) {
      issuesByRule[issue.ruleId] = (issuesByRule[issue.ruleId] ?? 0) + 1;
      issuesBySeverity[issue.severity]++;
      totalIssues++;
    }
  }

  return {
    totalAreas: filtered.length,
    totalAllAreas: results.length,
    deletedAreas: results.filter((result) => result.isDeleted).length,
    invalidAreas: filtered.filter((result) => result.validationErrors.length > 0).length,
    areasWithIssues: filtered.filter((result) => result.issues.length > 0).length,
    totalIssues,
    issuesByRule,
    issuesBySeverity,
    areasByType,
  };
}

/**
 * Sorted tag names across all results, without geo_json
 */
export function listTagKeys(results: readonly AreaAuditResult[]): string[] {
  const keys = new Set<string>();
  for (const result of results) {
    for (const key of Object.keys(result.tags)) {
      if (key !== GEOMETRY_KEY) keys.add(key);
    }
  }
  return [...keys].sort();
}

/**
 * Countries containing at least one non-country area, sorted by name
 */
export function listCountriesWithCommunities(results: readonly AreaAuditResult[]): CountryRef[] {
  const occupied = new Set<string>();
  for (const result of results) {
    if (result.areaType !== 'country' && result.countryId) {
      occupied.add(result.countryId);
    }
  }

  return results
    .filter((result) => result.areaType === 'country' && occupied.has(result.areaId))
    .map((result) => ({ id: result.areaId, name: result.areaName }))
    .sort((a, b) => a.name.toLowerCase().localeCompare(b.name.toLowerCase()));
}

/**
 * Highest severity present, for exit codes
 */
export function worstSeverity(results: readonly AreaAuditResult[]): Severity | null {
  for (const severity of SEVERITIES) {
    if (results.some((result) => result.issues.some((issue) => issue.severity === severity))) {
      return severity;
    }
  }
  return null;
}
