/**
 * Built-in lint rules
 *
 * Every rule is a pure function of the normalized record plus the options it
 * was built with. The clock is injected so staleness checks are reproducible.
 *
 * RULES (registry order):
 * - icon-missing            error    no icon:square, or the upload placeholder
 * - icon-legacy-url         warning  icon not hosted at {iconBaseUrl}/{id}.{ext}
 * - verified-stale          warning  verification older than staleAfterDays (fixable)
 * - population-date-future  warning  population:date after today
 * - geometry-missing        info     no boundary geometry
 */

import type { LintRule, NormalizedRecord } from '../core/types/index.js';
import { GEOMETRY_KEY } from '../schemas/area-types.js';

export interface DefaultRuleOptions {
  /** Base URL icons are expected under, without trailing slash */
  readonly iconBaseUrl: string;
  readonly staleAfterDays: number;
  readonly now?: () => Date;
}

export const ICON_KEY = 'icon:square';
export const VERIFIED_DATE_KEY = 'verified:date';
export const POPULATION_DATE_KEY = 'population:date';

/** Placeholder the editor writes while an icon upload is pending */
export const PENDING_ICON = 'pending-upload';

const DAY_MS = 24 * 60 * 60 * 1000;

function textTag(record: NormalizedRecord, key: string): string | undefined {
  const value = record.tags[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * YYYY-MM-DD of a date in UTC
 */
export function isoDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Midnight UTC of the day containing the date, epoch milliseconds
 */
export function startOfUtcDay(date: Date): number {
  return Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
}

/**
 * Verification instant of a record: verified:date, else updatedAt
 */
export function verificationDate(record: NormalizedRecord): { readonly at: Date; readonly source: string } | null {
  const verified = textTag(record, VERIFIED_DATE_KEY);
  if (verified !== undefined) {
    const at = new Date(`${verified}T00:00:00Z`);
    return Number.isNaN(at.getTime()) ? null : { at, source: verified };
  }

  if (record.updatedAt !== undefined) {
    const at = new Date(record.updatedAt);
    return Number.isNaN(at.getTime()) ? null : { at, source: record.updatedAt };
  }

  return null;
}

/**
 * Build the default rule registry
 */
export function createDefaultRules(options: DefaultRuleOptions): readonly LintRule[] {
  const now = options.now ?? (() => new Date());
  const iconBaseUrl = options.iconBaseUrl.replace(/\/+$/, '');

  const iconMissing: LintRule = {
    id: 'icon-missing',
    name: 'Missing Icon',
    description: `No ${ICON_KEY} tag is set for this area`,
    severity: 'error',
    evaluate(record) {
      const icon = textTag(record, ICON_KEY);
      if (icon === undefined || icon === PENDING_ICON) {
        return { message: 'No icon is set for this area' };
      }
      return null;
    },
  };

  const iconLegacyUrl: LintRule = {
    id: 'icon-legacy-url',
    name: 'Legacy Icon URL',
    description: `Icon is not hosted at ${iconBaseUrl}`,
    severity: 'warning',
    evaluate(record) {
      const icon = textTag(record, ICON_KEY);
      if (icon === undefined || icon === PENDING_ICON) {
        // icon-missing reports these
        return null;
      }
      const expected = new RegExp(`^${escapeRegExp(iconBaseUrl)}/${escapeRegExp(record.id)}\\.\\w+$`);
      if (expected.test(icon)) {
        return null;
      }
      return {
        message: 'Icon URL does not match expected format',
        currentValue: icon,
        details: { expected: `${iconBaseUrl}/${record.id}.<ext>` },
      };
    },
  };

  const verifiedStale: LintRule = {
    id: 'verified-stale',
    name: 'Verification Stale',
    description: `Area has not been verified in over ${options.staleAfterDays} days`,
    severity: 'warning',
    evaluate(record) {
      const verification = verificationDate(record);
      if (!verification) {
        return { message: 'No verification date found' };
      }
      // Day-granular so results only change when the UTC day does
      const cutoff = startOfUtcDay(now()) - options.staleAfterDays * DAY_MS;
      if (verification.at.getTime() < cutoff) {
        return {
          message: `Last verified ${isoDay(verification.at)}, over ${options.staleAfterDays} days ago`,
          currentValue: verification.source,
        };
      }
      return null;
    },
    autofix(record) {
      return {
        ...record,
        tags: { ...record.tags, [VERIFIED_DATE_KEY]: isoDay(now()) },
      };
    },
  };

  const populationDateFuture: LintRule = {
    id: 'population-date-future',
    name: 'Population Date In Future',
    description: `${POPULATION_DATE_KEY} lies in the future`,
    severity: 'warning',
    evaluate(record) {
      const populationDate = textTag(record, POPULATION_DATE_KEY);
      // YYYY-MM-DD compares lexically
      if (populationDate !== undefined && populationDate > isoDay(now())) {
        return {
          message: `Population date ${populationDate} is in the future`,
          currentValue: populationDate,
        };
      }
      return null;
    },
  };

  const geometryMissing: LintRule = {
    id: 'geometry-missing',
    name: 'Missing Boundary',
    description: `No ${GEOMETRY_KEY} boundary is set for this area`,
    severity: 'info',
    evaluate(record) {
      return record.tags[GEOMETRY_KEY] === undefined
        ? { message: 'No boundary geometry is set for this area' }
        : null;
    },
  };

  return Object.freeze([iconMissing, iconLegacyUrl, verifiedStale, populationDateFuture, geometryMissing]);
}
