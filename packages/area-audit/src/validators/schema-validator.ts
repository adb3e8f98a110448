/**
 * Schema Validator
 *
 * Validates an AreaRecord against the FieldSpecs of its area type and builds
 * the NormalizedRecord. All field errors are collected in one pass so the UI
 * can show every problem at once.
 *
 * INVARIANTS:
 * - Tags no FieldSpec covers pass through untouched into `customTags`.
 * - When the geometry is present and valid, `area_km2` is always re-derived
 *   from it, whatever value the record carried.
 * - The input record is never mutated.
 */

import {
  fail,
  ok,
  validationError,
  type AreaRecord,
  type FieldSpec,
  type NormalizedRecord,
  type NormalizedValue,
  type Result,
  type ValidationError,
} from '../core/types/index.js';
import { AREA_KM2_KEY, getFieldSpecs } from '../schemas/area-types.js';
import { validateField } from './field-validator.js';
import { normalizeGeometry } from './geometry-normalizer.js';

export type SchemaResult = Result<NormalizedRecord, readonly ValidationError[]>;

/**
 * Undefined, null and blank strings count as absent
 */
export function isAbsent(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === 'string' && value.trim() === '');
}

function missing(spec: FieldSpec): ValidationError {
  return validationError(spec.key, 'missing', `${spec.key} is required`);
}

/**
 * Validate an area record and produce its normalized copy
 */
export function validateAreaRecord(record: AreaRecord): SchemaResult {
  const specs = getFieldSpecs(record.type);
  const specKeys = new Set(specs.map((spec) => spec.key));

  const errors: ValidationError[] = [];
  const values = new Map<string, NormalizedValue>();
  let derivedAreaKm2: number | undefined;

  for (const spec of specs) {
    const raw = record.tags[spec.key];

    if (isAbsent(raw)) {
      if (spec.required) {
        errors.push(missing(spec));
      }
      continue;
    }

    if (spec.valueKind === 'geometry') {
      const normalized = normalizeGeometry(raw, spec.key);
      if (normalized.success) {
        values.set(spec.key, normalized.data.geometry);
        derivedAreaKm2 = normalized.data.areaKm2;
      } else {
        errors.push(normalized.error);
      }
      continue;
    }

    // Overwritten below from the geometry
    if (spec.key === AREA_KM2_KEY && derivedAreaKm2 !== undefined) {
      continue;
    }

    const result = validateField(spec.valueKind, raw, spec.allowedValues, spec.key);
    if (result.success) {
      values.set(spec.key, result.data);
    } else {
      errors.push(result.error);
    }
  }

  if (errors.length > 0) {
    return fail(errors);
  }

  if (derivedAreaKm2 !== undefined) {
    values.set(AREA_KM2_KEY, derivedAreaKm2);
  }

  // Rebuild in input order; a derived area_km2 the input lacked goes last
  const tags: Record<string, NormalizedValue> = {};
  const customTags: Record<string, unknown> = {};
  for (const [key, raw] of Object.entries(record.tags)) {
    if (!specKeys.has(key)) {
      customTags[key] = raw;
      continue;
    }
    const value = values.get(key);
    if (value !== undefined) {
      tags[key] = value;
    }
  }

  if (derivedAreaKm2 !== undefined) {
    tags[AREA_KM2_KEY] = derivedAreaKm2;
  }

  return ok({
    id: record.id,
    type: record.type,
    tags,
    customTags,
    ...(record.createdAt !== undefined && { createdAt: record.createdAt }),
    ...(record.updatedAt !== undefined && { updatedAt: record.updatedAt }),
    ...(record.deletedAt !== undefined && { deletedAt: record.deletedAt }),
  });
}

/**
 * Turn a normalized record back into an AreaRecord so it can be re-validated
 * (known tags first, then custom tags)
 */
export function denormalizeRecord(record: NormalizedRecord): AreaRecord {
  return {
    id: record.id,
    type: record.type,
    tags: { ...record.tags, ...record.customTags },
    ...(record.createdAt !== undefined && { createdAt: record.createdAt }),
    ...(record.updatedAt !== undefined && { updatedAt: record.updatedAt }),
    ...(record.deletedAt !== undefined && { deletedAt: record.deletedAt }),
  };
}
