/**
 * Single tag edits
 *
 * Validates one key/value change against an area's schema before the adapter
 * writes it to the external store. A geometry edit expands into two changes so
 * that geo_json and area_km2 are always written together.
 */

import {
  fail,
  ok,
  validationError,
  type AreaRecord,
  type Result,
  type ValidationError,
} from '../core/types/index.js';
import { AREA_KM2_KEY, GEOMETRY_KEY, getFieldSpec } from '../schemas/area-types.js';
import { validateField, validateTagKey } from './field-validator.js';
import { normalizeGeometry } from './geometry-normalizer.js';
import { isAbsent } from './schema-validator.js';

/**
 * Change to apply to the external record. `null` removes the tag.
 */
export interface TagChange {
  readonly key: string;
  readonly value: unknown;
}

export type TagUpdateResult = Result<readonly TagChange[], readonly ValidationError[]>;

/**
 * Validate setting `key` to `value` on `record`
 */
export function planTagUpdate(record: AreaRecord, key: string, value: unknown): TagUpdateResult {
  const spec = getFieldSpec(record.type, key);

  if (!spec) {
    const keyCheck = validateTagKey(key);
    if (!keyCheck.success) {
      return fail([keyCheck.error]);
    }
    return ok([{ key: keyCheck.data, value: isAbsent(value) ? null : value }]);
  }

  if (isAbsent(value)) {
    if (spec.required) {
      return fail([validationError(key, 'missing', `${key} is required and cannot be removed`)]);
    }
    if (key === GEOMETRY_KEY) {
      return ok([
        { key: GEOMETRY_KEY, value: null },
        { key: AREA_KM2_KEY, value: null },
      ]);
    }
    return ok([{ key, value: null }]);
  }

  if (spec.valueKind === 'geometry') {
    const normalized = normalizeGeometry(value, key);
    if (!normalized.success) {
      return fail([normalized.error]);
    }
    return ok([
      { key, value: normalized.data.geometry },
      { key: AREA_KM2_KEY, value: normalized.data.areaKm2 },
    ]);
  }

  if (key === AREA_KM2_KEY && !isAbsent(record.tags[GEOMETRY_KEY])) {
    return fail([
      validationError(
        key,
        'not_allowed',
        `${AREA_KM2_KEY} is derived from ${GEOMETRY_KEY}; update the geometry instead`
      ),
    ]);
  }

  const result = validateField(spec.valueKind, value, spec.allowedValues, key);
  if (!result.success) {
    return fail([result.error]);
  }
  return ok([{ key, value: result.data }]);
}
