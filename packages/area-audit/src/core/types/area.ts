/**
 * Area Record Types
 *
 * Records describing community and country areas as supplied by the external
 * area source, and the normalized copies produced by schema validation.
 *
 * OWNERSHIP: AreaRecord belongs to the external collaborator and is never
 * mutated here. Validation always returns a fresh NormalizedRecord.
 */

import type { MultiPolygon, Polygon } from 'geojson';

/**
 * Area types with a field schema
 */
export const AREA_TYPES = ['community', 'country'] as const;

export type AreaType = (typeof AREA_TYPES)[number];

/**
 * Value kinds a FieldSpec can declare
 */
export type ValueKind =
  | 'text'
  | 'integer'
  | 'number'
  | 'date'
  | 'url'
  | 'email'
  | 'phone'
  | 'select'
  | 'geometry';

/**
 * Schema entry for a single tag of an area type
 */
export interface FieldSpec {
  readonly key: string;
  readonly valueKind: ValueKind;
  readonly required: boolean;
  /** Canonical values for `select` fields (matched case-insensitively) */
  readonly allowedValues?: readonly string[];
}

/**
 * Boundary geometry accepted for an area
 */
export type AreaGeometry = Polygon | MultiPolygon;

/**
 * Raw area record as held by the external source.
 * Tag values are untyped until validated.
 */
export interface AreaRecord {
  readonly id: string;
  readonly type: AreaType;
  readonly tags: Readonly<Record<string, unknown>>;
  readonly createdAt?: string;
  readonly updatedAt?: string;
  readonly deletedAt?: string;
}

/**
 * Canonical typed value of a schema-known tag
 */
export type NormalizedValue = string | number | AreaGeometry;

/**
 * Area record whose schema-known tags have all passed validation.
 *
 * `tags` keeps the input order of known tags; `customTags` carries every tag
 * no FieldSpec covers, untouched.
 */
export interface NormalizedRecord {
  readonly id: string;
  readonly type: AreaType;
  readonly tags: Readonly<Record<string, NormalizedValue>>;
  readonly customTags: Readonly<Record<string, unknown>>;
  readonly createdAt?: string;
  readonly updatedAt?: string;
  readonly deletedAt?: string;
}

/**
 * Type guard for supported area types
 */
export function isAreaType(value: unknown): value is AreaType {
  return typeof value === 'string' && (AREA_TYPES as readonly string[]).includes(value);
}
