/**
 * Geometry Normalizer
 *
 * Validates an area boundary, rewinds its rings to the RFC 7946 convention and
 * derives its surface area through an equal-area projection.
 *
 * PIPELINE:
 * 1. Decode (JSON string or parsed object)
 * 2. Type gate (Polygon | MultiPolygon only)
 * 3. Ring structure (closed, >= 4 positions, finite, WGS84 ranges, non-empty)
 * 4. Antimeridian gate (an edge spanning > 180° of longitude is rejected)
 * 5. Rewind (exterior counter-clockwise, holes clockwise)
 * 6. Area: Albers Equal Area on WGS84, shoelace in metres, km² rounded half-up
 *
 * Never throws for malformed input; every failure is a ValidationError.
 */

import { bbox, booleanClockwise } from '@turf/turf';
import type { MultiPolygon, Polygon, Position } from 'geojson';
import proj4 from 'proj4';
import { z } from 'zod';
import {
  fail,
  ok,
  validationError,
  type AreaGeometry,
  type Result,
  type ValidationError,
} from '../core/types/index.js';
import { roundHalfUp } from '../core/utils/numeric.js';
import { GEOMETRY_KEY } from '../schemas/area-types.js';

export interface NormalizedGeometry {
  readonly geometry: AreaGeometry;
  readonly areaKm2: number;
}

// ============================================================================
// Coordinate Schemas
// ============================================================================

const PositionSchema = z
  .array(
    z
      .number({ invalid_type_error: 'Coordinates must be numbers' })
      .finite('Coordinates must be finite numbers')
  )
  .min(2, 'Each position needs a longitude and a latitude')
  .superRefine((position, ctx) => {
    const [lon, lat] = position;
    if (lon < -180 || lon > 180) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Longitude ${lon} is outside [-180, 180]`,
      });
    }
    if (lat < -90 || lat > 90) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Latitude ${lat} is outside [-90, 90]`,
      });
    }
  });

const RingSchema = z
  .array(PositionSchema, { invalid_type_error: 'Rings must be arrays of positions' })
  .min(4, 'Rings need at least 4 positions')
  .refine(
    (ring) => ring.length > 0 && samePosition(ring[0], ring[ring.length - 1]),
    'Rings must be closed (first position equal to last)'
  );

const PolygonCoordinatesSchema = z
  .array(RingSchema, { invalid_type_error: 'Polygon coordinates must be an array of rings' })
  .min(1, 'Polygon has no rings');

const MultiPolygonCoordinatesSchema = z
  .array(PolygonCoordinatesSchema, {
    invalid_type_error: 'MultiPolygon coordinates must be an array of polygons',
  })
  .min(1, 'MultiPolygon has no polygons');

const GeometryEnvelopeSchema = z.object({
  type: z.string({ required_error: 'Geometry has no type', invalid_type_error: 'Geometry type must be a string' }),
  coordinates: z.unknown(),
});

function samePosition(a: Position, b: Position): boolean {
  return a.length === b.length && a.every((value, index) => value === b[index]);
}

function describeIssue(error: z.ZodError): string {
  const issue = error.errors[0];
  if (!issue) {
    return 'Invalid coordinates';
  }
  const path = issue.path.length > 0 ? `coordinates[${issue.path.join('][')}]: ` : '';
  return `${path}${issue.message}`;
}

// ============================================================================
// Decoding and Structure
// ============================================================================

function decode(raw: unknown, field: string): Result<unknown, ValidationError> {
  if (typeof raw !== 'string') {
    return ok(raw);
  }
  try {
    return ok(JSON.parse(raw));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return fail(validationError(field, 'format_invalid', `Invalid JSON: ${reason}`));
  }
}

function parseStructure(value: unknown, field: string): Result<AreaGeometry, ValidationError> {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return fail(
      validationError(field, 'format_invalid', 'GeoJSON must be a JSON object or a JSON-encoded object')
    );
  }

  const envelope = GeometryEnvelopeSchema.safeParse(value);
  if (!envelope.success) {
    const message = envelope.error.errors[0]?.message ?? 'Invalid geometry';
    return fail(validationError(field, 'geometry_invalid', message));
  }

  const { type, coordinates } = envelope.data;

  if (type === 'Polygon') {
    const parsed = PolygonCoordinatesSchema.safeParse(coordinates);
    if (!parsed.success) {
      return fail(validationError(field, 'geometry_invalid', describeIssue(parsed.error)));
    }
    const polygon: Polygon = { type: 'Polygon', coordinates: parsed.data };
    return ok(polygon);
  }

  if (type === 'MultiPolygon') {
    const parsed = MultiPolygonCoordinatesSchema.safeParse(coordinates);
    if (!parsed.success) {
      return fail(validationError(field, 'geometry_invalid', describeIssue(parsed.error)));
    }
    const multiPolygon: MultiPolygon = { type: 'MultiPolygon', coordinates: parsed.data };
    return ok(multiPolygon);
  }

  return fail(
    validationError(
      field,
      'geometry_invalid',
      `Only Polygon and MultiPolygon geometries are accepted (got ${type})`
    )
  );
}

/**
 * Polygons of a geometry as ring arrays
 */
export function polygonsOf(geometry: AreaGeometry): Position[][][] {
  return geometry.type === 'Polygon' ? [geometry.coordinates] : geometry.coordinates;
}

/**
 * First edge whose longitude jump exceeds 180°, if any.
 * Such an edge almost always means a ring that wraps the antimeridian,
 * which inflates the projected area.
 */
export function findAntimeridianEdge(geometry: AreaGeometry): readonly [Position, Position] | null {
  for (const polygon of polygonsOf(geometry)) {
    for (const ring of polygon) {
      for (let i = 1; i < ring.length; i++) {
        if (Math.abs(ring[i][0] - ring[i - 1][0]) > 180) {
          return [ring[i - 1], ring[i]];
        }
      }
    }
  }
  return null;
}

// ============================================================================
// Winding
// ============================================================================

function orientRing(ring: Position[], clockwise: boolean): Position[] {
  const copy = ring.map((position) => [...position]);
  return booleanClockwise(copy) === clockwise ? copy : copy.reverse();
}

function rewindPolygon(rings: Position[][]): Position[][] {
  return rings.map((ring, index) => orientRing(ring, index > 0));
}

/**
 * Rewind to RFC 7946: exterior rings counter-clockwise, holes clockwise.
 * Returns a new geometry; idempotent.
 */
export function rewindGeometry(geometry: AreaGeometry): AreaGeometry {
  if (geometry.type === 'Polygon') {
    return { type: 'Polygon', coordinates: rewindPolygon(geometry.coordinates) };
  }
  return { type: 'MultiPolygon', coordinates: geometry.coordinates.map(rewindPolygon) };
}

// ============================================================================
// Area
// ============================================================================

/**
 * Equal-area projection for a geometry's bounding box.
 *
 * Albers with standard parallels at the box's latitude limits. Albers is
 * undefined when the parallels mirror each other across the equator, so
 * boxes centred on the equator use Lambert cylindrical equal-area instead.
 */
export function equalAreaProjection(geometry: AreaGeometry): string {
  const [minLon, minLat, maxLon, maxLat] = bbox(geometry);
  const lon0 = (minLon + maxLon) / 2;

  if (Math.abs(minLat + maxLat) < 1) {
    return `+proj=cea +lon_0=${lon0} +lat_ts=0 +x_0=0 +y_0=0 +ellps=WGS84 +units=m +no_defs`;
  }

  const lat0 = (minLat + maxLat) / 2;
  return (
    `+proj=aea +lat_1=${minLat} +lat_2=${maxLat} +lat_0=${lat0} +lon_0=${lon0} ` +
    '+x_0=0 +y_0=0 +ellps=WGS84 +units=m +no_defs'
  );
}

function planarRingArea(ring: readonly Position[]): number {
  // Translate to the first vertex to keep the cross products small
  const [x0, y0] = ring[0];
  let sum = 0;
  for (let i = 0; i < ring.length - 1; i++) {
    const [x1, y1] = ring[i];
    const [x2, y2] = ring[i + 1];
    sum += (x1 - x0) * (y2 - y0) - (x2 - x0) * (y1 - y0);
  }
  return Math.abs(sum) / 2;
}

/**
 * Surface area in square metres
 */
export function computeAreaM2(geometry: AreaGeometry): number {
  const converter = proj4('WGS84', equalAreaProjection(geometry));
  const project = (ring: Position[]): Position[] =>
    ring.map(([lon, lat]) => converter.forward([lon, lat]));

  let total = 0;
  for (const polygon of polygonsOf(geometry)) {
    const [exterior, ...holes] = polygon;
    total += planarRingArea(project(exterior));
    for (const hole of holes) {
      total -= planarRingArea(project(hole));
    }
  }
  return Math.max(total, 0);
}

// ============================================================================
// Entry Point
// ============================================================================

/**
 * Validate, rewind and measure a GeoJSON boundary
 *
 * @param raw - GeoJSON geometry as a JSON string or a parsed object
 * @param field - Field name reported in errors
 */
export function normalizeGeometry(
  raw: unknown,
  field: string = GEOMETRY_KEY
): Result<NormalizedGeometry, ValidationError> {
  const decoded = decode(raw, field);
  if (!decoded.success) {
    return decoded;
  }

  const structure = parseStructure(decoded.data, field);
  if (!structure.success) {
    return structure;
  }

  const crossing = findAntimeridianEdge(structure.data);
  if (crossing) {
    const [from, to] = crossing;
    return fail(
      validationError(
        field,
        'geometry_invalid',
        `Geometry appears to cross the antimeridian (edge from longitude ${from[0]} to ${to[0]}); ` +
          'split it into a MultiPolygon at ±180°'
      )
    );
  }

  const geometry = rewindGeometry(structure.data);

  let areaM2: number;
  try {
    areaM2 = computeAreaM2(geometry);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return fail(validationError(field, 'geometry_invalid', `Area could not be computed: ${reason}`));
  }

  if (!Number.isFinite(areaM2)) {
    return fail(validationError(field, 'geometry_invalid', 'Area could not be computed'));
  }

  return ok({ geometry, areaKm2: roundHalfUp(areaM2 / 1_000_000, 2) });
}
