/**
 * Field schema registry per area type
 *
 * Defined once at module load and frozen. Registry order is the order in
 * which validation errors are reported.
 */

import type { AreaType, FieldSpec } from '../core/types/index.js';

export const CONTINENTS = [
  'africa',
  'asia',
  'europe',
  'north-america',
  'oceania',
  'south-america',
] as const;

/** Tag holding the boundary geometry */
export const GEOMETRY_KEY = 'geo_json';

/** Tag holding the derived surface area */
export const AREA_KM2_KEY = 'area_km2';

const url = (key: string): FieldSpec => ({ key, valueKind: 'url', required: false });

const COMMUNITY_FIELDS: readonly FieldSpec[] = [
  { key: 'name', valueKind: 'text', required: true },
  { key: 'population', valueKind: 'integer', required: true },
  { key: 'population:date', valueKind: 'date', required: true },
  { key: GEOMETRY_KEY, valueKind: 'geometry', required: true },
  { key: 'url_alias', valueKind: 'text', required: false },
  { key: 'continent', valueKind: 'select', required: false, allowedValues: CONTINENTS },
  { key: 'icon:square', valueKind: 'text', required: false },
  { key: AREA_KM2_KEY, valueKind: 'number', required: false },
  { key: 'verified:date', valueKind: 'date', required: false },
  { key: 'organization', valueKind: 'text', required: false },
  { key: 'language', valueKind: 'text', required: false },
  { key: 'description', valueKind: 'text', required: false },
  { key: 'contact:email', valueKind: 'email', required: false },
  { key: 'contact:phone', valueKind: 'phone', required: false },
  { key: 'contact:nostr', valueKind: 'text', required: false },
  { key: 'tips:lightning_address', valueKind: 'text', required: false },
  url('contact:website'),
  url('contact:twitter'),
  url('contact:telegram'),
  url('contact:signal'),
  url('contact:whatsapp'),
  url('contact:meetup'),
  url('contact:discord'),
  url('contact:instagram'),
  url('contact:youtube'),
  url('contact:facebook'),
  url('contact:linkedin'),
  url('contact:rss'),
  url('contact:github'),
  url('contact:matrix'),
  url('contact:geyser'),
];

const COUNTRY_FIELDS: readonly FieldSpec[] = [
  { key: 'name', valueKind: 'text', required: true },
  { key: 'url_alias', valueKind: 'text', required: false },
  { key: 'population', valueKind: 'integer', required: false },
  { key: 'population:date', valueKind: 'date', required: false },
  { key: 'capital', valueKind: 'text', required: false },
  { key: 'continent', valueKind: 'select', required: false, allowedValues: CONTINENTS },
  { key: GEOMETRY_KEY, valueKind: 'geometry', required: false },
  { key: AREA_KM2_KEY, valueKind: 'number', required: false },
  { key: 'icon:square', valueKind: 'text', required: false },
  { key: 'verified:date', valueKind: 'date', required: false },
  url('contact:website'),
];

const REGISTRY: Readonly<Record<AreaType, readonly FieldSpec[]>> = Object.freeze({
  community: Object.freeze(COMMUNITY_FIELDS.map((spec) => Object.freeze(spec))),
  country: Object.freeze(COUNTRY_FIELDS.map((spec) => Object.freeze(spec))),
});

/**
 * Field specs for an area type, in registry order
 */
export function getFieldSpecs(type: AreaType): readonly FieldSpec[] {
  return REGISTRY[type];
}

/**
 * Spec for a single key, if the area type declares it
 */
export function getFieldSpec(type: AreaType, key: string): FieldSpec | undefined {
  return REGISTRY[type].find((spec) => spec.key === key);
}
