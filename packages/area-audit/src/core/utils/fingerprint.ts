/**
 * Record fingerprinting for lint cache staleness checks
 *
 * The fingerprint covers everything a lint rule can read: type, tags, custom
 * tags and updatedAt. Object keys are sorted recursively, so two records with
 * the same logical content hash identically whatever their tag order.
 */

import { createHash } from 'node:crypto';
import type { NormalizedRecord } from '../types/index.js';

/**
 * Serialize a value to JSON with object keys sorted at every depth.
 * `undefined` object members are dropped, as JSON.stringify does.
 */
export function canonicalJson(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }

  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalJson(item)).join(',')}]`;
  }

  const entries = Object.entries(value)
    .filter(([, member]) => member !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, member]) => `${JSON.stringify(key)}:${canonicalJson(member)}`);

  return `{${entries.join(',')}}`;
}

/**
 * SHA-256 hex fingerprint of a normalized record's lint-relevant content
 */
export function fingerprintRecord(record: NormalizedRecord): string {
  const content = canonicalJson({
    type: record.type,
    tags: record.tags,
    customTags: record.customTags,
    updatedAt: record.updatedAt ?? null,
    deletedAt: record.deletedAt ?? null,
  });

  return createHash('sha256').update(content).digest('hex');
}
