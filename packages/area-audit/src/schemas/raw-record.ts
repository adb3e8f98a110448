/**
 * Raw area record parsing
 *
 * Boundary schema for records handed over by the HTTP/RPC adapter. Accepts the
 * external source's snake_case timestamps as well as camelCase, numeric ids,
 * and the area type either at the top level or as the `type` tag.
 */

import { z } from 'zod';
import {
  fail,
  isAreaType,
  ok,
  validationError,
  AREA_TYPES,
  type AreaRecord,
  type Result,
  type ValidationError,
  type ValidationErrorKind,
} from '../core/types/index.js';

const TimestampSchema = z.string().min(1).nullish();

export const RawAreaRecordSchema = z.object({
  id: z.union([z.string().trim().min(1, 'id cannot be empty'), z.number().int()]),
  type: z.string().optional(),
  tags: z.record(z.string(), z.unknown()).default({}),
  created_at: TimestampSchema,
  updated_at: TimestampSchema,
  deleted_at: TimestampSchema,
  createdAt: TimestampSchema,
  updatedAt: TimestampSchema,
  deletedAt: TimestampSchema,
});

export type RawAreaRecord = z.input<typeof RawAreaRecordSchema>;

function issueKind(issue: z.ZodIssue): ValidationErrorKind {
  if (issue.code === z.ZodIssueCode.invalid_type) {
    return issue.received === 'undefined' ? 'missing' : 'type_mismatch';
  }
  if (issue.code === z.ZodIssueCode.invalid_union) {
    // Every branch failing on type means the value itself had the wrong type
    const branches = issue.unionErrors.flatMap((error) => error.errors);
    if (branches.every((branch) => branch.code === z.ZodIssueCode.invalid_type)) {
      return branches.every((branch) => branch.code === z.ZodIssueCode.invalid_type && branch.received === 'undefined')
        ? 'missing'
        : 'type_mismatch';
    }
  }
  return 'format_invalid';
}

function toValidationError(issue: z.ZodIssue): ValidationError {
  const field = issue.path.join('.') || 'record';
  const kind = issueKind(issue);
  return validationError(field, kind, kind === 'missing' ? `${field} is required` : issue.message);
}

function firstDefined(...values: ReadonlyArray<string | null | undefined>): string | undefined {
  for (const value of values) {
    if (typeof value === 'string') {
      return value;
    }
  }
  return undefined;
}

/**
 * Parse untyped adapter input into an AreaRecord
 */
export function parseAreaRecord(input: unknown): Result<AreaRecord, readonly ValidationError[]> {
  const parsed = RawAreaRecordSchema.safeParse(input);
  if (!parsed.success) {
    return fail(parsed.error.errors.map(toValidationError));
  }

  const raw = parsed.data;
  const type = raw.type ?? raw.tags.type;
  if (!isAreaType(type)) {
    return fail([
      validationError(
        'type',
        'not_allowed',
        `Invalid area type ${JSON.stringify(type ?? null)}. Expected one of ${AREA_TYPES.join(', ')}`
      ),
    ]);
  }

  const createdAt = firstDefined(raw.createdAt, raw.created_at);
  const updatedAt = firstDefined(raw.updatedAt, raw.updated_at);
  const deletedAt = firstDefined(raw.deletedAt, raw.deleted_at);

  return ok({
    id: String(raw.id),
    type,
    tags: raw.tags,
    ...(createdAt !== undefined && { createdAt }),
    ...(updatedAt !== undefined && { updatedAt }),
    ...(deletedAt !== undefined && { deletedAt }),
  });
}
