/**
 * Field Validator
 *
 * Type-specific checks for a single tag value. Each check either returns the
 * canonical value or a ValidationError; none of them throws for malformed input.
 *
 * CANONICAL VALUES:
 * - text, url, email: trimmed string
 * - integer: JS integer in [0, 1e9]
 * - number: JS number in [0, 1e9], rounded half-up to 2 decimals
 * - date: the YYYY-MM-DD string
 * - phone: digits with optional leading '+', formatting punctuation stripped
 * - select: the registry casing of the matched allowed value
 * - geometry: rewound Polygon/MultiPolygon
 */

import {
  fail,
  ok,
  validationError,
  type NormalizedValue,
  type Result,
  type ValidationError,
  type ValueKind,
} from '../core/types/index.js';
import { MAX_NUMERIC_VALUE, roundHalfUp } from '../core/utils/numeric.js';
import { normalizeGeometry } from './geometry-normalizer.js';

export type FieldResult<T = NormalizedValue> = Result<T, ValidationError>;

const INTEGER_PATTERN = /^\d+$/;
const NEGATIVE_INTEGER_PATTERN = /^-\d+$/;
const DECIMAL_PATTERN = /^(\d+\.?\d*|\.\d+)$/;
const NEGATIVE_DECIMAL_PATTERN = /^-(\d+\.?\d*|\.\d+)$/;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const PHONE_PATTERN = /^\+?\d{9,15}$/;
const PHONE_PUNCTUATION = /[\s\-.()]/g;
const TAG_KEY_PATTERN = /^[a-zA-Z][a-zA-Z0-9_:]*$/;

// ============================================================================
// Helpers
// ============================================================================

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/**
 * Coerce a raw value to a trimmed string, accepting finite numbers
 */
function asText(field: string, raw: unknown): FieldResult<string> {
  if (typeof raw === 'string') {
    return ok(raw.trim());
  }
  if (typeof raw === 'number' && Number.isFinite(raw)) {
    return ok(String(raw));
  }
  return fail(
    validationError(field, 'type_mismatch', `Expected a string, received ${describeType(raw)}`)
  );
}

function checkRange(field: string, value: number, label: string): FieldResult<number> {
  if (value < 0 || value > MAX_NUMERIC_VALUE) {
    return fail(
      validationError(
        field,
        'out_of_range',
        `Value must be a non-negative ${label} no greater than ${MAX_NUMERIC_VALUE.toLocaleString('en-US')}`
      )
    );
  }
  // -0 passes the range check; hand back a plain zero
  return ok(value === 0 ? 0 : value);
}

// ============================================================================
// Kind Validators
// ============================================================================

export function validateText(field: string, raw: unknown): FieldResult<string> {
  const text = asText(field, raw);
  if (!text.success) return text;
  if (text.data.length === 0) {
    return fail(validationError(field, 'format_invalid', 'Value cannot be empty'));
  }
  return text;
}

export function validateInteger(field: string, raw: unknown): FieldResult<number> {
  if (typeof raw === 'number') {
    if (!Number.isFinite(raw) || !Number.isInteger(raw)) {
      return fail(validationError(field, 'type_mismatch', 'Value must be an integer'));
    }
    return checkRange(field, raw, 'integer');
  }

  if (typeof raw !== 'string') {
    return fail(
      validationError(field, 'type_mismatch', `Expected an integer, received ${describeType(raw)}`)
    );
  }

  const text = raw.trim();
  if (NEGATIVE_INTEGER_PATTERN.test(text)) {
    return checkRange(field, Number(text), 'integer');
  }
  if (!INTEGER_PATTERN.test(text)) {
    return fail(
      validationError(field, 'format_invalid', 'Value must be a valid integer (digits only, no decimal point)')
    );
  }
  return checkRange(field, Number(text), 'integer');
}

export function validateNumber(field: string, raw: unknown): FieldResult<number> {
  let value: number;

  if (typeof raw === 'number') {
    if (!Number.isFinite(raw)) {
      return fail(validationError(field, 'type_mismatch', 'Value must be a finite number'));
    }
    value = raw;
  } else if (typeof raw === 'string') {
    const text = raw.trim();
    if (!DECIMAL_PATTERN.test(text) && !NEGATIVE_DECIMAL_PATTERN.test(text)) {
      return fail(
        validationError(
          field,
          'format_invalid',
          'Value must contain only digits and at most one decimal point'
        )
      );
    }
    value = Number(text);
  } else {
    return fail(
      validationError(field, 'type_mismatch', `Expected a number, received ${describeType(raw)}`)
    );
  }

  const ranged = checkRange(field, value, 'number');
  if (!ranged.success) return ranged;
  return ok(roundHalfUp(ranged.data, 2));
}

/**
 * True when year/month/day name a real calendar day (leap years included)
 */
export function isCalendarDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) {
    return false;
  }
  // setUTCFullYear keeps years 0-99 literal; Date.UTC maps them to 19xx
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

export function validateDate(field: string, raw: unknown): FieldResult<string> {
  if (typeof raw !== 'string') {
    return fail(
      validationError(field, 'type_mismatch', `Expected a date string, received ${describeType(raw)}`)
    );
  }

  const text = raw.trim();
  const match = DATE_PATTERN.exec(text);
  if (!match || !isCalendarDate(Number(match[1]), Number(match[2]), Number(match[3]))) {
    return fail(
      validationError(field, 'format_invalid', 'Invalid date. Please use a real date in YYYY-MM-DD format')
    );
  }
  return ok(text);
}

export function validateUrl(field: string, raw: unknown): FieldResult<string> {
  const text = asText(field, raw);
  if (!text.success) return text;

  let parsed: URL;
  try {
    parsed = new URL(text.data);
  } catch {
    return fail(validationError(field, 'format_invalid', 'Invalid URL format'));
  }

  if (parsed.protocol.length <= 1 || parsed.host.length === 0) {
    return fail(
      validationError(field, 'format_invalid', 'URL must include a scheme and a host')
    );
  }
  return ok(text.data);
}

export function validateEmail(field: string, raw: unknown): FieldResult<string> {
  const text = asText(field, raw);
  if (!text.success) return text;
  if (!EMAIL_PATTERN.test(text.data)) {
    return fail(validationError(field, 'format_invalid', 'Invalid email format'));
  }
  return ok(text.data);
}

export function validatePhone(field: string, raw: unknown): FieldResult<string> {
  const text = asText(field, raw);
  if (!text.success) return text;
  const stripped = text.data.replace(PHONE_PUNCTUATION, '');
  if (!PHONE_PATTERN.test(stripped)) {
    return fail(
      validationError(field, 'format_invalid', 'Invalid phone number format (9 to 15 digits, optional leading +)')
    );
  }
  return ok(stripped);
}

export function validateSelect(
  field: string,
  raw: unknown,
  allowedValues: readonly string[] = []
): FieldResult<string> {
  const text = asText(field, raw);
  if (!text.success) return text;

  const wanted = text.data.toLowerCase();
  const match = allowedValues.find((candidate) => candidate.toLowerCase() === wanted);
  if (match === undefined) {
    const choices = allowedValues.length > 0 ? allowedValues.join(', ') : '(none configured)';
    return fail(
      validationError(field, 'not_allowed', `Invalid value. Please choose from ${choices}`)
    );
  }
  return ok(match);
}

// ============================================================================
// Dispatch
// ============================================================================

/**
 * Validate a raw value against a value kind
 *
 * @param valueKind - Kind declared by the field's FieldSpec
 * @param rawValue - Untyped value from the area record
 * @param allowedValues - Canonical values for `select` fields
 * @param field - Field name reported in errors
 */
export function validateField(
  valueKind: ValueKind,
  rawValue: unknown,
  allowedValues?: readonly string[],
  field: string = valueKind
): FieldResult {
  switch (valueKind) {
    case 'text':
      return validateText(field, rawValue);
    case 'integer':
      return validateInteger(field, rawValue);
    case 'number':
      return validateNumber(field, rawValue);
    case 'date':
      return validateDate(field, rawValue);
    case 'url':
      return validateUrl(field, rawValue);
    case 'email':
      return validateEmail(field, rawValue);
    case 'phone':
      return validatePhone(field, rawValue);
    case 'select':
      return validateSelect(field, rawValue, allowedValues);
    case 'geometry': {
      const normalized = normalizeGeometry(rawValue, field);
      return normalized.success ? ok(normalized.data.geometry) : normalized;
    }
  }
}

/**
 * Validate a tag key a user wants to add to an area
 *
 * @param key - Proposed key
 * @param existingKeys - Keys already present on the area
 */
export function validateTagKey(
  key: string,
  existingKeys: readonly string[] = []
): FieldResult<string> {
  const trimmed = key.trim();
  if (trimmed.length === 0) {
    return fail(validationError('key', 'missing', 'Key cannot be empty'));
  }
  if (!TAG_KEY_PATTERN.test(trimmed)) {
    return fail(
      validationError(
        'key',
        'format_invalid',
        'Key must start with a letter and contain only letters, numbers, underscores, and colons'
      )
    );
  }
  if (existingKeys.includes(trimmed)) {
    return fail(validationError('key', 'not_allowed', 'Key already exists'));
  }
  return ok(trimmed);
}
