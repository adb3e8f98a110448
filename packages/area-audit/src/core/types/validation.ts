/**
 * Validation Result Types
 *
 * Input-shaped failures are returned as values, never thrown.
 */

/**
 * Failure categories reported for a single field
 */
export type ValidationErrorKind =
  | 'missing'
  | 'type_mismatch'
  | 'out_of_range'
  | 'format_invalid'
  | 'geometry_invalid'
  | 'not_allowed';

/**
 * Field-level validation failure rendered inline by the UI adapter
 */
export interface ValidationError {
  readonly field: string;
  readonly kind: ValidationErrorKind;
  readonly message: string;
}

/**
 * Discriminated result of a validation step
 */
export type Result<T, E> =
  | { readonly success: true; readonly data: T }
  | { readonly success: false; readonly error: E };

export function ok<T>(data: T): { readonly success: true; readonly data: T } {
  return { success: true, data };
}

export function fail<E>(error: E): { readonly success: false; readonly error: E } {
  return { success: false, error };
}

/**
 * Build a ValidationError
 */
export function validationError(
  field: string,
  kind: ValidationErrorKind,
  message: string
): ValidationError {
  return { field, kind, message };
}
