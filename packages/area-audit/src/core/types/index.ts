export {
  AREA_TYPES,
  isAreaType,
  type AreaType,
  type ValueKind,
  type FieldSpec,
  type AreaGeometry,
  type AreaRecord,
  type NormalizedValue,
  type NormalizedRecord,
} from './area.js';

export {
  ok,
  fail,
  validationError,
  type ValidationErrorKind,
  type ValidationError,
  type Result,
} from './validation.js';

export {
  SEVERITIES,
  isSeverity,
  type Severity,
  type LintIssue,
  type LintFinding,
  type LintRule,
  type LintEvaluator,
  type CacheEntry,
} from './lint.js';
