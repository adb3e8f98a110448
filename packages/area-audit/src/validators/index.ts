export {
  validateField,
  validateTagKey,
  validateText,
  validateInteger,
  validateNumber,
  validateDate,
  validateUrl,
  validateEmail,
  validatePhone,
  validateSelect,
  isCalendarDate,
  type FieldResult,
} from './field-validator.js';

export {
  normalizeGeometry,
  rewindGeometry,
  computeAreaM2,
  equalAreaProjection,
  findAntimeridianEdge,
  polygonsOf,
  type NormalizedGeometry,
} from './geometry-normalizer.js';

export {
  validateAreaRecord,
  denormalizeRecord,
  isAbsent,
  type SchemaResult,
} from './schema-validator.js';

export { planTagUpdate, type TagChange, type TagUpdateResult } from './tag-update.js';
