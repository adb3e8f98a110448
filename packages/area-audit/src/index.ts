/**
 * Area validation and linting engine
 *
 * @packageDocumentation
 */

export * from './core/types/index.js';
export * from './validators/index.js';
export * from './lint/index.js';
export * from './audit/index.js';

export {
  LintRuleFaultError,
  isLintRuleFaultError,
  AutofixUnavailableError,
  ConfigError,
  isConfigError,
} from './core/errors.js';

export {
  loadEngineConfig,
  DEFAULT_ENGINE_CONFIG,
  type EngineConfig,
  type EngineConfigOverrides,
  type CacheConfig,
  type LintConfig,
} from './core/config.js';

export {
  Logger,
  logger,
  createLogger,
  silentLogger,
  type EngineLogger,
  type LogLevel,
  type LogMetadata,
} from './core/utils/logger.js';

export { canonicalJson, fingerprintRecord } from './core/utils/fingerprint.js';
export { roundHalfUp, MAX_NUMERIC_VALUE } from './core/utils/numeric.js';

export {
  CONTINENTS,
  GEOMETRY_KEY,
  AREA_KM2_KEY,
  getFieldSpecs,
  getFieldSpec,
} from './schemas/area-types.js';
export { parseAreaRecord, RawAreaRecordSchema, type RawAreaRecord } from './schemas/raw-record.js';

export { createAuditEngine, type AuditEngine, type AuditEngineOptions } from './engine.js';
