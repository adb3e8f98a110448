export {
  createDefaultRules,
  verificationDate,
  isoDay,
  ICON_KEY,
  VERIFIED_DATE_KEY,
  POPULATION_DATE_KEY,
  PENDING_ICON,
  type DefaultRuleOptions,
} from './rules.js';

export { LintRuleSet, createDefaultRuleSet } from './rule-set.js';

export {
  LintCache,
  type LintCacheOptions,
  type LintCacheStats,
  type GetOrComputeOptions,
} from './lint-cache.js';

export { applyAutofix } from './autofix.js';
