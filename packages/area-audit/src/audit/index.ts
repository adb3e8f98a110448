export {
  CorpusAuditor,
  deriveCountry,
  toBoundary,
  URL_ALIAS_CLASH_RULE,
  URL_ALIAS_KEY,
  type AreaAuditResult,
  type AuditedAreaType,
  type CountryBoundary,
  type CorpusAuditReport,
  type CorpusAuditorOptions,
} from './corpus-auditor.js';

export {
  filterResults,
  summarizeResults,
  matchesTagFilters,
  listTagKeys,
  listCountriesWithCommunities,
  worstSeverity,
  type ResultFilters,
  type AuditSummary,
  type CountryRef,
} from './report-filters.js';
