/**
 * Wires the rule set, lint cache and corpus auditor from one EngineConfig
 */

import { CorpusAuditor } from './audit/corpus-auditor.js';
import type { EngineConfig } from './core/config.js';
import { createLogger, type EngineLogger } from './core/utils/logger.js';
import { LintCache } from './lint/lint-cache.js';
import { createDefaultRuleSet, type LintRuleSet } from './lint/rule-set.js';

export interface AuditEngine {
  readonly ruleSet: LintRuleSet;
  readonly cache: LintCache;
  readonly auditor: CorpusAuditor;
  /** Stop background work so the process can exit */
  dispose(): void;
}

export interface AuditEngineOptions {
  readonly logger?: EngineLogger;
  readonly now?: () => Date;
  /** Start the periodic prune; long-running hosts only */
  readonly sweep?: boolean;
}

export function createAuditEngine(config: EngineConfig, options: AuditEngineOptions = {}): AuditEngine {
  const logger = options.logger ?? createLogger({ module: 'engine' });
  const now = options.now ?? (() => new Date());

  const ruleSet = createDefaultRuleSet(config.lint, now);
  const cache = new LintCache({
    evaluator: ruleSet,
    config: config.cache,
    now: () => now().getTime(),
    logger,
  });
  const auditor = new CorpusAuditor({ cache, logger, now });

  if (options.sweep) {
    cache.startSweeper(config.cache.sweepIntervalMs);
  }

  logger.debug('Audit engine ready', {
    rules: ruleSet.rules().length,
    ruleSetVersion: ruleSet.version,
    cacheTtlMs: config.cache.ttlMs,
    cacheMaxEntries: config.cache.maxEntries,
  });

  return {
    ruleSet,
    cache,
    auditor,
    dispose: () => cache.stopSweeper(),
  };
}
