/**
 * Lint Cache
 *
 * Memoizes lint results per area, keyed by a fingerprint of the normalized
 * record and the evaluator's evaluation key (its version, plus the day for
 * clock-dependent rule sets).
 *
 * Concurrency model:
 * - At most one evaluation per area is in flight.
 * - Callers presenting the same fingerprint join the in-flight evaluation and
 *   receive the identical issues array.
 * - A caller with a different fingerprint waits for the in-flight evaluation to
 *   settle, then re-checks the cache and evaluates its own record if needed.
 * - invalidate() drops the entry and marks any in-flight evaluation so its
 *   result is returned to its callers but never stored.
 * - A faulted evaluation rejects every waiter and stores nothing.
 *
 * Eviction: entries older than ttlMs are reclaimed on access or by prune();
 * past maxEntries the least recently used entry goes first.
 */

import type { CacheConfig } from '../core/config.js';
import { DEFAULT_ENGINE_CONFIG } from '../core/config.js';
import { isLintRuleFaultError } from '../core/errors.js';
import type {
  CacheEntry,
  LintEvaluator,
  LintIssue,
  NormalizedRecord,
} from '../core/types/index.js';
import { fingerprintRecord } from '../core/utils/fingerprint.js';
import { createLogger, type EngineLogger } from '../core/utils/logger.js';

export interface LintCacheOptions {
  readonly evaluator: LintEvaluator;
  readonly config?: Partial<CacheConfig>;
  /** Epoch milliseconds; injectable for TTL tests */
  readonly now?: () => number;
  readonly logger?: EngineLogger;
}

export interface GetOrComputeOptions {
  /**
   * Stops this caller from waiting. The shared evaluation keeps running and
   * its result is still stored for other callers.
   */
  readonly signal?: AbortSignal;
}

export interface LintCacheStats {
  readonly hits: number;
  readonly misses: number;
  /** Callers that joined an in-flight evaluation */
  readonly joins: number;
  readonly evaluations: number;
  readonly faults: number;
  readonly evictions: number;
  readonly size: number;
  readonly inFlight: number;
}

interface InFlightEvaluation {
  readonly fingerprint: string;
  readonly evaluationKey: string;
  readonly promise: Promise<readonly LintIssue[]>;
  /** Set by invalidate()/clear(); the result is returned but not stored */
  disowned: boolean;
}

export class LintCache {
  private readonly evaluator: LintEvaluator;
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;
  private readonly log: EngineLogger;

  // Map iteration order doubles as LRU order (oldest first)
  private readonly entries = new Map<string, CacheEntry>();
  private readonly inFlight = new Map<string, InFlightEvaluation>();
  private sweeper: NodeJS.Timeout | null = null;

  // Metrics
  private hits = 0;
  private misses = 0;
  private joins = 0;
  private evaluations = 0;
  private faults = 0;
  private evictions = 0;

  constructor(options: LintCacheOptions) {
    const defaults = DEFAULT_ENGINE_CONFIG.cache;
    this.evaluator = options.evaluator;
    this.ttlMs = options.config?.ttlMs ?? defaults.ttlMs;
    this.maxEntries = options.config?.maxEntries ?? defaults.maxEntries;
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? createLogger({ module: 'lint-cache' });
  }

  /**
   * Cached issues for the record, evaluating at most once per area at a time
   *
   * @throws LintRuleFaultError when the evaluation faults
   */
  async getOrCompute(
    areaId: string,
    record: NormalizedRecord,
    options: GetOrComputeOptions = {}
  ): Promise<readonly LintIssue[]> {
    const { signal } = options;
    if (signal?.aborted) {
      throw abortReason(signal);
    }

    const fingerprint = fingerprintRecord(record);
    const work = this.resolve(areaId, fingerprint, record);
    return signal ? raceAbort(work, signal) : work;
  }

  /**
   * Drop the entry for an area and disown any in-flight evaluation
   */
  invalidate(areaId: string): void {
    const pending = this.inFlight.get(areaId);
    if (pending) {
      pending.disowned = true;
    }
    this.entries.delete(areaId);
    this.log.debug('Invalidated lint entry', { areaId });
  }

  /**
   * Entry for an area without touching LRU order or metrics
   */
  peek(areaId: string): CacheEntry | undefined {
    return this.entries.get(areaId);
  }

  /**
   * Remove expired entries
   *
   * @returns Number of entries removed
   */
  prune(): number {
    const now = this.now();
    let removed = 0;

    for (const [areaId, entry] of this.entries) {
      if (this.isExpired(entry, now)) {
        this.entries.delete(areaId);
        removed++;
      }
    }

    this.evictions += removed;
    if (removed > 0) {
      this.log.debug('Pruned expired lint entries', { removed, size: this.entries.size });
    }
    return removed;
  }

  /**
   * Run prune() on an interval. The timer does not keep the process alive.
   */
  startSweeper(intervalMs: number): void {
    this.stopSweeper();
    if (intervalMs <= 0) {
      return;
    }
    this.sweeper = setInterval(() => {
      this.prune();
    }, intervalMs);
    this.sweeper.unref();
  }

  stopSweeper(): void {
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = null;
    }
  }

  /**
   * Drop every entry. In-flight evaluations finish but are not stored.
   */
  clear(): void {
    for (const pending of this.inFlight.values()) {
      pending.disowned = true;
    }
    this.entries.clear();
  }

  getStats(): LintCacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      joins: this.joins,
      evaluations: this.evaluations,
      faults: this.faults,
      evictions: this.evictions,
      size: this.entries.size,
      inFlight: this.inFlight.size,
    };
  }

  private async resolve(
    areaId: string,
    fingerprint: string,
    record: NormalizedRecord
  ): Promise<readonly LintIssue[]> {
    for (;;) {
      const pending = this.inFlight.get(areaId);
      if (pending) {
        if (
          pending.fingerprint === fingerprint &&
          pending.evaluationKey === this.currentKey() &&
          !pending.disowned
        ) {
          this.joins++;
          return pending.promise;
        }
        // Different content, a new day, or invalidated since it started
        await Promise.allSettled([pending.promise]);
        continue;
      }

      const cached = this.lookup(areaId, fingerprint);
      if (cached) {
        return cached;
      }

      return this.evaluate(areaId, fingerprint, record);
    }
  }

  private lookup(areaId: string, fingerprint: string): readonly LintIssue[] | null {
    const entry = this.entries.get(areaId);
    if (!entry) {
      return null;
    }

    const now = this.now();
    if (this.isExpired(entry, now)) {
      this.entries.delete(areaId);
      this.evictions++;
      return null;
    }

    if (entry.fingerprint !== fingerprint || entry.evaluationKey !== this.currentKey()) {
      return null;
    }

    // Re-insert to move to the most recently used end
    this.entries.delete(areaId);
    this.entries.set(areaId, { ...entry, lastAccessed: now });
    this.hits++;
    return entry.issues;
  }

  private evaluate(
    areaId: string,
    fingerprint: string,
    record: NormalizedRecord
  ): Promise<readonly LintIssue[]> {
    const version = this.evaluator.version;
    const evaluationKey = this.currentKey();
    this.misses++;

    const promise: Promise<readonly LintIssue[]> = Promise.resolve()
      .then(() => {
        this.evaluations++;
        return this.evaluator.evaluate(record);
      })
      .then((result) => {
        const issues: readonly LintIssue[] = Object.freeze([...result]);
        if (!flight.disowned) {
          this.store(areaId, { fingerprint, ruleSetVersion: version, evaluationKey, issues });
        }
        return issues;
      })
      .catch((error: unknown) => {
        this.faults++;
        this.log.error('Lint evaluation faulted', {
          areaId,
          ...(isLintRuleFaultError(error) && { ruleId: error.ruleId }),
          error: error instanceof Error ? error.message : String(error),
        });
        throw error;
      })
      .finally(() => {
        if (this.inFlight.get(areaId) === flight) {
          this.inFlight.delete(areaId);
        }
      });

    const flight: InFlightEvaluation = { fingerprint, evaluationKey, promise, disowned: false };
    this.inFlight.set(areaId, flight);
    return promise;
  }

  private store(
    areaId: string,
    result: Pick<CacheEntry, 'fingerprint' | 'ruleSetVersion' | 'evaluationKey' | 'issues'>
  ): void {
    const now = this.now();
    this.entries.delete(areaId);
    this.entries.set(areaId, { areaId, ...result, computedAt: now, lastAccessed: now });

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
      this.evictions++;
      this.log.debug('Evicted least recently used lint entry', { areaId: oldest.value });
    }
  }

  private isExpired(entry: CacheEntry, now: number): boolean {
    return now - entry.computedAt > this.ttlMs;
  }

  private currentKey(): string {
    return this.evaluator.evaluationKey?.() ?? this.evaluator.version;
  }
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error('Lint request aborted');
}

function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(abortReason(signal));
    signal.addEventListener('abort', onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
