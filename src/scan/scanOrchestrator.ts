/**
 * Per-target scan pipeline:
 *   fetch canonical page → generate candidates → fetch and score each candidate
 *   → keep those at or above the threshold.
 */

import pLimit from 'p-limit';
import { ScanConfig } from '../config/scanConfig.js';
import { createModuleLogger } from '../core/logger.js';
import { CandidateDomain, FINDING_NOTE, Finding, TargetScanOutcome } from '../core/types.js';
import { CandidateSource } from '../modules/candidateSource.js';
import { FetchedPage, PageFetcher, fetchWithFallback } from '../net/httpClient.js';
import { toHost } from '../util/domainNormalizer.js';
import { similarity } from '../util/similarity.js';

const log = createModuleLogger('scanOrchestrator');

export interface ScanOrchestratorDeps {
  config: Pick<ScanConfig, 'threshold' | 'concurrency'>;
  source: CandidateSource;
  fetcher: PageFetcher;
  /** Seconds since the epoch */
  now?: () => number;
}

export interface ScanTargetOptions {
  /** Defaults to the configured threshold */
  threshold?: number;
  signal?: AbortSignal;
}

interface ScoredCandidate {
  candidate: CandidateDomain;
  page: FetchedPage;
  score: number;
  evaluatedAt: number;
}

const epochSeconds = () => Math.floor(Date.now() / 1000);

function roundScore(score: number): number {
  return Math.round(score * 1000) / 1000;
}

export class ScanOrchestrator {
  private readonly now: () => number;

  constructor(private readonly deps: ScanOrchestratorDeps) {
    this.now = deps.now ?? epochSeconds;
  }

  /**
   * Scan one target. Findings come back in candidate-generation order regardless of
   * the order in which fetches complete.
   */
  async scanTarget(rawTarget: string, options: ScanTargetOptions = {}): Promise<TargetScanOutcome> {
    const target = toHost(rawTarget);
    const threshold = options.threshold ?? this.deps.config.threshold;
    const signal = options.signal;
    const startTime = Date.now();

    const outcome = (
      status: TargetScanOutcome['status'],
      findings: Finding[] = [],
      candidatesChecked = 0
    ): TargetScanOutcome => ({ target, status, findings, candidatesChecked, durationMs: Date.now() - startTime });

    const canonical = await fetchWithFallback(this.deps.fetcher, target, signal);
    if (!canonical) {
      if (signal?.aborted) return outcome('cancelled');
      log.info({ target }, 'Canonical page unavailable, skipping candidates');
      return outcome('no_canonical');
    }

    const candidates = await this.deps.source.generate(target, signal);
    if (candidates.length === 0) {
      if (signal?.aborted) return outcome('cancelled');
      log.info({ target, strategy: this.deps.source.strategy }, 'No candidates generated');
      return outcome('no_candidates');
    }

    log.info({ target, candidates: candidates.length, strategy: this.deps.source.strategy }, 'Scoring candidates');

    const limit = pLimit(this.deps.config.concurrency);
    let checked = 0;
    const scored = await Promise.all(
      candidates.map(candidate =>
        limit(async (): Promise<ScoredCandidate | null> => {
          if (signal?.aborted) return null;
          checked++;
          const page = await fetchWithFallback(this.deps.fetcher, candidate.domain, signal);
          if (!page) return null;
          return { candidate, page, score: similarity(canonical.text, page.text), evaluatedAt: this.now() };
        })
      )
    );

    const findings: Finding[] = [];
    for (const result of scored) {
      if (!result || result.score < threshold) continue;
      findings.push(this.toFinding(target, result));
    }

    const status = signal?.aborted ? 'cancelled' : 'completed';
    log.info({ target, status, checked, findings: findings.length, durationMs: Date.now() - startTime }, 'Target scan finished');
    return outcome(status, findings, checked);
  }

  /**
   * Findings-only form of scanTarget.
   */
  async scan(target: string, threshold?: number, signal?: AbortSignal): Promise<Finding[]> {
    const { findings } = await this.scanTarget(target, { threshold, signal });
    return findings;
  }

  /**
   * Scan targets one after another. A target whose pipeline throws is reported as
   * failed and the remaining targets still run.
   */
  async scanTargets(
    targets: readonly string[],
    options: ScanTargetOptions & { onProgress?: (outcome: TargetScanOutcome, index: number) => void } = {}
  ): Promise<TargetScanOutcome[]> {
    const outcomes: TargetScanOutcome[] = [];

    for (const [index, target] of targets.entries()) {
      const startTime = Date.now();
      let result: TargetScanOutcome;
      try {
        result = await this.scanTarget(target, options);
      } catch (err) {
        log.error({ target, err }, 'Target scan failed');
        result = {
          target: toHost(target),
          status: 'failed',
          findings: [],
          candidatesChecked: 0,
          durationMs: Date.now() - startTime,
          error: err instanceof Error ? err.message : String(err),
        };
      }
      outcomes.push(result);
      options.onProgress?.(result, index);
    }

    return outcomes;
  }

  private toFinding(target: string, { candidate, page, score, evaluatedAt }: ScoredCandidate): Finding {
    return Object.freeze({
      timestamp: evaluatedAt,
      target,
      suspectDomain: candidate.domain,
      similarity: roundScore(score),
      url: page.url,
      ...(candidate.dns ? { dns: Object.freeze({ ...candidate.dns }) } : {}),
      notes: FINDING_NOTE,
    });
  }
}
