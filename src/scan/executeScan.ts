/**
 * Execute Scan - validates the target list, scans every target and records the findings
 */

import { nanoid } from 'nanoid';
import { ScanConfig } from '../config/scanConfig.js';
import { HistoryStore } from '../core/historyStore.js';
import { createScanLogger } from '../core/logger.js';
import { Finding, TargetScanOutcome } from '../core/types.js';
import { parseTargetList } from '../core/validation.js';
import { CandidateSource, CandidateSourceDeps, createCandidateSource } from '../modules/candidateSource.js';
import { HttpPageFetcher, PageFetcher } from '../net/httpClient.js';
import { ScanOrchestrator } from './scanOrchestrator.js';

export interface ScanRequest {
  /** Newline-separated text or a list of domains */
  domains: string | readonly string[];
  threshold?: number;
  signal?: AbortSignal;
}

export interface ScanResult {
  scanId: string;
  status: 'completed' | 'cancelled';
  targets: string[];
  /** Every finding across targets, in target then candidate order */
  findings: Finding[];
  outcomes: TargetScanOutcome[];
  duration: number;
}

export interface Scanner {
  config: ScanConfig;
  orchestrator: ScanOrchestrator;
  history: HistoryStore;
}

export interface ScannerDeps extends CandidateSourceDeps {
  fetcher?: PageFetcher;
  source?: CandidateSource;
  history?: HistoryStore;
  now?: () => number;
}

/**
 * Wire the configured candidate strategy, page fetcher and history store together.
 */
export function createScanner(config: ScanConfig, deps: ScannerDeps = {}): Scanner {
  const fetcher = deps.fetcher ?? new HttpPageFetcher({
    connectTimeoutMs: config.connectTimeoutMs,
    readTimeoutMs: config.readTimeoutMs,
    userAgent: config.userAgent,
  });
  const source = deps.source ?? createCandidateSource(config, { runner: deps.runner });

  return {
    config,
    orchestrator: new ScanOrchestrator({ config, source, fetcher, now: deps.now }),
    history: deps.history ?? new HistoryStore(config.historyFile),
  };
}

/**
 * Run a scan over every requested target and append the findings to history in one
 * append, so a scan's findings are persisted together or not at all.
 *
 * @throws ValidationError before scanning when the target list is empty or malformed
 * @throws StoreError when the findings cannot be persisted
 */
export async function executeScan(scanner: Scanner, request: ScanRequest): Promise<ScanResult> {
  const targets = parseTargetList(request.domains);
  const scanId = `scan-${nanoid()}`;
  const startTime = Date.now();
  const log = createScanLogger('executeScan', { scanId, strategy: scanner.config.strategy });

  log.info({ targets: targets.length }, 'Scan started');

  const outcomes = await scanner.orchestrator.scanTargets(targets, {
    threshold: request.threshold,
    signal: request.signal,
    onProgress: (outcome, index) => {
      log.info(
        { target: outcome.target, status: outcome.status, findings: outcome.findings.length },
        `Scanned ${index + 1}/${targets.length}`
      );
    },
  });

  const findings = outcomes.flatMap(outcome => outcome.findings);
  await scanner.history.append(findings);

  const status = request.signal?.aborted ? 'cancelled' : 'completed';
  const duration = Date.now() - startTime;
  log.info({ status, findings: findings.length, durationMs: duration }, 'Scan finished');

  return { scanId, status, targets, findings, outcomes, duration };
}
