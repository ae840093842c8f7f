/**
 * Shared type definitions used across the scanner
 */

// =============================================================================
// Candidates
// =============================================================================

/**
 * DNS metadata reported by the registration oracle for a candidate domain
 */
export interface DnsRecords {
  a: string[];
  ns: string[];
  mx: string[];
}

/**
 * A lookalike domain to evaluate against the target. `dns` is only present when the
 * candidate came from the registration oracle.
 */
export interface CandidateDomain {
  domain: string;
  dns?: DnsRecords;
}

export const CANDIDATE_STRATEGIES = ['local', 'oracle'] as const;

export type CandidateStrategy = (typeof CANDIDATE_STRATEGIES)[number];

export function isCandidateStrategy(value: unknown): value is CandidateStrategy {
  return CANDIDATE_STRATEGIES.some(strategy => strategy === value);
}

// =============================================================================
// Findings
// =============================================================================

export const FINDING_NOTE = 'HTML-similar (simple text ratio)';

/**
 * A candidate whose page text met the similarity threshold. Timestamps are seconds since
 * the epoch. Findings are frozen when created.
 */
export interface Finding {
  readonly timestamp: number;
  readonly target: string;
  readonly suspectDomain: string;
  readonly similarity: number;
  readonly url: string;
  readonly dns?: Readonly<DnsRecords>;
  readonly notes: string;
}

/**
 * Persisted copy of a Finding
 */
export type HistoryRecord = Finding;

// =============================================================================
// Scan status
// =============================================================================

/**
 * Terminal state of one target's scan
 */
export type TargetScanStatus = 'completed' | 'no_canonical' | 'no_candidates' | 'cancelled' | 'failed';

export interface TargetScanOutcome {
  target: string;
  status: TargetScanStatus;
  findings: Finding[];
  candidatesChecked: number;
  durationMs: number;
  error?: string;
}
