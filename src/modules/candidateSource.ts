import { ScanConfig } from '../config/scanConfig.js';
import { CandidateDomain, CandidateStrategy } from '../core/types.js';
import { CommandRunner, RegistrationOracleSource } from './dnsTwist.js';
import { LocalPermutationSource } from './localPermutations.js';

/**
 * Produces lookalike candidates for a target. Results are ordered, deduplicated, never
 * contain the target itself and stay within the configured cap. Implementations resolve
 * an empty list instead of rejecting when they cannot produce candidates.
 */
export interface CandidateSource {
  readonly strategy: CandidateStrategy;
  generate(target: string, signal?: AbortSignal): Promise<CandidateDomain[]>;
}

export interface CandidateSourceDeps {
  /** Subprocess runner for the oracle strategy */
  runner?: CommandRunner;
}

export function createCandidateSource(
  config: Pick<ScanConfig, 'strategy' | 'candidateCap' | 'oracleTimeoutMs' | 'oracleCommand'>,
  deps: CandidateSourceDeps = {}
): CandidateSource {
  switch (config.strategy) {
    case 'oracle':
      return new RegistrationOracleSource({
        timeoutMs: config.oracleTimeoutMs,
        cap: config.candidateCap,
        command: config.oracleCommand,
        runner: deps.runner,
      });
    case 'local':
      return new LocalPermutationSource(config.candidateCap);
  }
}
