/*
 * =============================================================================
 * MODULE: dnsTwist.ts
 * =============================================================================
 * Registration-aware candidate source backed by `dnstwist`.
 *   • Runs `dnstwist --registered --format json <domain>` with a bounded timeout.
 *   • Keeps records flagged `registered: true`, with their A/NS/MX records.
 *   • Excludes the submitted (legitimate) domain itself, deduplicates, caps.
 *   • Missing binary, timeout, non-zero exit or malformed output all yield no
 *     candidates; the failure is logged and the scan carries on.
 * =============================================================================
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { z } from 'zod';
import { createModuleLogger } from '../core/logger.js';
import { CandidateDomain } from '../core/types.js';
import { toHost } from '../util/domainNormalizer.js';
import type { CandidateSource } from './candidateSource.js';

const log = createModuleLogger('dnsTwist');

// -----------------------------------------------------------------------------
// Promisified helpers
// -----------------------------------------------------------------------------
const exec = promisify(execFile);

export interface CommandOptions {
  timeout: number;
  maxBuffer: number;
  signal?: AbortSignal;
}

/** Runs a command without a shell and resolves with its stdout. */
export type CommandRunner = (file: string, args: string[], options: CommandOptions) => Promise<{ stdout: string }>;

const defaultRunner: CommandRunner = async (file, args, options) => {
  const { stdout } = await exec(file, args, { ...options, encoding: 'utf8' });
  return { stdout };
};

// -----------------------------------------------------------------------------
// Tuning constants
// -----------------------------------------------------------------------------
const MAX_OUTPUT_BYTES = 32 * 1024 * 1024;

// -----------------------------------------------------------------------------
// Output schema
// -----------------------------------------------------------------------------
const recordList = z.array(z.string()).nullish().transform(v => v ?? []);

export const oracleRecordSchema = z.object({
  domain: z.string().min(1),
  registered: z.boolean().optional(),
  dns_a: recordList,
  dns_ns: recordList,
  dns_mx: recordList,
});

export const oracleOutputSchema = z.array(oracleRecordSchema);

export type OracleRecord = z.infer<typeof oracleRecordSchema>;

export type OracleFailure = 'missing_binary' | 'timeout' | 'exit_code' | 'malformed_output' | 'aborted';

export function classifyFailure(err: unknown): OracleFailure {
  if (!(err instanceof Error)) return 'exit_code';
  if (err.name === 'AbortError') return 'aborted';
  const code = 'code' in err ? err.code : undefined;
  const killed = 'killed' in err ? err.killed : undefined;
  if (code === 'ENOENT') return 'missing_binary';
  // execFile kills the child with SIGTERM once its timeout elapses
  if (code === 'ETIMEDOUT' || killed === true) return 'timeout';
  return 'exit_code';
}

/**
 * Registered candidates from raw oracle output. Returns null when the output does not
 * match the expected shape.
 */
export function parseOracleOutput(stdout: string, target: string, cap: number): CandidateDomain[] | null {
  let json: unknown;
  try {
    json = JSON.parse(stdout);
  } catch {
    return null;
  }

  const parsed = oracleOutputSchema.safeParse(json);
  if (!parsed.success) return null;

  const self = toHost(target);
  const seen = new Set<string>();
  const candidates: CandidateDomain[] = [];

  for (const record of parsed.data) {
    if (candidates.length >= cap) break;
    if (record.registered !== true) continue;

    const domain = toHost(record.domain);
    if (!domain || domain === self || seen.has(domain)) continue;
    seen.add(domain);

    candidates.push({
      domain,
      dns: { a: record.dns_a, ns: record.dns_ns, mx: record.dns_mx },
    });
  }

  return candidates;
}

export interface RegistrationOracleOptions {
  timeoutMs: number;
  cap: number;
  command?: string;
  runner?: CommandRunner;
}

export class RegistrationOracleSource implements CandidateSource {
  readonly strategy = 'oracle' as const;
  private readonly command: string;
  private readonly runner: CommandRunner;

  constructor(private readonly options: RegistrationOracleOptions) {
    this.command = options.command ?? 'dnstwist';
    this.runner = options.runner ?? defaultRunner;
  }

  async generate(target: string, signal?: AbortSignal): Promise<CandidateDomain[]> {
    const domain = toHost(target);
    const startTime = Date.now();

    let stdout: string;
    try {
      ({ stdout } = await this.runner(this.command, ['--registered', '--format', 'json', domain], {
        timeout: this.options.timeoutMs,
        maxBuffer: MAX_OUTPUT_BYTES,
        signal,
      }));
    } catch (err) {
      const failure = classifyFailure(err);
      log.warn({ domain, failure, command: this.command, err }, 'Registration oracle failed, no candidates');
      return [];
    }

    const candidates = parseOracleOutput(stdout, domain, this.options.cap);
    if (candidates === null) {
      log.warn({ domain, failure: 'malformed_output' satisfies OracleFailure }, 'Registration oracle output malformed, no candidates');
      return [];
    }

    log.info({ domain, candidates: candidates.length, durationMs: Date.now() - startTime }, 'Registration oracle finished');
    return candidates;
  }
}
