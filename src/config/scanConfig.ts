/**
 * Scan configuration passed explicitly into the orchestrator and its collaborators
 */

import { z } from 'zod';
import { ErrorCode, ValidationError } from '../core/errors.js';
import { CANDIDATE_STRATEGIES, CandidateStrategy } from '../core/types.js';

export const THRESHOLD_MIN = 0.4;
export const THRESHOLD_MAX = 0.95;
export const CANDIDATE_CAP_MAX = 500;
export const CONCURRENCY_MAX = 32;

export const DEFAULT_USER_AGENT = 'LookalikeScanner/1.0 (+domain-monitor)';

export interface ScanConfig {
  /** Minimum similarity for a candidate to become a Finding */
  threshold: number;
  /** Maximum candidates evaluated per target */
  candidateCap: number;
  strategy: CandidateStrategy;
  /** Concurrent candidate fetches per target */
  concurrency: number;
  connectTimeoutMs: number;
  readTimeoutMs: number;
  oracleTimeoutMs: number;
  oracleCommand: string;
  userAgent: string;
  historyFile: string;
}

export const DEFAULT_SCAN_CONFIG: Readonly<ScanConfig> = Object.freeze({
  threshold: 0.6,
  candidateCap: 50,
  strategy: 'local',
  concurrency: 5,
  connectTimeoutMs: 5_000,
  readTimeoutMs: 10_000,
  oracleTimeoutMs: 30_000,
  oracleCommand: 'dnstwist',
  userAgent: DEFAULT_USER_AGENT,
  historyFile: './data/history.csv',
});

const timeoutMs = z.number().int().min(100).max(300_000);

export const scanConfigSchema = z.object({
  threshold: z.number().min(THRESHOLD_MIN).max(THRESHOLD_MAX),
  candidateCap: z.number().int().min(1).max(CANDIDATE_CAP_MAX),
  strategy: z.enum(CANDIDATE_STRATEGIES),
  concurrency: z.number().int().min(1).max(CONCURRENCY_MAX),
  connectTimeoutMs: timeoutMs,
  readTimeoutMs: timeoutMs,
  oracleTimeoutMs: timeoutMs,
  oracleCommand: z.string().min(1),
  userAgent: z.string().min(1),
  historyFile: z.string().min(1),
});

/**
 * Merge overrides onto the defaults and validate the result.
 *
 * @throws ValidationError naming every offending field
 */
export function createScanConfig(
  overrides: Partial<ScanConfig> = {},
  base: Readonly<ScanConfig> = DEFAULT_SCAN_CONFIG
): ScanConfig {
  const parsed = scanConfigSchema.safeParse({ ...base, ...overrides });
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => ({
      field: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ValidationError(
      ErrorCode.VALIDATION_INVALID_OPTION,
      `Invalid scan configuration: ${issues.map(i => i.field).join(', ')}`,
      { issues }
    );
  }
  return parsed.data;
}
