/**
 * Centralized environment configuration for the lookalike scanner
 *
 * All environment variables should be accessed through this module to ensure:
 * - Type safety with proper parsing
 * - Sensible defaults
 * - Documentation of available configuration
 * - Single source of truth
 */

import { config } from 'dotenv';
import {
  CANDIDATE_CAP_MAX,
  CONCURRENCY_MAX,
  DEFAULT_SCAN_CONFIG,
  ScanConfig,
  THRESHOLD_MAX,
  THRESHOLD_MIN,
  createScanConfig,
} from '../config/scanConfig.js';
import { isCandidateStrategy } from './types.js';
import { validateNumericParam } from './validation.js';

config();

// =============================================================================
// Helper Functions
// =============================================================================

function parseIntEnv(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function parseStringEnv(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}

// =============================================================================
// Runtime Environment
// =============================================================================

export const env = {
  /** Current environment: 'production' | 'development' | 'test' */
  NODE_ENV: parseStringEnv('NODE_ENV', 'development'),
  /** Log level: 'debug' | 'info' | 'warn' | 'error' */
  LOG_LEVEL: parseStringEnv('LOG_LEVEL', 'info').toLowerCase(),
} as const;

// =============================================================================
// Server Configuration
// =============================================================================

export const server = {
  /** HTTP port for the scan API */
  PORT: parseIntEnv('PORT', 8080),
  /** Bind address */
  HOST: parseStringEnv('HOST', '127.0.0.1'),
  /** API key required in x-api-key; unset leaves the API open (dev only) */
  SCANNER_API_KEY: process.env.SCANNER_API_KEY,
  /** Scan requests allowed per window per client */
  RATE_LIMIT_MAX_REQUESTS: parseIntEnv('RATE_LIMIT_MAX_REQUESTS', 10),
  RATE_LIMIT_WINDOW_MS: parseIntEnv('RATE_LIMIT_WINDOW_MS', 3_600_000),
} as const;

// =============================================================================
// Scan Configuration
// =============================================================================

/**
 * Build the scan configuration from the environment. Numeric values outside their bounds
 * are clamped rather than rejected; an unknown strategy falls back to the default.
 */
export function loadScanConfig(source: NodeJS.ProcessEnv = process.env): ScanConfig {
  const strategy = source.SCAN_STRATEGY?.trim().toLowerCase();

  return createScanConfig({
    threshold: validateNumericParam(source.SIMILARITY_THRESHOLD, DEFAULT_SCAN_CONFIG.threshold, THRESHOLD_MIN, THRESHOLD_MAX),
    candidateCap: Math.floor(validateNumericParam(source.CANDIDATE_CAP, DEFAULT_SCAN_CONFIG.candidateCap, 1, CANDIDATE_CAP_MAX)),
    strategy: isCandidateStrategy(strategy) ? strategy : DEFAULT_SCAN_CONFIG.strategy,
    concurrency: Math.floor(validateNumericParam(source.SCAN_CONCURRENCY, DEFAULT_SCAN_CONFIG.concurrency, 1, CONCURRENCY_MAX)),
    connectTimeoutMs: Math.floor(validateNumericParam(source.FETCH_CONNECT_TIMEOUT_MS, DEFAULT_SCAN_CONFIG.connectTimeoutMs, 100, 300_000)),
    readTimeoutMs: Math.floor(validateNumericParam(source.FETCH_READ_TIMEOUT_MS, DEFAULT_SCAN_CONFIG.readTimeoutMs, 100, 300_000)),
    oracleTimeoutMs: Math.floor(validateNumericParam(source.ORACLE_TIMEOUT_MS, DEFAULT_SCAN_CONFIG.oracleTimeoutMs, 100, 300_000)),
    oracleCommand: source.ORACLE_COMMAND?.trim() || DEFAULT_SCAN_CONFIG.oracleCommand,
    userAgent: source.SCANNER_USER_AGENT?.trim() || DEFAULT_SCAN_CONFIG.userAgent,
    historyFile: source.HISTORY_FILE?.trim() || DEFAULT_SCAN_CONFIG.historyFile,
  });
}
