/**
 * Shared validation utilities for input sanitization
 * Used by the API layer and the scan runner before any target is scanned
 */

import { ErrorCode, ValidationError } from './errors.js';
import { normalizeDomain } from '../util/domainNormalizer.js';

/**
 * Maximum domain length per RFC 1035
 */
const MAX_DOMAIN_LENGTH = 253;

/**
 * Validate that a string is a legitimate domain name.
 * Targets end up as an argument to the oracle subprocess, so this stays strict.
 */
export function isValidDomain(domain: unknown): domain is string {
  if (!domain || typeof domain !== 'string') return false;
  if (domain.length > MAX_DOMAIN_LENGTH) return false;

  const result = normalizeDomain(domain);
  if (!result.isValid || result.normalizedDomain !== domain) return false;

  // Block common shell metacharacters that might slip through
  if (/[;&|`$(){}[\]<>\\!#*?~]/.test(domain)) return false;

  return true;
}

/**
 * Turn raw target input into a list of normalized domains.
 *
 * Accepts newline-separated text or an array of entries. Blank lines and lines starting
 * with `#` are ignored, duplicates are dropped.
 *
 * @throws ValidationError when nothing is left or any entry is not a domain
 */
export function parseTargetList(input: string | readonly string[]): string[] {
  const lines = typeof input === 'string' ? input.split(/\r?\n/) : input;
  const entries = lines
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#'));

  if (entries.length === 0) {
    throw new ValidationError(ErrorCode.VALIDATION_EMPTY_TARGETS, 'Please enter at least one domain');
  }

  const targets: string[] = [];
  const invalid: string[] = [];
  for (const entry of entries) {
    const result = normalizeDomain(entry);
    if (!result.isValid || !isValidDomain(result.normalizedDomain)) {
      invalid.push(entry.slice(0, 100));
      continue;
    }
    if (!targets.includes(result.normalizedDomain)) {
      targets.push(result.normalizedDomain);
    }
  }

  if (invalid.length > 0) {
    throw new ValidationError(ErrorCode.VALIDATION_INVALID_DOMAIN, 'Invalid domain format', { invalid });
  }

  return targets;
}

/**
 * Validate and bound a numeric parameter
 */
export function validateNumericParam(
  value: unknown,
  defaultValue: number,
  min: number,
  max: number
): number {
  const num = typeof value === 'string' && value.trim() === '' ? NaN : Number(value);
  if (value === undefined || value === null || isNaN(num)) return defaultValue;
  return Math.max(min, Math.min(max, num));
}
