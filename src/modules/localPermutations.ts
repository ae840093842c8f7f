/*
 * =============================================================================
 * MODULE: localPermutations.ts
 * =============================================================================
 * Rule-based lookalike generation without any registration check:
 *   • brand prefixes and suffixes, with and without a hyphen
 *   • login/secure subdomains of the target
 *   • the same name under alternate top-level suffixes
 *   • a few obvious login/secure compounds
 * Output is deterministic, deduplicated and capped.
 * =============================================================================
 */

import { CandidateDomain } from '../core/types.js';
import { splitDomain, toHost } from '../util/domainNormalizer.js';
import type { CandidateSource } from './candidateSource.js';

export const PREFIXES = ['my', 'secure', 'login', 'account', 'online', 'web', 'portal', 'support'] as const;

export const SUFFIXES = ['online', 'secure', 'login', 'support', 'app', 'portal', 'verify', 'help'] as const;

export const SUBDOMAINS = ['login', 'secure', 'account', 'auth', 'signin', 'verify'] as const;

export const ALT_SUFFIXES = ['.com', '.net', '.org', '.co', '.io', '.info', '.biz', '.online', '.site', '.app'] as const;

const FALLBACK_SUFFIX = '.com';

/**
 * Every rule's output in rule order, duplicates included.
 */
export function permute(domain: string): string[] {
  const { name, suffix: originalSuffix } = splitDomain(domain);
  if (!name) return [];

  const suffix = originalSuffix || FALLBACK_SUFFIX;
  const out: string[] = [];

  for (const prefix of PREFIXES) {
    out.push(`${prefix}${name}${suffix}`, `${prefix}-${name}${suffix}`);
  }
  for (const tail of SUFFIXES) {
    out.push(`${name}${tail}${suffix}`, `${name}-${tail}${suffix}`);
  }
  for (const sub of SUBDOMAINS) {
    out.push(`${sub}.${name}${suffix}`);
  }
  for (const alt of ALT_SUFFIXES) {
    if (alt !== suffix) out.push(`${name}${alt}`);
  }

  // Obvious login/secure compounds
  out.push(
    `${name}-login${suffix}`,
    `${name}-secure-login${suffix}`,
    `secure-${name}-login${suffix}`,
    `login-${name}-secure${suffix}`,
    `${name}-account-verify${suffix}`,
  );

  return out;
}

export class LocalPermutationSource implements CandidateSource {
  readonly strategy = 'local' as const;

  constructor(private readonly cap: number) {}

  async generate(target: string): Promise<CandidateDomain[]> {
    const self = toHost(target);
    const unique = new Set<string>();

    for (const candidate of permute(target)) {
      if (unique.size >= this.cap) break;
      if (candidate !== self) unique.add(candidate);
    }

    return [...unique].map(domain => ({ domain }));
  }
}
