export interface DomainValidationResult {
  isValid: boolean;
  normalizedDomain: string;
  originalDomain: string;
  validationErrors: string[];
}

export interface DomainParts {
  /** Everything before the last dot */
  name: string;
  /** The last label including its leading dot, or '' for single-label input */
  suffix: string;
}

/**
 * Reduce a domain or URL to its lowercase host: no scheme, credentials, path, query,
 * fragment or port.
 */
export function toHost(input: string): string {
  let host = input.trim().toLowerCase();
  host = host.replace(/^[a-z][a-z0-9+.-]*:\/\//, '');
  host = host.split(/[/?#]/)[0] ?? '';
  host = host.slice(host.lastIndexOf('@') + 1);
  host = host.split(':')[0] ?? '';
  return host.replace(/\.+$/, '');
}

/**
 * Split a domain into name and top-level suffix on the last dot. Malformed input
 * degrades to a best-effort split.
 */
export function splitDomain(input: string): DomainParts {
  const host = toHost(input);
  const lastDot = host.lastIndexOf('.');
  if (lastDot === -1) {
    return { name: host, suffix: '' };
  }
  return { name: host.slice(0, lastDot), suffix: host.slice(lastDot) };
}

const DOMAIN_REGEX = /^[a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?(\.[a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?)*\.[a-z]{2,63}$/;

export function normalizeDomain(input: string): DomainValidationResult {
  const originalDomain = input;
  const errors: string[] = [];

  // Strip scheme, path and port, then the www prefix
  const domain = toHost(input).replace(/^www\./, '');

  if (!domain) {
    errors.push('Domain cannot be empty');
  } else if (domain.length > 253) {
    errors.push('Domain exceeds maximum length (253 characters)');
  } else if (domain.includes('..')) {
    errors.push('Domain contains consecutive dots');
  } else if (!DOMAIN_REGEX.test(domain)) {
    errors.push('Invalid domain format');
  }

  return {
    isValid: errors.length === 0,
    normalizedDomain: domain,
    originalDomain,
    validationErrors: errors
  };
}
