/**
 * Maximum domain name length (RFC 1123)
 */
const MAX_DOMAIN_LENGTH = 253;

/**
 * Maximum label length (RFC 1123)
 */
const MAX_LABEL_LENGTH = 63;

// Letters, digits and hyphens, not starting or ending with a hyphen.
// Underscores are stripped before the check so _dmarc / _sip._tcp pass.
const LABEL_REGEX = /^[a-zA-Z0-9]([a-zA-Z0-9-]*[a-zA-Z0-9])?$/;

export type DomainValidation = { valid: true } | { valid: false; error: string };

/**
 * Validate a domain name for lookup. A single trailing dot (fully
 * qualified form) is accepted.
 */
export function validateDomain(domain: string): DomainValidation {
  const trimmed = domain.trim().replace(/\.$/, '');

  if (trimmed.length === 0) {
    return { valid: false, error: 'Domain cannot be empty' };
  }

  if (trimmed.length > MAX_DOMAIN_LENGTH) {
    return {
      valid: false,
      error: `Domain length (${trimmed.length}) exceeds maximum allowed length (${MAX_DOMAIN_LENGTH})`,
    };
  }

  if (/[\x00-\x1F\x7F]/.test(trimmed)) {
    return { valid: false, error: 'Domain cannot contain control characters' };
  }

  const labels = trimmed.split('.');
  if (labels.some((label) => label.length === 0)) {
    return { valid: false, error: 'Domain cannot have empty labels (consecutive or leading dots)' };
  }

  for (const label of labels) {
    if (label.length > MAX_LABEL_LENGTH) {
      return {
        valid: false,
        error: `Label "${label}" length (${label.length}) exceeds maximum allowed length (${MAX_LABEL_LENGTH})`,
      };
    }

    const stripped = label.replace(/_/g, '');
    if (stripped.length > 0 && !LABEL_REGEX.test(stripped)) {
      return {
        valid: false,
        error: `Label "${label}" contains invalid characters`,
      };
    }
  }

  return { valid: true };
}

/**
 * Canonical form used for lookups: trimmed, lower-case, no trailing dot.
 */
export function normalizeDomain(domain: string): string {
  return domain.trim().replace(/\.$/, '').toLowerCase();
}
