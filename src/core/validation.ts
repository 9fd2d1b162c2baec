/**
 * Target parsing for operator input
 */

import { parse } from 'tldts';
import { Errors } from './errors.js';
import type { ScanTarget } from './types.js';

/**
 * Turn operator input into a URL the public-suffix parser accepts.
 * Bare domains get an https:// prefix.
 */
export function toTargetUrl(rawInput: string): string {
  const trimmed = rawInput.trim();
  return trimmed.includes('://') ? trimmed : `https://${trimmed}`;
}

/**
 * Split a domain name or URL into its registrable label and public suffix.
 * Subdomains are dropped: `www.ice.gov` becomes `{ label: 'ice', suffix: 'gov' }`.
 * Throws VALIDATION_INVALID_DOMAIN when there is no registrable domain.
 */
export function parseTarget(rawInput: string): ScanTarget {
  if (!rawInput || !rawInput.trim()) {
    throw Errors.invalidDomain(rawInput);
  }

  const parsed = parse(toTargetUrl(rawInput).toLowerCase());
  if (parsed.isIp || !parsed.domainWithoutSuffix || !parsed.publicSuffix) {
    throw Errors.invalidDomain(rawInput);
  }

  return {
    label: parsed.domainWithoutSuffix.toLowerCase(),
    suffix: parsed.publicSuffix.toLowerCase(),
  };
}

export function formatTarget(target: ScanTarget): string {
  return `${target.label}.${target.suffix}`;
}
