/*
 * =============================================================================
 * MODULE: availabilityResolver.ts
 * =============================================================================
 * Decides whether one candidate is registered and, when it is, records where
 * it points.
 *
 *   1. whois lookup of the domain as generated
 *   2. IDNA encoding of the domain
 *   3. when step 1 proved nothing, a second lookup with the ASCII form
 *   4. registered only: forward DNS on the ASCII form, then reverse DNS for
 *      every address, merged into one deduplicated hostname list
 *
 * Every lookup failure resolves to "available" and every DNS failure to an
 * empty list. A broken whois path therefore reads the same as a free domain.
 * =============================================================================
 */

import { createModuleLogger } from '../core/logger.js';
import type { Candidate, RegistrationInfo } from '../core/types.js';
import { resolveAddresses, resolveHostnames, systemResolver, type HostResolver } from '../util/dnsResolver.js';
import { toAsciiDomain } from '../util/idna.js';
import { WhoisClient, type RegistrationLookupClient } from './whoisClient.js';
import { parseWhoisResponse } from './whoisParser.js';

const log = createModuleLogger('availabilityResolver');

export interface ResolverDeps {
  lookupClient: RegistrationLookupClient;
  parseRecord: (raw: string) => RegistrationInfo;
  hostResolver: HostResolver;
  toAscii: (domain: string) => string;
}

export function createDefaultResolverDeps(overrides: Partial<ResolverDeps> = {}): ResolverDeps {
  return {
    lookupClient: overrides.lookupClient ?? new WhoisClient(),
    parseRecord: overrides.parseRecord ?? parseWhoisResponse,
    hostResolver: overrides.hostResolver ?? systemResolver,
    toAscii: overrides.toAscii ?? toAsciiDomain,
  };
}

export type AvailabilityVerdict =
  | { available: true }
  | { available: false; registrationInfo: RegistrationInfo };

/**
 * One registration lookup. Request, fetch and parse failures all collapse
 * to `{ available: true }`.
 */
export async function checkRegistration(domain: string, deps: ResolverDeps): Promise<AvailabilityVerdict> {
  try {
    const raw = await deps.lookupClient.fetch(domain);
    return { available: false, registrationInfo: deps.parseRecord(raw) };
  } catch (err) {
    log.debug({ domain, err }, 'No conclusive registration record');
    return { available: true };
  }
}

function encodeAscii(domain: string, deps: ResolverDeps): string {
  try {
    return deps.toAscii(domain);
  } catch (err) {
    log.debug({ domain, err }, 'ASCII encoding failed');
    return '';
  }
}

/**
 * Resolve a candidate in place. Never rejects.
 */
export async function resolveCandidate(candidate: Candidate, deps: ResolverDeps): Promise<void> {
  let verdict = await checkRegistration(candidate.domain, deps);
  candidate.asciiForm = encodeAscii(candidate.domain, deps);

  // some registries only accept ASCII-encoded names
  if (verdict.available) {
    verdict = await checkRegistration(candidate.asciiForm, deps);
  }

  if (verdict.available) {
    candidate.available = true;
    candidate.resolved = true;
    return;
  }

  candidate.available = false;
  candidate.registrationInfo = verdict.registrationInfo;
  candidate.addresses = await resolveAddresses(candidate.asciiForm, deps.hostResolver);
  candidate.hostnames = await resolveHostnames(candidate.addresses, deps.hostResolver);
  candidate.resolved = true;

  log.debug(
    { domain: candidate.domain, ascii: candidate.asciiForm, addresses: candidate.addresses.length },
    'Candidate is registered'
  );
}
