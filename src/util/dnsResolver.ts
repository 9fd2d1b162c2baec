/**
 * DNS Resolver Utility
 *
 * Forward and reverse lookups for registered candidates. Both directions are
 * best effort: a failed query yields an empty list, never an exception.
 */

import { promises as dns } from 'node:dns';
import { createModuleLogger } from '../core/logger.js';

const log = createModuleLogger('dnsResolver');

/**
 * Raw lookups; implementations may reject on failure.
 */
export interface HostResolver {
  /** Hostname -> addresses, IPv4 and IPv6 */
  lookupHost(hostname: string): Promise<string[]>;
  /** Address -> PTR names */
  reverse(address: string): Promise<string[]>;
}

/**
 * Resolver backed by the operating system (getaddrinfo) and PTR queries
 */
export const systemResolver: HostResolver = {
  async lookupHost(hostname: string): Promise<string[]> {
    const results = await dns.lookup(hostname, { all: true });
    return results.map((r) => r.address);
  },
  async reverse(address: string): Promise<string[]> {
    return dns.reverse(address);
  },
};

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

function logLookupFailure(message: string, target: string, err: unknown): void {
  const code = errorCode(err);
  // ENOTFOUND/ENODATA are expected for names without records
  if (code === 'ENOTFOUND' || code === 'ENODATA') {
    log.debug({ target, code }, message);
  } else {
    log.debug({ target, err }, message);
  }
}

/**
 * Forward lookup; deduplicated addresses in resolver order, empty on failure.
 */
export async function resolveAddresses(hostname: string, resolver: HostResolver = systemResolver): Promise<string[]> {
  if (!hostname) return [];

  try {
    const addresses = await resolver.lookupHost(hostname);
    return Array.from(new Set(addresses));
  } catch (err) {
    logLookupFailure('Forward lookup failed', hostname, err);
    return [];
  }
}

/**
 * Reverse lookup for every address, merged into one deduplicated list.
 * Names keep the order in which they were first seen.
 */
export async function resolveHostnames(addresses: readonly string[], resolver: HostResolver = systemResolver): Promise<string[]> {
  const names = new Set<string>();

  for (const address of addresses) {
    try {
      for (const name of await resolver.reverse(address)) {
        names.add(name);
      }
    } catch (err) {
      logLookupFailure('Reverse lookup failed', address, err);
    }
  }

  return Array.from(names);
}
