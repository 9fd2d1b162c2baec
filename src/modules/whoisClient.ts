/**
 * Registration lookup over the whois protocol
 */

import whois, { type WhoisOptions } from 'whois';
import { Errors } from '../core/errors.js';
import { whois as whoisConfig } from '../core/env.js';
import { createModuleLogger } from '../core/logger.js';

const log = createModuleLogger('whoisClient');

const MAX_DOMAIN_LENGTH = 253;

/**
 * Fetches the raw registration record for a domain, or rejects.
 */
export interface RegistrationLookupClient {
  fetch(domain: string): Promise<string>;
}

export interface WhoisClientOptions {
  /** Socket timeout in ms; 0 leaves the query unbounded */
  timeoutMs?: number;
  /** Registrar referrals to follow */
  follow?: number;
}

/**
 * Build the options for one query.
 * Throws LOOKUP_REQUEST_INVALID when the domain cannot be sent as a query line.
 */
export function buildWhoisRequest(domain: string, options: WhoisClientOptions = {}): WhoisOptions {
  if (!domain || domain.length > MAX_DOMAIN_LENGTH || /[\s\p{Cc}]/u.test(domain)) {
    throw Errors.lookupRequestInvalid(domain);
  }

  const request: WhoisOptions = { follow: options.follow ?? whoisConfig.FOLLOW };
  const timeoutMs = options.timeoutMs ?? whoisConfig.TIMEOUT_MS;
  if (timeoutMs > 0) {
    request.timeout = timeoutMs;
  }
  return request;
}

export class WhoisClient implements RegistrationLookupClient {
  constructor(private readonly options: WhoisClientOptions = {}) {}

  async fetch(domain: string): Promise<string> {
    const request = buildWhoisRequest(domain, this.options);

    return new Promise<string>((resolve, reject) => {
      whois.lookup(domain, request, (err, data) => {
        if (err) {
          log.debug({ domain, err }, 'Whois query failed');
          reject(Errors.lookupFailed(domain, err));
          return;
        }
        resolve(data);
      });
    });
  }
}
