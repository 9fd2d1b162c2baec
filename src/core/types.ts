/**
 * Shared data model for the look-alike scan pipeline
 */

/** Registrar section of a parsed whois record */
export interface RegistrarInfo {
  name?: string;
  /** Registrar URL as published in the whois record */
  referralUrl?: string;
}

/** Domain section of a parsed whois record; absent dates are empty strings */
export interface DomainRegistration {
  createdDate: string;
  updatedDate: string;
  expirationDate: string;
  nameServers: string[];
}

export interface RegistrationInfo {
  domainName?: string;
  registrar?: RegistrarInfo;
  domain?: DomainRegistration;
}

/**
 * One generated look-alike domain.
 *
 * Created by the permutation generator with only `domain` set, written once
 * by the availability resolver, read-only afterwards.
 */
export interface Candidate {
  readonly domain: string;
  asciiForm: string;
  /** true when no registration could be proven */
  available: boolean;
  /** Set by the resolver once every other field is final */
  resolved: boolean;
  registrationInfo?: RegistrationInfo;
  addresses: string[];
  hostnames: string[];
}

/** Base domain split into its registrable label and public suffix */
export interface ScanTarget {
  label: string;
  suffix: string;
}

export type SubstitutionDictionary = ReadonlyMap<string, readonly string[]>;

export interface ProgressEvent {
  completed: number;
  total: number;
}

export function createCandidate(domain: string): Candidate {
  return {
    domain,
    asciiForm: '',
    available: false,
    resolved: false,
    addresses: [],
    hostnames: [],
  };
}

/** Registered and resolving to at least one address */
export function isLive(candidate: Candidate): boolean {
  return !candidate.available && candidate.addresses.length > 0;
}
