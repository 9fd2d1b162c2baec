/**
 * Parser for plain-text whois responses.
 *
 * Registries disagree on field names, so each field of interest has a list
 * of known aliases. The first occurrence of a scalar field wins; the registry
 * section precedes the registrar section when referrals are followed.
 */

import { Errors } from '../core/errors.js';
import type { DomainRegistration, RegistrationInfo } from '../core/types.js';

type FieldName = 'domainName' | 'registrarName' | 'referralUrl' | 'createdDate' | 'updatedDate' | 'expirationDate' | 'nameServers';

const FIELD_ALIASES: ReadonlyArray<[FieldName, readonly string[]]> = [
  ['domainName', ['domain name', 'domain', 'domain_name']],
  ['registrarName', ['registrar', 'registrar name', 'sponsoring registrar']],
  ['referralUrl', ['registrar url', 'referral url', 'registrar website']],
  ['createdDate', ['creation date', 'created', 'created on', 'created date', 'registered on', 'registration time']],
  ['updatedDate', ['updated date', 'last updated', 'last-update', 'last modified', 'changed', 'modified']],
  [
    'expirationDate',
    [
      'registry expiry date',
      'registrar registration expiration date',
      'expiration date',
      'expiry date',
      'expire date',
      'expires',
      'expires on',
      'paid-till',
    ],
  ],
  ['nameServers', ['name server', 'name servers', 'nameserver', 'nameservers', 'nserver']],
];

const ALIAS_LOOKUP: ReadonlyMap<string, FieldName> = new Map(
  FIELD_ALIASES.flatMap(([field, aliases]) => aliases.map((alias): [string, FieldName] => [alias, field]))
);

// Keys that only mean something inside another field's block
const BLOCK_ALIASES = new Map<FieldName, ReadonlyMap<string, FieldName>>([
  ['registrarName', new Map<string, FieldName>([['url', 'referralUrl']])],
]);

// Registry answers for a name nobody holds. Anchored to the start of a line,
// after any comment marker, so legal notices in real records do not match.
const NOT_FOUND_PATTERNS: readonly RegExp[] = [
  /^no match\b/i,
  /^not found\b/i,
  /^no data found/i,
  /^no entries found/i,
  /^no object found/i,
  /^nothing found/i,
  /^domain (name )?not found/i,
  /^the queried object does not exist/i,
  /^this domain name has not been registered/i,
  /^status:\s*(free|available)\b/i,
];

function reportsNotFound(text: string): boolean {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim().replace(/^(%|#|>>>)\s*/, ''))
    .some((line) => NOT_FOUND_PATTERNS.some((pattern) => pattern.test(line)));
}

function isComment(line: string): boolean {
  return line.startsWith('%') || line.startsWith('#') || line.startsWith('>>>');
}

/**
 * Collect every `key: value` pair whose key is a known alias.
 * Indented lines without a colon continue the previous key (".uk" style blocks).
 */
function collectFields(text: string): Map<FieldName, string[]> {
  const fields = new Map<FieldName, string[]>();
  let pending: FieldName | undefined;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || isComment(line)) {
      pending = undefined;
      continue;
    }

    const colon = line.indexOf(':');
    if (colon === -1) {
      if (pending && /^\s/.test(rawLine)) {
        fields.get(pending)?.push(line);
      }
      continue;
    }

    const key = line.slice(0, colon).trim().toLowerCase();
    const value = line.slice(colon + 1).trim();
    const blockField = pending && /^\s/.test(rawLine) ? BLOCK_ALIASES.get(pending)?.get(key) : undefined;
    if (blockField) {
      // stays inside the enclosing block
      if (value) fields.set(blockField, [...(fields.get(blockField) ?? []), value]);
      continue;
    }

    const field = ALIAS_LOOKUP.get(key);
    pending = field;
    if (!field) continue;

    const values = fields.get(field) ?? [];
    if (value) values.push(value);
    fields.set(field, values);
  }

  return fields;
}

function first(fields: Map<FieldName, string[]>, field: FieldName): string | undefined {
  return fields.get(field)?.[0];
}

function normalizeNameServers(values: string[]): string[] {
  const seen = new Set<string>();
  for (const value of values) {
    // some registries append the glue address after the host
    const host = value.split(/\s+/)[0].toLowerCase().replace(/\.$/, '');
    if (host) seen.add(host);
  }
  return [...seen];
}

/**
 * Parse a raw whois response into a registration record.
 * Throws LOOKUP_NOT_FOUND for "no such domain" answers, even when they echo the
 * domain name, and LOOKUP_PARSE_FAILED when nothing beyond the name is present.
 */
export function parseWhoisResponse(raw: string): RegistrationInfo {
  if (!raw || !raw.trim()) {
    throw Errors.lookupParseFailed('empty response');
  }

  // registries often echo the queried name above their "not found" line
  if (reportsNotFound(raw)) {
    throw Errors.lookupNotFound();
  }

  const fields = collectFields(raw);
  const hasRegistrationField = [...fields].some(
    ([field, values]) => field !== 'domainName' && values.length > 0
  );

  // a bare domain name proves nothing about registration
  if (!hasRegistrationField) {
    throw Errors.lookupParseFailed('no registration fields');
  }

  const info: RegistrationInfo = {};

  const domainName = first(fields, 'domainName');
  if (domainName) {
    info.domainName = domainName.toLowerCase();
  }

  const registrarName = first(fields, 'registrarName');
  const referralUrl = first(fields, 'referralUrl');
  if (registrarName || referralUrl) {
    info.registrar = { name: registrarName, referralUrl };
  }

  const nameServers = normalizeNameServers(fields.get('nameServers') ?? []);
  const createdDate = first(fields, 'createdDate') ?? '';
  const updatedDate = first(fields, 'updatedDate') ?? '';
  const expirationDate = first(fields, 'expirationDate') ?? '';
  if (createdDate || updatedDate || expirationDate || nameServers.length > 0) {
    const domain: DomainRegistration = { createdDate, updatedDate, expirationDate, nameServers };
    info.domain = domain;
  }

  return info;
}
