/**
 * Console rendering of scan results
 */

import { Chalk, type ChalkInstance } from 'chalk';
import { isLive, type Candidate } from '../core/types.js';
import { ScanResults, type ReportFilter } from '../scan/scanResults.js';

export interface ConsoleReportOptions extends ReportFilter {
  /** Print registration details under registered entries */
  whois?: boolean;
  /** Force colours on or off; auto-detected when omitted */
  color?: boolean;
}

function painter(color: boolean | undefined): ChalkInstance {
  if (color === undefined) return new Chalk();
  return new Chalk({ level: color ? 1 : 0 });
}

/** Registrar shown for a record: its URL, else its name */
export function registrarLabel(candidate: Candidate): string {
  const registrar = candidate.registrationInfo?.registrar;
  return registrar?.referralUrl || registrar?.name || '';
}

function whoisFields(candidate: Candidate): string[] {
  const info = candidate.registrationInfo;
  if (!info) return [];

  const fields: string[] = [];
  if (info.registrar) {
    fields.push(`registrar=${registrarLabel(candidate)}`);
  }
  if (info.domain) {
    fields.push(`created=${info.domain.createdDate}`);
    fields.push(`updated=${info.domain.updatedDate}`);
    fields.push(`expires=${info.domain.expirationDate}`);
    fields.push(`ns=${info.domain.nameServers.join(',')}`);
  }
  return fields;
}

/**
 * Lines for one candidate; empty when the filter hides it.
 */
export function formatCandidate(candidate: Candidate, options: ConsoleReportOptions = {}): string[] {
  if (!ScanResults.isVisible(candidate, options)) return [];

  const c = painter(options.color);
  if (candidate.available) {
    return [`${candidate.domain} (${candidate.asciiForm}) : ${c.green('available')}`];
  }

  const mainFields: string[] = [];
  if (isLive(candidate)) {
    mainFields.push(`ips=${candidate.addresses.join(',')}`);
    if (candidate.hostnames.length > 0) {
      mainFields.push(`names=${candidate.hostnames.join(',')}`);
    }
  }

  let line = `${candidate.domain} (${candidate.asciiForm}) ${c.red('registered')}`;
  if (mainFields.length > 0) {
    line += ` : ${mainFields.join(' ')}`;
  }

  const lines = [line];
  if (options.whois) {
    lines.push(...whoisFields(candidate).map((field) => `  ${field}`));
  }
  return lines;
}

export function formatReport(results: ScanResults, options: ConsoleReportOptions = {}): string[] {
  return results.candidates.flatMap((candidate) => formatCandidate(candidate, options));
}

export function formatSummary(results: ScanResults): string {
  const { total, available, registered, live } = results.summary();
  return `${total} checked: ${available} available, ${registered} registered (${live} live)`;
}
