/**
 * CSV export of scan results.
 *
 * RFC 4180 quoting: a field containing a comma, quote, CR or LF is wrapped in
 * quotes with inner quotes doubled. Rows end with "\n".
 */

import { writeFile } from 'node:fs/promises';
import { Errors } from '../core/errors.js';
import { createModuleLogger } from '../core/logger.js';
import type { Candidate } from '../core/types.js';
import type { ScanResults } from '../scan/scanResults.js';
import { registrarLabel } from './consoleReport.js';

const log = createModuleLogger('csvExport');

export const BASE_COLUMNS = ['unicode', 'ascii', 'status', 'ips', 'names'] as const;
export const WHOIS_COLUMNS = ['registrar', 'created_at', 'updated_at', 'expires_at', 'nameservers'] as const;

export interface CsvExportOptions {
  /** Append the registration columns */
  whois?: boolean;
}

export function csvHeader(options: CsvExportOptions = {}): string[] {
  return options.whois ? [...BASE_COLUMNS, ...WHOIS_COLUMNS] : [...BASE_COLUMNS];
}

export function candidateToRow(candidate: Candidate, options: CsvExportOptions = {}): string[] {
  const row = [
    candidate.domain,
    candidate.asciiForm,
    candidate.available ? 'available' : 'registered',
    candidate.addresses.join(','),
    candidate.hostnames.join(','),
  ];

  if (options.whois) {
    const info = candidate.registrationInfo;
    row.push(info?.registrar ? registrarLabel(candidate) : '');
    if (info?.domain) {
      row.push(
        info.domain.createdDate,
        info.domain.updatedDate,
        info.domain.expirationDate,
        info.domain.nameServers.join(',')
      );
    } else {
      row.push('', '', '', '');
    }
  }

  return row;
}

function escapeField(field: string): string {
  return /[",\r\n]/.test(field) ? `"${field.replace(/"/g, '""')}"` : field;
}

export function formatCsv(rows: readonly (readonly string[])[]): string {
  return rows.map((row) => row.map(escapeField).join(',') + '\n').join('');
}

/**
 * Parse CSV text produced by formatCsv (or any RFC 4180 file).
 */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += ch;
      }
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
    } else if (ch === ',') {
      row.push(field);
      field = '';
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && text[i + 1] === '\n') i++;
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
    } else {
      field += ch;
    }
  }

  // last line without a terminator
  if (field !== '' || row.length > 0) {
    row.push(field);
    rows.push(row);
  }

  return rows;
}

export function buildCsv(results: ScanResults, options: CsvExportOptions = {}): string {
  const rows = [csvHeader(options), ...results.candidates.map((c) => candidateToRow(c, options))];
  return formatCsv(rows);
}

/**
 * Write every candidate, regardless of console filters, to `path`.
 * Throws OUTPUT_WRITE_FAILED when the file cannot be written.
 */
export async function writeCsvReport(path: string, results: ScanResults, options: CsvExportOptions = {}): Promise<void> {
  try {
    await writeFile(path, buildCsv(results, options), 'utf8');
  } catch (err) {
    throw Errors.outputWriteFailed(path, err);
  }
  log.info({ path, rows: results.size }, 'CSV report written');
}
