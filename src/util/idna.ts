import punycode from 'punycode/';
import { createModuleLogger } from '../core/logger.js';

const log = createModuleLogger('idna');

/**
 * Domain -> ASCII-compatible encoding, label by label.
 * Best effort: returns an empty string when the name cannot be encoded.
 */
export function toAsciiDomain(domain: string): string {
  try {
    const ascii = punycode.toASCII(domain.normalize('NFC').toLowerCase());
    // labels are capped at 63 octets once encoded
    if (!ascii || ascii.split('.').some((label) => label.length === 0 || label.length > 63)) {
      log.debug({ domain, ascii }, 'Encoded name is not a valid hostname');
      return '';
    }
    return ascii;
  } catch (err) {
    log.debug({ domain, err }, 'IDNA encoding failed');
    return '';
  }
}
