import { describe, it, expect, vi, beforeEach } from 'vitest';
import whois, { type WhoisCallback, type WhoisOptions } from 'whois';
import { WhoisClient, buildWhoisRequest } from '../src/modules/whoisClient.js';
import { ErrorCode } from '../src/core/errors.js';
import { captureError } from './helpers/fakes.js';

vi.mock('whois', () => ({
  default: { lookup: vi.fn() },
}));

const lookup = vi.mocked(whois.lookup);

describe('buildWhoisRequest', () => {
  it('rejects names that cannot be sent as a query line', () => {
    for (const domain of ['', 'two words.com', 'tab\t.com', 'line\r\nbreak.com', `${'a'.repeat(250)}.com`]) {
      expect(captureError(() => buildWhoisRequest(domain))).toMatchObject({
        code: ErrorCode.LOOKUP_REQUEST_INVALID,
      });
    }
  });

  it('leaves the timeout out when it is zero', () => {
    expect(buildWhoisRequest('example.com', { timeoutMs: 0, follow: 1 })).toEqual({ follow: 1 });
  });

  it('passes a positive timeout through', () => {
    expect(buildWhoisRequest('example.com', { timeoutMs: 5000, follow: 2 })).toEqual({ follow: 2, timeout: 5000 });
  });

  it('accepts unicode names', () => {
    expect(buildWhoisRequest('bücher.de', { timeoutMs: 0, follow: 0 })).toEqual({ follow: 0 });
  });
});

describe('WhoisClient', () => {
  beforeEach(() => {
    lookup.mockReset();
  });

  it('resolves with the raw response', async () => {
    lookup.mockImplementation((_domain: string, _options: WhoisOptions, callback: WhoisCallback) => {
      callback(null, 'Domain Name: EXAMPLE.COM');
    });

    const client = new WhoisClient({ timeoutMs: 1000, follow: 1 });
    await expect(client.fetch('example.com')).resolves.toBe('Domain Name: EXAMPLE.COM');
    expect(lookup).toHaveBeenCalledWith('example.com', { follow: 1, timeout: 1000 }, expect.any(Function));
  });

  it('wraps transport failures', async () => {
    lookup.mockImplementation((_domain: string, _options: WhoisOptions, callback: WhoisCallback) => {
      callback(new Error('connect ETIMEDOUT'), '');
    });

    const client = new WhoisClient({ timeoutMs: 0, follow: 0 });
    await expect(client.fetch('example.com')).rejects.toMatchObject({
      code: ErrorCode.LOOKUP_FAILED,
      message: 'Whois lookup failed for example.com',
    });
  });

  it('fails before any query for an invalid name', async () => {
    const client = new WhoisClient();
    await expect(client.fetch('')).rejects.toMatchObject({ code: ErrorCode.LOOKUP_REQUEST_INVALID });
    expect(lookup).not.toHaveBeenCalled();
  });
});
