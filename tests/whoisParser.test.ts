import { describe, it, expect } from 'vitest';
import { parseWhoisResponse } from '../src/modules/whoisParser.js';
import { ErrorCode } from '../src/core/errors.js';
import {
  FREE_STATUS_RECORD,
  NOT_FOUND_RECORD,
  REGISTERED_RECORD,
  UNREGISTERED_BLOCK_RECORD,
  captureError,
} from './helpers/fakes.js';

describe('parseWhoisResponse', () => {
  it('parses a registry-style record', () => {
    expect(parseWhoisResponse(REGISTERED_RECORD)).toEqual({
      domainName: 'exampl3.com',
      registrar: {
        name: 'Test Registrar, Inc.',
        referralUrl: 'http://www.registrar.test',
      },
      domain: {
        createdDate: '2019-08-14T04:00:00Z',
        updatedDate: '2023-08-14T07:01:38Z',
        expirationDate: '2025-08-13T04:00:00Z',
        nameServers: ['ns1.dns-host.test', 'ns2.dns-host.test'],
      },
    });
  });

  it('parses indented block records', () => {
    const raw = [
      '',
      '    Domain name:',
      '        example-test.co.uk',
      '',
      '    Registrar:',
      '        Test Registrar Ltd [Tag = TEST]',
      '        URL: https://registrar.test',
      '',
      '    Relevant dates:',
      '        Registered on: 01-Jan-2001',
      '        Expiry date:  01-Jan-2030',
      '        Last updated:  02-Feb-2024',
      '',
      '    Name servers:',
      '        ns1.test-dns.co.uk      192.0.2.1',
      '        ns2.test-dns.co.uk',
      '',
    ].join('\n');

    const info = parseWhoisResponse(raw);
    expect(info.domainName).toBe('example-test.co.uk');
    expect(info.registrar?.name).toBe('Test Registrar Ltd [Tag = TEST]');
    expect(info.registrar?.referralUrl).toBe('https://registrar.test');
    expect(info.domain).toEqual({
      createdDate: '01-Jan-2001',
      updatedDate: '02-Feb-2024',
      expirationDate: '01-Jan-2030',
      nameServers: ['ns1.test-dns.co.uk', 'ns2.test-dns.co.uk'],
    });
  });

  it('keeps the first value of repeated scalar fields', () => {
    const raw = ['Domain Name: A-TEST.COM', 'Creation Date: 2001-01-01', 'Creation Date: 2010-10-10'].join('\n');
    expect(parseWhoisResponse(raw).domain?.createdDate).toBe('2001-01-01');
  });

  it('normalizes and deduplicates name servers', () => {
    const raw = ['domain: a-test.de', 'nserver: NS1.HOST.TEST.', 'nserver: ns1.host.test', 'nserver: ns2.host.test'].join('\n');
    expect(parseWhoisResponse(raw).domain).toEqual({
      createdDate: '',
      updatedDate: '',
      expirationDate: '',
      nameServers: ['ns1.host.test', 'ns2.host.test'],
    });
  });

  it('omits sections with no data', () => {
    const raw = ['% comment line', '# another', 'Domain Name: ONLY-NAME.TEST', 'Registrar: Test Registrar'].join('\n');
    expect(parseWhoisResponse(raw)).toEqual({ domainName: 'only-name.test', registrar: { name: 'Test Registrar' } });
  });

  it('rejects a record that only echoes the domain name', () => {
    expect(captureError(() => parseWhoisResponse('Domain Name: ONLY-NAME.TEST'))).toMatchObject({
      code: ErrorCode.LOOKUP_PARSE_FAILED,
      message: 'Whois response could not be parsed: no registration fields',
    });
  });

  it('reports block-style answers that echo the name as not found', () => {
    expect(captureError(() => parseWhoisResponse(UNREGISTERED_BLOCK_RECORD))).toMatchObject({
      code: ErrorCode.LOOKUP_NOT_FOUND,
    });
  });

  it('reports free status answers as not found', () => {
    expect(captureError(() => parseWhoisResponse(FREE_STATUS_RECORD))).toMatchObject({
      code: ErrorCode.LOOKUP_NOT_FOUND,
    });
  });

  it('ignores "not found" wording inside notices of a registered record', () => {
    const raw = [
      REGISTERED_RECORD,
      'NOTICE: if the requested object is not found, contact the registrar.',
      '% Queries for names not found in the registry are rate limited.',
    ].join('\n');
    expect(parseWhoisResponse(raw).domainName).toBe('exampl3.com');
  });

  it('keeps a registrar URL only inside the registrar block', () => {
    const raw = ['Domain name: a-test.example', 'URL: https://elsewhere.test', 'Registrar: Test Registrar'].join('\n');
    expect(parseWhoisResponse(raw).registrar).toEqual({ name: 'Test Registrar', referralUrl: undefined });
  });

  it('reports registry "no match" answers as not found', () => {
    expect(captureError(() => parseWhoisResponse(NOT_FOUND_RECORD))).toMatchObject({ code: ErrorCode.LOOKUP_NOT_FOUND });
  });

  it('reports empty answers as parse failures', () => {
    expect(captureError(() => parseWhoisResponse('   \n '))).toMatchObject({ code: ErrorCode.LOOKUP_PARSE_FAILED });
  });

  it('reports unrecognised text as parse failures', () => {
    expect(captureError(() => parseWhoisResponse('rate limit exceeded, try again later'))).toMatchObject({
        code: ErrorCode.LOOKUP_PARSE_FAILED,
        message: 'Whois response could not be parsed: no registration fields',
      });
  });
});
