import { describe, it, expect } from 'vitest';
import { toAsciiDomain } from '../src/util/idna.js';

describe('toAsciiDomain', () => {
  it('leaves ASCII names unchanged', () => {
    expect(toAsciiDomain('exampl3.com')).toBe('exampl3.com');
  });

  it('encodes non-ASCII labels', () => {
    expect(toAsciiDomain('bücher.de')).toBe('xn--bcher-kva.de');
  });

  it('lowercases before encoding', () => {
    expect(toAsciiDomain('BÜCHER.DE')).toBe('xn--bcher-kva.de');
  });

  it('rejects empty and oversized labels', () => {
    expect(toAsciiDomain('a..com')).toBe('');
    expect(toAsciiDomain(`${'a'.repeat(64)}.com`)).toBe('');
    expect(toAsciiDomain('')).toBe('');
  });
});
