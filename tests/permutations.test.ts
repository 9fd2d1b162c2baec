import { describe, it, expect } from 'vitest';
import { generateCandidates, countPermutations } from '../src/modules/permutations.js';
import { buildDictionary, loadDictionary } from '../src/modules/dictionary.js';

const digits = buildDictionary({ e: ['3'], o: ['0'] });
const vowels = buildDictionary({ o: ['0', 'ο'], e: ['3'] });

function domains(label: string, suffix: string, dictionary = digits, limit = 0): string[] {
  return generateCandidates({ label, suffix }, dictionary, limit).map((c) => c.domain);
}

describe('generateCandidates', () => {
  it('substitutes every matching position left to right', () => {
    expect(domains('example', 'com')).toEqual(['3xample.com', 'exampl3.com']);
  });

  it('walks substitutes in dictionary order within a position', () => {
    expect(domains('google', 'com', vowels)).toEqual([
      'g0ogle.com',
      'gοogle.com',
      'go0gle.com',
      'goοgle.com',
      'googl3.com',
    ]);
  });

  it('creates candidates with only the domain populated', () => {
    const [candidate] = generateCandidates({ label: 'example', suffix: 'com' }, digits);
    expect(candidate).toEqual({
      domain: '3xample.com',
      asciiForm: '',
      available: false,
      resolved: false,
      addresses: [],
      hostnames: [],
    });
    expect(candidate.registrationInfo).toBeUndefined();
  });

  it('stops at the configured limit', () => {
    expect(domains('google', 'com', vowels, 3)).toEqual(['g0ogle.com', 'gοogle.com', 'go0gle.com']);
  });

  it('returns everything when the limit exceeds the total', () => {
    expect(domains('google', 'com', vowels, 50)).toHaveLength(5);
  });

  it('yields nothing when no character has substitutes', () => {
    expect(domains('xyz', 'net')).toEqual([]);
  });

  it('keeps multi-label suffixes intact', () => {
    expect(domains('test', 'co.uk')).toEqual(['t3st.co.uk']);
  });

  it('treats a non-ASCII code point as one position', () => {
    const dictionary = buildDictionary({ 'ü': ['u'], e: ['3'] });
    expect(domains('bücher', 'de', dictionary)).toEqual(['bucher.de', 'büch3r.de']);
  });

  it('is reproducible for the same inputs', () => {
    expect(domains('google', 'com', vowels, 4)).toEqual(domains('google', 'com', vowels, 4));
  });

  it('matches the permutation count and differs from the label in exactly one position', async () => {
    const dictionary = await loadDictionary();
    const label = 'securebank';
    const candidates = generateCandidates({ label, suffix: 'com' }, dictionary);

    expect(candidates).toHaveLength(countPermutations(label, dictionary));

    const original = Array.from(label);
    for (const candidate of candidates) {
      const variant = Array.from(candidate.domain.slice(0, -'.com'.length));
      expect(variant).toHaveLength(original.length);
      const differences = variant.filter((ch, i) => ch !== original[i]).length;
      expect(differences).toBe(1);
    }
  });

  it('never exceeds the limit on the bundled dictionary', async () => {
    const dictionary = await loadDictionary();
    for (const limit of [1, 7, 20]) {
      expect(generateCandidates({ label: 'securebank', suffix: 'com' }, dictionary, limit)).toHaveLength(limit);
    }
  });
});

describe('countPermutations', () => {
  it('sums substitutes per position', () => {
    expect(countPermutations('example', digits)).toBe(2);
    expect(countPermutations('google', vowels)).toBe(5);
    expect(countPermutations('', vowels)).toBe(0);
  });
});
