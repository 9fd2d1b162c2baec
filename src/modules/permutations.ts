import type { Candidate, ScanTarget, SubstitutionDictionary } from '../core/types.js';
import { createCandidate } from '../core/types.js';

/**
 * Generate one candidate per (position, substitute) pair of the target label.
 *
 * Positions are walked left to right by code point, substitutes in dictionary
 * order. With `limit > 0` generation stops once that many candidates exist.
 */
export function generateCandidates(
  target: ScanTarget,
  dictionary: SubstitutionDictionary,
  limit = 0
): Candidate[] {
  const chars = Array.from(target.label);
  const candidates: Candidate[] = [];

  for (let i = 0; i < chars.length; i++) {
    const substitutes = dictionary.get(chars[i]);
    if (!substitutes) continue;

    const prefix = chars.slice(0, i).join('');
    const suffix = chars.slice(i + 1).join('');
    for (const sub of substitutes) {
      candidates.push(createCandidate(`${prefix}${sub}${suffix}.${target.suffix}`));
      if (limit > 0 && candidates.length === limit) {
        return candidates;
      }
    }
  }

  return candidates;
}

/** Number of candidates the label yields without a cap */
export function countPermutations(label: string, dictionary: SubstitutionDictionary): number {
  return Array.from(label).reduce((total, char) => total + (dictionary.get(char)?.length ?? 0), 0);
}
