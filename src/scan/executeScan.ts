/**
 * Execute Scan - Orchestrates one look-alike scan
 *
 * target -> permutations -> worker pool running the availability resolver
 * -> ScanResults in generation order.
 */

import { Errors } from '../core/errors.js';
import { createModuleLogger } from '../core/logger.js';
import type { Candidate, ProgressEvent, ScanTarget, SubstitutionDictionary } from '../core/types.js';
import { parseTarget } from '../core/validation.js';
import { WorkerPool } from '../core/workerPool.js';
import { createDefaultResolverDeps, resolveCandidate, type ResolverDeps } from '../modules/availabilityResolver.js';
import { loadDictionary } from '../modules/dictionary.js';
import { generateCandidates } from '../modules/permutations.js';
import { ScanResults } from './scanResults.js';

const log = createModuleLogger('executeScan');

export interface ScanRequest {
  /** Domain name or URL of the protected brand */
  target: string;
  /** Permutation cap, 0 for none */
  limit?: number;
  /** Worker count, 0 for one per logical core */
  concurrency?: number;
  /** Preloaded dictionary; takes precedence over dictionaryPath */
  dictionary?: SubstitutionDictionary;
  dictionaryPath?: string;
  /** Collaborator overrides, mainly for tests */
  deps?: Partial<ResolverDeps>;
  /** Called once candidates exist, before any network activity */
  onStart?: (target: ScanTarget, total: number) => void;
  onProgress?: (event: ProgressEvent) => void;
}

function validateLimit(limit: number): number {
  if (!Number.isInteger(limit) || limit < 0) {
    throw Errors.invalidOption('limit', 'Must be a non-negative integer.');
  }
  return limit;
}

/**
 * Run a scan. Rejects only on configuration errors, which are raised before
 * any candidate is generated or looked up.
 */
export async function executeScan(request: ScanRequest): Promise<ScanResults> {
  const startTime = Date.now();

  const target = parseTarget(request.target);
  const limit = validateLimit(request.limit ?? 0);
  const deps = createDefaultResolverDeps(request.deps);
  const pool = new WorkerPool<Candidate>((candidate) => resolveCandidate(candidate, deps), request.concurrency ?? 0);
  const dictionary = request.dictionary ?? (await loadDictionary(request.dictionaryPath));

  const candidates = generateCandidates(target, dictionary, limit);
  log.info(
    { label: target.label, suffix: target.suffix, candidates: candidates.length, concurrency: pool.concurrency },
    'Starting scan'
  );
  request.onStart?.(target, candidates.length);

  if (request.onProgress) {
    pool.onProgress(request.onProgress);
  }
  pool.addAll(candidates);
  await pool.waitDone();

  const results = new ScanResults(target, candidates);
  log.info({ ...results.summary(), durationMs: Date.now() - startTime }, 'Scan completed');
  return results;
}
