/**
 * lookalike-scan - programmatic entry point
 *
 * @example
 * ```typescript
 * import { executeScan } from 'lookalike-scan';
 *
 * const results = await executeScan({ target: 'example.com', limit: 50 });
 * for (const candidate of results.filter({ liveOnly: true })) {
 *   console.log(candidate.domain, candidate.addresses);
 * }
 * ```
 */

export { executeScan, type ScanRequest } from './scan/executeScan.js';
export { ScanResults, type ReportFilter, type ScanSummary } from './scan/scanResults.js';
export { generateCandidates, countPermutations } from './modules/permutations.js';
export { buildDictionary, loadDictionary, DEFAULT_DICTIONARY_PATH } from './modules/dictionary.js';
export {
  resolveCandidate,
  checkRegistration,
  createDefaultResolverDeps,
  type ResolverDeps,
  type AvailabilityVerdict,
} from './modules/availabilityResolver.js';
export { WhoisClient, type RegistrationLookupClient, type WhoisClientOptions } from './modules/whoisClient.js';
export { parseWhoisResponse } from './modules/whoisParser.js';
export { WorkerPool, resolveConcurrency, type JobHandler, type PoolStats } from './core/workerPool.js';
export { parseTarget } from './core/validation.js';
export { systemResolver, type HostResolver } from './util/dnsResolver.js';
export { toAsciiDomain } from './util/idna.js';
export { buildCsv, parseCsv, writeCsvReport } from './services/csvExport.js';
export { formatReport } from './services/consoleReport.js';
export { ErrorCode, LookalikeError, type ErrorCodeType } from './core/errors.js';
export * from './core/types.js';
