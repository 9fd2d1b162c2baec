import type { Candidate, ScanTarget } from '../core/types.js';
import { isLive } from '../core/types.js';

export interface ReportFilter {
  /** Only candidates that appear unregistered */
  availableOnly?: boolean;
  /** Only registered candidates */
  registeredOnly?: boolean;
  /** Only registered candidates with at least one address */
  liveOnly?: boolean;
}

export interface ScanSummary {
  total: number;
  available: number;
  registered: number;
  live: number;
}

/**
 * Resolved candidates of one scan, in generation order.
 * Read-only view handed to the console and CSV reporters.
 */
export class ScanResults {
  private readonly entries: readonly Candidate[];

  constructor(readonly target: ScanTarget, candidates: readonly Candidate[]) {
    this.entries = [...candidates];
  }

  get candidates(): readonly Candidate[] {
    return this.entries;
  }

  get size(): number {
    return this.entries.length;
  }

  /** All candidates have been written by the resolver */
  isComplete(): boolean {
    return this.entries.every((c) => c.resolved);
  }

  static isVisible(candidate: Candidate, filter: ReportFilter = {}): boolean {
    if (candidate.available) {
      return !filter.registeredOnly && !filter.liveOnly;
    }
    if (filter.availableOnly) {
      return false;
    }
    return isLive(candidate) || !filter.liveOnly;
  }

  filter(filter: ReportFilter = {}): Candidate[] {
    return this.entries.filter((c) => ScanResults.isVisible(c, filter));
  }

  summary(): ScanSummary {
    const available = this.entries.filter((c) => c.available).length;
    return {
      total: this.entries.length,
      available,
      registered: this.entries.length - available,
      live: this.entries.filter(isLive).length,
    };
  }
}
