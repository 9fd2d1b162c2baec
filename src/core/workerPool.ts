import { EventEmitter } from 'node:events';
import { availableParallelism } from 'node:os';
import pLimit, { type LimitFunction } from 'p-limit';
import { Errors } from './errors.js';
import { createModuleLogger } from './logger.js';
import type { ProgressEvent } from './types.js';

const log = createModuleLogger('workerPool');

export type JobHandler<T> = (job: T) => Promise<void>;

export interface PoolStats {
  concurrency: number;
  dispatched: number;
  completed: number;
  failed: number;
}

/**
 * Worker count for a configured concurrency; 0 means one per logical core.
 */
export function resolveConcurrency(concurrency: number): number {
  if (!Number.isInteger(concurrency) || concurrency < 0) {
    throw Errors.invalidOption('concurrency', 'Must be a non-negative integer.');
  }
  return concurrency === 0 ? Math.max(1, availableParallelism()) : concurrency;
}

/**
 * Fixed-size pool draining a FIFO job queue.
 *
 * Jobs start in the order they were added, at most `concurrency` at a time.
 * Every finished job emits `progress` with the running completed/total count.
 * `waitDone()` resolves once every job added so far has finished.
 */
export class WorkerPool<T> extends EventEmitter {
  readonly concurrency: number;
  private readonly limit: LimitFunction;
  private readonly pending: Promise<void>[] = [];
  private completed = 0;
  private failed = 0;

  constructor(private readonly handler: JobHandler<T>, concurrency = 0) {
    super();
    this.concurrency = resolveConcurrency(concurrency);
    this.limit = pLimit(this.concurrency);
  }

  add(job: T): void {
    this.pending.push(this.limit(() => this.run(job)));
  }

  addAll(jobs: Iterable<T>): void {
    for (const job of jobs) {
      this.add(job);
    }
  }

  onProgress(listener: (event: ProgressEvent) => void): this {
    return this.on('progress', listener);
  }

  private async run(job: T): Promise<void> {
    try {
      await this.handler(job);
    } catch (err) {
      // handlers are expected to absorb their own failures; count and keep draining
      this.failed++;
      log.error({ err }, 'Job handler rejected');
    } finally {
      this.completed++;
      const event: ProgressEvent = { completed: this.completed, total: this.pending.length };
      this.emit('progress', event);
    }
  }

  /**
   * Barrier: resolves after every dispatched job, including jobs added while waiting.
   */
  async waitDone(): Promise<void> {
    let awaited = 0;
    while (awaited < this.pending.length) {
      const batch = this.pending.slice(awaited);
      awaited = this.pending.length;
      await Promise.all(batch);
    }
  }

  stats(): PoolStats {
    return {
      concurrency: this.concurrency,
      dispatched: this.pending.length,
      completed: this.completed,
      failed: this.failed,
    };
  }
}
