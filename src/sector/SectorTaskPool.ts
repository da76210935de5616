import { availableParallelism } from 'node:os';
import type { SectorIndex } from '../types';
import { SectorRequestQueue, type QueuedSectorRequest } from './SectorRequestQueue';

/**
 * One unit of per-sector work
 */
export interface SectorTask<T> {
  key: string;            // Usually the sector file path
  sectorIndex: SectorIndex;
  run: () => Promise<T>;
}

export type SectorTaskOutcome<T> =
  | { status: 'fulfilled'; sectorIndex: SectorIndex; key: string; value: T }
  | { status: 'rejected'; sectorIndex: SectorIndex; key: string; error: unknown }
  | { status: 'cancelled'; sectorIndex: SectorIndex; key: string };

const MAX_DEFAULT_CONCURRENCY = 8;

export function getDefaultConcurrency(): number {
  return Math.max(1, Math.min(availableParallelism(), MAX_DEFAULT_CONCURRENCY));
}

/**
 * SectorTaskPool runs per-sector reads and writes with bounded concurrency.
 * Outcomes come back in task order regardless of completion order.
 * Tasks sharing a key are serialized, including across concurrent run() calls.
 * An aborted signal cancels tasks that have not started; running tasks finish.
 */
export class SectorTaskPool {
  readonly concurrency: number;
  private queue = new SectorRequestQueue();
  private inFlight: Set<string> = new Set();
  private nextRequestId: number = 0;

  constructor(concurrency: number = getDefaultConcurrency()) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
    }
    this.concurrency = concurrency;
  }

  run<T>(tasks: readonly SectorTask<T>[], signal?: AbortSignal): Promise<SectorTaskOutcome<T>[]> {
    const scheduled = tasks.map((task) => this.schedule(task, signal));
    this.processQueue();
    return Promise.all(scheduled);
  }

  /**
   * Number of tasks running or waiting
   */
  getPendingCount(): number {
    return this.inFlight.size + this.queue.length;
  }

  /**
   * Cancel every task that has not started yet
   */
  dispose(): void {
    for (const request of this.queue.drain()) {
      request.cancel();
    }
  }

  private schedule<T>(task: SectorTask<T>, signal?: AbortSignal): Promise<SectorTaskOutcome<T>> {
    return new Promise((resolve) => {
      const { key, sectorIndex } = task;
      const request: QueuedSectorRequest = {
        requestId: this.nextRequestId++,
        fileKey: key,
        sectorIndex,
        signal,
        execute: async () => {
          try {
            const value = await task.run();
            resolve({ status: 'fulfilled', sectorIndex, key, value });
          } catch (error) {
            resolve({ status: 'rejected', sectorIndex, key, error });
          }
        },
        cancel: () => resolve({ status: 'cancelled', sectorIndex, key }),
      };
      this.queue.add(request);
    });
  }

  /**
   * Start queued requests while slots are free
   */
  private processQueue(): void {
    while (this.inFlight.size < this.concurrency) {
      const request = this.queue.shiftAny(this.inFlight);
      if (!request) break;

      if (request.signal?.aborted) {
        request.cancel();
        continue;
      }

      this.inFlight.add(request.fileKey);
      void request.execute().finally(() => {
        this.inFlight.delete(request.fileKey);
        this.processQueue();
      });
    }
  }
}
