import type { SectorIndex } from '../types';

/**
 * A queued sector read or write
 */
export interface QueuedSectorRequest {
  requestId: number;
  fileKey: string;        // File path; at most one request per file runs at a time
  sectorIndex: SectorIndex;
  signal?: AbortSignal;
  execute: () => Promise<void>;
  cancel: () => void;
}

/**
 * FIFO queue for sector requests.
 * Skips requests whose file is already being processed so one file is
 * never read and written at the same time.
 */
export class SectorRequestQueue {
  private queue: QueuedSectorRequest[] = [];
  private queuedIds: Set<number> = new Set(); // O(1) duplicate lookup
  private queuedFiles: Map<string, number> = new Map(); // fileKey -> queued count

  /**
   * Add a request to the queue if not already present.
   * @returns true if added, false if duplicate
   */
  add(request: QueuedSectorRequest): boolean {
    if (this.queuedIds.has(request.requestId)) {
      return false;
    }
    this.queue.push(request);
    this.queuedIds.add(request.requestId);
    this.queuedFiles.set(request.fileKey, (this.queuedFiles.get(request.fileKey) ?? 0) + 1);
    return true;
  }

  /**
   * Check if any request for the given file is waiting.
   */
  has(fileKey: string): boolean {
    return this.queuedFiles.has(fileKey);
  }

  /**
   * Remove and return the first request whose file is not in flight.
   */
  shiftAny(inFlight: ReadonlySet<string>): QueuedSectorRequest | undefined {
    const index = this.queue.findIndex((req) => !inFlight.has(req.fileKey));
    if (index === -1) {
      return undefined;
    }

    const [request] = this.queue.splice(index, 1);
    this.forget(request);
    return request;
  }

  /**
   * Empty the queue, returning everything that was waiting.
   */
  drain(): QueuedSectorRequest[] {
    const drained = this.queue;
    this.queue = [];
    this.queuedIds.clear();
    this.queuedFiles.clear();
    return drained;
  }

  get length(): number {
    return this.queue.length;
  }

  private forget(request: QueuedSectorRequest): void {
    this.queuedIds.delete(request.requestId);
    const remaining = (this.queuedFiles.get(request.fileKey) ?? 1) - 1;
    if (remaining > 0) {
      this.queuedFiles.set(request.fileKey, remaining);
    } else {
      this.queuedFiles.delete(request.fileKey);
    }
  }
}
