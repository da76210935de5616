import { describe, it, expect, vi } from 'vitest';
import { SectorTaskPool, getDefaultConcurrency, type SectorTask } from './SectorTaskPool';

function createDeferred<T>() {
  const handle: { resolve: (value: T) => void } = { resolve: () => {} };
  const promise = new Promise<T>((resolve) => {
    handle.resolve = resolve;
  });
  return { promise, resolve: (value: T) => handle.resolve(value) };
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function task<T>(sectorIndex: number, key: string, run: () => Promise<T>): SectorTask<T> {
  return { sectorIndex, key, run };
}

describe(SectorTaskPool.name, () => {
  describe('constructor', () => {
    it.each([0, -1, 1.5, Number.NaN])('rejects concurrency %s', (concurrency) => {
      expect(() => new SectorTaskPool(concurrency)).toThrow(RangeError);
    });

    it('defaults to between 1 and 8 workers', () => {
      const pool = new SectorTaskPool();

      expect(pool.concurrency).toBe(getDefaultConcurrency());
      expect(pool.concurrency).toBeGreaterThanOrEqual(1);
      expect(pool.concurrency).toBeLessThanOrEqual(8);
    });
  });

  describe('run', () => {
    it('resolves an empty batch', async () => {
      await expect(new SectorTaskPool(2).run([])).resolves.toEqual([]);
    });

    it('returns outcomes in task order regardless of completion order', async () => {
      const pool = new SectorTaskPool(3);
      const deferreds = [createDeferred<string>(), createDeferred<string>(), createDeferred<string>()];

      const running = pool.run(deferreds.map((deferred, i) => task(i, `sd${i}.csdat`, () => deferred.promise)));
      deferreds[2].resolve('c');
      deferreds[1].resolve('b');
      deferreds[0].resolve('a');

      const outcomes = await running;
      expect(outcomes).toEqual([
        { status: 'fulfilled', sectorIndex: 0, key: 'sd0.csdat', value: 'a' },
        { status: 'fulfilled', sectorIndex: 1, key: 'sd1.csdat', value: 'b' },
        { status: 'fulfilled', sectorIndex: 2, key: 'sd2.csdat', value: 'c' },
      ]);
    });

    it('never runs more tasks than the concurrency limit', async () => {
      const pool = new SectorTaskPool(2);
      let active = 0;
      let maxActive = 0;

      const tasks = Array.from({ length: 6 }, (_, i) => task(i, `sd${i}.csdat`, async () => {
        active++;
        maxActive = Math.max(maxActive, active);
        await delay(2);
        active--;
        return i;
      }));

      const outcomes = await pool.run(tasks);

      expect(maxActive).toBe(2);
      expect(outcomes.every((outcome) => outcome.status === 'fulfilled')).toBe(true);
    });

    it('serializes tasks that share a key', async () => {
      const pool = new SectorTaskPool(4);
      const events: string[] = [];
      const tracked = (id: number) => task(id, 'sd0.csdat', async () => {
        events.push(`start:${id}`);
        await delay(5);
        events.push(`end:${id}`);
      });

      await pool.run([tracked(0), tracked(1)]);

      expect(events).toEqual(['start:0', 'end:0', 'start:1', 'end:1']);
    });

    it('serializes a key across concurrent batches', async () => {
      const pool = new SectorTaskPool(4);
      const events: string[] = [];
      const tracked = (id: number) => task(id, 'sd0.csdat', async () => {
        events.push(`start:${id}`);
        await delay(5);
        events.push(`end:${id}`);
      });

      await Promise.all([pool.run([tracked(0)]), pool.run([tracked(1)])]);

      expect(events).toEqual(['start:0', 'end:0', 'start:1', 'end:1']);
    });

    it('reports a failing task without affecting the others', async () => {
      const pool = new SectorTaskPool(2);
      const failure = new Error('disk on fire');

      const outcomes = await pool.run([
        task(0, 'a', async () => 1),
        task(1, 'b', async () => {
          throw failure;
        }),
        task(2, 'c', async () => 3),
      ]);

      expect(outcomes.map((outcome) => outcome.status)).toEqual(['fulfilled', 'rejected', 'fulfilled']);
      expect(outcomes[1]).toEqual({ status: 'rejected', sectorIndex: 1, key: 'b', error: failure });
    });
  });

  describe('cancellation', () => {
    it('cancels tasks that have not started when the signal aborts', async () => {
      const pool = new SectorTaskPool(1);
      const controller = new AbortController();
      const later = vi.fn(async () => 'late');

      const outcomes = await pool.run([
        task(0, 'a', async () => {
          controller.abort();
          return 'first';
        }),
        task(1, 'b', later),
        task(2, 'c', later),
      ], controller.signal);

      expect(outcomes).toEqual([
        { status: 'fulfilled', sectorIndex: 0, key: 'a', value: 'first' },
        { status: 'cancelled', sectorIndex: 1, key: 'b' },
        { status: 'cancelled', sectorIndex: 2, key: 'c' },
      ]);
      expect(later).not.toHaveBeenCalled();
    });

    it('cancels everything for an already aborted signal', async () => {
      const pool = new SectorTaskPool(2);
      const run = vi.fn(async () => 0);

      const outcomes = await pool.run([task(0, 'a', run), task(1, 'b', run)], AbortSignal.abort());

      expect(outcomes.map((outcome) => outcome.status)).toEqual(['cancelled', 'cancelled']);
      expect(run).not.toHaveBeenCalled();
    });

    it('dispose cancels queued tasks and lets running ones finish', async () => {
      const pool = new SectorTaskPool(1);
      const first = createDeferred<string>();

      const running = pool.run([
        task(0, 'a', () => first.promise),
        task(1, 'b', async () => 'never'),
      ]);
      expect(pool.getPendingCount()).toBe(2);

      pool.dispose();
      first.resolve('done');

      const outcomes = await running;
      expect(outcomes).toEqual([
        { status: 'fulfilled', sectorIndex: 0, key: 'a', value: 'done' },
        { status: 'cancelled', sectorIndex: 1, key: 'b' },
      ]);
      await delay(0);
      expect(pool.getPendingCount()).toBe(0);
    });
  });
});
