import { setTimeout as sleep } from 'node:timers/promises';
import { WorkerPool } from '../src/pool/WorkerPool.js';
import { ConfigError } from '../../core/src/errors/index.js';

describe('WorkerPool', () => {
  it('completes every task with more tasks than workers', async () => {
    let active = 0;
    let peak   = 0;
    const workers = new Set<number>();

    const pool = new WorkerPool<number, number>(3, async (n, id) => {
      workers.add(id);
      active++;
      peak = Math.max(peak, active);
      await sleep(n % 3);
      active--;
      return n * 2;
    });

    const counts: number[] = [];
    const out = await pool.run(
      Array.from({ length: 10 }, (_, i) => i),
      (_, completed) => counts.push(completed),
    );

    expect(out.slice().sort((a, b) => a - b)).toEqual([0, 2, 4, 6, 8, 10, 12, 14, 16, 18]);
    expect(counts).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    expect(peak).toBeLessThanOrEqual(3);
    expect([...workers].every(id => id >= 0 && id < 3)).toBe(true);
  });

  it('resolves with nothing for an empty task list', async () => {
    const pool = new WorkerPool<number, number>(2, async n => n);
    expect(await pool.run([])).toEqual([]);
  });

  it('lets the other workers finish before rethrowing a handler rejection', async () => {
    const boom = new Error('boom');
    const pool = new WorkerPool<number, number>(2, async n => {
      if (n === 1) throw boom;
      return n;
    });

    const seen: number[] = [];
    await expect(pool.run([0, 1, 2, 3, 4], r => seen.push(r))).rejects.toBe(boom);
    expect(seen.sort()).toEqual([0, 2, 3, 4]);
  });

  it('rejects invalid sizes', () => {
    const noop = async (n: number) => n;
    expect(() => new WorkerPool(0, noop)).toThrow(ConfigError);
    expect(() => new WorkerPool(1.5, noop)).toThrow(ConfigError);
  });
});
