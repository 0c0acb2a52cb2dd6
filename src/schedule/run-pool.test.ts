import { describe, expect, it } from 'vitest';
import { flush } from '../testing/fakes';
import { RunPool } from './run-pool';

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>(res => {
    resolve = () => res();
  });
  return { promise, resolve };
}

describe('RunPool', () => {
  it('runs at most the limit and queues the rest', async () => {
    const pool = new RunPool(2);
    const gates = [deferred(), deferred(), deferred()];
    const started: number[] = [];

    const runs = gates.map((gate, i) =>
      pool.submit(async () => {
        started.push(i);
        await gate.promise;
        return i;
      }),
    );
    await flush();
    expect(started).toEqual([0, 1]);
    expect(pool.running).toBe(2);
    expect(pool.pending).toBe(1);

    gates[0].resolve();
    await flush();
    expect(started).toEqual([0, 1, 2]);

    gates[1].resolve();
    gates[2].resolve();
    expect(await Promise.all(runs)).toEqual([0, 1, 2]);
    await flush();
    expect(pool.running).toBe(0);
  });

  it('keeps going after a task fails', async () => {
    const pool = new RunPool(1);
    const failing = pool.submit(async () => {
      throw new Error('boom');
    });
    const next = pool.submit(async () => 'ok');

    await expect(failing).rejects.toThrow('boom');
    expect(await next).toBe('ok');
  });

  it('rejects a non-positive limit', () => {
    expect(() => new RunPool(0)).toThrow(RangeError);
  });
});
