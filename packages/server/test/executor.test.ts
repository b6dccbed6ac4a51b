import { describe, expect, it } from 'vitest';
import { DEFAULT_WORKERS, Executor } from '../src';
import { settle } from './mock';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve = (): void => {};
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe('Executor', () => {
  it('defaults to ten workers', () => {
    expect(new Executor().size).toBe(DEFAULT_WORKERS);
    expect(DEFAULT_WORKERS).toBe(10);
  });

  it('rejects a size below one', () => {
    expect(() => new Executor(0)).toThrow(RangeError);
  });

  it('queues tasks beyond its size and starts them in order', async () => {
    const executor = new Executor(2);
    const gates = [deferred(), deferred(), deferred()];
    const started: number[] = [];
    const runs = gates.map((gate, index) =>
      executor.run(async () => {
        started.push(index);
        await gate.promise;
        return index;
      })
    );

    await settle();
    expect(started).toEqual([0, 1]);
    expect(executor.active).toBe(2);
    expect(executor.pending).toBe(1);

    gates[0]?.resolve();
    await expect(runs[0]).resolves.toBe(0);
    await settle();
    expect(started).toEqual([0, 1, 2]);
    expect(executor.pending).toBe(0);

    gates[1]?.resolve();
    gates[2]?.resolve();
    await expect(Promise.all(runs)).resolves.toEqual([0, 1, 2]);
    await settle();
    expect(executor.active).toBe(0);
  });

  it('frees the slot when a task throws', async () => {
    const executor = new Executor(1);
    await expect(
      executor.run(() => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    await settle();
    expect(executor.active).toBe(0);
    await expect(executor.run(() => 'next')).resolves.toBe('next');
  });
});
