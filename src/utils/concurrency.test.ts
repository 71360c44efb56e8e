import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { Mutex, Semaphore } from './concurrency.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('Semaphore', () => {
  it('rejects a non-positive capacity', () => {
    assert.throws(() => new Semaphore(0), RangeError);
  });

  it('never runs more than capacity tasks at once', async () => {
    const sem = new Semaphore(2);
    let running = 0;
    let peak = 0;

    const task = async () => {
      running++;
      peak = Math.max(peak, running);
      await new Promise((r) => setTimeout(r, 5));
      running--;
    };

    await Promise.all([1, 2, 3, 4, 5].map(() => sem.run(task)));

    assert.strictEqual(peak, 2);
    assert.strictEqual(sem.active, 0);
    assert.strictEqual(sem.waiting, 0);
  });

  it('serves waiters in FIFO order', async () => {
    const sem = new Semaphore(1);
    const order: number[] = [];
    const gate = deferred();

    const first = sem.run(async () => {
      await gate.promise;
      order.push(1);
    });
    const second = sem.run(async () => {
      order.push(2);
    });
    const third = sem.run(async () => {
      order.push(3);
    });

    assert.strictEqual(sem.waiting, 2);
    gate.resolve();
    await Promise.all([first, second, third]);

    assert.deepStrictEqual(order, [1, 2, 3]);
  });

  it('releases the slot when the task throws', async () => {
    const sem = new Semaphore(1);

    await assert.rejects(
      () =>
        sem.run(async () => {
          throw new Error('task failed');
        }),
      /task failed/
    );

    assert.strictEqual(sem.active, 0);
  });

  it('ignores a second call to the same release function', async () => {
    const sem = new Semaphore(1);
    const release = await sem.acquire();

    release();
    release();

    assert.strictEqual(sem.active, 0);
  });
});

describe('Mutex', () => {
  it('reports whether it is held', async () => {
    const mutex = new Mutex();
    assert.strictEqual(mutex.locked, false);

    const release = await mutex.acquire();
    assert.strictEqual(mutex.locked, true);

    release();
    assert.strictEqual(mutex.locked, false);
  });
});
