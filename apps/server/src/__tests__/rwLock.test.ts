// apps/server/src/__tests__/rwLock.test.ts
//
// Reader/writer exclusion and arrival-order fairness.

import { ReadWriteLock } from '../state/rwLock.js';

const tick = () => new Promise<void>((r) => setImmediate(r));

describe('ReadWriteLock', () => {
  it('lets readers share the lock', async () => {
    const lock = new ReadWriteLock();
    const r1 = await lock.acquireRead();
    const r2 = await lock.acquireRead();
    expect(lock.activeReaders).toBe(2);
    r1();
    r2();
    expect(lock.activeReaders).toBe(0);
  });

  it('holds readers back while a writer is active', async () => {
    const lock = new ReadWriteLock();
    const release = await lock.acquireWrite();

    let readGranted = false;
    const pending = lock.acquireRead().then((r) => {
      readGranted = true;
      return r;
    });
    await tick();
    expect(readGranted).toBe(false);

    release();
    const releaseRead = await pending;
    expect(readGranted).toBe(true);
    expect(lock.isWriting).toBe(false);
    releaseRead();
  });

  it('serves a queued writer before readers that arrive after it', async () => {
    const lock = new ReadWriteLock();
    const order: string[] = [];
    const firstRead = await lock.acquireRead();

    const writer = lock.withWrite(() => {
      order.push('write');
    });
    const lateReader = lock.withRead(() => {
      order.push('read');
    });
    await tick();
    expect(order).toEqual([]);

    firstRead();
    await Promise.all([writer, lateReader]);
    expect(order).toEqual(['write', 'read']);
  });

  it('releases the lock when the callback throws', async () => {
    const lock = new ReadWriteLock();
    await expect(
      lock.withWrite(() => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    expect(lock.isWriting).toBe(false);
    await expect(lock.withRead(() => 'ok')).resolves.toBe('ok');
  });
});
