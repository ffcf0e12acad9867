import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { KeyedMutex } from '../src/lib/concurrency/keyed-mutex.js';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedMutex', () => {
  it('runs sections with the same key one after another', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    const gate = deferred();

    const first = mutex.runExclusive('2026-03-14', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
    });
    const second = mutex.runExclusive('2026-03-14', async () => {
      events.push('second:start');
    });

    await Promise.resolve();
    gate.resolve();
    await Promise.all([first, second]);

    assert.deepEqual(events, ['first:start', 'first:end', 'second:start']);
  });

  it('lets different keys run concurrently', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    const gate = deferred();

    const first = mutex.runExclusive('2026-03-14', async () => {
      events.push('day1:start');
      await gate.promise;
      events.push('day1:end');
    });
    const second = mutex.runExclusive('2026-03-15', async () => {
      events.push('day2:start');
      gate.resolve();
    });

    await Promise.all([first, second]);

    assert.deepEqual(events, ['day1:start', 'day2:start', 'day1:end']);
  });

  it('releases the key when a section throws', async () => {
    const mutex = new KeyedMutex();

    await assert.rejects(
      mutex.runExclusive('k', async () => {
        throw new Error('boom');
      }),
      /boom/
    );

    assert.equal(await mutex.runExclusive('k', () => 42), 42);
    assert.equal(mutex.isLocked('k'), false);
    assert.deepEqual(mutex.getStats(), { acquired: 2, contended: 0, activeKeys: 0 });
  });
});
