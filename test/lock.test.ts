/**
 * SerialLock tests.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { SerialLock } from '../src/lock.ts';
import { delay } from './helpers.ts';

describe('SerialLock', () => {
  it('should run sections one after another', async () => {
    const lock = new SerialLock();
    const log: string[] = [];

    const first = lock.run(async () => {
      log.push('a:start');
      await delay(10);
      log.push('a:end');
    });
    const second = lock.run(() => {
      log.push('b:start');
      log.push('b:end');
    });

    await Promise.all([first, second]);
    assert.deepStrictEqual(log, ['a:start', 'a:end', 'b:start', 'b:end']);
  });

  it('should return the section result', async () => {
    const lock = new SerialLock();
    assert.strictEqual(await lock.run(() => 42), 42);
    assert.strictEqual(await lock.run(async () => 'done'), 'done');
  });

  it('should keep working after a section rejects', async () => {
    const lock = new SerialLock();

    await assert.rejects(
      lock.run(() => {
        throw new Error('section failed');
      }),
      { message: 'section failed' }
    );

    assert.strictEqual(await lock.run(() => 'next'), 'next');
  });

  it('should report held and waiting sections', async () => {
    const lock = new SerialLock();
    let heldInside = false;

    const first = lock.run(async () => {
      heldInside = lock.held;
      await delay(5);
    });
    const second = lock.run(() => undefined);
    assert.strictEqual(lock.waiting, 2);

    await Promise.all([first, second]);
    assert.strictEqual(heldInside, true);
    assert.strictEqual(lock.held, false);
    assert.strictEqual(lock.waiting, 0);
  });
});
