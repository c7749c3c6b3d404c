import { describe, it, expect } from 'vitest';
import { ChatLock } from '../../../../src/core/concurrency/ChatLock.js';

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('ChatLock', () => {
  it('runs work of one chat in arrival order', async () => {
    const lock = new ChatLock();
    const order: string[] = [];
    const gate = deferred();

    const first = lock.runExclusive('c1', async () => {
      await gate.promise;
      order.push('first');
    });
    const second = lock.runExclusive('c1', async () => {
      order.push('second');
    });

    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(['first', 'second']);
  });

  it('does not block other chats', async () => {
    const lock = new ChatLock();
    const gate = deferred();
    const blocked = lock.runExclusive('c1', () => gate.promise);

    await expect(lock.runExclusive('c2', async () => 'done')).resolves.toBe('done');
    gate.resolve();
    await blocked;
  });

  it('keeps the chain going after a failure', async () => {
    const lock = new ChatLock();
    const failing = lock.runExclusive('c1', async () => {
      throw new Error('boom');
    });
    const next = lock.runExclusive('c1', async () => 7);

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe(7);
  });
});
