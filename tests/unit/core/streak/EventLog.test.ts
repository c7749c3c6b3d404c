import { describe, it, expect, vi } from 'vitest';
import { ChatLock } from '../../../../src/core/concurrency/ChatLock.js';
import { ConsistencyFault, ValidationError } from '../../../../src/core/errors.js';
import { EventLog, type TriggerInput } from '../../../../src/core/streak/EventLog.js';
import { InMemoryEventStore, type StoredChat } from '../../../../src/core/streak/EventStore.js';
import type { ChatState, StreakEvent } from '../../../../src/core/streak/types.js';
import { createClock, mockLogger } from '../../helpers.js';

const alice = { userId: 'alice', displayName: 'Alice' };
const bob = { userId: 'bob' };

const hit: TriggerInput = {
  kind: 'TRIGGER',
  details: {
    layer: 'LEMMA',
    matchedWord: 'test',
    fragment: 'test',
    ruleName: 'test',
    span: { start: 0, end: 4 },
  },
};

/** Fails the next commit it is asked for */
class FlakyStore extends InMemoryEventStore {
  failNext = false;

  override async commit(chatId: string, event: StreakEvent, projection: ChatState): Promise<void> {
    if (this.failNext) {
      this.failNext = false;
      throw new Error('disk full');
    }
    return super.commit(chatId, event, projection);
  }
}

/** Hands out a stale projection, as a half-written store would */
class StaleProjectionStore extends InMemoryEventStore {
  override async load(chatId: string): Promise<StoredChat | null> {
    const stored = await super.load(chatId);
    if (stored?.projection) stored.projection = { ...stored.projection, bestStreakMs: 999_999 };
    return stored;
  }
}

function createLog(store = new InMemoryEventStore()) {
  const clock = createClock(1_000);
  const log = new EventLog(store, new ChatLock(), mockLogger, { now: clock.now });
  return { clock, log, store };
}

describe('EventLog', () => {
  it('assigns per-chat ids starting at 1 and records the state before each event', async () => {
    const { clock, log } = createLog();

    const first = await log.appendEvent('c1', alice, hit);
    clock.t = 2_000;
    const second = await log.appendEvent('c1', bob, { kind: 'MANUAL_RESET', details: { reason: 'spam' } });
    const other = await log.appendEvent('c2', bob, hit);

    expect(first.id).toBe(1);
    expect(second.id).toBe(2);
    expect(other.id).toBe(1);
    expect(first.snapshotBefore.lastEventId).toBe(0);
    expect(second.snapshotBefore.lastEventId).toBe(1);
    expect(second.snapshotBefore.streakStart).toBe(1_000);
  });

  it('starts the streak when a chat is opened', async () => {
    const { clock, log } = createLog();
    clock.t = 7_000;
    const state = await log.open('c1');
    expect(state.streakStart).toBe(7_000);

    clock.t = 9_000;
    expect((await log.open('c1')).streakStart).toBe(7_000);
  });

  it('never lets timestamps run backwards', async () => {
    const { clock, log } = createLog();
    clock.t = 5_000;
    await log.appendEvent('c1', alice, hit);
    clock.t = 3_000;
    const later = await log.appendEvent('c1', alice, hit);
    expect(later.timestamp).toBe(5_000);
  });

  it('undoes the two most recent triggers by refolding history', async () => {
    const { clock, log } = createLog();
    await log.open('c1');
    clock.t = 2_000;
    await log.appendEvent('c1', alice, hit);
    clock.t = 5_000;
    await log.appendEvent('c1', bob, hit);
    clock.t = 9_000;
    await log.appendEvent('c1', alice, hit);
    expect((await log.getState('c1')).bestStreakMs).toBe(4_000);

    clock.t = 10_000;
    const outcome = await log.undo('c1', 2, bob);

    expect(outcome.count).toBe(2);
    expect(outcome.requested).toBe(2);
    expect(outcome.undone.map((e) => e.id)).toEqual([3, 2]);
    expect(outcome.undoEvent?.id).toBe(4);
    expect(outcome.undoEvent?.details.targetIds).toEqual([3, 2]);

    const state = await log.getState('c1');
    expect(state.streakStart).toBe(2_000);
    expect(state.totalResetCount).toBe(0);
    // The best streak is recomputed, so it can shrink
    expect(state.bestStreakMs).toBe(1_000);
    expect(state.lastReset?.eventId).toBe(1);
    expect(state.lastEventId).toBe(4);
    expect(outcome.state).toEqual(state);
  });

  it('undoes what is available when fewer events are eligible', async () => {
    const { log } = createLog();
    await log.appendEvent('c1', alice, hit);

    const outcome = await log.undo('c1', 5, alice);
    expect(outcome.count).toBe(1);
    expect(outcome.requested).toBe(5);
  });

  it('appends nothing when there is nothing to undo', async () => {
    const { log } = createLog();
    await log.open('c1');

    const outcome = await log.undo('c1', 1, alice);
    expect(outcome.count).toBe(0);
    expect(outcome.undoEvent).toBeUndefined();
    expect(await log.history('c1')).toEqual([]);

    const unknown = await log.undo('nowhere', 3, alice);
    expect(unknown.count).toBe(0);
    expect(unknown.state.streakStart).toBeNull();
  });

  it('skips undo events and already undone events on the next undo', async () => {
    const { clock, log } = createLog();
    await log.appendEvent('c1', alice, hit);
    clock.t = 2_000;
    await log.appendEvent('c1', alice, hit);

    await log.undo('c1', 1, alice);
    const second = await log.undo('c1', 1, alice);

    expect(second.undone.map((e) => e.id)).toEqual([1]);
    const state = await log.getState('c1');
    expect(state.streakStart).toBe(1_000);
    expect(state.lastReset).toBeNull();
    expect(state.lastEventId).toBe(4);
  });

  it.each([0, 11, 1.5, -1])('rejects an undo count of %s', async (count) => {
    const { log } = createLog();
    await log.appendEvent('c1', alice, hit);

    await expect(log.undo('c1', count, alice)).rejects.toBeInstanceOf(ValidationError);
    expect((await log.getState('c1')).lastEventId).toBe(1);
  });

  it('undoes a specific event by id', async () => {
    const { clock, log } = createLog();
    await log.appendEvent('c1', alice, hit);
    clock.t = 3_000;
    await log.appendEvent('c1', alice, { kind: 'MANUAL_RESET', details: { reason: '' } });

    const outcome = await log.undoById('c1', 2, bob);
    expect(outcome.undone.map((e) => e.id)).toEqual([2]);
    expect((await log.getState('c1')).totalResetCount).toBe(0);

    await expect(log.undoById('c1', 2, bob)).rejects.toThrow('Event #2 has already been undone');
    await expect(log.undoById('c1', 3, bob)).rejects.toThrow(
      'Event #3 is an undo and cannot itself be undone',
    );
    await expect(log.undoById('c1', 42, bob)).rejects.toThrow('Event #42 does not exist in chat c1');
  });

  it('pages history newest first and marks undone events', async () => {
    const { log } = createLog();
    await log.appendEvent('c1', alice, hit);
    await log.appendEvent('c1', bob, hit);
    await log.undo('c1', 1, alice);

    const page = await log.history('c1', 2);
    expect(page.map((h) => [h.event.id, h.nullified])).toEqual([
      [3, false],
      [2, true],
    ]);
  });

  it('serializes concurrent appends to the same chat', async () => {
    const { log } = createLog();
    const events = await Promise.all([
      log.appendEvent('c1', alice, hit),
      log.appendEvent('c1', bob, hit),
      log.appendEvent('c1', alice, hit),
    ]);
    expect(events.map((e) => e.id)).toEqual([1, 2, 3]);
    expect((await log.getState('c1')).lastEventId).toBe(3);
  });

  it('leaves memory untouched when the store rejects a commit', async () => {
    const store = new FlakyStore();
    const { log } = createLog(store);
    await log.appendEvent('c1', alice, hit);

    store.failNext = true;
    await expect(log.appendEvent('c1', bob, hit)).rejects.toThrow('disk full');
    expect((await log.getState('c1')).lastEventId).toBe(1);

    const retried = await log.appendEvent('c1', bob, hit);
    expect(retried.id).toBe(2);
  });

  it('reloads a chat from its store', async () => {
    const { clock, log, store } = createLog();
    await log.appendEvent('c1', alice, hit);
    clock.t = 4_000;
    await log.appendEvent('c1', alice, hit);

    const reloaded = new EventLog(store, new ChatLock(), mockLogger, { now: clock.now });
    expect(await reloaded.getState('c1')).toEqual(await log.getState('c1'));
  });

  it('reports a stale stored projection and serves a fresh fold', async () => {
    const store = new StaleProjectionStore();
    const { clock, log } = createLog(store);
    await log.open('c1');
    clock.t = 4_000;
    await log.appendEvent('c1', alice, hit);

    const onFault = vi.fn();
    const reloaded = new EventLog(store, new ChatLock(), mockLogger, { now: clock.now, onFault });
    const state = await reloaded.getState('c1');

    expect(state.bestStreakMs).toBe(3_000);
    expect(onFault).toHaveBeenCalledTimes(1);
    const fault: unknown = onFault.mock.calls[0]?.[0];
    expect(fault).toBeInstanceOf(ConsistencyFault);
    expect(fault).toMatchObject({ code: 'CONSISTENCY_FAULT', chatId: 'c1' });
  });

  it('verifies cleanly when the cache matches the log', async () => {
    const onFault = vi.fn();
    const clock = createClock();
    const log = new EventLog(new InMemoryEventStore(), new ChatLock(), mockLogger, {
      now: clock.now,
      verifyOnRead: true,
      onFault,
    });
    await log.appendEvent('c1', alice, hit);

    expect((await log.getState('c1')).lastEventId).toBe(1);
    expect(await log.verify('c1')).toEqual(await log.getState('c1'));
    expect(onFault).not.toHaveBeenCalled();
  });
});
