import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { ChatLock } from '../../../../src/core/concurrency/ChatLock.js';
import { JsonlEventStore } from '../../../../src/core/storage/JsonlEventStore.js';
import { EventLog } from '../../../../src/core/streak/EventLog.js';
import { createClock, mockLogger } from '../../helpers.js';

const alice = { userId: 'alice', displayName: 'Alice' };

describe('JsonlEventStore', () => {
  let dir: string;
  let store: JsonlEventStore;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'streak-events-'));
    store = new JsonlEventStore(mockLogger, path.join(dir, 'events'));
    await store.initialize();
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function writeHistory(chatId: string) {
    const clock = createClock(1_000);
    const log = new EventLog(store, new ChatLock(), mockLogger, { now: clock.now });
    clock.t = 3_000;
    await log.appendEvent(chatId, alice, {
      kind: 'TRIGGER',
      details: {
        layer: 'PATTERN',
        matchedWord: 'test',
        fragment: 't e s t',
        ruleName: 'test_spaced',
        variant: 'SPACED',
        span: { start: 0, end: 7 },
      },
    });
    clock.t = 6_000;
    await log.appendEvent(chatId, alice, { kind: 'MANUAL_RESET', details: { reason: 'again' } });
    await log.undo(chatId, 1, alice);
    return log;
  }

  it('returns null for a chat without a log', async () => {
    expect(await store.load('group:1')).toBeNull();
  });

  it('writes a header first, then one line per commit', async () => {
    await writeHistory('group:1');

    const content = await fs.readFile(path.join(dir, 'events', 'group%3A1.jsonl'), 'utf-8');
    const lines = content.trim().split('\n');
    expect(lines).toHaveLength(4);
    expect(JSON.parse(lines[0] ?? '')).toEqual({ type: 'open', header: { chatId: 'group:1', openedAt: 3_000 } });
  });

  it('reads back events and the last projection', async () => {
    const log = await writeHistory('group:1');

    const stored = await store.load('group:1');
    expect(stored?.events.map((e) => e.kind)).toEqual(['TRIGGER', 'MANUAL_RESET', 'UNDO']);
    expect(stored?.projection).toEqual(await log.getState('group:1'));
  });

  it('rebuilds the same state in a fresh process', async () => {
    const log = await writeHistory('group:1');

    const reopened = new JsonlEventStore(mockLogger, path.join(dir, 'events'));
    const fresh = new EventLog(reopened, new ChatLock(), mockLogger);
    expect(await fresh.getState('group:1')).toEqual(await log.getState('group:1'));
  });

  it('cuts a torn final line off the file', async () => {
    await writeHistory('group:1');
    const file = path.join(dir, 'events', 'group%3A1.jsonl');
    const complete = await fs.readFile(file, 'utf-8');
    await fs.appendFile(file, '{"type":"commit","event":{"id":4');

    const stored = await store.load('group:1');
    expect(stored?.events).toHaveLength(3);
    expect(await fs.readFile(file, 'utf-8')).toBe(complete);
  });

  it('keeps commits made after a torn line', async () => {
    await writeHistory('group:1');
    await fs.appendFile(path.join(dir, 'events', 'group%3A1.jsonl'), '{"type":"commit","ev');

    const reopen = () => {
      const clock = createClock(10_000);
      const next = new JsonlEventStore(mockLogger, path.join(dir, 'events'));
      return new EventLog(next, new ChatLock(), mockLogger, { now: clock.now });
    };

    const first = reopen();
    const fourth = await first.appendEvent('group:1', alice, { kind: 'MANUAL_RESET', details: { reason: '' } });
    expect(fourth.id).toBe(4);

    const second = reopen();
    expect((await second.getState('group:1')).lastEventId).toBe(4);
    await second.appendEvent('group:1', alice, { kind: 'MANUAL_RESET', details: { reason: '' } });

    const third = reopen();
    const state = await third.getState('group:1');
    expect(state.lastEventId).toBe(5);
    expect(state.totalResetCount).toBe(2);
  });

  it('ends a last record that lost its newline before appending', async () => {
    await writeHistory('group:1');
    const file = path.join(dir, 'events', 'group%3A1.jsonl');
    const content = await fs.readFile(file, 'utf-8');
    await fs.writeFile(file, content.trimEnd(), 'utf-8');

    expect((await store.load('group:1'))?.events).toHaveLength(3);
    expect(await fs.readFile(file, 'utf-8')).toBe(content);
  });

  it('refuses a log corrupted before its end', async () => {
    await writeHistory('group:1');
    const file = path.join(dir, 'events', 'group%3A1.jsonl');
    const lines = (await fs.readFile(file, 'utf-8')).trim().split('\n');
    lines[1] = 'not json';
    await fs.writeFile(file, lines.join('\n') + '\n', 'utf-8');

    await expect(store.load('group:1')).rejects.toThrow('Corrupted record at line 2 in log of group:1');
  });
});
