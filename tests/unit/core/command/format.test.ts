import { describe, it, expect } from 'vitest';
import { describeEvent, formatDuration } from '../../../../src/core/command/builtin/format.js';
import type { StreakEvent } from '../../../../src/core/streak/types.js';
import { emptyState } from '../../../../src/core/streak/fold.js';

describe('formatDuration', () => {
  it.each([
    [0, '0秒'],
    [999, '0秒'],
    [60_000, '1分'],
    [3_723_000, '1小时 2分 3秒'],
    [90_061_000, '1天 1小时 1分 1秒'],
    [-5, '0秒'],
  ])('%d ms → %s', (ms, expected) => {
    expect(formatDuration(ms)).toBe(expected);
  });
});

describe('describeEvent', () => {
  const base = { chatId: 'c1', actor: { userId: 'u' }, timestamp: 0, snapshotBefore: emptyState('c1') };

  it('describes each kind', () => {
    const events: StreakEvent[] = [
      {
        ...base,
        id: 1,
        kind: 'TRIGGER',
        details: { layer: 'LEMMA', matchedWord: 'test', fragment: 'tests', ruleName: 'test', span: { start: 0, end: 5 } },
      },
      {
        ...base,
        id: 2,
        kind: 'TRIGGER',
        details: {
          layer: 'PATTERN',
          matchedWord: 'test',
          fragment: 't e s t',
          ruleName: 'test_spaced',
          variant: 'SPACED',
          span: { start: 0, end: 7 },
        },
      },
      { ...base, id: 3, kind: 'MANUAL_RESET', details: { reason: '' } },
      { ...base, id: 4, kind: 'MANUAL_RESET', details: { reason: 'new season' } },
      { ...base, id: 5, kind: 'UNDO', details: { targetIds: [4, 2], requested: 2 } },
    ];

    expect(events.map(describeEvent)).toEqual([
      '触发「tests」(词形)',
      '触发「t e s t」(规则 test_spaced)',
      '手动重置',
      '手动重置：new season',
      '撤销 #4, #2',
    ]);
  });
});
