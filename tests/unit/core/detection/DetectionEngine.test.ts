import { describe, it, expect, beforeEach } from 'vitest';
import type { DetectionResult } from '../../../../src/core/detection/DetectionEngine.js';
import type { TriggerDetails } from '../../../../src/core/streak/types.js';
import type { RuleSnapshot } from '../../../../src/core/triggers/types.js';
import { createHarness, type Harness } from '../../helpers.js';

const admin = { userId: 'admin' };

function matchOf(result: DetectionResult): TriggerDetails {
  if (!result.matched) throw new Error('expected a match');
  return result.match;
}

describe('DetectionEngine', () => {
  let h: Harness;
  let rules: RuleSnapshot;

  beforeEach(async () => {
    h = createHarness();
    await h.registry.addWord('c1', 'test', admin);
    await h.registry.addWord('c1', 'тест', admin);
    rules = await h.registry.activeRules('c1');
  });

  it('finds a spaced-out word with the pattern layer', () => {
    expect(matchOf(h.engine.detect(rules, 'this is a t e s t'))).toEqual({
      layer: 'PATTERN',
      matchedWord: 'test',
      fragment: 't e s t',
      ruleName: 'test_spaced',
      variant: 'SPACED',
      span: { start: 10, end: 17 },
    });
  });

  it('finds inflected forms with the lemma layer', () => {
    expect(matchOf(h.engine.detect(rules, 'Тестирование завтра'))).toEqual({
      layer: 'LEMMA',
      matchedWord: 'тест',
      fragment: 'Тестирование',
      ruleName: 'тест',
      span: { start: 0, end: 12 },
    });
  });

  it('prefers a lemma hit over an earlier pattern hit', () => {
    const match = matchOf(h.engine.detect(rules, 't e s t then tests'));
    expect(match.layer).toBe('LEMMA');
    expect(match.fragment).toBe('tests');
    expect(match.span).toEqual({ start: 13, end: 18 });
  });

  it('maps matches on decomposed text back to the original', () => {
    const match = matchOf(h.engine.detect(rules, 'a t\u00e9st'));
    expect(match.variant).toBe('DIACRITIC');
    expect(match.fragment).toBe('t\u00e9st');
    expect(match.span).toEqual({ start: 2, end: 6 });
  });

  it('ignores triggers inside quotes', () => {
    expect(h.engine.detect(rules, 'he said "test" yesterday')).toMatchObject({ matched: false, excluded: true });
  });

  it('ignores triggers inside links', () => {
    expect(h.engine.detect(rules, 'see https://example.com/test')).toMatchObject({ matched: false, excluded: true });
    expect(h.engine.detect(rules, 'test.com is down')).toMatchObject({ matched: false, excluded: true });
  });

  it('ignores triggers in a command', () => {
    expect(h.engine.detect(rules, '/addword test')).toMatchObject({ matched: false, excluded: true });
  });

  it('only skips messages that start with a known command', () => {
    expect(h.engine.detect(rules, '/triggers test')).toMatchObject({ matched: false, excluded: true });
    expect(matchOf(h.engine.detect(rules, '!lol test')).span).toEqual({ start: 5, end: 9 });
  });

  it('still triggers outside an excluded span', () => {
    const match = matchOf(h.engine.detect(rules, '"quoted" test'));
    expect(match.span).toEqual({ start: 9, end: 13 });
  });

  it('reports a plain miss', () => {
    expect(h.engine.detect(rules, 'nothing to see')).toEqual({ matched: false, excluded: false, excludedSpans: [] });
    expect(h.engine.detect(rules, '   ')).toEqual({ matched: false, excluded: false, excludedSpans: [] });
  });

  it('uses only enabled rules', async () => {
    await h.registry.disable('c1', 'test', admin);
    const snapshot = await h.registry.activeRules('c1');
    expect(h.engine.detect(snapshot, 'tests').matched).toBe(false);
  });
});
