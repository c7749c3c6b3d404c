/**
 * Trigger rules: what the detector looks for in each chat.
 */

export type RuleKind = 'LEMMA' | 'PATTERN';

export const VARIANT_KINDS = [
  'TRANSLITERATION',
  'LOOKALIKE',
  'SPACED',
  'ZERO_WIDTH',
  'DIACRITIC',
  'MULTIMODAL',
] as const;

export type VariantKind = (typeof VARIANT_KINDS)[number];

interface RuleBase {
  chatId: string;
  /** Lemma itself for LEMMA rules, `<word>_<variant>` for PATTERN rules */
  name: string;
  /** Canonical word the rule was created from; removal cascades on it */
  sourceWord: string;
  enabled: boolean;
  createdBy: string;
  createdAt: number;
}

export interface LemmaRule extends RuleBase {
  kind: 'LEMMA';
}

export interface PatternRule extends RuleBase {
  kind: 'PATTERN';
  variant: VariantKind;
  pattern: string;
}

export type TriggerRule = LemmaRule | PatternRule;

/** Generated, not yet stored */
export interface VariantRule {
  name: string;
  pattern: string;
  variant: VariantKind;
}

/** Enabled rules of one chat, in insertion order. Never mutated. */
export interface RuleSnapshot {
  readonly chatId: string;
  readonly lemmas: readonly LemmaRule[];
  readonly patterns: readonly PatternRule[];
}
