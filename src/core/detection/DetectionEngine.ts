import type { TriggerDetails } from '../streak/types.js';
import { DECOMPOSED_VARIANTS, type PatternCompiler } from '../triggers/PatternCompiler.js';
import type { RuleSnapshot } from '../triggers/types.js';
import { decompose, type DecomposedText } from './decompose.js';
import { containingSpan, ExclusionFilter, type ExcludedSpan } from './ExclusionFilter.js';
import type { LemmaNormalizer } from './LemmaNormalizer.js';

const TOKEN = /\p{L}[\p{L}\p{M}]*/gu;

export interface DetectionMeta {
  languageHint?: string;
}

export type DetectionResult =
  | { matched: true; match: TriggerDetails; excludedSpans: ExcludedSpan[] }
  | {
      matched: false;
      /** Some rule did match, but only inside excluded spans */
      excluded: boolean;
      excludedSpans: ExcludedSpan[];
    };

/**
 * Decides whether a message contains a trigger.
 *
 * Lemma layer first (dictionary forms of whole tokens), then pattern rules in
 * insertion order. The first hit outside every excluded span wins; a lemma
 * hit always beats a pattern hit. Never writes anything.
 */
export class DetectionEngine {
  constructor(
    private compiler: PatternCompiler,
    private normalizer: LemmaNormalizer,
    private filter: ExclusionFilter = new ExclusionFilter(),
  ) {}

  detect(snapshot: RuleSnapshot, text: string, meta: DetectionMeta = {}): DetectionResult {
    if (text.trim().length === 0) {
      return { matched: false, excluded: false, excludedSpans: [] };
    }

    const excludedSpans = this.filter.spans(text);
    let excluded = false;

    const lemmas = new Set(snapshot.lemmas.map((rule) => rule.name));
    if (lemmas.size > 0) {
      for (const token of text.matchAll(TOKEN)) {
        if (token.index === undefined) continue;
        const lemma = this.normalizer.normalize(token[0], meta.languageHint).toLowerCase();
        if (!lemmas.has(lemma)) continue;

        const span = { start: token.index, end: token.index + token[0].length };
        if (containingSpan(excludedSpans, span.start, span.end)) {
          excluded = true;
          continue;
        }
        return {
          matched: true,
          match: { layer: 'LEMMA', matchedWord: lemma, fragment: token[0], ruleName: lemma, span },
          excludedSpans,
        };
      }
    }

    let decomposed: DecomposedText | null = null;
    for (const rule of snapshot.patterns) {
      const matcher = this.compiler.compile(rule.pattern);
      const useDecomposed = DECOMPOSED_VARIANTS.has(rule.variant);
      if (useDecomposed && decomposed === null) decomposed = decompose(text);

      const haystack = useDecomposed && decomposed ? decomposed.text : text;
      for (const found of matcher.findAll(haystack)) {
        const span =
          useDecomposed && decomposed
            ? decomposed.toOriginal(found.start, found.end)
            : { start: found.start, end: found.end };

        if (containingSpan(excludedSpans, span.start, span.end)) {
          excluded = true;
          continue;
        }
        return {
          matched: true,
          match: {
            layer: 'PATTERN',
            matchedWord: rule.sourceWord,
            fragment: text.slice(span.start, span.end),
            ruleName: rule.name,
            variant: rule.variant,
            span,
          },
          excludedSpans,
        };
      }
    }

    return { matched: false, excluded, excludedSpans };
  }
}
