import type { LemmaTable } from '../../infra/config/tables.js';

/**
 * Maps a word form to its dictionary form. Must be synchronous and
 * deterministic: detection calls it once per token.
 */
export interface LemmaNormalizer {
  normalize(word: string, languageHint?: string): string;
}

function fold(word: string): string {
  return word.normalize('NFC').toLowerCase();
}

/**
 * Table-driven normalizer over a single form -> lemma table spanning all
 * languages, so the language hint is not consulted.
 * Unknown words come back lowercased.
 */
export class DictionaryLemmaNormalizer implements LemmaNormalizer {
  private readonly forms = new Map<string, string>();

  constructor(table: LemmaTable) {
    for (const [form, lemma] of Object.entries(table)) {
      this.forms.set(fold(form), fold(lemma));
    }
  }

  normalize(word: string): string {
    const key = fold(word);
    return this.forms.get(key) ?? key;
  }
}
