/**
 * PatternCompiler: turns a canonical word into evasion-resistant pattern rules
 * and compiles pattern sources into cached matchers.
 *
 * Variant families:
 * - TRANSLITERATION  each character or its cross-script spelling (t|т)
 * - LOOKALIKE        each letter as a class of confusable characters
 * - SPACED           up to `maxSeparatorWidth` separators between letters
 * - ZERO_WIDTH       invisible formatting characters between letters
 * - DIACRITIC        combining marks after each base letter (decomposed input)
 * - MULTIMODAL       all of the above in one pattern (decomposed input)
 */

import { PatternCompileFault, ValidationError } from '../errors.js';
import type { CharTable } from '../../infra/config/tables.js';
import { LruCache } from './LruCache.js';
import type { VariantKind, VariantRule } from './types.js';

/** Invisible format characters commonly used to split words */
const INVISIBLE =
  '\\u00AD\\u034F\\u061C\\u115F\\u1160\\u17B4\\u17B5\\u180E\\u200B-\\u200F\\u202A-\\u202E\\u2060-\\u2064\\u206A-\\u206F\\uFEFF';

const BOUNDARY_BEFORE = '(?<![\\p{L}\\p{N}\\p{M}])';
const BOUNDARY_AFTER = '(?![\\p{L}\\p{N}\\p{M}])';
const MARKS = /\p{M}/gu;

/** Variants whose sources are written against NFD-decomposed text */
export const DECOMPOSED_VARIANTS: ReadonlySet<VariantKind> = new Set<VariantKind>(['DIACRITIC', 'MULTIMODAL']);

export interface MatchSpan {
  start: number;
  end: number;
  fragment: string;
}

export interface Matcher {
  readonly source: string;
  /** Non-empty, non-overlapping matches, left to right */
  findAll(text: string): MatchSpan[];
}

export interface PatternCompilerOptions {
  confusables?: CharTable;
  transliteration?: CharTable;
  minVariantLength?: number;
  maxSeparatorWidth?: number;
  cacheSize?: number;
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function escapeClassChar(value: string): string {
  return value.replace(/[\\\]\[^-]/g, '\\$&');
}

function stripMarks(value: string): string {
  return value.normalize('NFD').replace(MARKS, '');
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}

class RegexMatcher implements Matcher {
  constructor(
    readonly source: string,
    private readonly regex: RegExp,
  ) {}

  findAll(text: string): MatchSpan[] {
    // Own copy, so lastIndex is never shared between callers
    const re = new RegExp(this.regex);
    const spans: MatchSpan[] = [];
    let match: RegExpExecArray | null;
    while ((match = re.exec(text)) !== null) {
      const fragment = match[0];
      if (fragment.length === 0) {
        re.lastIndex += 1;
        continue;
      }
      spans.push({ start: match.index, end: match.index + fragment.length, fragment });
    }
    return spans;
  }
}

export class PatternCompiler {
  private readonly confusables: CharTable;
  private readonly transliteration: CharTable;
  private readonly minVariantLength: number;
  private readonly separatorWidth: number;
  private readonly cache: LruCache<Matcher>;

  constructor(options: PatternCompilerOptions = {}) {
    this.confusables = options.confusables ?? {};
    this.transliteration = options.transliteration ?? {};
    this.minVariantLength = options.minVariantLength ?? 3;
    this.separatorWidth = options.maxSeparatorWidth ?? 2;
    this.cache = new LruCache<Matcher>({ maxSize: options.cacheSize ?? 512 });
  }

  /**
   * Deterministic variant set of a canonical word; the same word always
   * yields the same names and sources.
   */
  generateVariants(word: string): VariantRule[] {
    const canonical = word.normalize('NFC').trim().toLowerCase();
    const chars = Array.from(canonical);
    if (chars.length < this.minVariantLength) return [];

    const sources: Array<[VariantKind, string | null]> = [
      ['TRANSLITERATION', this.transliterationSource(chars)],
      ['LOOKALIKE', this.lookalikeSource(chars)],
      ['SPACED', chars.map(escapeRegExp).join(`[^\\p{L}\\p{N}]{0,${this.separatorWidth}}`)],
      ['ZERO_WIDTH', chars.map(escapeRegExp).join(`[${INVISIBLE}]*`)],
      ['DIACRITIC', chars.map((c) => `${alternation([stripMarks(c) || c])}\\p{M}*`).join('')],
      ['MULTIMODAL', this.multimodalSource(chars)],
    ];

    const variants: VariantRule[] = [];
    const names = new Set<string>();
    for (const [variant, pattern] of sources) {
      if (pattern === null) continue;
      const name = `${canonical}_${variant.toLowerCase()}`;
      if (names.has(name)) {
        throw new ValidationError(`Duplicate variant name "${name}"`);
      }
      names.add(name);
      variants.push({ name, pattern, variant });
    }
    return variants;
  }

  /**
   * Compile a pattern source, wrapped in letter/number boundaries, with
   * flags `giu`. Matchers are cached by source.
   */
  compile(source: string): Matcher {
    const cached = this.cache.get(source);
    if (cached) return cached;

    let regex: RegExp;
    try {
      regex = new RegExp(`${BOUNDARY_BEFORE}(?:${source})${BOUNDARY_AFTER}`, 'giu');
    } catch (error) {
      throw new PatternCompileFault(source, error);
    }
    const matcher = new RegexMatcher(source, regex);
    this.cache.set(source, matcher);
    return matcher;
  }

  private transliterationSource(chars: string[]): string | null {
    if (!chars.some((c) => (this.transliteration[c]?.length ?? 0) > 0)) return null;
    return chars.map((c) => alternation([c, ...(this.transliteration[c] ?? [])])).join('');
  }

  private lookalikeSource(chars: string[]): string | null {
    if (!chars.some((c) => (this.confusables[c]?.length ?? 0) > 0)) return null;
    return chars.map((c) => alternation([c, ...(this.confusables[c] ?? [])])).join('');
  }

  private multimodalSource(chars: string[]): string {
    const separator = `[${INVISIBLE}]*(?:[^\\p{L}\\p{N}][${INVISIBLE}]*){0,${this.separatorWidth}}`;
    return chars
      .map((c) => {
        const forms = [c, ...(this.confusables[c] ?? []), ...(this.transliteration[c] ?? [])];
        const bases = forms.map((form) => stripMarks(form) || form);
        return `${alternation(bases)}\\p{M}*`;
      })
      .join(separator);
  }
}

/**
 * One position of a pattern: a single escaped character, a character class,
 * or a non-capturing group when multi-character or empty spellings exist.
 */
function alternation(forms: string[]): string {
  const options = unique(forms);
  const singles = options.filter((f) => Array.from(f).length === 1);
  const longer = options
    .filter((f) => Array.from(f).length > 1)
    .sort((a, b) => b.length - a.length);
  const optional = options.includes('');

  const head =
    singles.length === 0
      ? null
      : singles.length === 1
        ? escapeRegExp(singles[0] ?? '')
        : `[${singles.map(escapeClassChar).join('')}]`;

  if (longer.length === 0 && !optional && head !== null) return head;

  const parts = [...longer.map(escapeRegExp), ...(head !== null ? [head] : [])];
  if (optional) parts.push('');
  return `(?:${parts.join('|')})`;
}
