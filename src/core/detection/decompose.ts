import type { TextSpan } from '../streak/types.js';

/**
 * Text with every character canonically decomposed (NFD), plus a map from
 * positions in the decomposed text back to the original.
 */
export interface DecomposedText {
  readonly text: string;
  toOriginal(start: number, end: number): TextSpan;
}

export function decompose(original: string): DecomposedText {
  const starts: number[] = [];
  const ends: number[] = [];
  let text = '';
  let offset = 0;

  // Per character, so every decomposed unit belongs to exactly one original character
  for (const ch of original) {
    const piece = ch.normalize('NFD');
    for (let k = 0; k < piece.length; k++) {
      starts.push(offset);
      ends.push(offset + ch.length);
    }
    text += piece;
    offset += ch.length;
  }

  return {
    text,
    toOriginal(start: number, end: number): TextSpan {
      const from = starts[start] ?? original.length;
      const to = end > start ? (ends[end - 1] ?? original.length) : from;
      return { start: from, end: to };
    },
  };
}
