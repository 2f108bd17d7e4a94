/**
 * Types for the bold-span index.
 * A bold span is a run of bold characters, lowercased, anchored at the
 * offset where it starts in the full document text.
 */

import type { LiteralMatchMode } from '../../types/extraction';

export interface PositionedChar {
  /** Glyph text; usually one character, ligatures may carry more */
  text: string;
  isBold: boolean;
  pageIndex: number;
  /** Offset of this glyph in the concatenated document text */
  globalOffset: number;
}

/** Lowercase bold word to its start offsets, in encounter order. */
export type BoldSpanIndex = ReadonlyMap<string, readonly number[]>;

export interface BoldSpanIndexResult {
  fullText: string;
  index: BoldSpanIndex;
}

export interface BoldSpanIndexOptions {
  numeralMatch?: LiteralMatchMode;
}

export const BOLD_SPAN_CONFIG = {
  BREAK_CHARACTERS: `.,0123456789'"`,
  SECTION_NUMERALS: [
    'i', 'ii', 'iii', 'iv', 'v', 'vi', 'vii', 'viii', 'ix', 'x',
    'xi', 'xii', 'xiii', 'xiv', 'xv', 'xvi', 'xvii', 'xviii', 'xix', 'xx',
    'xxi', 'xxii', 'xxiii', 'xxiv', 'xxv', 'xxvi', 'xxvii', 'xxviii', 'xxix', 'xxx',
  ],
  LEGACY_NUMERAL_LITERAL: 'xxiiixxivxxviiixxx',
} as const;
