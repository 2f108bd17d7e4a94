/**
 * Pure functions for building the bold-span index from a character stream.
 * No side effects, no I/O - a single forward pass over the characters.
 */

import type { LiteralMatchMode } from '../../types/extraction';
import type {
  BoldSpanIndex,
  BoldSpanIndexOptions,
  BoldSpanIndexResult,
  PositionedChar,
} from './boldSpan.types';
import { BOLD_SPAN_CONFIG } from './boldSpan.types';

const BREAK_CHARACTERS = new Set(BOLD_SPAN_CONFIG.BREAK_CHARACTERS);
const SECTION_NUMERALS = new Set<string>(BOLD_SPAN_CONFIG.SECTION_NUMERALS);

function isWhitespace(text: string): boolean {
  return text.trim().length === 0;
}

function isBreakCharacter(text: string): boolean {
  return isWhitespace(text) || (text.length === 1 && BREAK_CHARACTERS.has(text));
}

/**
 * Section headers are numbered "I.", "II.", ... and the period is a break
 * character, so it is put back on numeral words before indexing.
 */
export function isSectionNumeral(word: string, mode: LiteralMatchMode = 'exact'): boolean {
  if (mode === 'legacy-substring') {
    return BOLD_SPAN_CONFIG.LEGACY_NUMERAL_LITERAL.includes(word);
  }
  return SECTION_NUMERALS.has(word);
}

/**
 * Build the bold-span index and the concatenated document text.
 *
 * The cursor always points just past the last character that could not be
 * part of a bold word, so a flushed word is recorded where it started.
 * A word still open when the page changes is dropped and the cursor moves
 * to the first character of the new page.
 */
export function buildBoldSpanIndex(
  chars: Iterable<PositionedChar>,
  options: BoldSpanIndexOptions = {},
): BoldSpanIndexResult {
  const numeralMatch = options.numeralMatch ?? 'exact';
  const index = new Map<string, number[]>();

  let fullText = '';
  let boldWord = '';
  let cursor = 0;
  let currentPage: number | null = null;

  const flush = () => {
    if (boldWord.length === 0) return;

    const key = isSectionNumeral(boldWord, numeralMatch) ? `${boldWord}.` : boldWord;
    const offsets = index.get(key);
    if (offsets) {
      offsets.push(cursor);
    } else {
      index.set(key, [cursor]);
    }
    boldWord = '';
  };

  for (const char of chars) {
    if (char.pageIndex !== currentPage) {
      boldWord = '';
      cursor = fullText.length;
      currentPage = char.pageIndex;
    }

    const offset = fullText.length;
    fullText += char.text;
    const next = offset + char.text.length;

    if (char.isBold && !isBreakCharacter(char.text)) {
      boldWord += char.text.toLowerCase();
      continue;
    }

    // Bold break characters, any whitespace and ordinary body text all end
    // the current bold word.
    flush();
    cursor = next;
  }

  for (const offsets of index.values()) {
    Object.freeze(offsets);
  }

  return { fullText, index };
}

/**
 * First recorded offset of a bold word, if it was seen at all.
 */
export function firstOffset(index: BoldSpanIndex, word: string): number | undefined {
  return index.get(word.toLowerCase())?.[0];
}
