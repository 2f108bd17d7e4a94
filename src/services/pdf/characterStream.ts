/**
 * PDF to positioned, font-tagged characters.
 *
 * pdf.js reports text as runs sharing one font; each run is expanded to one
 * character per code point. Boldness comes from the embedded font's name
 * ("ABCDEF+TimesNewRomanPS-BoldMT").
 */

import type { TextItem, TextMarkedContent } from 'pdfjs-dist/types/src/display/api';
import type { PositionedChar } from '../boldSpans';
import { logger } from '../../utils/logger';

export interface CharacterStreamProvider {
  extract(data: Uint8Array): Promise<PositionedChar[]>;
}

export interface TextRun {
  text: string;
  fontName: string;
  /** The run closes a line */
  endsLine: boolean;
}

export function isBoldFontName(fontName: string): boolean {
  return fontName.toLowerCase().includes('bold');
}

/**
 * Expand runs of one page into characters, continuing from `startOffset`.
 */
export function runsToCharacters(
  runs: readonly TextRun[],
  pageIndex: number,
  startOffset: number,
): PositionedChar[] {
  const chars: PositionedChar[] = [];
  let offset = startOffset;

  const push = (text: string, isBold: boolean) => {
    chars.push({ text, isBold, pageIndex, globalOffset: offset });
    offset += text.length;
  };

  for (const run of runs) {
    const isBold = isBoldFontName(run.fontName);
    for (const char of run.text) {
      push(char, isBold);
    }
    if (run.endsLine) {
      push('\n', false);
    }
  }

  return chars;
}

function isTextItem(item: TextItem | TextMarkedContent): item is TextItem {
  return 'str' in item;
}

function hasName(value: unknown): value is { name: string } {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    typeof value.name === 'string'
  );
}

export const pdfCharacterStream: CharacterStreamProvider = {
  async extract(data: Uint8Array): Promise<PositionedChar[]> {
    // Dynamic import because pdfjs-dist is ESM-only and heavy
    const { getDocument } = await import('pdfjs-dist/legacy/build/pdf.mjs');

    const document = await getDocument({
      data,
      useSystemFonts: true,
      disableFontFace: true,
      isEvalSupported: false,
    }).promise;

    const chars: PositionedChar[] = [];
    try {
      for (let pageNumber = 1; pageNumber <= document.numPages; pageNumber++) {
        const page = await document.getPage(pageNumber);
        // Loads the page's fonts into commonObjs so their real names resolve
        await page.getOperatorList();
        const content = await page.getTextContent();

        const runs: TextRun[] = content.items.filter(isTextItem).map((item) => {
          const font: unknown = page.commonObjs.has(item.fontName)
            ? page.commonObjs.get(item.fontName)
            : undefined;
          return {
            text: item.str,
            fontName: hasName(font) ? font.name : item.fontName,
            endsLine: item.hasEOL,
          };
        });

        const last = chars.at(-1);
        const offset = last ? last.globalOffset + last.text.length : 0;
        chars.push(...runsToCharacters(runs, pageNumber - 1, offset));
      }
    } finally {
      await document.destroy();
    }

    logger.debug({ characters: chars.length, pages: document.numPages }, 'PDF characters extracted');
    return chars;
  },
};

export async function downloadPdf(url: string): Promise<Uint8Array> {
  const response = await fetch(url);
  if (!response.ok) {
    throw new Error(`Failed to download ${url}: ${response.status} ${response.statusText}`);
  }
  return new Uint8Array(await response.arrayBuffer());
}
