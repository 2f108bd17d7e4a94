import { describe, expect, test } from 'vitest';
import { buildBoldSpanIndex } from '../../services/boldSpans';
import { isBoldFontName, runsToCharacters } from '../../services/pdf';

describe('isBoldFontName', () => {
  test('detects bold faces by name', () => {
    expect(isBoldFontName('ABCDEF+TimesNewRomanPS-BoldMT')).toBe(true);
    expect(isBoldFontName('Arial,Bold')).toBe(true);
    expect(isBoldFontName('TimesNewRomanPSMT')).toBe(false);
  });
});

describe('runsToCharacters', () => {
  test('expands runs into characters and closes lines with a newline', () => {
    const chars = runsToCharacters(
      [
        { text: 'I.', fontName: 'Times-Bold', endsLine: false },
        { text: ' Facts', fontName: 'Times-Roman', endsLine: true },
      ],
      2,
      100,
    );

    expect(chars.map((char) => char.text).join('')).toBe('I. Facts\n');
    expect(chars[0]).toEqual({ text: 'I', isBold: true, pageIndex: 2, globalOffset: 100 });
    expect(chars[2]).toEqual({ text: ' ', isBold: false, pageIndex: 2, globalOffset: 102 });
    expect(chars.at(-1)).toEqual({ text: '\n', isBold: false, pageIndex: 2, globalOffset: 108 });
  });

  test('feeds the bold-span indexer directly', () => {
    const chars = runsToCharacters(
      [
        { text: 'Summary', fontName: 'ABCDEF+Arial-BoldMT', endsLine: true },
        { text: 'The respondent restated.', fontName: 'ABCDEF+ArialMT', endsLine: true },
      ],
      0,
      0,
    );
    const { fullText, index } = buildBoldSpanIndex(chars);

    expect(fullText).toBe('Summary\nThe respondent restated.\n');
    expect(index.get('summary')).toEqual([0]);
    expect(index.has('respondent')).toBe(false);
  });
});
