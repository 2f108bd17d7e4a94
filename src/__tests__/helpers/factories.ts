import type { PositionedChar } from '../../services/boldSpans';
import type { FlatToken } from '../../services/temporal';

export interface TextPiece {
  text: string;
  bold?: boolean;
  page?: number;
}

/**
 * One PositionedChar per character, offsets continuing across pieces.
 */
export function buildChars(pieces: readonly TextPiece[]): PositionedChar[] {
  const chars: PositionedChar[] = [];
  let offset = 0;
  for (const piece of pieces) {
    for (const text of piece.text) {
      chars.push({ text, isBold: piece.bold ?? false, pageIndex: piece.page ?? 0, globalOffset: offset });
      offset += text.length;
    }
  }
  return chars;
}

export const bold = (text: string, page = 0): TextPiece => ({ text, bold: true, page });
export const plain = (text: string, page = 0): TextPiece => ({ text, bold: false, page });

export function flatToken(
  text: string,
  lemma: string,
  dep: string,
  head: number,
): FlatToken {
  return { text, lemma, dep, head };
}

/**
 * A small enforcement order:
 *
 *   In the Matter of ACME CORP., Respondent.
 *   I. ...
 *   Summary ... Respondent ...
 */
export function sampleOrderPieces(): TextPiece[] {
  return [
    bold('In the Matter of'),
    plain(' ACME CORP., '),
    bold('Respondent'),
    plain('. Section 21C proceedings.\n'),
    bold('I.'),
    plain(' The Commission finds.\n'),
    bold('Summary'),
    plain(' ACME restated its results for 2016.\n'),
    bold('Respondent'),
    plain(' ACME is a Delaware corporation.'),
  ];
}
