import { describe, expect, test } from 'vitest';
import { buildBoldSpanIndex } from '../../services/boldSpans';
import {
  containsRiskMarker,
  findSubstring,
  KeyNotFoundError,
  segmentDocument,
  SequenceNotFoundError,
} from '../../services/segmentation';
import { bold, buildChars, plain, sampleOrderPieces } from '../helpers';

describe('segmentDocument', () => {
  test('segments a well-formed order', () => {
    const { fullText, index } = buildBoldSpanIndex(buildChars(sampleOrderPieces()));
    const result = segmentDocument(fullText, index);

    expect(result.section.startOffset).toBe(0);
    expect(result.section.endOffset).toBe(65);
    expect(result.summary.text).toBe('Summary ACME restated its results for 2016.');
    expect(result.summaryDegraded).toBe(false);
    expect(result.containsRiskMarker).toBe(true);
    expect(result.warnings).toEqual([]);
  });

  test('raises KeyNotFoundError, not SequenceNotFoundError, for a missing summary', () => {
    const chars = buildChars([
      bold('In'),
      plain(' the Matter of ACME INC.\n'),
      bold('I.'),
      plain(' Findings without a heading.'),
    ]);
    const { fullText, index } = buildBoldSpanIndex(chars);

    expect(() => segmentDocument(fullText, index)).toThrow(KeyNotFoundError);
    expect(() => segmentDocument(fullText, index)).not.toThrow(SequenceNotFoundError);
  });

  test('reports a degraded summary as a warning', () => {
    const chars = buildChars([
      bold('Summary'),
      plain(' misplaced. '),
      bold('In'),
      plain(' the Matter of ACME INC. '),
      bold('I.'),
      plain(' Body'),
    ]);
    const { fullText, index } = buildBoldSpanIndex(chars);
    const result = segmentDocument(fullText, index);

    expect(result.summaryDegraded).toBe(true);
    expect(result.warnings).toHaveLength(1);
    expect(result.containsRiskMarker).toBe(false);
  });
});

describe('containsRiskMarker', () => {
  test('looks for the section 21C reference in any case', () => {
    expect(containsRiskMarker('pursuant to Section 21C of the Exchange Act')).toBe(true);
    expect(containsRiskMarker('pursuant to section 21c')).toBe(true);
    expect(containsRiskMarker('pursuant to Section 8A')).toBe(false);
  });
});

describe('findSubstring', () => {
  test('finds a range case-insensitively', () => {
    expect(findSubstring('In the Matter of ACME CORP., Respondent.', 'in the matter of', 'RESPONDENT')).toEqual([0, 29]);
  });

  test('searches for the end only after the start', () => {
    expect(findSubstring('end start middle end', 'start', 'end')).toEqual([4, 17]);
  });

  test('throws when the start is missing', () => {
    expect(() => findSubstring('no heading', 'In the Matter of', 'Respondent')).toThrow(SequenceNotFoundError);
  });

  test('throws when the end is missing', () => {
    expect(() => findSubstring('In the Matter of ACME', 'In the Matter of', 'Respondent')).toThrow(
      SequenceNotFoundError,
    );
  });
});
