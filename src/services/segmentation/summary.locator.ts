/**
 * Narrative summary lookup.
 *
 * Start: the "summary" heading, else the boilerplate sentence that opens the
 * findings. End, in order: the next "respondent" heading, the next
 * "respondents" heading, then whichever bold heading comes next.
 */

import type { BoldSpanIndex } from '../boldSpans';
import { firstOffset } from '../boldSpans';
import { KeyNotFoundError } from './errors';
import type { AnchorPair, SummaryLocation, TextSpan } from './segmentation.types';
import {
  DEFAULT_SUMMARY_ANCHORS,
  OPEN_END,
  SEGMENTATION_CONFIG,
} from './segmentation.types';

export function resolveSummaryStart(
  fullText: string,
  index: BoldSpanIndex,
  anchor: string = DEFAULT_SUMMARY_ANCHORS.start,
): number {
  const offset = firstOffset(index, anchor);
  if (offset !== undefined) return offset;

  const fallback = fullText.toLowerCase().indexOf(SEGMENTATION_CONFIG.SUMMARY_MARKER_PHRASE);
  if (fallback === -1) {
    throw new KeyNotFoundError(anchor);
  }
  return fallback;
}

/**
 * Smallest offset of any bold word strictly after `after`.
 */
export function nextBoldOffset(index: BoldSpanIndex, after: number): number | undefined {
  let best: number | undefined;
  for (const offsets of index.values()) {
    for (const offset of offsets) {
      if (offset > after && (best === undefined || offset < best)) {
        best = offset;
      }
    }
  }
  return best;
}

/**
 * Resolve where the summary ends. Anchor matches stop one character short of
 * the heading; the next-heading fallback stops at the heading itself.
 */
export function resolveSummaryEnd(
  index: BoldSpanIndex,
  start: number,
  anchor: string = DEFAULT_SUMMARY_ANCHORS.end,
): number {
  const candidates = [anchor, `${anchor}${SEGMENTATION_CONFIG.PLURAL_SUFFIX}`];

  for (const candidate of candidates) {
    const next = index.get(candidate.toLowerCase())?.find((offset) => offset > start);
    if (next !== undefined) {
      return next - 1;
    }
  }

  return nextBoldOffset(index, start) ?? OPEN_END;
}

export function sliceSpan(fullText: string, startOffset: number, endOffset: number): TextSpan {
  return {
    text: endOffset === OPEN_END ? fullText.slice(startOffset) : fullText.slice(startOffset, endOffset),
    startOffset,
    endOffset,
  };
}

export function locateSummary(
  fullText: string,
  index: BoldSpanIndex,
  section: TextSpan,
  anchors: AnchorPair = DEFAULT_SUMMARY_ANCHORS,
): SummaryLocation {
  const start = resolveSummaryStart(fullText, index, anchors.start);
  const end = resolveSummaryEnd(index, start, anchors.end);

  if (start < section.startOffset) {
    const afterSection = section.endOffset + 1;
    return {
      span: sliceSpan(fullText, afterSection, OPEN_END),
      degraded: true,
      warning:
        `Summary start (${start}) precedes the section start (${section.startOffset}); ` +
        'returning the document after the section',
    };
  }

  return { span: sliceSpan(fullText, start, end), degraded: false };
}
