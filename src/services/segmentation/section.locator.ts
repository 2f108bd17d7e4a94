/**
 * Header section lookup: the text between the "In the Matter of" heading and
 * the first numbered section ("I.").
 */

import type { BoldSpanIndex } from '../boldSpans';
import { firstOffset } from '../boldSpans';
import { SequenceNotFoundError } from './errors';
import type { AnchorPair, TextSpan } from './segmentation.types';
import { DEFAULT_SECTION_ANCHORS } from './segmentation.types';

export function locateSection(
  fullText: string,
  index: BoldSpanIndex,
  anchors: AnchorPair = DEFAULT_SECTION_ANCHORS,
): TextSpan {
  const start = firstOffset(index, anchors.start);
  if (start === undefined) {
    throw new SequenceNotFoundError(anchors.start);
  }

  const endAnchor = firstOffset(index, anchors.end);
  if (endAnchor === undefined) {
    throw new SequenceNotFoundError(anchors.end);
  }

  const end = endAnchor - 1;
  if (start > end) {
    throw new SequenceNotFoundError(
      anchors.end,
      `Sequence "${anchors.end}" appears before "${anchors.start}" (offset ${endAnchor} < ${start})`,
    );
  }

  return {
    text: fullText.slice(start, end).trim(),
    startOffset: start,
    endOffset: end,
  };
}
