/**
 * Bold spans module - typographic anchors for document segmentation.
 */

export { buildBoldSpanIndex, firstOffset, isSectionNumeral } from './boldSpan.indexer';
export type {
  BoldSpanIndex,
  BoldSpanIndexOptions,
  BoldSpanIndexResult,
  PositionedChar,
} from './boldSpan.types';
export { BOLD_SPAN_CONFIG } from './boldSpan.types';
