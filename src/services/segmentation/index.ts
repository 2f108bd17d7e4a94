/**
 * Segmentation module - section and summary spans located from bold anchors.
 */

export { KeyNotFoundError, SequenceNotFoundError } from './errors';
export { locateSection } from './section.locator';
export { containsRiskMarker, segmentDocument } from './segmentation.service';
export type {
  AnchorPair,
  DocumentSegmentation,
  SegmentationOptions,
  SummaryLocation,
  TextSpan,
} from './segmentation.types';
export {
  DEFAULT_SECTION_ANCHORS,
  DEFAULT_SUMMARY_ANCHORS,
  OPEN_END,
  SEGMENTATION_CONFIG,
} from './segmentation.types';
export { findSubstring } from './substring';
export {
  locateSummary,
  nextBoldOffset,
  resolveSummaryEnd,
  resolveSummaryStart,
} from './summary.locator';
