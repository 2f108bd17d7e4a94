/**
 * Types for structural segmentation of enforcement documents.
 * Spans are half-open offset ranges into the full document text.
 */

/** `endOffset` sentinel meaning "through the end of the document". */
export const OPEN_END = -1;

export interface TextSpan {
  text: string;
  startOffset: number;
  /** Exclusive end, or `OPEN_END` */
  endOffset: number;
}

export interface AnchorPair {
  start: string;
  end: string;
}

export interface SummaryLocation {
  span: TextSpan;
  /** The summary anchors resolved before the section; span is a best effort */
  degraded: boolean;
  warning?: string;
}

export interface SegmentationOptions {
  sectionAnchors?: AnchorPair;
  summaryAnchors?: AnchorPair;
}

export interface DocumentSegmentation {
  section: TextSpan;
  summary: TextSpan;
  summaryDegraded: boolean;
  containsRiskMarker: boolean;
  warnings: string[];
}

export const DEFAULT_SECTION_ANCHORS: AnchorPair = { start: 'in', end: 'i.' };
export const DEFAULT_SUMMARY_ANCHORS: AnchorPair = { start: 'summary', end: 'respondent' };

export const SEGMENTATION_CONFIG = {
  SUMMARY_MARKER_PHRASE: 'on the basis of this order and',
  RISK_MARKER: '21c',
  PLURAL_SUFFIX: 's',
} as const;
