/**
 * Document segmentation - header section, narrative summary and the risk
 * marker, computed from the full text and its bold-span index.
 */

import type { BoldSpanIndex } from '../boldSpans';
import { locateSection } from './section.locator';
import type { DocumentSegmentation, SegmentationOptions } from './segmentation.types';
import { SEGMENTATION_CONFIG } from './segmentation.types';
import { locateSummary } from './summary.locator';

export function containsRiskMarker(sectionText: string): boolean {
  return sectionText.toLowerCase().includes(SEGMENTATION_CONFIG.RISK_MARKER);
}

/**
 * Throws `SequenceNotFoundError` when the section anchors are missing and
 * `KeyNotFoundError` when no summary start can be resolved. A summary found
 * before the section is returned degraded, with a warning.
 */
export function segmentDocument(
  fullText: string,
  index: BoldSpanIndex,
  options: SegmentationOptions = {},
): DocumentSegmentation {
  const section = locateSection(fullText, index, options.sectionAnchors);
  const summary = locateSummary(fullText, index, section, options.summaryAnchors);

  return {
    section,
    summary: summary.span,
    summaryDegraded: summary.degraded,
    containsRiskMarker: containsRiskMarker(section.text),
    warnings: summary.warning ? [summary.warning] : [],
  };
}
