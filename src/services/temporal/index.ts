/**
 * Temporal module - fraud-period inference from dependency-parsed text.
 */

export type { DependencyParser, DocumentParser } from './documentParser';
export { createDocumentParser, inferInterval } from './documentParser';
export {
  computeAcceptanceRange,
  countMentions,
  findInterval,
  fromTimestamp,
  isWithin,
  mergeQuarterMonths,
  toTimestamp,
} from './interval.aggregator';
export {
  collectMentions,
  findQuarters,
  findYear,
  isFiscalMarker,
  parseYear,
} from './temporal.extractor';
export type {
  AcceptanceRange,
  DependencyToken,
  Interval,
  IntervalResolution,
  IntervalResult,
  MonthsByYear,
  QuarterMention,
  QuartersByYear,
  TemporalExtractionOptions,
  TemporalMentions,
} from './temporal.types';
export { DEPENDENCY_RELATIONS, TEMPORAL_CONFIG, TOKEN_SHAPES } from './temporal.types';
export type { FlatToken } from './tokenGraph';
export { flatTokenListSchema, flatTokenSchema, linkTokens, shapeOf } from './tokenGraph';
