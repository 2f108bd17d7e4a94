/**
 * Types for temporal inference over dependency-parsed text.
 */

import type { LiteralMatchMode } from '../../types/extraction';

/**
 * A node of a dependency parse owned by an external parser.
 * Read-only; a root token is its own head.
 */
export interface DependencyToken {
  readonly text: string;
  readonly lemma: string;
  /** Character-class signature, e.g. "dddd" or "Xxxxx" */
  readonly shapeCode: string;
  /** Dependency label relative to `head`, e.g. "pobj" */
  readonly dependencyRelation: string;
  readonly head: DependencyToken;
  readonly children: readonly DependencyToken[];
}

export interface QuarterMention {
  year: number;
  /** Ordinal naming the quarter ("first", "last", ...) */
  locationWord?: string;
  /** Numeric modifier of the quarter, if any */
  quantityToken?: DependencyToken;
}

export type MonthsByYear = Map<number, number[]>;
export type QuartersByYear = Map<number, QuarterMention[]>;

export interface TemporalMentions {
  years: number[];
  quarters: QuartersByYear;
  months: MonthsByYear;
}

export interface TemporalExtractionOptions {
  fiscalMarkerMatch?: LiteralMatchMode;
}

export interface Interval {
  yearStart: number;
  monthStart: number;
  yearEnd: number;
  monthEnd: number;
}

export type AcceptanceRange =
  | { kind: 'unbounded' }
  | { kind: 'bounded'; lower: number; upper: number };

/** `month` when built from month timestamps, `year` when only years qualified */
export type IntervalResolution = 'month' | 'year';

export interface IntervalResult {
  /** `null` when no mention qualified */
  interval: Interval | null;
  resolution: IntervalResolution | null;
  bounds: AcceptanceRange;
  /** Years, quarters and months found before filtering */
  mentionCount: number;
  /** Timestamps (or years, at year resolution) inside the bounds */
  acceptedCount: number;
}

export const TOKEN_SHAPES = {
  YEAR: 'dddd',
  YEAR_ONE_DECIMAL: 'dddd.d',
  YEAR_TWO_DECIMALS: 'dddd.dd',
} as const;

export const DEPENDENCY_RELATIONS = {
  PREPOSITION_OBJECT: 'pobj',
  NUMERIC_MODIFIER: 'nummod',
  ADJECTIVAL_MODIFIER: 'amod',
} as const;

export const TEMPORAL_CONFIG = {
  QUARTER_LEMMA: 'quarter',
  YEAR_LEMMA: 'year',
  FISCAL_MARKERS: ['fy', 'fys'],
  LEGACY_FISCAL_LITERAL: 'fys',
  OUTLIER_SIGMAS: 2,
} as const;
