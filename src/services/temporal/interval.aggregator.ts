/**
 * Reduce year/quarter/month mentions to a single best-guess interval.
 *
 * Years outside mean ± 2σ of all year mentions are treated as outliers.
 * Months (and quarters, through their representative month) become
 * timestamps `year + month / 12`; the interval spans the earliest and latest
 * timestamps inside the window.
 */

import type { ExtractionTables } from '../../types/extraction';
import type {
  AcceptanceRange,
  Interval,
  IntervalResult,
  MonthsByYear,
  QuartersByYear,
  TemporalMentions,
} from './temporal.types';
import { TEMPORAL_CONFIG } from './temporal.types';

const MONTHS_PER_YEAR = 12;

/**
 * `mean ± 2σ` over the year mentions. A zero spread deliberately widens
 * to `(mean, mean + 13/12)` instead of an empty window.
 */
export function computeAcceptanceRange(years: readonly number[]): AcceptanceRange {
  if (years.length <= 1) {
    return { kind: 'unbounded' };
  }

  const mean = years.reduce((sum, year) => sum + year, 0) / years.length;
  const variance = years.reduce((sum, year) => sum + (year - mean) ** 2, 0) / years.length;
  const spread = Math.sqrt(variance) * TEMPORAL_CONFIG.OUTLIER_SIGMAS;

  // January through December of the repeated year
  if (spread === 0) {
    return { kind: 'bounded', lower: mean, upper: mean + 13 / MONTHS_PER_YEAR };
  }

  return { kind: 'bounded', lower: mean - spread, upper: mean + spread };
}

export function isWithin(range: AcceptanceRange, value: number): boolean {
  return range.kind === 'unbounded' || (range.lower < value && value < range.upper);
}

/**
 * Copy of `months` with each quarter's representative month added.
 * Quarters without a known ordinal contribute nothing.
 */
export function mergeQuarterMonths(
  months: MonthsByYear,
  quarters: QuartersByYear,
  tables: ExtractionTables,
): MonthsByYear {
  const merged: MonthsByYear = new Map();
  for (const [year, values] of months) {
    merged.set(year, [...values]);
  }

  for (const [year, mentions] of quarters) {
    const values = merged.get(year) ?? [];
    for (const mention of mentions) {
      const month = mention.locationWord
        ? tables.quarterToMonth.get(mention.locationWord.toLowerCase())
        : undefined;
      if (month !== undefined) {
        values.push(month);
      }
    }
    if (values.length > 0) {
      merged.set(year, values);
    }
  }

  return merged;
}

export function toTimestamp(year: number, month: number): number {
  return year + month / MONTHS_PER_YEAR;
}

/**
 * Inverse of `toTimestamp`. December lands on a whole number, so a zero
 * month belongs to the previous year.
 */
export function fromTimestamp(timestamp: number): { year: number; month: number } {
  const year = Math.floor(timestamp);
  const month = Math.round((timestamp - year) * MONTHS_PER_YEAR);
  if (month === 0) {
    return { year: year - 1, month: MONTHS_PER_YEAR };
  }
  return { year, month };
}

export function countMentions(mentions: TemporalMentions): number {
  let count = mentions.years.length;
  for (const values of mentions.quarters.values()) count += values.length;
  for (const values of mentions.months.values()) count += values.length;
  return count;
}

/**
 * Whole-year interval for a lone year mention. Only applies when the window
 * is unbounded; with two or more years and no accepted month the result
 * stays vacuous.
 */
function yearResolutionInterval(
  years: readonly number[],
  bounds: AcceptanceRange,
): { interval: Interval; accepted: number } | null {
  if (bounds.kind !== 'unbounded' || years.length === 0) return null;

  return {
    interval: {
      yearStart: Math.min(...years),
      monthStart: 1,
      yearEnd: Math.max(...years),
      monthEnd: MONTHS_PER_YEAR,
    },
    accepted: years.length,
  };
}

export function findInterval(
  mentions: TemporalMentions,
  tables: ExtractionTables,
): IntervalResult {
  const bounds = computeAcceptanceRange(mentions.years);
  const months = mergeQuarterMonths(mentions.months, mentions.quarters, tables);
  const mentionCount = countMentions(mentions);

  let earliest: number | undefined;
  let latest: number | undefined;
  let acceptedCount = 0;

  for (const [year, values] of months) {
    for (const month of values) {
      const timestamp = toTimestamp(year, month);
      if (!isWithin(bounds, timestamp)) continue;

      acceptedCount++;
      if (earliest === undefined || timestamp < earliest) earliest = timestamp;
      if (latest === undefined || timestamp > latest) latest = timestamp;
    }
  }

  if (earliest !== undefined && latest !== undefined) {
    const start = fromTimestamp(earliest);
    const end = fromTimestamp(latest);
    return {
      interval: {
        yearStart: start.year,
        monthStart: start.month,
        yearEnd: end.year,
        monthEnd: end.month,
      },
      resolution: 'month',
      bounds,
      mentionCount,
      acceptedCount,
    };
  }

  const fallback = yearResolutionInterval(mentions.years, bounds);
  if (fallback) {
    return {
      interval: fallback.interval,
      resolution: 'year',
      bounds,
      mentionCount,
      acceptedCount: fallback.accepted,
    };
  }

  return { interval: null, resolution: null, bounds, mentionCount, acceptedCount: 0 };
}
