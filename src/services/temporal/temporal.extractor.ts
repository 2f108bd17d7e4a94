/**
 * Year, quarter and month mentions from a dependency-parsed token sequence.
 * Pure tree walks over the parser's graph; no I/O.
 */

import type { ExtractionTables, LiteralMatchMode } from '../../types/extraction';
import type {
  DependencyToken,
  QuarterMention,
  TemporalExtractionOptions,
  TemporalMentions,
} from './temporal.types';
import { DEPENDENCY_RELATIONS, TEMPORAL_CONFIG, TOKEN_SHAPES } from './temporal.types';

const { PREPOSITION_OBJECT, NUMERIC_MODIFIER, ADJECTIVAL_MODIFIER } = DEPENDENCY_RELATIONS;
const FISCAL_MARKERS = new Set<string>(TEMPORAL_CONFIG.FISCAL_MARKERS);

export function isFiscalMarker(word: string, mode: LiteralMatchMode = 'exact'): boolean {
  const lower = word.toLowerCase();
  if (mode === 'legacy-substring') {
    return TEMPORAL_CONFIG.LEGACY_FISCAL_LITERAL.includes(lower);
  }
  return FISCAL_MARKERS.has(lower);
}

function isDecimalYearShape(shape: string): boolean {
  return shape === TOKEN_SHAPES.YEAR_ONE_DECIMAL || shape === TOKEN_SHAPES.YEAR_TWO_DECIMALS;
}

/**
 * Integer year of a year-shaped token. Citation-style tokens such as
 * "2016.2" keep only the part before the period.
 */
export function parseYear(token: DependencyToken): number | undefined {
  if (token.shapeCode === TOKEN_SHAPES.YEAR) {
    return Number.parseInt(token.text, 10);
  }
  if (isDecimalYearShape(token.shapeCode)) {
    return Number.parseInt(token.text.split('.')[0], 10);
  }
  return undefined;
}

function yearFromChild(token: DependencyToken): number | undefined {
  const relation = token.dependencyRelation;
  if (relation !== PREPOSITION_OBJECT && relation !== NUMERIC_MODIFIER) {
    return undefined;
  }
  return parseYear(token);
}

/**
 * Year a "quarter" token belongs to. Years are rarely direct children of the
 * quarter, so grandchildren are searched; under a "year"/"FY" grandchild its
 * own children are searched instead. The last match wins.
 */
export function findYear(
  quarter: DependencyToken,
  mode: LiteralMatchMode = 'exact',
): number | undefined {
  let year: number | undefined;

  for (const child of quarter.children) {
    for (const grandchild of child.children) {
      const lemma = grandchild.lemma.toLowerCase();
      const candidates =
        lemma === TEMPORAL_CONFIG.YEAR_LEMMA || isFiscalMarker(lemma, mode)
          ? grandchild.children
          : [grandchild];

      for (const candidate of candidates) {
        const found = yearFromChild(candidate);
        if (found !== undefined) {
          year = found;
        }
      }
    }
  }

  return year;
}

/**
 * Ordinal and quantity modifying a "quarter" token. An ordinal attached to
 * the quantity ("first two quarters") replaces one attached to the quarter.
 */
export function findQuarters(
  quarter: DependencyToken,
): Pick<QuarterMention, 'locationWord' | 'quantityToken'> {
  let quantityToken: DependencyToken | undefined;
  let locationWord: string | undefined;

  for (const child of quarter.children) {
    if (child.dependencyRelation === NUMERIC_MODIFIER) {
      quantityToken = child;
    } else if (child.dependencyRelation === ADJECTIVAL_MODIFIER) {
      locationWord = child.text;
    }
  }

  if (quantityToken) {
    for (const child of quantityToken.children) {
      if (child.dependencyRelation === ADJECTIVAL_MODIFIER) {
        locationWord = child.text;
      }
    }
  }

  return { locationWord, quantityToken };
}

function isYearMention(
  token: DependencyToken,
  tables: ExtractionTables,
  mode: LiteralMatchMode,
): boolean {
  const { head } = token;
  return (
    (token.dependencyRelation === NUMERIC_MODIFIER &&
      tables.misreportingLemmas.has(head.lemma.toLowerCase())) ||
    isFiscalMarker(head.text, mode) ||
    (head.shapeCode === TOKEN_SHAPES.YEAR && isFiscalMarker(head.head.text, mode)) ||
    token.dependencyRelation === PREPOSITION_OBJECT
  );
}

function pushTo<T>(map: Map<number, T[]>, key: number, value: T): void {
  const existing = map.get(key);
  if (existing) {
    existing.push(value);
  } else {
    map.set(key, [value]);
  }
}

export function collectMentions(
  tokens: Iterable<DependencyToken>,
  tables: ExtractionTables,
  options: TemporalExtractionOptions = {},
): TemporalMentions {
  const mode = options.fiscalMarkerMatch ?? 'exact';
  const mentions: TemporalMentions = {
    years: [],
    quarters: new Map(),
    months: new Map(),
  };

  for (const token of tokens) {
    if (token.shapeCode === TOKEN_SHAPES.YEAR) {
      const value = Number.parseInt(token.text, 10);

      if (isYearMention(token, tables, mode)) {
        mentions.years.push(value);
      }

      // "March 2016": the numeral qualifies the month
      if (token.dependencyRelation === NUMERIC_MODIFIER) {
        const month = tables.monthNames.get(token.head.text.toLowerCase());
        if (month !== undefined) {
          pushTo(mentions.months, value, month);
        }
      }
    } else if (
      isDecimalYearShape(token.shapeCode) &&
      token.dependencyRelation === PREPOSITION_OBJECT
    ) {
      const year = parseYear(token);
      if (year !== undefined) {
        mentions.years.push(year);
      }
    }

    if (token.lemma === TEMPORAL_CONFIG.QUARTER_LEMMA) {
      const year = findYear(token, mode);
      if (year !== undefined) {
        pushTo(mentions.quarters, year, { year, ...findQuarters(token) });
      }
    }
  }

  return mentions;
}
