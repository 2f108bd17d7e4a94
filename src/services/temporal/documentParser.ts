/**
 * Interval inference over a span of text: dependency parse, collect
 * mentions, aggregate.
 */

import type { ExtractionTables } from '../../types/extraction';
import { findInterval } from './interval.aggregator';
import { collectMentions } from './temporal.extractor';
import type {
  DependencyToken,
  IntervalResult,
  TemporalExtractionOptions,
} from './temporal.types';

export interface DependencyParser {
  parse(text: string): Promise<DependencyToken[]>;
}

/**
 * Best-guess interval for an already-parsed token sequence.
 * `interval` is null when nothing qualified; check `mentionCount` to tell
 * an empty text from one whose mentions were all filtered out.
 */
export function inferInterval(
  tokens: Iterable<DependencyToken>,
  tables: ExtractionTables,
  options: TemporalExtractionOptions = {},
): IntervalResult {
  return findInterval(collectMentions(tokens, tables, options), tables);
}

export function createDocumentParser(
  parser: DependencyParser,
  tables: ExtractionTables,
  options: TemporalExtractionOptions = {},
) {
  return {
    async parse(text: string): Promise<IntervalResult> {
      const tokens = await parser.parse(text);
      return inferInterval(tokens, tables, options);
    },
  };
}

export type DocumentParser = ReturnType<typeof createDocumentParser>;
