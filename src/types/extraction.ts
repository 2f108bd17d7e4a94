/**
 * Shared extraction types used across segmentation and temporal inference.
 */

/**
 * How "is this one of a few literal forms" checks are evaluated.
 * - `exact`: membership in a small vocabulary.
 * - `legacy-substring`: containment in a fixed literal string, which also
 *   accepts any fragment of that literal (e.g. `"y"` for `"fys"`).
 */
export type LiteralMatchMode = 'exact' | 'legacy-substring';

export interface ExtractionTables {
  /** Month word (lowercase) to month number 1-12 */
  readonly monthNames: ReadonlyMap<string, number>;
  /** Ordinal word (lowercase) to the month representing that quarter */
  readonly quarterToMonth: ReadonlyMap<string, number>;
  /** Verb lemmas whose numeric-modifier years are high-confidence */
  readonly misreportingLemmas: ReadonlySet<string>;
}
