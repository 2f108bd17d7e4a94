/**
 * Respondent company detection.
 *
 * The header names respondents as "In the Matter of ACME CORP., and
 * JOHN DOE, Respondents." Entity-based detection accepts a company only when
 * every corporate organization mentioned looks like the same one.
 */

import { distance as levenshteinDistance } from 'fastest-levenshtein';
import { findSubstring, SequenceNotFoundError } from '../segmentation';
import type { CompanyMatchOptions, NamedEntity } from './company.types';
import { COMPANY_CONFIG } from './company.types';

const CONJUNCTION_PATTERN = /\band\b/;

function cleanName(name: string): string {
  return name.trim().replace(/[,\s]+$/, '');
}

function hasIndicator(name: string, indicators: readonly string[]): boolean {
  const upper = name.toUpperCase();
  return indicators.some((indicator) => upper.includes(indicator));
}

export function companyFromSection(section: string): string | undefined {
  let range: [number, number];
  try {
    range = findSubstring(section, COMPANY_CONFIG.TITLE_PREFIX, COMPANY_CONFIG.TITLE_SUFFIX);
  } catch (error) {
    if (error instanceof SequenceNotFoundError) return undefined;
    throw error;
  }

  const title = section.slice(range[0] + COMPANY_CONFIG.TITLE_PREFIX.length, range[1]).trim();
  if (!hasIndicator(title, COMPANY_CONFIG.SECTION_INDICATORS)) {
    return undefined;
  }

  const parts = title.split(CONJUNCTION_PATTERN);
  if (parts.length === 1) {
    return cleanName(title);
  }

  const company = parts.find((part) => hasIndicator(part, COMPANY_CONFIG.SECTION_INDICATORS));
  return company === undefined ? undefined : cleanName(company);
}

/**
 * Levenshtein similarity in [0, 1].
 */
export function nameSimilarity(a: string, b: string): number {
  const maxLen = Math.max(a.length, b.length);
  return maxLen > 0 ? 1 - levenshteinDistance(a, b) / maxLen : 1.0;
}

function firstWord(name: string): string {
  return name.trim().split(/\s+/)[0] ?? '';
}

/**
 * Uppercased name of the single corporate organization among `entities`.
 * Returns undefined when there is none, or when two of them differ in their
 * first word.
 */
export function companyFromEntities(
  entities: readonly NamedEntity[],
  options: CompanyMatchOptions = {},
): string | undefined {
  const threshold = options.similarityThreshold ?? COMPANY_CONFIG.DEFAULT_SIMILARITY_THRESHOLD;
  let company: string | undefined;

  for (const entity of entities) {
    if (entity.label !== COMPANY_CONFIG.ORGANIZATION_LABEL) continue;
    if (!hasIndicator(entity.text, COMPANY_CONFIG.ENTITY_INDICATORS)) continue;

    const name = entity.text.toUpperCase();
    if (company === undefined) {
      company = name;
      continue;
    }

    if (nameSimilarity(firstWord(company), firstWord(name)) < threshold) {
      return undefined;
    }
  }

  return company;
}
