/**
 * Types for respondent company detection.
 */

export interface NamedEntity {
  text: string;
  /** Entity label from the recognizer, e.g. "ORG" */
  label: string;
}

export interface EntityRecognizer {
  recognize(text: string): Promise<NamedEntity[]>;
}

export interface CompanyMatchOptions {
  /** Minimum first-word similarity (0-1) for two mentions to be one company */
  similarityThreshold?: number;
}

export const COMPANY_CONFIG = {
  TITLE_PREFIX: 'In the Matter of',
  TITLE_SUFFIX: 'Respondent',
  SECTION_INDICATORS: ['LLP', 'LLC', 'CORP', 'INC'],
  ENTITY_INDICATORS: [' LTD', ' LLC', ' CORP', ' INC', ' LIMITED', ' INTERNATIONAL', ' CO.'],
  ORGANIZATION_LABEL: 'ORG',
  DEFAULT_SIMILARITY_THRESHOLD: 0.9,
} as const;
