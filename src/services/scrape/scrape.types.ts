import type { CharacterStreamProvider } from '../pdf';
import type { EntityRecognizer } from '../companies';
import type { DocumentQueue } from '../documents';
import type { AnalysisStore } from '../analysisStore';
import type { Filing } from '../filings';
import type { IntervalResult } from '../temporal';
import type { LiteralMatchMode } from '../../types/extraction';

export interface FilingLookup {
  findLatestAnnualReport(companyName: string): Promise<Filing>;
}

export interface IntervalParser {
  parse(text: string): Promise<IntervalResult>;
}

export interface ScrapeDependencies {
  queue: DocumentQueue;
  store: AnalysisStore;
  characters: CharacterStreamProvider;
  download: (url: string) => Promise<Uint8Array>;
  filings: FilingLookup;
  documentParser: IntervalParser;
  recognizer?: EntityRecognizer;
  /** Pause between documents */
  delayMs: number;
  sleep?: (ms: number) => Promise<void>;
  numeralMatch?: LiteralMatchMode;
}

export type ScrapeOutcome =
  | 'stored'
  | 'skipped-not-pdf'
  | 'skipped-no-company'
  | 'sequence-not-found'
  | 'key-not-found'
  | 'filing-not-found'
  | 'store-failed'
  | 'failed';

export type ScrapeSummary = Record<ScrapeOutcome, number> & { total: number };

export const SCRAPE_CONFIG = {
  PDF_EXTENSION: '.pdf',
} as const;
