export type { ScrapeService } from './scrape.service';
export { createScrapeService, isPdfUrl } from './scrape.service';
export type {
  FilingLookup,
  IntervalParser,
  ScrapeDependencies,
  ScrapeOutcome,
  ScrapeSummary,
} from './scrape.types';
export { SCRAPE_CONFIG } from './scrape.types';
