import { env } from '../config/env';
import { getExtractionTables } from '../config/extractionTables';
import { analysisStore } from './analysisStore';
import { documentsService } from './documents';
import { FilingSearchClient } from './filings';
import { DependencyParserClient } from './parser';
import { downloadPdf, pdfCharacterStream } from './pdf';
import { createScrapeService } from './scrape';
import type { ScrapeService } from './scrape';
import { createDocumentParser } from './temporal';

let instance: ScrapeService | null = null;

/**
 * Scrape driver wired to the configured database, store and upstream APIs.
 */
export function getScrapeService(): ScrapeService {
  if (!instance) {
    const mode = env.LITERAL_MATCH_MODE;
    instance = createScrapeService({
      queue: documentsService,
      store: analysisStore,
      characters: pdfCharacterStream,
      download: downloadPdf,
      filings: new FilingSearchClient({
        baseUrl: env.FILING_SEARCH_API_URL,
        apiKey: env.FILING_SEARCH_API_KEY,
      }),
      documentParser: createDocumentParser(
        new DependencyParserClient({ url: env.DEPENDENCY_PARSER_URL }),
        getExtractionTables(),
        { fiscalMarkerMatch: mode },
      ),
      delayMs: env.SCRAPE_DELAY_MS,
      numeralMatch: mode,
    });
  }
  return instance;
}
