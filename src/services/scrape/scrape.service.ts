/**
 * Batch driver: pulls pending enforcement documents off the queue, analyzes
 * each one and stores the result. Failures are per document.
 */

import { buildBoldSpanIndex } from '../boldSpans';
import { companyFromEntities, companyFromSection } from '../companies';
import type { PendingDocument } from '../documents';
import type { AnalysisItem } from '../analysisStore';
import { FilingNotFoundError } from '../filings';
import { KeyNotFoundError, segmentDocument, SequenceNotFoundError } from '../segmentation';
import { logger } from '../../utils/logger';
import type { ScrapeDependencies, ScrapeOutcome, ScrapeSummary } from './scrape.types';
import { SCRAPE_CONFIG } from './scrape.types';

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function emptySummary(): ScrapeSummary {
  return {
    total: 0,
    stored: 0,
    'skipped-not-pdf': 0,
    'skipped-no-company': 0,
    'sequence-not-found': 0,
    'key-not-found': 0,
    'filing-not-found': 0,
    'store-failed': 0,
    failed: 0,
  };
}

export function isPdfUrl(url: string): boolean {
  return url.toLowerCase().endsWith(SCRAPE_CONFIG.PDF_EXTENSION);
}

export function createScrapeService(deps: ScrapeDependencies) {
  const sleep = deps.sleep ?? defaultSleep;

  async function resolveCompany(fullText: string, sectionText: string): Promise<string | undefined> {
    if (deps.recognizer) {
      const entities = await deps.recognizer.recognize(fullText);
      const fromEntities = companyFromEntities(entities);
      if (fromEntities) return fromEntities;
    }
    return companyFromSection(sectionText);
  }

  /**
   * Analyze one document. Returns null when no company could be named.
   */
  async function analyzeDocument(url: string): Promise<AnalysisItem | null> {
    const pdf = await deps.download(url);
    const chars = await deps.characters.extract(pdf);
    const { fullText, index } = buildBoldSpanIndex(chars, { numeralMatch: deps.numeralMatch });

    const segmentation = segmentDocument(fullText, index);
    for (const warning of segmentation.warnings) {
      logger.warn({ url }, warning);
    }

    const companyName = await resolveCompany(fullText, segmentation.section.text);
    if (!companyName) {
      return null;
    }

    const filing = await deps.filings.findLatestAnnualReport(companyName);
    const result = await deps.documentParser.parse(segmentation.summary.text);

    return {
      url,
      cik: filing.cik,
      companyName: filing.companyName,
      ticker: filing.ticker,
      section: segmentation.section.text,
      containsRiskMarker: segmentation.containsRiskMarker,
      summaryDegraded: segmentation.summaryDegraded,
      yearStart: result.interval?.yearStart ?? null,
      monthStart: result.interval?.monthStart ?? null,
      yearEnd: result.interval?.yearEnd ?? null,
      monthEnd: result.interval?.monthEnd ?? null,
      intervalResolution: result.resolution,
      mentionCount: result.mentionCount,
      analyzedAt: new Date().toISOString(),
    };
  }

  async function processDocument(document: PendingDocument): Promise<ScrapeOutcome> {
    const { url } = document;
    if (!isPdfUrl(url)) {
      logger.debug({ url }, 'Skipping non-PDF document');
      return 'skipped-not-pdf';
    }

    try {
      const item = await analyzeDocument(url);
      if (!item) {
        logger.info({ url, respondents: document.respondents }, 'No company found in document');
        return 'skipped-no-company';
      }

      if (!(await deps.store.put(item))) {
        logger.warn({ url }, 'Analysis not stored, leaving document pending');
        return 'store-failed';
      }
      await deps.queue.markScraped(url);
      logger.info({ url, cik: item.cik, companyName: item.companyName }, 'Document analyzed');
      return 'stored';
    } catch (error) {
      if (error instanceof SequenceNotFoundError) {
        logger.warn({ url, sequence: error.sequence }, 'Section anchors not found');
        return 'sequence-not-found';
      }
      if (error instanceof KeyNotFoundError) {
        logger.warn({ url, key: error.key }, 'Summary start not found');
        return 'key-not-found';
      }
      if (error instanceof FilingNotFoundError) {
        logger.warn({ url, companyName: error.companyName }, 'No annual report found for company');
        return 'filing-not-found';
      }
      logger.error({ error, url }, 'Failed to analyze document');
      return 'failed';
    }
  }

  async function run(): Promise<ScrapeSummary> {
    const pending = await deps.queue.listPending();
    const summary = emptySummary();

    logger.info({ pending: pending.length }, 'Scrape run started');

    for (const [position, document] of pending.entries()) {
      const outcome = await processDocument(document);
      summary[outcome]++;
      summary.total++;

      if (outcome !== 'skipped-not-pdf' && position < pending.length - 1 && deps.delayMs > 0) {
        await sleep(deps.delayMs);
      }
    }

    logger.info({ summary }, 'Scrape run completed');
    return summary;
  }

  return { analyzeDocument, processDocument, run };
}

export type ScrapeService = ReturnType<typeof createScrapeService>;
