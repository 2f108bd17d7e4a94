/**
 * Filings module - company lookup against the filing-search API.
 */

export { FilingNotFoundError } from './errors';
export type { Filing, FilingQuery } from './filing.types';
export { FILING_SEARCH_CONFIG } from './filing.types';
export type { FilingSearchClientOptions } from './filingSearch.client';
export { buildLatestAnnualReportQuery, FilingSearchClient } from './filingSearch.client';
