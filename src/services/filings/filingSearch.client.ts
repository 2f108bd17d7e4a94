/**
 * Client for the full-text filing-search API. Looks up the most recent
 * annual report of a company to resolve its CIK and ticker.
 */

import { BadGatewayError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { FilingNotFoundError } from './errors';
import type { Filing, FilingQuery } from './filing.types';
import { FILING_SEARCH_CONFIG, filingSearchResponseSchema } from './filing.types';

export interface FilingSearchClientOptions {
  baseUrl: string;
  apiKey: string;
  fetchImpl?: typeof fetch;
}

export function buildLatestAnnualReportQuery(companyName: string): FilingQuery {
  const { FORM_TYPE, FILED_FROM, FILED_TO } = FILING_SEARCH_CONFIG;
  const escaped = companyName.replace(/"/g, '\\"');
  return {
    query: {
      query_string: {
        query:
          `companyName:"${escaped}" AND ` +
          `filedAt:{${FILED_FROM} TO ${FILED_TO}} AND formType:"${FORM_TYPE}"`,
      },
    },
    from: '0',
    size: '1',
    sort: [{ filedAt: { order: 'desc' } }],
  };
}

export class FilingSearchClient {
  private baseUrl: string;
  private apiKey: string;
  private fetchImpl: typeof fetch;

  constructor(options: FilingSearchClientOptions) {
    this.baseUrl = options.baseUrl;
    this.apiKey = options.apiKey;
    this.fetchImpl = options.fetchImpl ?? fetch;

    if (!this.apiKey) {
      logger.warn('Filing search API key not configured. Requests will be unauthenticated.');
    }
  }

  async search(query: FilingQuery): Promise<Filing[]> {
    const response = await this.fetchImpl(this.baseUrl, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: this.apiKey,
      },
      body: JSON.stringify(query),
    });

    if (!response.ok) {
      logger.error({ status: response.status }, 'Filing search request failed');
      throw new BadGatewayError(`Filing search responded with ${response.status}`, 'FILING_SEARCH_FAILED');
    }

    const parsed = filingSearchResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      logger.error({ issues: parsed.error.issues }, 'Filing search returned an unexpected payload');
      throw new BadGatewayError('Filing search returned an unexpected payload', 'FILING_SEARCH_INVALID_RESPONSE');
    }

    return parsed.data.filings;
  }

  /**
   * Most recent 10-K of `companyName`; throws `FilingNotFoundError` if none.
   */
  async findLatestAnnualReport(companyName: string): Promise<Filing> {
    const [filing] = await this.search(buildLatestAnnualReportQuery(companyName));
    if (!filing) {
      throw new FilingNotFoundError(companyName);
    }
    return filing;
  }
}
