/**
 * Types for the filing-search API.
 */

import { z } from 'zod';

export const filingSchema = z
  .object({
    cik: z.string(),
    companyName: z.string(),
    ticker: z.string().default(''),
    formType: z.string().optional(),
    filedAt: z.string().optional(),
  })
  .passthrough();

export const filingSearchResponseSchema = z.object({
  filings: z.array(filingSchema),
});

export type Filing = z.infer<typeof filingSchema>;

export interface FilingQuery {
  query: { query_string: { query: string } };
  from: string;
  size: string;
  sort: Array<Record<string, { order: 'asc' | 'desc' }>>;
}

export const FILING_SEARCH_CONFIG = {
  FORM_TYPE: '10-K',
  FILED_FROM: '1990-12-31',
  FILED_TO: '2021-12-31',
} as const;
