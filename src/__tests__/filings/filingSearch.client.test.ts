import { describe, expect, test, vi } from 'vitest';
import { buildLatestAnnualReportQuery, FilingNotFoundError, FilingSearchClient } from '../../services/filings';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('buildLatestAnnualReportQuery', () => {
  test('asks for the newest 10-K in the filing window', () => {
    expect(buildLatestAnnualReportQuery('ACME CORP')).toEqual({
      query: {
        query_string: {
          query: 'companyName:"ACME CORP" AND filedAt:{1990-12-31 TO 2021-12-31} AND formType:"10-K"',
        },
      },
      from: '0',
      size: '1',
      sort: [{ filedAt: { order: 'desc' } }],
    });
  });

  test('escapes quotes in the company name', () => {
    const { query } = buildLatestAnnualReportQuery('THE "BEST" INC');
    expect(query.query_string.query.startsWith('companyName:"THE \\"BEST\\" INC" AND')).toBe(true);
  });
});

describe('FilingSearchClient', () => {
  test('sends the API key and returns the first filing', async () => {
    const fetchImpl = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
      jsonResponse({ total: { value: 1 }, filings: [{ cik: '123456', companyName: 'ACME CORP', ticker: 'ACME' }] }),
    );
    const client = new FilingSearchClient({ baseUrl: 'http://search.test', apiKey: 'test-secret', fetchImpl });

    const filing = await client.findLatestAnnualReport('ACME CORP');

    expect(filing.cik).toBe('123456');
    expect(filing.ticker).toBe('ACME');
    const init = fetchImpl.mock.calls[0]?.[1];
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({ 'Content-Type': 'application/json', Authorization: 'test-secret' });
  });

  test('defaults a missing ticker to an empty string', async () => {
    const client = new FilingSearchClient({
      baseUrl: 'http://search.test',
      apiKey: 'test-secret',
      fetchImpl: vi.fn(async () => jsonResponse({ filings: [{ cik: '7', companyName: 'GLOBEX INC' }] })),
    });

    expect((await client.findLatestAnnualReport('GLOBEX INC')).ticker).toBe('');
  });

  test('throws FilingNotFoundError when nothing matches', async () => {
    const client = new FilingSearchClient({
      baseUrl: 'http://search.test',
      apiKey: 'test-secret',
      fetchImpl: vi.fn(async () => jsonResponse({ filings: [] })),
    });

    await expect(client.findLatestAnnualReport('NOBODY LLC')).rejects.toBeInstanceOf(FilingNotFoundError);
  });

  test('maps upstream failures to a bad gateway error', async () => {
    const client = new FilingSearchClient({
      baseUrl: 'http://search.test',
      apiKey: 'test-secret',
      fetchImpl: vi.fn(async () => jsonResponse({}, 503)),
    });

    await expect(client.search(buildLatestAnnualReportQuery('ACME'))).rejects.toMatchObject({
      statusCode: 502,
      code: 'FILING_SEARCH_FAILED',
    });
  });
});
