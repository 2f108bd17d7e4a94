import { afterAll, beforeAll, describe, expect, test } from 'vitest';
import { z } from 'zod';
import { buildChars, flatToken, sampleOrderPieces, startTestServer, stopTestServer } from '../helpers';

const errorBodySchema = z.object({
  error: z.object({ message: z.string(), status: z.number(), code: z.string() }),
});

const segmentBodySchema = z.object({
  textLength: z.number(),
  boldWords: z.record(z.array(z.number())),
  segmentation: z.object({
    section: z.object({ text: z.string() }),
    summary: z.object({ text: z.string(), startOffset: z.number(), endOffset: z.number() }),
    containsRiskMarker: z.boolean(),
  }),
});

describe('Analysis routes', () => {
  let baseUrl: string;

  beforeAll(async () => {
    const server = await startTestServer();
    baseUrl = server.baseUrl;
  });

  afterAll(async () => {
    await stopTestServer();
  });

  async function post(path: string, payload: unknown): Promise<{ status: number; body: unknown }> {
    const response = await fetch(`${baseUrl}/api/analysis${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
    });
    const body: unknown = await response.json();
    return { status: response.status, body };
  }

  function errorCode(body: unknown): string {
    return errorBodySchema.parse(body).error.code;
  }

  test('GET /health responds ok with security headers', async () => {
    const response = await fetch(`${baseUrl}/health`);

    expect(response.status).toBe(200);
    expect(response.headers.get('x-content-type-options')).toBe('nosniff');
    expect(await response.json()).toEqual({ status: 'ok' });
  });

  describe('POST /segment', () => {
    test('returns the bold index and the segmentation', async () => {
      const response = await post('/segment', { characters: buildChars(sampleOrderPieces()) });

      expect(response.status).toBe(200);
      const body = segmentBodySchema.parse(response.body);
      expect(body.textLength).toBe(177);
      expect(body.boldWords.respondent).toEqual([29, 135]);
      expect(body.segmentation.section.text).toBe(
        'In the Matter of ACME CORP., Respondent. Section 21C proceedings.',
      );
      expect(body.segmentation.summary).toEqual({
        text: 'Summary ACME restated its results for 2016.',
        startOffset: 91,
        endOffset: 134,
      });
      expect(body.segmentation.containsRiskMarker).toBe(true);
    });

    test('reports a missing section anchor as 422', async () => {
      const characters = buildChars([{ text: 'Plain text only.' }]);
      const { status, body } = await post('/segment', { characters });

      expect(status).toBe(422);
      expect(errorCode(body)).toBe('SEQUENCE_NOT_FOUND');
    });

    test('rejects malformed characters', async () => {
      const { status, body } = await post('/segment', { characters: [{ text: 'a' }] });

      expect(status).toBe(400);
      expect(errorCode(body)).toBe('VALIDATION_ERROR');
    });
  });

  describe('POST /interval', () => {
    test('returns no interval for several years without months', async () => {
      const { status, body } = await post('/interval', {
        tokens: [
          flatToken('restated', 'restate', 'ROOT', 0),
          flatToken('2014', '2014', 'nummod', 0),
          flatToken('and', 'and', 'cc', 0),
          flatToken('2015', '2015', 'nummod', 0),
        ],
      });

      expect(status).toBe(200);
      expect(body).toEqual({
        interval: null,
        resolution: null,
        bounds: { kind: 'bounded', lower: 2013.5, upper: 2015.5 },
        mentionCount: 2,
        acceptedCount: 0,
      });
    });

    test('spans a single year mention', async () => {
      const { status, body } = await post('/interval', {
        tokens: [flatToken('restated', 'restate', 'ROOT', 0), flatToken('2015', '2015', 'nummod', 0)],
      });

      expect(status).toBe(200);
      expect(body).toEqual({
        interval: { yearStart: 2015, monthStart: 1, yearEnd: 2015, monthEnd: 12 },
        resolution: 'year',
        bounds: { kind: 'unbounded' },
        mentionCount: 1,
        acceptedCount: 1,
      });
    });

    test('rejects a token pointing past the list', async () => {
      const { status, body } = await post('/interval', { tokens: [flatToken('a', 'a', 'ROOT', 1)] });

      expect(status).toBe(400);
      expect(errorCode(body)).toBe('VALIDATION_ERROR');
    });
  });

  describe('POST /company', () => {
    test('reads the company from a section', async () => {
      const { status, body } = await post('/company', { section: 'In the Matter of ACME CORP., Respondent.' });

      expect(status).toBe(200);
      expect(body).toEqual({ companyName: 'ACME CORP.', source: 'section' });
    });

    test('prefers recognized entities', async () => {
      const { body } = await post('/company', {
        section: 'In the Matter of ACME CORP., Respondent.',
        entities: [{ text: 'Acme Corp', label: 'ORG' }],
      });

      expect(body).toEqual({ companyName: 'ACME CORP', source: 'entities' });
    });

    test('returns null when no company is named', async () => {
      const { body } = await post('/company', { section: 'In the Matter of JOHN DOE, Respondent.' });

      expect(body).toEqual({ companyName: null, source: null });
    });

    test('requires a section or entities', async () => {
      const { status, body } = await post('/company', {});

      expect(status).toBe(400);
      expect(errorCode(body)).toBe('VALIDATION_ERROR');
    });
  });
});
