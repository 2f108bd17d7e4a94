import { describe, expect, test, vi } from 'vitest';
import { DependencyParserClient } from '../../services/parser';
import { BadGatewayError } from '../../utils/errors';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('DependencyParserClient', () => {
  test('posts the text and links the returned tokens', async () => {
    const fetchImpl = vi.fn(async () =>
      jsonResponse({
        tokens: [
          { text: 'in', lemma: 'in', dep: 'ROOT', head: 0 },
          { text: '2016', lemma: '2016', dep: 'pobj', head: 0 },
        ],
      }),
    );
    const client = new DependencyParserClient({ url: 'http://parser.test/parse', fetchImpl });

    const tokens = await client.parse('in 2016');

    expect(fetchImpl).toHaveBeenCalledWith('http://parser.test/parse', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ text: 'in 2016' }),
    });
    expect(tokens).toHaveLength(2);
    expect(tokens[1]?.head).toBe(tokens[0]);
    expect(tokens[1]?.shapeCode).toBe('dddd');
  });

  test('throws PARSER_FAILED on an error status', async () => {
    const client = new DependencyParserClient({
      url: 'http://parser.test/parse',
      fetchImpl: vi.fn(async () => jsonResponse({ error: 'boom' }, 500)),
    });

    await expect(client.parse('text')).rejects.toMatchObject({ statusCode: 502, code: 'PARSER_FAILED' });
  });

  test('throws PARSER_INVALID_RESPONSE on a malformed token list', async () => {
    const client = new DependencyParserClient({
      url: 'http://parser.test/parse',
      fetchImpl: vi.fn(async () => jsonResponse({ tokens: [{ text: 'a', lemma: 'a', dep: 'ROOT', head: 4 }] })),
    });

    await expect(client.parse('text')).rejects.toBeInstanceOf(BadGatewayError);
    await expect(client.parse('text')).rejects.toMatchObject({ code: 'PARSER_INVALID_RESPONSE' });
  });
});
