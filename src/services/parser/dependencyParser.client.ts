/**
 * HTTP client for an external dependency-parsing service.
 *
 * The service answers `POST { text }` with `{ tokens: [{ text, lemma, shape?,
 * dep, head }] }`, heads given as token indices.
 */

import { z } from 'zod';
import { BadGatewayError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import type { DependencyParser, DependencyToken } from '../temporal';
import { flatTokenListSchema, linkTokens } from '../temporal';

const parseResponseSchema = z.object({
  tokens: flatTokenListSchema,
});

export interface DependencyParserClientOptions {
  url: string;
  fetchImpl?: typeof fetch;
}

export class DependencyParserClient implements DependencyParser {
  private url: string;
  private fetchImpl: typeof fetch;

  constructor(options: DependencyParserClientOptions) {
    this.url = options.url;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async parse(text: string): Promise<DependencyToken[]> {
    const response = await this.fetchImpl(this.url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ text }),
    });

    if (!response.ok) {
      logger.error({ status: response.status, url: this.url }, 'Dependency parser request failed');
      throw new BadGatewayError(`Dependency parser responded with ${response.status}`, 'PARSER_FAILED');
    }

    const parsed = parseResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      logger.error({ issues: parsed.error.issues }, 'Dependency parser returned an invalid token list');
      throw new BadGatewayError('Dependency parser returned an invalid token list', 'PARSER_INVALID_RESPONSE');
    }

    return linkTokens(parsed.data.tokens);
  }
}
