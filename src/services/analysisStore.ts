import { z } from 'zod';
import { logger } from '../utils/logger';
import { redis } from './redis';

export const analysisItemSchema = z.object({
  url: z.string(),
  cik: z.string(),
  companyName: z.string(),
  ticker: z.string(),
  section: z.string(),
  containsRiskMarker: z.boolean(),
  summaryDegraded: z.boolean(),
  yearStart: z.number().int().nullable(),
  monthStart: z.number().int().nullable(),
  yearEnd: z.number().int().nullable(),
  monthEnd: z.number().int().nullable(),
  intervalResolution: z.enum(['month', 'year']).nullable(),
  mentionCount: z.number().int(),
  analyzedAt: z.string(),
});

export type AnalysisItem = z.infer<typeof analysisItemSchema>;

/**
 * Key-value store of per-document analysis results, keyed by source URL.
 */
export interface AnalysisStore {
  put(item: AnalysisItem): Promise<boolean>;
  get(url: string): Promise<AnalysisItem | null>;
}

class AnalysisStoreService implements AnalysisStore {
  private itemKey(url: string): string {
    return `analysis:item:${url}`;
  }

  async put(item: AnalysisItem): Promise<boolean> {
    const stored = await redis.set(this.itemKey(item.url), JSON.stringify(item));
    if (!stored) {
      logger.warn({ url: item.url }, 'Analysis item was not acknowledged by the store');
    }
    return stored;
  }

  async get(url: string): Promise<AnalysisItem | null> {
    const raw = await redis.get(this.itemKey(url));
    if (!raw) return null;

    let value: unknown;
    try {
      value = JSON.parse(raw);
    } catch (error) {
      logger.error({ error, url }, 'Stored analysis item is not valid JSON');
      return null;
    }

    const parsed = analysisItemSchema.safeParse(value);
    if (!parsed.success) {
      logger.error({ url, issues: parsed.error.issues }, 'Stored analysis item is malformed');
      return null;
    }
    return parsed.data;
  }
}

export const analysisStore = new AnalysisStoreService();
