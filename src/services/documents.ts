import { desc, eq } from 'drizzle-orm';
import { db } from '../config/database';
import { enforcementDocuments } from '../models/schema';
import { logger } from '../utils/logger';

export interface PendingDocument {
  url: string;
  respondents: string | null;
}

/**
 * Queue of enforcement documents waiting to be scraped.
 */
export interface DocumentQueue {
  listPending(): Promise<PendingDocument[]>;
  markScraped(url: string): Promise<void>;
}

export class DocumentsService implements DocumentQueue {
  /**
   * Unscraped documents, most recently added first.
   */
  async listPending(): Promise<PendingDocument[]> {
    return db
      .select({
        url: enforcementDocuments.url,
        respondents: enforcementDocuments.respondents,
      })
      .from(enforcementDocuments)
      .where(eq(enforcementDocuments.scraped, false))
      .orderBy(desc(enforcementDocuments.createdAt));
  }

  async markScraped(url: string): Promise<void> {
    await db
      .update(enforcementDocuments)
      .set({ scraped: true, updatedAt: new Date() })
      .where(eq(enforcementDocuments.url, url));

    logger.debug({ url }, 'Document marked as scraped');
  }

  async enqueue(url: string, respondents: string | null = null): Promise<void> {
    await db
      .insert(enforcementDocuments)
      .values({ url, respondents })
      .onConflictDoNothing({ target: enforcementDocuments.url });
  }
}

export const documentsService = new DocumentsService();
