import { boolean, index, pgTable, text, timestamp, uuid } from 'drizzle-orm/pg-core';

export const enforcementDocuments = pgTable('enforcement_documents', {
  id: uuid('id').defaultRandom().primaryKey(),
  url: text('url').notNull().unique(),
  respondents: text('respondents'),
  scraped: boolean('scraped').default(false).notNull(),
  createdAt: timestamp('created_at').defaultNow().notNull(),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
}, (table) => ({
  scrapedIdx: index('enforcement_documents_scraped_idx').on(table.scraped),
}));

export type EnforcementDocument = typeof enforcementDocuments.$inferSelect;
export type NewEnforcementDocument = typeof enforcementDocuments.$inferInsert;
