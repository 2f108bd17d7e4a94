import { readFileSync } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { ExtractionTables } from '../types/extraction';
import { env } from './env';

const monthNumber = z.number().int().min(1).max(12);

const tablesSchema = z.object({
  monthNames: z.record(z.string(), monthNumber),
  quarterToMonth: z.record(z.string(), monthNumber),
  misreportingLemmas: z.array(z.string().min(1)),
});

function lowercaseKeys(record: Record<string, number>): Map<string, number> {
  return new Map(Object.entries(record).map(([key, value]): [string, number] => [key.toLowerCase(), value]));
}

/**
 * Validate raw table data and freeze it into lookup structures.
 */
export function buildExtractionTables(raw: unknown): ExtractionTables {
  const parsed = tablesSchema.parse(raw);
  return Object.freeze({
    monthNames: lowercaseKeys(parsed.monthNames),
    quarterToMonth: lowercaseKeys(parsed.quarterToMonth),
    misreportingLemmas: new Set(parsed.misreportingLemmas.map((lemma) => lemma.toLowerCase())),
  });
}

export function loadExtractionTables(filePath: string): ExtractionTables {
  const resolved = path.resolve(process.cwd(), filePath);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(resolved, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to read extraction tables from ${resolved}: ${reason}`);
  }

  try {
    return buildExtractionTables(raw);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new Error(`Extraction tables validation failed:\n${issues.join('\n')}`);
    }
    throw error;
  }
}

let cached: ExtractionTables | null = null;

/**
 * Process-wide tables, read once from `EXTRACTION_TABLES_PATH`.
 */
export function getExtractionTables(): ExtractionTables {
  if (!cached) {
    cached = loadExtractionTables(env.EXTRACTION_TABLES_PATH);
  }
  return cached;
}
