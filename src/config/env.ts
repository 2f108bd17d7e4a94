import { config } from 'dotenv';
import { z } from 'zod';

config();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().default('3000').transform(Number),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  DB_HOST: z.string().default('localhost'),
  DB_PORT: z.string().default('5432').transform(Number),
  DB_USER: z.string().default('aaer'),
  DB_PASSWORD: z.string().default('aaer_dev_pass'),
  DB_NAME: z.string().default('aaer_documents'),
  DB_POOL_MAX: z.string().optional().transform((v) => (v ? Number(v) : undefined)),
  REDIS_URL: z.string().default('redis://localhost:6379'),
  EXTRACTION_TABLES_PATH: z.string().default('data/extraction-tables.json'),
  LITERAL_MATCH_MODE: z.enum(['exact', 'legacy-substring']).default('exact'),
  DEPENDENCY_PARSER_URL: z.string().url().default('http://localhost:8080/parse'),
  FILING_SEARCH_API_URL: z.string().url().default('https://api.sec-api.io'),
  FILING_SEARCH_API_KEY: z.string().default(''),
  SCRAPE_SCHEDULE: z.string().default('0 3 * * *'),
  SCRAPE_DELAY_MS: z.string().default('750').transform(Number),
});

export type Env = z.infer<typeof envSchema>;

function validateEnv() {
  try {
    return envSchema.parse(process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const errors = error.issues.map((err) => `${err.path.join('.')}: ${err.message}`);
      throw new Error(`Environment validation failed:\n${errors.join('\n')}`);
    }
    throw error;
  }
}

export const env = validateEnv();
