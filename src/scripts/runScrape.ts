import { closeDatabase } from '../config/database';
import { documentsService } from '../services/documents';
import { redis } from '../services/redis';
import { getScrapeService } from '../services/scrapeService';

// Usage: npm run scrape -- [document-url ...]
const urls = process.argv.slice(2);

async function runScrape() {
  let exitCode = 0;
  try {
    for (const url of urls) {
      await documentsService.enqueue(url);
      console.log(`+ queued ${url}`);
    }

    const summary = await getScrapeService().run();
    console.log(`✓ Processed ${summary.total} document(s), stored ${summary.stored}`);
    if (summary.failed > 0) {
      console.error(`✗ ${summary.failed} document(s) failed`);
      exitCode = 1;
    }
  } catch (error) {
    console.error('Scrape run failed:', error);
    exitCode = 1;
  } finally {
    await closeDatabase();
    await redis.disconnect();
  }
  process.exit(exitCode);
}

void runScrape();
