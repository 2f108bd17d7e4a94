import cron, { type ScheduledTask } from 'node-cron';
import { env } from '../config/env';
import { getScrapeService } from '../services/scrapeService';
import { logger } from '../utils/logger';

let running = false;

export function startScrapeJob(): ScheduledTask {
  const task = cron.schedule(env.SCRAPE_SCHEDULE, async () => {
    if (running) {
      logger.warn('Previous scrape run still in progress, skipping');
      return;
    }

    running = true;
    try {
      await getScrapeService().run();
    } catch (error) {
      logger.error({ error }, 'Scrape job failed');
    } finally {
      running = false;
    }
  });

  logger.info({ schedule: env.SCRAPE_SCHEDULE }, 'Scrape job scheduled');
  return task;
}
