import { env } from './config/env';
import { createApp } from './app';
import { closeDatabase, testConnection } from './config/database';
import { startScrapeJob } from './jobs/scrapeDocuments';
import { redis } from './services/redis';
import { logger } from './utils/logger';

const app = createApp();
const scrapeJob = startScrapeJob();

const server = app.listen(env.PORT, '0.0.0.0', () => {
  logger.info(`Server running on port ${env.PORT} in ${env.NODE_ENV} mode`);
  void testConnection();
});

function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down gracefully`);
  scrapeJob.stop();
  server.close(() => {
    Promise.all([closeDatabase(), redis.disconnect()])
      .catch((error: unknown) => logger.error({ error }, 'Error while closing connections'))
      .finally(() => {
        logger.info('Server closed');
        process.exit(0);
      });
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
