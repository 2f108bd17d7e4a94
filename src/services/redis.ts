import Redis from 'ioredis';
import { env } from '../config/env';
import { logger } from '../utils/logger';

class RedisService {
  private client: Redis;
  private isConnected = false;

  constructor() {
    this.client = new Redis(env.REDIS_URL, {
      maxRetriesPerRequest: 3,
      enableReadyCheck: true,
      lazyConnect: true,
    });

    this.client.on('connect', () => {
      logger.info('Redis client connected');
      this.isConnected = true;
    });

    this.client.on('error', (error) => {
      logger.error({ error }, 'Redis client error');
      this.isConnected = false;
    });
  }

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async set(key: string, value: string): Promise<boolean> {
    const result = await this.client.set(key, value);
    return result === 'OK';
  }

  async disconnect(): Promise<void> {
    await this.client.quit();
    this.isConnected = false;
    logger.info('Redis connections closed');
  }

  getConnectionStatus(): boolean {
    return this.isConnected;
  }
}

export const redis = new RedisService();
