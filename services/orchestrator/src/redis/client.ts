/**
 * Redis Client for Orchestrator Service
 * Conversation history, embedding cache and daily statistics
 */

import { Redis } from 'ioredis';
import { createLogger } from '../utils/logger.js';

const log = createLogger('Redis');

const REDIS_HOST = process.env['REDIS_HOST'] || 'localhost';
const REDIS_PORT = parseInt(process.env['REDIS_PORT'] || '6380', 10);
const REDIS_PASSWORD = process.env['REDIS_PASSWORD'] || undefined;

class RedisClient {
  public client: Redis;

  constructor() {
    this.client = new Redis({
      host: REDIS_HOST,
      port: REDIS_PORT,
      ...(REDIS_PASSWORD && { password: REDIS_PASSWORD }),
      lazyConnect: true,
      retryStrategy: (times: number) => {
        const delay = Math.min(times * 50, 2000);
        log.warn(`Retrying connection... (${times})`);
        return delay;
      },
      maxRetriesPerRequest: 3,
    });

    this.client.on('connect', () => {
      log.info('Connected to Redis');
    });

    this.client.on('error', (err: Error) => {
      log.error('Redis client error', { error: err.message });
    });

    this.client.on('close', () => {
      log.info('Redis connection closed');
    });
  }

  async connect(): Promise<void> {
    if (this.client.status === 'wait') {
      await this.client.connect();
    }
    await this.client.ping();
    log.info(`Redis client ready at ${REDIS_HOST}:${REDIS_PORT}`);
  }

  async quit(): Promise<void> {
    await this.client.quit();
    log.info('Redis client disconnected');
  }

  get status(): string {
    return this.client.status;
  }

  async ping(): Promise<boolean> {
    const reply = await this.client.ping();
    return reply === 'PONG';
  }
}

// Export singleton instance
export const redisClient = new RedisClient();
