import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import Redis from 'ioredis';

import { LOCK_CONFIG, LockConfig } from '../config/lock.config';

/**
 * Owns the ioredis connection backing distributed court-date locks. Nothing
 * connects unless the lock driver is `redis`.
 */
@Injectable()
export class RedisService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(RedisService.name);
  private client: Redis | null = null;

  constructor(@Inject(LOCK_CONFIG) private readonly lockConfig: LockConfig) {}

  async onModuleInit() {
    if (this.lockConfig.driver !== 'redis') {
      return;
    }

    const client = new Redis(this.lockConfig.redisUrl, {
      maxRetriesPerRequest: 3,
      lazyConnect: true,
    });

    client.on('connect', () => {
      this.logger.log('Connected to Redis');
    });

    client.on('error', (error) => {
      this.logger.error('Redis connection error:', error);
    });

    client.on('ready', () => {
      this.logger.log('Redis client ready');
    });

    this.client = client;
    await client.connect();
    this.logger.log('Redis connection established successfully');
  }

  async onModuleDestroy() {
    if (this.client) {
      this.client.disconnect();
      this.client = null;
      this.logger.log('Redis connection closed');
    }
  }

  getClient(): Redis {
    if (!this.client) {
      throw new Error('Redis client is not initialised (LOCK_DRIVER=redis?)');
    }
    return this.client;
  }

  isConnected(): boolean {
    return this.client !== null && this.client.status === 'ready';
  }
}
