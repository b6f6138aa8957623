import { ConfigService } from '@nestjs/config';

import { readNumber } from './booking.config';

export type LockDriver = 'memory' | 'redis';

export interface LockConfig {
  /** Where court-date locks live */
  driver: LockDriver;
  /** Expiry of a Redis lock key (milliseconds) */
  ttlMs: number;
  /** Maximum time to wait for a busy lock (milliseconds) */
  waitTimeoutMs: number;
  /** Interval between acquisition attempts (milliseconds) */
  retryIntervalMs: number;
  redisUrl: string;
}

export const DEFAULT_LOCK_CONFIG: LockConfig = {
  driver: 'memory',
  ttlMs: 5000,
  waitTimeoutMs: 3000,
  retryIntervalMs: 50,
  redisUrl: 'redis://localhost:6379',
};

export const LOCK_CONFIG_KEYS = {
  DRIVER: 'LOCK_DRIVER',
  TTL_MS: 'LOCK_TTL_MS',
  WAIT_TIMEOUT_MS: 'LOCK_WAIT_TIMEOUT_MS',
  RETRY_INTERVAL_MS: 'LOCK_RETRY_INTERVAL_MS',
  REDIS_URL: 'REDIS_URL',
} as const;

export const LOCK_CONFIG = 'LOCK_CONFIG';

export const getLockConfig = (configService: ConfigService): LockConfig => {
  const driver = configService.get<string>(LOCK_CONFIG_KEYS.DRIVER);

  return {
    driver: driver === 'redis' ? 'redis' : DEFAULT_LOCK_CONFIG.driver,
    ttlMs: readNumber(
      configService,
      LOCK_CONFIG_KEYS.TTL_MS,
      DEFAULT_LOCK_CONFIG.ttlMs,
    ),
    waitTimeoutMs: readNumber(
      configService,
      LOCK_CONFIG_KEYS.WAIT_TIMEOUT_MS,
      DEFAULT_LOCK_CONFIG.waitTimeoutMs,
    ),
    retryIntervalMs: readNumber(
      configService,
      LOCK_CONFIG_KEYS.RETRY_INTERVAL_MS,
      DEFAULT_LOCK_CONFIG.retryIntervalMs,
    ),
    redisUrl: configService.get<string>(
      LOCK_CONFIG_KEYS.REDIS_URL,
      DEFAULT_LOCK_CONFIG.redisUrl,
    ),
  };
};
