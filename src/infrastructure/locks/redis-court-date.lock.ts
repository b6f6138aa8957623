import { randomUUID } from 'crypto';

import { Inject, Injectable, Logger } from '@nestjs/common';

import {
  CourtDateLock,
  courtDateLockKey,
  LockTimeoutError,
  userLockKey,
} from '../../domain/ports/court-date-lock';
import { LOCK_CONFIG, LockConfig } from '../config/lock.config';
import { RedisService } from '../services/redis.service';

// Deletes the key only while it still holds our token, so an expired lock
// re-acquired by another worker is never released by us.
const RELEASE_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
else
  return 0
end
`;

const sleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Cross-process court-date lock: `SET key token PX ttl NX`, polled until
 * acquired or the wait window elapses.
 *
 * It only serializes writers that share one reservation store. The in-memory
 * repository wired by PersistenceModule is per process, so several processes
 * on this driver still keep separate, uncoordinated stores.
 */
@Injectable()
export class RedisCourtDateLock implements CourtDateLock {
  private readonly logger = new Logger(RedisCourtDateLock.name);

  constructor(
    private readonly redisService: RedisService,
    @Inject(LOCK_CONFIG) private readonly config: LockConfig,
  ) {}

  runExclusive<T>(
    courtId: string,
    date: string,
    task: () => Promise<T>,
  ): Promise<T> {
    return this.withKey(courtDateLockKey(courtId, date), task);
  }

  runExclusiveForUser<T>(userId: string, task: () => Promise<T>): Promise<T> {
    return this.withKey(userLockKey(userId), task);
  }

  private async withKey<T>(key: string, task: () => Promise<T>): Promise<T> {
    const token = await this.acquire(key);

    try {
      return await task();
    } finally {
      await this.release(key, token);
    }
  }

  private async acquire(key: string): Promise<string> {
    const client = this.redisService.getClient();
    const token = randomUUID();
    const startedAt = Date.now();

    for (;;) {
      const result = await client.set(
        key,
        token,
        'PX',
        this.config.ttlMs,
        'NX',
      );
      if (result === 'OK') {
        this.logger.debug(`Acquired ${key}`);
        return token;
      }

      const waited = Date.now() - startedAt;
      if (waited >= this.config.waitTimeoutMs) {
        this.logger.warn(`Gave up on ${key} after ${waited}ms`);
        throw new LockTimeoutError(key, waited);
      }
      await sleep(this.config.retryIntervalMs);
    }
  }

  private async release(key: string, token: string): Promise<void> {
    try {
      const released = await this.redisService
        .getClient()
        .eval(RELEASE_SCRIPT, 1, key, token);
      if (released !== 1) {
        this.logger.warn(`Lock ${key} expired before release`);
      }
    } catch (error) {
      // The key still expires after ttlMs; the task result stands.
      this.logger.error(`Failed to release ${key}:`, error);
    }
  }
}
