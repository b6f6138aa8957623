import { Injectable, Logger } from '@nestjs/common';

import {
  CourtDateLock,
  courtDateLockKey,
  userLockKey,
} from '../../domain/ports/court-date-lock';

/**
 * Single-process lock: tasks on the same key are chained behind each other.
 * Only valid while one Node process owns the reservation store.
 */
@Injectable()
export class InProcessCourtDateLock implements CourtDateLock {
  private readonly logger = new Logger(InProcessCourtDateLock.name);
  private readonly tails = new Map<string, Promise<void>>();

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

  pendingKeys(): number {
    return this.tails.size;
  }

  private async withKey<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key);
    if (previous) {
      this.logger.debug(`Waiting for ${key}`);
    }

    const run = (previous ?? Promise.resolve()).then(task);
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);

    try {
      return await run;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
