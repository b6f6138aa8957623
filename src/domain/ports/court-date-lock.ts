import { COURT_DATE_LOCK } from '../tokens';

export { COURT_DATE_LOCK };

/**
 * Mutual exclusion per `(courtId, date)`, plus a per-user key that guards
 * quota checks. Tasks sharing a key never run concurrently; tasks on
 * different keys are not ordered. A user key is always taken before a
 * court-date key, never inside one.
 */
export interface CourtDateLock {
  runExclusive<T>(
    courtId: string,
    date: string,
    task: () => Promise<T>,
  ): Promise<T>;

  runExclusiveForUser<T>(userId: string, task: () => Promise<T>): Promise<T>;
}

export class LockTimeoutError extends Error {
  constructor(readonly key: string, readonly waitedMs: number) {
    super(`Timed out after ${waitedMs}ms waiting for lock ${key}`);
    this.name = 'LockTimeoutError';
  }
}

export const courtDateLockKey = (courtId: string, date: string): string =>
  `lock:court:${courtId}:${date}`;

export const userLockKey = (userId: string): string => `lock:user:${userId}`;
