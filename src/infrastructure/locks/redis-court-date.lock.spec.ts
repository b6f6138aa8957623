import { Test, TestingModule } from '@nestjs/testing';

import { LockTimeoutError } from '../../domain/ports/court-date-lock';
import { DEFAULT_LOCK_CONFIG, LOCK_CONFIG, LockConfig } from '../config/lock.config';
import { RedisService } from '../services/redis.service';
import { RedisCourtDateLock } from './redis-court-date.lock';

describe('RedisCourtDateLock', () => {
  let client: { set: jest.Mock; eval: jest.Mock };

  const createLock = async (overrides: Partial<LockConfig> = {}) => {
    const config: LockConfig = {
      ...DEFAULT_LOCK_CONFIG,
      driver: 'redis',
      retryIntervalMs: 1,
      ...overrides,
    };
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RedisCourtDateLock,
        { provide: RedisService, useValue: { getClient: () => client } },
        { provide: LOCK_CONFIG, useValue: config },
      ],
    }).compile();

    return module.get<RedisCourtDateLock>(RedisCourtDateLock);
  };

  beforeEach(() => {
    client = {
      set: jest.fn().mockResolvedValue('OK'),
      eval: jest.fn().mockResolvedValue(1),
    };
  });

  it('should acquire with NX and a TTL, then release with the same token', async () => {
    const lock = await createLock({ ttlMs: 4000 });

    const result = await lock.runExclusive('court-1', '2026-10-19', async () => 'done');

    expect(result).toBe('done');
    expect(client.set).toHaveBeenCalledWith(
      'lock:court:court-1:2026-10-19',
      expect.any(String),
      'PX',
      4000,
      'NX',
    );
    const [, token] = client.set.mock.calls[0];
    expect(client.eval).toHaveBeenCalledWith(
      expect.stringContaining('redis.call("del", KEYS[1])'),
      1,
      'lock:court:court-1:2026-10-19',
      token,
    );
  });

  it('should retry until the key is free', async () => {
    client.set
      .mockResolvedValueOnce(null)
      .mockResolvedValueOnce(null)
      .mockResolvedValueOnce('OK');
    const lock = await createLock();
    const task = jest.fn().mockResolvedValue(42);

    await expect(lock.runExclusive('court-1', '2026-10-19', task)).resolves.toBe(42);

    expect(client.set).toHaveBeenCalledTimes(3);
    expect(task).toHaveBeenCalledTimes(1);
  });

  it('should give up once the wait window has elapsed', async () => {
    client.set.mockResolvedValue(null);
    const lock = await createLock({ waitTimeoutMs: 0 });
    const task = jest.fn();

    await expect(
      lock.runExclusive('court-1', '2026-10-19', task),
    ).rejects.toBeInstanceOf(LockTimeoutError);

    expect(task).not.toHaveBeenCalled();
    expect(client.eval).not.toHaveBeenCalled();
  });

  it('should release the lock when the task fails', async () => {
    const lock = await createLock();

    await expect(
      lock.runExclusive('court-1', '2026-10-19', async () => {
        throw new Error('task failed');
      }),
    ).rejects.toThrow('task failed');

    expect(client.eval).toHaveBeenCalledTimes(1);
  });

  it('should keep the task result when the release fails', async () => {
    client.eval.mockRejectedValue(new Error('connection lost'));
    const lock = await createLock();

    await expect(
      lock.runExclusive('court-1', '2026-10-19', async () => 'kept'),
    ).resolves.toBe('kept');
  });
});
