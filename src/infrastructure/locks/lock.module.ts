import { Logger, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';

import { CourtDateLock } from '../../domain/ports/court-date-lock';
import { COURT_DATE_LOCK } from '../../domain/tokens';
import { getLockConfig, LOCK_CONFIG, LockConfig } from '../config/lock.config';
import { RedisService } from '../services/redis.service';
import { InProcessCourtDateLock } from './in-process-court-date.lock';
import { RedisCourtDateLock } from './redis-court-date.lock';

const logger = new Logger('LockModule');

function selectLock(
  config: LockConfig,
  inProcess: InProcessCourtDateLock,
  redis: RedisCourtDateLock,
): CourtDateLock {
  if (config.driver !== 'redis') {
    return inProcess;
  }
  logger.warn(
    'LOCK_DRIVER=redis only serializes processes that share one reservation store; ' +
      'the in-memory store is per process, so run a single instance',
  );
  return redis;
}

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: LOCK_CONFIG,
      inject: [ConfigService],
      useFactory: getLockConfig,
    },
    RedisService,
    InProcessCourtDateLock,
    RedisCourtDateLock,
    {
      provide: COURT_DATE_LOCK,
      inject: [LOCK_CONFIG, InProcessCourtDateLock, RedisCourtDateLock],
      useFactory: selectLock,
    },
  ],
  exports: [COURT_DATE_LOCK],
})
export class LockModule {}
