import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { CqrsModule } from '@nestjs/cqrs';

import { AdminCancelReservationHandler } from './domain/handlers/admin-cancel-reservation.handler';
import { CancelReservationHandler } from './domain/handlers/cancel-reservation.handler';
import { CreateReservationHandler } from './domain/handlers/create-reservation.handler';
import { GetDayScheduleHandler } from './domain/handlers/get-day-schedule.handler';
import { GetReservationStatsHandler } from './domain/handlers/get-reservation-stats.handler';
import { GetWeekScheduleHandler } from './domain/handlers/get-week-schedule.handler';
import { ListReservationsHandler } from './domain/handlers/list-reservations.handler';
import { ListUserReservationsHandler } from './domain/handlers/list-user-reservations.handler';
import { ReservationAuditHandler } from './domain/handlers/reservation-audit.handler';
import { UpdateReservationStatusHandler } from './domain/handlers/update-reservation-status.handler';
import { AvailabilityProjector } from './domain/scheduling/availability-projector';
import { BookingPolicy } from './domain/scheduling/booking-policy';
import { OverlapGuard } from './domain/scheduling/overlap-guard';
import { ReservationLifecycle } from './domain/scheduling/reservation-lifecycle';
import { CLOCK } from './domain/tokens';
import { SystemClock } from './infrastructure/clock/system-clock';
import {
  BOOKING_CONFIG,
  getBookingConfig,
} from './infrastructure/config/booking.config';
import { AdminReservationsController } from './infrastructure/controllers/admin-reservations.controller';
import { ReservationsController } from './infrastructure/controllers/reservations.controller';
import { ScheduleController } from './infrastructure/controllers/schedule.controller';
import { AdminGuard } from './infrastructure/http/admin.guard';
import { LockModule } from './infrastructure/locks/lock.module';
import { PersistenceModule } from './infrastructure/persistence/persistence.module';

@Module({
  imports: [CqrsModule, ConfigModule.forRoot(), PersistenceModule, LockModule],
  controllers: [
    ReservationsController,
    ScheduleController,
    AdminReservationsController,
  ],
  providers: [
    {
      provide: BOOKING_CONFIG,
      inject: [ConfigService],
      useFactory: getBookingConfig,
    },
    {
      provide: CLOCK,
      useClass: SystemClock,
    },
    BookingPolicy,
    OverlapGuard,
    ReservationLifecycle,
    AvailabilityProjector,
    AdminGuard,
    CreateReservationHandler,
    CancelReservationHandler,
    AdminCancelReservationHandler,
    UpdateReservationStatusHandler,
    GetDayScheduleHandler,
    GetWeekScheduleHandler,
    ListUserReservationsHandler,
    ListReservationsHandler,
    GetReservationStatsHandler,
    ReservationAuditHandler,
  ],
})
export class AppModule {}
