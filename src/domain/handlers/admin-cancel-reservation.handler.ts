import { Inject, Logger } from '@nestjs/common';
import { CommandHandler, EventBus, ICommandHandler } from '@nestjs/cqrs';

import { AdminCancelReservationCommand } from '../commands/admin-cancel-reservation.command';
import { ReservationResult } from '../commands/create-reservation.command';
import { BookingErrors } from '../errors/booking-error';
import { ReservationCancelledEvent } from '../events/reservation-cancelled.event';
import { err, ok } from '../model/result';
import { Clock } from '../ports/clock';
import { CourtDateLock, LockTimeoutError } from '../ports/court-date-lock';
import { ReservationRepository } from '../ports/reservation.repository';
import { ReservationLifecycle } from '../scheduling/reservation-lifecycle';
import { CLOCK, COURT_DATE_LOCK, RESERVATION_REPOSITORY } from '../tokens';

@CommandHandler(AdminCancelReservationCommand)
export class AdminCancelReservationHandler
  implements ICommandHandler<AdminCancelReservationCommand, ReservationResult>
{
  private readonly logger = new Logger(AdminCancelReservationHandler.name);

  constructor(
    @Inject(RESERVATION_REPOSITORY)
    private readonly reservationRepository: ReservationRepository,
    @Inject(COURT_DATE_LOCK) private readonly courtDateLock: CourtDateLock,
    @Inject(CLOCK) private readonly clock: Clock,
    private readonly lifecycle: ReservationLifecycle,
    private readonly eventBus: EventBus,
  ) {}

  async execute(
    command: AdminCancelReservationCommand,
  ): Promise<ReservationResult> {
    const reservation = await this.reservationRepository.findById(
      command.reservationId,
    );
    if (!reservation) {
      return err(BookingErrors.notFound('reservation', command.reservationId));
    }

    let result: ReservationResult;
    try {
      result = await this.courtDateLock.runExclusive(
        reservation.courtId,
        reservation.date,
        async (): Promise<ReservationResult> => {
          const current = await this.reservationRepository.findById(
            command.reservationId,
          );
          if (!current) {
            return err(
              BookingErrors.notFound('reservation', command.reservationId),
            );
          }

          const cancelled = this.lifecycle.adminCancel(
            current,
            this.clock.now(),
          );
          const outcome = await this.reservationRepository.update(cancelled);
          return outcome === 'written'
            ? ok(cancelled)
            : err(BookingErrors.slotTaken());
        },
      );
    } catch (error) {
      if (error instanceof LockTimeoutError) {
        this.logger.warn(error.message);
        return err(BookingErrors.lockTimeout());
      }
      throw error;
    }

    if (result.ok) {
      this.eventBus.publish(new ReservationCancelledEvent(result.value, 'admin'));
    }
    return result;
  }
}
