import { Inject, Logger } from '@nestjs/common';
import { CommandHandler, EventBus, ICommandHandler } from '@nestjs/cqrs';

import { ReservationResult } from '../commands/create-reservation.command';
import { UpdateReservationStatusCommand } from '../commands/update-reservation-status.command';
import { BookingError, BookingErrors } from '../errors/booking-error';
import { ReservationStatusChangedEvent } from '../events/reservation-status-changed.event';
import { isActive, Reservation, ReservationStatus } from '../model/reservation';
import { err, ok, Result } from '../model/result';
import { Clock } from '../ports/clock';
import { CourtDateLock, LockTimeoutError } from '../ports/court-date-lock';
import { ReservationRepository } from '../ports/reservation.repository';
import { OverlapGuard, intervalOf } from '../scheduling/overlap-guard';
import { ReservationLifecycle } from '../scheduling/reservation-lifecycle';
import { CLOCK, COURT_DATE_LOCK, RESERVATION_REPOSITORY } from '../tokens';

type StatusChange = Result<
  { updated: Reservation; previousStatus: ReservationStatus },
  BookingError
>;

/**
 * Administrative status override, applied to the row as re-read under its
 * court-date lock. Moving a reservation back to CONFIRMED re-enters the
 * slot, so that case also runs the overlap check a new booking does.
 */
@CommandHandler(UpdateReservationStatusCommand)
export class UpdateReservationStatusHandler
  implements ICommandHandler<UpdateReservationStatusCommand, ReservationResult>
{
  private readonly logger = new Logger(UpdateReservationStatusHandler.name);

  constructor(
    @Inject(RESERVATION_REPOSITORY)
    private readonly reservationRepository: ReservationRepository,
    @Inject(COURT_DATE_LOCK) private readonly courtDateLock: CourtDateLock,
    @Inject(CLOCK) private readonly clock: Clock,
    private readonly overlapGuard: OverlapGuard,
    private readonly lifecycle: ReservationLifecycle,
    private readonly eventBus: EventBus,
  ) {}

  async execute(
    command: UpdateReservationStatusCommand,
  ): Promise<ReservationResult> {
    const reservation = await this.reservationRepository.findById(
      command.reservationId,
    );
    if (!reservation) {
      return err(BookingErrors.notFound('reservation', command.reservationId));
    }

    let change: StatusChange;
    try {
      change = await this.courtDateLock.runExclusive(
        reservation.courtId,
        reservation.date,
        () => this.apply(command),
      );
    } catch (error) {
      if (error instanceof LockTimeoutError) {
        this.logger.warn(error.message);
        return err(BookingErrors.lockTimeout());
      }
      throw error;
    }

    if (!change.ok) {
      return change;
    }
    const { updated, previousStatus } = change.value;
    this.eventBus.publish(
      new ReservationStatusChangedEvent(updated, previousStatus),
    );
    return ok(updated);
  }

  private async apply(
    command: UpdateReservationStatusCommand,
  ): Promise<StatusChange> {
    const current = await this.reservationRepository.findById(
      command.reservationId,
    );
    if (!current) {
      return err(BookingErrors.notFound('reservation', command.reservationId));
    }

    const updated = this.lifecycle.adminSetStatus(
      current,
      command.status,
      this.clock.now(),
    );
    if (!updated.ok) {
      return updated;
    }

    const reopening = isActive(updated.value) && !isActive(current);
    const persisted = await this.persist(updated.value, reopening);
    return persisted.ok
      ? ok({ updated: persisted.value, previousStatus: current.status })
      : persisted;
  }

  private async persist(
    reservation: Reservation,
    checkOverlap: boolean,
  ): Promise<ReservationResult> {
    if (checkOverlap) {
      const { start, end } = intervalOf(reservation);
      const taken = await this.overlapGuard.hasConflict(
        reservation.courtId,
        reservation.date,
        start,
        end,
        reservation.id,
      );
      if (taken) {
        return err(BookingErrors.slotTaken());
      }
    }

    const outcome = await this.reservationRepository.update(reservation);
    return outcome === 'written'
      ? ok(reservation)
      : err(BookingErrors.slotTaken());
  }
}
