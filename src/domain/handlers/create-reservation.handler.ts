import { randomUUID } from 'crypto';

import { Inject, Logger } from '@nestjs/common';
import { CommandHandler, EventBus, ICommandHandler } from '@nestjs/cqrs';

import {
  CreateReservationCommand,
  ReservationResult,
} from '../commands/create-reservation.command';
import { BookingErrors } from '../errors/booking-error';
import { ReservationCreatedEvent } from '../events/reservation-created.event';
import { Court } from '../model/court';
import { err, ok } from '../model/result';
import { UserContext } from '../model/user';
import { Clock } from '../ports/clock';
import { CourtCatalog } from '../ports/court-catalog';
import { CourtDateLock, LockTimeoutError } from '../ports/court-date-lock';
import { ReservationRepository } from '../ports/reservation.repository';
import { UserDirectory } from '../ports/user-directory';
import { BookingPolicy } from '../scheduling/booking-policy';
import { OverlapGuard } from '../scheduling/overlap-guard';
import { ReservationLifecycle } from '../scheduling/reservation-lifecycle';
import {
  CLOCK,
  COURT_CATALOG,
  COURT_DATE_LOCK,
  RESERVATION_REPOSITORY,
  USER_DIRECTORY,
} from '../tokens';
import {
  formatMinutes,
  minutesOfDay,
  parseDate,
  parseTime,
  toDateString,
} from '../utils/wall-clock';

/**
 * Books a court slot. The quota count and the business rules run under the
 * user's lock; the overlap check and the insert then run under the
 * court-date lock, with the store's own exclusion check as a second line.
 * The first committer wins.
 */
@CommandHandler(CreateReservationCommand)
export class CreateReservationHandler
  implements ICommandHandler<CreateReservationCommand, ReservationResult>
{
  private readonly logger = new Logger(CreateReservationHandler.name);

  constructor(
    @Inject(USER_DIRECTORY) private readonly userDirectory: UserDirectory,
    @Inject(COURT_CATALOG) private readonly courtCatalog: CourtCatalog,
    @Inject(RESERVATION_REPOSITORY)
    private readonly reservationRepository: ReservationRepository,
    @Inject(COURT_DATE_LOCK) private readonly courtDateLock: CourtDateLock,
    @Inject(CLOCK) private readonly clock: Clock,
    private readonly bookingPolicy: BookingPolicy,
    private readonly overlapGuard: OverlapGuard,
    private readonly lifecycle: ReservationLifecycle,
    private readonly eventBus: EventBus,
  ) {}

  async execute(command: CreateReservationCommand): Promise<ReservationResult> {
    const user = await this.userDirectory.findById(command.userId);
    if (!user) {
      return err(BookingErrors.notFound('user', command.userId));
    }

    const court = await this.courtCatalog.findById(command.courtId);
    if (!court) {
      return err(BookingErrors.notFound('court', command.courtId));
    }

    const date = parseDate(command.date);
    if (!date.ok) {
      return date;
    }
    const start = parseTime(command.startTime, 'startTime');
    if (!start.ok) {
      return start;
    }
    const end = parseTime(command.endTime, 'endTime');
    if (!end.ok) {
      return end;
    }

    let result: ReservationResult;
    try {
      result = await this.courtDateLock.runExclusiveForUser(user.id, () =>
        this.book(command, user, court, date.value, start.value, end.value),
      );
    } catch (error) {
      if (error instanceof LockTimeoutError) {
        this.logger.warn(error.message);
        return err(BookingErrors.lockTimeout());
      }
      throw error;
    }

    if (result.ok) {
      this.eventBus.publish(new ReservationCreatedEvent(result.value));
    }
    return result;
  }

  // Caller holds the user's lock.
  private async book(
    command: CreateReservationCommand,
    user: UserContext,
    court: Court,
    date: string,
    start: number,
    end: number,
  ): Promise<ReservationResult> {
    const now = this.clock.now();
    const futureReservations =
      await this.reservationRepository.countFutureConfirmedByUser(
        user.id,
        toDateString(now),
        formatMinutes(minutesOfDay(now)),
      );

    const verdict = this.bookingPolicy.validateCreate({
      court,
      user,
      date,
      start,
      end,
      futureReservations,
      now,
    });
    if (!verdict.ok) {
      this.logger.debug(
        `Booking refused for user ${user.id} on court ${court.id}: ${verdict.error.reason}`,
      );
      return verdict;
    }

    const draft = {
      id: randomUUID(),
      userId: user.id,
      courtId: court.id,
      date,
      startTime: formatMinutes(start),
      endTime: formatMinutes(end),
      paidPrice: this.bookingPolicy.priceFor(court, user),
      notes: command.notes,
    };

    const result = await this.courtDateLock.runExclusive<ReservationResult>(
      court.id,
      date,
      async () => {
        const taken = await this.overlapGuard.hasConflict(
          court.id,
          date,
          start,
          end,
        );
        if (taken) {
          return err(BookingErrors.slotTaken());
        }

        const reservation = this.lifecycle.create(draft, now);
        const outcome = await this.reservationRepository.insert(reservation);
        return outcome === 'written'
          ? ok(reservation)
          : err(BookingErrors.slotTaken());
      },
    );

    if (!result.ok) {
      this.logger.debug(
        `Slot ${draft.startTime}-${draft.endTime} on court ${court.id} for ${draft.date} already taken`,
      );
    }
    return result;
  }
}
