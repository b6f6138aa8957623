import { Inject, Injectable } from '@nestjs/common';
import * as moment from 'moment';

import {
  BOOKING_CONFIG,
  BookingConfig,
} from '../../infrastructure/config/booking.config';
import { BookingError, BookingErrors } from '../errors/booking-error';
import {
  parseReservationStatus,
  Reservation,
  ReservationStatus,
} from '../model/reservation';
import { err, ok, Result } from '../model/result';
import { startOf } from '../utils/wall-clock';

export type ReservationDraft = Omit<
  Reservation,
  'status' | 'createdAt' | 'updatedAt'
>;

export type StatusTransitionTable = Readonly<
  Record<ReservationStatus, ReadonlySet<ReservationStatus>>
>;

const ALL_STATUSES = new Set(Object.values(ReservationStatus));

/**
 * Statuses an administrator may move a reservation to, indexed by its
 * current status. Every pair is open today, reopening included.
 */
export const ADMIN_STATUS_TRANSITIONS: StatusTransitionTable = {
  [ReservationStatus.CONFIRMED]: ALL_STATUSES,
  [ReservationStatus.CANCELLED]: ALL_STATUSES,
  [ReservationStatus.COMPLETED]: ALL_STATUSES,
};

@Injectable()
export class ReservationLifecycle {
  constructor(
    @Inject(BOOKING_CONFIG) private readonly config: BookingConfig,
  ) {}

  create(draft: ReservationDraft, now: Date): Reservation {
    const timestamp = now.toISOString();
    return {
      ...draft,
      status: ReservationStatus.CONFIRMED,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
  }

  userCancel(
    reservation: Reservation,
    requestingUserId: string,
    now: Date,
  ): Result<Reservation, BookingError> {
    if (reservation.userId !== requestingUserId) {
      return err(BookingErrors.forbidden());
    }

    if (reservation.status !== ReservationStatus.CONFIRMED) {
      return err(BookingErrors.invalidState(reservation.status));
    }

    if (moment(now).isAfter(this.cancellationDeadline(reservation))) {
      return err(
        BookingErrors.deadlinePassed(this.config.cancellationDeadlineHours),
      );
    }

    return ok(this.withStatus(reservation, ReservationStatus.CANCELLED, now));
  }

  adminCancel(reservation: Reservation, now: Date): Reservation {
    return this.withStatus(reservation, ReservationStatus.CANCELLED, now);
  }

  adminSetStatus(
    reservation: Reservation,
    requestedStatus: string,
    now: Date,
  ): Result<Reservation, BookingError> {
    const parsed = parseReservationStatus(requestedStatus);
    if (!parsed.ok) {
      return err(BookingErrors.invalidStatus(requestedStatus));
    }

    if (!ADMIN_STATUS_TRANSITIONS[reservation.status].has(parsed.value)) {
      return err(BookingErrors.invalidStatus(requestedStatus));
    }

    return ok(this.withStatus(reservation, parsed.value, now));
  }

  /** Last instant at which the owner may still cancel. */
  cancellationDeadline(reservation: Reservation): moment.Moment {
    return startOf(reservation.date, reservation.startTime).subtract(
      this.config.cancellationDeadlineHours,
      'hours',
    );
  }

  private withStatus(
    reservation: Reservation,
    status: ReservationStatus,
    now: Date,
  ): Reservation {
    return { ...reservation, status, updatedAt: now.toISOString() };
  }
}
