import { Inject, Injectable } from '@nestjs/common';

import {
  BOOKING_CONFIG,
  BookingConfig,
} from '../../infrastructure/config/booking.config';
import {
  BookingErrors,
  PolicyViolation,
  PolicyViolationReason,
} from '../errors/booking-error';
import { Court, CourtStatus } from '../model/court';
import { ok, err, Result } from '../model/result';
import { Role, UserContext } from '../model/user';
import { toDateString, toMinutes } from '../utils/wall-clock';

export interface CreateRequest {
  court: Court;
  user: UserContext;
  /** `YYYY-MM-DD`, already parsed */
  date: string;
  /** Minutes since midnight */
  start: number;
  end: number;
  /** The user's CONFIRMED reservations that have not started yet */
  futureReservations: number;
  now: Date;
}

@Injectable()
export class BookingPolicy {
  constructor(
    @Inject(BOOKING_CONFIG) private readonly config: BookingConfig,
  ) {}

  /** Checks run in a fixed order; the first failing one is reported. */
  validateCreate(request: CreateRequest): Result<void, PolicyViolation> {
    const { court, date, start, end, futureReservations, now } = request;

    if (court.status !== CourtStatus.ACTIVE) {
      return err(
        BookingErrors.policy(
          PolicyViolationReason.COURT_UNAVAILABLE,
          `Court ${court.name} is not available for booking`,
        ),
      );
    }

    if (end <= start) {
      return err(
        BookingErrors.policy(
          PolicyViolationReason.INVALID_TIME_ORDER,
          'The end time must be after the start time',
        ),
      );
    }

    // YYYY-MM-DD strings order the same way as the dates they name
    if (date < toDateString(now)) {
      return err(
        BookingErrors.policy(
          PolicyViolationReason.PAST_DATE,
          'Reservations cannot be made for a past date',
        ),
      );
    }

    if (start < toMinutes(court.openingTime)) {
      return err(
        BookingErrors.policy(
          PolicyViolationReason.BEFORE_OPENING,
          `The start time cannot be before the court opens (${court.openingTime})`,
        ),
      );
    }

    if (end > toMinutes(court.closingTime)) {
      return err(
        BookingErrors.policy(
          PolicyViolationReason.AFTER_CLOSING,
          `The end time cannot be after the court closes (${court.closingTime})`,
        ),
      );
    }

    if (futureReservations >= this.config.maxFutureReservations) {
      return err(
        BookingErrors.policy(
          PolicyViolationReason.QUOTA_EXCEEDED,
          `You have reached the maximum number of future reservations (${this.config.maxFutureReservations})`,
        ),
      );
    }

    return ok(undefined);
  }

  priceFor(court: Court, user: UserContext): number {
    return user.role === Role.MEMBER ? court.memberPrice : court.basePrice;
  }
}
