import { Inject, Injectable } from '@nestjs/common';

import { isActive, Reservation } from '../model/reservation';
import {
  RESERVATION_REPOSITORY,
  ReservationRepository,
} from '../ports/reservation.repository';
import { Interval, toMinutes } from '../utils/wall-clock';

/** `[s1, e1)` and `[s2, e2)` overlap iff `s1 < e2 && s2 < e1`; touching ends do not. */
export const overlaps = (a: Interval, b: Interval): boolean =>
  a.start < b.end && b.start < a.end;

export const intervalOf = (reservation: Reservation): Interval => ({
  start: toMinutes(reservation.startTime),
  end: toMinutes(reservation.endTime),
});

export function findConflict(
  reservations: Reservation[],
  candidate: Interval,
  excludeReservationId?: string,
): Reservation | undefined {
  return reservations.find(
    (reservation) =>
      isActive(reservation) &&
      reservation.id !== excludeReservationId &&
      overlaps(intervalOf(reservation), candidate),
  );
}

@Injectable()
export class OverlapGuard {
  constructor(
    @Inject(RESERVATION_REPOSITORY)
    private readonly reservationRepository: ReservationRepository,
  ) {}

  /**
   * Reads committed state; callers hold the court-date lock so the answer
   * stays valid until their write lands.
   */
  async hasConflict(
    courtId: string,
    date: string,
    start: number,
    end: number,
    excludeReservationId?: string,
  ): Promise<boolean> {
    const active = await this.reservationRepository.findActiveByCourtAndDate(
      courtId,
      date,
    );
    return (
      findConflict(active, { start, end }, excludeReservationId) !== undefined
    );
  }
}
