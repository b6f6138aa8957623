import { BookingError } from '../errors/booking-error';
import { Result } from '../model/result';
import { ReservationStats } from '../model/stats';

export type ReservationStatsResult = Result<ReservationStats, BookingError>;

/**
 * Dashboard figures. Revenue and per-court usage cover `[from, to]`, which
 * default to the first of the current month and today.
 */
export class GetReservationStatsQuery {
  constructor(readonly from?: string, readonly to?: string) {}
}
