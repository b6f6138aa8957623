import { BookingError } from '../errors/booking-error';
import { Reservation } from '../model/reservation';
import { Result } from '../model/result';

export type ReservationResult = Result<Reservation, BookingError>;

export class CreateReservationCommand {
  constructor(
    readonly userId: string,
    readonly courtId: string,
    /** `YYYY-MM-DD`, unparsed */
    readonly date: string,
    /** `HH:mm`, unparsed */
    readonly startTime: string,
    readonly endTime: string,
    readonly notes?: string,
  ) {}
}
