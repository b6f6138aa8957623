import { BookingError } from '../errors/booking-error';
import { Page, PageRequest } from '../model/page';
import { Reservation } from '../model/reservation';
import { Result } from '../model/result';

export interface ReservationSearch {
  courtId?: string;
  /** `YYYY-MM-DD`, unparsed */
  date?: string;
  /** Raw status value, matched case-insensitively */
  status?: string;
}

export type ReservationPageResult = Result<Page<Reservation>, BookingError>;

export class ListReservationsQuery {
  constructor(readonly filters: ReservationSearch, readonly page: PageRequest) {}
}
