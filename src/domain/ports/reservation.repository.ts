import { Page, PageRequest } from '../model/page';
import { Reservation, ReservationStatus } from '../model/reservation';
import { RESERVATION_REPOSITORY } from '../tokens';

export { RESERVATION_REPOSITORY };

export interface ReservationFilters {
  courtId?: string;
  date?: string;
  status?: ReservationStatus;
}

/**
 * `conflict` means the store refused the write because another CONFIRMED
 * reservation on the same court and date overlaps it.
 */
export type WriteOutcome = 'written' | 'conflict';

export interface ReservationRepository {
  findById(id: string): Promise<Reservation | null>;
  insert(reservation: Reservation): Promise<WriteOutcome>;
  update(reservation: Reservation): Promise<WriteOutcome>;
  findActiveByCourtAndDate(
    courtId: string,
    date: string,
  ): Promise<Reservation[]>;
  /** CONFIRMED reservations dated after `today`, or today starting after `nowTime` */
  countFutureConfirmedByUser(
    userId: string,
    today: string,
    nowTime: string,
  ): Promise<number>;
  findByUser(userId: string, page: PageRequest): Promise<Page<Reservation>>;
  search(
    filters: ReservationFilters,
    page: PageRequest,
  ): Promise<Page<Reservation>>;
  findInDateRange(
    from: string,
    to: string,
    statuses: ReservationStatus[],
  ): Promise<Reservation[]>;
}
