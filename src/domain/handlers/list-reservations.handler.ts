import { Inject } from '@nestjs/common';
import { IQueryHandler, QueryHandler } from '@nestjs/cqrs';

import { BookingErrors } from '../errors/booking-error';
import { parseReservationStatus } from '../model/reservation';
import { err, ok } from '../model/result';
import {
  ReservationFilters,
  ReservationRepository,
} from '../ports/reservation.repository';
import {
  ListReservationsQuery,
  ReservationPageResult,
} from '../queries/list-reservations.query';
import { RESERVATION_REPOSITORY } from '../tokens';
import { parseDate } from '../utils/wall-clock';

/** Admin listing; every filter that is present must match. */
@QueryHandler(ListReservationsQuery)
export class ListReservationsHandler
  implements IQueryHandler<ListReservationsQuery, ReservationPageResult>
{
  constructor(
    @Inject(RESERVATION_REPOSITORY)
    private readonly reservationRepository: ReservationRepository,
  ) {}

  async execute(query: ListReservationsQuery): Promise<ReservationPageResult> {
    const { courtId, date, status } = query.filters;
    const filters: ReservationFilters = { courtId };

    if (date !== undefined) {
      const parsed = parseDate(date);
      if (!parsed.ok) {
        return parsed;
      }
      filters.date = parsed.value;
    }

    if (status !== undefined) {
      const parsed = parseReservationStatus(status);
      if (!parsed.ok) {
        return err(BookingErrors.invalidStatus(status));
      }
      filters.status = parsed.value;
    }

    return ok(await this.reservationRepository.search(filters, query.page));
  }
}
