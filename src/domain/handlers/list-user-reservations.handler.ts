import { Inject } from '@nestjs/common';
import { IQueryHandler, QueryHandler } from '@nestjs/cqrs';

import { Page } from '../model/page';
import { Reservation } from '../model/reservation';
import { ReservationRepository } from '../ports/reservation.repository';
import { ListUserReservationsQuery } from '../queries/list-user-reservations.query';
import { RESERVATION_REPOSITORY } from '../tokens';

@QueryHandler(ListUserReservationsQuery)
export class ListUserReservationsHandler
  implements IQueryHandler<ListUserReservationsQuery, Page<Reservation>>
{
  constructor(
    @Inject(RESERVATION_REPOSITORY)
    private readonly reservationRepository: ReservationRepository,
  ) {}

  execute(query: ListUserReservationsQuery): Promise<Page<Reservation>> {
    return this.reservationRepository.findByUser(query.userId, query.page);
  }
}
