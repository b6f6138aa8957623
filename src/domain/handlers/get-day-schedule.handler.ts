import { Inject } from '@nestjs/common';
import { IQueryHandler, QueryHandler } from '@nestjs/cqrs';

import { BookingErrors } from '../errors/booking-error';
import { err, ok } from '../model/result';
import { CourtCatalog } from '../ports/court-catalog';
import { ReservationRepository } from '../ports/reservation.repository';
import {
  DayScheduleResult,
  GetDayScheduleQuery,
} from '../queries/get-day-schedule.query';
import { AvailabilityProjector } from '../scheduling/availability-projector';
import { COURT_CATALOG, RESERVATION_REPOSITORY } from '../tokens';
import { parseDate } from '../utils/wall-clock';

/** Always projected from current state: schedules are never cached. */
@QueryHandler(GetDayScheduleQuery)
export class GetDayScheduleHandler
  implements IQueryHandler<GetDayScheduleQuery, DayScheduleResult>
{
  constructor(
    @Inject(COURT_CATALOG) private readonly courtCatalog: CourtCatalog,
    @Inject(RESERVATION_REPOSITORY)
    private readonly reservationRepository: ReservationRepository,
    private readonly projector: AvailabilityProjector,
  ) {}

  async execute(query: GetDayScheduleQuery): Promise<DayScheduleResult> {
    const court = await this.courtCatalog.findById(query.courtId);
    if (!court) {
      return err(BookingErrors.notFound('court', query.courtId));
    }

    const date = parseDate(query.date);
    if (!date.ok) {
      return date;
    }

    const active = await this.reservationRepository.findActiveByCourtAndDate(
      court.id,
      date.value,
    );
    return ok(this.projector.projectDay(court, date.value, active));
  }
}
