import { Inject } from '@nestjs/common';
import { IQueryHandler, QueryHandler } from '@nestjs/cqrs';

import { BookingErrors } from '../errors/booking-error';
import { Reservation } from '../model/reservation';
import { err, ok } from '../model/result';
import { CourtCatalog } from '../ports/court-catalog';
import { ReservationRepository } from '../ports/reservation.repository';
import {
  GetWeekScheduleQuery,
  WeekScheduleResult,
} from '../queries/get-week-schedule.query';
import {
  AvailabilityProjector,
  weekDates,
} from '../scheduling/availability-projector';
import { COURT_CATALOG, RESERVATION_REPOSITORY } from '../tokens';
import { parseDate } from '../utils/wall-clock';

@QueryHandler(GetWeekScheduleQuery)
export class GetWeekScheduleHandler
  implements IQueryHandler<GetWeekScheduleQuery, WeekScheduleResult>
{
  constructor(
    @Inject(COURT_CATALOG) private readonly courtCatalog: CourtCatalog,
    @Inject(RESERVATION_REPOSITORY)
    private readonly reservationRepository: ReservationRepository,
    private readonly projector: AvailabilityProjector,
  ) {}

  async execute(query: GetWeekScheduleQuery): Promise<WeekScheduleResult> {
    const court = await this.courtCatalog.findById(query.courtId);
    if (!court) {
      return err(BookingErrors.notFound('court', query.courtId));
    }

    const startDate = parseDate(query.startDate, 'startDate');
    if (!startDate.ok) {
      return startDate;
    }

    const days = await Promise.all(
      weekDates(startDate.value).map(
        async (date): Promise<[string, Reservation[]]> => [
          date,
          await this.reservationRepository.findActiveByCourtAndDate(
            court.id,
            date,
          ),
        ],
      ),
    );

    return ok(
      this.projector.projectWeek(court, startDate.value, new Map(days)),
    );
  }
}
