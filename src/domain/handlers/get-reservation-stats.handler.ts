import { Inject } from '@nestjs/common';
import { IQueryHandler, QueryHandler } from '@nestjs/cqrs';
import * as moment from 'moment';

import { Reservation, ReservationStatus } from '../model/reservation';
import { ok } from '../model/result';
import { CourtUsageStat } from '../model/stats';
import { Clock } from '../ports/clock';
import { CourtCatalog } from '../ports/court-catalog';
import { ReservationRepository } from '../ports/reservation.repository';
import {
  GetReservationStatsQuery,
  ReservationStatsResult,
} from '../queries/get-reservation-stats.query';
import { CLOCK, COURT_CATALOG, RESERVATION_REPOSITORY } from '../tokens';
import { DATE_FORMAT, parseDate } from '../utils/wall-clock';

/** Cancelled reservations neither count nor earn. */
export const COUNTED_STATUSES = [
  ReservationStatus.CONFIRMED,
  ReservationStatus.COMPLETED,
];

const roundCents = (amount: number): number =>
  Math.round(amount * 100) / 100;

@QueryHandler(GetReservationStatsQuery)
export class GetReservationStatsHandler
  implements IQueryHandler<GetReservationStatsQuery, ReservationStatsResult>
{
  constructor(
    @Inject(RESERVATION_REPOSITORY)
    private readonly reservationRepository: ReservationRepository,
    @Inject(COURT_CATALOG) private readonly courtCatalog: CourtCatalog,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  async execute(
    query: GetReservationStatsQuery,
  ): Promise<ReservationStatsResult> {
    const today = moment(this.clock.now());
    const format = (m: moment.Moment) => m.format(DATE_FORMAT);

    const from = parseDate(
      query.from ?? format(today.clone().startOf('month')),
      'fromDate',
    );
    if (!from.ok) {
      return from;
    }
    const to = parseDate(query.to ?? format(today), 'toDate');
    if (!to.ok) {
      return to;
    }

    const count = async (start: moment.Moment, end: moment.Moment) =>
      (
        await this.reservationRepository.findInDateRange(
          format(start),
          format(end),
          COUNTED_STATUSES,
        )
      ).length;

    const [totalToday, totalWeek, totalMonth, inRange] = await Promise.all([
      count(today, today),
      count(
        today.clone().startOf('isoWeek'),
        today.clone().endOf('isoWeek'),
      ),
      count(today.clone().startOf('month'), today.clone().endOf('month')),
      this.reservationRepository.findInDateRange(
        from.value,
        to.value,
        COUNTED_STATUSES,
      ),
    ]);

    return ok({
      totalReservationsToday: totalToday,
      totalReservationsWeek: totalWeek,
      totalReservationsMonth: totalMonth,
      totalRevenue: roundCents(
        inRange.reduce((sum, reservation) => sum + reservation.paidPrice, 0),
      ),
      courtUsage: await this.courtUsage(inRange),
    });
  }

  private async courtUsage(
    reservations: Reservation[],
  ): Promise<CourtUsageStat[]> {
    const byCourt = new Map<string, { count: number; revenue: number }>();
    for (const reservation of reservations) {
      const entry = byCourt.get(reservation.courtId) ?? {
        count: 0,
        revenue: 0,
      };
      entry.count++;
      entry.revenue += reservation.paidPrice;
      byCourt.set(reservation.courtId, entry);
    }

    const stats = await Promise.all(
      Array.from(byCourt.entries()).map(
        async ([courtId, { count, revenue }]): Promise<CourtUsageStat> => {
          const court = await this.courtCatalog.findById(courtId);
          return {
            courtId,
            courtName: court?.name ?? courtId,
            reservationCount: count,
            revenue: roundCents(revenue),
          };
        },
      ),
    );

    return stats.sort(
      (a, b) =>
        b.reservationCount - a.reservationCount ||
        a.courtName.localeCompare(b.courtName),
    );
  }
}
