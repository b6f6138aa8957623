import { makeCourt, makeReservation } from '../../../test/utils/booking-fixtures';
import {
  BookingHarness,
  createBookingHarness,
} from '../../../test/utils/booking-harness';
import { ReservationStatus } from '../model/reservation';
import { GetReservationStatsQuery } from '../queries/get-reservation-stats.query';
import { GetReservationStatsHandler } from './get-reservation-stats.handler';

describe('GetReservationStatsHandler', () => {
  let harness: BookingHarness;
  let handler: GetReservationStatsHandler;

  beforeEach(async () => {
    harness = await createBookingHarness([GetReservationStatsHandler]);
    handler = harness.module.get(GetReservationStatsHandler);
    harness.catalog.register(
      makeCourt({ id: 'court-2', name: 'Padel Court', basePrice: 30 }),
    );

    const rows = [
      { id: 'today', courtId: 'court-1', date: '2026-10-18', paidPrice: 25 },
      {
        id: 'this-week',
        courtId: 'court-1',
        date: '2026-10-13',
        paidPrice: 18,
        status: ReservationStatus.COMPLETED,
      },
      { id: 'this-month', courtId: 'court-2', date: '2026-10-05', paidPrice: 30 },
      { id: 'tomorrow', courtId: 'court-1', date: '2026-10-19', paidPrice: 25 },
      {
        id: 'cancelled',
        courtId: 'court-2',
        date: '2026-10-18',
        paidPrice: 30,
        status: ReservationStatus.CANCELLED,
      },
      { id: 'last-month', courtId: 'court-1', date: '2026-09-30', paidPrice: 25 },
    ];
    for (const row of rows) {
      await harness.repository.insert(makeReservation(row));
    }
  });

  it('should count today, this ISO week and this month', async () => {
    const result = await handler.execute(new GetReservationStatsQuery());

    expect(result).toEqual({
      ok: true,
      value: {
        totalReservationsToday: 1,
        totalReservationsWeek: 2,
        totalReservationsMonth: 4,
        totalRevenue: 73,
        courtUsage: [
          {
            courtId: 'court-1',
            courtName: 'Central Court',
            reservationCount: 2,
            revenue: 43,
          },
          {
            courtId: 'court-2',
            courtName: 'Padel Court',
            reservationCount: 1,
            revenue: 30,
          },
        ],
      },
    });
  });

  it('should compute revenue and usage over an explicit range', async () => {
    const result = await handler.execute(
      new GetReservationStatsQuery('2026-09-01', '2026-10-31'),
    );
    if (!result.ok) {
      throw new Error(result.error.message);
    }

    expect(result.value.totalRevenue).toBe(123);
    expect(result.value.courtUsage[0]).toEqual({
      courtId: 'court-1',
      courtName: 'Central Court',
      reservationCount: 4,
      revenue: 93,
    });
    expect(result.value.totalReservationsMonth).toBe(4);
  });

  it('should round revenue to cents', async () => {
    await harness.repository.insert(
      makeReservation({ id: 'odd-1', date: '2026-10-02', paidPrice: 0.1 }),
    );
    await harness.repository.insert(
      makeReservation({
        id: 'odd-2',
        date: '2026-10-02',
        startTime: '10:00',
        endTime: '11:00',
        paidPrice: 0.2,
      }),
    );

    const result = await handler.execute(
      new GetReservationStatsQuery('2026-10-02', '2026-10-02'),
    );

    expect(result.ok ? result.value.totalRevenue : undefined).toBe(0.3);
  });

  it('should fall back to the court id for courts missing from the catalog', async () => {
    await harness.repository.insert(
      makeReservation({ id: 'retired', courtId: 'court-9', date: '2026-10-03' }),
    );

    const result = await handler.execute(
      new GetReservationStatsQuery('2026-10-03', '2026-10-03'),
    );

    expect(result.ok ? result.value.courtUsage : undefined).toEqual([
      {
        courtId: 'court-9',
        courtName: 'court-9',
        reservationCount: 1,
        revenue: 25,
      },
    ]);
  });

  it('should reject malformed range bounds', async () => {
    const result = await handler.execute(
      new GetReservationStatsQuery('yesterday'),
    );

    expect(result).toEqual({
      ok: false,
      error: {
        code: 'INVALID_FORMAT',
        field: 'fromDate',
        value: 'yesterday',
        message: 'Invalid fromDate "yesterday", expected YYYY-MM-DD',
      },
    });
  });
});
