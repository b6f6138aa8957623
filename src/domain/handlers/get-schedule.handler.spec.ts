import {
  makeCourt,
  makeReservation,
  TOMORROW,
} from '../../../test/utils/booking-fixtures';
import {
  BookingHarness,
  createBookingHarness,
} from '../../../test/utils/booking-harness';
import { CourtStatus } from '../model/court';
import { ReservationStatus } from '../model/reservation';
import { GetDayScheduleQuery } from '../queries/get-day-schedule.query';
import { GetWeekScheduleQuery } from '../queries/get-week-schedule.query';
import { GetDayScheduleHandler } from './get-day-schedule.handler';
import { GetWeekScheduleHandler } from './get-week-schedule.handler';

describe('Schedule query handlers', () => {
  let harness: BookingHarness;
  let dayHandler: GetDayScheduleHandler;
  let weekHandler: GetWeekScheduleHandler;

  beforeEach(async () => {
    harness = await createBookingHarness([
      GetDayScheduleHandler,
      GetWeekScheduleHandler,
    ]);
    dayHandler = harness.module.get(GetDayScheduleHandler);
    weekHandler = harness.module.get(GetWeekScheduleHandler);

    await harness.repository.insert(makeReservation());
    await harness.repository.insert(
      makeReservation({
        id: 'res-cancelled',
        startTime: '12:00',
        endTime: '13:00',
        status: ReservationStatus.CANCELLED,
      }),
    );
  });

  describe('GetDayScheduleHandler', () => {
    it('should mark only slots covered by active reservations', async () => {
      const result = await dayHandler.execute(
        new GetDayScheduleQuery('court-1', TOMORROW),
      );
      if (!result.ok) {
        throw new Error(result.error.message);
      }

      const { slots } = result.value;
      expect(result.value.courtName).toBe('Central Court');
      expect(slots).toHaveLength(14);
      expect(slots[1]).toEqual({
        startTime: '09:00',
        endTime: '10:00',
        available: false,
        occupyingReservationId: 'res-1',
      });
      expect(slots[4]).toEqual({
        startTime: '12:00',
        endTime: '13:00',
        available: true,
      });
      expect(slots.filter((slot) => !slot.available)).toHaveLength(1);
    });

    it('should return the same projection when asked twice', async () => {
      const query = new GetDayScheduleQuery('court-1', TOMORROW);

      const first = await dayHandler.execute(query);
      const second = await dayHandler.execute(query);

      expect(second).toEqual(first);
    });

    it('should reflect a new reservation immediately', async () => {
      await harness.repository.insert(
        makeReservation({ id: 'res-2', startTime: '20:00', endTime: '21:00' }),
      );

      const result = await dayHandler.execute(
        new GetDayScheduleQuery('court-1', TOMORROW),
      );

      expect(result.ok ? result.value.slots[12].available : undefined).toBe(
        false,
      );
    });

    it('should project courts under maintenance as well', async () => {
      harness.catalog.register(
        makeCourt({ id: 'court-2', status: CourtStatus.MAINTENANCE }),
      );

      const result = await dayHandler.execute(
        new GetDayScheduleQuery('court-2', TOMORROW),
      );

      expect(result.ok ? result.value.slots.every((s) => s.available) : false).toBe(
        true,
      );
    });

    it('should report unknown courts and malformed dates', async () => {
      const missing = await dayHandler.execute(
        new GetDayScheduleQuery('court-9', TOMORROW),
      );
      const malformed = await dayHandler.execute(
        new GetDayScheduleQuery('court-1', '19/10/2026'),
      );

      expect(missing.ok ? undefined : missing.error.code).toBe('NOT_FOUND');
      expect(malformed.ok ? undefined : malformed.error).toMatchObject({
        code: 'INVALID_FORMAT',
        field: 'date',
      });
    });
  });

  describe('GetWeekScheduleHandler', () => {
    it('should project seven consecutive days', async () => {
      const result = await weekHandler.execute(
        new GetWeekScheduleQuery('court-1', TOMORROW),
      );
      if (!result.ok) {
        throw new Error(result.error.message);
      }

      expect(result.value.map((day) => day.date)).toEqual([
        '2026-10-19',
        '2026-10-20',
        '2026-10-21',
        '2026-10-22',
        '2026-10-23',
        '2026-10-24',
        '2026-10-25',
      ]);
      expect(result.value[0].slots[1].available).toBe(false);
      expect(
        result.value
          .slice(1)
          .every((day) => day.slots.every((slot) => slot.available)),
      ).toBe(true);
    });

    it('should cross month boundaries', async () => {
      const result = await weekHandler.execute(
        new GetWeekScheduleQuery('court-1', '2026-10-28'),
      );

      expect(result.ok ? result.value[6].date : undefined).toBe('2026-11-03');
    });

    it('should name the start date field on malformed input', async () => {
      const result = await weekHandler.execute(
        new GetWeekScheduleQuery('court-1', 'next monday'),
      );

      expect(result.ok ? undefined : result.error).toMatchObject({
        code: 'INVALID_FORMAT',
        field: 'startDate',
      });
    });
  });
});
