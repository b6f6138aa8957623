import { Test, TestingModule } from '@nestjs/testing';

import { makeReservation } from '../../../test/utils/booking-fixtures';
import { ReservationStatus } from '../model/reservation';
import { ReservationRepository } from '../ports/reservation.repository';
import { RESERVATION_REPOSITORY } from '../tokens';
import { findConflict, OverlapGuard, overlaps } from './overlap-guard';

describe('overlaps', () => {
  it('should detect intervals that share time', () => {
    expect(overlaps({ start: 540, end: 600 }, { start: 570, end: 630 })).toBe(
      true,
    );
    expect(overlaps({ start: 540, end: 660 }, { start: 570, end: 600 })).toBe(
      true,
    );
  });

  it('should treat touching intervals as disjoint', () => {
    expect(overlaps({ start: 540, end: 600 }, { start: 600, end: 660 })).toBe(
      false,
    );
    expect(overlaps({ start: 600, end: 660 }, { start: 540, end: 600 })).toBe(
      false,
    );
  });
});

describe('findConflict', () => {
  it('should ignore reservations that are not confirmed', () => {
    const cancelled = makeReservation({ status: ReservationStatus.CANCELLED });

    expect(findConflict([cancelled], { start: 540, end: 600 })).toBeUndefined();
  });

  it('should skip the excluded reservation', () => {
    const own = makeReservation({ id: 'res-own' });

    expect(
      findConflict([own], { start: 540, end: 600 }, 'res-own'),
    ).toBeUndefined();
    expect(findConflict([own], { start: 540, end: 600 })).toBe(own);
  });
});

describe('OverlapGuard', () => {
  let guard: OverlapGuard;
  let repository: jest.Mocked<
    Pick<ReservationRepository, 'findActiveByCourtAndDate'>
  >;

  beforeEach(async () => {
    repository = {
      findActiveByCourtAndDate: jest
        .fn()
        .mockResolvedValue([
          makeReservation({ id: 'res-9', startTime: '09:00', endTime: '10:00' }),
        ]),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        OverlapGuard,
        { provide: RESERVATION_REPOSITORY, useValue: repository },
      ],
    }).compile();

    guard = module.get<OverlapGuard>(OverlapGuard);
  });

  it('should read the active reservations of the court and date', async () => {
    await guard.hasConflict('court-1', '2026-10-19', 600, 660);

    expect(repository.findActiveByCourtAndDate).toHaveBeenCalledWith(
      'court-1',
      '2026-10-19',
    );
  });

  it('should allow a slot adjacent to an existing reservation', async () => {
    await expect(
      guard.hasConflict('court-1', '2026-10-19', 600, 660),
    ).resolves.toBe(false);
  });

  it('should report a partial overlap', async () => {
    await expect(
      guard.hasConflict('court-1', '2026-10-19', 570, 630),
    ).resolves.toBe(true);
  });

  it('should ignore the reservation being re-validated', async () => {
    await expect(
      guard.hasConflict('court-1', '2026-10-19', 540, 600, 'res-9'),
    ).resolves.toBe(false);
  });
});
