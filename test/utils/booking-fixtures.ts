import {
  BookingConfig,
  DEFAULT_BOOKING_CONFIG,
} from '../../src/infrastructure/config/booking.config';
import { Court, CourtStatus } from '../../src/domain/model/court';
import {
  Reservation,
  ReservationStatus,
} from '../../src/domain/model/reservation';
import { Clock } from '../../src/domain/ports/clock';

/** Sunday 2026-10-18, 10:00 local time */
export const NOW = new Date(2026, 9, 18, 10, 0, 0);
export const TODAY = '2026-10-18';
export const TOMORROW = '2026-10-19';
export const YESTERDAY = '2026-10-17';

export class FixedClock implements Clock {
  constructor(private current: Date = NOW) {}

  now(): Date {
    return new Date(this.current.getTime());
  }

  set(instant: Date): void {
    this.current = instant;
  }
}

export function makeCourt(overrides: Partial<Court> = {}): Court {
  return {
    id: 'court-1',
    name: 'Central Court',
    status: CourtStatus.ACTIVE,
    openingTime: '08:00',
    closingTime: '22:00',
    slotDurationMinutes: 60,
    basePrice: 25,
    memberPrice: 18,
    ...overrides,
  };
}

export function makeReservation(
  overrides: Partial<Reservation> = {},
): Reservation {
  return {
    id: 'res-1',
    userId: 'user-1',
    courtId: 'court-1',
    date: TOMORROW,
    startTime: '09:00',
    endTime: '10:00',
    status: ReservationStatus.CONFIRMED,
    paidPrice: 25,
    createdAt: NOW.toISOString(),
    updatedAt: NOW.toISOString(),
    ...overrides,
  };
}

export function makeBookingConfig(
  overrides: Partial<BookingConfig> = {},
): BookingConfig {
  return { ...DEFAULT_BOOKING_CONFIG, ...overrides };
}
