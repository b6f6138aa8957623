import { ConfigService } from '@nestjs/config';

export interface BookingConfig {
  /** Future CONFIRMED reservations a single user may hold at once */
  maxFutureReservations: number;
  /** Minimum lead time before the start at which a user may still cancel */
  cancellationDeadlineHours: number;
}

export const DEFAULT_BOOKING_CONFIG: BookingConfig = {
  maxFutureReservations: 5,
  cancellationDeadlineHours: 2,
};

export const BOOKING_CONFIG_KEYS = {
  MAX_FUTURE_RESERVATIONS: 'BOOKING_MAX_FUTURE_RESERVATIONS',
  CANCELLATION_DEADLINE_HOURS: 'BOOKING_CANCELLATION_DEADLINE_HOURS',
} as const;

export const BOOKING_CONFIG = 'BOOKING_CONFIG';

/**
 * Environment values arrive as strings; anything that is not a
 * non-negative finite number falls back to the default.
 */
export const readNumber = (
  configService: ConfigService,
  key: string,
  fallback: number,
): number => {
  const raw = configService.get<string | number>(key);
  if (raw === undefined || raw === null || raw === '') {
    return fallback;
  }
  const value = Number(raw);
  return Number.isFinite(value) && value >= 0 ? value : fallback;
};

export const getBookingConfig = (
  configService: ConfigService,
): BookingConfig => {
  return {
    maxFutureReservations: Math.floor(
      readNumber(
        configService,
        BOOKING_CONFIG_KEYS.MAX_FUTURE_RESERVATIONS,
        DEFAULT_BOOKING_CONFIG.maxFutureReservations,
      ),
    ),
    cancellationDeadlineHours: readNumber(
      configService,
      BOOKING_CONFIG_KEYS.CANCELLATION_DEADLINE_HOURS,
      DEFAULT_BOOKING_CONFIG.cancellationDeadlineHours,
    ),
  };
};
