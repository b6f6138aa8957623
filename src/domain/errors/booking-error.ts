import { ReservationStatus } from '../model/reservation';

export enum PolicyViolationReason {
  COURT_UNAVAILABLE = 'COURT_UNAVAILABLE',
  INVALID_TIME_ORDER = 'INVALID_TIME_ORDER',
  PAST_DATE = 'PAST_DATE',
  BEFORE_OPENING = 'BEFORE_OPENING',
  AFTER_CLOSING = 'AFTER_CLOSING',
  QUOTA_EXCEEDED = 'QUOTA_EXCEEDED',
}

export type NotFoundResource = 'user' | 'court' | 'reservation';

export type BookingError =
  | { code: 'NOT_FOUND'; resource: NotFoundResource; id: string; message: string }
  | { code: 'INVALID_FORMAT'; field: string; value: string; message: string }
  | { code: 'POLICY_VIOLATION'; reason: PolicyViolationReason; message: string }
  | { code: 'SLOT_TAKEN'; message: string }
  | { code: 'FORBIDDEN'; message: string }
  | { code: 'INVALID_STATE'; status: ReservationStatus; message: string }
  | { code: 'DEADLINE_PASSED'; deadlineHours: number; message: string }
  | { code: 'INVALID_STATUS'; value: string; message: string }
  | { code: 'LOCK_TIMEOUT'; message: string };

export type BookingErrorCode = BookingError['code'];

export type PolicyViolation = Extract<BookingError, { code: 'POLICY_VIOLATION' }>;

export const BookingErrors = {
  notFound: (resource: NotFoundResource, id: string): BookingError => ({
    code: 'NOT_FOUND',
    resource,
    id,
    message: `The ${resource} ${id} does not exist`,
  }),

  invalidFormat: (field: string, value: string, pattern: string): BookingError => ({
    code: 'INVALID_FORMAT',
    field,
    value,
    message: `Invalid ${field} "${value}", expected ${pattern}`,
  }),

  policy: (reason: PolicyViolationReason, message: string): PolicyViolation => ({
    code: 'POLICY_VIOLATION',
    reason,
    message,
  }),

  slotTaken: (): BookingError => ({
    code: 'SLOT_TAKEN',
    message: 'The selected slot overlaps an existing reservation',
  }),

  forbidden: (message = 'You are not allowed to modify this reservation'): BookingError => ({
    code: 'FORBIDDEN',
    message,
  }),

  invalidState: (status: ReservationStatus): BookingError => ({
    code: 'INVALID_STATE',
    status,
    message: `Only confirmed reservations can be cancelled (current status: ${status})`,
  }),

  deadlinePassed: (deadlineHours: number): BookingError => ({
    code: 'DEADLINE_PASSED',
    deadlineHours,
    message: `Reservations cannot be cancelled less than ${deadlineHours} hours before the start`,
  }),

  invalidStatus: (value: string): BookingError => ({
    code: 'INVALID_STATUS',
    value,
    message: `Invalid reservation status: ${value}`,
  }),

  lockTimeout: (): BookingError => ({
    code: 'LOCK_TIMEOUT',
    message: 'The court is busy with another booking, please retry',
  }),
};
