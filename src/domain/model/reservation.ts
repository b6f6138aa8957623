import { err, ok, Result } from './result';

export enum ReservationStatus {
  CONFIRMED = 'CONFIRMED',
  CANCELLED = 'CANCELLED',
  COMPLETED = 'COMPLETED',
}

export interface Reservation {
  id: string;
  userId: string;
  courtId: string;
  /** `YYYY-MM-DD` */
  date: string;
  /** `HH:mm`, inclusive */
  startTime: string;
  /** `HH:mm`, exclusive */
  endTime: string;
  status: ReservationStatus;
  paidPrice: number;
  notes?: string;
  createdAt: string;
  updatedAt: string;
}

export interface UnknownStatus {
  code: 'UNKNOWN_STATUS';
  value: string;
}

const STATUSES: ReadonlyMap<string, ReservationStatus> = new Map(
  Object.values(ReservationStatus).map((status) => [status, status]),
);

export function parseReservationStatus(
  value: string,
): Result<ReservationStatus, UnknownStatus> {
  const status = STATUSES.get(value.trim().toUpperCase());
  return status ? ok(status) : err({ code: 'UNKNOWN_STATUS', value });
}

export const isActive = (reservation: Reservation): boolean =>
  reservation.status === ReservationStatus.CONFIRMED;
