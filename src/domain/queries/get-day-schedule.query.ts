import { BookingError } from '../errors/booking-error';
import { Result } from '../model/result';
import { DaySchedule } from '../model/schedule';

export type DayScheduleResult = Result<DaySchedule, BookingError>;

export class GetDayScheduleQuery {
  constructor(readonly courtId: string, readonly date: string) {}
}
