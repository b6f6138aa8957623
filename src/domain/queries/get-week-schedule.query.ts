import { BookingError } from '../errors/booking-error';
import { Result } from '../model/result';
import { DaySchedule } from '../model/schedule';

export type WeekScheduleResult = Result<DaySchedule[], BookingError>;

export class GetWeekScheduleQuery {
  constructor(readonly courtId: string, readonly startDate: string) {}
}
