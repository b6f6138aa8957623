import { Controller, Get, Param, Query, UsePipes } from '@nestjs/common';
import { QueryBus } from '@nestjs/cqrs';
import { ZodValidationPipe } from 'nestjs-zod';

import { DaySchedule } from '../../domain/model/schedule';
import {
  DayScheduleResult,
  GetDayScheduleQuery,
} from '../../domain/queries/get-day-schedule.query';
import {
  GetWeekScheduleQuery,
  WeekScheduleResult,
} from '../../domain/queries/get-week-schedule.query';
import { unwrap } from '../http/booking-error.mapper';
import { DayScheduleDTO, WeekScheduleDTO } from '../http/dto';

/** Public, read-only availability views. */
@Controller('courts/:courtId')
@UsePipes(ZodValidationPipe)
export class ScheduleController {
  constructor(private readonly queryBus: QueryBus) {}

  @Get('schedule')
  async day(
    @Param('courtId') courtId: string,
    @Query() query: DayScheduleDTO,
  ): Promise<DaySchedule> {
    const result = await this.queryBus.execute<
      GetDayScheduleQuery,
      DayScheduleResult
    >(new GetDayScheduleQuery(courtId, query.date));
    return unwrap(result);
  }

  @Get('week-schedule')
  async week(
    @Param('courtId') courtId: string,
    @Query() query: WeekScheduleDTO,
  ): Promise<DaySchedule[]> {
    const result = await this.queryBus.execute<
      GetWeekScheduleQuery,
      WeekScheduleResult
    >(new GetWeekScheduleQuery(courtId, query.startDate));
    return unwrap(result);
  }
}
