import { createZodDto } from 'nestjs-zod';
import { z } from 'zod';

import {
  DEFAULT_PAGE_REQUEST,
  MAX_PAGE_SIZE,
} from '../../domain/model/page';

// Formats are checked by the domain so that malformed dates and times
// surface as INVALID_FORMAT rather than a generic validation error.
const CreateReservationSchema = z.object({
  courtId: z.string().min(1, 'Court ID is required'),
  date: z.string().min(1, 'Date is required'),
  startTime: z.string().min(1, 'Start time is required'),
  endTime: z.string().min(1, 'End time is required'),
  notes: z.string().max(500).optional(),
});

export class CreateReservationDTO extends createZodDto(
  CreateReservationSchema,
) {}

const PageSchema = z.object({
  page: z.coerce.number().int().min(0).default(DEFAULT_PAGE_REQUEST.page),
  size: z.coerce
    .number()
    .int()
    .min(1)
    .max(MAX_PAGE_SIZE)
    .default(DEFAULT_PAGE_REQUEST.size),
});

export class PageDTO extends createZodDto(PageSchema) {}

const ReservationSearchSchema = PageSchema.extend({
  courtId: z.string().min(1).optional(),
  date: z.string().min(1).optional(),
  status: z.string().min(1).optional(),
});

export class ReservationSearchDTO extends createZodDto(
  ReservationSearchSchema,
) {}

const DayScheduleSchema = z.object({
  date: z.string().min(1, 'Date is required'),
});

export class DayScheduleDTO extends createZodDto(DayScheduleSchema) {}

const WeekScheduleSchema = z.object({
  startDate: z.string().min(1, 'Start date is required'),
});

export class WeekScheduleDTO extends createZodDto(WeekScheduleSchema) {}

const StatusUpdateSchema = z.object({
  status: z.string().min(1, 'Status is required'),
});

export class StatusUpdateDTO extends createZodDto(StatusUpdateSchema) {}

const StatsRangeSchema = z.object({
  fromDate: z.string().min(1).optional(),
  toDate: z.string().min(1).optional(),
});

export class StatsRangeDTO extends createZodDto(StatsRangeSchema) {}
