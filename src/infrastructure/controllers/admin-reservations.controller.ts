import {
  Body,
  Controller,
  Delete,
  Get,
  Param,
  Put,
  Query,
  UseGuards,
  UsePipes,
} from '@nestjs/common';
import { CommandBus, QueryBus } from '@nestjs/cqrs';
import { ZodValidationPipe } from 'nestjs-zod';

import { AdminCancelReservationCommand } from '../../domain/commands/admin-cancel-reservation.command';
import { ReservationResult } from '../../domain/commands/create-reservation.command';
import { UpdateReservationStatusCommand } from '../../domain/commands/update-reservation-status.command';
import { Page } from '../../domain/model/page';
import { Reservation } from '../../domain/model/reservation';
import { ReservationStats } from '../../domain/model/stats';
import {
  GetReservationStatsQuery,
  ReservationStatsResult,
} from '../../domain/queries/get-reservation-stats.query';
import {
  ListReservationsQuery,
  ReservationPageResult,
} from '../../domain/queries/list-reservations.query';
import { AdminGuard } from '../http/admin.guard';
import { unwrap } from '../http/booking-error.mapper';
import {
  ReservationSearchDTO,
  StatsRangeDTO,
  StatusUpdateDTO,
} from '../http/dto';

@Controller('admin')
@UseGuards(AdminGuard)
@UsePipes(ZodValidationPipe)
export class AdminReservationsController {
  constructor(
    private readonly commandBus: CommandBus,
    private readonly queryBus: QueryBus,
  ) {}

  @Get('reservations')
  async list(@Query() query: ReservationSearchDTO): Promise<Page<Reservation>> {
    const result = await this.queryBus.execute<
      ListReservationsQuery,
      ReservationPageResult
    >(
      new ListReservationsQuery(
        { courtId: query.courtId, date: query.date, status: query.status },
        { page: query.page, size: query.size },
      ),
    );
    return unwrap(result);
  }

  @Delete('reservations/:id')
  async cancel(@Param('id') reservationId: string): Promise<Reservation> {
    const result = await this.commandBus.execute<
      AdminCancelReservationCommand,
      ReservationResult
    >(new AdminCancelReservationCommand(reservationId));
    return unwrap(result);
  }

  @Put('reservations/:id/status')
  async updateStatus(
    @Param('id') reservationId: string,
    @Body() body: StatusUpdateDTO,
  ): Promise<Reservation> {
    const result = await this.commandBus.execute<
      UpdateReservationStatusCommand,
      ReservationResult
    >(new UpdateReservationStatusCommand(reservationId, body.status));
    return unwrap(result);
  }

  @Get('dashboard/stats')
  async stats(@Query() query: StatsRangeDTO): Promise<ReservationStats> {
    const result = await this.queryBus.execute<
      GetReservationStatsQuery,
      ReservationStatsResult
    >(new GetReservationStatsQuery(query.fromDate, query.toDate));
    return unwrap(result);
  }
}
