import {
  Body,
  Controller,
  Delete,
  Get,
  Logger,
  Param,
  Post,
  Query,
  UsePipes,
} from '@nestjs/common';
import { CommandBus, QueryBus } from '@nestjs/cqrs';
import { ZodValidationPipe } from 'nestjs-zod';

import { CancelReservationCommand } from '../../domain/commands/cancel-reservation.command';
import {
  CreateReservationCommand,
  ReservationResult,
} from '../../domain/commands/create-reservation.command';
import { Page } from '../../domain/model/page';
import { Reservation } from '../../domain/model/reservation';
import { ListUserReservationsQuery } from '../../domain/queries/list-user-reservations.query';
import { unwrap } from '../http/booking-error.mapper';
import { CurrentUserId } from '../http/current-user.decorator';
import { CreateReservationDTO, PageDTO } from '../http/dto';

@Controller('reservations')
@UsePipes(ZodValidationPipe)
export class ReservationsController {
  private readonly logger = new Logger(ReservationsController.name);

  constructor(
    private readonly commandBus: CommandBus,
    private readonly queryBus: QueryBus,
  ) {}

  @Post()
  async create(
    @CurrentUserId() userId: string,
    @Body() body: CreateReservationDTO,
  ): Promise<Reservation> {
    this.logger.debug(
      `User ${userId} requests court ${body.courtId} on ${body.date} ${body.startTime}-${body.endTime}`,
    );

    const result = await this.commandBus.execute<
      CreateReservationCommand,
      ReservationResult
    >(
      new CreateReservationCommand(
        userId,
        body.courtId,
        body.date,
        body.startTime,
        body.endTime,
        body.notes,
      ),
    );
    return unwrap(result);
  }

  @Delete(':id')
  async cancel(
    @CurrentUserId() userId: string,
    @Param('id') reservationId: string,
  ): Promise<Reservation> {
    const result = await this.commandBus.execute<
      CancelReservationCommand,
      ReservationResult
    >(new CancelReservationCommand(userId, reservationId));
    return unwrap(result);
  }

  @Get('me')
  mine(
    @CurrentUserId() userId: string,
    @Query() query: PageDTO,
  ): Promise<Page<Reservation>> {
    return this.queryBus.execute<ListUserReservationsQuery, Page<Reservation>>(
      new ListUserReservationsQuery(userId, {
        page: query.page,
        size: query.size,
      }),
    );
  }
}
