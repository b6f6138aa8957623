import { HttpException } from '@nestjs/common';
import { CommandBus, QueryBus } from '@nestjs/cqrs';
import { Test, TestingModule } from '@nestjs/testing';

import { makeReservation, TOMORROW } from '../../../test/utils/booking-fixtures';
import { CancelReservationCommand } from '../../domain/commands/cancel-reservation.command';
import { CreateReservationCommand } from '../../domain/commands/create-reservation.command';
import { BookingErrors } from '../../domain/errors/booking-error';
import { paginate } from '../../domain/model/page';
import { err, ok } from '../../domain/model/result';
import { ListUserReservationsQuery } from '../../domain/queries/list-user-reservations.query';
import { ReservationsController } from './reservations.controller';

describe('ReservationsController', () => {
  let controller: ReservationsController;
  let commandBus: { execute: jest.Mock };
  let queryBus: { execute: jest.Mock };

  beforeEach(async () => {
    commandBus = { execute: jest.fn() };
    queryBus = { execute: jest.fn() };

    const module: TestingModule = await Test.createTestingModule({
      controllers: [ReservationsController],
      providers: [
        { provide: CommandBus, useValue: commandBus },
        { provide: QueryBus, useValue: queryBus },
      ],
    }).compile();

    controller = module.get<ReservationsController>(ReservationsController);
  });

  it('should create a reservation for the calling user', async () => {
    const reservation = makeReservation();
    commandBus.execute.mockResolvedValue(ok(reservation));

    const created = await controller.create('user-1', {
      courtId: 'court-1',
      date: TOMORROW,
      startTime: '09:00',
      endTime: '10:00',
    });

    expect(created).toEqual(reservation);
    expect(commandBus.execute).toHaveBeenCalledWith(
      new CreateReservationCommand(
        'user-1',
        'court-1',
        TOMORROW,
        '09:00',
        '10:00',
        undefined,
      ),
    );
  });

  it('should turn a booking error into an HTTP exception', async () => {
    commandBus.execute.mockResolvedValue(err(BookingErrors.slotTaken()));

    const creating = controller.create('user-1', {
      courtId: 'court-1',
      date: TOMORROW,
      startTime: '09:00',
      endTime: '10:00',
    });

    await expect(creating).rejects.toBeInstanceOf(HttpException);
    await expect(creating).rejects.toMatchObject({ status: 409 });
  });

  it('should cancel on behalf of the calling user', async () => {
    commandBus.execute.mockResolvedValue(ok(makeReservation()));

    await controller.cancel('user-1', 'res-1');

    expect(commandBus.execute).toHaveBeenCalledWith(
      new CancelReservationCommand('user-1', 'res-1'),
    );
  });

  it('should list the calling user reservations', async () => {
    const page = paginate([makeReservation()], { page: 0, size: 10 });
    queryBus.execute.mockResolvedValue(page);

    await expect(controller.mine('user-1', { page: 0, size: 10 })).resolves.toBe(
      page,
    );
    expect(queryBus.execute).toHaveBeenCalledWith(
      new ListUserReservationsQuery('user-1', { page: 0, size: 10 }),
    );
  });
});
