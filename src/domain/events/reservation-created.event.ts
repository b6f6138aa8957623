import { Reservation } from '../model/reservation';

export class ReservationCreatedEvent {
  constructor(readonly reservation: Reservation) {}
}
