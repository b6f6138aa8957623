import { Reservation, ReservationStatus } from '../model/reservation';

export class ReservationStatusChangedEvent {
  constructor(
    readonly reservation: Reservation,
    readonly previousStatus: ReservationStatus,
  ) {}
}
