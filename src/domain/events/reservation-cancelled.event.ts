import { Reservation } from '../model/reservation';

export type CancelledBy = 'owner' | 'admin';

export class ReservationCancelledEvent {
  constructor(
    readonly reservation: Reservation,
    readonly cancelledBy: CancelledBy,
  ) {}
}
