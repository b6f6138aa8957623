export class CancelReservationCommand {
  constructor(readonly userId: string, readonly reservationId: string) {}
}
