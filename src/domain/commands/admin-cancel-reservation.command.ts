export class AdminCancelReservationCommand {
  constructor(readonly reservationId: string) {}
}
