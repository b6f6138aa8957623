export class UpdateReservationStatusCommand {
  constructor(
    readonly reservationId: string,
    /** Raw status value, matched case-insensitively */
    readonly status: string,
  ) {}
}
