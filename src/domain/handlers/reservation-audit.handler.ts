import { Logger } from '@nestjs/common';
import { EventsHandler, IEventHandler } from '@nestjs/cqrs';

import { ReservationCancelledEvent } from '../events/reservation-cancelled.event';
import { ReservationCreatedEvent } from '../events/reservation-created.event';
import { ReservationStatusChangedEvent } from '../events/reservation-status-changed.event';

export type ReservationAuditEvent =
  | ReservationCreatedEvent
  | ReservationCancelledEvent
  | ReservationStatusChangedEvent;

/** One audit line per persisted reservation change. */
@EventsHandler(
  ReservationCreatedEvent,
  ReservationCancelledEvent,
  ReservationStatusChangedEvent,
)
export class ReservationAuditHandler
  implements IEventHandler<ReservationAuditEvent>
{
  private readonly logger = new Logger(ReservationAuditHandler.name);

  handle(event: ReservationAuditEvent) {
    this.logger.log(auditLine(event));
  }
}

export function auditLine(event: ReservationAuditEvent): string {
  const { reservation } = event;

  if (event instanceof ReservationCancelledEvent) {
    return event.cancelledBy === 'admin'
      ? `Reservation ${reservation.id} cancelled by admin`
      : `Reservation ${reservation.id} cancelled by user ${reservation.userId}`;
  }

  if (event instanceof ReservationStatusChangedEvent) {
    return `Reservation ${reservation.id} status updated from ${event.previousStatus} to ${reservation.status}`;
  }

  return (
    `Reservation ${reservation.id} created by user ${reservation.userId} ` +
    `on court ${reservation.courtId} for ${reservation.date} ` +
    `${reservation.startTime}-${reservation.endTime} ` +
    `(price ${reservation.paidPrice.toFixed(2)})`
  );
}
