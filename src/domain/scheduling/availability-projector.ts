import { Injectable } from '@nestjs/common';

import { Court } from '../model/court';
import { Reservation } from '../model/reservation';
import { DaySchedule, TimeSlot } from '../model/schedule';
import { addDays, formatMinutes } from '../utils/wall-clock';
import { findConflict } from './overlap-guard';
import { slotGridFor } from './slot-grid';

export const DAYS_PER_WEEK = 7;

@Injectable()
export class AvailabilityProjector {
  projectDay(
    court: Court,
    date: string,
    activeReservations: Reservation[],
  ): DaySchedule {
    const slots: TimeSlot[] = slotGridFor(court).map((slot) => {
      const occupying = findConflict(activeReservations, slot);
      return {
        startTime: formatMinutes(slot.start),
        endTime: formatMinutes(slot.end),
        available: occupying === undefined,
        ...(occupying && { occupyingReservationId: occupying.id }),
      };
    });

    return { date, courtId: court.id, courtName: court.name, slots };
  }

  /** Seven consecutive days starting at `startDate`, each projected on its own. */
  projectWeek(
    court: Court,
    startDate: string,
    reservationsByDate: ReadonlyMap<string, Reservation[]>,
  ): DaySchedule[] {
    return weekDates(startDate).map((date) =>
      this.projectDay(court, date, reservationsByDate.get(date) ?? []),
    );
  }
}

export const weekDates = (startDate: string): string[] =>
  Array.from({ length: DAYS_PER_WEEK }, (_, offset) =>
    addDays(startDate, offset),
  );
