import { Injectable, Logger } from '@nestjs/common';

import { paginate, Page, PageRequest } from '../../domain/model/page';
import {
  isActive,
  Reservation,
  ReservationStatus,
} from '../../domain/model/reservation';
import {
  ReservationFilters,
  ReservationRepository,
  WriteOutcome,
} from '../../domain/ports/reservation.repository';
import { findConflict, intervalOf } from '../../domain/scheduling/overlap-guard';

const newestFirst = (a: Reservation, b: Reservation): number =>
  b.date.localeCompare(a.date) ||
  b.startTime.localeCompare(a.startTime) ||
  b.createdAt.localeCompare(a.createdAt);

/**
 * Process-local reservation store. Every write checks the CONFIRMED-overlap
 * exclusion synchronously before mutating, so no other write can interleave
 * between the check and the change.
 */
@Injectable()
export class InMemoryReservationRepository implements ReservationRepository {
  private readonly logger = new Logger(InMemoryReservationRepository.name);
  private readonly rows = new Map<string, Reservation>();

  async findById(id: string): Promise<Reservation | null> {
    const row = this.rows.get(id);
    return row ? { ...row } : null;
  }

  async insert(reservation: Reservation): Promise<WriteOutcome> {
    if (this.rows.has(reservation.id)) {
      throw new Error(`Duplicate reservation id ${reservation.id}`);
    }
    if (this.violatesExclusion(reservation)) {
      this.logger.warn(
        `Rejected overlapping insert on court ${reservation.courtId} for ${reservation.date} ${reservation.startTime}-${reservation.endTime}`,
      );
      return 'conflict';
    }

    this.rows.set(reservation.id, { ...reservation });
    return 'written';
  }

  async update(reservation: Reservation): Promise<WriteOutcome> {
    if (!this.rows.has(reservation.id)) {
      throw new Error(`Reservation ${reservation.id} is not stored`);
    }
    if (this.violatesExclusion(reservation)) {
      this.logger.warn(
        `Rejected overlapping update of reservation ${reservation.id}`,
      );
      return 'conflict';
    }

    this.rows.set(reservation.id, { ...reservation });
    return 'written';
  }

  async findActiveByCourtAndDate(
    courtId: string,
    date: string,
  ): Promise<Reservation[]> {
    return this.select(
      (row) => row.courtId === courtId && row.date === date && isActive(row),
    ).sort((a, b) => a.startTime.localeCompare(b.startTime));
  }

  async countFutureConfirmedByUser(
    userId: string,
    today: string,
    nowTime: string,
  ): Promise<number> {
    return this.select(
      (row) =>
        row.userId === userId &&
        isActive(row) &&
        (row.date > today || (row.date === today && row.startTime > nowTime)),
    ).length;
  }

  async findByUser(
    userId: string,
    page: PageRequest,
  ): Promise<Page<Reservation>> {
    return paginate(
      this.select((row) => row.userId === userId).sort(newestFirst),
      page,
    );
  }

  async search(
    filters: ReservationFilters,
    page: PageRequest,
  ): Promise<Page<Reservation>> {
    return paginate(
      this.select(
        (row) =>
          (filters.courtId === undefined || row.courtId === filters.courtId) &&
          (filters.date === undefined || row.date === filters.date) &&
          (filters.status === undefined || row.status === filters.status),
      ).sort(newestFirst),
      page,
    );
  }

  async findInDateRange(
    from: string,
    to: string,
    statuses: ReservationStatus[],
  ): Promise<Reservation[]> {
    return this.select(
      (row) =>
        row.date >= from && row.date <= to && statuses.includes(row.status),
    );
  }

  private violatesExclusion(reservation: Reservation): boolean {
    if (!isActive(reservation)) {
      return false;
    }
    const sameCourtAndDate = this.select(
      (row) =>
        row.courtId === reservation.courtId && row.date === reservation.date,
    );
    return (
      findConflict(
        sameCourtAndDate,
        intervalOf(reservation),
        reservation.id,
      ) !== undefined
    );
  }

  private select(predicate: (row: Reservation) => boolean): Reservation[] {
    const selected: Reservation[] = [];
    for (const row of this.rows.values()) {
      if (predicate(row)) {
        selected.push({ ...row });
      }
    }
    return selected;
  }
}
