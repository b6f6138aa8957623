import { Injectable } from '@nestjs/common';

import { Court } from '../../domain/model/court';
import { CourtCatalog } from '../../domain/ports/court-catalog';
import { CourtInput, CourtSchema } from './catalog.schema';

@Injectable()
export class InMemoryCourtCatalog implements CourtCatalog {
  private readonly courts = new Map<string, Court>();

  async findById(courtId: string): Promise<Court | null> {
    const court = this.courts.get(courtId);
    return court ? { ...court } : null;
  }

  /** Validates and stores (or replaces) a court published by the catalog owner. */
  register(input: CourtInput): Court {
    const court: Court = CourtSchema.parse(input);
    this.courts.set(court.id, court);
    return { ...court };
  }
}
