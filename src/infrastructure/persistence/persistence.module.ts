import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import {
  COURT_CATALOG,
  RESERVATION_REPOSITORY,
  USER_DIRECTORY,
} from '../../domain/tokens';
import { CatalogSeeder } from './catalog-seeder';
import { InMemoryCourtCatalog } from './in-memory-court-catalog';
import { InMemoryReservationRepository } from './in-memory-reservation.repository';
import { InMemoryUserDirectory } from './in-memory-user-directory';

@Module({
  imports: [ConfigModule],
  providers: [
    InMemoryCourtCatalog,
    InMemoryUserDirectory,
    InMemoryReservationRepository,
    CatalogSeeder,
    {
      provide: RESERVATION_REPOSITORY,
      useExisting: InMemoryReservationRepository,
    },
    {
      provide: COURT_CATALOG,
      useExisting: InMemoryCourtCatalog,
    },
    {
      provide: USER_DIRECTORY,
      useExisting: InMemoryUserDirectory,
    },
  ],
  exports: [
    RESERVATION_REPOSITORY,
    COURT_CATALOG,
    USER_DIRECTORY,
    InMemoryReservationRepository,
    InMemoryCourtCatalog,
    InMemoryUserDirectory,
  ],
})
export class PersistenceModule {}
