import { readFile } from 'fs/promises';

import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { CatalogSeedSchema } from './catalog.schema';
import { InMemoryCourtCatalog } from './in-memory-court-catalog';
import { InMemoryUserDirectory } from './in-memory-user-directory';

export const CATALOG_SEED_FILE = 'CATALOG_SEED_FILE';

/**
 * Fills the in-process court catalog and user directory from a JSON file
 * when `CATALOG_SEED_FILE` is set.
 */
@Injectable()
export class CatalogSeeder implements OnModuleInit {
  private readonly logger = new Logger(CatalogSeeder.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly courtCatalog: InMemoryCourtCatalog,
    private readonly userDirectory: InMemoryUserDirectory,
  ) {}

  async onModuleInit() {
    const seedFile = this.configService.get<string>(CATALOG_SEED_FILE);
    if (!seedFile) {
      this.logger.debug('No catalog seed file configured');
      return;
    }

    await this.seedFrom(seedFile);
  }

  async seedFrom(seedFile: string): Promise<void> {
    const raw: unknown = JSON.parse(await readFile(seedFile, 'utf8'));
    const seed = CatalogSeedSchema.parse(raw);

    seed.courts.forEach((court) => this.courtCatalog.register(court));
    seed.users.forEach((user) => this.userDirectory.register(user));

    this.logger.log(
      `Seeded ${seed.courts.length} courts and ${seed.users.length} users from ${seedFile}`,
    );
  }
}
