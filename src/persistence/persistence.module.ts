import { Module } from '@nestjs/common';

import { PersistenceService } from './persistence.service';

/**
 * Persistence Module
 *
 * Stores users, teams and daily reports as JSON documents.
 */
@Module({
  imports: [],
  providers: [PersistenceService],
  exports: [PersistenceService],
})
export class PersistenceModule {}
