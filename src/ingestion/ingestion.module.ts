import { Module } from '@nestjs/common';
import { IngestionService } from './ingestion.service';
import { MatrixCsvParser } from './strategies/matrix-csv.strategy';

/**
 * IngestionModule
 *
 * Loads the latitude, longitude and S4C matrices of a batch.
 *
 * Components:
 * - IngestionService: Loads a batch, derives active satellites, reports misalignment
 * - MatrixCsvParser: Strategy for timestamp x satellite matrix CSV files
 */
@Module({
  providers: [IngestionService, MatrixCsvParser],
  exports: [IngestionService],
})
export class IngestionModule {}
