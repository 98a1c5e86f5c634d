import { Module } from '@nestjs/common';
import { IngestionModule } from '../ingestion/ingestion.module';
import { AnalysisController } from './analysis.controller';
import { AnalysisService } from './analysis.service';
import { AnalysisResultStore } from './analysis-result.store';

/**
 * AnalysisModule
 *
 * Merges, aggregates and normalizes a loaded batch.
 *
 * Components:
 * - AnalysisService: Runs the pipeline and returns an AnalysisResult
 * - AnalysisController: Upload and read endpoints
 * - AnalysisResultStore: Keeps the last result (upload or processing cycle)
 *   for the read endpoints
 */
@Module({
  imports: [IngestionModule],
  controllers: [AnalysisController],
  providers: [AnalysisService, AnalysisResultStore],
  exports: [AnalysisService, AnalysisResultStore],
})
export class AnalysisModule {}
