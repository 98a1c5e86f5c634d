import { Module } from '@nestjs/common';
import { AnalysisModule } from '../analysis/analysis.module';
import { AlertsModule } from '../alerts/alerts.module';
import { ProcessingCycleService } from './processing-cycle.service';
import { ProcessingScheduler } from './processing.scheduler';

/**
 * ProcessingModule
 *
 * Periodic batch driver: reads the matrices from the data folder, analyses
 * them, writes the normalized output and updates the alert log.
 */
@Module({
  imports: [AnalysisModule, AlertsModule],
  providers: [ProcessingCycleService, ProcessingScheduler],
  exports: [ProcessingCycleService],
})
export class ProcessingModule {}
