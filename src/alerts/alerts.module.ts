import { Module } from '@nestjs/common';
import { AlertsController } from './alerts.controller';
import { AlertLogRepository } from './alert-log.repository';
import { AlertLogService } from './alert-log.service';

/**
 * AlertsModule
 *
 * Keeps the rolling log of high-scintillation records.
 *
 * Components:
 * - AlertLogService: Append/replace state machine with the 60-day freshness rule
 * - AlertLogRepository: Atomic CSV persistence of the log
 * - AlertsController: Read endpoint for the current log
 */
@Module({
  controllers: [AlertsController],
  providers: [AlertLogService, AlertLogRepository],
  exports: [AlertLogService],
})
export class AlertsModule {}
