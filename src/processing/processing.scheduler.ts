import {
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import cron, { ScheduledTask } from 'node-cron';
import { AppConfig } from '../config/env.validation';
import { CycleResult, ProcessingCycleService } from './processing-cycle.service';

/**
 * ProcessingScheduler - Runs the processing cycle on a cron schedule
 *
 * Disabled unless PROCESSING_ENABLED is set. When enabled, one cycle runs
 * at startup (PROCESSING_RUN_ON_START) and then every PROCESSING_CRON tick.
 * Overlapping ticks are skipped by the cycle's run lock.
 */
@Injectable()
export class ProcessingScheduler
  implements OnApplicationBootstrap, OnApplicationShutdown
{
  private readonly logger = new Logger(ProcessingScheduler.name);
  private task: ScheduledTask | null = null;
  private initialRun: Promise<CycleResult> | null = null;

  constructor(
    private readonly cycleService: ProcessingCycleService,
    private readonly configService: ConfigService<AppConfig, true>,
  ) {}

  onApplicationBootstrap(): void {
    if (!this.configService.get('PROCESSING_ENABLED', { infer: true })) {
      this.logger.log('Scheduled processing disabled (PROCESSING_ENABLED=false)');
      return;
    }

    const expression = this.configService.get('PROCESSING_CRON', { infer: true });
    this.task = cron.schedule(expression, async () => {
      await this.cycleService.runCycle();
    });
    this.logger.log(`Scheduled processing cycle: "${expression}"`);

    if (this.configService.get('PROCESSING_RUN_ON_START', { infer: true })) {
      this.logger.log('Running initial processing cycle');
      this.initialRun = this.cycleService.runCycle();
    }
  }

  async onApplicationShutdown(): Promise<void> {
    if (this.task) {
      this.task.stop();
      this.task = null;
      this.logger.log('Scheduled processing stopped');
    }
    if (this.initialRun) {
      await this.initialRun;
      this.initialRun = null;
    }
  }
}
