import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { AppConfig } from '../config/env.validation';
import { AnalysisService } from '../analysis/analysis.service';
import { AnalysisResultStore } from '../analysis/analysis-result.store';
import { NORMALIZED_COLUMNS } from '../analysis/interfaces/analysis.interface';
import { AlertLogService } from '../alerts/alert-log.service';
import { AlertLogUpdate } from '../alerts/interfaces/alert-log.interface';
import { toCsv } from '../common/utils/csv-utils';
import { isReadable, writeFileAtomic } from '../common/utils/fs-utils';

export type CycleStatus = 'completed' | 'skipped' | 'failed';

/**
 * Outcome of one processing cycle
 */
export interface CycleResult {
  status: CycleStatus;
  startedAt: Date;
  durationMs: number;
  recordsWritten: number;
  alertUpdate: AlertLogUpdate | null;
  reason?: string;
}

/**
 * ProcessingCycleService - One periodic batch, start to finish
 *
 * Steps:
 * 1. Check the three input matrices exist in the data folder
 * 2. Run the analysis pipeline and publish the result to the read endpoints
 * 3. Write the normalized records to the output file
 * 4. Update the alert log (always the last step)
 *
 * Only one cycle runs at a time; a cycle requested while another is
 * running is skipped. Failures are reported in the result, never retried.
 */
@Injectable()
export class ProcessingCycleService {
  private readonly logger = new Logger(ProcessingCycleService.name);
  private readonly inputFiles: { latitude: string; longitude: string; s4c: string };
  private readonly outputFile: string;

  private running = false;
  private lastResult: CycleResult | null = null;

  constructor(
    private readonly analysisService: AnalysisService,
    private readonly resultStore: AnalysisResultStore,
    private readonly alertLogService: AlertLogService,
    configService: ConfigService<AppConfig, true>,
  ) {
    const folder = configService.get('DATA_FOLDER', { infer: true });
    this.inputFiles = {
      latitude: path.resolve(folder, configService.get('LAT_FILENAME', { infer: true })),
      longitude: path.resolve(folder, configService.get('LON_FILENAME', { infer: true })),
      s4c: path.resolve(folder, configService.get('S4C_FILENAME', { infer: true })),
    };
    this.outputFile = path.resolve(
      folder,
      configService.get('OUTPUT_FILENAME', { infer: true }),
    );
  }

  /** Result of the most recent cycle that was not skipped for overlap */
  getLastResult(): CycleResult | null {
    return this.lastResult;
  }

  isRunning(): boolean {
    return this.running;
  }

  async runCycle(now: Date = new Date()): Promise<CycleResult> {
    const startTime = Date.now();

    if (this.running) {
      this.logger.warn('Processing cycle skipped: previous cycle still running');
      return {
        status: 'skipped',
        startedAt: now,
        durationMs: 0,
        recordsWritten: 0,
        alertUpdate: null,
        reason: 'A processing cycle is already running',
      };
    }

    this.running = true;
    this.logger.log(`Starting processing cycle at ${now.toISOString()}`);

    try {
      const result = await this.execute(now, startTime);
      this.lastResult = result;
      return result;
    } finally {
      this.running = false;
    }
  }

  private async execute(now: Date, startTime: number): Promise<CycleResult> {
    const finish = (
      status: CycleStatus,
      recordsWritten: number,
      alertUpdate: AlertLogUpdate | null,
      reason?: string,
    ): CycleResult => ({
      status,
      startedAt: now,
      durationMs: Date.now() - startTime,
      recordsWritten,
      alertUpdate,
      ...(reason !== undefined && { reason }),
    });

    const missing = await this.findMissingInputs();
    if (missing.length > 0) {
      const reason = `Missing input file(s): ${missing.join(', ')}`;
      this.logger.warn(`Processing cycle aborted: ${reason}`);
      return finish('skipped', 0, null, reason);
    }

    try {
      const [latitude, longitude, s4c] = await Promise.all([
        fs.readFile(this.inputFiles.latitude),
        fs.readFile(this.inputFiles.longitude),
        fs.readFile(this.inputFiles.s4c),
      ]);

      const result = await this.analysisService.analyze(
        { latitude, longitude, s4c },
        now,
      );
      this.resultStore.set(result);
      const records = result.normalizedRecords;

      if (records.length > 0) {
        await writeFileAtomic(
          this.outputFile,
          toCsv(NORMALIZED_COLUMNS, records),
        );
        this.logger.log(`Saved ${records.length} records to ${this.outputFile}`);
      } else {
        this.logger.warn('No records to save; output file left unchanged');
      }

      const alertUpdate = await this.alertLogService.apply(records, now);

      const completed = finish('completed', records.length, alertUpdate);
      this.logger.log(
        `Processing cycle completed in ${completed.durationMs}ms (alert log ${alertUpdate.action})`,
      );
      return completed;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error(`Processing cycle failed: ${reason}`);
      return finish('failed', 0, null, reason);
    }
  }

  private async findMissingInputs(): Promise<string[]> {
    const missing: string[] = [];
    for (const file of Object.values(this.inputFiles)) {
      if (!(await isReadable(file))) {
        missing.push(path.basename(file));
      }
    }
    return missing;
  }
}
