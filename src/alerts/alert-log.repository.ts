import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { Readable } from 'node:stream';
import csvParser from 'csv-parser';
import { AppConfig } from '../config/env.validation';
import { NORMALIZED_COLUMNS } from '../analysis/interfaces/analysis.interface';
import {
  AlertLogEntry,
  AlertLogSnapshot,
} from './interfaces/alert-log.interface';
import { AlertLogRowSchema } from './alert-log.schema';
import { toCsv } from '../common/utils/csv-utils';
import {
  isErrnoException,
  writeFileAtomic,
} from '../common/utils/fs-utils';

/**
 * AlertLogRepository - File persistence for the alert log
 *
 * Format: CSV with header `Satellite,Time,S4C,Lat,Lon`, one row per entry.
 * Reads never throw: a missing file is `absent`, anything unreadable or
 * invalid is `corrupt`. Writes replace the whole file atomically.
 */
@Injectable()
export class AlertLogRepository {
  private readonly logger = new Logger(AlertLogRepository.name);
  readonly filePath: string;

  constructor(configService: ConfigService<AppConfig, true>) {
    this.filePath = path.resolve(
      configService.get('DATA_FOLDER', { infer: true }),
      configService.get('ALERT_LOG_FILENAME', { infer: true }),
    );
  }

  async read(): Promise<AlertLogSnapshot> {
    let content: Buffer;
    try {
      content = await fs.readFile(this.filePath);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return { status: 'absent' };
      }
      return { status: 'corrupt', reason: this.formatErrorMessage(error) };
    }

    try {
      return { status: 'loaded', entries: await this.parseEntries(content) };
    } catch (error) {
      return { status: 'corrupt', reason: this.formatErrorMessage(error) };
    }
  }

  /**
   * Replace the log with the given entries (write-then-rename)
   */
  async write(entries: readonly AlertLogEntry[]): Promise<void> {
    await writeFileAtomic(this.filePath, toCsv(NORMALIZED_COLUMNS, entries));
    this.logger.debug(`Wrote ${entries.length} entries to ${this.filePath}`);
  }

  /**
   * Parse and validate every row; the first invalid row fails the whole log
   */
  private async parseEntries(content: Buffer): Promise<AlertLogEntry[]> {
    const entries: AlertLogEntry[] = [];
    const stream = Readable.from(content).pipe(
      csvParser({
        mapHeaders: ({ header }) => header.replace(/^\uFEFF/, '').trim(),
      }),
    );

    let rowNumber = 1;
    for await (const row of stream) {
      rowNumber++;
      const parsed = AlertLogRowSchema.safeParse(row);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const field = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
        throw new Error(`Row ${rowNumber}: ${field}${issue.message}`);
      }
      entries.push(parsed.data);
    }

    return entries;
  }

  private formatErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}
