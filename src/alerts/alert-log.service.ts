import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../config/env.validation';
import { NormalizedRecord } from '../analysis/interfaces/analysis.interface';
import { AlertLogRepository } from './alert-log.repository';
import {
  AlertLogAction,
  AlertLogDescription,
  AlertLogEntry,
  AlertLogState,
  AlertLogUpdate,
} from './interfaces/alert-log.interface';
import {
  anchorAgeDays,
  classifyLog,
  findAnchor,
  parseAnchor,
  selectCandidates,
} from './retention-policy';

/**
 * AlertLogService - Maintains the rolling alert log
 *
 * State machine over the persisted log:
 * - absent | empty -> candidates become the log
 * - fresh          -> candidates are appended after the existing entries
 * - stale          -> the log is replaced by exactly the candidates
 * A batch without candidates leaves the file untouched in every state.
 *
 * Updates are serialized so the read-decide-write sequence never interleaves.
 */
@Injectable()
export class AlertLogService {
  private readonly logger = new Logger(AlertLogService.name);
  private readonly threshold: number;
  private readonly retentionDays: number;

  /** Tail of the update queue */
  private pending: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly repository: AlertLogRepository,
    configService: ConfigService<AppConfig, true>,
  ) {
    this.threshold = configService.get('ALERT_THRESHOLD', { infer: true });
    this.retentionDays = configService.get('ALERT_RETENTION_DAYS', {
      infer: true,
    });
  }

  /**
   * Merge a batch of normalized records into the alert log
   *
   * @param records - Normalized records of the batch
   * @param now - Reference time for the freshness check
   */
  apply(
    records: readonly NormalizedRecord[],
    now: Date = new Date(),
  ): Promise<AlertLogUpdate> {
    return this.exclusive(() => this.applyBatch(records, now));
  }

  /**
   * Current state of the log, its anchor and entries
   */
  async describe(now: Date = new Date()): Promise<AlertLogDescription> {
    const snapshot = await this.repository.read();
    const entries = snapshot.status === 'loaded' ? snapshot.entries : [];
    const anchor = parseAnchor(entries);

    return {
      state: classifyLog(snapshot, now, this.retentionDays),
      entryCount: entries.length,
      anchor: findAnchor(entries),
      anchorAgeDays: anchor ? anchorAgeDays(anchor, now) : null,
      entries,
    };
  }

  private async applyBatch(
    records: readonly NormalizedRecord[],
    now: Date,
  ): Promise<AlertLogUpdate> {
    const candidates = selectCandidates(records, this.threshold);
    const snapshot = await this.repository.read();
    const previousState = classifyLog(snapshot, now, this.retentionDays);
    const existing = snapshot.status === 'loaded' ? snapshot.entries : [];

    if (snapshot.status === 'corrupt') {
      this.logger.warn(
        `Alert log ${this.repository.filePath} is unreadable and will be overwritten: ${snapshot.reason}`,
      );
    }

    if (candidates.length === 0) {
      this.logger.debug('No alert candidates in batch; log left untouched');
      return {
        previousState,
        action: 'unchanged',
        candidateCount: 0,
        entryCount: existing.length,
        anchor: findAnchor(existing),
      };
    }

    const { action, entries } = this.nextLog(
      previousState,
      existing,
      candidates,
    );

    await this.repository.write(entries);

    const update: AlertLogUpdate = {
      previousState,
      action,
      candidateCount: candidates.length,
      entryCount: entries.length,
      anchor: findAnchor(entries),
    };

    this.logger.log(
      `Alert log ${action}: ${candidates.length} new entr${candidates.length === 1 ? 'y' : 'ies'}, ${entries.length} total (was ${previousState}), anchor ${update.anchor}`,
    );

    return update;
  }

  /**
   * Apply the transition for the current state
   */
  private nextLog(
    state: AlertLogState,
    existing: AlertLogEntry[],
    candidates: AlertLogEntry[],
  ): { action: AlertLogAction; entries: AlertLogEntry[] } {
    switch (state) {
      case 'fresh':
        return { action: 'appended', entries: [...existing, ...candidates] };
      case 'stale':
        return { action: 'replaced', entries: candidates };
      default:
        return { action: 'created', entries: candidates };
    }
  }

  /**
   * Run a task after every previously queued task has settled.
   * The returned promise carries the task's own outcome.
   */
  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.pending.then(task, task);
    this.pending = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
