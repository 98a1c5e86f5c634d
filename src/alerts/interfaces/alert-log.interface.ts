import { NormalizedRecord } from '../../analysis/interfaces/analysis.interface';

/**
 * A normalized record whose S4C reached the alert threshold
 */
export type AlertLogEntry = NormalizedRecord;

/**
 * Alert log lifecycle states
 *
 * - absent: no log yet (or unreadable/corrupt, which is handled the same way)
 * - empty: log exists with zero entries
 * - fresh: newest entry is at most the retention window old
 * - stale: newest entry is older than the retention window
 */
export type AlertLogState = 'absent' | 'empty' | 'fresh' | 'stale';

export type RetentionDecision = 'append' | 'replace';

/** What an update did to the persisted log */
export type AlertLogAction = 'unchanged' | 'created' | 'appended' | 'replaced';

/**
 * Raw outcome of reading the log file
 */
export type AlertLogSnapshot =
  | { status: 'absent' }
  | { status: 'corrupt'; reason: string }
  | { status: 'loaded'; entries: AlertLogEntry[] };

export interface AlertLogUpdate {
  previousState: AlertLogState;
  action: AlertLogAction;
  candidateCount: number;
  entryCount: number;
  /** Newest Time in the log after the update */
  anchor: string | null;
}

export interface AlertLogDescription {
  state: AlertLogState;
  entryCount: number;
  anchor: string | null;
  anchorAgeDays: number | null;
  entries: AlertLogEntry[];
}
