import { NormalizedRecord } from '../analysis/interfaces/analysis.interface';
import {
  AlertLogEntry,
  AlertLogSnapshot,
  AlertLogState,
  RetentionDecision,
} from './interfaces/alert-log.interface';
import {
  parseRecordTime,
  wholeDaysBetween,
} from '../common/utils/date-utils';

export const DEFAULT_ALERT_THRESHOLD = 0.4;
export const DEFAULT_RETENTION_DAYS = 60;

/**
 * Records that qualify as alert entries (S4C >= threshold)
 */
export function selectCandidates(
  records: readonly NormalizedRecord[],
  threshold = DEFAULT_ALERT_THRESHOLD,
): AlertLogEntry[] {
  return records.filter((record) => record.S4C >= threshold);
}

/**
 * Newest entry time. "YYYY-MM-DD HH:MM:SS" sorts lexicographically,
 * so the string maximum is the newest instant.
 */
export function findAnchor(entries: readonly AlertLogEntry[]): string | null {
  let anchor: string | null = null;
  for (const { Time } of entries) {
    if (anchor === null || Time > anchor) {
      anchor = Time;
    }
  }
  return anchor;
}

/**
 * Whole days (floor) between the anchor and now
 */
export function anchorAgeDays(anchor: Date, now: Date): number {
  return wholeDaysBetween(anchor, now);
}

/**
 * Two-state freshness timer: keep appending while the newest entry is at
 * most `maxAgeDays` old, start over once it is older.
 */
export function decideRetention(
  ageDays: number,
  maxAgeDays = DEFAULT_RETENTION_DAYS,
): RetentionDecision {
  return ageDays <= maxAgeDays ? 'append' : 'replace';
}

/**
 * Classify a log snapshot. Corrupt logs classify as absent.
 */
export function classifyLog(
  snapshot: AlertLogSnapshot,
  now: Date,
  maxAgeDays = DEFAULT_RETENTION_DAYS,
): AlertLogState {
  if (snapshot.status !== 'loaded') {
    return 'absent';
  }
  if (snapshot.entries.length === 0) {
    return 'empty';
  }

  const anchor = parseAnchor(snapshot.entries);
  if (!anchor) {
    return 'stale';
  }

  return decideRetention(anchorAgeDays(anchor, now), maxAgeDays) === 'append'
    ? 'fresh'
    : 'stale';
}

export function parseAnchor(entries: readonly AlertLogEntry[]): Date | null {
  const anchor = findAnchor(entries);
  return anchor === null ? null : parseRecordTime(anchor);
}
