import {
  MergedRecord,
  SatelliteStats,
  TemporalStats,
} from './interfaces/analysis.interface';
import { summarize } from './utils/statistics';
import { roundHalfEven, roundOrNull } from '../common/utils/number-utils';
import { floorToMinute, formatTimestamp } from '../common/utils/date-utils';

/**
 * S4C statistics per satellite, sorted by satellite id.
 * Operates on raw merged values; each statistic is rounded afterwards.
 */
export function computeSatelliteStats(
  records: readonly MergedRecord[],
): SatelliteStats[] {
  const groups = groupBy(records, (record) => record.satellite);
  const stats: SatelliteStats[] = [];

  for (const satellite of [...groups.keys()].sort()) {
    const summary = summarize(groups.get(satellite) ?? []);
    if (!summary) continue;

    stats.push({
      satellite,
      count: summary.count,
      mean: roundHalfEven(summary.mean),
      std: roundOrNull(summary.std),
      min: roundHalfEven(summary.min),
      max: roundHalfEven(summary.max),
    });
  }

  return stats;
}

/**
 * S4C statistics per 1-minute bucket aligned to clock minutes, ascending.
 * Minutes without records produce no bucket.
 */
export function computeTemporalStats(
  records: readonly MergedRecord[],
): TemporalStats[] {
  const groups = groupBy(records, (record) =>
    floorToMinute(record.timestamp).getTime(),
  );
  const stats: TemporalStats[] = [];

  for (const bucketStart of [...groups.keys()].sort((a, b) => a - b)) {
    const summary = summarize(groups.get(bucketStart) ?? []);
    if (!summary) continue;

    stats.push({
      timestamp: formatTimestamp(new Date(bucketStart)),
      count: summary.count,
      mean: roundHalfEven(summary.mean),
      std: roundOrNull(summary.std),
    });
  }

  return stats;
}

/**
 * Group S4C values by key, preserving record order within each group
 */
function groupBy<K>(
  records: readonly MergedRecord[],
  keyOf: (record: MergedRecord) => K,
): Map<K, number[]> {
  const groups = new Map<K, number[]>();
  for (const record of records) {
    const key = keyOf(record);
    const values = groups.get(key);
    if (values) {
      values.push(record.s4c);
    } else {
      groups.set(key, [record.s4c]);
    }
  }
  return groups;
}
