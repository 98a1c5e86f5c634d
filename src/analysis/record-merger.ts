import { LoadedBatch } from '../ingestion/interfaces/matrix.interface';
import { MergedRecord } from './interfaces/analysis.interface';

/**
 * Join the three matrices of a batch into dense records.
 *
 * For every distinct latitude timestamp (ascending) and every active
 * satellite (latitude column order), a record is emitted only when latitude,
 * longitude and S4C are all present. Cells are looked up in each matrix's
 * (timestamp, satellite) index, so misaligned matrices simply produce misses.
 *
 * An empty result is a valid outcome.
 */
export function mergeRecords(batch: LoadedBatch): MergedRecord[] {
  const { latitude, longitude, s4c, activeSatellites } = batch;
  const records: MergedRecord[] = [];

  for (const timestamp of distinctAscending(latitude.timestamps)) {
    for (const satellite of activeSatellites) {
      const lat = latitude.get(timestamp, satellite);
      const lon = longitude.get(timestamp, satellite);
      const index = s4c.get(timestamp, satellite);

      if (lat === null || lon === null || index === null) {
        continue;
      }

      records.push({
        timestamp,
        satellite,
        latitude: lat,
        longitude: lon,
        s4c: index,
      });
    }
  }

  return records;
}

/**
 * Unique timestamps in ascending order (first occurrence kept for ties)
 */
function distinctAscending(timestamps: readonly Date[]): Date[] {
  const seen = new Map<number, Date>();
  for (const timestamp of timestamps) {
    if (!seen.has(timestamp.getTime())) {
      seen.set(timestamp.getTime(), timestamp);
    }
  }
  return [...seen.values()].sort((a, b) => a.getTime() - b.getTime());
}
