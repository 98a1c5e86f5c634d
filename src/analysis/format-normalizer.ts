import {
  ActivityLevel,
  MergedRecord,
  MergedRecordInput,
  MissingFieldsError,
  NormalizedRecord,
  ProcessingSummary,
  ResponseEnvelope,
} from './interfaces/analysis.interface';
import { summarize } from './utils/statistics';
import {
  formatPercentage,
  roundHalfEven,
} from '../common/utils/number-utils';
import {
  formatTimestamp,
  parseRecordTime,
} from '../common/utils/date-utils';

const REQUIRED_FIELDS: readonly (keyof MergedRecord)[] = [
  'satellite',
  'timestamp',
  's4c',
  'latitude',
  'longitude',
];

/** S4C bands used by the processing summary: [level, lower bound inclusive] */
const ACTIVITY_BANDS: readonly [ActivityLevel, number][] = [
  ['low', Number.NEGATIVE_INFINITY],
  ['moderate', 0.2],
  ['high', 0.5],
];

/**
 * Project merged records into the external record shape.
 *
 * - Field rename: satellite/timestamp/s4c/latitude/longitude ->
 *   Satellite/Time/S4C/Lat/Lon
 * - Time rendered as "YYYY-MM-DD HH:MM:SS" (UTC, sub-seconds truncated)
 * - Numerics rounded to 6 decimals, half-to-even
 *
 * Records with a null, undefined or non-finite field are dropped.
 * Order is preserved.
 *
 * @throws MissingFieldsError if a required field is absent from every record
 */
export function normalizeRecords(
  records: readonly MergedRecordInput[],
): NormalizedRecord[] {
  if (records.length === 0) {
    return [];
  }

  const missing = REQUIRED_FIELDS.filter(
    (field) => !records.some((record) => field in record),
  );
  if (missing.length > 0) {
    throw new MissingFieldsError(missing);
  }

  return records.filter(isCompleteRecord).map((record) => ({
    Satellite: record.satellite,
    Time: formatTimestamp(record.timestamp),
    S4C: roundHalfEven(record.s4c),
    Lat: roundHalfEven(record.latitude),
    Lon: roundHalfEven(record.longitude),
  }));
}

/**
 * Build the response envelope for the presentation layer.
 *
 * `data_coverage` = records / (active satellites x timestamps), "0%" when
 * either count is zero. Statistics over an empty record set are null.
 */
export function buildResponseEnvelope(
  records: readonly NormalizedRecord[],
  activeSatelliteCount: number,
  timestampCount: number,
): ResponseEnvelope {
  const satellites = [...new Set(records.map((r) => r.Satellite))].sort();
  const times = records.map((r) => r.Time).sort();
  const s4c = summarize(records.map((r) => r.S4C));
  const lat = summarize(records.map((r) => r.Lat));
  const lon = summarize(records.map((r) => r.Lon));

  const possibleCells = activeSatelliteCount * timestampCount;

  return {
    records: [...records],
    metadata: {
      total_records: records.length,
      unique_satellites: satellites.length,
      satellite_list: satellites,
      time_range: {
        start: times.at(0) ?? null,
        end: times.at(-1) ?? null,
      },
      s4c_statistics: {
        min: s4c?.min ?? null,
        max: s4c?.max ?? null,
        mean: s4c?.mean ?? null,
        std: s4c?.std ?? null,
      },
      geographic_bounds: {
        lat_min: lat?.min ?? null,
        lat_max: lat?.max ?? null,
        lon_min: lon?.min ?? null,
        lon_max: lon?.max ?? null,
      },
    },
    data_coverage:
      possibleCells > 0 ? formatPercentage(records.length / possibleCells) : '0%',
  };
}

/**
 * Summarize data quality, scintillation activity and spatial spread.
 *
 * S4C bands: low < 0.2 <= moderate < 0.5 <= high.
 */
export function buildProcessingSummary(
  records: readonly NormalizedRecord[],
  activeSatelliteCount: number,
  timestampCount: number,
): ProcessingSummary {
  const possibleCells = activeSatelliteCount * timestampCount;
  const distribution = countActivityLevels(records);
  const s4c = summarize(records.map((r) => r.S4C));
  const lat = summarize(records.map((r) => r.Lat));
  const lon = summarize(records.map((r) => r.Lon));

  return {
    processing_status: 'completed',
    data_overview: {
      total_records: records.length,
      unique_satellites: activeSatelliteCount,
      data_completeness_percentage:
        possibleCells > 0
          ? roundHalfEven((records.length / possibleCells) * 100, 2)
          : 0,
      time_span_minutes: timeSpanMinutes(records),
    },
    scintillation_analysis: {
      s4c_value_distribution: distribution,
      dominant_activity_level: dominantLevel(distribution),
      average_s4c: s4c ? roundHalfEven(s4c.mean) : 0,
    },
    spatial_coverage: {
      latitude_range: lat ? roundHalfEven(lat.max - lat.min, 4) : 0,
      longitude_range: lon ? roundHalfEven(lon.max - lon.min, 4) : 0,
    },
  };
}

function isCompleteRecord(record: MergedRecordInput): record is MergedRecord {
  const { satellite, timestamp, s4c, latitude, longitude } = record;
  return (
    typeof satellite === 'string' &&
    timestamp instanceof Date &&
    !Number.isNaN(timestamp.getTime()) &&
    [s4c, latitude, longitude].every(
      (value) => typeof value === 'number' && Number.isFinite(value),
    )
  );
}

function countActivityLevels(
  records: readonly NormalizedRecord[],
): Record<ActivityLevel, number> {
  const counts: Record<ActivityLevel, number> = { low: 0, moderate: 0, high: 0 };
  for (const record of records) {
    let level: ActivityLevel = 'low';
    for (const [band, lowerBound] of ACTIVITY_BANDS) {
      if (record.S4C >= lowerBound) {
        level = band;
      }
    }
    counts[level]++;
  }
  return counts;
}

/**
 * First level (low, moderate, high) holding the highest count
 */
function dominantLevel(counts: Record<ActivityLevel, number>): ActivityLevel {
  let dominant: ActivityLevel = 'low';
  for (const [level] of ACTIVITY_BANDS) {
    if (counts[level] > counts[dominant]) {
      dominant = level;
    }
  }
  return dominant;
}

function timeSpanMinutes(records: readonly NormalizedRecord[]): number {
  const span = summarize(
    records
      .map((r) => parseRecordTime(r.Time)?.getTime())
      .filter((t): t is number => t !== undefined),
  );
  return span ? roundHalfEven((span.max - span.min) / 60_000, 2) : 0;
}
