/**
 * Record and summary shapes produced by the analysis pipeline.
 *
 * Internal records (MergedRecord) use camelCase and raw floating values.
 * Everything that leaves the service (NormalizedRecord, envelope, summary)
 * uses the external field names consumed by the dashboard and the alert log.
 */

/**
 * One (timestamp, satellite) reading where latitude, longitude and S4C
 * were all present. Never mutated after creation.
 */
export interface MergedRecord {
  readonly timestamp: Date;
  readonly satellite: string;
  readonly latitude: number;
  readonly longitude: number;
  readonly s4c: number;
}

/**
 * A merged record as handed in by callers that may bypass the merger:
 * any field may be absent or null.
 */
export type MergedRecordInput = {
  [K in keyof MergedRecord]?: MergedRecord[K] | null;
};

/**
 * Wire/storage record: canonical names, "YYYY-MM-DD HH:MM:SS" time,
 * numerics rounded to 6 decimals.
 */
export interface NormalizedRecord {
  Satellite: string;
  Time: string;
  S4C: number;
  Lat: number;
  Lon: number;
}

/** Column order of NormalizedRecord in files and responses */
export const NORMALIZED_COLUMNS = [
  'Satellite',
  'Time',
  'S4C',
  'Lat',
  'Lon',
] as const satisfies readonly (keyof NormalizedRecord)[];

/**
 * S4C statistics for one satellite. `std` is null for single-record groups.
 */
export interface SatelliteStats {
  satellite: string;
  count: number;
  mean: number;
  std: number | null;
  min: number;
  max: number;
}

/**
 * S4C statistics for one 1-minute bucket; `timestamp` is the bucket start.
 */
export interface TemporalStats {
  timestamp: string;
  count: number;
  mean: number;
  std: number | null;
}

export interface ResponseMetadata {
  total_records: number;
  unique_satellites: number;
  satellite_list: string[];
  time_range: {
    start: string | null;
    end: string | null;
  };
  s4c_statistics: {
    min: number | null;
    max: number | null;
    mean: number | null;
    std: number | null;
  };
  geographic_bounds: {
    lat_min: number | null;
    lat_max: number | null;
    lon_min: number | null;
    lon_max: number | null;
  };
}

/**
 * Normalized records plus the metadata the presentation layer needs
 */
export interface ResponseEnvelope {
  records: NormalizedRecord[];
  metadata: ResponseMetadata;
  data_coverage: string;
}

export type ActivityLevel = 'low' | 'moderate' | 'high';

export interface ProcessingSummary {
  processing_status: 'completed';
  data_overview: {
    total_records: number;
    unique_satellites: number;
    data_completeness_percentage: number;
    time_span_minutes: number;
  };
  scintillation_analysis: {
    s4c_value_distribution: Record<ActivityLevel, number>;
    dominant_activity_level: ActivityLevel;
    average_s4c: number;
  };
  spatial_coverage: {
    latitude_range: number;
    longitude_range: number;
  };
}

/**
 * What the loader saw, kept for coverage math and diagnostics
 */
export interface LoadSummary {
  timestampCount: number;
  activeSatellites: readonly string[];
  alignmentIssues: readonly string[];
}

/**
 * Complete, immutable outcome of analysing one batch.
 * Returned to the caller; the pipeline keeps no copy.
 */
export interface AnalysisResult {
  readonly analyzedAt: Date;
  readonly load: LoadSummary;
  readonly mergedRecords: readonly MergedRecord[];
  readonly normalizedRecords: readonly NormalizedRecord[];
  readonly satelliteStats: readonly SatelliteStats[];
  readonly temporalStats: readonly TemporalStats[];
  readonly envelope: ResponseEnvelope;
  readonly summary: ProcessingSummary;
}

/**
 * Raised when records handed to the normalizer lack a required field entirely.
 */
export class MissingFieldsError extends Error {
  constructor(public readonly fields: readonly string[]) {
    super(`Missing required fields: ${fields.join(', ')}`);
    this.name = 'MissingFieldsError';
  }
}
