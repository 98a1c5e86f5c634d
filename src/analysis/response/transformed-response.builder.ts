import {
  AnalysisResult,
  NORMALIZED_COLUMNS,
  NormalizedRecord,
  ProcessingSummary,
  ResponseMetadata,
  SatelliteStats,
  TemporalStats,
} from '../interfaces/analysis.interface';
import { formatTimestamp } from '../../common/utils/date-utils';

/**
 * Transformed-data response returned by POST /analyze and
 * GET /data/transformed-response
 */
export interface TransformedDataResponse {
  status: 'success';
  message: string;
  data: {
    records: NormalizedRecord[];
    format: {
      columns: string[];
      column_descriptions: Record<string, string>;
    };
  };
  metadata: ResponseMetadata;
  processing_info: {
    transformation_applied: string;
    processing_timestamp: string;
    data_quality: {
      complete_records: number;
      data_coverage: string;
      alignment_issues: string[];
    };
  };
}

/**
 * Everything known about the last analysis in one document
 */
export interface CompleteReport {
  report_metadata: {
    generated_at: string;
    report_type: string;
    version: string;
  };
  processing_summary: ProcessingSummary;
  transformed_data: TransformedDataResponse;
  statistical_analysis: {
    satellite_statistics: SatelliteStats[];
    temporal_statistics: TemporalStats[];
  };
  endpoints_available: Record<string, string>;
}

const COLUMN_DESCRIPTIONS: Record<(typeof NORMALIZED_COLUMNS)[number], string> =
  {
    Satellite: 'Satellite identifier',
    Time: 'Timestamp in YYYY-MM-DD HH:MM:SS format (UTC)',
    S4C: 'Scintillation index value',
    Lat: 'Latitude coordinate',
    Lon: 'Longitude coordinate',
  };

const ENDPOINTS = {
  transformed_data: '/data/transformed-response',
  processing_summary: '/analysis/summary',
  satellite_stats: '/stats/satellite',
  temporal_stats: '/stats/temporal',
  combined_data: '/data/combined',
  alert_log: '/alerts',
};

export function buildTransformedDataResponse(
  result: AnalysisResult,
  generatedAt: Date = new Date(),
): TransformedDataResponse {
  const { envelope } = result;

  return {
    status: 'success',
    message: 'Data transformation completed successfully',
    data: {
      records: envelope.records,
      format: {
        columns: [...NORMALIZED_COLUMNS],
        column_descriptions: { ...COLUMN_DESCRIPTIONS },
      },
    },
    metadata: envelope.metadata,
    processing_info: {
      transformation_applied:
        'Latitude, longitude and S4C matrices merged and reformatted',
      processing_timestamp: formatTimestamp(generatedAt),
      data_quality: {
        complete_records: envelope.metadata.total_records,
        data_coverage: envelope.data_coverage,
        alignment_issues: [...result.load.alignmentIssues],
      },
    },
  };
}

export function buildCompleteReport(
  result: AnalysisResult,
  generatedAt: Date = new Date(),
): CompleteReport {
  return {
    report_metadata: {
      generated_at: formatTimestamp(generatedAt),
      report_type: 'Scintillation Analysis Complete Report',
      version: '1.0',
    },
    processing_summary: result.summary,
    transformed_data: buildTransformedDataResponse(result, generatedAt),
    statistical_analysis: {
      satellite_statistics: [...result.satelliteStats],
      temporal_statistics: [...result.temporalStats],
    },
    endpoints_available: { ...ENDPOINTS },
  };
}
