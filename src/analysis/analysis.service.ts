import { Injectable, Logger } from '@nestjs/common';
import { IngestionService } from '../ingestion/ingestion.service';
import { MatrixSources } from '../ingestion/interfaces/matrix.interface';
import { AnalysisResult } from './interfaces/analysis.interface';
import { mergeRecords } from './record-merger';
import {
  computeSatelliteStats,
  computeTemporalStats,
} from './aggregator';
import {
  buildProcessingSummary,
  buildResponseEnvelope,
  normalizeRecords,
} from './format-normalizer';

/**
 * AnalysisService - Runs the batch pipeline
 *
 * Loader -> Merger -> { Aggregator, Normalizer }
 *
 * Each call is independent and returns a fresh AnalysisResult; nothing is
 * cached here. Callers that need the last result keep it themselves
 * (see AnalysisResultStore).
 */
@Injectable()
export class AnalysisService {
  private readonly logger = new Logger(AnalysisService.name);

  constructor(private readonly ingestionService: IngestionService) {}

  /**
   * Analyse one batch of matrices
   *
   * @throws MatrixParseError if a matrix cannot be parsed
   */
  async analyze(
    sources: MatrixSources,
    analyzedAt: Date = new Date(),
  ): Promise<AnalysisResult> {
    const startTime = Date.now();
    const batch = await this.ingestionService.loadBatch(sources);

    const mergedRecords = mergeRecords(batch);
    const normalizedRecords = normalizeRecords(mergedRecords);
    const activeCount = batch.activeSatellites.length;
    const timestampCount = batch.latitude.rowCount;

    const result: AnalysisResult = {
      analyzedAt,
      load: {
        timestampCount,
        activeSatellites: batch.activeSatellites,
        alignmentIssues: batch.alignmentIssues,
      },
      mergedRecords,
      normalizedRecords,
      satelliteStats: computeSatelliteStats(mergedRecords),
      temporalStats: computeTemporalStats(mergedRecords),
      envelope: buildResponseEnvelope(
        normalizedRecords,
        activeCount,
        timestampCount,
      ),
      summary: buildProcessingSummary(
        normalizedRecords,
        activeCount,
        timestampCount,
      ),
    };

    this.logger.log(
      `Analysis complete: ${mergedRecords.length} records from ${activeCount} satellite(s), coverage ${result.envelope.data_coverage} in ${Date.now() - startTime}ms`,
    );

    return result;
  }
}
