import { Injectable } from '@nestjs/common';
import { AnalysisResult } from './interfaces/analysis.interface';

/**
 * Holds the most recent AnalysisResult for the read endpoints.
 *
 * Written by POST /analyze and by each processing cycle; the pipeline
 * itself never reads it.
 */
@Injectable()
export class AnalysisResultStore {
  private latest: AnalysisResult | null = null;

  set(result: AnalysisResult): void {
    this.latest = result;
  }

  get(): AnalysisResult | null {
    return this.latest;
  }
}
