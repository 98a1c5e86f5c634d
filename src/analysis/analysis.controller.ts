import {
  BadRequestException,
  Controller,
  Get,
  Logger,
  NotFoundException,
  Post,
  UploadedFiles,
  UseInterceptors,
} from '@nestjs/common';
import { FileFieldsInterceptor } from '@nestjs/platform-express';
import { AnalysisService } from './analysis.service';
import { AnalysisResultStore } from './analysis-result.store';
import {
  AnalysisResult,
  MergedRecord,
  MissingFieldsError,
  NormalizedRecord,
  ProcessingSummary,
  SatelliteStats,
  TemporalStats,
} from './interfaces/analysis.interface';
import { MatrixParseError } from '../ingestion/interfaces/matrix.interface';
import {
  buildCompleteReport,
  buildTransformedDataResponse,
  CompleteReport,
  TransformedDataResponse,
} from './response/transformed-response.builder';

/**
 * Multipart fields accepted by POST /analyze
 */
export interface AnalysisUploadFiles {
  lat_file?: Express.Multer.File[];
  lon_file?: Express.Multer.File[];
  s4c_file?: Express.Multer.File[];
}

/**
 * Response DTO for the analysis endpoint
 */
export interface AnalyzeResponse {
  message: string;
  analysis_complete: boolean;
  transformed_data_result: TransformedDataResponse;
}

/**
 * AnalysisController
 *
 * Upload endpoint for a batch of matrices and read endpoints over the
 * most recent analysis.
 *
 * Usage:
 *   POST /analyze
 *   Content-Type: multipart/form-data
 *   Body: lat_file=<csv>&lon_file=<csv>&s4c_file=<csv>
 *
 * Read endpoints (404 until a batch has been analysed):
 *   GET /data/combined, /data/transformed, /data/transformed-response
 *   GET /stats/satellite, /stats/temporal
 *   GET /analysis/summary, /analysis/complete-report
 */
@Controller()
export class AnalysisController {
  private readonly logger = new Logger(AnalysisController.name);

  constructor(
    private readonly analysisService: AnalysisService,
    private readonly resultStore: AnalysisResultStore,
  ) {}

  /**
   * Analyse an uploaded batch and keep the result for the read endpoints
   *
   * @example
   * curl -X POST http://localhost:3000/analyze \
   *   -F "lat_file=@Lat_last15min.csv" \
   *   -F "lon_file=@Lon_last15min.csv" \
   *   -F "s4c_file=@S4C_last15min.csv"
   */
  @Post('analyze')
  @UseInterceptors(
    FileFieldsInterceptor([
      { name: 'lat_file', maxCount: 1 },
      { name: 'lon_file', maxCount: 1 },
      { name: 's4c_file', maxCount: 1 },
    ]),
  )
  async analyze(
    @UploadedFiles() files: AnalysisUploadFiles | undefined,
  ): Promise<AnalyzeResponse> {
    const latitude = files?.lat_file?.[0];
    const longitude = files?.lon_file?.[0];
    const s4c = files?.s4c_file?.[0];

    if (!latitude || !longitude || !s4c) {
      throw new BadRequestException(
        'Upload all three matrices using form fields "lat_file", "lon_file" and "s4c_file".',
      );
    }

    this.logger.log(
      `Analysis request: lat=${latitude.originalname} (${latitude.size} bytes), lon=${longitude.originalname} (${longitude.size} bytes), s4c=${s4c.originalname} (${s4c.size} bytes)`,
    );

    let result: AnalysisResult;
    try {
      result = await this.analysisService.analyze({
        latitude: latitude.buffer,
        longitude: longitude.buffer,
        s4c: s4c.buffer,
      });
    } catch (error) {
      if (
        error instanceof MatrixParseError ||
        error instanceof MissingFieldsError
      ) {
        this.logger.warn(`Rejected batch: ${error.message}`);
        throw new BadRequestException(error.message);
      }
      throw error;
    }

    this.resultStore.set(result);

    return {
      message:
        'Files processed successfully. Results are now available via GET endpoints.',
      analysis_complete: true,
      transformed_data_result: buildTransformedDataResponse(result),
    };
  }

  /** Merged records with raw values */
  @Get('data/combined')
  getCombinedData(): MergedRecord[] {
    return [...this.requireResult().mergedRecords];
  }

  /** Records in the Satellite, Time, S4C, Lat, Lon format */
  @Get('data/transformed')
  getTransformedData(): NormalizedRecord[] {
    return [...this.requireResult().normalizedRecords];
  }

  @Get('data/transformed-response')
  getTransformedDataResponse(): TransformedDataResponse {
    return buildTransformedDataResponse(this.requireResult());
  }

  @Get('stats/satellite')
  getSatelliteStats(): SatelliteStats[] {
    return [...this.requireResult().satelliteStats];
  }

  @Get('stats/temporal')
  getTemporalStats(): TemporalStats[] {
    return [...this.requireResult().temporalStats];
  }

  @Get('analysis/summary')
  getProcessingSummary(): ProcessingSummary {
    return this.requireResult().summary;
  }

  @Get('analysis/complete-report')
  getCompleteReport(): CompleteReport {
    return buildCompleteReport(this.requireResult());
  }

  private requireResult(): AnalysisResult {
    const result = this.resultStore.get();
    if (!result) {
      throw new NotFoundException(
        'No analysis results found. Please run the analysis first by POSTing to /analyze.',
      );
    }
    return result;
  }
}
