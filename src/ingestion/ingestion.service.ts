import { Injectable, Logger } from '@nestjs/common';
import { LoadedBatch, MatrixSources } from './interfaces/matrix.interface';
import { MatrixCsvParser } from './strategies/matrix-csv.strategy';
import { RawMatrix } from './raw-matrix';

/**
 * IngestionService - Loads one batch of matrices
 *
 * Responsibilities:
 * 1. Parse the latitude, longitude and S4C matrices
 * 2. Derive the active satellite set from the latitude matrix
 * 3. Report alignment mismatches between the matrices (logged, not raised)
 */
@Injectable()
export class IngestionService {
  private readonly logger = new Logger(IngestionService.name);

  /** Maximum number of names listed per alignment issue */
  private readonly MAX_LISTED = 5;

  constructor(private readonly matrixParser: MatrixCsvParser) {}

  /**
   * Load the three matrices of a batch
   *
   * @throws MatrixParseError if any matrix cannot be parsed
   */
  async loadBatch(sources: MatrixSources): Promise<LoadedBatch> {
    const startTime = Date.now();

    const latitude = await this.matrixParser.parse(
      'latitude',
      sources.latitude,
    );
    const longitude = await this.matrixParser.parse(
      'longitude',
      sources.longitude,
    );
    const s4c = await this.matrixParser.parse('s4c', sources.s4c);

    const activeSatellites = latitude.satellites.filter((satellite) =>
      latitude.hasReadings(satellite),
    );

    const alignmentIssues = [
      ...this.compareAlignment(latitude, longitude),
      ...this.compareAlignment(latitude, s4c),
    ];
    for (const issue of alignmentIssues) {
      this.logger.warn(`Alignment: ${issue}`);
    }

    this.logger.log(
      `Loaded batch: ${latitude.rowCount} timestamps, ${activeSatellites.length}/${latitude.satellites.length} active satellites in ${Date.now() - startTime}ms`,
    );

    return {
      latitude,
      longitude,
      s4c,
      activeSatellites,
      alignmentIssues,
    };
  }

  /**
   * Describe timestamps and satellite columns that differ between the
   * latitude matrix and another matrix of the batch
   */
  private compareAlignment(reference: RawMatrix, other: RawMatrix): string[] {
    const issues: string[] = [];

    const referenceTimes = new Set(
      reference.timestamps.map((t) => t.toISOString()),
    );
    const otherTimes = new Set(other.timestamps.map((t) => t.toISOString()));

    const missingTimes = [...referenceTimes].filter((t) => !otherTimes.has(t));
    const extraTimes = [...otherTimes].filter((t) => !referenceTimes.has(t));
    const missingSatellites = reference.satellites.filter(
      (s) => !other.satellites.includes(s),
    );
    const extraSatellites = other.satellites.filter(
      (s) => !reference.satellites.includes(s),
    );

    if (missingTimes.length > 0) {
      issues.push(
        `${other.kind} matrix lacks ${missingTimes.length} timestamp(s) present in ${reference.kind}: ${this.list(missingTimes)}`,
      );
    }
    if (extraTimes.length > 0) {
      issues.push(
        `${other.kind} matrix has ${extraTimes.length} timestamp(s) absent from ${reference.kind}: ${this.list(extraTimes)}`,
      );
    }
    if (missingSatellites.length > 0) {
      issues.push(
        `${other.kind} matrix lacks ${missingSatellites.length} satellite column(s) present in ${reference.kind}: ${this.list(missingSatellites)}`,
      );
    }
    if (extraSatellites.length > 0) {
      issues.push(
        `${other.kind} matrix has ${extraSatellites.length} satellite column(s) absent from ${reference.kind}: ${this.list(extraSatellites)}`,
      );
    }

    return issues;
  }

  private list(names: string[]): string {
    const listed = names.slice(0, this.MAX_LISTED).join(', ');
    return names.length > this.MAX_LISTED
      ? `${listed}, ... (+${names.length - this.MAX_LISTED} more)`
      : listed;
  }
}
