import { Injectable, Logger } from '@nestjs/common';
import { Readable } from 'node:stream';
import csvParser from 'csv-parser';
import { MatrixKind, MatrixParseError } from '../interfaces/matrix.interface';
import { RawMatrix } from '../raw-matrix';
import { parseTimestamp } from '../../common/utils/date-utils';

/**
 * Matrix CSV Parser Strategy
 *
 * Reads one timestamp-indexed matrix export (latitude, longitude or S4C).
 *
 * Expected CSV structure:
 * - Header row: index label (often empty), then one column per satellite
 * - Data rows: timestamp label, then one cell per satellite
 * - Cells are numeric or missing (empty, NaN, NA, null, ...)
 *
 * Example:
 * ```
 * ,G01,G05,R12
 * 2024-03-01 12:00:00,13.7,,14.2
 * 2024-03-01 12:01:00,13.8,NaN,14.3
 * ```
 */
@Injectable()
export class MatrixCsvParser {
  private readonly logger = new Logger(MatrixCsvParser.name);

  /**
   * Tokens read as a missing cell (case-sensitive, after trimming)
   */
  private readonly MISSING_TOKENS = new Set([
    '',
    'NaN',
    'nan',
    '-nan',
    'NA',
    'N/A',
    'n/a',
    '#N/A',
    'null',
    'NULL',
    'None',
  ]);

  private readonly NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

  /**
   * Parse a matrix file into a RawMatrix
   *
   * @throws MatrixParseError if the file is empty, has no satellite columns,
   * or any row label is not a valid timestamp
   */
  async parse(kind: MatrixKind, fileBuffer: Buffer): Promise<RawMatrix> {
    const rows = await this.readCsvRows(kind, fileBuffer);

    if (rows.length === 0) {
      throw new MatrixParseError(kind, 'File is empty or has no header row');
    }

    const satellites = this.extractSatellites(kind, rows[0]);
    if (satellites.length === 0) {
      throw new MatrixParseError(kind, 'Header row has no satellite columns');
    }

    const timestamps: Date[] = [];
    const cells = new Map<string, number>();
    let invalidCells = 0;

    for (let i = 1; i < rows.length; i++) {
      const row = rows[i];
      const rawLabel = row[0];
      const timestamp = parseTimestamp(rawLabel);
      if (!timestamp) {
        throw new MatrixParseError(
          kind,
          `Row ${i + 1}: invalid timestamp "${rawLabel}"`,
        );
      }
      timestamps.push(timestamp);

      for (const { index, satellite } of satellites) {
        const raw = row[index] ?? '';
        const value = this.parseCell(raw);
        if (value === null) {
          if (!this.MISSING_TOKENS.has(raw)) {
            invalidCells++;
          }
          continue;
        }
        cells.set(RawMatrix.cellKey(timestamp, satellite), value);
      }
    }

    if (invalidCells > 0) {
      this.logger.warn(
        `${kind}: ${invalidCells} non-numeric cell(s) treated as missing`,
      );
    }

    this.logger.debug(
      `${kind}: ${timestamps.length} rows x ${satellites.length} satellites, ${cells.size} values`,
    );

    return new RawMatrix(
      kind,
      timestamps,
      satellites.map((s) => s.satellite),
      cells,
    );
  }

  /**
   * Read CSV rows from buffer using csv-parser.
   * Returns each row as an array of trimmed cells; blank lines are dropped.
   */
  private async readCsvRows(
    kind: MatrixKind,
    fileBuffer: Buffer,
  ): Promise<string[][]> {
    const rows: string[][] = [];

    const stream = Readable.from(fileBuffer).pipe(
      csvParser({
        headers: false,
        separator: ',',
      }),
    );

    try {
      for await (const row of stream) {
        const cells = this.rowToCells(row);
        if (cells.some((cell) => cell !== '')) {
          rows.push(cells);
        }
      }
    } catch (error) {
      throw new MatrixParseError(
        kind,
        'CSV could not be read',
        error instanceof Error ? error : undefined,
      );
    }

    if (rows.length > 0) {
      // Strip UTF-8 BOM from the first header cell
      rows[0][0] = rows[0][0].replace(/^\uFEFF/, '');
    }

    return rows;
  }

  /**
   * Convert a headerless csv-parser row ({ '0': ..., '1': ... }) to an array
   */
  private rowToCells(row: Record<string, string>): string[] {
    const cells: string[] = [];
    for (const [key, value] of Object.entries(row)) {
      cells[Number.parseInt(key, 10)] = String(value).trim();
    }
    return Array.from(cells, (cell) => cell ?? '');
  }

  /**
   * Satellite columns from the header row.
   * Unnamed columns get a positional name; repeated names keep the first column.
   */
  private extractSatellites(
    kind: MatrixKind,
    header: string[],
  ): { index: number; satellite: string }[] {
    const seen = new Set<string>();
    const satellites: { index: number; satellite: string }[] = [];

    for (let index = 1; index < header.length; index++) {
      const satellite = header[index] || `Unnamed: ${index}`;
      if (seen.has(satellite)) {
        this.logger.warn(
          `${kind}: duplicate satellite column "${satellite}" ignored`,
        );
        continue;
      }
      seen.add(satellite);
      satellites.push({ index, satellite });
    }

    return satellites;
  }

  /**
   * Parse a cell to a finite number, or null when missing/non-numeric
   */
  private parseCell(raw: string): number | null {
    if (this.MISSING_TOKENS.has(raw) || !this.NUMBER_PATTERN.test(raw)) {
      return null;
    }
    const value = Number.parseFloat(raw);
    return Number.isFinite(value) ? value : null;
  }
}
