import { MatrixKind } from './interfaces/matrix.interface';

/**
 * RawMatrix - sparse (timestamp, satellite) -> value table
 *
 * Only present values are stored. Any lookup outside the stored cells,
 * including timestamps or satellites the matrix never had, reads as missing.
 */
export class RawMatrix {
  private readonly cells: ReadonlyMap<string, number>;

  constructor(
    readonly kind: MatrixKind,
    readonly timestamps: readonly Date[],
    readonly satellites: readonly string[],
    cells: ReadonlyMap<string, number>,
  ) {
    this.cells = cells;
  }

  /**
   * Composite cell key, shared with the record merger's index
   */
  static cellKey(timestamp: Date, satellite: string): string {
    return `${timestamp.toISOString()}|${satellite}`;
  }

  /** Number of data rows, duplicates included */
  get rowCount(): number {
    return this.timestamps.length;
  }

  /** Number of present cells */
  get size(): number {
    return this.cells.size;
  }

  get(timestamp: Date, satellite: string): number | null {
    return this.cells.get(RawMatrix.cellKey(timestamp, satellite)) ?? null;
  }

  /**
   * True if the satellite column has at least one present value
   */
  hasReadings(satellite: string): boolean {
    return this.timestamps.some((timestamp) =>
      this.cells.has(RawMatrix.cellKey(timestamp, satellite)),
    );
  }
}
