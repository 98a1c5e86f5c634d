import { RawMatrix } from '../raw-matrix';

/**
 * The three matrices delivered per batch.
 * All share the same layout: rows = timestamps, columns = satellite ids.
 */
export type MatrixKind = 'latitude' | 'longitude' | 's4c';

/**
 * Raw file contents for one batch, keyed by matrix kind
 */
export type MatrixSources = Record<MatrixKind, Buffer>;

/**
 * Result of loading one batch.
 *
 * `activeSatellites` lists the latitude columns with at least one reading,
 * in column order. `alignmentIssues` describes timestamps or satellite
 * columns that differ between the latitude matrix and the other two; such
 * mismatches surface later as dropped records, never as load errors.
 */
export interface LoadedBatch {
  latitude: RawMatrix;
  longitude: RawMatrix;
  s4c: RawMatrix;
  activeSatellites: readonly string[];
  alignmentIssues: readonly string[];
}

/**
 * Raised when a matrix file cannot be read as a timestamp-indexed table.
 */
export class MatrixParseError extends Error {
  constructor(
    public readonly matrix: MatrixKind,
    message: string,
    public readonly originalError?: Error,
  ) {
    super(`[${matrix}] ${message}`);
    this.name = 'MatrixParseError';
  }
}
