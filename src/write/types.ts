/**
 * Types of the bulk write pipeline.
 * @module write/types
 */

/**
 * Value written to a cell.
 */
export type CellValue = string | number;

/**
 * Cells to write: coordinate tuples (one element per cube dimension, in cube
 * order) paired with values.
 */
export type CellInput = Iterable<readonly [readonly string[], CellValue]>;

/**
 * One cell write.
 */
export interface WriteUnit {
  readonly cube: string;
  readonly coordinates: readonly string[];
  readonly value: CellValue;
}

/**
 * Half-open range of unit indices.
 */
export interface UnitRange {
  readonly start: number;
  readonly end: number;
}

/**
 * Consecutive units written together.
 */
export interface WriteBatch {
  readonly index: number;
  readonly range: UnitRange;
  readonly units: readonly WriteUnit[];
}

/**
 * What happened to one batch.
 */
export interface WriteOutcome {
  readonly batchIndex: number;
  readonly range: UnitRange;
  readonly success: boolean;
  /** `OK`, a process status such as `HasMinorErrors`, or a description of the error */
  readonly status: string;
  readonly errorLogFile?: string;
  readonly error?: Error;
}

export type WriteOverall = 'success' | 'partial' | 'failure';

/**
 * Result of a write in which every batch succeeded.
 */
export interface WriteResult {
  readonly overall: WriteOverall;
  readonly outcomes: readonly WriteOutcome[];
  /** Number of batches executed */
  readonly attempts: number;
}

/**
 * How batches reach the server.
 */
export enum WriteStrategy {
  /** `tm1.Update` with the values in the request body */
  Direct = 'direct',
  /** Generated `CellPutN`/`CellPutS` statements run as an unbound process */
  GeneratedProcedure = 'generated_procedure',
  /** Values uploaded as a file and loaded by an unbound process */
  BulkUpload = 'bulk_upload',
}

/**
 * Options of a bulk write.
 */
export interface WriteOptions {
  /** Defaults to {@link WriteStrategy.Direct} */
  strategy?: WriteStrategy;
  /** Upper bound of units per batch; the strategy's limit applies if lower */
  maxUnitsPerGroup?: number;
  /** Batches in flight at once. 1 writes serially. */
  maxWorkers?: number;
  /** Add to the current value instead of replacing it */
  increment?: boolean;
  /** Decimal places of numeric values */
  precision?: number;
  /** Skip cells that are not updateable (rule-derived, consolidated) */
  skipNonUpdateable?: boolean;
  /** Turn the cube's transaction log off for the duration of the write */
  suppressTransactionLog?: boolean;
  /** Keep the uploaded file of a bulk upload */
  retainBlob?: boolean;
  /** Tag direct writes with a change set */
  useChangeset?: boolean;
  /** Cube dimensions in order; looked up when omitted */
  dimensions?: readonly string[];
  /** Seconds, per batch */
  timeout?: number;
  cancelAtTimeout?: boolean;
  asyncMode?: boolean;
}
