/**
 * The three ways a batch reaches the server.
 * @module write/strategies
 */

import { v4 as uuidv4 } from 'uuid';
import type { Tm1Error } from '../errors/index.js';
import { RestError, TimeoutError, isTm1Error, toError } from '../errors/index.js';
import type { Logger } from '../observability/index.js';
import type { CellService } from '../services/cells.js';
import type { ElementType } from '../services/cubes.js';
import type { FileService } from '../services/files.js';
import type { ProcessDefinition, ProcessExecuteResult, ProcessService } from '../services/processes.js';
import type { ServerInfo } from '../services/types.js';
import { verifyVersion } from '../utils/index.js';
import {
  UPLOAD_DELIMITER,
  UPLOAD_QUOTE,
  buildStatements,
  buildUploadDataProcedure,
  buildUploadPayload,
  statementsPerUnit,
  uploadVariables,
} from './statements.js';
import type { WriteBatch, WriteOptions, WriteOutcome } from './types.js';
import { WriteStrategy } from './types.js';

/**
 * Everything a strategy needs besides the batch.
 */
export interface WriteContext {
  readonly cube: string;
  readonly dimensions: readonly string[];
  readonly options: WriteOptions;
  /** Open change set of a direct write */
  readonly changeset?: string;
  /** Element types of the last dimension, probed for generated procedures */
  readonly measureTypes?: ReadonlyMap<string, ElementType>;
}

/**
 * A way of writing one batch.
 */
export interface WriteStrategyExecutor {
  readonly kind: WriteStrategy;
  /** Whether the session user must be a data or operations admin */
  readonly requiresElevatedPrivilege: boolean;
  /** Oldest server version the strategy works with */
  readonly minimumVersion?: string;
  /** Largest batch this strategy accepts */
  maxUnitsPerGroup(options: WriteOptions): number;
  /**
   * Writes a batch. Server-side failures become an unsuccessful outcome;
   * anything else is thrown.
   */
  execute(batch: WriteBatch, context: WriteContext): Promise<WriteOutcome>;
}

/**
 * Short description of a failed group.
 */
export function describeFailure(error: Tm1Error): string {
  if (error instanceof RestError) {
    return `HTTP ${error.statusCode ?? 0} ${error.reason}`.trim();
  }
  if (error instanceof TimeoutError) {
    return `Timeout after ${error.timeout}s`;
  }
  return error.kind;
}

function succeeded(batch: WriteBatch): WriteOutcome {
  return { batchIndex: batch.index, range: batch.range, success: true, status: 'OK' };
}

function failed(batch: WriteBatch, error: unknown): WriteOutcome {
  if (!isTm1Error(error)) {
    throw error;
  }
  return {
    batchIndex: batch.index,
    range: batch.range,
    success: false,
    status: describeFailure(error),
    error,
  };
}

function fromProcessResult(batch: WriteBatch, result: ProcessExecuteResult): WriteOutcome {
  return {
    batchIndex: batch.index,
    range: batch.range,
    success: result.success,
    status: result.status,
    errorLogFile: result.errorLogFile,
  };
}

function callOptions(options: WriteOptions): { timeout?: number; cancelAtTimeout?: boolean; asyncMode?: boolean } {
  return { timeout: options.timeout, cancelAtTimeout: options.cancelAtTimeout, asyncMode: options.asyncMode };
}

/** Cells per `tm1.Update` request. */
export const DIRECT_GROUP_SIZE = 10_000;

/** Rows per uploaded file. */
export const BULK_UPLOAD_GROUP_SIZE = 500_000;

/**
 * `tm1.Update` against the cube. Replaying a batch writes the same values,
 * so direct writes are safe to repeat.
 */
export class DirectWriteStrategy implements WriteStrategyExecutor {
  readonly kind = WriteStrategy.Direct;
  readonly requiresElevatedPrivilege = false;

  constructor(private readonly cells: CellService) {}

  maxUnitsPerGroup(): number {
    return DIRECT_GROUP_SIZE;
  }

  async execute(batch: WriteBatch, context: WriteContext): Promise<WriteOutcome> {
    try {
      await this.cells.updateCells(context.cube, context.dimensions, batch.units, {
        ...callOptions(context.options),
        changeset: context.changeset,
      });
      return succeeded(batch);
    } catch (error) {
      return failed(batch, error);
    }
  }
}

/**
 * Generated TI statements run as an unbound process.
 */
export class GeneratedProcedureStrategy implements WriteStrategyExecutor {
  readonly kind = WriteStrategy.GeneratedProcedure;
  readonly requiresElevatedPrivilege = true;

  constructor(private readonly processes: ProcessService) {}

  maxUnitsPerGroup(options: WriteOptions): number {
    return Math.floor(this.processes.maxStatements() / statementsPerUnit(options));
  }

  async execute(batch: WriteBatch, context: WriteContext): Promise<WriteOutcome> {
    const prolog = buildStatements(batch.units, {
      increment: context.options.increment,
      precision: context.options.precision,
      skipNonUpdateable: context.options.skipNonUpdateable,
      measureTypes: context.measureTypes,
    });
    try {
      const result = await this.processes.executeTiCode(prolog, [], callOptions(context.options));
      return fromProcessResult(batch, result);
    } catch (error) {
      return failed(batch, error);
    }
  }
}

/**
 * Upload of a delimited file loaded by an unbound process.
 */
export class BulkUploadStrategy implements WriteStrategyExecutor {
  readonly kind = WriteStrategy.BulkUpload;
  readonly requiresElevatedPrivilege = true;
  readonly minimumVersion = '11.7';

  constructor(
    private readonly files: FileService,
    private readonly processes: ProcessService,
    private readonly server: ServerInfo,
    private readonly logger: Logger
  ) {}

  maxUnitsPerGroup(): number {
    return BULK_UPLOAD_GROUP_SIZE;
  }

  /**
   * Name under which the process reads an uploaded file. Before v12 files
   * live in the `}Externals` folder with a `.blob` suffix.
   */
  dataSourceName(fileName: string): string {
    return verifyVersion('12', this.server.version) ? fileName : `}Externals\\${fileName}.blob`;
  }

  async execute(batch: WriteBatch, context: WriteContext): Promise<WriteOutcome> {
    const fileName = `tm1_write_${uuidv4()}.csv`;
    let uploaded = false;
    try {
      await this.files.create(fileName, buildUploadPayload(batch.units, context.options.precision));
      uploaded = true;
      const result = await this.processes.executeWithReturn(
        this.loadProcess(fileName, context),
        callOptions(context.options)
      );
      return fromProcessResult(batch, result);
    } catch (error) {
      return failed(batch, error);
    } finally {
      if (uploaded && !context.options.retainBlob) {
        await this.removeFile(fileName);
      }
    }
  }

  private loadProcess(fileName: string, context: WriteContext): ProcessDefinition {
    return {
      name: '',
      dataSource: {
        dataSourceNameForServer: this.dataSourceName(fileName),
        delimiter: UPLOAD_DELIMITER,
        quoteCharacter: UPLOAD_QUOTE,
      },
      variables: uploadVariables(context.dimensions.length).map((name) => ({ name, type: 'String' })),
      data: buildUploadDataProcedure(context.cube, context.dimensions, {
        increment: context.options.increment,
        skipNonUpdateable: context.options.skipNonUpdateable,
      }),
    };
  }

  private async removeFile(fileName: string): Promise<void> {
    try {
      await this.files.delete(fileName);
    } catch (error) {
      this.logger.warn('Failed to delete uploaded file', { file: fileName, error: toError(error).message });
    }
  }
}
