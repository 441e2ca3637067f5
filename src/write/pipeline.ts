/**
 * Bulk cell writes.
 *
 * Units are split into consecutive batches, each written on its own by the
 * selected strategy, optionally several at a time. A failed batch never stops
 * the others; once every batch has finished the outcomes are aggregated and
 * any failure is raised.
 *
 * @module write/pipeline
 */

import { mapBounded, withScope } from '../concurrency/index.js';
import {
  InsufficientPrivilegeError,
  InvalidArgumentError,
  VersionError,
  WriteFailure,
  WritePartialFailure,
} from '../errors/index.js';
import type { Logger } from '../observability/index.js';
import type { CellService } from '../services/cells.js';
import type { CubeService, ElementType } from '../services/cubes.js';
import type { FileService } from '../services/files.js';
import type { ProcessService } from '../services/processes.js';
import type { ServerInfo } from '../services/types.js';
import { verifyVersion } from '../utils/index.js';
import { toBatches } from './chunking.js';
import { ChangesetScope, TransactionLogSuppression } from './guards.js';
import type { WriteContext, WriteStrategyExecutor } from './strategies.js';
import { BulkUploadStrategy, DirectWriteStrategy, GeneratedProcedureStrategy } from './strategies.js';
import type { CellInput, WriteBatch, WriteOptions, WriteOutcome, WriteResult, WriteUnit } from './types.js';
import { WriteStrategy } from './types.js';

/**
 * Admin flags of the session user.
 */
export interface PrivilegeSource {
  isDataAdmin(): Promise<boolean>;
  isOpsAdmin(): Promise<boolean>;
}

/**
 * Dependencies of {@link BulkWritePipeline}.
 */
export interface BulkWritePipelineOptions {
  cells: CellService;
  cubes: CubeService;
  processes: ProcessService;
  files: FileService;
  server: ServerInfo;
  roles: PrivilegeSource;
  logger: Logger;
  /** Replaces the built-in strategy of the same kind */
  strategies?: WriteStrategyExecutor[];
}

const MAX_PRECISION = 20;

/**
 * Aggregates batch outcomes.
 *
 * @throws {WriteFailure} If no batch succeeded
 * @throws {WritePartialFailure} If some but not all batches succeeded
 */
export function summarizeOutcomes(outcomes: readonly WriteOutcome[]): WriteResult {
  const failures = outcomes.filter((outcome) => !outcome.success);
  if (failures.length === 0) {
    return { overall: 'success', outcomes, attempts: outcomes.length };
  }

  const diagnostics = {
    statuses: failures.map((outcome) => outcome.status),
    errorLogFiles: failures.flatMap((outcome) => (outcome.errorLogFile ? [outcome.errorLogFile] : [])),
    attempts: outcomes.length,
  };
  if (failures.length === outcomes.length) {
    throw new WriteFailure(diagnostics);
  }
  throw new WritePartialFailure(diagnostics);
}

/**
 * Turns caller input into write units.
 */
export function toWriteUnits(cube: string, cells: CellInput): WriteUnit[] {
  const units: WriteUnit[] = [];
  for (const [coordinates, value] of cells) {
    units.push({ cube, coordinates, value });
  }
  return units;
}

/**
 * Writes cells in batches.
 */
export class BulkWritePipeline {
  private readonly cells: CellService;
  private readonly cubes: CubeService;
  private readonly roles: PrivilegeSource;
  private readonly server: ServerInfo;
  private readonly logger: Logger;
  private readonly strategies = new Map<WriteStrategy, WriteStrategyExecutor>();

  constructor(options: BulkWritePipelineOptions) {
    this.cells = options.cells;
    this.cubes = options.cubes;
    this.roles = options.roles;
    this.server = options.server;
    this.logger = options.logger;

    const builtIn: WriteStrategyExecutor[] = [
      new DirectWriteStrategy(options.cells),
      new GeneratedProcedureStrategy(options.processes),
      new BulkUploadStrategy(options.files, options.processes, options.server, options.logger),
    ];
    for (const strategy of [...builtIn, ...(options.strategies ?? [])]) {
      this.strategies.set(strategy.kind, strategy);
    }
  }

  /**
   * Writes `cells` into `cube`.
   *
   * @returns The outcomes, if every batch succeeded
   * @throws {InvalidArgumentError} If the options, coordinates or values are invalid
   * @throws {VersionError} If the server is too old for the strategy
   * @throws {InsufficientPrivilegeError} If the strategy needs admin rights the user lacks
   * @throws {WriteFailure} If every batch failed
   * @throws {WritePartialFailure} If some batches failed
   */
  async write(cube: string, cells: CellInput, options: WriteOptions = {}): Promise<WriteResult> {
    const strategy = this.strategyFor(options.strategy ?? WriteStrategy.Direct);
    validateOptions(strategy.kind, options);

    if (strategy.minimumVersion && !verifyVersion(strategy.minimumVersion, this.server.version)) {
      throw new VersionError(`The ${strategy.kind} write strategy`, strategy.minimumVersion, this.server.version);
    }

    if (strategy.requiresElevatedPrivilege) {
      await this.assertPrivilege(strategy.kind);
    }

    const units = toWriteUnits(cube, cells);
    if (units.length === 0) {
      return { overall: 'success', outcomes: [], attempts: 0 };
    }

    const dimensions = options.dimensions ?? (await this.cubes.getDimensionNames(cube));
    assertUnits(cube, units, dimensions);

    const groupSize = Math.min(options.maxUnitsPerGroup ?? Infinity, strategy.maxUnitsPerGroup(options));
    const batches = toBatches(units, groupSize);
    const workers = options.maxWorkers ?? 1;
    const measureTypes =
      strategy.kind === WriteStrategy.GeneratedProcedure ? await this.probeMeasureTypes(dimensions) : undefined;

    this.logger.info('Writing cells', {
      cube,
      strategy: strategy.kind,
      units: units.length,
      groups: batches.length,
      workers,
    });

    const run = (changeset?: string): Promise<WriteOutcome[]> =>
      this.runBatches(strategy, batches, workers, { cube, dimensions, options, changeset, measureTypes });
    const runTagged = (): Promise<WriteOutcome[]> =>
      options.useChangeset ? withScope(new ChangesetScope(this.cells), run, this.logger) : run();

    const outcomes = options.suppressTransactionLog
      ? await withScope(new TransactionLogSuppression(this.cubes, cube, this.logger), runTagged, this.logger)
      : await runTagged();

    return summarizeOutcomes(outcomes);
  }

  private async runBatches(
    strategy: WriteStrategyExecutor,
    batches: readonly WriteBatch[],
    workers: number,
    context: WriteContext
  ): Promise<WriteOutcome[]> {
    return mapBounded(batches, workers, async (batch) => {
      const outcome = await strategy.execute(batch, context);
      if (!outcome.success) {
        this.logger.warn('Write group failed', {
          cube: context.cube,
          group: outcome.batchIndex,
          units: `${outcome.range.start}-${outcome.range.end}`,
          status: outcome.status,
          errorLogFile: outcome.errorLogFile,
        });
      }
      return outcome;
    });
  }

  private strategyFor(kind: WriteStrategy): WriteStrategyExecutor {
    const strategy = this.strategies.get(kind);
    if (!strategy) {
      throw new InvalidArgumentError(`Unknown write strategy '${kind}'`);
    }
    return strategy;
  }

  private async assertPrivilege(kind: WriteStrategy): Promise<void> {
    if ((await this.roles.isDataAdmin()) || (await this.roles.isOpsAdmin())) {
      return;
    }
    throw new InsufficientPrivilegeError(`The ${kind} write strategy`, ['DataAdmin', 'OperationsAdmin']);
  }

  private async probeMeasureTypes(dimensions: readonly string[]): Promise<Map<string, ElementType>> {
    const measure = dimensions[dimensions.length - 1];
    return measure === undefined ? new Map() : this.cubes.getElementTypes(measure);
  }
}

function validateOptions(kind: WriteStrategy, options: WriteOptions): void {
  if (options.maxWorkers !== undefined && (!Number.isInteger(options.maxWorkers) || options.maxWorkers < 1)) {
    throw new InvalidArgumentError(`maxWorkers must be a positive integer, got ${options.maxWorkers}`);
  }
  if (
    options.maxUnitsPerGroup !== undefined &&
    (!Number.isInteger(options.maxUnitsPerGroup) || options.maxUnitsPerGroup < 1)
  ) {
    throw new InvalidArgumentError(`maxUnitsPerGroup must be a positive integer, got ${options.maxUnitsPerGroup}`);
  }
  if (
    options.precision !== undefined &&
    (!Number.isInteger(options.precision) || options.precision < 0 || options.precision > MAX_PRECISION)
  ) {
    throw new InvalidArgumentError(`precision must be an integer between 0 and ${MAX_PRECISION}`);
  }
  if (kind === WriteStrategy.Direct && options.increment) {
    throw new InvalidArgumentError('Incremental writes need the generated_procedure or bulk_upload strategy');
  }
  if (kind !== WriteStrategy.Direct && options.useChangeset) {
    throw new InvalidArgumentError('Change sets are only supported by the direct write strategy');
  }
}

function assertUnits(cube: string, units: readonly WriteUnit[], dimensions: readonly string[]): void {
  units.forEach((unit, index) => {
    if (unit.coordinates.length !== dimensions.length) {
      throw new InvalidArgumentError(
        `Cell ${index} has ${unit.coordinates.length} coordinates but cube '${cube}' has ${dimensions.length} dimensions`
      );
    }
    if (typeof unit.value === 'number' && !Number.isFinite(unit.value)) {
      throw new InvalidArgumentError(`Cell ${index} has non-finite value ${unit.value}`);
    }
  });
}
