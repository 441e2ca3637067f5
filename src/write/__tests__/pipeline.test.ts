import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import {
  InsufficientPrivilegeError,
  InvalidArgumentError,
  VersionError,
  WriteFailure,
  WritePartialFailure,
} from '../../errors/index.js';
import { NoopLogger } from '../../observability/index.js';
import type { ServerInfo } from '../../services/types.js';
import type { HttpRequest } from '../../transport/http-transport.js';
import { Tm1Response } from '../../transport/response.js';
import { createServerTransport, createTestStack, json, parseBody } from '../../__mocks__/index.js';
import type { PrivilegeSource } from '../pipeline.js';
import { BulkWritePipeline } from '../pipeline.js';
import type { WriteStrategyExecutor } from '../strategies.js';
import type { CellInput, WriteBatch, WriteOutcome } from '../types.js';
import { WriteStrategy } from '../types.js';

const BLOCK = '#****Begin: Generated Statements***\r\n#****End: Generated Statements****\r\n';

const ADMIN: PrivilegeSource = { isDataAdmin: async () => true, isOpsAdmin: async () => true };
const ANALYST: PrivilegeSource = { isDataAdmin: async () => false, isOpsAdmin: async () => false };

type Scripted = Pick<WriteOutcome, 'success' | 'status' | 'errorLogFile'>;

/**
 * Strategy that records batches and concurrency instead of talking to a server.
 */
class ScriptedStrategy implements WriteStrategyExecutor {
  readonly requiresElevatedPrivilege = false;
  readonly batches: WriteBatch[] = [];
  peak = 0;
  private running = 0;

  constructor(
    readonly kind: WriteStrategy,
    private readonly limit: number,
    private readonly script: (batch: WriteBatch) => Scripted | undefined = () => undefined
  ) {}

  maxUnitsPerGroup(): number {
    return this.limit;
  }

  async execute(batch: WriteBatch): Promise<WriteOutcome> {
    this.batches.push(batch);
    this.running++;
    this.peak = Math.max(this.peak, this.running);
    await new Promise((resolve) => setTimeout(resolve, 5));
    this.running--;
    const scripted = this.script(batch) ?? { success: true, status: 'OK' };
    return { batchIndex: batch.index, range: batch.range, ...scripted };
  }
}

function* numberedCells(count: number): Generator<readonly [string[], number]> {
  for (let i = 0; i < count; i++) {
    yield [['Actual', `E${i}`], i];
  }
}

function bodyOf(requests: HttpRequest[]): unknown {
  const [request] = requests;
  return request ? parseBody(request) : undefined;
}

function textOf(request: HttpRequest | undefined): string | undefined {
  const body = request?.body;
  return body instanceof Uint8Array ? Buffer.from(body).toString('utf-8') : body;
}

async function setup(
  options: {
    version?: string;
    roles?: PrivilegeSource;
    server?: ServerInfo;
    strategies?: WriteStrategyExecutor[];
  } = {}
) {
  const transport = createServerTransport(options.version);
  const stack = createTestStack({}, { transport });
  await stack.session.connect();
  const pipeline = new BulkWritePipeline({
    ...stack.services,
    server: options.server ?? stack.session,
    roles: options.roles ?? ADMIN,
    logger: new NoopLogger(),
    strategies: options.strategies,
  });
  return { ...stack, pipeline };
}

async function failureOf(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(
    () => undefined,
    (error: unknown) => error
  );
}

const DIMENSIONS = ['Version', 'Measure'];

describe('BulkWritePipeline', () => {
  describe('grouping', () => {
    it('should split 600,000 cells into three groups written concurrently', async () => {
      const strategy = new ScriptedStrategy(WriteStrategy.BulkUpload, 500_000);
      const { pipeline } = await setup({ strategies: [strategy] });

      const result = await pipeline.write('Sales', numberedCells(600_000), {
        strategy: WriteStrategy.BulkUpload,
        maxUnitsPerGroup: 250_000,
        maxWorkers: 8,
        dimensions: ['Version', 'Element'],
      });

      expect(result.overall).toBe('success');
      expect(result.attempts).toBe(3);
      expect(result.outcomes.map((outcome) => outcome.range)).toEqual([
        { start: 0, end: 250_000 },
        { start: 250_000, end: 500_000 },
        { start: 500_000, end: 600_000 },
      ]);
      expect(strategy.peak).toBe(3);
    });

    it('should cap the group size at the strategy limit', async () => {
      const strategy = new ScriptedStrategy(WriteStrategy.Direct, 4);
      const { pipeline } = await setup({ strategies: [strategy] });

      await pipeline.write('Sales', numberedCells(10), { maxUnitsPerGroup: 100, dimensions: DIMENSIONS });

      expect(strategy.batches.map((batch) => batch.units.length)).toEqual([4, 4, 2]);
    });

    it('should write serially by default', async () => {
      const strategy = new ScriptedStrategy(WriteStrategy.Direct, 1);
      const { pipeline } = await setup({ strategies: [strategy] });

      await pipeline.write('Sales', numberedCells(3), { dimensions: DIMENSIONS });

      expect(strategy.peak).toBe(1);
    });

    it('should succeed without requests for empty input', async () => {
      const { pipeline, transport } = await setup();
      const before = transport.requests.length;

      expect(await pipeline.write('Sales', [])).toEqual({ overall: 'success', outcomes: [], attempts: 0 });
      expect(transport.requests).toHaveLength(before);
    });
  });

  describe('failures', () => {
    it('should finish every group and report a partial failure', async () => {
      const strategy = new ScriptedStrategy(WriteStrategy.BulkUpload, 10, (batch) =>
        batch.index === 1
          ? { success: false, status: 'HasMinorErrors', errorLogFile: 'TM1ProcessError_2.log' }
          : undefined
      );
      const { pipeline } = await setup({ strategies: [strategy] });

      const error = await failureOf(
        pipeline.write('Sales', numberedCells(30), {
          strategy: WriteStrategy.BulkUpload,
          maxWorkers: 2,
          dimensions: DIMENSIONS,
        })
      );

      expect(error).toBeInstanceOf(WritePartialFailure);
      expect(error).toMatchObject({
        attempts: 3,
        statuses: ['HasMinorErrors'],
        errorLogFiles: ['TM1ProcessError_2.log'],
        message: '1 of 3 write group(s) failed. Statuses: HasMinorErrors. Error logs: TM1ProcessError_2.log',
      });
      expect(strategy.batches).toHaveLength(3);
    });

    it('should raise WriteFailure when every group fails', async () => {
      const strategy = new ScriptedStrategy(WriteStrategy.Direct, 5, () => ({ success: false, status: 'Aborted' }));
      const { pipeline } = await setup({ strategies: [strategy] });

      const error = await failureOf(pipeline.write('Sales', numberedCells(10), { dimensions: DIMENSIONS }));

      expect(error).toBeInstanceOf(WriteFailure);
      expect(error).toMatchObject({ attempts: 2, statuses: ['Aborted', 'Aborted'], errorLogFiles: [] });
    });
  });

  describe('validation', () => {
    it('should refuse increments with the direct strategy', async () => {
      const { pipeline } = await setup();

      await expect(
        pipeline.write('Sales', numberedCells(1), { increment: true, dimensions: DIMENSIONS })
      ).rejects.toThrow('Incremental writes need the generated_procedure or bulk_upload strategy');
    });

    it('should refuse change sets outside the direct strategy', async () => {
      const { pipeline } = await setup();

      await expect(
        pipeline.write('Sales', numberedCells(1), {
          strategy: WriteStrategy.GeneratedProcedure,
          useChangeset: true,
          dimensions: DIMENSIONS,
        })
      ).rejects.toThrow(InvalidArgumentError);
    });

    it('should reject invalid worker counts and precision', async () => {
      const { pipeline } = await setup();

      await expect(pipeline.write('Sales', numberedCells(1), { maxWorkers: 0 })).rejects.toThrow(
        'maxWorkers must be a positive integer, got 0'
      );
      await expect(pipeline.write('Sales', numberedCells(1), { precision: 21 })).rejects.toThrow(
        'precision must be an integer between 0 and 20'
      );
    });

    it('should reject coordinates that do not match the cube', async () => {
      const { pipeline } = await setup();
      const cells: CellInput = [[['Revenue'], 1]];

      await expect(pipeline.write('Sales', cells, { dimensions: DIMENSIONS })).rejects.toThrow(
        "Cell 0 has 1 coordinates but cube 'Sales' has 2 dimensions"
      );
    });

    it('should reject non-finite values before any group is written', async () => {
      const { pipeline, transport } = await setup();
      const cells: CellInput = [
        [['Actual', 'E0'], 1],
        [['Actual', 'E1'], Number.NaN],
        [['Actual', 'E2'], 3],
      ];

      const error = await failureOf(
        pipeline.write('Sales', cells, {
          strategy: WriteStrategy.GeneratedProcedure,
          maxUnitsPerGroup: 1,
          dimensions: DIMENSIONS,
        })
      );

      expect(error).toBeInstanceOf(InvalidArgumentError);
      expect(error).toMatchObject({ message: 'Cell 1 has non-finite value NaN' });
      expect(transport.sent('POST', '/ExecuteProcessWithReturn')).toHaveLength(0);
    });

    it('should require admin rights for process-based strategies', async () => {
      const { pipeline, transport } = await setup({ roles: ANALYST });

      const error = await failureOf(
        pipeline.write('Sales', numberedCells(1), { strategy: WriteStrategy.GeneratedProcedure, dimensions: DIMENSIONS })
      );

      expect(error).toBeInstanceOf(InsufficientPrivilegeError);
      expect(error).toMatchObject({
        message: 'The generated_procedure write strategy requires one of: DataAdmin, OperationsAdmin',
      });
      expect(transport.sent('POST', '/ExecuteProcessWithReturn')).toHaveLength(0);
    });

    it('should require 11.7 for bulk uploads', async () => {
      const { pipeline } = await setup({ server: { version: '11.6.00000.1' } });

      await expect(
        pipeline.write('Sales', numberedCells(1), { strategy: WriteStrategy.BulkUpload, dimensions: DIMENSIONS })
      ).rejects.toThrow(VersionError);
    });
  });

  describe('direct strategy', () => {
    const updateSchema = z.array(
      z.object({
        Cells: z.array(z.object({ 'Tuple@odata.bind': z.array(z.string()) })),
        Value: z.union([z.string(), z.number()]),
      })
    );

    function elementOf(binding: string): string {
      return binding.slice(binding.lastIndexOf("Elements('") + "Elements('".length, -2);
    }

    it('should leave the cube in the same state when repeated', async () => {
      const { pipeline, transport } = await setup();
      const cube = new Map<string, string | number>();
      transport
        .on('GET', "/Cubes('Sales')/Dimensions", () => json(200, { value: [{ Name: 'Version' }, { Name: 'Measure' }] }))
        .on('POST', "/Cubes('Sales')/tm1.Update", (request) => {
          for (const update of updateSchema.parse(parseBody(request))) {
            for (const cell of update.Cells) {
              cube.set(cell['Tuple@odata.bind'].map(elementOf).join('|'), update.Value);
            }
          }
          return Tm1Response.of(204);
        });
      const cells: CellInput = [
        [['Actual', 'Revenue'], 100],
        [['Actual', 'Cost'], 60],
        [['Actual', 'Comment'], 'final'],
      ];

      await pipeline.write('Sales', cells, { maxUnitsPerGroup: 2 });
      const once = new Map(cube);
      await pipeline.write('Sales', cells, { maxUnitsPerGroup: 2 });

      expect(cube).toEqual(once);
      expect([...cube.entries()]).toEqual([
        ['Actual|Revenue', 100],
        ['Actual|Cost', 60],
        ['Actual|Comment', 'final'],
      ]);
      expect(transport.sent('POST', '/tm1.Update')).toHaveLength(4);
    });

    it('should tag writes with one change set', async () => {
      const { pipeline, transport } = await setup();
      transport
        .on('POST', '/BeginChangeSet', () => json(201, { value: 'cs-9' }))
        .on('POST', '/tm1.Update', () => Tm1Response.of(204))
        .on('POST', '/EndChangeSet', () => Tm1Response.of(204));

      await pipeline.write('Sales', numberedCells(3), { useChangeset: true, maxUnitsPerGroup: 2, dimensions: DIMENSIONS });

      expect(transport.sent('POST', '/tm1.Update').map((request) => request.url.endsWith('?!ChangeSet=cs-9'))).toEqual([
        true,
        true,
      ]);
      expect(bodyOf(transport.sent('POST', '/EndChangeSet'))).toEqual({ ChangeSetID: 'cs-9' });
    });

    it('should restore the transaction log after a failed write', async () => {
      const { pipeline, transport } = await setup();
      transport
        .on('POST', '/ExecuteMDX', () => json(201, { ID: 'c1', Cells: [{ Value: 'YES' }] }))
        .on('DELETE', "/Cellsets('c1')", () => Tm1Response.of(204))
        .on('POST', "/Cubes('}CubeProperties')/tm1.Update", () => Tm1Response.of(204))
        .on('POST', "/Cubes('Sales')/tm1.Update", () => Tm1Response.of(500, 'out of memory'));

      const error = await failureOf(
        pipeline.write('Sales', numberedCells(1), { suppressTransactionLog: true, dimensions: DIMENSIONS })
      );

      expect(error).toBeInstanceOf(WriteFailure);
      expect(error).toMatchObject({ statuses: ['HTTP 500 Internal Server Error'] });
      expect(transport.sent('POST', "/Cubes('}CubeProperties')/tm1.Update").map(parseBody)).toMatchObject([
        [{ Value: 'NO' }],
        [{ Value: 'YES' }],
      ]);
    });

    it('should leave a cube without logging untouched', async () => {
      const { pipeline, transport } = await setup();
      transport
        .on('POST', '/ExecuteMDX', () => json(201, { ID: 'c1', Cells: [{ Value: 'NO' }] }))
        .on('DELETE', "/Cellsets('c1')", () => Tm1Response.of(204))
        .on('POST', "/Cubes('Sales')/tm1.Update", () => Tm1Response.of(204));

      await pipeline.write('Sales', numberedCells(1), { suppressTransactionLog: true, dimensions: DIMENSIONS });

      expect(transport.sent('POST', '}CubeProperties')).toHaveLength(0);
    });
  });

  describe('generated procedure strategy', () => {
    it('should run one process per group and collect error logs', async () => {
      const { pipeline, transport } = await setup();
      transport
        .on('GET', "/Dimensions('Measure')/Hierarchies('Measure')/Elements", () =>
          json(200, {
            value: [
              { Name: 'Price', Type: 'Numeric' },
              { Name: 'Comment', Type: 'String' },
            ],
          })
        )
        .once('POST', '/ExecuteProcessWithReturn', () => json(201, { ProcessExecuteStatusCode: 'CompletedSuccessfully' }))
        .once('POST', '/ExecuteProcessWithReturn', () =>
          json(201, { ProcessExecuteStatusCode: 'HasMinorErrors', ErrorLogFile: { Filename: 'TM1ProcessError_9.log' } })
        );
      const cells: CellInput = [
        [['Actual', 'Price'], 10],
        [['Actual', 'Comment'], 'ok'],
      ];

      const error = await failureOf(
        pipeline.write('Sales', cells, {
          strategy: WriteStrategy.GeneratedProcedure,
          maxUnitsPerGroup: 1,
          dimensions: DIMENSIONS,
        })
      );

      expect(error).toBeInstanceOf(WritePartialFailure);
      expect(error).toMatchObject({ attempts: 2, errorLogFiles: ['TM1ProcessError_9.log'] });
      expect(transport.sent('POST', '/ExecuteProcessWithReturn').map(parseBody)).toMatchObject([
        { Process: { PrologProcedure: `${BLOCK}CellPutN(10, 'Sales', 'Actual', 'Price');` } },
        { Process: { PrologProcedure: `${BLOCK}CellPutS('ok', 'Sales', 'Actual', 'Comment');` } },
      ]);
    });
  });

  describe('bulk upload strategy', () => {
    const documentSchema = z.object({ ID: z.string() });

    function routeUpload(transport: ReturnType<typeof createServerTransport>, processStatus: number): void {
      transport
        .on('POST', "/Contents('Blobs')/Contents", () => Tm1Response.of(201))
        .on('PUT', '/Content', () => Tm1Response.of(204))
        .on('DELETE', "/Contents('Blobs')/Contents('tm1_write_", () => Tm1Response.of(204))
        .on('POST', '/ExecuteProcessWithReturn', () =>
          processStatus === 201
            ? json(201, { ProcessExecuteStatusCode: 'CompletedSuccessfully' })
            : Tm1Response.of(processStatus, 'process failed')
        );
    }

    it('should upload a file, load it and delete it', async () => {
      const { pipeline, transport } = await setup();
      routeUpload(transport, 201);

      const result = await pipeline.write('Sales', [[['Actual', 'Price'], 10]], {
        strategy: WriteStrategy.BulkUpload,
        dimensions: DIMENSIONS,
      });

      expect(result.attempts).toBe(1);
      const { ID: fileName } = documentSchema.parse(bodyOf(transport.sent('POST', '/Contents')));
      expect(fileName).toMatch(/^tm1_write_[0-9a-f-]{36}\.csv$/);
      expect(textOf(transport.sent('PUT', '/Content')[0])).toBe('"Actual","Price","10"');
      expect(bodyOf(transport.sent('POST', '/ExecuteProcessWithReturn'))).toMatchObject({
        Process: {
          DataSource: { Type: 'ASCII', dataSourceNameForServer: `}Externals\\${fileName}.blob` },
          Variables: [{ Name: 'v1' }, { Name: 'v2' }, { Name: 'vValue' }],
        },
      });
      const deletes = transport.sent('DELETE', '/Contents');
      expect(deletes).toHaveLength(1);
      expect(deletes[0]?.url.endsWith(`Contents('${fileName}')`)).toBe(true);
    });

    it('should keep the file when asked', async () => {
      const { pipeline, transport } = await setup();
      routeUpload(transport, 201);

      await pipeline.write('Sales', [[['Actual', 'Price'], 10]], {
        strategy: WriteStrategy.BulkUpload,
        retainBlob: true,
        dimensions: DIMENSIONS,
      });

      expect(transport.sent('DELETE', '/Contents')).toHaveLength(0);
    });

    it('should delete the file when the load fails', async () => {
      const { pipeline, transport } = await setup();
      routeUpload(transport, 500);

      const error = await failureOf(
        pipeline.write('Sales', [[['Actual', 'Price'], 10]], { strategy: WriteStrategy.BulkUpload, dimensions: DIMENSIONS })
      );

      expect(error).toBeInstanceOf(WriteFailure);
      expect(transport.sent('DELETE', '/Contents')).toHaveLength(1);
    });
  });
});
