/**
 * Cell writes and reads.
 * @module services/cells
 */

import { z } from 'zod';
import type { RequestExecutor } from '../executor/index.js';
import { InvalidResponseError } from '../errors/index.js';
import { formatUrl } from '../utils/index.js';
import type { CallOptions } from './types.js';
import { PLAIN_CALL } from './types.js';

/**
 * Separates hierarchy and element in a coordinate: `Region::Europe`.
 */
export const HIERARCHY_SEPARATOR = '::';

/**
 * One cell to update.
 */
export interface CellUpdate {
  coordinates: readonly string[];
  value: string | number;
}

/**
 * Options of a cell update.
 */
export interface UpdateCellsOptions extends CallOptions {
  /** Change set the update belongs to */
  changeset?: string;
}

const cellsetSchema = z.object({
  ID: z.string(),
  Cells: z.array(z.object({ Value: z.union([z.string(), z.number(), z.null()]) })),
});

const changesetSchema = z.object({ value: z.string() });

/**
 * OData bind path of one coordinate.
 */
export function elementBinding(dimension: string, coordinate: string): string {
  const separator = coordinate.indexOf(HIERARCHY_SEPARATOR);
  const hierarchy = separator === -1 ? dimension : coordinate.slice(0, separator);
  const element = separator === -1 ? coordinate : coordinate.slice(separator + HIERARCHY_SEPARATOR.length);
  return formatUrl("Dimensions('{}')/Hierarchies('{}')/Elements('{}')", dimension, hierarchy, element);
}

/**
 * Body of a `tm1.Update` request.
 */
export function buildUpdateBody(
  dimensions: readonly string[],
  updates: Iterable<CellUpdate>
): Array<Record<string, unknown>> {
  const body: Array<Record<string, unknown>> = [];
  for (const update of updates) {
    body.push({
      Cells: [
        {
          'Tuple@odata.bind': update.coordinates.map((coordinate, index) =>
            elementBinding(dimensions[index] ?? '', coordinate)
          ),
        },
      ],
      Value: update.value,
    });
  }
  return body;
}

/**
 * Quotes a name for use in MDX.
 */
export function mdxName(name: string): string {
  return `[${name.replace(/\]/g, ']]')}]`;
}

/**
 * Service for reading and writing cells.
 */
export class CellService {
  constructor(private readonly executor: RequestExecutor) {}

  /**
   * Writes values to cells with `tm1.Update`.
   */
  async updateCells(
    cube: string,
    dimensions: readonly string[],
    updates: Iterable<CellUpdate>,
    options: UpdateCellsOptions = {}
  ): Promise<void> {
    let path = formatUrl("/Cubes('{}')/tm1.Update", cube);
    if (options.changeset) {
      path += `?!ChangeSet=${options.changeset}`;
    }
    await this.executor.post(path, buildUpdateBody(dimensions, updates), {
      timeout: options.timeout,
      cancelAtTimeout: options.cancelAtTimeout,
      asyncMode: options.asyncMode,
    });
  }

  /**
   * Opens a change set. Writes tagged with it can be undone as one.
   */
  async beginChangeset(): Promise<string> {
    const response = await this.executor.post('/BeginChangeSet', '', PLAIN_CALL);
    const parsed = changesetSchema.safeParse(response.json());
    if (!parsed.success) {
      throw new InvalidResponseError('BeginChangeSet returned no change set id');
    }
    return parsed.data.value;
  }

  async endChangeset(changeset: string): Promise<void> {
    await this.executor.post('/EndChangeSet', { ChangeSetID: changeset }, PLAIN_CALL);
  }

  /**
   * Executes an MDX query and returns the cell values in order. The cellset
   * is deleted afterwards.
   */
  async executeMdxValues(mdx: string): Promise<Array<string | number | null>> {
    const response = await this.executor.post('/ExecuteMDX?$expand=Cells($select=Value)', { MDX: mdx }, PLAIN_CALL);
    const parsed = cellsetSchema.safeParse(response.json());
    if (!parsed.success) {
      throw new InvalidResponseError(`Unexpected cellset: ${parsed.error.message}`);
    }
    try {
      return parsed.data.Cells.map((cell) => cell.Value);
    } finally {
      await this.executor.delete(formatUrl("/Cellsets('{}')", parsed.data.ID), PLAIN_CALL);
    }
  }
}
