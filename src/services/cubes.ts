/**
 * Cube structure and cube properties.
 * @module services/cubes
 */

import { z } from 'zod';
import type { RequestExecutor } from '../executor/index.js';
import { InvalidResponseError } from '../errors/index.js';
import { collectionValue, formatUrl, lowerAndDropSpaces } from '../utils/index.js';
import type { CellService } from './cells.js';
import { mdxName } from './cells.js';
import { PLAIN_CALL } from './types.js';

/**
 * Element types TM1 distinguishes.
 */
export type ElementType = 'Numeric' | 'String' | 'Consolidated';

const namedSchema = z.object({ Name: z.string() });
const elementSchema = z.object({
  Name: z.string(),
  Type: z.enum(['Numeric', 'String', 'Consolidated']),
});

const CUBE_PROPERTIES = '}CubeProperties';
const CUBES = '}Cubes';
const LOGGING = 'LOGGING';

/**
 * Service for cube metadata.
 */
export class CubeService {
  constructor(
    private readonly executor: RequestExecutor,
    private readonly cells: CellService
  ) {}

  /**
   * Dimension names of a cube, in cube order.
   */
  async getDimensionNames(cube: string): Promise<string[]> {
    const response = await this.executor.get(formatUrl("/Cubes('{}')/Dimensions?$select=Name", cube), PLAIN_CALL);
    return parseAll(collectionValue(response.json()), namedSchema, 'dimension').map((entry) => entry.Name);
  }

  /**
   * Element types of a hierarchy, keyed by element name with case and
   * whitespace removed.
   */
  async getElementTypes(dimension: string, hierarchy: string = dimension): Promise<Map<string, ElementType>> {
    const response = await this.executor.get(
      formatUrl("/Dimensions('{}')/Hierarchies('{}')/Elements?$select=Name,Type", dimension, hierarchy),
      PLAIN_CALL
    );
    const types = new Map<string, ElementType>();
    for (const element of parseAll(collectionValue(response.json()), elementSchema, 'element')) {
      types.set(lowerAndDropSpaces(element.Name), element.Type);
    }
    return types;
  }

  /**
   * Whether changes to the cube are written to the transaction log.
   */
  async getTransactionLogging(cube: string): Promise<boolean> {
    const mdx =
      `SELECT {${mdxName(CUBES)}.${mdxName(cube)}} ON 0, ` +
      `{${mdxName(CUBE_PROPERTIES)}.${mdxName(LOGGING)}} ON 1 ` +
      `FROM ${mdxName(CUBE_PROPERTIES)}`;
    const [value] = await this.cells.executeMdxValues(mdx);
    return typeof value === 'string' && value.trim().toUpperCase() === 'YES';
  }

  async setTransactionLogging(cube: string, enabled: boolean): Promise<void> {
    await this.cells.updateCells(CUBE_PROPERTIES, [CUBES, CUBE_PROPERTIES], [
      { coordinates: [cube, LOGGING], value: enabled ? 'YES' : 'NO' },
    ]);
  }
}

function parseAll<T>(entries: unknown[], schema: z.ZodType<T>, what: string): T[] {
  return entries.map((entry) => {
    const parsed = schema.safeParse(entry);
    if (!parsed.success) {
      throw new InvalidResponseError(`Unexpected ${what} entry: ${parsed.error.message}`);
    }
    return parsed.data;
  });
}
