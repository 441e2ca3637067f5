/**
 * Services module
 */

export { CellService, HIERARCHY_SEPARATOR, buildUpdateBody, elementBinding, mdxName } from './cells.js';
export type { CellUpdate, UpdateCellsOptions } from './cells.js';
export { CubeService } from './cubes.js';
export type { ElementType } from './cubes.js';
export { FileService } from './files.js';
export { MonitoringService } from './monitoring.js';
export type { Tm1Thread } from './monitoring.js';
export {
  COMPLETED_SUCCESSFULLY,
  GENERATED_STATEMENTS_BLOCK,
  MAX_STATEMENTS,
  MAX_STATEMENTS_LEGACY,
  ProcessService,
  buildProcessBody,
  parseExecuteResult,
  procedureText,
} from './processes.js';
export type {
  AsciiDataSource,
  ExecuteProcessOptions,
  ProcessDefinition,
  ProcessExecuteResult,
  ProcessParameter,
  ProcessVariable,
  ProcessVariableType,
} from './processes.js';
export { SecurityService } from './security.js';
export { PLAIN_CALL } from './types.js';
export type { CallOptions, ServerInfo } from './types.js';

import type { RequestExecutor } from '../executor/index.js';
import { CellService } from './cells.js';
import { CubeService } from './cubes.js';
import { FileService } from './files.js';
import { MonitoringService } from './monitoring.js';
import { ProcessService } from './processes.js';
import { SecurityService } from './security.js';
import type { ServerInfo } from './types.js';

/**
 * Container for all TM1 services.
 */
export interface Tm1Services {
  cells: CellService;
  cubes: CubeService;
  files: FileService;
  monitoring: MonitoringService;
  processes: ProcessService;
  security: SecurityService;
}

/**
 * Creates all services over a shared executor.
 *
 * @param server - Source of the server version, usually the session
 */
export function createServices(executor: RequestExecutor, server: ServerInfo): Tm1Services {
  const cells = new CellService(executor);
  return {
    cells,
    cubes: new CubeService(executor, cells),
    files: new FileService(executor, server),
    monitoring: new MonitoringService(executor),
    processes: new ProcessService(executor, server),
    security: new SecurityService(executor),
  };
}
