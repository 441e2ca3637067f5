/**
 * Write module
 */

export * from './types.js';
export { chunk, groupCount, toBatches } from './chunking.js';
export type { Chunk } from './chunking.js';
export {
  buildStatements,
  buildUploadDataProcedure,
  buildUploadPayload,
  cellStatements,
  formatNumber,
  tiString,
} from './statements.js';
export type { StatementOptions } from './statements.js';
export {
  BULK_UPLOAD_GROUP_SIZE,
  BulkUploadStrategy,
  DIRECT_GROUP_SIZE,
  DirectWriteStrategy,
  GeneratedProcedureStrategy,
  describeFailure,
} from './strategies.js';
export type { WriteContext, WriteStrategyExecutor } from './strategies.js';
export { ChangesetScope, TransactionLogSuppression } from './guards.js';
export { BulkWritePipeline, summarizeOutcomes, toWriteUnits } from './pipeline.js';
export type { BulkWritePipelineOptions, PrivilegeSource } from './pipeline.js';
