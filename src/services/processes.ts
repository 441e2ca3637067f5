/**
 * TurboIntegrator process execution.
 *
 * Processes are executed unbound: the definition travels with the request
 * and nothing is created on the server.
 *
 * @module services/processes
 */

import { z } from 'zod';
import type { AsyncOperationHandle, RequestExecutor } from '../executor/index.js';
import { InvalidResponseError } from '../errors/index.js';
import type { Tm1Response } from '../transport/response.js';
import { formatUrl, verifyVersion } from '../utils/index.js';
import type { CallOptions, ServerInfo } from './types.js';

/**
 * Marker block TM1 expects at the top of every procedure.
 */
export const GENERATED_STATEMENTS_BLOCK =
  '#****Begin: Generated Statements***\r\n#****End: Generated Statements****\r\n';

/** Statement limit per procedure before 11.8.015. */
export const MAX_STATEMENTS_LEGACY = 16_380;

/** Statement limit per procedure from 11.8.015 on. */
export const MAX_STATEMENTS = 100_000;

/**
 * Status reported for a process run that completed without errors.
 */
export const COMPLETED_SUCCESSFULLY = 'CompletedSuccessfully';

export type ProcessVariableType = 'String' | 'Numeric';

export interface ProcessVariable {
  name: string;
  type: ProcessVariableType;
}

export interface ProcessParameter {
  name: string;
  value: string | number;
}

/**
 * Delimited text file read by the data procedure.
 */
export interface AsciiDataSource {
  /** File name as the server sees it */
  dataSourceNameForServer: string;
  delimiter?: string;
  quoteCharacter?: string;
  headerRecords?: number;
  decimalSeparator?: string;
  thousandSeparator?: string;
}

/**
 * A process definition.
 */
export interface ProcessDefinition {
  name: string;
  /** Procedure text, or statements joined with CRLF */
  prolog?: string | readonly string[];
  metadata?: string | readonly string[];
  data?: string | readonly string[];
  epilog?: string | readonly string[];
  dataSource?: AsciiDataSource;
  variables?: ProcessVariable[];
  parameters?: ProcessParameter[];
  hasSecurityAccess?: boolean;
}

/**
 * Outcome of a process run.
 */
export interface ProcessExecuteResult {
  success: boolean;
  /** Server status such as `CompletedSuccessfully`, `HasMinorErrors`, `Aborted` */
  status: string;
  /** Error log written by the run, if any */
  errorLogFile?: string;
}

const executeResultSchema = z.object({
  ProcessExecuteStatusCode: z.string(),
  ErrorLogFile: z.object({ Filename: z.string() }).nullish(),
});

/**
 * Prepends the generated-statements block.
 */
export function procedureText(statements: string | readonly string[] = ''): string {
  const text = typeof statements === 'string' ? statements : statements.join('\r\n');
  return `${GENERATED_STATEMENTS_BLOCK}${text}`;
}

/**
 * REST representation of a process definition.
 */
export function buildProcessBody(definition: ProcessDefinition): Record<string, unknown> {
  const variables = definition.variables ?? [];
  return {
    Name: definition.name,
    HasSecurityAccess: definition.hasSecurityAccess ?? false,
    PrologProcedure: procedureText(definition.prolog),
    MetadataProcedure: procedureText(definition.metadata),
    DataProcedure: procedureText(definition.data),
    EpilogProcedure: procedureText(definition.epilog),
    UIData: 'CubeAction=1511\fDataAction=1503\fCubeLogChanges=0\f',
    DataSource: definition.dataSource ? asciiDataSource(definition.dataSource) : { Type: 'None' },
    Parameters: (definition.parameters ?? []).map((parameter) => ({
      Name: parameter.name,
      Prompt: '',
      Value: parameter.value,
      Type: typeof parameter.value === 'number' ? 'Numeric' : 'String',
    })),
    Variables: variables.map((variable, index) => ({
      Name: variable.name,
      Type: variable.type,
      Position: index + 1,
      StartByte: 0,
      EndByte: 0,
    })),
    VariablesUIData: variables.map((variable) =>
      variable.type === 'String' ? 'VarType=32\fColType=827\f' : 'VarType=33\fColType=827\f'
    ),
  };
}

function asciiDataSource(source: AsciiDataSource): Record<string, unknown> {
  return {
    Type: 'ASCII',
    asciiDecimalSeparator: source.decimalSeparator ?? '.',
    asciiDelimiterChar: source.delimiter ?? ',',
    asciiDelimiterType: 'Character',
    asciiHeaderRecords: source.headerRecords ?? 0,
    asciiQuoteCharacter: source.quoteCharacter ?? '"',
    asciiThousandSeparator: source.thousandSeparator ?? '',
    dataSourceNameForClient: source.dataSourceNameForServer,
    dataSourceNameForServer: source.dataSourceNameForServer,
  };
}

/**
 * Interprets an `ExecuteProcessWithReturn` response.
 */
export function parseExecuteResult(response: Tm1Response): ProcessExecuteResult {
  const parsed = executeResultSchema.safeParse(response.json());
  if (!parsed.success) {
    throw new InvalidResponseError(`Unexpected process execution result: ${parsed.error.message}`);
  }
  const status = parsed.data.ProcessExecuteStatusCode;
  return {
    success: status === COMPLETED_SUCCESSFULLY,
    status,
    errorLogFile: parsed.data.ErrorLogFile?.Filename,
  };
}

/**
 * Options of a process run.
 */
export interface ExecuteProcessOptions extends CallOptions {
  /** Resend after a dropped connection. Only safe if the process is idempotent. */
  retryOnDisconnect?: boolean;
}

const EXECUTE_WITH_RETURN = '/ExecuteProcessWithReturn?$expand=*';

/**
 * Service for TurboIntegrator processes.
 */
export class ProcessService {
  constructor(
    private readonly executor: RequestExecutor,
    private readonly server: ServerInfo
  ) {}

  /**
   * Largest number of statements a single procedure may hold on this server.
   */
  maxStatements(): number {
    return verifyVersion('11.8.015', this.server.version) ? MAX_STATEMENTS : MAX_STATEMENTS_LEGACY;
  }

  /**
   * Runs a process definition without creating it on the server.
   */
  async executeWithReturn(
    definition: ProcessDefinition,
    options: ExecuteProcessOptions = {}
  ): Promise<ProcessExecuteResult> {
    const response = await this.executor.post(
      EXECUTE_WITH_RETURN,
      { Process: buildProcessBody(definition) },
      {
        timeout: options.timeout,
        cancelAtTimeout: options.cancelAtTimeout,
        asyncMode: options.asyncMode,
        idempotent: options.retryOnDisconnect ?? false,
      }
    );
    return parseExecuteResult(response);
  }

  /**
   * Starts a process run in async mode and returns its handle.
   */
  async startWithReturn(
    definition: ProcessDefinition,
    options: Omit<ExecuteProcessOptions, 'asyncMode'> = {}
  ): Promise<AsyncOperationHandle | ProcessExecuteResult> {
    const started = await this.executor.startAsync(
      'POST',
      EXECUTE_WITH_RETURN,
      { Process: buildProcessBody(definition) },
      { timeout: options.timeout, idempotent: options.retryOnDisconnect ?? false }
    );
    return 'operationId' in started ? started : parseExecuteResult(started);
  }

  /**
   * Probes a run started with {@link startWithReturn}.
   * @returns The result, or undefined while the process is running
   */
  async pollWithReturn(handle: AsyncOperationHandle): Promise<ProcessExecuteResult | undefined> {
    const response = await this.executor.pollAsync(handle);
    return response ? parseExecuteResult(response) : undefined;
  }

  /**
   * Runs TI statements as an unbound process.
   */
  async executeTiCode(
    prolog: readonly string[],
    epilog: readonly string[] = [],
    options: ExecuteProcessOptions = {}
  ): Promise<ProcessExecuteResult> {
    return this.executeWithReturn({ name: '', prolog, epilog }, options);
  }

  /**
   * Text of a process error log.
   */
  async getErrorLogFileContent(fileName: string): Promise<string> {
    const response = await this.executor.get(formatUrl("/ErrorLogFiles('{}')/Content", fileName));
    return response.text();
  }
}
