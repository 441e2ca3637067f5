/**
 * tm1-rest-client - REST client for TM1 / Planning Analytics
 *
 * - Credential resolution for every v11 and v12 authentication mode
 * - Session handling with transparent re-authentication
 * - Request execution with disconnect recovery, timeouts and async polling
 * - Bulk cell writes with bounded parallelism and failure aggregation
 *
 * @module tm1-rest-client
 */

// Errors
export {
  Tm1ErrorKind,
  Tm1Error,
  ConfigurationError,
  InvalidArgumentError,
  AuthenticationError,
  RestError,
  TimeoutError,
  TransportError,
  InsufficientPrivilegeError,
  VersionError,
  InvalidResponseError,
  WriteFailure,
  WritePartialFailure,
  isTm1Error,
} from './errors/index.js';
export type { RestErrorDetails, TransportFailure, WriteDiagnostics } from './errors/index.js';

// Config
export type { Tm1Config, Tm1ConfigOptions } from './config/index.js';
export {
  DEFAULT_CONNECTION_POOL_SIZE,
  DEFAULT_SESSION_CONTEXT,
  DEFAULT_USER_AGENT,
  ENV_VARIABLES,
  SecretString,
  Tm1ConfigBuilder,
  Tm1ConfigSchema,
  createConfig,
  createConfigFromEnv,
  parseConfig,
  toLoggable,
} from './config/index.js';

// Auth
export type {
  CredentialExchange,
  HandshakeRequest,
  NegotiateTarget,
  NegotiateTokenProvider,
  ResolvedCredentials,
} from './auth/index.js';
export { AuthMode, isV12Mode, resolveAuthMode, resolveCredentials } from './auth/index.js';

// Observability
export type { ConsoleLoggerOptions, LogLevel, Logger } from './observability/index.js';
export { ConsoleLogger, NoopLogger } from './observability/index.js';

// Transport
export type { HttpMethod, HttpRequest, HttpTransport, UndiciTransportOptions } from './transport/index.js';
export { Tm1Response, UndiciTransport } from './transport/index.js';

// Session
export type { GroupSource, SessionManagerOptions, SessionSnapshot } from './session/index.js';
export { SessionManager, SessionRoles, defaultHeaders } from './session/index.js';

// Executor
export type {
  AsyncOperationHandle,
  Clock,
  Lookup,
  OperationCanceller,
  RequestBody,
  RequestContext,
  RequestObserver,
  RequestOptions,
  RequestState,
} from './executor/index.js';
export { AsyncOperationPoller, RequestExecutor, waitTimeSchedule } from './executor/index.js';

// Services
export type {
  CallOptions,
  CellUpdate,
  ElementType,
  ExecuteProcessOptions,
  ProcessDefinition,
  ProcessExecuteResult,
  Tm1Services,
  Tm1Thread,
} from './services/index.js';
export {
  CellService,
  CubeService,
  FileService,
  MonitoringService,
  ProcessService,
  SecurityService,
  createServices,
} from './services/index.js';

// Concurrency
export { Semaphore, TaskGroup, mapBounded, withScope } from './concurrency/index.js';
export type { ScopedResource, TaskResult } from './concurrency/index.js';

// Write
export type {
  CellInput,
  CellValue,
  PrivilegeSource,
  WriteBatch,
  WriteContext,
  WriteOptions,
  WriteOutcome,
  WriteResult,
  WriteStrategyExecutor,
  WriteUnit,
} from './write/index.js';
export { BulkWritePipeline, WriteStrategy } from './write/index.js';

// Client
export type { Tm1ClientOptions } from './client/index.js';
export { Tm1Client, createClient, createClientFromEnv } from './client/index.js';
