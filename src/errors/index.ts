/**
 * Error types for the TM1 client.
 * @module errors
 */

/**
 * TM1 error kinds for categorizing errors.
 */
export enum Tm1ErrorKind {
  // Configuration errors
  Configuration = 'configuration',
  InvalidArgument = 'invalid_argument',

  // Authentication/Authorization errors
  Authentication = 'authentication',
  InsufficientPrivilege = 'insufficient_privilege',

  // Request errors
  Rest = 'rest',
  Timeout = 'timeout',
  Transport = 'transport',
  InvalidResponse = 'invalid_response',

  // Server capability errors
  UnsupportedVersion = 'unsupported_version',

  // Write errors
  WriteFailure = 'write_failure',
  WritePartialFailure = 'write_partial_failure',
}

/**
 * Base error for everything raised by this client.
 */
export class Tm1Error extends Error {
  /** Error kind */
  public readonly kind: Tm1ErrorKind;
  /** HTTP status code, when the error stems from a response */
  public readonly statusCode?: number;

  constructor(
    kind: Tm1ErrorKind,
    message: string,
    options?: {
      statusCode?: number;
      cause?: Error;
    }
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'Tm1Error';
    this.kind = kind;
    this.statusCode = options?.statusCode;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Returns true if repeating the same call may succeed.
   */
  isRetryable(): boolean {
    if (this.kind === Tm1ErrorKind.Transport || this.kind === Tm1ErrorKind.Timeout) {
      return true;
    }
    return this.statusCode !== undefined && [502, 503, 504].includes(this.statusCode);
  }

  toString(): string {
    const status = this.statusCode !== undefined ? ` (HTTP ${this.statusCode})` : '';
    return `${this.name} [${this.kind}]${status}: ${this.message}`;
  }
}

/**
 * Invalid or contradictory client configuration. Raised before any network call.
 */
export class ConfigurationError extends Tm1Error {
  /** Individual validation problems */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(Tm1ErrorKind.Configuration, issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * A caller-supplied argument cannot be used.
 */
export class InvalidArgumentError extends Tm1Error {
  constructor(message: string) {
    super(Tm1ErrorKind.InvalidArgument, message);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * The server rejected the authentication handshake.
 */
export class AuthenticationError extends Tm1Error {
  public readonly reason?: string;
  public readonly body?: string;

  constructor(
    message: string,
    options?: { statusCode?: number; reason?: string; body?: string; cause?: Error }
  ) {
    super(Tm1ErrorKind.Authentication, message, options);
    this.name = 'AuthenticationError';
    this.reason = options?.reason;
    this.body = options?.body;
  }
}

/**
 * Details of a non-2xx response.
 */
export interface RestErrorDetails {
  statusCode: number;
  reason: string;
  body: string;
  headers: Record<string, string>;
  method: string;
  url: string;
}

/**
 * Non-2xx HTTP response from the server.
 */
export class RestError extends Tm1Error {
  public readonly reason: string;
  public readonly body: string;
  public readonly headers: Record<string, string>;
  public readonly method: string;
  public readonly url: string;

  constructor(details: RestErrorDetails) {
    super(
      Tm1ErrorKind.Rest,
      `${details.method} ${details.url} failed with status ${details.statusCode} '${details.reason}'` +
        (details.body ? `: ${details.body}` : ''),
      { statusCode: details.statusCode }
    );
    this.name = 'RestError';
    this.reason = details.reason;
    this.body = details.body;
    this.headers = details.headers;
    this.method = details.method;
    this.url = details.url;
  }
}

/**
 * A request or an async operation exceeded its timeout.
 */
export class TimeoutError extends Tm1Error {
  public readonly method: string;
  public readonly url: string;
  /** Timeout in seconds */
  public readonly timeout: number;

  constructor(method: string, url: string, timeout: number, cause?: Error) {
    super(Tm1ErrorKind.Timeout, `${method} ${url} timed out after ${timeout}s`, { cause });
    this.name = 'TimeoutError';
    this.method = method;
    this.url = url;
    this.timeout = timeout;
  }
}

/**
 * How a request failed below the HTTP layer.
 */
export type TransportFailure = 'disconnected' | 'timeout' | 'network';

/**
 * Network-level failure: the remote end closed the connection, the request
 * timed out before a response arrived, or the connection could not be made.
 */
export class TransportError extends Tm1Error {
  public readonly failure: TransportFailure;
  public readonly method: string;
  public readonly url: string;

  constructor(failure: TransportFailure, method: string, url: string, cause?: Error) {
    super(Tm1ErrorKind.Transport, `${method} ${url}: ${failure}${cause ? ` (${cause.message})` : ''}`, {
      cause,
    });
    this.name = 'TransportError';
    this.failure = failure;
    this.method = method;
    this.url = url;
  }
}

/**
 * The current user lacks the rights an operation needs.
 */
export class InsufficientPrivilegeError extends Tm1Error {
  constructor(operation: string, required: string[]) {
    super(Tm1ErrorKind.InsufficientPrivilege, `${operation} requires one of: ${required.join(', ')}`);
    this.name = 'InsufficientPrivilegeError';
  }
}

/**
 * The server version does not support an operation.
 */
export class VersionError extends Tm1Error {
  public readonly requiredVersion: string;
  public readonly actualVersion?: string;

  constructor(operation: string, requiredVersion: string, actualVersion?: string) {
    super(
      Tm1ErrorKind.UnsupportedVersion,
      `${operation} requires server version ${requiredVersion} or newer (found ${actualVersion ?? 'unknown'})`
    );
    this.name = 'VersionError';
    this.requiredVersion = requiredVersion;
    this.actualVersion = actualVersion;
  }
}

/**
 * Response body did not have the expected shape.
 */
export class InvalidResponseError extends Tm1Error {
  constructor(message: string, cause?: Error) {
    super(Tm1ErrorKind.InvalidResponse, message, { cause });
    this.name = 'InvalidResponseError';
  }
}

/**
 * Aggregated diagnostics of a bulk write.
 */
export interface WriteDiagnostics {
  /** One status per failed group */
  statuses: string[];
  /** Server error log files referenced by failed groups */
  errorLogFiles: string[];
  /** Number of groups executed */
  attempts: number;
}

/**
 * Every group of a bulk write failed.
 */
export class WriteFailure extends Tm1Error {
  public readonly statuses: string[];
  public readonly errorLogFiles: string[];
  public readonly attempts: number;

  constructor(diagnostics: WriteDiagnostics) {
    super(
      Tm1ErrorKind.WriteFailure,
      `All ${diagnostics.attempts} write group(s) failed. Statuses: ${diagnostics.statuses.join(', ')}` +
        (diagnostics.errorLogFiles.length > 0 ? `. Error logs: ${diagnostics.errorLogFiles.join(', ')}` : '')
    );
    this.name = 'WriteFailure';
    this.statuses = diagnostics.statuses;
    this.errorLogFiles = diagnostics.errorLogFiles;
    this.attempts = diagnostics.attempts;
  }
}

/**
 * Some, but not all, groups of a bulk write failed.
 */
export class WritePartialFailure extends Tm1Error {
  public readonly statuses: string[];
  public readonly errorLogFiles: string[];
  public readonly attempts: number;

  constructor(diagnostics: WriteDiagnostics) {
    super(
      Tm1ErrorKind.WritePartialFailure,
      `${diagnostics.statuses.length} of ${diagnostics.attempts} write group(s) failed. ` +
        `Statuses: ${diagnostics.statuses.join(', ')}` +
        (diagnostics.errorLogFiles.length > 0 ? `. Error logs: ${diagnostics.errorLogFiles.join(', ')}` : '')
    );
    this.name = 'WritePartialFailure';
    this.statuses = diagnostics.statuses;
    this.errorLogFiles = diagnostics.errorLogFiles;
    this.attempts = diagnostics.attempts;
  }
}

/**
 * Type guard for Tm1Error.
 */
export function isTm1Error(error: unknown): error is Tm1Error {
  return error instanceof Tm1Error;
}

/**
 * Normalizes an unknown thrown value into an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
