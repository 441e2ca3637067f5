/**
 * Shared service types.
 * @module services/types
 */

/**
 * Read access to facts about the connected server.
 */
export interface ServerInfo {
  readonly version: string | undefined;
}

/**
 * Options forwarded to the executor for long-running calls.
 */
export interface CallOptions {
  /** Seconds */
  timeout?: number;
  cancelAtTimeout?: boolean;
  asyncMode?: boolean;
}

/**
 * Options of calls that never need async mode or cancellation, such as
 * housekeeping issued while handling another request.
 */
export const PLAIN_CALL = { asyncMode: false, cancelAtTimeout: false } as const;
