/**
 * Request execution against the TM1 REST API.
 *
 * Every request moves through `pending → dispatched` and ends in
 * `completed`, `failed_transport`, `failed_timeout` or
 * `failed_session_expired`. On the way the executor:
 * - re-authenticates once when the session expired (401) and retries once,
 * - rebuilds the connection pool and retries once when the server dropped
 *   the connection, for idempotent requests only,
 * - optionally cancels the server thread of a request that timed out,
 * - drives async operations through the {@link AsyncOperationPoller}.
 *
 * @module executor
 */

import type { Tm1Config } from '../config/index.js';
import { TimeoutError, TransportError, toError } from '../errors/index.js';
import type { Logger } from '../observability/index.js';
import { logRequest, logResponse } from '../observability/index.js';
import type { SessionManager } from '../session/index.js';
import type { HttpTransport } from '../transport/http-transport.js';
import type { HttpMethod, Tm1Response } from '../transport/response.js';
import { toRestError } from '../transport/response.js';
import type { AsyncOperationHandle, AsyncStatusClient, Clock } from './async-poller.js';
import { AsyncOperationPoller, asyncHandle, extractAsyncId, systemClock } from './async-poller.js';

export {
  AsyncOperationPoller,
  asyncHandle,
  extractAsyncId,
  systemClock,
  waitTimeSchedule,
} from './async-poller.js';
export type { AsyncOperationHandle, AsyncStatusClient, Clock } from './async-poller.js';

/**
 * Lifecycle states of a request.
 */
export type RequestState =
  | 'pending'
  | 'dispatched'
  | 'completed'
  | 'failed_transport'
  | 'failed_timeout'
  | 'failed_session_expired';

/**
 * Typed result of an existence probe.
 */
export type Lookup<T> = { found: true; value: T } | { found: false };

/**
 * Request body: strings and bytes are sent as-is, anything else as JSON.
 */
export type RequestBody = string | Uint8Array | object;

/**
 * Per-call options. Unset values fall back to the configuration.
 */
export interface RequestOptions {
  headers?: Record<string, string>;
  /** Seconds */
  timeout?: number;
  cancelAtTimeout?: boolean;
  /** Safe to resend after a dropped connection. Defaults by method. */
  idempotent?: boolean;
  asyncMode?: boolean;
}

/**
 * Immutable description of one dispatched request.
 */
export interface RequestContext {
  readonly method: HttpMethod;
  readonly url: string;
  readonly body?: string | Uint8Array;
  readonly headers: Readonly<Record<string, string>>;
  /** Seconds */
  readonly timeout?: number;
  readonly cancelAtTimeout: boolean;
  readonly idempotent: boolean;
  readonly asyncMode: boolean;
}

/**
 * Receives request state transitions.
 */
export interface RequestObserver {
  onTransition(context: RequestContext, from: RequestState, to: RequestState): void;
}

/**
 * Cancels whatever the session is currently running on the server.
 */
export interface OperationCanceller {
  /**
   * @returns true if an operation was cancelled
   */
  cancelRunningOperation(): Promise<boolean>;
}

/**
 * Dependencies of {@link RequestExecutor}.
 */
export interface RequestExecutorOptions {
  config: Tm1Config;
  session: SessionManager;
  transport: HttpTransport;
  logger: Logger;
  clock?: Clock;
  observer?: RequestObserver;
}

const IDEMPOTENT_METHODS: ReadonlySet<HttpMethod> = new Set(['GET', 'PUT', 'DELETE']);

/**
 * Sends requests within a session.
 */
export class RequestExecutor {
  private readonly config: Tm1Config;
  private readonly session: SessionManager;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;
  private readonly observer?: RequestObserver;
  private readonly poller: AsyncOperationPoller;
  private canceller?: OperationCanceller;

  constructor(options: RequestExecutorOptions) {
    this.config = options.config;
    this.session = options.session;
    this.transport = options.transport;
    this.logger = options.logger;
    this.observer = options.observer;
    this.poller = new AsyncOperationPoller(this.statusClient(), this.logger, options.clock ?? systemClock);
  }

  /**
   * Sets what cancels server threads after a timeout.
   */
  setOperationCanceller(canceller: OperationCanceller): void {
    this.canceller = canceller;
  }

  async get(path: string, options?: RequestOptions): Promise<Tm1Response> {
    return this.request('GET', path, undefined, options);
  }

  async post(path: string, body?: RequestBody, options?: RequestOptions): Promise<Tm1Response> {
    return this.request('POST', path, body, options);
  }

  async patch(path: string, body?: RequestBody, options?: RequestOptions): Promise<Tm1Response> {
    return this.request('PATCH', path, body, options);
  }

  async put(path: string, body?: RequestBody, options?: RequestOptions): Promise<Tm1Response> {
    return this.request('PUT', path, body, options);
  }

  async delete(path: string, options?: RequestOptions): Promise<Tm1Response> {
    return this.request('DELETE', path, undefined, options);
  }

  /**
   * Sends a request and returns the final response.
   *
   * @throws {RestError} For a non-2xx final response
   * @throws {TimeoutError} When the request or the async operation timed out
   * @throws {TransportError} When the connection failed and was not recovered
   */
  async request(
    method: HttpMethod,
    path: string,
    body?: RequestBody,
    options?: RequestOptions
  ): Promise<Tm1Response> {
    const context = this.createContext(method, path, body, options);
    const response = await this.execute(context);
    return this.ensureOk(context, response);
  }

  /**
   * GET that maps 404 to `{ found: false }`.
   */
  async lookup(path: string, options?: RequestOptions): Promise<Lookup<Tm1Response>> {
    const context = this.createContext('GET', path, undefined, options);
    const response = await this.execute(context);
    if (response.status === 404) {
      return { found: false };
    }
    return { found: true, value: this.ensureOk(context, response) };
  }

  /**
   * Starts an async operation and returns its handle without waiting. A
   * server that answers synchronously yields the final response instead.
   */
  async startAsync(
    method: HttpMethod,
    path: string,
    body?: RequestBody,
    options?: Omit<RequestOptions, 'asyncMode'>
  ): Promise<AsyncOperationHandle | Tm1Response> {
    const context = this.createContext(method, path, body, { ...options, asyncMode: true });
    const initial = this.ensureOk(context, await this.executeOnce(context));
    const operationId = extractAsyncId(initial);
    return operationId ? asyncHandle(operationId) : initial;
  }

  /**
   * Probes an async operation once.
   *
   * @returns The final response, or undefined while the operation runs
   * @throws {RestError} If the operation finished with a non-2xx response
   */
  async pollAsync(handle: AsyncOperationHandle): Promise<Tm1Response | undefined> {
    const result = await this.poller.pollOnce(handle);
    if (result && !result.ok) {
      throw toRestError(result, 'GET', handle.pollUrl);
    }
    return result;
  }

  /**
   * Best-effort cancellation of an async operation.
   */
  async cancelAsync(handle: AsyncOperationHandle): Promise<void> {
    await this.poller.cancel(handle);
  }

  /**
   * Builds the immutable request context.
   */
  createContext(
    method: HttpMethod,
    path: string,
    body?: RequestBody,
    options: RequestOptions = {}
  ): RequestContext {
    return Object.freeze({
      method,
      url: this.resolveUrl(path),
      body: serializeBody(body),
      headers: { ...options.headers },
      timeout: options.timeout ?? this.config.timeout,
      cancelAtTimeout: options.cancelAtTimeout ?? this.config.cancelAtTimeout,
      idempotent: options.idempotent ?? IDEMPOTENT_METHODS.has(method),
      asyncMode: options.asyncMode ?? this.config.asyncRequestsMode,
    });
  }

  private async execute(context: RequestContext): Promise<Tm1Response> {
    const initial = await this.executeOnce(context);
    if (!context.asyncMode || !initial.ok) {
      return initial;
    }

    const operationId = extractAsyncId(initial);
    if (!operationId) {
      // Server answered synchronously
      return initial;
    }
    return this.poller.waitFor(asyncHandle(operationId), {
      method: context.method,
      url: context.url,
      timeout: context.timeout,
    });
  }

  /**
   * One logical attempt: dispatch plus the session and transport recovery.
   */
  private async executeOnce(context: RequestContext): Promise<Tm1Response> {
    this.transition(context, 'pending', 'dispatched');

    let response: Tm1Response;
    try {
      response = await this.dispatchWithSessionRecovery(context);
    } catch (error) {
      if (error instanceof TransportError && error.failure === 'timeout') {
        this.transition(context, 'dispatched', 'failed_timeout');
        if (context.cancelAtTimeout) {
          await this.cancelRunningOperation(context);
        }
        throw new TimeoutError(context.method, context.url, context.timeout ?? 0, error);
      }
      this.transition(context, 'dispatched', 'failed_transport');
      throw error;
    }

    if (response.status === 401) {
      this.transition(context, 'dispatched', 'failed_session_expired');
    } else {
      this.transition(context, 'dispatched', 'completed');
    }
    return response;
  }

  private async dispatchWithSessionRecovery(context: RequestContext): Promise<Tm1Response> {
    const response = await this.dispatchWithTransportRecovery(context);
    if (response.status !== 401 || !this.config.reconnectOnSessionTimeout) {
      return response;
    }

    this.logger.info('Session expired; reconnecting before retry', {
      method: context.method,
      url: context.url,
    });
    await this.session.reconnect();
    return this.dispatchWithTransportRecovery(context);
  }

  private async dispatchWithTransportRecovery(context: RequestContext): Promise<Tm1Response> {
    try {
      return await this.dispatch(context);
    } catch (error) {
      if (!(error instanceof TransportError) || error.failure !== 'disconnected') {
        throw error;
      }
      if (!this.config.reconnectOnRemoteDisconnect) {
        throw error;
      }
      if (!context.idempotent) {
        this.logger.warn('Connection dropped during a non-idempotent request; not retrying', {
          method: context.method,
          url: context.url,
        });
        throw error;
      }

      this.logger.warn('Connection dropped; rebuilding pool and retrying once', {
        method: context.method,
        url: context.url,
      });
      await this.transport.reset();
      return this.dispatch(context);
    }
  }

  private async dispatch(context: RequestContext): Promise<Tm1Response> {
    const headers: Record<string, string> = { ...this.session.headers(), ...context.headers };
    if (context.asyncMode) {
      headers['Prefer'] = 'respond-async';
    }

    logRequest(this.logger, context.method, context.url, headers);
    const started = Date.now();
    const response = await this.transport.send({
      method: context.method,
      url: context.url,
      headers,
      body: context.body,
      timeoutMs: context.timeout !== undefined ? context.timeout * 1000 : undefined,
    });
    logResponse(this.logger, context.method, context.url, response.status, Date.now() - started);

    this.session.absorb(response);
    return response;
  }

  private async cancelRunningOperation(context: RequestContext): Promise<void> {
    if (!this.canceller) {
      return;
    }
    try {
      const cancelled = await this.canceller.cancelRunningOperation();
      this.logger.info(cancelled ? 'Cancelled timed-out operation' : 'No single operation to cancel', {
        method: context.method,
        url: context.url,
      });
    } catch (error) {
      this.logger.warn('Failed to cancel timed-out operation', {
        method: context.method,
        url: context.url,
        error: toError(error).message,
      });
    }
  }

  private transition(context: RequestContext, from: RequestState, to: RequestState): void {
    this.observer?.onTransition(context, from, to);
  }

  private ensureOk(context: RequestContext, response: Tm1Response): Tm1Response {
    if (!response.ok) {
      throw toRestError(response, context.method, context.url);
    }
    return response;
  }

  private statusClient(): AsyncStatusClient {
    return {
      fetchStatus: (handle) =>
        this.dispatchWithSessionRecovery(
          this.createContext('GET', handle.pollUrl, undefined, { asyncMode: false, cancelAtTimeout: false })
        ),
      cancel: async (handle) => {
        const context = this.createContext('DELETE', handle.pollUrl, undefined, {
          asyncMode: false,
          cancelAtTimeout: false,
        });
        this.ensureOk(context, await this.dispatchWithSessionRecovery(context));
      },
    };
  }

  private resolveUrl(path: string): string {
    const url = /^https?:\/\//.test(path) ? path : `${this.session.baseUrl}${path}`;
    return url.replace(/ /g, '%20');
  }
}

function serializeBody(body: RequestBody | undefined): string | Uint8Array | undefined {
  if (body === undefined || typeof body === 'string' || body instanceof Uint8Array) {
    return body;
  }
  return JSON.stringify(body);
}

