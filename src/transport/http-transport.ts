/**
 * HTTP transport backed by undici.
 *
 * The transport owns the connection pool. Everything above it works with
 * {@link HttpRequest} and {@link Tm1Response} only, which keeps the session
 * and executor logic testable without sockets.
 *
 * @module transport/http-transport
 */

import { readFileSync } from 'node:fs';
import { Agent, ProxyAgent, fetch, type Dispatcher } from 'undici';
import { TransportError, toError } from '../errors/index.js';
import type { Logger } from '../observability/index.js';
import { NoopLogger } from '../observability/index.js';
import { isRecord } from '../utils/index.js';
import type { HttpMethod } from './response.js';
import { Tm1Response } from './response.js';

/**
 * A request ready to go on the wire.
 */
export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string | Uint8Array;
  /** Aborts the request after this many milliseconds */
  timeoutMs?: number;
}

/**
 * Transport interface.
 */
export interface HttpTransport {
  /**
   * Sends a request and buffers the response.
   * @throws {TransportError} On timeout, remote disconnect or network failure.
   */
  send(request: HttpRequest): Promise<Tm1Response>;

  /**
   * Drops every pooled connection and starts a fresh pool.
   */
  reset(): Promise<void>;

  /**
   * Closes the pool. The transport is unusable afterwards.
   */
  close(): Promise<void>;
}

/**
 * Options for {@link UndiciTransport}.
 */
export interface UndiciTransportOptions {
  /** Maximum sockets per origin */
  connections: number;
  /** Verify server certificates, or path of a CA bundle */
  verify: boolean | string;
  /** Client certificate: a combined PEM file, or [certificate, key] */
  cert?: string | readonly [string, string];
  /** Proxy URL, or per-scheme proxy URLs */
  proxy?: ProxySetting;
  /** Service root; its scheme picks the per-scheme proxy */
  baseUrl?: string;
  /** Enable TCP keep-alive probes on pooled sockets */
  tcpKeepalive: boolean;
  logger?: Logger;
  /** Builds each pool instead of an undici Agent; called again on reset */
  dispatcherFactory?: () => Dispatcher;
}

export type ProxySetting = string | { http?: string; https?: string };

/**
 * Proxy for requests to `baseUrl`. A per-scheme setting only applies to
 * its own scheme.
 */
export function selectProxy(proxy: ProxySetting | undefined, baseUrl?: string): string | undefined {
  if (proxy === undefined || typeof proxy === 'string') {
    return proxy;
  }
  if (baseUrl?.startsWith('http:')) {
    return proxy.http;
  }
  if (baseUrl?.startsWith('https:')) {
    return proxy.https;
  }
  return proxy.https ?? proxy.http;
}

// Request timeouts belong to the AbortController in send(); undici's own
// 300 s header and body limits would cut long synchronous requests short.
export const DISPATCHER_TIMEOUTS = { headersTimeout: 0, bodyTimeout: 0 } as const;

/**
 * How {@link UndiciTransport} builds its pool.
 */
export type DispatcherPlan =
  | { kind: 'proxy'; options: ProxyAgent.Options }
  | { kind: 'agent'; options: Agent.Options };

const DISCONNECT_CODES = new Set(['UND_ERR_SOCKET', 'UND_ERR_CLOSED', 'ECONNRESET', 'EPIPE']);

/**
 * Returns true if the error chain shows the server closed the connection.
 */
export function isRemoteDisconnect(error: unknown): boolean {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && isRecord(current); depth++) {
    const code = current['code'];
    if (typeof code === 'string' && DISCONNECT_CODES.has(code)) {
      return true;
    }
    current = current['cause'];
  }
  return false;
}

/**
 * undici-backed {@link HttpTransport}.
 */
export class UndiciTransport implements HttpTransport {
  private dispatcher: Dispatcher;
  private readonly logger: Logger;
  private closed = false;

  constructor(private readonly options: UndiciTransportOptions) {
    this.logger = options.logger ?? new NoopLogger();
    this.dispatcher = this.createDispatcher();
  }

  async send(request: HttpRequest): Promise<Tm1Response> {
    if (this.closed) {
      throw new TransportError('network', request.method, request.url, new Error('transport is closed'));
    }

    const controller = new AbortController();
    const timer =
      request.timeoutMs !== undefined ? setTimeout(() => controller.abort(), request.timeoutMs) : undefined;

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
        dispatcher: this.dispatcher,
        redirect: 'manual',
      });

      const body = Buffer.from(await response.arrayBuffer());
      const headers: Record<string, string> = {};
      response.headers.forEach((value, name) => {
        if (name !== 'set-cookie') {
          headers[name] = value;
        }
      });

      return new Tm1Response(response.status, response.statusText, headers, body, response.headers.getSetCookie());
    } catch (error) {
      if (controller.signal.aborted) {
        throw new TransportError('timeout', request.method, request.url, toError(error));
      }
      if (isRemoteDisconnect(error)) {
        throw new TransportError('disconnected', request.method, request.url, toError(error));
      }
      throw new TransportError('network', request.method, request.url, toError(error));
    } finally {
      if (timer !== undefined) {
        clearTimeout(timer);
      }
    }
  }

  async reset(): Promise<void> {
    const previous = this.dispatcher;
    this.dispatcher = this.createDispatcher();
    this.logger.info('Connection pool rebuilt');
    // Requests still running on the old pool finish before it closes
    previous.close().catch((error: unknown) => {
      this.logger.warn('Failed to close previous connection pool', { error: toError(error).message });
    });
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.dispatcher.close();
  }

  private createDispatcher(): Dispatcher {
    if (this.options.dispatcherFactory) {
      return this.options.dispatcherFactory();
    }
    const plan = planDispatcher(this.options, tlsOptions(this.options));
    return plan.kind === 'proxy' ? new ProxyAgent(plan.options) : new Agent(plan.options);
  }
}

export type TlsOptions = { rejectUnauthorized: boolean; ca?: Buffer; cert?: Buffer; key?: Buffer };

/**
 * Pool options for a transport: a proxy agent when a proxy applies to the
 * service root, a plain agent otherwise.
 */
export function planDispatcher(options: UndiciTransportOptions, tls: TlsOptions): DispatcherPlan {
  const proxy = selectProxy(options.proxy, options.baseUrl);
  if (proxy) {
    return {
      kind: 'proxy',
      options: { uri: proxy, connections: options.connections, requestTls: tls, ...DISPATCHER_TIMEOUTS },
    };
  }
  return {
    kind: 'agent',
    options: {
      connections: options.connections,
      connect: { ...tls, keepAlive: options.tcpKeepalive },
      ...DISPATCHER_TIMEOUTS,
    },
  };
}

function tlsOptions(options: UndiciTransportOptions): TlsOptions {
  const { verify, cert } = options;
  const tls: TlsOptions = { rejectUnauthorized: verify !== false };
  if (typeof verify === 'string') {
    tls.ca = readFileSync(verify);
  }
  if (typeof cert === 'string') {
    tls.cert = readFileSync(cert);
    tls.key = tls.cert;
  } else if (cert) {
    tls.cert = readFileSync(cert[0]);
    tls.key = readFileSync(cert[1]);
  }
  return tls;
}
