/**
 * Session management.
 *
 * Owns the session token (cookie or bearer header) and the server version,
 * and performs the authentication handshake. At most one handshake runs at a
 * time: callers that ask to reconnect while a handshake is in flight share
 * its outcome.
 *
 * @module session
 */

import { z } from 'zod';
import type {
  CredentialExchange,
  NegotiateTarget,
  NegotiateTokenProvider,
  ResolvedCredentials,
} from '../auth/index.js';
import { AuthMode, SESSION_COOKIE_NAMES, completeHandshake } from '../auth/index.js';
import type { Tm1Config } from '../config/index.js';
import { DEFAULT_USER_AGENT } from '../config/index.js';
import { AuthenticationError, ConfigurationError } from '../errors/index.js';
import type { Logger } from '../observability/index.js';
import { CookieJar, extractCookieValue } from '../transport/cookies.js';
import type { HttpTransport } from '../transport/http-transport.js';
import type { Tm1Response } from '../transport/response.js';
import { toRestError } from '../transport/response.js';

export { SessionRoles } from './roles.js';
export type { GroupSource } from './roles.js';

const PRODUCT_VERSION_PATH = '/Configuration/ProductVersion/$value';

/**
 * Headers sent with every request.
 */
export function defaultHeaders(config: Pick<Tm1Config, 'sessionContext'>): Record<string, string> {
  return {
    'User-Agent': DEFAULT_USER_AGENT,
    'Content-Type': 'application/json; odata.streaming=true; charset=utf-8',
    Accept: 'application/json;odata.metadata=none,text/plain',
    'TM1-SessionContext': config.sessionContext,
  };
}

/**
 * Serializable view of a live session, enough to attach another client to it.
 */
export interface SessionSnapshot {
  baseUrl: string;
  authMode: AuthMode;
  cookieName: string;
  sessionId: string;
  version?: string;
}

/**
 * Dependencies of {@link SessionManager}.
 */
export interface SessionManagerOptions {
  config: Tm1Config;
  credentials: ResolvedCredentials;
  transport: HttpTransport;
  logger: Logger;
  negotiate?: NegotiateTokenProvider;
  /** Server version already known, e.g. from a {@link SessionSnapshot} */
  version?: string;
}

const iamTokenSchema = z.object({ access_token: z.string().min(1) });
const cpdTokenSchema = z.object({ token: z.string().min(1) });

/**
 * Session lifecycle and credentials for outgoing requests.
 */
export class SessionManager {
  private readonly config: Tm1Config;
  private readonly credentials: ResolvedCredentials;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;
  private readonly negotiate?: NegotiateTokenProvider;
  private readonly jar = new CookieJar();
  private authorization?: string;
  private handshakePromise: Promise<void> | null = null;
  private serverVersion?: string;
  private connected = false;
  private attachPending: boolean;

  constructor(options: SessionManagerOptions) {
    this.config = options.config;
    this.credentials = options.credentials;
    this.transport = options.transport;
    this.logger = options.logger;
    this.negotiate = options.negotiate;
    this.attachPending = options.credentials.sessionId !== undefined;
    this.serverVersion = options.version;
  }

  get authMode(): AuthMode {
    return this.credentials.mode;
  }

  get baseUrl(): string {
    return this.credentials.baseUrl;
  }

  get version(): string | undefined {
    return this.serverVersion;
  }

  get isConnected(): boolean {
    return this.connected;
  }

  /**
   * Current session token, if the server issued one.
   */
  get sessionId(): string | undefined {
    for (const name of SESSION_COOKIE_NAMES) {
      const value = this.jar.get(name);
      if (value !== undefined) {
        return value;
      }
    }
    return undefined;
  }

  /**
   * Headers for a request within this session.
   */
  headers(): Record<string, string> {
    const headers: Record<string, string> = {
      ...defaultHeaders(this.config),
      ...this.credentials.sessionHeaders,
    };
    if (this.authorization) {
      headers['Authorization'] = this.authorization;
    }
    const cookie = this.jar.header();
    if (cookie) {
      headers['Cookie'] = cookie;
    }
    return headers;
  }

  /**
   * Keeps cookies the server sets on any response, e.g. a rotated session id.
   */
  absorb(response: Tm1Response): void {
    if (response.setCookies.length > 0) {
      this.jar.store(response.setCookies, this.credentials.host);
    }
  }

  /**
   * Opens the session: attaches to a configured session id or runs the handshake.
   * @throws {AuthenticationError} If the server rejects the credentials.
   */
  async connect(): Promise<void> {
    return this.singleFlight();
  }

  /**
   * Replaces the session token after the server invalidated it. Concurrent
   * callers share one handshake.
   */
  async reconnect(): Promise<void> {
    this.logger.info('Re-establishing TM1 session', { mode: this.credentials.mode });
    return this.singleFlight();
  }

  /**
   * Closes the server session.
   * @throws {RestError} If the server refuses to close the session.
   */
  async logout(): Promise<void> {
    if (!this.connected) {
      return;
    }
    const url = `${this.baseUrl}/ActiveSession/tm1.Close`;
    try {
      const response = await this.transport.send({
        method: 'POST',
        url,
        headers: this.headers(),
        body: '',
        timeoutMs: this.timeoutMs(),
      });
      if (!response.ok && response.status !== 401) {
        throw toRestError(response, 'POST', url);
      }
    } finally {
      this.clearToken();
      this.connected = false;
    }
  }

  /**
   * Serializable view of the session.
   * @throws {ConfigurationError} If there is no cookie-carried session to snapshot.
   */
  snapshot(): SessionSnapshot {
    for (const name of SESSION_COOKIE_NAMES) {
      const value = this.jar.get(name);
      if (value !== undefined) {
        return {
          baseUrl: this.baseUrl,
          authMode: this.credentials.mode,
          cookieName: name,
          sessionId: value,
          version: this.serverVersion,
        };
      }
    }
    throw new ConfigurationError('No session cookie to snapshot; bearer sessions cannot be restored');
  }

  private singleFlight(): Promise<void> {
    if (!this.handshakePromise) {
      this.handshakePromise = this.authenticate().finally(() => {
        this.handshakePromise = null;
      });
    }
    return this.handshakePromise;
  }

  private async authenticate(): Promise<void> {
    const { handshake, sessionId } = this.credentials;

    if (sessionId !== undefined && (this.attachPending || !handshake)) {
      this.attachPending = false;
      this.clearToken();
      this.jar.set(this.cookieNameForMode(), sessionId);
      this.connected = true;
      if (!this.serverVersion) {
        await this.fetchVersion();
      }
      return;
    }

    if (!handshake) {
      throw new ConfigurationError('No credentials configured to open a session');
    }

    this.clearToken();
    const request = handshake.exchange
      ? completeHandshake(handshake, await this.runExchange(handshake.exchange))
      : handshake;

    const response = await this.transport.send({
      method: request.method,
      url: request.url,
      headers: { ...this.headers(), ...request.headers },
      body: request.body,
      timeoutMs: this.timeoutMs(),
    });

    if (!response.ok) {
      throw new AuthenticationError(
        `${this.credentials.mode} authentication failed with status ${response.status}`,
        { statusCode: response.status, reason: response.statusText, body: response.text() }
      );
    }

    this.storeSessionCookie(response);
    this.authorization = request.persistAuthorization ? request.headers['Authorization'] : undefined;

    if (this.sessionId === undefined && this.authorization === undefined) {
      throw new AuthenticationError(`${this.credentials.mode} authentication returned no session cookie`, {
        statusCode: response.status,
        reason: response.statusText,
      });
    }
    this.connected = true;

    if (request.method === 'GET' && request.url.endsWith(PRODUCT_VERSION_PATH)) {
      this.serverVersion = response.text().trim() || this.serverVersion;
    }
    if (!this.serverVersion) {
      await this.fetchVersion();
    }
  }

  private storeSessionCookie(response: Tm1Response): void {
    const rejected = this.jar.store(response.setCookies, this.credentials.host);
    if (this.sessionId !== undefined) {
      return;
    }
    for (const name of SESSION_COOKIE_NAMES) {
      const value = extractCookieValue(response.setCookies, name);
      if (value !== undefined) {
        // Cookie domain did not match the server host
        this.logger.warn('Session cookie scoped to another domain; using it for this server', {
          cookie: name,
          rejected,
        });
        this.jar.set(name, value);
        return;
      }
    }
  }

  private async fetchVersion(): Promise<void> {
    const url = `${this.baseUrl}${PRODUCT_VERSION_PATH}`;
    const response = await this.transport.send({
      method: 'GET',
      url,
      headers: this.headers(),
      timeoutMs: this.timeoutMs(),
    });
    this.absorb(response);
    if (response.status === 401) {
      throw new AuthenticationError('Session was rejected by the server', {
        statusCode: response.status,
        reason: response.statusText,
        body: response.text(),
      });
    }
    if (!response.ok) {
      throw toRestError(response, 'GET', url);
    }
    this.serverVersion = response.text().trim();
  }

  private async runExchange(exchange: CredentialExchange): Promise<string> {
    switch (exchange.kind) {
      case 'iam_api_key': {
        const response = await this.transport.send({
          method: 'POST',
          url: exchange.url,
          headers: { 'Content-Type': 'application/x-www-form-urlencoded', Accept: 'application/json' },
          body: new URLSearchParams({
            grant_type: 'urn:ibm:params:oauth:grant-type:apikey',
            apikey: exchange.apiKey.expose(),
          }).toString(),
          timeoutMs: this.timeoutMs(),
        });
        return parseToken(response, iamTokenSchema, 'IAM token exchange').access_token;
      }
      case 'cpd_signin': {
        const response = await this.transport.send({
          method: 'POST',
          url: exchange.url,
          headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
          body: JSON.stringify({ username: exchange.user, password: exchange.password.expose() }),
          timeoutMs: this.timeoutMs(),
        });
        return parseToken(response, cpdTokenSchema, 'CPD sign-in').token;
      }
      case 'negotiate':
        return this.negotiateToken(exchange.target);
      case 'cam_gateway': {
        const token = await this.negotiateToken(exchange.target);
        const response = await this.transport.send({
          method: 'GET',
          url: exchange.url,
          headers: { Authorization: `Negotiate ${token}` },
          timeoutMs: this.timeoutMs(),
        });
        const passport = extractCookieValue(response.setCookies, 'cam_passport');
        if (!passport) {
          throw new AuthenticationError('CAM gateway did not issue a cam_passport cookie', {
            statusCode: response.status,
            reason: response.statusText,
          });
        }
        return passport;
      }
    }
  }

  private async negotiateToken(target: NegotiateTarget): Promise<string> {
    if (!this.negotiate) {
      throw new ConfigurationError('A NegotiateTokenProvider is required for integrated login');
    }
    return this.negotiate.getToken(target);
  }

  private cookieNameForMode(): string {
    return this.credentials.mode === AuthMode.PaProxy ? 'paSession' : 'TM1SessionId';
  }

  private clearToken(): void {
    for (const name of SESSION_COOKIE_NAMES) {
      this.jar.delete(name);
    }
    this.authorization = undefined;
  }

  private timeoutMs(): number | undefined {
    return this.config.timeout !== undefined ? this.config.timeout * 1000 : undefined;
  }
}

function parseToken<T>(response: Tm1Response, schema: z.ZodType<T>, step: string): T {
  if (!response.ok) {
    throw new AuthenticationError(`${step} failed with status ${response.status}`, {
      statusCode: response.status,
      reason: response.statusText,
      body: response.text(),
    });
  }
  const parsed = schema.safeParse(response.json());
  if (!parsed.success) {
    throw new AuthenticationError(`${step} returned no token`, { statusCode: response.status });
  }
  return parsed.data;
}

