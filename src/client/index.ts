/**
 * TM1 client
 *
 * Composition root: resolves credentials, builds the transport, session,
 * executor and services, and wires the pieces that depend on each other.
 *
 * @module client
 */

import type { NegotiateTokenProvider } from '../auth/index.js';
import { resolveCredentials } from '../auth/index.js';
import type { Tm1Config, Tm1ConfigOptions } from '../config/index.js';
import { createConfigFromEnv, parseConfig, toLoggable } from '../config/index.js';
import { ConfigurationError, toError } from '../errors/index.js';
import type { Clock, RequestObserver } from '../executor/index.js';
import { RequestExecutor } from '../executor/index.js';
import type { Logger } from '../observability/index.js';
import { ConsoleLogger, logError } from '../observability/index.js';
import type { Tm1Services } from '../services/index.js';
import { createServices } from '../services/index.js';
import type { SessionSnapshot } from '../session/index.js';
import { SessionManager, SessionRoles } from '../session/index.js';
import type { HttpTransport } from '../transport/http-transport.js';
import { UndiciTransport } from '../transport/http-transport.js';
import type { CellInput, WriteOptions, WriteResult } from '../write/index.js';
import { BulkWritePipeline } from '../write/index.js';

/**
 * Collaborators that can be supplied instead of the defaults.
 */
export interface Tm1ClientOptions {
  logger?: Logger;
  transport?: HttpTransport;
  /** Token source for integrated login and CAM SSO */
  negotiate?: NegotiateTokenProvider;
  clock?: Clock;
  observer?: RequestObserver;
}

/**
 * Picks the logger: `logging` in the configuration turns on debug output.
 */
export function createLogger(config: Tm1Config, provided?: Logger): Logger {
  if (config.logging) {
    return new ConsoleLogger({ level: config.logLevel ?? 'debug' });
  }
  return provided ?? new ConsoleLogger({ level: config.logLevel ?? 'warn' });
}

/**
 * Connected TM1 client.
 */
export class Tm1Client {
  readonly config: Tm1Config;
  readonly session: SessionManager;
  readonly executor: RequestExecutor;
  readonly services: Tm1Services;
  readonly roles: SessionRoles;
  private readonly pipeline: BulkWritePipeline;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;

  private constructor(config: Tm1Config, options: Tm1ClientOptions, version?: string) {
    this.config = config;
    this.logger = createLogger(config, options.logger);
    const credentials = resolveCredentials(config, options.negotiate);
    this.transport =
      options.transport ??
      new UndiciTransport({
        connections: config.connectionPoolSize,
        verify: config.verify,
        cert: config.cert,
        proxy: config.proxy,
        baseUrl: credentials.baseUrl,
        tcpKeepalive: config.tcpKeepalive,
        logger: this.logger,
      });

    this.session = new SessionManager({
      config,
      credentials,
      transport: this.transport,
      logger: this.logger,
      negotiate: options.negotiate,
      version,
    });
    this.executor = new RequestExecutor({
      config,
      session: this.session,
      transport: this.transport,
      logger: this.logger,
      clock: options.clock,
      observer: options.observer,
    });
    this.services = createServices(this.executor, this.session);
    this.executor.setOperationCanceller(this.services.monitoring);
    this.roles = new SessionRoles(this.services.security, config.user);
    this.pipeline = new BulkWritePipeline({
      cells: this.services.cells,
      cubes: this.services.cubes,
      processes: this.services.processes,
      files: this.services.files,
      server: this.session,
      roles: this.roles,
      logger: this.logger,
    });
  }

  /**
   * Validates the configuration and opens a session.
   *
   * @throws {ConfigurationError} Before any request if the configuration is incomplete
   * @throws {AuthenticationError} If the server rejects the credentials
   */
  static async connect(config: Tm1Config | Tm1ConfigOptions, options: Tm1ClientOptions = {}): Promise<Tm1Client> {
    const client = new Tm1Client(parseConfig(config), options);
    client.logger.debug('Connecting to TM1', toLoggable(client.config));
    await client.openSession();
    return client;
  }

  /**
   * Attaches to the session captured by {@link snapshot}, e.g. after a
   * process restart. Falls back to the configured credentials once the
   * session expires.
   */
  static async restore(
    snapshot: SessionSnapshot,
    config: Tm1Config | Tm1ConfigOptions,
    options: Tm1ClientOptions = {}
  ): Promise<Tm1Client> {
    const parsed = parseConfig({ ...parseConfig(config), sessionId: snapshot.sessionId });
    const client = new Tm1Client(parsed, options, snapshot.version);
    if (client.session.baseUrl !== snapshot.baseUrl) {
      await client.transport.close();
      throw new ConfigurationError('Snapshot belongs to another server', [
        `snapshot: ${snapshot.baseUrl}`,
        `configuration: ${client.session.baseUrl}`,
      ]);
    }
    await client.openSession();
    return client;
  }

  get version(): string | undefined {
    return this.session.version;
  }

  /**
   * Writes cells in batches.
   * @see BulkWritePipeline.write
   */
  async write(cube: string, cells: CellInput, options?: WriteOptions): Promise<WriteResult> {
    return this.pipeline.write(cube, cells, options);
  }

  /**
   * Serializable view of the session.
   */
  snapshot(): SessionSnapshot {
    return this.session.snapshot();
  }

  /**
   * Logs out and releases pooled connections.
   */
  async close(): Promise<void> {
    try {
      await this.session.logout();
    } finally {
      await this.transport.close();
    }
  }

  private async openSession(): Promise<void> {
    try {
      await this.session.connect();
    } catch (error) {
      logError(this.logger, toError(error), 'connect');
      await this.transport.close();
      throw error;
    }
    this.logger.info('Connected to TM1', { mode: this.session.authMode, version: this.session.version });
  }
}

/**
 * Connects a client from typed options.
 */
export async function createClient(options: Tm1ConfigOptions, clientOptions?: Tm1ClientOptions): Promise<Tm1Client> {
  return Tm1Client.connect(options, clientOptions);
}

/**
 * Connects a client configured from `TM1_*` environment variables.
 */
export async function createClientFromEnv(
  overrides: Partial<Tm1ConfigOptions> = {},
  clientOptions?: Tm1ClientOptions
): Promise<Tm1Client> {
  return Tm1Client.connect(createConfigFromEnv(overrides), clientOptions);
}
