/**
 * Configuration for the TM1 client.
 * @module config
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';

/** Default value of the `TM1-SessionContext` header. */
export const DEFAULT_SESSION_CONTEXT = 'tm1-rest-client';

/** Default User-Agent header. */
export const DEFAULT_USER_AGENT = 'tm1-rest-client/0.1.0';

/** Default size of the HTTP connection pool. */
export const DEFAULT_CONNECTION_POOL_SIZE = 10;

/**
 * Secret string wrapper to prevent accidental exposure.
 */
export class SecretString {
  private readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  /**
   * Exposes the secret value.
   * Use with caution - avoid logging or displaying.
   */
  expose(): string {
    return this.value;
  }

  toString(): string {
    return '***';
  }

  toJSON(): string {
    return '***';
  }
}

/**
 * Accepts real booleans and the string forms found in env files and ini
 * sections ("True", " false ").
 */
const booleanish = z.union([
  z.boolean(),
  z.string().transform((value) => value.replace(/\s/g, '').toLowerCase() === 'true'),
]);

const name = z.string().min(1);

const secret = z
  .union([z.string(), z.instanceof(SecretString)])
  .transform((value) => (typeof value === 'string' ? new SecretString(value) : value));

const url = z.string().url();

const proxySchema = z.union([
  url,
  z.object({
    http: url.optional(),
    https: url.optional(),
  }),
]);

/**
 * `true`/`false` toggle certificate verification; any other string is the
 * path of a CA bundle.
 */
const verifySchema = z.union([
  z.boolean(),
  z.string().transform((value): boolean | string => {
    const normalized = value.replace(/\s/g, '').toLowerCase();
    if (normalized === 'true') return true;
    if (normalized === 'false') return false;
    return value;
  }),
]);

/**
 * Zod schema enumerating every recognised option.
 */
export const Tm1ConfigSchema = z
  .object({
    // Where the server lives
    address: name.optional(),
    port: z.coerce.number().int().min(1).max(65535).optional(),
    ssl: booleanish.default(true),
    instance: name.optional(),
    database: name.optional(),
    baseUrl: url.optional(),
    authUrl: url.optional(),

    // Credentials
    user: name.optional(),
    password: secret.optional(),
    decodeB64: booleanish.default(false),
    namespace: name.optional(),
    gateway: url.optional(),
    camPassport: secret.optional(),
    sessionId: name.optional(),
    applicationClientId: name.optional(),
    applicationClientSecret: secret.optional(),
    apiKey: secret.optional(),
    iamUrl: url.optional(),
    paUrl: url.optional(),
    cpdUrl: url.optional(),
    tenant: name.optional(),
    accessToken: secret.optional(),
    impersonate: name.optional(),
    integratedLogin: booleanish.default(false),
    integratedLoginDomain: name.optional(),
    integratedLoginService: name.optional(),
    integratedLoginHost: name.optional(),
    integratedLoginDelegate: booleanish.default(false),

    // Request behaviour
    sessionContext: name.default(DEFAULT_SESSION_CONTEXT),
    /** Seconds */
    timeout: z.coerce.number().positive().optional(),
    cancelAtTimeout: booleanish.default(false),
    asyncRequestsMode: booleanish.default(false),
    reconnectOnSessionTimeout: booleanish.default(true),
    reconnectOnRemoteDisconnect: booleanish.default(true),
    connectionPoolSize: z.coerce.number().int().positive().default(DEFAULT_CONNECTION_POOL_SIZE),
    tcpKeepalive: booleanish.default(false),
    proxy: proxySchema.optional(),
    verify: verifySchema.default(true),
    cert: z.union([name, z.tuple([name, name])]).optional(),

    // Logging
    logging: booleanish.default(false),
    logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error']).optional(),
  })
  .strict()
  .superRefine((config, ctx) => {
    if (config.baseUrl && config.address) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['baseUrl'],
        message: 'baseUrl and address are mutually exclusive',
      });
    }
  })
  // Keep-alive probes would keep the polling connection busy
  .transform((config) => (config.asyncRequestsMode ? { ...config, tcpKeepalive: false } : config));

/**
 * Options accepted when creating a configuration.
 */
export type Tm1ConfigOptions = z.input<typeof Tm1ConfigSchema>;

/**
 * Validated, immutable client configuration.
 */
export type Tm1Config = Readonly<z.output<typeof Tm1ConfigSchema>>;

/**
 * Validates raw options (typed or not) into a {@link Tm1Config}.
 * @throws {ConfigurationError} If an option is unknown, malformed or contradicts another.
 */
export function parseConfig(raw: unknown): Tm1Config {
  const result = Tm1ConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new ConfigurationError('Invalid TM1 configuration', issues);
  }
  return Object.freeze(result.data);
}

/**
 * Creates a configuration from typed options.
 */
export function createConfig(options: Tm1ConfigOptions): Tm1Config {
  return parseConfig(options);
}

/**
 * Environment variable for each option.
 */
export const ENV_VARIABLES = {
  address: 'TM1_ADDRESS',
  port: 'TM1_PORT',
  ssl: 'TM1_SSL',
  instance: 'TM1_INSTANCE',
  database: 'TM1_DATABASE',
  baseUrl: 'TM1_BASE_URL',
  authUrl: 'TM1_AUTH_URL',
  user: 'TM1_USER',
  password: 'TM1_PASSWORD',
  decodeB64: 'TM1_DECODE_B64',
  namespace: 'TM1_NAMESPACE',
  gateway: 'TM1_GATEWAY',
  camPassport: 'TM1_CAM_PASSPORT',
  sessionId: 'TM1_SESSION_ID',
  applicationClientId: 'TM1_APPLICATION_CLIENT_ID',
  applicationClientSecret: 'TM1_APPLICATION_CLIENT_SECRET',
  apiKey: 'TM1_API_KEY',
  iamUrl: 'TM1_IAM_URL',
  paUrl: 'TM1_PA_URL',
  cpdUrl: 'TM1_CPD_URL',
  tenant: 'TM1_TENANT',
  accessToken: 'TM1_ACCESS_TOKEN',
  impersonate: 'TM1_IMPERSONATE',
  integratedLogin: 'TM1_INTEGRATED_LOGIN',
  integratedLoginDomain: 'TM1_INTEGRATED_LOGIN_DOMAIN',
  integratedLoginService: 'TM1_INTEGRATED_LOGIN_SERVICE',
  integratedLoginHost: 'TM1_INTEGRATED_LOGIN_HOST',
  integratedLoginDelegate: 'TM1_INTEGRATED_LOGIN_DELEGATE',
  sessionContext: 'TM1_SESSION_CONTEXT',
  timeout: 'TM1_TIMEOUT',
  cancelAtTimeout: 'TM1_CANCEL_AT_TIMEOUT',
  asyncRequestsMode: 'TM1_ASYNC_REQUESTS_MODE',
  reconnectOnSessionTimeout: 'TM1_RECONNECT_ON_SESSION_TIMEOUT',
  reconnectOnRemoteDisconnect: 'TM1_RECONNECT_ON_REMOTE_DISCONNECT',
  connectionPoolSize: 'TM1_CONNECTION_POOL_SIZE',
  tcpKeepalive: 'TM1_TCP_KEEPALIVE',
  proxy: 'TM1_PROXY',
  verify: 'TM1_VERIFY',
  logging: 'TM1_LOGGING',
  logLevel: 'TM1_LOG_LEVEL',
} as const satisfies Partial<Record<keyof Tm1ConfigOptions, string>>;

/**
 * Creates a configuration from `TM1_*` environment variables. Empty
 * variables count as unset; `overrides` win over the environment.
 */
export function createConfigFromEnv(
  overrides: Partial<Tm1ConfigOptions> = {},
  env: NodeJS.ProcessEnv = process.env
): Tm1Config {
  const raw: Record<string, unknown> = {};
  for (const [option, variable] of Object.entries(ENV_VARIABLES)) {
    const value = env[variable];
    if (value !== undefined && value.trim() !== '') {
      raw[option] = value.trim();
    }
  }
  return parseConfig({ ...raw, ...overrides });
}

/**
 * Returns a copy of the configuration that is safe to log.
 */
export function toLoggable(config: Tm1Config): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(config)) {
    if (value === undefined) continue;
    result[key] = value instanceof SecretString ? value.toString() : value;
  }
  return result;
}

/**
 * Builder for Tm1Config.
 */
export class Tm1ConfigBuilder {
  private options: Tm1ConfigOptions = {};

  /**
   * Sets the server address and HTTP port (v11 and v12 service-to-service).
   */
  server(address: string, port?: number): this {
    this.options.address = address;
    this.options.port = port;
    return this;
  }

  /**
   * Sets the full service root URL instead of an address.
   */
  baseUrl(url: string): this {
    this.options.baseUrl = url.replace(/\/$/, '');
    return this;
  }

  ssl(enabled: boolean): this {
    this.options.ssl = enabled;
    return this;
  }

  /**
   * Sets native or CAM credentials.
   */
  credentials(user: string, password: string, namespace?: string): this {
    this.options.user = user;
    this.options.password = password;
    this.options.namespace = namespace;
    return this;
  }

  /**
   * Sets the bearer token used for every request.
   */
  accessToken(token: string): this {
    this.options.accessToken = token;
    return this;
  }

  /**
   * Sets v12 service-to-service credentials.
   */
  applicationClient(clientId: string, clientSecret: string, instance?: string, database?: string): this {
    this.options.applicationClientId = clientId;
    this.options.applicationClientSecret = clientSecret;
    this.options.instance = instance;
    this.options.database = database;
    return this;
  }

  /**
   * Sets IBM cloud API-key credentials.
   */
  ibmCloud(apiKey: string, iamUrl: string, tenant: string, database: string): this {
    this.options.apiKey = apiKey;
    this.options.iamUrl = iamUrl;
    this.options.tenant = tenant;
    this.options.database = database;
    return this;
  }

  /**
   * Attaches to an existing server session.
   */
  sessionId(id: string): this {
    this.options.sessionId = id;
    return this;
  }

  /**
   * Sets the default request timeout in seconds.
   */
  timeout(seconds: number, cancelAtTimeout = false): this {
    this.options.timeout = seconds;
    this.options.cancelAtTimeout = cancelAtTimeout;
    return this;
  }

  asyncRequestsMode(enabled: boolean): this {
    this.options.asyncRequestsMode = enabled;
    return this;
  }

  /**
   * Merges arbitrary options.
   */
  with(options: Partial<Tm1ConfigOptions>): this {
    this.options = { ...this.options, ...options };
    return this;
  }

  /**
   * Validates and returns the configuration.
   * @throws {ConfigurationError} If the configuration is invalid.
   */
  build(): Tm1Config {
    return parseConfig(this.options);
  }
}
