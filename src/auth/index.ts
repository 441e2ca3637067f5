/**
 * Credential resolution for the TM1 REST API.
 *
 * Turns a validated {@link Tm1Config} into an authentication mode, the
 * service root URL and a description of the handshake the session manager
 * performs. Nothing here touches the network: incomplete or contradictory
 * settings fail with {@link ConfigurationError} before a request is made.
 *
 * @module auth
 */

import type { Tm1Config } from '../config/index.js';
import { SecretString } from '../config/index.js';
import { ConfigurationError } from '../errors/index.js';
import { b64Decode, b64Encode } from '../utils/index.js';

/**
 * Supported authentication modes.
 */
export enum AuthMode {
  /** Native TM1 security with user and password */
  Basic = 'basic',
  /** CAM security with namespace credentials or a CAM passport */
  Cam = 'cam',
  /** CAM single sign-on through a CAM gateway */
  CamSso = 'cam_sso',
  /** Integrated Windows login (Kerberos/SPNEGO) */
  Kerberos = 'kerberos',
  /** v12 application client id and secret */
  ServiceToService = 'service_to_service',
  /** IBM cloud API key exchanged for an IAM access token */
  IbmCloudApiKey = 'ibm_cloud_api_key',
  /** JWT issued by a CPD sign-in, presented to the PA proxy */
  PaProxy = 'pa_proxy',
  /** Caller-supplied bearer token */
  AccessToken = 'access_token',
}

/**
 * Modes that talk to v12 style endpoints.
 */
const V12_MODES: ReadonlySet<AuthMode> = new Set([
  AuthMode.ServiceToService,
  AuthMode.IbmCloudApiKey,
  AuthMode.PaProxy,
]);

/**
 * Returns true for modes that use v12 style service roots.
 */
export function isV12Mode(mode: AuthMode): boolean {
  return V12_MODES.has(mode);
}

/**
 * Session cookie names, in order of preference.
 */
export const SESSION_COOKIE_NAMES = ['TM1SessionId', 'paSession'] as const;

/**
 * Service principal a negotiate (SPNEGO) token is requested for.
 */
export interface NegotiateTarget {
  service: string;
  host: string;
  domain?: string;
  delegate: boolean;
}

/**
 * Produces SPNEGO tokens for integrated login. Kerberos ticket handling is
 * platform specific, so callers supply it.
 */
export interface NegotiateTokenProvider {
  /**
   * Returns a base64 token for the `Authorization: Negotiate` header.
   */
  getToken(target: NegotiateTarget): Promise<string>;
}

/**
 * A credential exchange that must happen before the handshake itself.
 */
export type CredentialExchange =
  | { kind: 'iam_api_key'; url: string; apiKey: SecretString }
  | { kind: 'cpd_signin'; url: string; user: string; password: SecretString }
  | { kind: 'negotiate'; target: NegotiateTarget }
  | { kind: 'cam_gateway'; url: string; target: NegotiateTarget };

/**
 * Description of the request that opens a session.
 */
export interface HandshakeRequest {
  method: 'GET' | 'POST';
  url: string;
  headers: Record<string, string>;
  body?: string;
  /** Runs first; its token completes the request (see {@link completeHandshake}) */
  exchange?: CredentialExchange;
  /** Keep sending `Authorization` after the session cookie arrives */
  persistAuthorization: boolean;
}

/**
 * Outcome of credential resolution.
 */
export interface ResolvedCredentials {
  mode: AuthMode;
  /** Service root every request path is appended to */
  baseUrl: string;
  authUrl: string;
  /** Absent when attaching to an existing session without credentials */
  handshake?: HandshakeRequest;
  /** Existing session to attach to instead of handshaking */
  sessionId?: string;
  /** Headers sent with every request of the session */
  sessionHeaders: Record<string, string>;
  /** Host the session cookie is expected to be scoped to */
  host: string;
}

const V12_FIELDS = ['instance', 'database', 'authUrl', 'tenant', 'apiKey'] as const;

/**
 * Picks the authentication mode from the configuration.
 */
export function resolveAuthMode(config: Tm1Config): AuthMode | undefined {
  if (config.accessToken) return AuthMode.AccessToken;
  if (config.applicationClientId || config.applicationClientSecret) return AuthMode.ServiceToService;
  if (config.iamUrl) return AuthMode.IbmCloudApiKey;
  if (config.paUrl) return AuthMode.PaProxy;
  if (V12_FIELDS.some((field) => config[field] !== undefined)) return AuthMode.ServiceToService;
  if (config.integratedLogin) return AuthMode.Kerberos;
  if (config.gateway) return AuthMode.CamSso;
  if (config.namespace || config.camPassport) return AuthMode.Cam;
  if (config.user) return AuthMode.Basic;
  // Only a session id: nothing to authenticate with
  if (config.sessionId) return undefined;
  return AuthMode.Basic;
}

/**
 * Resolves mode, endpoints and handshake.
 *
 * @param negotiate - Required for {@link AuthMode.Kerberos} and {@link AuthMode.CamSso}
 * @throws {ConfigurationError} If required fields are missing or contradict each other.
 */
export function resolveCredentials(
  config: Tm1Config,
  negotiate?: NegotiateTokenProvider
): ResolvedCredentials {
  const mode = resolveAuthMode(config);
  const issues: string[] = [];

  if (config.impersonate && mode !== undefined && isV12Mode(mode)) {
    issues.push('impersonate is not supported by v12 authentication');
  }

  const sessionHeaders: Record<string, string> = {};
  if (config.impersonate) {
    sessionHeaders['TM1-Impersonate'] = config.impersonate;
  }

  if (mode === undefined) {
    // Attach-only: endpoints still need to be known
    const endpoints = v11Endpoints(config, issues);
    throwIfIssues('Incomplete session configuration', issues);
    return {
      mode: AuthMode.Basic,
      ...endpoints,
      sessionId: config.sessionId,
      sessionHeaders,
      host: hostOf(endpoints.baseUrl),
    };
  }

  const builder = HANDSHAKE_BUILDERS[mode];
  const built = builder(config, issues, negotiate);
  throwIfIssues(`Incomplete ${mode} configuration`, issues);

  return {
    mode,
    baseUrl: built.baseUrl,
    authUrl: built.authUrl,
    handshake: built.handshake,
    sessionId: config.sessionId,
    sessionHeaders,
    host: hostOf(built.baseUrl),
  };
}

/**
 * Fills the token produced by a credential exchange into the handshake.
 */
export function completeHandshake(
  handshake: HandshakeRequest,
  token: string
): Omit<HandshakeRequest, 'exchange'> {
  const { exchange, ...request } = handshake;
  if (!exchange) {
    return request;
  }
  switch (exchange.kind) {
    case 'iam_api_key':
      return { ...request, headers: { ...request.headers, Authorization: `Bearer ${token}` } };
    case 'negotiate':
      return { ...request, headers: { ...request.headers, Authorization: `Negotiate ${token}` } };
    case 'cam_gateway':
      return { ...request, headers: { ...request.headers, Authorization: `CAMPassport ${token}` } };
    case 'cpd_signin':
      return { ...request, body: new URLSearchParams({ jwt: token }).toString() };
  }
}

interface BuiltHandshake {
  baseUrl: string;
  authUrl: string;
  handshake: HandshakeRequest;
}

type HandshakeBuilder = (
  config: Tm1Config,
  issues: string[],
  negotiate?: NegotiateTokenProvider
) => BuiltHandshake;

const HANDSHAKE_BUILDERS: Record<AuthMode, HandshakeBuilder> = {
  [AuthMode.Basic]: (config, issues) => {
    const endpoints = v11Endpoints(config, issues);
    requireField(config.user, 'user', issues);
    return {
      ...endpoints,
      handshake: getHandshake(endpoints.authUrl, `Basic ${b64Encode(`${config.user ?? ''}:${password(config)}`)}`),
    };
  },

  [AuthMode.Cam]: (config, issues) => {
    const endpoints = v11Endpoints(config, issues);
    if (config.camPassport) {
      return {
        ...endpoints,
        handshake: getHandshake(endpoints.authUrl, `CAMPassport ${config.camPassport.expose()}`),
      };
    }
    requireField(config.user, 'user', issues);
    requireField(config.password, 'password', issues);
    const token = b64Encode(`${config.user ?? ''}:${password(config)}:${config.namespace ?? ''}`);
    return { ...endpoints, handshake: getHandshake(endpoints.authUrl, `CAMNamespace ${token}`) };
  },

  [AuthMode.CamSso]: (config, issues, negotiate) => {
    const endpoints = v11Endpoints(config, issues);
    requireField(config.namespace, 'namespace', issues);
    requireNegotiate(negotiate, issues);
    const gateway = new URL(config.gateway ?? 'http://localhost');
    gateway.searchParams.set('CAMNamespace', config.namespace ?? '');
    return {
      ...endpoints,
      handshake: {
        ...getHandshake(endpoints.authUrl),
        exchange: { kind: 'cam_gateway', url: gateway.toString(), target: negotiateTarget(config, gateway.hostname) },
      },
    };
  },

  [AuthMode.Kerberos]: (config, issues, negotiate) => {
    const endpoints = v11Endpoints(config, issues);
    requireNegotiate(negotiate, issues);
    return {
      ...endpoints,
      handshake: {
        ...getHandshake(endpoints.authUrl),
        exchange: { kind: 'negotiate', target: negotiateTarget(config, hostOf(endpoints.baseUrl)) },
      },
    };
  },

  [AuthMode.ServiceToService]: (config, issues) => {
    requireField(config.applicationClientId, 'applicationClientId', issues);
    requireField(config.applicationClientSecret, 'applicationClientSecret', issues);
    requireField(config.user, 'user', issues);

    let baseUrl: string;
    let authUrl: string;
    if (config.baseUrl) {
      requireField(config.authUrl, 'authUrl', issues);
      baseUrl = config.baseUrl.replace(/\/$/, '');
      authUrl = config.authUrl ?? '';
    } else {
      requireField(config.address, 'address', issues);
      requireField(config.instance, 'instance', issues);
      requireField(config.database, 'database', issues);
      const root = `${scheme(config)}://${config.address ?? ''}${config.port ? `:${config.port}` : ''}/${config.instance ?? ''}`;
      baseUrl = `${root}/api/v1/Databases('${config.database ?? ''}')`;
      authUrl = config.authUrl ?? `${root}/auth/v1/session`;
    }

    const clientSecret = config.applicationClientSecret?.expose() ?? '';
    return {
      baseUrl,
      authUrl,
      handshake: {
        method: 'POST',
        url: authUrl,
        headers: {
          Authorization: `Basic ${b64Encode(`${config.applicationClientId ?? ''}:${clientSecret}`)}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ User: config.user }),
        persistAuthorization: false,
      },
    };
  },

  [AuthMode.IbmCloudApiKey]: (config, issues) => {
    requireField(config.apiKey, 'apiKey', issues);
    requireField(config.address, 'address', issues);
    requireField(config.tenant, 'tenant', issues);
    requireField(config.database, 'database', issues);
    if (!config.ssl) {
      issues.push('ssl must be enabled for IBM cloud');
    }

    const baseUrl =
      config.baseUrl?.replace(/\/$/, '') ??
      `https://${config.address ?? ''}/api/${config.tenant ?? ''}/v0/tm1/${config.database ?? ''}`;
    const authUrl = config.authUrl ?? `${baseUrl}/Configuration/ProductVersion/$value`;
    return {
      baseUrl,
      authUrl,
      handshake: {
        ...getHandshake(authUrl),
        exchange: { kind: 'iam_api_key', url: config.iamUrl ?? '', apiKey: config.apiKey ?? new SecretString('') },
        persistAuthorization: true,
      },
    };
  },

  [AuthMode.PaProxy]: (config, issues) => {
    requireField(config.cpdUrl, 'cpdUrl', issues);
    requireField(config.user, 'user', issues);
    requireField(config.password, 'password', issues);
    requireField(config.database, 'database', issues);

    const paUrl = (config.paUrl ?? '').replace(/\/$/, '');
    const baseUrl = `${paUrl}/tm1/api/${config.database ?? ''}/api/v1`;
    const cpdUrl = (config.cpdUrl ?? '').replace(/\/$/, '');
    return {
      baseUrl,
      authUrl: `${paUrl}/login`,
      handshake: {
        method: 'POST',
        url: `${paUrl}/login`,
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        exchange: {
          kind: 'cpd_signin',
          url: `${cpdUrl}/v1/preauth/signin`,
          user: config.user ?? '',
          password: new SecretString(password(config)),
        },
        persistAuthorization: false,
      },
    };
  },

  [AuthMode.AccessToken]: (config, issues) => {
    const endpoints = v11Endpoints(config, issues);
    return {
      ...endpoints,
      handshake: {
        ...getHandshake(endpoints.authUrl, `Bearer ${config.accessToken?.expose() ?? ''}`),
        persistAuthorization: true,
      },
    };
  },
};

/**
 * Service root and auth URL for v11 style servers.
 */
function v11Endpoints(config: Tm1Config, issues: string[]): { baseUrl: string; authUrl: string } {
  if (config.baseUrl) {
    const trimmed = config.baseUrl.replace(/\/$/, '');
    if (trimmed.includes('api/v1/Databases')) {
      requireField(config.authUrl, 'authUrl (required with a database base URL)', issues);
      return { baseUrl: trimmed, authUrl: config.authUrl ?? '' };
    }
    const baseUrl = trimmed.endsWith('/api/v1') ? trimmed : `${trimmed}/api/v1`;
    return { baseUrl, authUrl: config.authUrl ?? `${baseUrl}/Configuration/ProductVersion/$value` };
  }

  requireField(config.port, 'port', issues);
  const baseUrl = `${scheme(config)}://${config.address ?? 'localhost'}:${config.port ?? ''}/api/v1`;
  return { baseUrl, authUrl: config.authUrl ?? `${baseUrl}/Configuration/ProductVersion/$value` };
}

function getHandshake(url: string, authorization?: string): HandshakeRequest {
  return {
    method: 'GET',
    url,
    headers: authorization ? { Authorization: authorization } : {},
    persistAuthorization: false,
  };
}

function negotiateTarget(config: Tm1Config, fallbackHost: string): NegotiateTarget {
  return {
    service: config.integratedLoginService ?? 'HTTP',
    host: config.integratedLoginHost ?? fallbackHost,
    domain: config.integratedLoginDomain,
    delegate: config.integratedLoginDelegate,
  };
}

function password(config: Tm1Config): string {
  const raw = config.password?.expose() ?? '';
  return config.decodeB64 ? b64Decode(raw) : raw;
}

function scheme(config: Tm1Config): 'http' | 'https' {
  return config.ssl ? 'https' : 'http';
}

function hostOf(url: string): string {
  try {
    return new URL(url).hostname;
  } catch {
    return '';
  }
}

function requireField(value: unknown, field: string, issues: string[]): void {
  if (value === undefined || value === '') {
    issues.push(`${field} is required`);
  }
}

function requireNegotiate(provider: NegotiateTokenProvider | undefined, issues: string[]): void {
  if (!provider) {
    issues.push('a NegotiateTokenProvider is required for integrated login');
  }
}

function throwIfIssues(message: string, issues: string[]): void {
  if (issues.length > 0) {
    throw new ConfigurationError(message, issues);
  }
}
