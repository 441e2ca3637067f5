import { vi } from 'vitest';
import type { Clock } from '../executor/index.js';
import type { HttpRequest, HttpTransport } from '../transport/http-transport.js';
import type { HttpMethod } from '../transport/response.js';
import { Tm1Response } from '../transport/response.js';

export type RouteHandler = (request: HttpRequest) => Tm1Response | Promise<Tm1Response>;

interface Route {
  method: HttpMethod;
  fragment: string;
  handler: RouteHandler;
  once: boolean;
}

/**
 * In-process stand-in for the server. Routes match on method and a URL
 * fragment; one-shot routes win over persistent ones and are consumed in
 * registration order. Unmatched requests get a 404.
 */
export class FakeTransport implements HttpTransport {
  readonly requests: HttpRequest[] = [];
  readonly reset = vi.fn(async (): Promise<void> => undefined);
  readonly close = vi.fn(async (): Promise<void> => undefined);
  private routes: Route[] = [];

  on(method: HttpMethod, fragment: string, handler: RouteHandler): this {
    this.routes.push({ method, fragment, handler, once: false });
    return this;
  }

  once(method: HttpMethod, fragment: string, handler: RouteHandler): this {
    this.routes.push({ method, fragment, handler, once: true });
    return this;
  }

  async send(request: HttpRequest): Promise<Tm1Response> {
    this.requests.push(request);
    const matches = (route: Route): boolean =>
      route.method === request.method && request.url.includes(route.fragment);
    const route = this.routes.find((candidate) => candidate.once && matches(candidate)) ?? this.routes.find(matches);
    if (!route) {
      return Tm1Response.of(404, { error: { message: `No route for ${request.method} ${request.url}` } });
    }
    if (route.once) {
      this.routes = this.routes.filter((candidate) => candidate !== route);
    }
    return route.handler(request);
  }

  /**
   * Requests sent with `method` whose URL contains `fragment`.
   */
  sent(method: HttpMethod, fragment = ''): HttpRequest[] {
    return this.requests.filter((request) => request.method === method && request.url.includes(fragment));
  }
}

/**
 * Clock that records sleeps and returns immediately.
 */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
  }
}

export const TEST_BASE_URL = 'http://tm1.test:8010/api/v1';
export const TEST_VERSION = '11.8.02300.3';

/**
 * Response of a successful handshake that issues a session cookie.
 */
export function sessionResponse(sessionId: string, version: string = TEST_VERSION): Tm1Response {
  return new Tm1Response(200, 'OK', { 'content-type': 'text/plain' }, Buffer.from(version), [
    `TM1SessionId=${sessionId}; Path=/api/; HttpOnly`,
  ]);
}

/**
 * Fake with the version handshake answered, each call issuing a new session id.
 */
export function createServerTransport(version: string = TEST_VERSION): FakeTransport {
  let sessions = 0;
  return new FakeTransport().on('GET', '/Configuration/ProductVersion/$value', () =>
    sessionResponse(`session-${++sessions}`, version)
  );
}

export function json(status: number, body: object): Tm1Response {
  return Tm1Response.of(status, body, { 'Content-Type': 'application/json' });
}

export function parseBody(request: HttpRequest): unknown {
  if (request.body === undefined) {
    return undefined;
  }
  const text = typeof request.body === 'string' ? request.body : Buffer.from(request.body).toString('utf-8');
  return JSON.parse(text);
}
