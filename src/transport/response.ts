/**
 * HTTP response as seen by the rest of the client.
 * @module transport/response
 */

import { InvalidResponseError, RestError } from '../errors/index.js';

/**
 * HTTP methods used against the TM1 REST API.
 */
export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'PUT' | 'DELETE';

/**
 * A fully buffered HTTP response.
 *
 * Header names are lower-cased. `Set-Cookie` values are kept separately
 * because they cannot be folded into one header line.
 */
export class Tm1Response {
  constructor(
    public readonly status: number,
    public readonly statusText: string,
    public readonly headers: Readonly<Record<string, string>>,
    public readonly body: Buffer,
    public readonly setCookies: readonly string[] = []
  ) {}

  /**
   * Builds a response from a string body. Mostly useful in tests.
   */
  static of(status: number, body: string | object = '', headers: Record<string, string> = {}): Tm1Response {
    const text = typeof body === 'string' ? body : JSON.stringify(body);
    const lowered: Record<string, string> = {};
    for (const [name, value] of Object.entries(headers)) {
      lowered[name.toLowerCase()] = value;
    }
    return new Tm1Response(status, STATUS_TEXT[status] ?? '', lowered, Buffer.from(text, 'utf-8'));
  }

  get ok(): boolean {
    return this.status >= 200 && this.status < 300;
  }

  header(name: string): string | undefined {
    return this.headers[name.toLowerCase()];
  }

  text(): string {
    return this.body.toString('utf-8');
  }

  /**
   * Parses the body as JSON. An empty body yields `undefined`.
   * @throws {InvalidResponseError} If the body is not JSON.
   */
  json(): unknown {
    const text = this.text();
    if (text.trim() === '') {
      return undefined;
    }
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new InvalidResponseError(
        `Expected a JSON body (status ${this.status})`,
        error instanceof Error ? error : undefined
      );
    }
  }
}

/**
 * Wraps a non-2xx response in a {@link RestError}.
 */
export function toRestError(response: Tm1Response, method: string, url: string): RestError {
  return new RestError({
    statusCode: response.status,
    reason: response.statusText,
    body: response.text(),
    headers: { ...response.headers },
    method,
    url,
  });
}

const STATUS_TEXT: Record<number, string> = {
  200: 'OK',
  201: 'Created',
  202: 'Accepted',
  204: 'No Content',
  400: 'Bad Request',
  401: 'Unauthorized',
  403: 'Forbidden',
  404: 'Not Found',
  409: 'Conflict',
  500: 'Internal Server Error',
  503: 'Service Unavailable',
};
