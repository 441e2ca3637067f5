/**
 * Minimal cookie jar for the session token.
 *
 * `fetch` keeps no cookies, so the client stores the ones the server sets.
 * Cookies scoped to a domain other than the server's are rejected, the same
 * way a browser would; callers can still pull a value out of the raw header
 * with {@link extractCookieValue}.
 *
 * @module transport/cookies
 */

/**
 * A parsed `Set-Cookie` header.
 */
export interface ParsedCookie {
  name: string;
  value: string;
  /** Attribute names are lower-cased; flags map to '' */
  attributes: Record<string, string>;
}

/**
 * Parses one `Set-Cookie` header value.
 */
export function parseSetCookie(header: string): ParsedCookie | undefined {
  const [pair, ...rest] = header.split(';');
  if (!pair) {
    return undefined;
  }
  const separator = pair.indexOf('=');
  if (separator <= 0) {
    return undefined;
  }
  const attributes: Record<string, string> = {};
  for (const attribute of rest) {
    const eq = attribute.indexOf('=');
    const key = (eq === -1 ? attribute : attribute.slice(0, eq)).trim().toLowerCase();
    if (key) {
      attributes[key] = eq === -1 ? '' : attribute.slice(eq + 1).trim();
    }
  }
  return {
    name: pair.slice(0, separator).trim(),
    value: pair.slice(separator + 1).trim(),
    attributes,
  };
}

/**
 * Reads a cookie value straight from raw `Set-Cookie` headers, ignoring
 * domain and path attributes.
 */
export function extractCookieValue(setCookies: readonly string[], name: string): string | undefined {
  for (const header of setCookies) {
    const parsed = parseSetCookie(header);
    if (parsed?.name === name) {
      return parsed.value;
    }
  }
  return undefined;
}

/**
 * Returns true if `host` falls under cookie `domain`.
 */
export function domainMatches(host: string, domain: string): boolean {
  const normalizedDomain = domain.replace(/^\./, '').toLowerCase();
  const normalizedHost = host.toLowerCase();
  return normalizedHost === normalizedDomain || normalizedHost.endsWith(`.${normalizedDomain}`);
}

/**
 * Cookies of one server, keyed by name.
 */
export class CookieJar {
  private readonly cookies = new Map<string, string>();

  /**
   * Stores cookies from a response to a request sent to `host`.
   * @returns Names of cookies rejected because their domain does not match
   */
  store(setCookies: readonly string[], host: string): string[] {
    const rejected: string[] = [];
    for (const header of setCookies) {
      const cookie = parseSetCookie(header);
      if (!cookie) {
        continue;
      }
      const domain = cookie.attributes['domain'];
      if (domain && !domainMatches(host, domain)) {
        rejected.push(cookie.name);
        continue;
      }
      const maxAge = cookie.attributes['max-age'];
      if (maxAge !== undefined && Number(maxAge) <= 0) {
        this.cookies.delete(cookie.name);
        continue;
      }
      this.cookies.set(cookie.name, cookie.value);
    }
    return rejected;
  }

  set(name: string, value: string): void {
    this.cookies.set(name, value);
  }

  get(name: string): string | undefined {
    return this.cookies.get(name);
  }

  delete(name: string): void {
    this.cookies.delete(name);
  }

  clear(): void {
    this.cookies.clear();
  }

  get size(): number {
    return this.cookies.size;
  }

  /**
   * Value for the `Cookie` request header, or undefined when empty.
   */
  header(): string | undefined {
    if (this.cookies.size === 0) {
      return undefined;
    }
    return [...this.cookies.entries()].map(([name, value]) => `${name}=${value}`).join('; ');
  }
}
