/**
 * Small helpers shared across modules.
 * @module utils
 */

/**
 * Escapes a TM1 object name for use inside an OData key literal.
 *
 * Single quotes are doubled; `%`, `#`, `?` and `&` are percent-encoded so
 * the name survives URL parsing.
 */
export function escapeObjectName(name: string): string {
  return name
    .replace(/'/g, "''")
    .replace(/%/g, '%25')
    .replace(/#/g, '%23')
    .replace(/\?/g, '%3F')
    .replace(/&/g, '%26');
}

/**
 * Fills each `{}` placeholder in `template` with the next argument, escaped
 * with {@link escapeObjectName}.
 *
 * @example
 * formatUrl("/Cubes('{}')/Dimensions", "Sales & Margin") // "/Cubes('Sales %26 Margin')/Dimensions"
 */
export function formatUrl(template: string, ...args: string[]): string {
  let index = 0;
  return template.replace(/\{\}/g, () => {
    if (index >= args.length) {
      throw new RangeError(`Not enough arguments for URL template '${template}'`);
    }
    return escapeObjectName(args[index++] ?? '');
  });
}

/**
 * Lowercases and removes all whitespace. TM1 object names compare this way.
 */
export function lowerAndDropSpaces(value: string): string {
  return value.replace(/\s/g, '').toLowerCase();
}

/**
 * Compares two TM1 object names ignoring case and whitespace.
 */
export function caseAndSpaceInsensitiveEquals(a: string, b: string): boolean {
  return lowerAndDropSpaces(a) === lowerAndDropSpaces(b);
}

/**
 * Returns true when `actual` is at least `required`.
 *
 * Versions are compared component-wise as integers, using as many components
 * as `required` carries. From the third component on, only as many digits as
 * `required` gives are compared: `verifyVersion('11.8.015', '11.8.01500.6')`
 * is true.
 */
export function verifyVersion(required: string, actual: string | undefined): boolean {
  if (!actual) {
    return false;
  }
  const requiredParts = required.split('.').map((part) => Number.parseInt(part, 10));
  const actualParts = actual.split('.');

  for (let i = 0; i < requiredParts.length; i++) {
    const want = requiredParts[i] ?? 0;
    const rawHave = actualParts[i] ?? '0';
    const requiredWidth = required.split('.')[i]?.length ?? rawHave.length;
    // Patch components are zero-padded build numbers: 01500 reads as 015
    const have = Number.parseInt(i < 2 ? rawHave : rawHave.slice(0, requiredWidth), 10) || 0;
    if (have > want) {
      return true;
    }
    if (have < want) {
      return false;
    }
  }
  return true;
}

/**
 * Base64-encodes a UTF-8 string.
 */
export function b64Encode(value: string): string {
  return Buffer.from(value, 'utf-8').toString('base64');
}

/**
 * Decodes a base64 string into UTF-8.
 */
export function b64Decode(value: string): string {
  return Buffer.from(value, 'base64').toString('utf-8');
}

/**
 * Promise-based delay.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Type guard for plain JSON objects.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads `value` from an OData collection response.
 */
export function collectionValue(body: unknown): unknown[] {
  if (isRecord(body) && Array.isArray(body['value'])) {
    return body['value'];
  }
  return [];
}
