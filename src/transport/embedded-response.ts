/**
 * Parser for raw HTTP responses embedded in an async operation result.
 *
 * When an async operation completes, the server returns the original
 * response serialized as HTTP/1.1 text: status line, headers, blank line and
 * body (plain or chunked).
 *
 * @module transport/embedded-response
 */

import { InvalidResponseError } from '../errors/index.js';
import { Tm1Response } from './response.js';

const CRLF = Buffer.from('\r\n');
const HEADER_END = Buffer.from('\r\n\r\n');
const STATUS_LINE = /^HTTP\/\d(?:\.\d)?\s+(\d{3})(?:\s+(.*))?$/;

/**
 * Returns true if the body is itself a serialized HTTP response.
 */
export function isEmbeddedResponse(body: Buffer): boolean {
  return body.subarray(0, 5).toString('latin1') === 'HTTP/';
}

/**
 * Parses a serialized HTTP response.
 * @throws {InvalidResponseError} If the status line, headers or chunk framing are malformed.
 */
export function parseEmbeddedResponse(raw: Buffer): Tm1Response {
  let headerEnd = raw.indexOf(HEADER_END);
  let separatorLength = HEADER_END.length;
  if (headerEnd === -1) {
    // Some servers terminate the head with bare LFs
    headerEnd = raw.indexOf('\n\n');
    separatorLength = 2;
  }
  if (headerEnd === -1) {
    headerEnd = raw.length;
    separatorLength = 0;
  }

  const head = raw.subarray(0, headerEnd).toString('latin1').split(/\r?\n/);
  const statusMatch = STATUS_LINE.exec(head[0] ?? '');
  if (!statusMatch) {
    throw new InvalidResponseError(`Malformed embedded status line: '${head[0] ?? ''}'`);
  }

  const headers: Record<string, string> = {};
  const setCookies: string[] = [];
  for (const line of head.slice(1)) {
    const colon = line.indexOf(':');
    if (colon <= 0) {
      continue;
    }
    const name = line.slice(0, colon).trim().toLowerCase();
    const value = line.slice(colon + 1).trim();
    if (name === 'set-cookie') {
      setCookies.push(value);
    } else {
      headers[name] = headers[name] !== undefined ? `${headers[name]}, ${value}` : value;
    }
  }

  let body = raw.subarray(headerEnd + separatorLength);
  if (headers['transfer-encoding']?.toLowerCase().includes('chunked')) {
    body = decodeChunked(body);
  } else if (headers['content-length'] !== undefined) {
    const length = Number.parseInt(headers['content-length'], 10);
    if (Number.isFinite(length) && length >= 0) {
      body = body.subarray(0, length);
    }
  }

  return new Tm1Response(
    Number.parseInt(statusMatch[1] ?? '0', 10),
    statusMatch[2]?.trim() ?? '',
    headers,
    Buffer.from(body),
    setCookies
  );
}

/**
 * Decodes a chunked transfer-encoded body.
 */
export function decodeChunked(encoded: Buffer): Buffer {
  const chunks: Buffer[] = [];
  let offset = 0;

  while (offset < encoded.length) {
    const lineEnd = encoded.indexOf(CRLF, offset);
    if (lineEnd === -1) {
      throw new InvalidResponseError('Truncated chunk size line');
    }
    const sizeField = encoded.subarray(offset, lineEnd).toString('latin1').split(';')[0]?.trim() ?? '';
    const size = Number.parseInt(sizeField, 16);
    if (!Number.isFinite(size) || size < 0 || !/^[0-9a-fA-F]+$/.test(sizeField)) {
      throw new InvalidResponseError(`Invalid chunk size '${sizeField}'`);
    }
    offset = lineEnd + CRLF.length;
    if (size === 0) {
      break;
    }
    if (offset + size > encoded.length) {
      throw new InvalidResponseError('Chunk exceeds body length');
    }
    chunks.push(encoded.subarray(offset, offset + size));
    offset += size + CRLF.length;
  }

  return Buffer.concat(chunks);
}
