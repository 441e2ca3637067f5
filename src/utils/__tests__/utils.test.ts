import { describe, expect, it } from 'vitest';
import {
  b64Decode,
  b64Encode,
  caseAndSpaceInsensitiveEquals,
  collectionValue,
  escapeObjectName,
  formatUrl,
  verifyVersion,
} from '../index.js';

describe('formatUrl', () => {
  it('should escape each argument for an OData key', () => {
    expect(formatUrl("/Cubes('{}')/Views('{}')", "Plan's", 'Q1 & Q2 #1?')).toBe(
      "/Cubes('Plan''s')/Views('Q1 %26 Q2 %231%3F')"
    );
  });

  it('should fail when arguments are missing', () => {
    expect(() => formatUrl("/Cubes('{}')/Views('{}')", 'Sales')).toThrow(RangeError);
  });

  it('should encode percent signs first', () => {
    expect(escapeObjectName('100%')).toBe('100%25');
  });
});

describe('verifyVersion', () => {
  it('should compare build numbers by the digits given', () => {
    expect(verifyVersion('11.8.015', '11.8.01500.6')).toBe(true);
    expect(verifyVersion('11.8.015', '11.8.01400.1')).toBe(false);
  });

  it('should compare major and minor as integers', () => {
    expect(verifyVersion('11.7', '11.8.02300.3')).toBe(true);
    expect(verifyVersion('12', '11.8.02300.3')).toBe(false);
    expect(verifyVersion('11.8', '11.8')).toBe(true);
  });

  it('should treat an unknown version as too old', () => {
    expect(verifyVersion('11.7', undefined)).toBe(false);
  });
});

describe('helpers', () => {
  it('should compare names ignoring case and whitespace', () => {
    expect(caseAndSpaceInsensitiveEquals('Data Admin', 'dataadmin')).toBe(true);
  });

  it('should round-trip base64', () => {
    expect(b64Encode('test-secret')).toBe('dGVzdC1zZWNyZXQ=');
    expect(b64Decode('dGVzdC1zZWNyZXQ=')).toBe('test-secret');
  });

  it('should read OData collections', () => {
    expect(collectionValue({ value: [1, 2] })).toEqual([1, 2]);
    expect(collectionValue({ value: 'x' })).toEqual([]);
    expect(collectionValue(undefined)).toEqual([]);
  });
});
