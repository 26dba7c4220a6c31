/**
 * URL utility unit tests
 */

import { describe, it, expect } from 'vitest';
import {
  decodePreservingDelimiters,
  getScheme,
  getSchemeAsWritten,
  hasAuthority,
  parseAbsoluteUrl,
  percentEncode,
  queryToMap,
} from '../../src/utils/url.js';

describe('percentEncode', () => {
  it('escapes everything but unreserved characters', () => {
    expect(percentEncode("a b!'()*~-_.")).toBe('a%20b%21%27%28%29%2A~-_.');
  });

  it('escapes URL delimiters', () => {
    expect(percentEncode('https://x.test/a?b=c&d')).toBe('https%3A%2F%2Fx.test%2Fa%3Fb%3Dc%26d');
  });
});

describe('decodePreservingDelimiters', () => {
  it('decodes plain escapes but keeps reserved ones', () => {
    expect(decodePreservingDelimiters('a%20b%2Fc%3Fd%26')).toBe('a b%2Fc%3Fd%26');
  });

  it('returns null for a malformed escape', () => {
    expect(decodePreservingDelimiters('bad%E0%A4%A')).toBeNull();
    expect(decodePreservingDelimiters('%')).toBeNull();
  });
});

describe('parseAbsoluteUrl', () => {
  it('parses an absolute URL', () => {
    const result = parseAbsoluteUrl('https://fake.download/a.png');
    expect(result.success && result.url.href).toBe('https://fake.download/a.png');
  });

  it('classifies a missing scheme', () => {
    const result = parseAbsoluteUrl('/relative/path');
    expect(result.success).toBe(false);
    if (result.success) return;

    expect(result.error.code).toBe('URI_SYNTAX_ERROR');
    expect(result.error.reason).toBe('relative-url-without-base');
    expect(result.error.input).toBe('/relative/path');
  });

  it('classifies other failures as invalid', () => {
    const result = parseAbsoluteUrl('http://exa mple.com');
    expect(result.success).toBe(false);
    if (result.success) return;

    expect(result.error.reason).toBe('invalid-url');
  });
});

describe('URL helpers', () => {
  it('detects an authority', () => {
    expect(hasAuthority(new URL('ocs://install?x=1'))).toBe(true);
    expect(hasAuthority(new URL('ocs:install?x=1'))).toBe(false);
  });

  it('returns the scheme without its colon', () => {
    expect(getScheme(new URL('OCSS://install'))).toBe('ocss');
  });

  it('returns the scheme as written', () => {
    expect(getSchemeAsWritten('OcS://install', new URL('OcS://install'))).toBe('OcS');
    expect(getSchemeAsWritten('  ABC:x', new URL('  ABC:x'))).toBe('ABC');
    expect(getSchemeAsWritten('a\tbc:x', new URL('a\tbc:x'))).toBe('abc');
  });

  it('keeps the last value of a repeated key', () => {
    const params = queryToMap(new URL('ocs://install?a=1&a=2&b='));
    expect([...params]).toEqual([['a', '2'], ['b', '']]);
  });
});
