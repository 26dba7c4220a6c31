/**
 * URL utilities for parsing and encoding
 */

import type { UriSyntaxError } from '../types.js';

// Any absolute URL parses against this, so a failure without it that succeeds
// with it means the input had no scheme.
const PROBE_BASE = 'http://base.invalid/';

export type AbsoluteUrlResult =
  | { success: true; url: URL }
  | { success: false; error: UriSyntaxError };

/**
 * Parse a string as an absolute URL, classifying the failure
 */
export function parseAbsoluteUrl(input: string): AbsoluteUrlResult {
  try {
    return { success: true, url: new URL(input) };
  } catch (err) {
    const detail = err instanceof Error ? err.message : 'Invalid URL';
    return {
      success: false,
      error: {
        code: 'URI_SYNTAX_ERROR',
        reason: parsesAgainstBase(input) ? 'relative-url-without-base' : 'invalid-url',
        input,
        detail,
      },
    };
  }
}

function parsesAgainstBase(input: string): boolean {
  try {
    new URL(input, PROBE_BASE);
    return true;
  } catch {
    return false;
  }
}

/**
 * True when the URL was written with an authority (`scheme://...`),
 * even an empty one.
 */
export function hasAuthority(url: URL): boolean {
  return url.href.startsWith(`${url.protocol}//`);
}

/**
 * Scheme without the trailing colon
 */
export function getScheme(url: URL): string {
  return url.protocol.slice(0, -1);
}

/**
 * Scheme with its case as written in the input the URL was parsed from.
 * Falls back to the parsed scheme when the input does not start with it.
 */
export function getSchemeAsWritten(input: string, url: URL): string {
  const scheme = getScheme(url);
  // The URL parser skips leading C0 controls and spaces
  const start = input.search(/[^\u0000-\u0020]/);
  const written = start === -1 ? '' : input.slice(start, start + scheme.length);
  return written.toLowerCase() === scheme ? written : scheme;
}

/**
 * Percent-encode everything except unreserved characters (A-Z a-z 0-9 - _ . ~)
 */
export function percentEncode(value: string): string {
  return encodeURIComponent(value).replace(
    /[!'()*]/g,
    c => `%${c.charCodeAt(0).toString(16).toUpperCase()}`
  );
}

/**
 * Decode percent-escapes while leaving reserved delimiters encoded.
 * Returns null for a malformed escape sequence.
 */
export function decodePreservingDelimiters(value: string): string | null {
  try {
    return decodeURI(value);
  } catch {
    return null;
  }
}

/**
 * Collect query parameters into a map; the last occurrence of a key wins
 */
export function queryToMap(url: URL): Map<string, string> {
  const params = new Map<string, string>();
  for (const [key, value] of url.searchParams) {
    params.set(key, value);
  }
  return params;
}
