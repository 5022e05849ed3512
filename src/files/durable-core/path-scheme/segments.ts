import type { RelativePath } from '../ids/index.js';
import { asRelativePath } from '../ids/index.js';

// `%` itself, separators on either platform, and NUL which no filesystem accepts.
const ESCAPED_CHARS = /[%/\\\u0000]/g;
const DOTS_ONLY = /^\.+$/;

function percentEncode(ch: string): string {
  return `%${ch.charCodeAt(0).toString(16).toUpperCase().padStart(2, '0')}`;
}

/**
 * Make one path segment safe to join.
 *
 * - `%`, `/`, `\` and NUL are percent-encoded (`%25`, `%2F`, `%5C`, `%00`)
 * - a segment made only of dots (`.`, `..`, ...) has each dot encoded as `%2E`
 * - the empty segment becomes a lone `%`
 *
 * Every `%` an escape writes is followed by two hex digits, except the lone
 * `%` of the empty segment, so distinct inputs give distinct segments.
 * Anything without those characters passes through unchanged.
 */
export function sanitizeSegment(raw: string): string {
  if (raw.length === 0) return '%';
  if (DOTS_ONLY.test(raw)) return '%2E'.repeat(raw.length);
  return raw.replace(ESCAPED_CHARS, percentEncode);
}

export function relativePath(...segments: readonly string[]): RelativePath {
  return asRelativePath(segments.map(sanitizeSegment).join('/'));
}

export function childPath(parent: RelativePath, ...segments: readonly string[]): RelativePath {
  return asRelativePath([parent, ...segments.map(sanitizeSegment)].join('/'));
}

export function pathSegments(p: RelativePath): readonly string[] {
  return p.split('/');
}
