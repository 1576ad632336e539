/**
 * Hostname Resolution
 *
 * Derives the canonical device identifier used as the snapshot namespace.
 */

import type { CanonicalHostname } from '../types/index.js';

const HOSTNAME_KEYWORDS = new Set(['hostname', 'host-name']);
const COMMENT_PREFIXES = ['!', '#'];
const FORBIDDEN_CHARS = /[/\\:*?"<>|\s\u0000-\u001f\u007f]/g;

export const MAX_HOSTNAME_LENGTH = 128;
export const UNKNOWN_HOSTNAME = 'unknown-device';

/**
 * Find the value of the first `hostname <name>` (or `host-name <name>;`) declaration.
 */
export function extractHostname(text: string): string | undefined {
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || COMMENT_PREFIXES.some(prefix => line.startsWith(prefix))) {
      continue;
    }

    const [keyword, value] = line.split(/\s+/);
    if (keyword === undefined || value === undefined) {
      continue;
    }
    if (HOSTNAME_KEYWORDS.has(keyword.toLowerCase())) {
      return value.replace(/;+$/, '').replace(/^(["'])(.*)\1$/, '$2');
    }
  }
  return undefined;
}

/**
 * Make a raw name safe to use as a directory and file name prefix.
 * Returns undefined when nothing usable is left.
 */
export function normalizeHostname(raw: string): CanonicalHostname | undefined {
  const cleaned = raw.trim().replace(/;/g, '').replace(FORBIDDEN_CHARS, '_');
  // `.` and `..` name directories that already exist
  if (cleaned.length === 0 || /^\.+$/.test(cleaned)) {
    return undefined;
  }

  return cleaned.replace(/^\.+/, dots => '_'.repeat(dots.length)).slice(0, MAX_HOSTNAME_LENGTH);
}

/**
 * Resolve the canonical hostname from captured configuration text.
 *
 * Never throws: falls back to the normalized `fallback` (the configured address),
 * and to {@link UNKNOWN_HOSTNAME} when neither yields a usable name.
 */
export function resolveHostname(capturedText: string, fallback: string): CanonicalHostname {
  const extracted = extractHostname(capturedText);
  const fromConfig = extracted !== undefined ? normalizeHostname(extracted) : undefined;
  return fromConfig ?? normalizeHostname(fallback) ?? UNKNOWN_HOSTNAME;
}
