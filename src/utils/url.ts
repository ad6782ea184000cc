/**
 * URL normalization and validation utilities for remote asset downloads
 * Handles escaped separators, protocol-relative URLs, scheme upgrades, and
 * rejects unsupported protocols
 */

export type NormalizeResult =
  | { ok: true; url: string }
  | { ok: false; reason: string; input: string };

/**
 * Replace JSON-escaped forward slashes (`\/`) with literal ones
 */
export function unescapeSlashes(input: string): string {
  return input.replaceAll('\\/', '/');
}

/**
 * Normalize and validate a remote asset URL
 *
 * Rules:
 * - Escaped separators (\/) → /
 * - Protocol-relative URLs (//host/path) → https://host/path
 * - HTTP URLs → HTTPS
 * - HTTPS URLs → unchanged
 * - Query strings preserved exactly
 * - Rejects: data:, blob:, empty, relative, and other non-http(s) schemes
 *
 * @param input - The URL string to normalize
 * @returns Result object with normalized URL or error reason
 */
export function normalizeRemoteUrl(input: string): NormalizeResult {
  if (input.trim() === '') {
    return {
      ok: false,
      reason: 'Invalid URL: empty input',
      input,
    };
  }

  const trimmed = unescapeSlashes(input.trim());

  if (trimmed.startsWith('//')) {
    try {
      const url = new URL(`https:${trimmed}`);
      return {
        ok: true,
        url: url.toString(),
      };
    } catch {
      return {
        ok: false,
        reason: 'Invalid URL: malformed protocol-relative URL',
        input,
      };
    }
  }

  try {
    const url = new URL(trimmed);

    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      return {
        ok: false,
        reason: `Unsupported protocol: ${url.protocol}`,
        input,
      };
    }

    if (url.protocol === 'http:') {
      url.protocol = 'https:';
    }

    return {
      ok: true,
      url: url.toString(),
    };
  } catch {
    return {
      ok: false,
      reason: 'Invalid URL: failed to parse',
      input,
    };
  }
}
