import { createHash } from 'crypto';

const SUPPORTED_PROTOCOLS = new Set(['http:', 'https:']);

/**
 * Canonical form used as the registry's uniqueness key.
 *
 * Scheme and host are lowercased and the default port is dropped by the
 * WHATWG parser; the fragment is removed because it never reaches the server.
 * Returns null for input that is not an absolute http(s) URL.
 */
export function normalizeUrl(raw: string): string | null {
  const trimmed = raw.trim();
  if (!trimmed) {
    return null;
  }

  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    return null;
  }

  if (!SUPPORTED_PROTOCOLS.has(parsed.protocol) || !parsed.hostname) {
    return null;
  }

  parsed.hash = '';
  return parsed.toString();
}

export function normalizeDomain(raw: string): string {
  return raw.trim().toLowerCase().replace(/\.$/, '');
}

/**
 * Hex MD5 of the normalized URL, identical to the column default `md5(url)`
 */
export function hashUrl(url: string): string {
  return createHash('md5').update(url).digest('hex');
}
