import { CookieSet } from '../types/index.js';

/**
 * Parses a `Cookie:` style header ("A=1; B=2") into a cookie set. Values may
 * contain '=' characters; segments without a name are skipped.
 */
export function parseCookieHeader(header: string, domain: string): CookieSet {
  const cookieSet: CookieSet = {};

  for (const segment of header.split(';')) {
    const trimmed = segment.trim();
    const separator = trimmed.indexOf('=');
    if (separator <= 0) continue;

    const name = trimmed.slice(0, separator).trim();
    const value = trimmed.slice(separator + 1).trim();
    if (!name) continue;

    cookieSet[name] = { value, domain };
  }

  return cookieSet;
}

/**
 * Formats the given cookie names as a header, in the order requested.
 * Names absent from the set are left out.
 */
export function formatCookieHeader(cookieSet: CookieSet, names: string[]): string {
  const parts: string[] = [];
  for (const name of names) {
    const cookie = cookieSet[name];
    if (cookie) {
      parts.push(`${name}=${cookie.value}`);
    }
  }
  return parts.join('; ');
}
