import type { Logger } from 'winston';
import type { BrowserCookie, BrowserSession } from '../core/browser-session.js';
import { CookieSet } from '../types/index.js';
import { IncompleteCookieSetError } from '../utils/errors.js';
import { redact } from '../utils/logger.js';

export function missingCookies(cookieSet: CookieSet, requiredNames: string[]): string[] {
  return requiredNames.filter(name => !cookieSet[name]?.value);
}

/**
 * True when every required cookie is present with a non-empty value.
 */
export function isComplete(cookieSet: CookieSet, requiredNames: string[]): boolean {
  return missingCookies(cookieSet, requiredNames).length === 0;
}

function normalizeDomain(domain: string): string {
  return domain.replace(/^\./, '').toLowerCase();
}

function toExpiry(cookie: BrowserCookie): string | undefined {
  return cookie.expires > 0 ? new Date(cookie.expires * 1000).toISOString() : undefined;
}

export class CookieHarvester {
  constructor(
    private readonly logger: Logger,
    private readonly requiredNames: string[]
  ) {}

  /**
   * Collects the cookies of the given domains into one set. Domains are merged
   * in list order, so a later domain wins a name collision.
   */
  async harvest(session: BrowserSession, domains: string[]): Promise<CookieSet> {
    const cookies = await session.cookies();
    const cookieSet: CookieSet = {};

    for (const domain of domains) {
      const wanted = normalizeDomain(domain);
      for (const cookie of cookies) {
        if (normalizeDomain(cookie.domain) !== wanted) continue;

        const expiresAt = toExpiry(cookie);
        cookieSet[cookie.name] = expiresAt
          ? { value: cookie.value, domain: cookie.domain, expiresAt }
          : { value: cookie.value, domain: cookie.domain };
      }
    }

    const missing = missingCookies(cookieSet, this.requiredNames);
    if (missing.length > 0) {
      this.logger.warn('Harvested cookie set is incomplete', {
        missing,
        harvested: Object.keys(cookieSet),
      });
      throw new IncompleteCookieSetError(missing);
    }

    for (const name of this.requiredNames) {
      const cookie = cookieSet[name];
      if (cookie) {
        this.logger.info('Harvested cookie', { name, domain: cookie.domain, value: redact(cookie.value) });
      }
    }
    return cookieSet;
  }
}
