import { chromium, errors } from 'playwright';
import type { Browser, BrowserContext, LaunchOptions, Locator, Page } from 'playwright';
import type { Logger } from 'winston';
import { NavigationTimeoutError } from '../utils/errors.js';

export interface ElementRef {
  readonly selector: string;
  fill(value: string, timeoutMs: number): Promise<void>;
  click(timeoutMs: number): Promise<void>;
}

export interface BrowserCookie {
  name: string;
  value: string;
  domain: string;
  /** Unix seconds; -1 for session cookies */
  expires: number;
}

/**
 * The navigation surface the login flow drives. One instance is one
 * browsing context; `close` releases it.
 */
export interface BrowserSession {
  goto(url: string, timeoutMs: number): Promise<void>;
  currentUrl(): string;
  /** Returns a handle once the selector is visible within `timeoutMs`, otherwise null. */
  probeVisible(selector: string, timeoutMs: number): Promise<ElementRef | null>;
  /**
   * Waits until the URL moves away from `preUrl` or one of `watchSelectors`
   * appears, whichever comes first. Returns quietly when neither happens in time.
   */
  waitForSettle(preUrl: string, watchSelectors: string[], timeoutMs: number): Promise<void>;
  bodyText(timeoutMs: number): Promise<string>;
  cookies(): Promise<BrowserCookie[]>;
  close(): Promise<void>;
}

export type BrowserSessionFactory = () => Promise<BrowserSession>;

export interface BrowserSessionOptions {
  headless: boolean;
  channel?: string | undefined;
  userAgent: string;
  viewport: { width: number; height: number };
  locale: string;
  timezoneId: string;
}

export const DEFAULT_SESSION_OPTIONS: BrowserSessionOptions = {
  headless: true,
  userAgent:
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/138.0.0.0 Safari/537.36',
  viewport: { width: 1920, height: 1080 },
  locale: 'en-US',
  timezoneId: 'America/New_York',
};

class LocatorRef implements ElementRef {
  constructor(readonly selector: string, private readonly locator: Locator) {}

  async fill(value: string, timeoutMs: number): Promise<void> {
    await this.locator.click({ timeout: timeoutMs });
    await this.locator.fill(value, { timeout: timeoutMs });
  }

  async click(timeoutMs: number): Promise<void> {
    await this.locator.click({ timeout: timeoutMs });
  }
}

function isTimeout(error: unknown): boolean {
  return error instanceof errors.TimeoutError;
}

export class PlaywrightBrowserSession implements BrowserSession {
  private constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext,
    private readonly page: Page,
    private readonly logger: Logger
  ) {}

  static async open(options: BrowserSessionOptions, logger: Logger): Promise<PlaywrightBrowserSession> {
    const launchOptions: LaunchOptions = {
      headless: options.headless,
      args: ['--no-sandbox', '--disable-dev-shm-usage'],
    };
    if (options.channel) {
      launchOptions.channel = options.channel;
    }

    const browser = await chromium.launch(launchOptions);
    try {
      const context = await browser.newContext({
        viewport: options.viewport,
        userAgent: options.userAgent,
        locale: options.locale,
        timezoneId: options.timezoneId,
      });
      const page = await context.newPage();
      logger.debug('Browser session opened', { headless: options.headless });
      return new PlaywrightBrowserSession(browser, context, page, logger);
    } catch (error) {
      await browser.close();
      throw error;
    }
  }

  async goto(url: string, timeoutMs: number): Promise<void> {
    try {
      await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeoutMs });
    } catch (error) {
      if (isTimeout(error)) {
        throw new NavigationTimeoutError(`Navigation to ${url}`, timeoutMs);
      }
      throw error;
    }
  }

  currentUrl(): string {
    return this.page.url();
  }

  async probeVisible(selector: string, timeoutMs: number): Promise<ElementRef | null> {
    const locator = this.page.locator(selector).first();
    try {
      await locator.waitFor({ state: 'visible', timeout: timeoutMs });
    } catch (error) {
      if (isTimeout(error)) {
        return null;
      }
      throw error;
    }
    return new LocatorRef(selector, locator);
  }

  async waitForSettle(preUrl: string, watchSelectors: string[], timeoutMs: number): Promise<void> {
    // The portal keeps long-lived connections open, so 'networkidle' is never used here.
    const signals: Array<Promise<unknown>> = [
      this.page.waitForURL(url => url.toString() !== preUrl, { timeout: timeoutMs, waitUntil: 'commit' }),
    ];
    if (watchSelectors.length > 0) {
      signals.push(
        this.page.locator(watchSelectors.join(', ')).first().waitFor({ state: 'visible', timeout: timeoutMs })
      );
    }

    try {
      await Promise.any(signals);
    } catch (error) {
      if (error instanceof AggregateError && error.errors.every(isTimeout)) {
        this.logger.debug('Page did not settle after submit', { timeoutMs });
        return;
      }
      throw error;
    }

    try {
      await this.page.waitForLoadState('domcontentloaded', { timeout: timeoutMs });
    } catch (error) {
      if (!isTimeout(error)) throw error;
      this.logger.debug('DOM content load wait timed out', { timeoutMs });
    }
  }

  async bodyText(timeoutMs: number): Promise<string> {
    return this.page.locator('body').innerText({ timeout: timeoutMs });
  }

  async cookies(): Promise<BrowserCookie[]> {
    const cookies = await this.context.cookies();
    return cookies.map(cookie => ({
      name: cookie.name,
      value: cookie.value,
      domain: cookie.domain,
      expires: cookie.expires,
    }));
  }

  async close(): Promise<void> {
    await this.browser.close();
    this.logger.debug('Browser session closed');
  }
}

export function createPlaywrightSessionFactory(
  options: Partial<BrowserSessionOptions>,
  logger: Logger
): BrowserSessionFactory {
  const resolved: BrowserSessionOptions = { ...DEFAULT_SESSION_OPTIONS, ...options };
  return () => PlaywrightBrowserSession.open(resolved, logger);
}
