import pLimit from 'p-limit';
import type { Logger } from 'winston';
import { CookieStore } from './cookie-store.js';
import { missingCookies } from '../processors/cookie-harvester.js';
import {
  BusyPolicy,
  CookieRecord,
  CookieSet,
  Credentials,
  FlowResult,
  LoginOutcome,
} from '../types/index.js';
import { BusyError, IncompleteCookieSetError, toFlowError } from '../utils/errors.js';
import { formatCookieHeader } from '../utils/cookie-header.js';

export interface LoginFlowRunner {
  run(credentials: Credentials): Promise<FlowResult>;
}

export interface LoginCoordinatorOptions {
  busyPolicy: BusyPolicy;
  requiredCookies: string[];
}

/**
 * Single entry point for automated and manual cookie acquisition. Only one
 * login flow touches the browser at a time; extra triggers are rejected or
 * queued depending on the busy policy.
 */
export class LoginCoordinator {
  private readonly limit = pLimit(1);
  private readonly activeFlows = new Set<Promise<LoginOutcome>>();
  private isShuttingDown = false;

  constructor(
    private readonly flow: LoginFlowRunner,
    private readonly store: CookieStore,
    private readonly options: LoginCoordinatorOptions,
    private readonly logger: Logger
  ) {
    logger.info('Login coordinator initialized', { busyPolicy: options.busyPolicy });
  }

  async login(credentials: Credentials): Promise<LoginOutcome> {
    if (this.isShuttingDown || (this.options.busyPolicy === 'reject' && this.isBusy())) {
      this.logger.warn('Login trigger rejected, another flow is in progress', {
        active: this.limit.activeCount,
        pending: this.limit.pendingCount,
      });
      return { success: false, error: toFlowError(new BusyError()) };
    }

    if (this.isBusy()) {
      this.logger.info('Login trigger queued', { position: this.limit.pendingCount + 1 });
    }

    const flowPromise = this.limit(() => this.execute(credentials));
    this.activeFlows.add(flowPromise);
    try {
      return await flowPromise;
    } finally {
      this.activeFlows.delete(flowPromise);
    }
  }

  async submitManual(cookieSet: CookieSet): Promise<CookieRecord> {
    const missing = missingCookies(cookieSet, this.options.requiredCookies);
    if (missing.length > 0) {
      throw new IncompleteCookieSetError(missing);
    }

    const record: CookieRecord = {
      cookieSet,
      source: 'Manual',
      savedAt: new Date().toISOString(),
    };
    await this.store.save(record);
    return record;
  }

  /**
   * The most recent record, whichever path produced it. Rejects when nothing
   * usable has been saved.
   */
  async current(): Promise<CookieRecord> {
    const record = await this.store.load();
    const missing = missingCookies(record.cookieSet, this.options.requiredCookies);
    if (missing.length > 0) {
      throw new IncompleteCookieSetError(missing);
    }
    return record;
  }

  cookieHeader(cookieSet: CookieSet): string {
    return formatCookieHeader(cookieSet, this.options.requiredCookies);
  }

  isBusy(): boolean {
    return this.limit.activeCount + this.limit.pendingCount > 0;
  }

  async shutdown(): Promise<void> {
    this.isShuttingDown = true;
    if (this.activeFlows.size > 0) {
      this.logger.info('Waiting for login flows to finish', { count: this.activeFlows.size });
      await Promise.allSettled(Array.from(this.activeFlows));
    }
  }

  private async execute(credentials: Credentials): Promise<LoginOutcome> {
    const result = await this.flow.run(credentials);
    if (!result.ok) {
      return { success: false, error: result.error, session: result.session };
    }

    const record: CookieRecord = {
      cookieSet: result.cookieSet,
      source: 'Automated',
      savedAt: new Date().toISOString(),
    };

    try {
      await this.store.save(record);
      return { success: true, cookieSet: result.cookieSet, persisted: true, session: result.session };
    } catch (error) {
      // Persistence failure is reported beside the cookies, not instead of them
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error('Harvested cookies could not be persisted', { error: message });
      return {
        success: true,
        cookieSet: result.cookieSet,
        persisted: false,
        persistenceError: { kind: 'Persistence', message },
        session: result.session,
      };
    }
  }
}
