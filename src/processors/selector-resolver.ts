import type { Logger } from 'winston';
import type { BrowserSession, ElementRef } from '../core/browser-session.js';
import { FieldSpec } from '../types/index.js';
import { FieldNotFoundError } from '../utils/errors.js';

export type Resolution =
  | { found: true; handle: ElementRef; selector: string }
  | { found: false; error: FieldNotFoundError };

export interface SelectorResolverConfig {
  /** Pause between sweeps over the candidate list */
  pollIntervalMs: number;
}

/**
 * Locates a logical form field by trying its candidate selectors in order.
 * One deadline covers the whole field, not each candidate.
 */
export class SelectorResolver {
  private readonly logger: Logger;
  private readonly config: SelectorResolverConfig;

  constructor(logger: Logger, config: Partial<SelectorResolverConfig> = {}) {
    this.logger = logger;
    this.config = {
      pollIntervalMs: 250,
      ...config
    };
  }

  async resolve(session: BrowserSession, spec: FieldSpec, timeoutMs: number): Promise<Resolution> {
    const deadline = Date.now() + timeoutMs;
    let sweeps = 0;

    while (true) {
      sweeps++;
      for (const candidate of spec.candidates) {
        const remaining = deadline - Date.now();
        if (remaining <= 0) break;

        const handle = await this.probe(session, candidate.selector, Math.min(candidate.timeoutMs, remaining));
        if (handle) {
          this.logger.debug('Field resolved', { field: spec.field, selector: candidate.selector, sweeps });
          return { found: true, handle, selector: candidate.selector };
        }
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) break;
      await sleep(Math.min(this.config.pollIntervalMs, remaining));
    }

    const selectors = spec.candidates.map(candidate => candidate.selector);
    this.logger.warn('Field not found', { field: spec.field, candidates: selectors, timeoutMs });
    return { found: false, error: new FieldNotFoundError(spec.field, selectors, timeoutMs) };
  }

  /**
   * A probe that throws or outlives its budget counts as "not visible yet".
   */
  private async probe(session: BrowserSession, selector: string, budgetMs: number): Promise<ElementRef | null> {
    let timer: NodeJS.Timeout | undefined;
    const expiry = new Promise<null>(resolve => {
      timer = setTimeout(() => resolve(null), budgetMs);
    });

    const attempt = session.probeVisible(selector, budgetMs).catch((error: unknown) => {
      this.logger.debug('Selector probe failed', {
        selector,
        error: error instanceof Error ? error.message : 'Unknown error'
      });
      return null;
    });

    try {
      return await Promise.race([attempt, expiry]);
    } finally {
      clearTimeout(timer);
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
