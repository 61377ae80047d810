import crypto from 'crypto';
import type { Logger } from 'winston';
import type { BrowserSession, BrowserSessionFactory, ElementRef } from './browser-session.js';
import { ChallengeDetector } from '../processors/challenge-detector.js';
import { CookieHarvester } from '../processors/cookie-harvester.js';
import { SelectorResolver } from '../processors/selector-resolver.js';
import {
  AuthSession,
  AuthSessionSummary,
  CookieSet,
  Credentials,
  FlowResult,
  FlowState,
  FlowVariant,
} from '../types/index.js';
import {
  AutomationError,
  ChallengeBlockedError,
  NavigationTimeoutError,
  UnknownVariantError,
  VariantFailedError,
  toFlowError,
} from '../utils/errors.js';
import { PortalProfile, detectVariant, fieldSpecsFor } from '../utils/portal-profile.js';

export interface LoginFlowConfig {
  navigationTimeoutMs: number;
  fieldTimeoutMs: number;
  settleTimeoutMs: number;
}

export interface LoginFlowDependencies {
  sessionFactory: BrowserSessionFactory;
  profile: PortalProfile;
  resolver: SelectorResolver;
  detector: ChallengeDetector;
  harvester: CookieHarvester;
}

const TRANSITIONS: Record<FlowState, FlowState[]> = {
  Start: ['NavigatingToLogin', 'Failed'],
  NavigatingToLogin: ['VariantDetected', 'Failed'],
  VariantDetected: ['SubmittingCredentials', 'FieldNotFound', 'Failed'],
  SubmittingCredentials: ['AwaitingOutcome', 'Failed'],
  AwaitingOutcome: ['Success', 'ChallengeBlocked', 'Failed'],
  // Harvesting happens after Success and can still fail
  Success: ['Failed'],
  ChallengeBlocked: [],
  FieldNotFound: [],
  Failed: [],
};

const RETRYABLE_KINDS = new Set(['FieldNotFound', 'Failed']);

type AttemptResult =
  | { ok: true; cookieSet: CookieSet }
  | { ok: false; error: AutomationError; retryable: boolean };

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

/**
 * Drives one login against the portal: navigate, detect the login variant,
 * resolve and fill the form, classify the outcome, then harvest cookies.
 * A failed variant is retried once with each remaining variant.
 */
export class LoginFlowStateMachine {
  private readonly logger: Logger;
  private readonly config: LoginFlowConfig;
  private readonly deps: LoginFlowDependencies;

  constructor(logger: Logger, deps: LoginFlowDependencies, config: LoginFlowConfig) {
    this.logger = logger;
    this.deps = deps;
    this.config = config;
  }

  async run(credentials: Credentials): Promise<FlowResult> {
    const auth: AuthSession = {
      sessionId: crypto.randomUUID(),
      currentState: 'Start',
      startedAt: new Date().toISOString(),
      attemptedVariants: new Set<FlowVariant>(),
      stateHistory: ['Start'],
    };
    this.logger.info('Login flow started', { sessionId: auth.sessionId });

    let browser: BrowserSession | undefined;
    try {
      browser = await this.openSession();

      let entryUrl = this.deps.profile.loginUrl;
      let forcedVariant: FlowVariant | undefined;

      while (true) {
        const attempt = await this.attempt(auth, browser, credentials, entryUrl, forcedVariant);
        if (attempt.ok) {
          return { ok: true, cookieSet: attempt.cookieSet, session: this.summarize(auth) };
        }

        auth.lastError = toFlowError(attempt.error);
        const next = attempt.retryable ? this.nextVariant(auth) : undefined;
        if (!next) {
          this.logger.warn('Login flow ended without cookies', {
            sessionId: auth.sessionId,
            state: auth.currentState,
            kind: auth.lastError.kind,
            message: auth.lastError.message,
          });
          return { ok: false, error: auth.lastError, session: this.summarize(auth) };
        }

        this.logger.info('Retrying with next login variant', {
          sessionId: auth.sessionId,
          failedVariant: auth.variant,
          nextVariant: next,
        });
        this.restart(auth);
        entryUrl = this.deps.profile.variants[next].entryUrl;
        forcedVariant = next;
      }
    } catch (error) {
      // Only session acquisition can land here; attempts report their own failures
      if (auth.currentState === 'Start') {
        this.transition(auth, 'Failed');
      }
      auth.lastError = toFlowError(error);
      this.logger.error('Login flow aborted', { sessionId: auth.sessionId, error: errorMessage(error) });
      return { ok: false, error: auth.lastError, session: this.summarize(auth) };
    } finally {
      if (browser) {
        await this.release(browser, auth.sessionId);
      }
    }
  }

  private async attempt(
    auth: AuthSession,
    browser: BrowserSession,
    credentials: Credentials,
    entryUrl: string,
    forcedVariant: FlowVariant | undefined
  ): Promise<AttemptResult> {
    const { profile, resolver, detector } = this.deps;
    const { navigationTimeoutMs, fieldTimeoutMs, settleTimeoutMs } = this.config;

    // Retries are charged to their variant before navigating
    if (forcedVariant) {
      auth.variant = forcedVariant;
      auth.attemptedVariants.add(forcedVariant);
    }

    try {
      if (auth.currentState === 'Start') {
        this.transition(auth, 'NavigatingToLogin');
      }
      await this.guard('Navigation to login page', navigationTimeoutMs, () =>
        browser.goto(entryUrl, navigationTimeoutMs)
      );

      const landedUrl = browser.currentUrl();
      const detected = detectVariant(landedUrl, profile);
      const variant = forcedVariant ?? detected;
      if (!variant) {
        throw new UnknownVariantError(landedUrl);
      }
      if (forcedVariant && detected !== forcedVariant) {
        this.logger.debug('Page classification differs from retry variant', {
          sessionId: auth.sessionId,
          detected,
          variant,
        });
      }
      auth.variant = variant;
      auth.attemptedVariants.add(variant);
      this.transition(auth, 'VariantDetected');
      this.logger.info('Login variant selected', { sessionId: auth.sessionId, variant, url: landedUrl });

      const handles: ElementRef[] = [];
      for (const spec of fieldSpecsFor(profile, variant)) {
        const resolution = await resolver.resolve(browser, spec, fieldTimeoutMs);
        if (!resolution.found) {
          this.transition(auth, 'FieldNotFound');
          return { ok: false, error: resolution.error, retryable: true };
        }
        handles.push(resolution.handle);
      }
      const [usernameField, passwordField, submitButton] = handles;
      if (!usernameField || !passwordField || !submitButton) {
        throw new VariantFailedError(variant, 'Login form is incomplete');
      }

      this.transition(auth, 'SubmittingCredentials');
      const preSubmitUrl = browser.currentUrl();
      await this.guard('Filling username', fieldTimeoutMs * 2, () => usernameField.fill(credentials.username, fieldTimeoutMs));
      await this.guard('Filling password', fieldTimeoutMs * 2, () => passwordField.fill(credentials.password, fieldTimeoutMs));
      await this.guard('Submitting login form', fieldTimeoutMs, () => submitButton.click(fieldTimeoutMs));

      this.transition(auth, 'AwaitingOutcome');
      // The session may spend the budget twice: once on the URL change, once on the DOM load
      await this.guard('Waiting for login outcome', settleTimeoutMs * 2, () =>
        browser.waitForSettle(preSubmitUrl, profile.challenge.widgetSelectors, settleTimeoutMs)
      );
      const snapshot = await this.guard('Reading page state', navigationTimeoutMs, () =>
        detector.capture(browser, profile, variant)
      );
      const classification = detector.classify(snapshot, preSubmitUrl);

      if (classification.outcome === 'ChallengeBlocked') {
        this.transition(auth, 'ChallengeBlocked');
        return { ok: false, error: new ChallengeBlockedError(classification.reason), retryable: false };
      }
      if (classification.outcome === 'Failed') {
        this.transition(auth, 'Failed');
        return { ok: false, error: new VariantFailedError(variant, classification.message), retryable: true };
      }

      this.transition(auth, 'Success');
      return { ok: true, cookieSet: await this.collectCookies(auth, browser) };
    } catch (error) {
      const failure = error instanceof AutomationError
        ? error
        : new VariantFailedError(auth.variant, `Browser step failed: ${errorMessage(error)}`);
      const reachedSuccess = auth.currentState === 'Success';
      const retryable = !reachedSuccess && RETRYABLE_KINDS.has(failure.kind);
      // A first attempt that fails before detection is charged to the variant its entry page belongs to
      if (retryable && auth.attemptedVariants.size === 0) {
        const charged = this.variantForEntry(entryUrl);
        if (charged) {
          auth.attemptedVariants.add(charged);
        }
      }
      if (TRANSITIONS[auth.currentState].includes('Failed')) {
        this.transition(auth, 'Failed');
      }
      return {
        ok: false,
        error: failure,
        retryable,
      };
    }
  }

  private async collectCookies(auth: AuthSession, browser: BrowserSession): Promise<CookieSet> {
    const { profile, harvester } = this.deps;
    const { navigationTimeoutMs } = this.config;

    const postLoginUrl = profile.postLoginUrl;
    if (postLoginUrl) {
      this.logger.debug('Following post-login redirect', { sessionId: auth.sessionId, url: postLoginUrl });
      await this.guard('Navigation to usage site', navigationTimeoutMs, () =>
        browser.goto(postLoginUrl, navigationTimeoutMs)
      );
    }

    const cookieSet = await this.guard('Reading cookies', navigationTimeoutMs, () =>
      harvester.harvest(browser, profile.cookieDomains)
    );
    this.logger.info('Login flow succeeded', {
      sessionId: auth.sessionId,
      variant: auth.variant,
      attemptedVariants: [...auth.attemptedVariants],
    });
    return cookieSet;
  }

  private async openSession(): Promise<BrowserSession> {
    const pending = this.deps.sessionFactory();
    try {
      return await this.guard('Opening browser session', this.config.navigationTimeoutMs, () => pending);
    } catch (error) {
      // A session that arrives after the deadline still has to be released
      void pending
        .then(late => late.close())
        .catch((closeError: unknown) => {
          this.logger.warn('Late browser session could not be released', { error: errorMessage(closeError) });
        });
      throw error;
    }
  }

  private async release(browser: BrowserSession, sessionId: string): Promise<void> {
    try {
      await this.guard('Closing browser session', this.config.navigationTimeoutMs, () => browser.close());
    } catch (error) {
      this.logger.warn('Browser session release failed', { sessionId, error: errorMessage(error) });
    }
  }

  private variantForEntry(entryUrl: string): FlowVariant | undefined {
    const { variants, variantOrder } = this.deps.profile;
    return variantOrder.find(variant => variants[variant].entryUrl === entryUrl);
  }

  private nextVariant(auth: AuthSession): FlowVariant | undefined {
    return this.deps.profile.variantOrder.find(variant => !auth.attemptedVariants.has(variant));
  }

  private transition(auth: AuthSession, to: FlowState): void {
    const from = auth.currentState;
    if (!TRANSITIONS[from].includes(to)) {
      throw new Error(`Illegal login flow transition ${from} -> ${to}`);
    }
    auth.currentState = to;
    auth.stateHistory.push(to);
    this.logger.debug('State transition', { sessionId: auth.sessionId, from, to });
  }

  /**
   * The one sanctioned backwards move: a failed variant goes back to navigation.
   */
  private restart(auth: AuthSession): void {
    if (auth.currentState !== 'FieldNotFound' && auth.currentState !== 'Failed') {
      throw new Error(`Cannot retry a variant from state ${auth.currentState}`);
    }
    auth.currentState = 'NavigatingToLogin';
    auth.stateHistory.push('NavigatingToLogin');
  }

  private async guard<T>(step: string, timeoutMs: number, action: () => Promise<T>): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const expiry = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new NavigationTimeoutError(step, timeoutMs)), timeoutMs);
    });

    try {
      return await Promise.race([action(), expiry]);
    } finally {
      clearTimeout(timer);
    }
  }

  private summarize(auth: AuthSession): AuthSessionSummary {
    return {
      sessionId: auth.sessionId,
      variant: auth.variant,
      finalState: auth.currentState,
      startedAt: auth.startedAt,
      endedAt: new Date().toISOString(),
      attemptedVariants: [...auth.attemptedVariants],
      stateHistory: [...auth.stateHistory],
    };
  }
}
