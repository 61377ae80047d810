import type { Logger } from 'winston';
import { createPlaywrightSessionFactory } from './browser-session.js';
import { CookieStore } from './cookie-store.js';
import { LoginCoordinator } from './login-coordinator.js';
import { LoginFlowStateMachine } from './login-flow.js';
import { ChallengeDetector } from '../processors/challenge-detector.js';
import { CookieHarvester } from '../processors/cookie-harvester.js';
import { SelectorResolver } from '../processors/selector-resolver.js';
import { AppConfig } from '../types/index.js';
import { PortalProfile, loadPortalProfile } from '../utils/portal-profile.js';

export interface LoginServices {
  profile: PortalProfile;
  store: CookieStore;
  coordinator: LoginCoordinator;
}

/**
 * Wires the login components from configuration.
 */
export function createLoginServices(config: AppConfig, logger: Logger): LoginServices {
  const profile = loadPortalProfile(config.portal_profile_path);
  const store = new CookieStore(config.cookie_file, logger);

  const flow = new LoginFlowStateMachine(
    logger,
    {
      sessionFactory: createPlaywrightSessionFactory(
        { headless: config.browser.headless, channel: config.browser.channel },
        logger
      ),
      profile,
      resolver: new SelectorResolver(logger),
      detector: ChallengeDetector.fromProfile(logger, profile),
      harvester: new CookieHarvester(logger, profile.requiredCookies),
    },
    {
      navigationTimeoutMs: config.timeouts.navigation_ms,
      fieldTimeoutMs: config.timeouts.field_ms,
      settleTimeoutMs: config.timeouts.settle_ms,
    }
  );

  const coordinator = new LoginCoordinator(
    flow,
    store,
    { busyPolicy: config.busy_policy, requiredCookies: profile.requiredCookies },
    logger
  );

  logger.info('Login services ready', {
    profile: profile.name,
    cookieFile: config.cookie_file,
    headless: config.browser.headless,
  });
  return { profile, store, coordinator };
}
