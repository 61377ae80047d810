import type { Logger } from 'winston';
import type { BrowserSession } from '../core/browser-session.js';
import { FlowVariant } from '../types/index.js';
import { PortalProfile, credentialSelectors } from '../utils/portal-profile.js';

export interface PageSnapshot {
  url: string;
  credentialFieldsVisible: boolean;
  challengeWidgetVisible: boolean;
  bodyText: string;
}

export type Classification =
  | { outcome: 'Success' }
  | { outcome: 'ChallengeBlocked'; reason: string }
  | { outcome: 'Failed'; message: string };

export interface ChallengeDetectorConfig {
  challengeTextPatterns: string[];
  errorTextPatterns: string[];
  probeTimeoutMs: number;
}

export const NO_STATE_CHANGE_MESSAGE = 'Login submitted but the page did not change';

/**
 * Decides what a credential submission led to. Challenge markers are checked
 * before generic error text because challenge pages usually match both.
 */
export class ChallengeDetector {
  private readonly logger: Logger;
  private readonly challengeText: RegExp[];
  private readonly errorText: RegExp[];
  private readonly probeTimeoutMs: number;

  constructor(logger: Logger, config: ChallengeDetectorConfig) {
    this.logger = logger;
    this.challengeText = config.challengeTextPatterns.map(pattern => new RegExp(pattern, 'i'));
    this.errorText = config.errorTextPatterns.map(pattern => new RegExp(pattern, 'i'));
    this.probeTimeoutMs = config.probeTimeoutMs;
  }

  static fromProfile(logger: Logger, profile: PortalProfile, probeTimeoutMs = 250): ChallengeDetector {
    return new ChallengeDetector(logger, {
      challengeTextPatterns: profile.challenge.textPatterns,
      errorTextPatterns: profile.errorTextPatterns,
      probeTimeoutMs,
    });
  }

  classify(snapshot: PageSnapshot, preSubmitUrl: string): Classification {
    const urlChanged = snapshot.url !== preSubmitUrl;

    if (urlChanged && !snapshot.credentialFieldsVisible) {
      return { outcome: 'Success' };
    }

    if (snapshot.challengeWidgetVisible) {
      return { outcome: 'ChallengeBlocked', reason: 'challenge widget present' };
    }

    const challengeMatch = firstMatch(snapshot.bodyText, this.challengeText);
    if (challengeMatch) {
      return { outcome: 'ChallengeBlocked', reason: `challenge text "${challengeMatch}"` };
    }

    const errorMatch = firstMatch(snapshot.bodyText, this.errorText);
    if (errorMatch) {
      return { outcome: 'Failed', message: capturedLine(snapshot.bodyText, errorMatch) };
    }

    // A refused submission with no visible explanation is how the invisible challenge shows up
    if (!urlChanged && snapshot.credentialFieldsVisible) {
      return { outcome: 'ChallengeBlocked', reason: 'submission left the login form in place' };
    }

    return { outcome: 'Failed', message: NO_STATE_CHANGE_MESSAGE };
  }

  /**
   * Reads the current page into a snapshot for `classify`.
   */
  async capture(
    session: BrowserSession,
    profile: PortalProfile,
    variant: FlowVariant
  ): Promise<PageSnapshot> {
    const credentialFieldsVisible = await this.anyVisible(session, credentialSelectors(profile, variant));
    const challengeWidgetVisible = await this.anyVisible(session, profile.challenge.widgetSelectors);
    const bodyText = await session.bodyText(this.probeTimeoutMs);

    const snapshot: PageSnapshot = {
      url: session.currentUrl(),
      credentialFieldsVisible,
      challengeWidgetVisible,
      bodyText,
    };
    this.logger.debug('Captured page snapshot', {
      url: snapshot.url,
      credentialFieldsVisible,
      challengeWidgetVisible,
    });
    return snapshot;
  }

  private async anyVisible(session: BrowserSession, selectors: string[]): Promise<boolean> {
    for (const selector of selectors) {
      if (await session.probeVisible(selector, this.probeTimeoutMs)) {
        return true;
      }
    }
    return false;
  }
}

function firstMatch(text: string, patterns: RegExp[]): string | undefined {
  for (const pattern of patterns) {
    const match = pattern.exec(text);
    if (match) return match[0];
  }
  return undefined;
}

function capturedLine(text: string, match: string): string {
  const line = text.split(/\r?\n/).find(candidate => candidate.includes(match));
  return (line ?? match).trim();
}
