import { AuthSessionSummary, CookieSet, FlowResult } from '../../src/types';

export const COOKIE_DOMAIN = '.mysmartenergy.nj.pseg.com';

export const COMPLETE_SET: CookieSet = {
  MM_SID: { value: 'abc', domain: COOKIE_DOMAIN },
  __RequestVerificationToken: { value: 'xyz', domain: COOKIE_DOMAIN },
};

export function summary(overrides: Partial<AuthSessionSummary> = {}): AuthSessionSummary {
  return {
    sessionId: 'session-1',
    variant: 'DirectLogin',
    finalState: 'Success',
    startedAt: '2024-05-01T12:00:00.000Z',
    endedAt: '2024-05-01T12:00:05.000Z',
    attemptedVariants: ['DirectLogin'],
    stateHistory: ['Start', 'NavigatingToLogin', 'VariantDetected', 'SubmittingCredentials', 'AwaitingOutcome', 'Success'],
    ...overrides,
  };
}

export function succeeded(cookieSet: CookieSet = COMPLETE_SET): FlowResult {
  return { ok: true, cookieSet, session: summary() };
}

export function challenged(): FlowResult {
  return {
    ok: false,
    error: {
      kind: 'ChallengeBlocked',
      message: 'Login blocked by a bot-detection challenge (challenge widget present). Submit cookies manually via POST /cookies.',
    },
    session: summary({
      finalState: 'ChallengeBlocked',
      stateHistory: ['Start', 'NavigatingToLogin', 'VariantDetected', 'SubmittingCredentials', 'AwaitingOutcome', 'ChallengeBlocked'],
    }),
  };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>(res => {
    resolve = res;
  });
  return { promise, resolve };
}
