import { ErrorKind, FieldName, FlowError, FlowVariant } from '../types/index.js';

export type AutomationErrorKind =
  | ErrorKind
  | 'NavigationTimeout'
  | 'Persistence'
  | 'NotFound';

/**
 * Base class for every failure the login automation reports. The `kind`
 * is what callers switch on; the message is for humans.
 */
export class AutomationError extends Error {
  readonly kind: AutomationErrorKind;

  constructor(kind: AutomationErrorKind, message: string) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
  }
}

export class UnknownVariantError extends AutomationError {
  constructor(readonly url: string) {
    super('UnknownVariant', `Unrecognized login page: ${url}`);
  }
}

export class FieldNotFoundError extends AutomationError {
  constructor(readonly field: FieldName, readonly candidates: string[], timeoutMs: number) {
    super(
      'FieldNotFound',
      `Field "${field}" not visible within ${timeoutMs}ms; tried: ${candidates.join(' | ')}`
    );
  }
}

export class ChallengeBlockedError extends AutomationError {
  constructor(detail: string) {
    super(
      'ChallengeBlocked',
      `Login blocked by a bot-detection challenge (${detail}). Submit cookies manually via POST /cookies.`
    );
  }
}

export class IncompleteCookieSetError extends AutomationError {
  constructor(readonly missing: string[]) {
    super('IncompleteCookieSet', `Missing required cookie(s): ${missing.join(', ')}`);
  }
}

export class NavigationTimeoutError extends AutomationError {
  constructor(readonly step: string, timeoutMs: number) {
    super('NavigationTimeout', `${step} timed out after ${timeoutMs}ms`);
  }
}

export class PersistenceError extends AutomationError {
  constructor(message: string) {
    super('Persistence', message);
  }
}

export class BusyError extends AutomationError {
  constructor() {
    super('Busy', 'A login flow is already running; try again once it finishes');
  }
}

export class CookieRecordNotFoundError extends AutomationError {
  constructor(filePath: string) {
    super('NotFound', `No cookie record saved yet (${filePath})`);
  }
}

export class VariantFailedError extends AutomationError {
  constructor(readonly variant: FlowVariant | undefined, message: string) {
    super('Failed', message);
  }
}

/**
 * Maps any thrown value onto the structured error shape returned to callers.
 * Navigation timeouts are reported as plain failures.
 */
export function toFlowError(error: unknown): FlowError {
  if (error instanceof AutomationError) {
    switch (error.kind) {
      case 'FieldNotFound':
      case 'ChallengeBlocked':
      case 'IncompleteCookieSet':
      case 'UnknownVariant':
      case 'Busy':
      case 'Failed':
        return { kind: error.kind, message: error.message };
      default:
        return { kind: 'Failed', message: error.message };
    }
  }
  return { kind: 'Failed', message: error instanceof Error ? error.message : 'Unknown error' };
}
