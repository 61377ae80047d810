export interface Credentials {
  username: string;
  password: string;
}

export const FLOW_VARIANTS = ['DirectLogin', 'SsoRedirect', 'IdentityProviderRedirect'] as const;

export type FlowVariant = typeof FLOW_VARIANTS[number];

export type FieldName = 'username' | 'password' | 'submit';

export interface SelectorCandidate {
  selector: string;
  timeoutMs: number;
}

export interface FieldSpec {
  field: FieldName;
  candidates: SelectorCandidate[];
}

export type FlowState =
  | 'Start'
  | 'NavigatingToLogin'
  | 'VariantDetected'
  | 'SubmittingCredentials'
  | 'AwaitingOutcome'
  | 'Success'
  | 'ChallengeBlocked'
  | 'FieldNotFound'
  | 'Failed';

export interface AuthSession {
  sessionId: string;
  variant?: FlowVariant | undefined;
  currentState: FlowState;
  startedAt: string;
  attemptedVariants: Set<FlowVariant>;
  lastError?: FlowError | undefined;
  stateHistory: FlowState[];
}

export interface AuthSessionSummary {
  sessionId: string;
  variant?: FlowVariant | undefined;
  finalState: FlowState;
  startedAt: string;
  endedAt: string;
  attemptedVariants: FlowVariant[];
  stateHistory: FlowState[];
}

export interface CookieValue {
  value: string;
  domain: string;
  expiresAt?: string | undefined;
}

export type CookieSet = Record<string, CookieValue>;

export type CookieSource = 'Automated' | 'Manual';

export interface CookieRecord {
  cookieSet: CookieSet;
  source: CookieSource;
  savedAt: string;
}

export type ErrorKind =
  | 'FieldNotFound'
  | 'ChallengeBlocked'
  | 'IncompleteCookieSet'
  | 'UnknownVariant'
  | 'Failed'
  | 'Busy';

export interface FlowError {
  kind: ErrorKind;
  message: string;
}

export type FlowResult =
  | { ok: true; cookieSet: CookieSet; session: AuthSessionSummary }
  | { ok: false; error: FlowError; session: AuthSessionSummary };

export interface PersistenceFailure {
  kind: 'Persistence';
  message: string;
}

export type LoginOutcome =
  | {
      success: true;
      cookieSet: CookieSet;
      persisted: boolean;
      persistenceError?: PersistenceFailure | undefined;
      session: AuthSessionSummary;
    }
  | {
      success: false;
      error: FlowError;
      session?: AuthSessionSummary | undefined;
    };

export type BusyPolicy = 'reject' | 'queue';

export interface BrowserConfig {
  headless: boolean;
  channel?: string | undefined;
}

export interface TimeoutConfig {
  navigation_ms: number;
  field_ms: number;
  settle_ms: number;
}

export interface AppConfig {
  port: number;
  host: string;
  log_level: 'error' | 'warn' | 'info' | 'debug';
  data_dir: string;
  cookie_file: string;
  portal_profile_path: string;
  busy_policy: BusyPolicy;
  browser: BrowserConfig;
  timeouts: TimeoutConfig;
}
