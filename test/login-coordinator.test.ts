import fs from 'fs';
import os from 'os';
import path from 'path';
import { CookieStore } from '../src/core/cookie-store';
import { LoginCoordinator, LoginFlowRunner } from '../src/core/login-coordinator';
import { BusyPolicy, Credentials, FlowResult } from '../src/types';
import { IncompleteCookieSetError } from '../src/utils/errors';
import { createLogger } from '../src/utils/logger';
import { COMPLETE_SET, COOKIE_DOMAIN, challenged, deferred, succeeded } from './helpers/flow-fixtures';

const REQUIRED = ['MM_SID', '__RequestVerificationToken'];
const credentials: Credentials = { username: 'test-user', password: 'test-secret' };

class ScriptedFlow implements LoginFlowRunner {
  readonly calls: string[] = [];

  constructor(private readonly results: Array<Promise<FlowResult>>) {}

  run(creds: Credentials): Promise<FlowResult> {
    this.calls.push(creds.username);
    const next = this.results.shift();
    if (!next) {
      return Promise.reject(new Error('No scripted result left'));
    }
    return next;
  }
}

describe('LoginCoordinator', () => {
  const logger = createLogger();
  let dir: string;
  let store: CookieStore;

  function coordinator(flow: LoginFlowRunner, busyPolicy: BusyPolicy = 'reject', target: CookieStore = store) {
    return new LoginCoordinator(flow, target, { busyPolicy, requiredCookies: REQUIRED }, logger);
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'login-coordinator-'));
    store = new CookieStore(path.join(dir, 'cookie-record.json'), logger);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('saves harvested cookies as an automated record', async () => {
    const outcome = await coordinator(new ScriptedFlow([Promise.resolve(succeeded())])).login(credentials);

    expect(outcome).toMatchObject({ success: true, cookieSet: COMPLETE_SET, persisted: true });
    const saved = await store.load();
    expect(saved.source).toBe('Automated');
    expect(saved.cookieSet).toEqual(COMPLETE_SET);
  });

  test('a challenge leaves the stored record untouched', async () => {
    const service = coordinator(new ScriptedFlow([Promise.resolve(challenged())]));
    const manual = await service.submitManual(COMPLETE_SET);

    const outcome = await service.login(credentials);

    expect(outcome).toMatchObject({ success: false, error: { kind: 'ChallengeBlocked' } });
    await expect(store.load()).resolves.toEqual(manual);
  });

  test('rejects a second trigger while a flow is running', async () => {
    const first = deferred<FlowResult>();
    const flow = new ScriptedFlow([first.promise, Promise.resolve(succeeded())]);
    const service = coordinator(flow, 'reject');

    const running = service.login(credentials);
    const second = await service.login(credentials);

    expect(second).toEqual({
      success: false,
      error: { kind: 'Busy', message: 'A login flow is already running; try again once it finishes' },
    });
    first.resolve(succeeded());
    await expect(running).resolves.toMatchObject({ success: true });
    expect(flow.calls).toHaveLength(1);
  });

  test('queues triggers in arrival order under the queue policy', async () => {
    const first = deferred<FlowResult>();
    const flow = new ScriptedFlow([first.promise, Promise.resolve(challenged())]);
    const service = coordinator(flow, 'queue');

    const order: string[] = [];
    const a = service.login({ username: 'first', password: 'test-secret' }).then(outcome => {
      order.push('first');
      return outcome;
    });
    const b = service.login({ username: 'second', password: 'test-secret' }).then(outcome => {
      order.push('second');
      return outcome;
    });

    await new Promise(resolve => setTimeout(resolve, 20));
    expect(flow.calls).toEqual(['first']);

    first.resolve(succeeded());
    const [outcomeA, outcomeB] = await Promise.all([a, b]);

    expect(order).toEqual(['first', 'second']);
    expect(flow.calls).toEqual(['first', 'second']);
    expect(outcomeA.success).toBe(true);
    expect(outcomeB).toMatchObject({ success: false, error: { kind: 'ChallengeBlocked' } });
  });

  test('reports a failed save next to the harvested cookies', async () => {
    const blocker = path.join(dir, 'blocker');
    fs.writeFileSync(blocker, 'x');
    const brokenStore = new CookieStore(path.join(blocker, 'cookie-record.json'), logger);
    const service = coordinator(new ScriptedFlow([Promise.resolve(succeeded())]), 'reject', brokenStore);

    const outcome = await service.login(credentials);

    expect(outcome.success).toBe(true);
    if (!outcome.success) return;
    expect(outcome.cookieSet).toEqual(COMPLETE_SET);
    expect(outcome.persisted).toBe(false);
    expect(outcome.persistenceError?.kind).toBe('Persistence');
    expect(outcome.persistenceError?.message).toMatch(/^Failed to save cookie record: /);
  });

  test('a manual submission is returned by the next retrieval', async () => {
    const service = coordinator(new ScriptedFlow([]));

    await service.submitManual({
      MM_SID: { value: 'abc', domain: COOKIE_DOMAIN },
      __RequestVerificationToken: { value: 'xyz', domain: COOKIE_DOMAIN },
    });
    const current = await service.current();

    expect(current.source).toBe('Manual');
    expect(current.cookieSet).toEqual(COMPLETE_SET);
    expect(service.cookieHeader(current.cookieSet)).toBe('MM_SID=abc; __RequestVerificationToken=xyz');
  });

  test('an incomplete manual submission is refused without touching the store', async () => {
    const service = coordinator(new ScriptedFlow([]));

    const submit = service.submitManual({ MM_SID: { value: 'abc', domain: COOKIE_DOMAIN } });

    await expect(submit).rejects.toBeInstanceOf(IncompleteCookieSetError);
    await expect(store.load()).rejects.toMatchObject({ kind: 'NotFound' });
  });

  test('refuses new triggers after shutdown', async () => {
    const flow = new ScriptedFlow([Promise.resolve(succeeded())]);
    const service = coordinator(flow, 'queue');

    await service.shutdown();
    const outcome = await service.login(credentials);

    expect(outcome).toMatchObject({ success: false, error: { kind: 'Busy' } });
    expect(flow.calls).toEqual([]);
  });
});
