import { SelectorResolver } from '../src/processors/selector-resolver';
import { FieldSpec } from '../src/types';
import { createLogger } from '../src/utils/logger';
import { FakeBrowserSession, FakePage } from './helpers/fake-browser-session';

const LOGIN_URL = 'https://portal.test/login';

const usernameSpec: FieldSpec = {
  field: 'username',
  candidates: [
    { selector: '#a', timeoutMs: 100 },
    { selector: '#b', timeoutMs: 100 },
    { selector: '#c', timeoutMs: 100 },
  ],
};

async function openPage(page: FakePage): Promise<FakeBrowserSession> {
  const session = new FakeBrowserSession();
  session.routes.set(LOGIN_URL, page);
  await session.goto(LOGIN_URL);
  return session;
}

describe('SelectorResolver', () => {
  const logger = createLogger();
  let resolver: SelectorResolver;

  beforeEach(() => {
    resolver = new SelectorResolver(logger, { pollIntervalMs: 10 });
  });

  test('returns the first visible candidate in declared order', async () => {
    const session = await openPage({ url: LOGIN_URL, visible: ['#c', '#b'] });

    const resolution = await resolver.resolve(session, usernameSpec, 1000);

    expect(resolution.found).toBe(true);
    if (resolution.found) {
      expect(resolution.selector).toBe('#b');
      expect(resolution.handle.selector).toBe('#b');
    }
    expect(session.probed).toEqual(['#a', '#b']);
  });

  test('reports FieldNotFound with every candidate once the budget runs out', async () => {
    const session = await openPage({ url: LOGIN_URL, visible: [] });
    const spec: FieldSpec = {
      field: 'password',
      candidates: [
        { selector: '#pw', timeoutMs: 100 },
        { selector: 'input[type="password"]', timeoutMs: 100 },
      ],
    };

    const startedAt = Date.now();
    const resolution = await resolver.resolve(session, spec, 50);

    expect(Date.now() - startedAt).toBeLessThan(1000);
    expect(resolution.found).toBe(false);
    if (!resolution.found) {
      expect(resolution.error.kind).toBe('FieldNotFound');
      expect(resolution.error.message).toBe(
        'Field "password" not visible within 50ms; tried: #pw | input[type="password"]'
      );
    }
  });

  test('keeps polling until a candidate appears', async () => {
    const page: FakePage = { url: LOGIN_URL, visible: [] };
    const session = await openPage(page);
    setTimeout(() => {
      page.visible = ['#c'];
    }, 30);

    const resolution = await resolver.resolve(session, usernameSpec, 1000);

    expect(resolution.found).toBe(true);
    if (resolution.found) {
      expect(resolution.selector).toBe('#c');
    }
  });

  test('treats a probe that throws as not visible', async () => {
    class FlakySession extends FakeBrowserSession {
      override async probeVisible(selector: string) {
        if (selector === '#a') {
          throw new Error('Execution context was destroyed');
        }
        return super.probeVisible(selector);
      }
    }
    const session = new FlakySession();
    session.routes.set(LOGIN_URL, { url: LOGIN_URL, visible: ['#a', '#b'] });
    await session.goto(LOGIN_URL);

    const resolution = await resolver.resolve(session, usernameSpec, 1000);

    expect(resolution.found).toBe(true);
    if (resolution.found) {
      expect(resolution.selector).toBe('#b');
    }
  });

  test('a probe that never settles still ends within the field budget', async () => {
    const session = await openPage({ url: LOGIN_URL, visible: ['#a'] });
    session.hangOn.add('probe');

    const startedAt = Date.now();
    const resolution = await resolver.resolve(session, usernameSpec, 60);

    expect(Date.now() - startedAt).toBeLessThan(1000);
    expect(resolution.found).toBe(false);
  });
});
