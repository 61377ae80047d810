import fs from 'fs';
import os from 'os';
import path from 'path';
import { credentialSelectors, detectVariant, fieldSpecsFor, loadPortalProfile } from '../src/utils/portal-profile';

describe('portal profile', () => {
  const profile = loadPortalProfile();

  test('bundled profile names the required cookies', () => {
    expect(profile.name).toBe('mysmartenergy');
    expect(profile.requiredCookies).toEqual(['MM_SID', '__RequestVerificationToken']);
    expect(profile.variantOrder).toEqual(['DirectLogin', 'SsoRedirect', 'IdentityProviderRedirect']);
  });

  test.each([
    ['https://myaccount.nj.pseg.com/user/login', 'DirectLogin'],
    ['https://myaccount.nj.pseg.com/user/login?returnUrl=%2Fusage', 'DirectLogin'],
    ['https://myaccount.nj.pseg.com/user/login?sso=1', 'SsoRedirect'],
    ['https://myaccount.nj.pseg.com/saml2/authorize', 'SsoRedirect'],
    ['https://id.myaccount.nj.pseg.com/oauth2/authorize', 'IdentityProviderRedirect'],
  ])('classifies %s as %s', (url, variant) => {
    expect(detectVariant(url, profile)).toBe(variant);
  });

  test('an unknown page has no variant', () => {
    expect(detectVariant('https://maintenance.example.test/', profile)).toBeUndefined();
  });

  test('field specs come back as username, password, submit', () => {
    const specs = fieldSpecsFor(profile, 'SsoRedirect');

    expect(specs.map(spec => spec.field)).toEqual(['username', 'password', 'submit']);
    expect(specs[0]?.candidates[0]).toEqual({ selector: '#signInName', timeoutMs: 2000 });
  });

  test('credential selectors are the password candidates only', () => {
    expect(credentialSelectors(profile, 'SsoRedirect')).toEqual(['#password', 'input[type="password"]']);
    expect(credentialSelectors(profile, 'IdentityProviderRedirect')).toEqual([
      'input[name="password"]',
      'input[type="password"]',
    ]);
  });

  describe('loading', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'portal-profile-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    test('a missing file is reported by path', () => {
      const missing = path.join(dir, 'absent.json');
      expect(() => loadPortalProfile(missing)).toThrow(`Portal profile not found: ${missing}`);
    });

    test('an invalid profile names the offending field', () => {
      const file = path.join(dir, 'profile.json');
      const { manualCookieDomain: _dropped, ...incomplete } = profile;
      fs.writeFileSync(file, JSON.stringify(incomplete));

      expect(() => loadPortalProfile(file)).toThrow(`Invalid portal profile ${file}:\nmanualCookieDomain: Required`);
    });
  });
});
