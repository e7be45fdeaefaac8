import { describe, expect, it, vi } from 'vitest';
import { createSilentNotifier } from '../test-helpers.js';
import { isOnLoginPage, type SignInOptions, type SignInPage, signIn } from './sign-in.js';

const LOGIN_URL = 'https://learn.example.test/login';

type FakePageState = {
  /** URL before and after the form is submitted */
  urls: { initial: string; afterSubmit: string };
  /** Selectors that resolve to an element, with its text */
  elements?: Record<string, string>;
  gotoError?: Error;
};

function fakePage(state: FakePageState) {
  let current = state.urls.initial;
  const elements = state.elements ?? {};
  const page = {
    url: () => current,
    goto: vi.fn(async () => {
      if (state.gotoError) throw state.gotoError;
      return null;
    }),
    waitForSelector: vi.fn(async () => null),
    fill: vi.fn(async () => {}),
    press: vi.fn(async () => {
      current = state.urls.afterSubmit;
    }),
    waitForLoadState: vi.fn(async () => {}),
    waitForTimeout: vi.fn(async () => {}),
    $: vi.fn(async (selector: string) => {
      const text = elements[selector];
      return text === undefined ? null : { innerText: async () => text };
    }),
    screenshot: vi.fn(async () => null),
  } satisfies SignInPage;
  return page;
}

const options = (): SignInOptions => ({
  loginUrl: LOGIN_URL,
  email: 'student@example.test',
  password: 'test-secret',
  navigationTimeoutMs: 60_000,
  screenshotPath: '/tmp/state/login-debug.png',
  notifier: createSilentNotifier(),
});

describe('isOnLoginPage', () => {
  it('should compare paths only', () => {
    expect(isOnLoginPage('https://learn.example.test/login/?redirect=%2Fhome', LOGIN_URL)).toBe(true);
    expect(isOnLoginPage('https://learn.example.test/learn', LOGIN_URL)).toBe(false);
  });
});

describe('signIn', () => {
  it('should accept an existing session without touching the form', async () => {
    const page = fakePage({ urls: { initial: 'https://learn.example.test/learn', afterSubmit: '' } });

    await expect(signIn(page, options())).resolves.toEqual({ status: 'signed-in', via: 'existing-session' });
    expect(page.fill).not.toHaveBeenCalled();
  });

  it('should fill the form and detect a signed-in marker', async () => {
    const page = fakePage({
      urls: { initial: LOGIN_URL, afterSubmit: LOGIN_URL },
      elements: { 'a:has-text("My learning")': 'My learning' },
    });

    await expect(signIn(page, options())).resolves.toEqual({ status: 'signed-in', via: 'marker' });
    expect(page.fill).toHaveBeenNthCalledWith(
      1,
      '#user_login, input[name="user[login]"], input[type="email"], input[name="email"]',
      'student@example.test',
    );
    expect(page.fill).toHaveBeenNthCalledWith(
      2,
      '#login__user_password, input[name="user[password]"], input[type="password"]',
      'test-secret',
    );
  });

  it('should accept a redirect away from the login page', async () => {
    const page = fakePage({ urls: { initial: LOGIN_URL, afterSubmit: 'https://learn.example.test/home' } });

    await expect(signIn(page, options())).resolves.toEqual({ status: 'signed-in', via: 'redirect' });
  });

  it('should collect error texts and take a screenshot when sign-in is not confirmed', async () => {
    const page = fakePage({
      urls: { initial: LOGIN_URL, afterSubmit: LOGIN_URL },
      elements: { '[role="alert"]': ' Invalid email or password \n', '.error': '   ' },
    });

    const result = await signIn(page, options());

    expect(result).toEqual({
      status: 'failed',
      reason: 'Could not confirm sign-in',
      pageErrors: ['Invalid email or password'],
    });
    expect(page.screenshot).toHaveBeenCalledWith({ path: '/tmp/state/login-debug.png' });
  });

  it('should turn navigation errors into a failed result', async () => {
    const page = fakePage({
      urls: { initial: LOGIN_URL, afterSubmit: LOGIN_URL },
      gotoError: new Error('net::ERR_NAME_NOT_RESOLVED'),
    });

    await expect(signIn(page, options())).resolves.toEqual({
      status: 'failed',
      reason: 'net::ERR_NAME_NOT_RESOLVED',
      pageErrors: [],
    });
  });
});
