import { errorMessage } from '../errors/custom-errors.js';
import type { Notifier } from '../notifications/notifier.js';
import { LogLevel } from '../utils/logger.js';
import type { SignInResult } from './types.js';

/**
 * The part of a browser page the sign-in flow drives
 */
export type SignInPage = {
  url(): string;
  goto(url: string, options: { waitUntil: 'networkidle'; timeout: number }): Promise<unknown>;
  waitForSelector(selector: string, options: { timeout: number }): Promise<unknown>;
  fill(selector: string, value: string): Promise<void>;
  press(selector: string, key: string): Promise<void>;
  waitForLoadState(state: 'networkidle', options: { timeout: number }): Promise<void>;
  waitForTimeout(timeout: number): Promise<void>;
  $(selector: string): Promise<{ innerText(): Promise<string> } | null>;
  screenshot(options: { path: string }): Promise<unknown>;
};

export type SignInOptions = {
  loginUrl: string;
  email: string;
  password: string;
  navigationTimeoutMs: number;
  /** Where a screenshot of a failed sign-in is written */
  screenshotPath: string;
  notifier: Notifier;
};

const EMAIL_SELECTOR = '#user_login, input[name="user[login]"], input[type="email"], input[name="email"]';
const PASSWORD_SELECTOR = '#login__user_password, input[name="user[password]"], input[type="password"]';

const SIGNED_IN_MARKERS = [
  'a:has-text("Dashboard")',
  'a:has-text("My learning")',
  '[class*="Dashboard"]',
  'nav a[href*="learn"]',
];

const ERROR_SELECTORS = ['.error', '.alert-danger', '[role="alert"]', '.notification--error'];

function normalizedPath(url: string): string {
  return new URL(url).pathname.replace(/\/+$/, '');
}

/**
 * True while `currentUrl` is still the sign-in page
 */
export function isOnLoginPage(currentUrl: string, loginUrl: string): boolean {
  try {
    return normalizedPath(currentUrl) === normalizedPath(loginUrl);
  } catch {
    return currentUrl.toLowerCase().includes('login');
  }
}

async function collectPageErrors(page: SignInPage): Promise<string[]> {
  const messages: string[] = [];
  for (const selector of ERROR_SELECTORS) {
    const element = await page.$(selector);
    const text = element ? (await element.innerText()).trim() : '';
    if (text) messages.push(text);
  }
  return messages;
}

/**
 * Sign in with email and password.
 *
 * Success is decided in this order: the login page redirects away before the
 * form is touched, a signed-in marker shows up after submitting, or the browser
 * ends up on another page after submitting.
 */
export async function signIn(page: SignInPage, options: SignInOptions): Promise<SignInResult> {
  const { notifier } = options;

  try {
    notifier.notify(LogLevel.INFO, `Navigating to ${options.loginUrl}`);
    await page.goto(options.loginUrl, { waitUntil: 'networkidle', timeout: options.navigationTimeoutMs });
    // Redirects of an existing session land a moment after networkidle
    await page.waitForTimeout(2000);

    if (!isOnLoginPage(page.url(), options.loginUrl)) {
      return { status: 'signed-in', via: 'existing-session' };
    }

    await page.waitForSelector(EMAIL_SELECTOR, { timeout: 15_000 });
    await page.fill(EMAIL_SELECTOR, options.email);
    await page.waitForSelector(PASSWORD_SELECTOR, { timeout: 10_000 });
    await page.fill(PASSWORD_SELECTOR, options.password);
    await page.press(PASSWORD_SELECTOR, 'Enter');

    notifier.notify(LogLevel.INFO, 'Waiting for sign-in to complete...');
    await page.waitForLoadState('networkidle', { timeout: 30_000 }).catch((error: unknown) => {
      notifier.notify(LogLevel.DEBUG, `Page did not settle after sign-in: ${errorMessage(error)}`);
    });
    await page.waitForTimeout(3000);
    notifier.notify(LogLevel.DEBUG, `Current URL after sign-in: ${page.url()}`);
  } catch (error) {
    return { status: 'failed', reason: errorMessage(error), pageErrors: [] };
  }

  for (const selector of SIGNED_IN_MARKERS) {
    if (await page.$(selector)) {
      return { status: 'signed-in', via: 'marker' };
    }
  }

  if (!isOnLoginPage(page.url(), options.loginUrl)) {
    return { status: 'signed-in', via: 'redirect' };
  }

  const pageErrors = await collectPageErrors(page);
  await page.screenshot({ path: options.screenshotPath });
  notifier.notify(LogLevel.DEBUG, `Debug screenshot saved to: ${options.screenshotPath}`);

  return { status: 'failed', reason: 'Could not confirm sign-in', pageErrors };
}
