import { mkdir } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { type Browser, type BrowserContext, type BrowserType, chromium, type Page } from 'playwright';
import type { MediaSource } from '../downloader/types.js';
import { errorMessage, SessionError } from '../errors/custom-errors.js';
import { recordingPageUrl } from '../media/recording-name.js';
import type { Notifier } from '../notifications/notifier.js';
import { LogLevel } from '../utils/logger.js';
import { writeNetscapeCookies } from '../utils/netscape-cookies.js';
import { readStoredCookies, writeStoredCookies } from './cookie-store.js';
import { findMediaSource } from './media-source.js';
import { signIn } from './sign-in.js';
import type { PageProbe, SessionProvider, SignInResult } from './types.js';

export type PlaywrightSessionOptions = {
  baseUrl: string;
  loginUrl: string;
  email: string;
  password: string;
  headless: boolean;
  navigationTimeoutMs: number;
  /** Saved cookies, the cookie jar and debug screenshots live here */
  stateDir: string;
  userAgent: string;
  notifier: Notifier;
  browserType?: BrowserType;
};

type OpenSession = { browser: Browser; context: BrowserContext; page: Page };

/**
 * Browser session on the course platform: signs in once, then resolves recording pages
 */
export class PlaywrightSession implements SessionProvider {
  private session: OpenSession | null = null;
  private readonly stateDir: string;

  constructor(private readonly options: PlaywrightSessionOptions) {
    this.stateDir = resolve(options.stateDir);
  }

  /**
   * Netscape cookie jar for the downloader, written by `open()`
   */
  get cookieJarPath(): string {
    return join(this.stateDir, 'cookies.txt');
  }

  private get storedCookiesPath(): string {
    return join(this.stateDir, 'cookies.json');
  }

  async open(): Promise<void> {
    const { notifier } = this.options;
    await mkdir(this.stateDir, { recursive: true });

    let browser: Browser;
    try {
      notifier.notify(LogLevel.INFO, 'Launching browser...');
      browser = await (this.options.browserType ?? chromium).launch({
        headless: this.options.headless,
        args: ['--disable-blink-features=AutomationControlled'],
      });
    } catch (error) {
      throw new SessionError(`Could not start the browser: ${errorMessage(error)}`);
    }

    try {
      const context = await browser.newContext({
        viewport: { width: 1280, height: 720 },
        userAgent: this.options.userAgent,
      });
      const page = await context.newPage();

      const restored = await this.restoreCookies(context);
      let result = await this.signIn(page);

      if (result.status === 'failed' && restored) {
        notifier.notify(LogLevel.WARNING, 'Saved cookies may be expired, trying a fresh sign-in...');
        await context.clearCookies();
        result = await this.signIn(page);
      }

      if (result.status === 'failed') {
        const details = result.pageErrors.length > 0 ? ` (${result.pageErrors.join('; ')})` : '';
        throw new SessionError(`Sign-in failed: ${result.reason}${details}. Check your credentials.`);
      }

      notifier.notify(LogLevel.SUCCESS, `Signed in (${result.via})`);
      await this.saveCookies(context);
      this.session = { browser, context, page };
    } catch (error) {
      await browser.close();
      if (error instanceof SessionError) throw error;
      throw new SessionError(`Could not open a session: ${errorMessage(error)}`);
    }
  }

  async resolveMediaSource(recordingNumber: number): Promise<MediaSource | null> {
    if (!this.session) {
      throw new SessionError('Session is not open');
    }

    const { notifier } = this.options;
    const { page } = this.session;
    const pageUrl = recordingPageUrl(this.options.baseUrl, recordingNumber);

    try {
      notifier.notify(LogLevel.INFO, `Navigating to ${pageUrl}`);
      await page.goto(pageUrl, { waitUntil: 'networkidle', timeout: this.options.navigationTimeoutMs });
      // The player initializes after the page settles
      await page.waitForTimeout(3000);
    } catch (error) {
      notifier.notify(LogLevel.WARNING, `Could not load ${pageUrl}: ${errorMessage(error)}; trying the page address`);
      return { locator: pageUrl, needsReferer: true, pageUrl };
    }

    const probe: PageProbe = {
      async attribute(selector, name) {
        const element = await page.$(selector);
        return element ? element.getAttribute(name) : null;
      },
    };

    const resolution = await findMediaSource(probe, pageUrl);
    for (const note of resolution.notes) {
      notifier.notify(LogLevel.DEBUG, `  ${note}`);
    }
    if (resolution.strategy) {
      notifier.notify(LogLevel.INFO, `Found media source via ${resolution.strategy}`);
    }
    return resolution.source;
  }

  async close(): Promise<void> {
    if (!this.session) return;
    const { browser } = this.session;
    this.session = null;
    await browser.close();
  }

  private async signIn(page: Page): Promise<SignInResult> {
    this.options.notifier.notify(LogLevel.HIGHLIGHT, 'Signing in...');
    return signIn(page, {
      loginUrl: this.options.loginUrl,
      email: this.options.email,
      password: this.options.password,
      navigationTimeoutMs: this.options.navigationTimeoutMs,
      screenshotPath: join(this.stateDir, 'login-debug.png'),
      notifier: this.options.notifier,
    });
  }

  /**
   * @returns whether saved cookies were loaded into the context
   */
  private async restoreCookies(context: BrowserContext): Promise<boolean> {
    const { notifier } = this.options;
    const stored = await readStoredCookies(this.storedCookiesPath);

    switch (stored.status) {
      case 'missing':
        return false;
      case 'invalid':
        notifier.notify(LogLevel.WARNING, `Ignoring saved cookies: ${stored.reason}`);
        return false;
      case 'loaded':
        await context.addCookies(stored.cookies);
        notifier.notify(LogLevel.INFO, `Loaded ${stored.cookies.length} cookies from ${this.storedCookiesPath}`);
        return true;
    }
  }

  private async saveCookies(context: BrowserContext): Promise<void> {
    const cookies = await context.cookies();
    await writeStoredCookies(this.storedCookiesPath, cookies);
    await writeNetscapeCookies(this.cookieJarPath, cookies);
    this.options.notifier.notify(LogLevel.SUCCESS, `Saved ${cookies.length} cookies to ${this.cookieJarPath}`);
  }
}
