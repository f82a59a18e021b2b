/**
 * puppeteerDriver.ts — BrowserDriver backed by one puppeteer-core browser.
 *
 * Each driver owns its own Chromium process, so destroying a session kills
 * exactly one native process and nothing else.  puppeteer-core never
 * downloads a browser: the executable comes from CHROME_PATH or the
 * installed "chrome" release channel.
 *
 * Popups opened by `clickAndFollow()` become the active page until the next
 * `goto()`, which closes them and returns to the main page.
 */

import puppeteer, { TimeoutError, type Browser, type Page } from 'puppeteer-core';
import type { BrowserDriver, DriverLaunchOptions, PageLink } from './browserDriver';
import { ExtractionTimeoutError, describeError } from './errors';
import { Logger } from './logger';

const logger = new Logger('PuppeteerDriver');

const VIEWPORT = { width: 1280, height: 720 };

/** Quiet Chromium down; none of these change what a page renders. */
const CHROME_ARGS = [
  '--no-sandbox',
  '--disable-setuid-sandbox',
  '--disable-dev-shm-usage',
  '--disable-gpu',
  '--disable-extensions',
  '--disable-background-networking',
  '--disable-sync',
  '--disable-translate',
  '--mute-audio',
  `--window-size=${VIEWPORT.width},${VIEWPORT.height}`,
];

/** How long clickAndFollow() waits for a popup or navigation before assuming in-place content. */
const CLICK_SETTLE_MS = 3_000;

/** Launch a browser in the requested visibility mode and wrap its first page. */
export async function launchPuppeteerDriver(
  options: DriverLaunchOptions,
): Promise<PuppeteerDriver> {
  const browser = await puppeteer.launch({
    headless: options.visibility === 'headless',
    executablePath: options.chromePath,
    channel: options.chromePath ? undefined : 'chrome',
    args: CHROME_ARGS,
    defaultViewport: VIEWPORT,
  });

  try {
    const [existing] = await browser.pages();
    const page = existing ?? (await browser.newPage());
    if (options.userAgent) {
      await page.setUserAgent(options.userAgent);
    }
    return new PuppeteerDriver(browser, page);
  } catch (err) {
    await browser.close().catch((closeErr: unknown) =>
      logger.warn(`Could not close half-started browser: ${describeError(closeErr)}`),
    );
    throw err;
  }
}

export class PuppeteerDriver implements BrowserDriver {
  private readonly browser: Browser;
  private readonly mainPage: Page;
  /** The page operations run against: the main page or the latest popup. */
  private page: Page;

  constructor(browser: Browser, page: Page) {
    this.browser = browser;
    this.mainPage = page;
    this.page = page;
  }

  // ── Navigation ─────────────────────────────────────────

  async goto(url: string, timeoutMs: number): Promise<number> {
    await this.returnToMainPage();
    const response = await translateTimeout(`Navigation to ${url}`, timeoutMs, () =>
      this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeoutMs }),
    );
    return response?.status() ?? 0;
  }

  async click(selector: string, timeoutMs: number): Promise<void> {
    await this.waitForSelector(selector, timeoutMs);
    await this.page.click(selector);
  }

  async clickAndFollow(selector: string, timeoutMs: number): Promise<void> {
    await this.waitForSelector(selector, timeoutMs);

    const settleMs = Math.min(timeoutMs, CLICK_SETTLE_MS);
    const current = this.page;

    let onPopup: ((popup: Page | null) => void) | undefined;
    const popup = new Promise<Page | null>((resolve) => {
      onPopup = (opened) => resolve(opened);
      current.once('popup', onPopup);
    });
    const navigation = current
      .waitForNavigation({ timeout: settleMs, waitUntil: 'domcontentloaded' })
      .then(
        () => null,
        () => null,
      );
    let timer: NodeJS.Timeout | undefined;
    const settled = new Promise<null>((resolve) => {
      timer = setTimeout(() => resolve(null), settleMs);
    });

    let opened: Page | null;
    try {
      await current.click(selector);
      opened = await Promise.race([popup, navigation, settled]);
    } finally {
      clearTimeout(timer);
      if (onPopup) current.off('popup', onPopup);
    }

    if (opened) {
      await translateTimeout('Popup load', timeoutMs, () =>
        opened.waitForFunction('document.readyState !== "loading"', { timeout: timeoutMs }),
      );
      this.page = opened;
    }
  }

  // ── Reading ────────────────────────────────────────────

  async waitForSelector(selector: string, timeoutMs: number): Promise<void> {
    await translateTimeout(`Waiting for "${selector}"`, timeoutMs, () =>
      this.page.waitForSelector(selector, { timeout: timeoutMs }),
    );
  }

  async exists(selector: string): Promise<boolean> {
    const handle = await this.page.$(selector);
    if (!handle) return false;
    await handle.dispose();
    return true;
  }

  async textOf(selector: string): Promise<string | null> {
    const handle = await this.page.$(selector);
    if (!handle) return null;
    try {
      const text = await handle.evaluate((el) => el.textContent);
      return text ? text.replace(/\s+/g, ' ').trim() : null;
    } finally {
      await handle.dispose();
    }
  }

  async attributeOf(selector: string, attribute: string): Promise<string | null> {
    const handle = await this.page.$(selector);
    if (!handle) return null;
    try {
      return await handle.evaluate((el, name) => el.getAttribute(name), attribute);
    } finally {
      await handle.dispose();
    }
  }

  async links(selector: string, attribute = 'href'): Promise<PageLink[]> {
    return this.page.$$eval(
      selector,
      (elements, name) =>
        elements.map((el) => ({
          href: el.getAttribute(name) ?? '',
          text: (el.textContent ?? '').replace(/\s+/g, ' ').trim(),
        })),
      attribute,
    );
  }

  html(): Promise<string> {
    return this.page.content();
  }

  url(): string {
    return this.page.url();
  }

  // ── Lifecycle ──────────────────────────────────────────

  isConnected(): boolean {
    return this.browser.connected;
  }

  async close(): Promise<void> {
    try {
      await this.browser.close();
    } catch (err) {
      logger.warn(`browser.close() failed, killing the process: ${describeError(err)}`);
      this.browser.process()?.kill('SIGKILL');
    }
  }

  /** Close popups left behind by clickAndFollow() and make the main page active again. */
  private async returnToMainPage(): Promise<void> {
    if (this.page === this.mainPage) return;

    for (const page of await this.browser.pages()) {
      if (page !== this.mainPage) {
        await page.close().catch((err: unknown) =>
          logger.debug(`Popup already gone: ${describeError(err)}`),
        );
      }
    }
    this.page = this.mainPage;
    await this.mainPage.bringToFront();
  }
}

/** Re-throw Puppeteer's TimeoutError as the pipeline's ExtractionTimeoutError. */
async function translateTimeout<T>(
  what: string,
  timeoutMs: number,
  run: () => Promise<T>,
): Promise<T> {
  try {
    return await run();
  } catch (err) {
    if (err instanceof TimeoutError) {
      throw new ExtractionTimeoutError(what, timeoutMs);
    }
    throw err;
  }
}
