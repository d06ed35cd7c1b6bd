import puppeteer, { Browser, CookieParam, Page } from 'puppeteer-core';
import { BrowserSettings } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { NavigationFailure, errorMessage } from '../utils/errors.js';
import { NavigationResponse, RenderSession, RenderSessionFactory, SessionCookie } from './render-session.js';

/**
 * RenderSession backed by puppeteer-core.
 *
 * Connects to a remote browser when BROWSER_WS_ENDPOINT is set, otherwise
 * launches the Chrome binary at CHROME_EXECUTABLE_PATH. One session owns one
 * page; a platform crawl keeps the same session so cookies and pagination
 * state carry over from page to page.
 */
export class PuppeteerRenderSession implements RenderSession {
  private constructor(
    private readonly browser: Browser,
    private readonly page: Page,
    private readonly ownsBrowser: boolean,
    private readonly navigationTimeoutMs: number
  ) {}

  static async open(settings: BrowserSettings): Promise<PuppeteerRenderSession> {
    let browser: Browser;
    let ownsBrowser: boolean;

    if (settings.wsEndpoint) {
      logger.info('Connecting to remote browser');
      browser = await puppeteer.connect({ browserWSEndpoint: settings.wsEndpoint });
      ownsBrowser = false;
    } else if (settings.executablePath) {
      logger.info('Launching local browser', { executablePath: settings.executablePath });
      browser = await puppeteer.launch({
        executablePath: settings.executablePath,
        headless: settings.headless,
        args: ['--no-sandbox', '--disable-blink-features=AutomationControlled'],
      });
      ownsBrowser = true;
    } else {
      throw new Error('No browser configured. Set BROWSER_WS_ENDPOINT or CHROME_EXECUTABLE_PATH');
    }

    const page = await browser.newPage();
    await page.setViewport({ width: 1920, height: 1080 });
    page.setDefaultNavigationTimeout(settings.navigationTimeoutMs);

    return new PuppeteerRenderSession(browser, page, ownsBrowser, settings.navigationTimeoutMs);
  }

  async navigate(url: string): Promise<NavigationResponse> {
    try {
      const response = await this.page.goto(url, {
        waitUntil: 'domcontentloaded',
        timeout: this.navigationTimeoutMs,
      });
      await this.settle();

      if (!response) {
        return { ok: true, status: null };
      }
      return { ok: response.ok(), status: response.status() };
    } catch (error) {
      throw new NavigationFailure(`Navigation failed: ${errorMessage(error)}`, url, { cause: error });
    }
  }

  async click(selector: string): Promise<boolean> {
    // Unsupported selector syntax for this page counts as "nothing to click"
    const handle = await this.page.$(selector).catch((error: unknown) => {
      logger.debug('Selector query failed', { selector, error: errorMessage(error) });
      return null;
    });
    if (!handle) return false;

    try {
      if (!(await handle.isVisible())) {
        return false;
      }
      await handle.scrollIntoView();
      await handle.click({ delay: 50 + Math.floor(Math.random() * 100) });
      await this.settle();
      return true;
    } catch (error) {
      throw new NavigationFailure(`Click on "${selector}" failed: ${errorMessage(error)}`, this.page.url(), {
        cause: error,
      });
    } finally {
      await handle.dispose();
    }
  }

  async setContent(html: string): Promise<void> {
    try {
      await this.page.setContent(html, { waitUntil: 'domcontentloaded', timeout: this.navigationTimeoutMs });
    } catch (error) {
      throw new NavigationFailure(`setContent failed: ${errorMessage(error)}`, this.page.url(), { cause: error });
    }
  }

  async queryAll(selector: string): Promise<string[]> {
    try {
      return await this.page.$$eval(selector, elements => elements.map(element => element.outerHTML));
    } catch (error) {
      logger.debug('queryAll failed', { selector, error: errorMessage(error) });
      return [];
    }
  }

  async content(): Promise<string> {
    return this.page.content();
  }

  currentUrl(): string {
    return this.page.url();
  }

  async setCookies(cookies: SessionCookie[]): Promise<void> {
    if (cookies.length === 0) return;

    const params: CookieParam[] = cookies.map(cookie => ({
      name: cookie.name,
      value: cookie.value,
      domain: cookie.domain,
      path: cookie.path,
      expires: cookie.expires,
      httpOnly: cookie.httpOnly,
      secure: cookie.secure,
      sameSite: cookie.sameSite,
    }));
    await this.page.setCookie(...params);
  }

  async close(): Promise<void> {
    try {
      await this.page.close();
    } finally {
      if (this.ownsBrowser) {
        await this.browser.close();
      } else {
        await this.browser.disconnect();
      }
    }
  }

  /**
   * Wait for client-side rendering to quiet down. Marketplaces with long-polling
   * never reach network idle, so a timeout here is expected and not an error.
   */
  private async settle(): Promise<void> {
    try {
      await this.page.waitForNetworkIdle({ idleTime: 500, timeout: 10000 });
    } catch (error) {
      logger.debug('Network did not go idle, continuing', { error: errorMessage(error) });
    }
  }
}

export function createPuppeteerSessionFactory(settings: BrowserSettings): RenderSessionFactory {
  return () => PuppeteerRenderSession.open(settings);
}
