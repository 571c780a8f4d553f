import { rename } from 'node:fs/promises';
import { join } from 'node:path';
import { chromium, type BrowserContext, type Download, type Page } from 'playwright-core';
import type { BrowserConfig } from '../config.js';
import { describeError, Logger } from '../core/logger.js';
import type { DriverLaunchOptions, PageDriver, PageDriverFactory, SessionCookie } from './page-driver.js';

const LAUNCH_ARGS = [
  '--disable-blink-features=AutomationControlled',
  '--no-sandbox',
  '--disable-dev-shm-usage',
  '--disable-gpu',
  '--window-size=1920,1080'
];

export const IN_PROGRESS_SUFFIX = '.crdownload';

const safeDownloadName = (download: Download): string => {
  const suggested = download.suggestedFilename().replace(/[\\/]/g, '_').trim();
  return suggested.length > 0 ? suggested : `download-${Date.now()}.pdf`;
};

class PlaywrightPageDriver implements PageDriver {
  private readonly transfers = new Set<Promise<void>>();

  constructor(
    private readonly context: BrowserContext,
    private readonly page: Page,
    private readonly downloadDir: string,
    private readonly logger: Logger
  ) {
    this.page.on('download', (download) => {
      const transfer = this.persistDownload(download).finally(() => {
        this.transfers.delete(transfer);
      });
      this.transfers.add(transfer);
    });
  }

  async goto(url: string, timeoutMs: number): Promise<void> {
    await this.page.goto(url, { timeout: timeoutMs, waitUntil: 'domcontentloaded' });
  }

  async hasElement(selector: string, timeoutMs: number): Promise<boolean> {
    try {
      await this.page.locator(selector).first().waitFor({ state: 'attached', timeout: timeoutMs });
      return true;
    } catch {
      return false;
    }
  }

  async textOf(selector: string, timeoutMs: number): Promise<string | null> {
    if (!(await this.hasElement(selector, timeoutMs))) {
      return null;
    }

    return this.page.locator(selector).first().innerText({ timeout: timeoutMs });
  }

  async attributeOf(selector: string, name: string, timeoutMs: number): Promise<string | null> {
    if (!(await this.hasElement(selector, timeoutMs))) {
      return null;
    }

    return this.page.locator(selector).first().getAttribute(name, { timeout: timeoutMs });
  }

  async click(selector: string, timeoutMs: number): Promise<boolean> {
    if (!(await this.hasElement(selector, timeoutMs))) {
      return false;
    }

    await this.page.locator(selector).first().click({ timeout: timeoutMs });
    return true;
  }

  async content(): Promise<string> {
    return this.page.content();
  }

  async title(): Promise<string> {
    return this.page.title();
  }

  currentUrl(): string {
    return this.page.url();
  }

  async cookies(): Promise<SessionCookie[]> {
    const cookies = await this.context.cookies();
    return cookies.map((cookie) => ({
      name: cookie.name,
      value: cookie.value,
      domain: cookie.domain,
      path: cookie.path
    }));
  }

  async startDownload(url: string, timeoutMs: number): Promise<void> {
    try {
      await this.page.goto(url, { timeout: timeoutMs, waitUntil: 'commit' });
    } catch (error) {
      // Chromium aborts the navigation once the response turns into a download.
      if (!describeError(error).includes('Download is starting')) {
        throw error;
      }
    }
  }

  async close(): Promise<void> {
    await Promise.allSettled([...this.transfers]);
    await this.context.close();
  }

  private async persistDownload(download: Download): Promise<void> {
    const name = safeDownloadName(download);
    const partialPath = join(this.downloadDir, `${name}${IN_PROGRESS_SUFFIX}`);

    try {
      await download.saveAs(partialPath);
      await rename(partialPath, join(this.downloadDir, name));
    } catch (error) {
      this.logger.warn('Browser download did not complete', {
        url: download.url(),
        error: describeError(error)
      });
    }
  }
}

export const createPlaywrightDriverFactory =
  (config: BrowserConfig, logger: Logger): PageDriverFactory =>
  async ({ profileDir, downloadDir }: DriverLaunchOptions): Promise<PageDriver> => {
    const context = await chromium.launchPersistentContext(profileDir, {
      headless: config.headless,
      ...(config.executablePath ? { executablePath: config.executablePath } : { channel: 'chrome' }),
      acceptDownloads: true,
      downloadsPath: join(profileDir, '.transfers'),
      userAgent: config.userAgent,
      viewport: { width: 1920, height: 1080 },
      args: LAUNCH_ARGS
    });

    const page = context.pages()[0] ?? (await context.newPage());
    page.setDefaultTimeout(config.elementTimeoutMs);
    page.setDefaultNavigationTimeout(config.navigationTimeoutMs);

    return new PlaywrightPageDriver(context, page, downloadDir, logger);
  };
