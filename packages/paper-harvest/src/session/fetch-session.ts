import { mkdir, mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';
import type { BrowserConfig } from '../config.js';
import { describeError, Logger } from '../core/logger.js';
import type { PageDriver, PageDriverFactory, SessionCookie } from './page-driver.js';

export type BlockState =
  | { status: 'clear' }
  | { status: 'blocked'; reason: string; url: string; detectedAt: string };

export type SessionTimeouts = Pick<BrowserConfig, 'navigationTimeoutMs' | 'elementTimeoutMs' | 'tempRoot'>;

interface SessionDirectories {
  root: string;
  profileDir: string;
  downloadDir: string;
}

/**
 * One automation handle plus the temp directory that holds its profile and browser downloads.
 * The block state only moves forward: once `recordBlock` is called the session reports blocked
 * until it is closed.
 */
export class FetchSession {
  private driver: PageDriver | null = null;
  private directories: SessionDirectories | null = null;
  private state: BlockState = { status: 'clear' };
  private closed = false;

  constructor(
    private readonly createDriver: PageDriverFactory,
    private readonly timeouts: SessionTimeouts,
    private readonly logger: Logger
  ) {}

  get blockState(): BlockState {
    return this.state;
  }

  get blocked(): boolean {
    return this.state.status === 'blocked';
  }

  get isOpen(): boolean {
    return this.driver !== null;
  }

  recordBlock(reason: string): void {
    if (this.state.status === 'blocked') {
      return;
    }

    this.state = {
      status: 'blocked',
      reason,
      url: this.driver?.currentUrl() ?? '',
      detectedAt: new Date().toISOString()
    };
    this.logger.warn('Session entered blocked state', { reason, url: this.state.url });
  }

  async downloadDir(): Promise<string> {
    const directories = await this.ensureDirectories();
    return directories.downloadDir;
  }

  async navigate(url: string, timeoutMs = this.timeouts.navigationTimeoutMs): Promise<boolean> {
    const driver = await this.ensureDriver();
    try {
      await driver.goto(url, timeoutMs);
      return true;
    } catch (error) {
      this.logger.warn('Navigation failed', { url, error: describeError(error) });
      return false;
    }
  }

  async findElement(selector: string, timeoutMs = this.timeouts.elementTimeoutMs): Promise<boolean> {
    const driver = await this.ensureDriver();
    return driver.hasElement(selector, timeoutMs);
  }

  async extractText(selector: string, timeoutMs = this.timeouts.elementTimeoutMs): Promise<string | null> {
    const driver = await this.ensureDriver();
    try {
      const text = await driver.textOf(selector, timeoutMs);
      return text === null ? null : text.trim();
    } catch (error) {
      this.logger.debug('Text extraction failed', { selector, error: describeError(error) });
      return null;
    }
  }

  async extractAttribute(
    selector: string,
    name: string,
    timeoutMs = this.timeouts.elementTimeoutMs
  ): Promise<string | null> {
    const driver = await this.ensureDriver();
    try {
      return await driver.attributeOf(selector, name, timeoutMs);
    } catch (error) {
      this.logger.debug('Attribute extraction failed', { selector, name, error: describeError(error) });
      return null;
    }
  }

  async click(selector: string, timeoutMs = this.timeouts.elementTimeoutMs): Promise<boolean> {
    const driver = await this.ensureDriver();
    try {
      return await driver.click(selector, timeoutMs);
    } catch (error) {
      this.logger.debug('Click failed', { selector, error: describeError(error) });
      return false;
    }
  }

  async html(): Promise<string> {
    const driver = await this.ensureDriver();
    return driver.content();
  }

  async title(): Promise<string> {
    const driver = await this.ensureDriver();
    try {
      return await driver.title();
    } catch {
      return '';
    }
  }

  currentUrl(): string {
    return this.driver?.currentUrl() ?? '';
  }

  async listCookies(): Promise<SessionCookie[]> {
    if (!this.driver) {
      return [];
    }

    return this.driver.cookies();
  }

  async startDownload(url: string, timeoutMs = this.timeouts.navigationTimeoutMs): Promise<boolean> {
    const driver = await this.ensureDriver();
    try {
      await driver.startDownload(url, timeoutMs);
      return true;
    } catch (error) {
      this.logger.warn('Browser transfer could not be started', { url, error: describeError(error) });
      return false;
    }
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    const driver = this.driver;
    const directories = this.directories;
    this.driver = null;
    this.directories = null;

    try {
      if (driver) {
        await driver.close();
      }
    } catch (error) {
      this.logger.warn('Driver close failed', { error: describeError(error) });
    } finally {
      if (directories) {
        await rm(directories.root, { recursive: true, force: true });
      }
    }
  }

  private async ensureDirectories(): Promise<SessionDirectories> {
    if (this.closed) {
      throw new Error('FetchSession is closed.');
    }

    if (this.directories) {
      return this.directories;
    }

    const root = await mkdtemp(join(this.timeouts.tempRoot, 'paper-harvest-'));
    const directories = {
      root,
      profileDir: join(root, 'profile'),
      downloadDir: join(root, 'downloads')
    };
    await mkdir(directories.profileDir, { recursive: true });
    await mkdir(directories.downloadDir, { recursive: true });
    this.directories = directories;
    return directories;
  }

  private async ensureDriver(): Promise<PageDriver> {
    if (this.driver) {
      return this.driver;
    }

    const directories = await this.ensureDirectories();
    this.logger.debug('Launching page driver', { profileDir: directories.profileDir });
    this.driver = await this.createDriver({
      profileDir: directories.profileDir,
      downloadDir: directories.downloadDir
    });
    return this.driver;
  }
}
