import { load } from 'cheerio';
import type {
  DriverLaunchOptions,
  PageDriver,
  PageDriverFactory,
  SessionCookie
} from '../../src/session/page-driver.js';

/** Returns the markup served at `url`, or null to simulate a navigation failure. */
export type PageResolver = (url: string) => string | null;

/** Called when the page asks the browser to transfer `url` into `downloadDir`. */
export type DownloadHandler = (url: string, downloadDir: string) => Promise<void>;

const BLANK_PAGE = '<html><head><title></title></head><body></body></html>';

/** In-process stand-in for the browser: serves fixed markup and answers selector probes with cheerio. */
export class FakePageDriver implements PageDriver {
  readonly visited: string[] = [];
  readonly clicked: string[] = [];
  readonly transfers: string[] = [];
  closed = false;
  private url = 'about:blank';
  private markup = BLANK_PAGE;

  constructor(
    readonly launch: DriverLaunchOptions,
    private readonly resolvePage: PageResolver,
    private readonly onDownload?: DownloadHandler
  ) {}

  async goto(url: string): Promise<void> {
    this.visited.push(url);
    const markup = this.resolvePage(url);
    if (markup === null) {
      throw new Error(`net::ERR_CONNECTION_REFUSED at ${url}`);
    }
    this.url = url;
    this.markup = markup;
  }

  async hasElement(selector: string): Promise<boolean> {
    return load(this.markup)(selector).length > 0;
  }

  async textOf(selector: string): Promise<string | null> {
    const node = load(this.markup)(selector).first();
    return node.length > 0 ? node.text() : null;
  }

  async attributeOf(selector: string, name: string): Promise<string | null> {
    return load(this.markup)(selector).first().attr(name) ?? null;
  }

  async click(selector: string): Promise<boolean> {
    const found = await this.hasElement(selector);
    if (found) {
      this.clicked.push(selector);
    }
    return found;
  }

  async content(): Promise<string> {
    return this.markup;
  }

  async title(): Promise<string> {
    return load(this.markup)('title').first().text();
  }

  currentUrl(): string {
    return this.url;
  }

  async cookies(): Promise<SessionCookie[]> {
    return [{ name: 'SID', value: 'test-session' }];
  }

  async startDownload(url: string): Promise<void> {
    this.transfers.push(url);
    if (!this.onDownload) {
      throw new Error('downloads are not supported by this page');
    }
    await this.onDownload(url, this.launch.downloadDir);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export const createFakeDriverFactory = (
  resolvePage: PageResolver,
  onDownload?: DownloadHandler
): { factory: PageDriverFactory; drivers: FakePageDriver[] } => {
  const drivers: FakePageDriver[] = [];
  const factory: PageDriverFactory = async (options) => {
    const driver = new FakePageDriver(options, resolvePage, onDownload);
    drivers.push(driver);
    return driver;
  };
  return { factory, drivers };
};
