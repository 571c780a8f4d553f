export interface SessionCookie {
  name: string;
  value: string;
  domain?: string;
  path?: string;
}

export interface DriverLaunchOptions {
  profileDir: string;
  downloadDir: string;
}

/**
 * Page-automation capability consumed by FetchSession. Every method that waits takes an explicit
 * timeout; element probes resolve to null/false on expiry rather than throwing.
 */
export interface PageDriver {
  goto(url: string, timeoutMs: number): Promise<void>;
  hasElement(selector: string, timeoutMs: number): Promise<boolean>;
  textOf(selector: string, timeoutMs: number): Promise<string | null>;
  attributeOf(selector: string, name: string, timeoutMs: number): Promise<string | null>;
  click(selector: string, timeoutMs: number): Promise<boolean>;
  content(): Promise<string>;
  title(): Promise<string>;
  currentUrl(): string;
  cookies(): Promise<SessionCookie[]>;
  /** Opens `url` so that the browser transfers it into the launch download directory. */
  startDownload(url: string, timeoutMs: number): Promise<void>;
  close(): Promise<void>;
}

export type PageDriverFactory = (options: DriverLaunchOptions) => Promise<PageDriver>;
