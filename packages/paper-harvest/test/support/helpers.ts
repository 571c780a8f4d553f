import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { parseConfig, type AppConfig, type ConfigOverrides, type RequestPolicy } from '../../src/config.js';
import { Logger } from '../../src/core/logger.js';

export const BASE_URL = 'https://kns.example.org';
export const SEARCH_URL = `${BASE_URL}/kns8s/search`;

export const fixture = (name: string): string =>
  readFileSync(fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url)), 'utf8');

export const silentLogger = (): Logger => new Logger('error', undefined, () => undefined);

/** Smallest byte sequence that passes the signature check, padded to `size`. */
export const pdfBytes = (size = 2048) => {
  const bytes = new Uint8Array(size).fill(0x20);
  bytes.set([0x25, 0x50, 0x44, 0x46, 0x2d, 0x31, 0x2e, 0x37]);
  return bytes;
};

/** `fetch` stand-in answering from a fixed route table; unknown URLs get a 404. */
export const routeFetch =
  (routes: Record<string, () => Response>): typeof fetch =>
  async (input: string | URL | Request) => {
    const url = input instanceof Request ? input.url : input.toString();
    const route = routes[url];
    return route ? route() : new Response('not found', { status: 404 });
  };

export const pdfResponse = (size = 2048): Response =>
  new Response(pdfBytes(size), { status: 200, headers: { 'content-type': 'application/pdf' } });

/** Configuration with every delay and retry switched off, pointed at the test site. */
export const testConfig = (overrides: ConfigOverrides = {}): AppConfig =>
  parseConfig({
    LOG_LEVEL: 'error',
    HARVEST_HOST: '127.0.0.1',
    CRAWL_BASE_URL: BASE_URL,
    CRAWL_SEARCH_URL: SEARCH_URL,
    CRAWL_REQUEST_DELAY_MS: 0,
    CRAWL_REQUEST_JITTER_MS: 0,
    CRAWL_SETTLE_DELAY_MS: 0,
    CRAWL_RESULTS_TIMEOUT_MS: 0,
    BROWSER_ELEMENT_TIMEOUT_MS: 0,
    BROWSER_BLOCK_PROBE_TIMEOUT_MS: 0,
    ACQUIRE_BATCH_DELAY_MS: 0,
    ACQUIRE_BATCH_JITTER_MS: 0,
    ACQUIRE_BROWSER_TRANSFER: false,
    RESEARCH_RETRY_ATTEMPTS: 0,
    RESEARCH_REQUEST_DELAY_MS: 0,
    WEB_SEARCH_RETRY_ATTEMPTS: 0,
    WEB_SEARCH_REQUEST_DELAY_MS: 0,
    ...overrides
  });

/** No retries and no spacing, so provider stubs answer in order. */
export const instantPolicy: RequestPolicy = { timeoutMs: 1000, retryAttempts: 0, retryDelayMs: 0, minIntervalMs: 0 };
