import { tmpdir } from 'node:os';
import { resolve } from 'node:path';
import { z } from 'zod';

export type TransportMode = 'stdio' | 'http' | 'both';

const numberFromEnv = (defaultValue: number, min: number, max: number) =>
  z.coerce.number().int().min(min).max(max).default(defaultValue);

const ratioFromEnv = (defaultValue: number) => z.coerce.number().min(0).max(1).default(defaultValue);

const booleanFromEnv = (defaultValue: boolean) =>
  z.preprocess((value) => {
    if (typeof value === 'boolean') {
      return value;
    }

    if (typeof value === 'number') {
      return value !== 0;
    }

    if (typeof value === 'string') {
      const normalized = value.trim().toLowerCase();
      if (['1', 'true', 'yes', 'on'].includes(normalized)) {
        return true;
      }
      if (['0', 'false', 'no', 'off'].includes(normalized)) {
        return false;
      }
    }

    return value;
  }, z.boolean().default(defaultValue));

const envSchema = z.object({
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  HARVEST_SERVER_NAME: z.string().default('paper-harvest'),
  HARVEST_SERVER_VERSION: z.string().default('1.0.0'),
  HARVEST_TRANSPORT: z.enum(['stdio', 'http', 'both']).default('stdio'),
  HARVEST_HOST: z.string().default('127.0.0.1'),
  HARVEST_PORT: numberFromEnv(3000, 1, 65535),
  HARVEST_ENDPOINT_PATH: z.string().default('/mcp'),
  HARVEST_HEALTH_PATH: z.string().default('/health'),
  HARVEST_ALLOWED_ORIGINS: z.string().optional(),
  HARVEST_ALLOWED_HOSTS: z.string().optional(),
  HARVEST_API_KEY: z.string().optional(),

  BROWSER_HEADLESS: booleanFromEnv(true),
  BROWSER_EXECUTABLE_PATH: z.string().optional(),
  BROWSER_USER_AGENT: z
    .string()
    .default('Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36'),
  BROWSER_NAVIGATION_TIMEOUT_MS: numberFromEnv(30000, 1000, 180000),
  BROWSER_ELEMENT_TIMEOUT_MS: numberFromEnv(3000, 0, 60000),
  BROWSER_BLOCK_PROBE_TIMEOUT_MS: numberFromEnv(500, 0, 10000),

  CRAWL_BASE_URL: z.string().url().default('https://kns.cnki.net'),
  CRAWL_SEARCH_URL: z.string().url().default('https://kns.cnki.net/kns8s/search'),
  CRAWL_SITE_DOMAIN: z
    .string()
    .trim()
    .toLowerCase()
    .regex(/^[a-z0-9-]+(\.[a-z0-9-]+)+$/, 'CRAWL_SITE_DOMAIN must be a host name such as example.org')
    .optional(),
  CRAWL_REQUEST_DELAY_MS: numberFromEnv(2000, 0, 60000),
  CRAWL_REQUEST_JITTER_MS: numberFromEnv(1000, 0, 60000),
  CRAWL_SETTLE_DELAY_MS: numberFromEnv(2000, 0, 60000),
  CRAWL_RESULTS_TIMEOUT_MS: numberFromEnv(10000, 0, 120000),
  CRAWL_MAX_RESULTS: numberFromEnv(20, 1, 500),

  ACQUIRE_DOWNLOAD_DIR: z.string().default('downloads'),
  ACQUIRE_FILENAME_MAX_LENGTH: numberFromEnv(100, 8, 240),
  ACQUIRE_MIN_PDF_BYTES: numberFromEnv(1000, 4, 10_000_000),
  ACQUIRE_HTTP_TIMEOUT_MS: numberFromEnv(60000, 1000, 600000),
  ACQUIRE_DOWNLOAD_TIMEOUT_MS: numberFromEnv(60000, 1000, 600000),
  ACQUIRE_DOWNLOAD_POLL_MS: numberFromEnv(1000, 10, 60000),
  ACQUIRE_CANDIDATES_PER_MIRROR: numberFromEnv(3, 1, 20),
  ACQUIRE_BROWSER_TRANSFER: booleanFromEnv(true),
  ACQUIRE_BATCH_DELAY_MS: numberFromEnv(2000, 0, 60000),
  ACQUIRE_BATCH_JITTER_MS: numberFromEnv(2000, 0, 60000),
  ACQUIRE_TITLE_MATCH_THRESHOLD: ratioFromEnv(0.6),

  RESEARCH_OPENALEX_BASE_URL: z.string().url().default('https://api.openalex.org'),
  RESEARCH_OPENALEX_API_KEY: z.string().optional(),
  RESEARCH_CROSSREF_BASE_URL: z.string().url().default('https://api.crossref.org'),
  RESEARCH_SEMANTIC_SCHOLAR_BASE_URL: z.string().url().default('https://api.semanticscholar.org/graph/v1'),
  RESEARCH_SEMANTIC_SCHOLAR_API_KEY: z.string().optional(),
  RESEARCH_UNPAYWALL_BASE_URL: z.string().url().default('https://api.unpaywall.org/v2'),
  RESEARCH_UNPAYWALL_EMAIL: z.string().email().optional(),
  RESEARCH_TIMEOUT_MS: numberFromEnv(20000, 1000, 120000),
  RESEARCH_RETRY_ATTEMPTS: numberFromEnv(2, 0, 5),
  RESEARCH_RETRY_DELAY_MS: numberFromEnv(800, 0, 30000),
  RESEARCH_REQUEST_DELAY_MS: numberFromEnv(100, 0, 10000),

  WEB_SEARCH_BASE_URL: z.string().url().default('https://scholar.google.com'),
  WEB_SEARCH_LANGUAGE: z.string().default('en'),
  WEB_SEARCH_RESULTS: numberFromEnv(10, 1, 20),
  WEB_SEARCH_TIMEOUT_MS: numberFromEnv(15000, 1000, 120000),
  WEB_SEARCH_RETRY_ATTEMPTS: numberFromEnv(1, 0, 5),
  WEB_SEARCH_RETRY_DELAY_MS: numberFromEnv(800, 0, 30000),
  WEB_SEARCH_REQUEST_DELAY_MS: numberFromEnv(1000, 0, 10000),

  CONVERT_SAMPLE_PAGES: numberFromEnv(3, 1, 50),
  CONVERT_READABLE_RATIO: ratioFromEnv(0.5),
  CONVERT_REPEAT_RATIO: ratioFromEnv(0.1),
  CONVERT_REPEAT_RUN_LENGTH: numberFromEnv(3, 2, 20),
  CONVERT_EXTRACT_IMAGES: booleanFromEnv(true),
  CONVERT_MAX_PAGES: numberFromEnv(0, 0, 5000),
  CONVERT_OCR_BASE_URL: z.string().url().default('https://api.siliconflow.cn/v1'),
  CONVERT_OCR_API_KEY: z.string().optional(),
  CONVERT_OCR_MODEL: z.string().default('deepseek-ai/DeepSeek-OCR'),
  CONVERT_OCR_TIMEOUT_MS: numberFromEnv(120000, 1000, 600000)
});

type ParsedEnv = z.infer<typeof envSchema>;

const splitCsv = (value?: string): string[] => {
  if (!value) {
    return [];
  }

  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
};

const normalizePath = (value: string): string => {
  const withPrefix = value.startsWith('/') ? value : `/${value}`;
  return withPrefix.length > 1 && withPrefix.endsWith('/')
    ? withPrefix.slice(0, -1)
    : withPrefix;
};

const toAbsoluteDir = (value: string): string => resolve(process.cwd(), value);

export interface BrowserConfig {
  headless: boolean;
  executablePath?: string;
  userAgent: string;
  navigationTimeoutMs: number;
  elementTimeoutMs: number;
  blockProbeTimeoutMs: number;
  tempRoot: string;
}

export interface CrawlConfig {
  baseUrl: string;
  searchUrl: string;
  /** Domain whose hosts count as the site's own; the base URL's host when unset. */
  siteDomain?: string;
  requestDelayMs: number;
  requestJitterMs: number;
  settleDelayMs: number;
  resultsTimeoutMs: number;
  maxResults: number;
}

export interface AcquisitionConfig {
  downloadDir: string;
  filenameMaxLength: number;
  minPdfBytes: number;
  httpTimeoutMs: number;
  downloadTimeoutMs: number;
  downloadPollMs: number;
  candidatesPerMirror: number;
  browserTransfer: boolean;
  batchDelayMs: number;
  batchJitterMs: number;
  titleMatchThreshold: number;
}

/** Timeout, retry and minimum spacing for one family of outbound lookups. */
export interface RequestPolicy {
  timeoutMs: number;
  retryAttempts: number;
  retryDelayMs: number;
  minIntervalMs: number;
}

export interface ResearchConfig {
  openAlexBaseUrl: string;
  openAlexApiKey?: string;
  crossrefBaseUrl: string;
  semanticScholarBaseUrl: string;
  semanticScholarApiKey?: string;
  unpaywallBaseUrl: string;
  /** Sent to Unpaywall (required there) and to Crossref's polite pool. */
  contactEmail?: string;
  requests: RequestPolicy;
}

export interface WebSearchConfig {
  baseUrl: string;
  language: string;
  resultsPerQuery: number;
  requests: RequestPolicy;
}

export interface ClassifierThresholds {
  samplePages: number;
  readableRatio: number;
  repeatRatio: number;
  repeatRunLength: number;
}

export interface ConversionConfig extends ClassifierThresholds {
  extractImages: boolean;
  maxPages: number | null;
  ocrBaseUrl: string;
  ocrApiKey?: string;
  ocrModel: string;
  ocrTimeoutMs: number;
}

export interface AppConfig {
  logLevel: ParsedEnv['LOG_LEVEL'];
  serverName: string;
  serverVersion: string;
  transport: TransportMode;
  host: string;
  port: number;
  endpointPath: string;
  healthPath: string;
  allowedOrigins: string[];
  allowedHosts: string[];
  apiKey?: string;
  browser: BrowserConfig;
  crawl: CrawlConfig;
  acquisition: AcquisitionConfig;
  conversion: ConversionConfig;
  research: ResearchConfig;
  webSearch: WebSearchConfig;
}

export type ConfigOverrides = Partial<Record<keyof ParsedEnv, string | number | boolean>>;

export const parseConfig = (overrides?: ConfigOverrides): AppConfig => {
  const mergedEnv: Record<string, string | number | boolean | undefined> = {
    ...process.env,
    ...(overrides ?? {})
  };

  const env = envSchema.parse(mergedEnv);

  return {
    logLevel: env.LOG_LEVEL,
    serverName: env.HARVEST_SERVER_NAME,
    serverVersion: env.HARVEST_SERVER_VERSION,
    transport: env.HARVEST_TRANSPORT,
    host: env.HARVEST_HOST,
    port: env.HARVEST_PORT,
    endpointPath: normalizePath(env.HARVEST_ENDPOINT_PATH),
    healthPath: normalizePath(env.HARVEST_HEALTH_PATH),
    allowedOrigins: splitCsv(env.HARVEST_ALLOWED_ORIGINS),
    allowedHosts: splitCsv(env.HARVEST_ALLOWED_HOSTS).map((host) => host.toLowerCase()),
    apiKey: env.HARVEST_API_KEY,
    browser: {
      headless: env.BROWSER_HEADLESS,
      executablePath: env.BROWSER_EXECUTABLE_PATH,
      userAgent: env.BROWSER_USER_AGENT,
      navigationTimeoutMs: env.BROWSER_NAVIGATION_TIMEOUT_MS,
      elementTimeoutMs: env.BROWSER_ELEMENT_TIMEOUT_MS,
      blockProbeTimeoutMs: env.BROWSER_BLOCK_PROBE_TIMEOUT_MS,
      tempRoot: tmpdir()
    },
    crawl: {
      baseUrl: env.CRAWL_BASE_URL,
      searchUrl: env.CRAWL_SEARCH_URL,
      siteDomain: env.CRAWL_SITE_DOMAIN,
      requestDelayMs: env.CRAWL_REQUEST_DELAY_MS,
      requestJitterMs: env.CRAWL_REQUEST_JITTER_MS,
      settleDelayMs: env.CRAWL_SETTLE_DELAY_MS,
      resultsTimeoutMs: env.CRAWL_RESULTS_TIMEOUT_MS,
      maxResults: env.CRAWL_MAX_RESULTS
    },
    acquisition: {
      downloadDir: toAbsoluteDir(env.ACQUIRE_DOWNLOAD_DIR),
      filenameMaxLength: env.ACQUIRE_FILENAME_MAX_LENGTH,
      minPdfBytes: env.ACQUIRE_MIN_PDF_BYTES,
      httpTimeoutMs: env.ACQUIRE_HTTP_TIMEOUT_MS,
      downloadTimeoutMs: env.ACQUIRE_DOWNLOAD_TIMEOUT_MS,
      downloadPollMs: env.ACQUIRE_DOWNLOAD_POLL_MS,
      candidatesPerMirror: env.ACQUIRE_CANDIDATES_PER_MIRROR,
      browserTransfer: env.ACQUIRE_BROWSER_TRANSFER,
      batchDelayMs: env.ACQUIRE_BATCH_DELAY_MS,
      batchJitterMs: env.ACQUIRE_BATCH_JITTER_MS,
      titleMatchThreshold: env.ACQUIRE_TITLE_MATCH_THRESHOLD
    },
    conversion: {
      samplePages: env.CONVERT_SAMPLE_PAGES,
      readableRatio: env.CONVERT_READABLE_RATIO,
      repeatRatio: env.CONVERT_REPEAT_RATIO,
      repeatRunLength: env.CONVERT_REPEAT_RUN_LENGTH,
      extractImages: env.CONVERT_EXTRACT_IMAGES,
      maxPages: env.CONVERT_MAX_PAGES > 0 ? env.CONVERT_MAX_PAGES : null,
      ocrBaseUrl: env.CONVERT_OCR_BASE_URL,
      ocrApiKey: env.CONVERT_OCR_API_KEY,
      ocrModel: env.CONVERT_OCR_MODEL,
      ocrTimeoutMs: env.CONVERT_OCR_TIMEOUT_MS
    },
    research: {
      openAlexBaseUrl: env.RESEARCH_OPENALEX_BASE_URL,
      openAlexApiKey: env.RESEARCH_OPENALEX_API_KEY,
      crossrefBaseUrl: env.RESEARCH_CROSSREF_BASE_URL,
      semanticScholarBaseUrl: env.RESEARCH_SEMANTIC_SCHOLAR_BASE_URL,
      semanticScholarApiKey: env.RESEARCH_SEMANTIC_SCHOLAR_API_KEY,
      unpaywallBaseUrl: env.RESEARCH_UNPAYWALL_BASE_URL,
      contactEmail: env.RESEARCH_UNPAYWALL_EMAIL,
      requests: {
        timeoutMs: env.RESEARCH_TIMEOUT_MS,
        retryAttempts: env.RESEARCH_RETRY_ATTEMPTS,
        retryDelayMs: env.RESEARCH_RETRY_DELAY_MS,
        minIntervalMs: env.RESEARCH_REQUEST_DELAY_MS
      }
    },
    webSearch: {
      baseUrl: env.WEB_SEARCH_BASE_URL,
      language: env.WEB_SEARCH_LANGUAGE,
      resultsPerQuery: env.WEB_SEARCH_RESULTS,
      requests: {
        timeoutMs: env.WEB_SEARCH_TIMEOUT_MS,
        retryAttempts: env.WEB_SEARCH_RETRY_ATTEMPTS,
        retryDelayMs: env.WEB_SEARCH_RETRY_DELAY_MS,
        minIntervalMs: env.WEB_SEARCH_REQUEST_DELAY_MS
      }
    }
  };
};
