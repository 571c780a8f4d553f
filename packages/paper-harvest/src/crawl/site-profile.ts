import type { CrawlConfig } from '../config.js';
import type { BlockSignals } from '../session/anti-block-detector.js';
import type { SortOrder } from './types.js';

/** Primary selector first; later entries are tried only when earlier ones match nothing. */
export type SelectorChain = readonly string[];

export interface SiteProfile {
  baseUrl: string;
  /** Links on this host or its subdomains belong to the site. */
  siteDomain: string;
  searchUrl: string;
  searchParams: Record<string, string>;
  keywordParam: string;
  /** Sort control element ids; `relevance` keeps the site's default ordering. */
  sortControls: Record<SortOrder, string | null>;
  rows: SelectorChain;
  row: {
    title: SelectorChain;
    authors: SelectorChain;
    source: SelectorChain;
    pubDate: SelectorChain;
    citeColumn: number;
    downloadColumn: number;
  };
  detail: {
    title: SelectorChain;
    authors: SelectorChain;
    organization: SelectorChain;
    abstract: SelectorChain;
    keywords: SelectorChain;
    source: SelectorChain;
    pubDate: SelectorChain;
    counters: SelectorChain;
  };
  pdf: {
    primary: SelectorChain;
    alternate: SelectorChain;
  };
  block: BlockSignals;
}

export const defaultSiteProfile = (crawl: Pick<CrawlConfig, 'baseUrl' | 'searchUrl' | 'siteDomain'>): SiteProfile => ({
  baseUrl: crawl.baseUrl,
  siteDomain: crawl.siteDomain ?? new URL(crawl.baseUrl).hostname.toLowerCase(),
  searchUrl: crawl.searchUrl,
  searchParams: { classid: 'WD0FTY92' },
  keywordParam: 'kw',
  sortControls: {
    relevance: null,
    date: 'PT',
    citedCount: 'CF',
    downloadCount: 'DFR'
  },
  rows: ['.result-table-list tbody tr', '#gridTable tbody tr'],
  row: {
    title: ['.name a', 'td.name a'],
    authors: ['.author', 'td.author'],
    source: ['.source', 'td.source'],
    pubDate: ['.date', 'td.date'],
    citeColumn: 6,
    downloadColumn: 7
  },
  detail: {
    title: ['.wx-tit h1', 'h1.title'],
    authors: ['.wx-tit h3.author', '.author'],
    organization: ['.wx-tit h3.orgn', '.orgn'],
    abstract: ['.abstract-text', '#ChDivSummary'],
    keywords: ['.keywords', 'p.keywords'],
    source: ['.top-tip a', '.sourinfo .title a'],
    pubDate: ['.head-time', '.top-tip span'],
    counters: ['.total-inform', '#DownLoadParts']
  },
  pdf: {
    primary: ['#pdfDown', 'a.btn-dlpdf'],
    alternate: ['#cajDown', 'a.btn-dlcaj', "a[href*='nhdown']"]
  },
  block: {
    markers: ['#verify-bar-box', '.verify-wrap', '.captcha-container', '.nc-container'],
    titleKeywords: ['验证', 'captcha', 'verify']
  }
});

export const buildSearchUrl = (profile: SiteProfile, keyword: string): string => {
  const url = new URL(profile.searchUrl);
  for (const [key, value] of Object.entries(profile.searchParams)) {
    url.searchParams.set(key, value);
  }
  url.searchParams.set(profile.keywordParam, keyword);
  return url.toString();
};

/** Resolves protocol-relative and site-relative links against the site host. */
export const normalizeLink = (link: string, baseUrl: string): string => {
  const trimmed = link.trim();
  if (trimmed.startsWith('//')) {
    return `https:${trimmed}`;
  }

  return new URL(trimmed, baseUrl).toString();
};

export type SiteIdentity = Pick<SiteProfile, 'baseUrl' | 'siteDomain'>;

export const isSiteLink = (link: string | undefined | null, site: SiteIdentity): boolean => {
  if (!link) {
    return false;
  }

  try {
    const host = new URL(normalizeLink(link, site.baseUrl)).hostname.toLowerCase();
    const baseHost = new URL(site.baseUrl).hostname.toLowerCase();
    return host === baseHost || host === site.siteDomain || host.endsWith(`.${site.siteDomain}`);
  } catch {
    return false;
  }
};
