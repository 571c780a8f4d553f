import { load, type CheerioAPI } from 'cheerio';
import type { SelectorChain, SiteProfile } from './site-profile.js';
import type { DetailPage, SearchResult } from './types.js';

const TEXT_WHITESPACE = /\s+/g;
const LABELLED_DOI = /DOI\s*[：:]\s*(10\.\d{4,}\/[^\s<>"']+)/i;
const BARE_DOI = /10\.\d{4,}\/[^\s<>"']+/;
const DOI_TRAILING = /["'.,;)]+$/;

type Context = Parameters<CheerioAPI>[1];

const normalizeText = (value: string): string => value.replace(TEXT_WHITESPACE, ' ').trim();

const parseCounter = (value: string): number => {
  const text = normalizeText(value);
  return /^\d+$/.test(text) ? Number.parseInt(text, 10) : 0;
};

const selectAll = ($: CheerioAPI, chain: SelectorChain, context?: Context) => {
  for (const selector of chain) {
    const nodes = $(selector, context);
    if (nodes.length > 0) {
      return nodes;
    }
  }

  return null;
};

const firstMatch = ($: CheerioAPI, chain: SelectorChain, context?: Context) =>
  selectAll($, chain, context)?.first() ?? null;

const textOf = ($: CheerioAPI, chain: SelectorChain, context?: Context): string => {
  const node = firstMatch($, chain, context);
  return node ? normalizeText(node.text()) : '';
};

export interface ParsedRows {
  results: SearchResult[];
  totalRows: number;
  skipped: number;
}

/**
 * Reads result rows from a search page. A row without a title anchor is skipped; the remaining
 * rows are still read.
 */
export const parseResultRows = (html: string, profile: SiteProfile, maxResults: number): ParsedRows => {
  const $ = load(html);
  const rows = selectAll($, profile.rows)?.toArray() ?? [];

  const results: SearchResult[] = [];
  let skipped = 0;

  for (const row of rows) {
    if (results.length >= maxResults) {
      break;
    }

    const anchor = firstMatch($, profile.row.title, row);
    const title = anchor ? normalizeText(anchor.text()) : '';
    if (!anchor || title.length === 0) {
      skipped += 1;
      continue;
    }

    const cells = $('td', row).toArray();
    const cellText = (index: number): string => {
      const cell = cells[index];
      return cell ? $(cell).text() : '';
    };

    results.push({
      title,
      link: anchor.attr('href')?.trim() || null,
      authors: textOf($, profile.row.authors, row),
      source: textOf($, profile.row.source, row),
      pubDate: textOf($, profile.row.pubDate, row),
      citeCount: parseCounter(cellText(profile.row.citeColumn)),
      downloadCount: parseCounter(cellText(profile.row.downloadColumn))
    });
  }

  return { results, totalRows: rows.length, skipped };
};

/** Labelled `DOI:` occurrences win over a bare DOI-shaped token anywhere in the markup. */
export const extractDoi = (markup: string): string => {
  const labelled = markup.match(LABELLED_DOI)?.[1];
  const candidate = labelled ?? markup.match(BARE_DOI)?.[0];
  return candidate ? candidate.replace(DOI_TRAILING, '') : '';
};

const counterAfter = (text: string, labels: string[]): number => {
  for (const label of labels) {
    const match = text.match(new RegExp(`${label}\\s*[：:]?\\s*[(（]?\\s*(\\d+)`));
    const digits = match?.[1];
    if (digits) {
      return Number.parseInt(digits, 10);
    }
  }

  return 0;
};

const cleanKeywords = (value: string): string =>
  value
    .replace(/^(关键词|Keywords)\s*[：:]\s*/i, '')
    .split(/[;；]/)
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
    .join('; ');

const cleanAbstract = (value: string): string => value.replace(/^(摘要|Abstract)\s*[：:]\s*/i, '');

export const parseDetailPage = (html: string, profile: SiteProfile, url: string, crawlTime: string): DetailPage => {
  const $ = load(html);
  const counters = textOf($, profile.detail.counters);

  return {
    url,
    title: textOf($, profile.detail.title),
    authors: textOf($, profile.detail.authors),
    organization: textOf($, profile.detail.organization),
    abstract: cleanAbstract(textOf($, profile.detail.abstract)),
    keywords: cleanKeywords(textOf($, profile.detail.keywords)),
    source: textOf($, profile.detail.source),
    pubDate: textOf($, profile.detail.pubDate),
    citeCount: counterAfter(counters, ['被引', 'Cited']),
    downloadCount: counterAfter(counters, ['下载', 'Downloads']),
    doi: extractDoi(html),
    crawlTime
  };
};

/** The site serves the same document as PDF when the CAJ download flag is swapped. */
const toPdfVariant = (url: string): string => url.replace(/nhdown/gi, 'pdfdown').replace(/cajdown/gi, 'pdfdown');

/** PDF link discovery on a detail page: primary button, then the alternate format rewritten to PDF. */
export const findPdfLink = (html: string, profile: SiteProfile, pageUrl: string): string | null => {
  const $ = load(html);
  const resolve = (href: string | undefined): string | null => {
    if (!href || href.startsWith('javascript:')) {
      return null;
    }
    try {
      return new URL(href, pageUrl).toString();
    } catch {
      return null;
    }
  };

  const primary = resolve(firstMatch($, profile.pdf.primary)?.attr('href'));
  if (primary) {
    return primary;
  }

  const alternate = resolve(firstMatch($, profile.pdf.alternate)?.attr('href'));
  if (alternate) {
    return toPdfVariant(alternate);
  }

  const hrefs = $('a[href]')
    .toArray()
    .map((element) => $(element).attr('href'));
  const scanned = hrefs.find((href) => typeof href === 'string' && /\.pdf(?:$|[?#])|pdfdown/i.test(href));
  if (scanned) {
    return resolve(scanned);
  }

  const variant = resolve(hrefs.find((href) => typeof href === 'string' && /nhdown|cajdown/i.test(href)));
  return variant ? toPdfVariant(variant) : null;
};
