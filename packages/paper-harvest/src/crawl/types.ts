export type SortOrder = 'relevance' | 'date' | 'citedCount' | 'downloadCount';

export const SORT_ORDERS = ['relevance', 'date', 'citedCount', 'downloadCount'] as const satisfies readonly SortOrder[];

export interface SearchResult {
  title: string;
  link: string | null;
  authors: string;
  source: string;
  pubDate: string;
  citeCount: number;
  downloadCount: number;
}

export interface DetailFields {
  abstract: string;
  keywords: string;
  doi: string;
  organization: string;
  crawlTime: string;
}

/** What a detail page yields on its own, before it is merged with the list row. */
export interface DetailPage extends DetailFields {
  url: string;
  title: string;
  authors: string;
  source: string;
  pubDate: string;
  citeCount: number;
  downloadCount: number;
}

export type ArticleDetail = SearchResult & DetailFields;

/** A crawl output item: enriched when its detail page was fetched, otherwise the bare list row. */
export type ArticleRecord = SearchResult & Partial<DetailFields>;

export type CrawlerPhase = 'idle' | 'searching' | 'blocked' | 'results_parsed' | 'detail_fetching' | 'done';

export const isEnriched = (record: ArticleRecord): record is ArticleDetail => typeof record.crawlTime === 'string';
