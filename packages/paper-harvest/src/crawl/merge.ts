import type { ArticleDetail, DetailPage, SearchResult } from './types.js';

type NumericField = { [K in keyof SearchResult]: SearchResult[K] extends number ? K : never }[keyof SearchResult];
type TextField = Exclude<keyof SearchResult, NumericField | 'link'>;
type DetailOnlyField = Exclude<keyof ArticleDetail, keyof SearchResult>;

/**
 * Per-field precedence when a list row is enriched from its detail page. The link is always the
 * detail page URL when one was reached.
 */
export const MERGE_PRECEDENCE = {
  /** List value wins unless it is zero. */
  listCounter: ['citeCount', 'downloadCount'],
  /** Detail value wins when non-empty. */
  detailText: ['title', 'authors', 'source', 'pubDate'],
  /** The list view never carries these. */
  detailOnly: ['abstract', 'keywords', 'doi', 'organization', 'crawlTime']
} as const satisfies {
  listCounter: readonly NumericField[];
  detailText: readonly TextField[];
  detailOnly: readonly DetailOnlyField[];
};

export const mergeArticle = (result: SearchResult, detail: DetailPage): ArticleDetail => {
  const merged: ArticleDetail = {
    ...result,
    link: detail.url.length > 0 ? detail.url : result.link,
    abstract: '',
    keywords: '',
    doi: '',
    organization: '',
    crawlTime: ''
  };

  for (const field of MERGE_PRECEDENCE.listCounter) {
    merged[field] = result[field] > 0 ? result[field] : detail[field];
  }
  for (const field of MERGE_PRECEDENCE.detailText) {
    merged[field] = detail[field].trim().length > 0 ? detail[field] : result[field];
  }
  for (const field of MERGE_PRECEDENCE.detailOnly) {
    merged[field] = detail[field];
  }

  return merged;
};
