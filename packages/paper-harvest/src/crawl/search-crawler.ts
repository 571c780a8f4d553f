import type { CrawlConfig } from '../config.js';
import { HarvestError } from '../core/errors.js';
import { describeError, Logger } from '../core/logger.js';
import type { Pacer } from '../core/pacing.js';
import type { AntiBlockDetector } from '../session/anti-block-detector.js';
import type { FetchSession } from '../session/fetch-session.js';
import { mergeArticle } from './merge.js';
import { parseDetailPage, parseResultRows } from './page-parser.js';
import { buildSearchUrl, normalizeLink, type SiteProfile } from './site-profile.js';
import type { ArticleRecord, CrawlerPhase, DetailPage, SearchResult, SortOrder } from './types.js';

export type CrawlTiming = Pick<
  CrawlConfig,
  'requestDelayMs' | 'requestJitterMs' | 'settleDelayMs' | 'resultsTimeoutMs' | 'maxResults'
>;

const FALLBACK_ROWS_TIMEOUT_RATIO = 0.5;

/**
 * Search → enumerate → per-item detail crawl over one FetchSession. Every step checks the session's
 * block state first; once blocked, remaining work returns what it already has.
 */
export class SearchCrawler {
  private currentPhase: CrawlerPhase = 'idle';

  constructor(
    private readonly session: FetchSession,
    private readonly detector: AntiBlockDetector,
    private readonly profile: SiteProfile,
    private readonly timing: CrawlTiming,
    private readonly pacer: Pacer,
    private readonly logger: Logger,
    private readonly clock: () => Date = () => new Date()
  ) {}

  get phase(): CrawlerPhase {
    return this.currentPhase;
  }

  async search(
    keyword: string,
    maxResults: number = this.timing.maxResults,
    sortOrder: SortOrder = 'relevance'
  ): Promise<SearchResult[]> {
    const query = keyword.trim();
    if (query.length === 0) {
      throw new HarvestError('Search keyword must not be empty.');
    }
    if (!Number.isInteger(maxResults) || maxResults < 1) {
      throw new HarvestError('maxResults must be a positive integer.', { maxResults });
    }

    if (this.session.blocked) {
      this.currentPhase = 'blocked';
      return [];
    }

    this.currentPhase = 'searching';
    const url = buildSearchUrl(this.profile, query);
    this.logger.info('Searching', { keyword: query, maxResults, sortOrder, url });

    let html: string | null;
    try {
      html = await this.loadResultsPage(query, url, sortOrder);
    } catch (error) {
      this.logger.warn('Search page could not be read', { keyword: query, error: describeError(error) });
      html = null;
    }
    if (html === null) {
      this.currentPhase = this.session.blocked ? 'blocked' : 'done';
      return [];
    }

    const parsed = parseResultRows(html, this.profile, maxResults);
    if (parsed.skipped > 0) {
      this.logger.debug('Skipped unreadable result rows', { skipped: parsed.skipped });
    }

    this.currentPhase = 'results_parsed';
    this.logger.info('Parsed search results', {
      keyword: query,
      rows: parsed.totalRows,
      returned: parsed.results.length
    });
    return parsed.results;
  }

  async getDetail(link: string): Promise<DetailPage | null> {
    if (this.session.blocked) {
      return null;
    }

    let url: string;
    try {
      url = normalizeLink(link, this.profile.baseUrl);
    } catch {
      this.logger.warn('Detail link could not be resolved', { link });
      return null;
    }

    try {
      if (!(await this.session.navigate(url))) {
        return null;
      }

      await this.pacer.pause(this.timing.requestDelayMs, this.timing.requestJitterMs);

      if (await this.detector.check(this.session)) {
        this.logger.warn('Detail page is a verification page', { url });
        return null;
      }

      return parseDetailPage(await this.session.html(), this.profile, url, this.clock().toISOString());
    } catch (error) {
      this.logger.warn('Detail page could not be read', { url, error: describeError(error) });
      return null;
    }
  }

  /**
   * Runs `search`, then enriches each row from its detail page. When the session becomes blocked the
   * unfetched rows are appended as they are and enrichment stops.
   */
  async searchAndCrawl(
    keyword: string,
    maxResults: number = this.timing.maxResults,
    sortOrder: SortOrder = 'relevance',
    getDetails = true
  ): Promise<ArticleRecord[]> {
    const results = await this.search(keyword, maxResults, sortOrder);
    if (!getDetails || this.session.blocked) {
      this.currentPhase = this.session.blocked ? 'blocked' : 'done';
      return results;
    }

    this.currentPhase = 'detail_fetching';
    const records: ArticleRecord[] = [];

    for (const [index, result] of results.entries()) {
      if (this.session.blocked) {
        this.logger.warn('Blocked during detail crawl; returning remaining rows unenriched', {
          enriched: index,
          remaining: results.length - index
        });
        records.push(...results.slice(index));
        break;
      }

      if (!result.link) {
        records.push(result);
        continue;
      }

      this.logger.debug('Fetching detail', { index: index + 1, total: results.length });
      const detail = await this.getDetail(result.link);
      records.push(detail ? mergeArticle(result, detail) : result);

      if (index < results.length - 1 && !this.session.blocked) {
        await this.pacer.pause(this.timing.requestDelayMs, this.timing.requestJitterMs);
      }
    }

    this.currentPhase = this.session.blocked ? 'blocked' : 'done';
    return records;
  }

  /** Markup of the loaded result list, or null when the page did not load or is a verification page. */
  private async loadResultsPage(query: string, url: string, sortOrder: SortOrder): Promise<string | null> {
    if (!(await this.session.navigate(url))) {
      return null;
    }

    await this.pacer.pause(this.timing.requestDelayMs, this.timing.requestJitterMs);

    if (await this.detector.check(this.session)) {
      this.logger.warn('Search page is a verification page', { keyword: query });
      return null;
    }

    await this.pacer.wait(this.timing.settleDelayMs);
    await this.applySortOrder(sortOrder);

    const rowsReady =
      (await this.session.findElement(this.profile.rows[0] ?? '', this.timing.resultsTimeoutMs)) ||
      (await this.session.findElement(
        this.profile.rows[1] ?? '',
        Math.round(this.timing.resultsTimeoutMs * FALLBACK_ROWS_TIMEOUT_RATIO)
      ));
    if (!rowsReady) {
      this.logger.warn('No result rows appeared', { keyword: query });
    }

    return this.session.html();
  }

  private async applySortOrder(sortOrder: SortOrder): Promise<void> {
    const controlId = this.profile.sortControls[sortOrder];
    if (!controlId) {
      return;
    }

    for (const selector of [`#orderList li#${controlId}`, `#${controlId}`]) {
      if (await this.session.click(selector)) {
        await this.pacer.wait(this.timing.settleDelayMs);
        this.logger.debug('Applied sort order', { sortOrder });
        return;
      }
    }

    this.logger.warn('Sort control not found; keeping default ordering', { sortOrder });
  }
}
