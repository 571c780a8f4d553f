import pLimit from 'p-limit';
import type { AppConfig } from './config.js';
import { HarvestError } from './core/errors.js';
import { Logger } from './core/logger.js';
import { Pacer } from './core/pacing.js';
import { AcquisitionPipeline } from './acquisition/acquisition-pipeline.js';
import { CandidateFetcher } from './acquisition/candidate-fetcher.js';
import { AggregatorSource } from './acquisition/sources/aggregator.js';
import { DirectSource } from './acquisition/sources/direct-source.js';
import { DoiLookupSource, type DoiProviders } from './acquisition/sources/doi-lookup.js';
import { TitleLookupSource } from './acquisition/sources/title-lookup.js';
import { WebSearchSource } from './acquisition/sources/web-search.js';
import type { AcquisitionRequest, AcquisitionResult, AcquisitionSource, SourceName } from './acquisition/types.js';
import { createBackendRegistry } from './conversion/backends/index.js';
import { measureSample, classify } from './conversion/classifier.js';
import type { BackendRegistry } from './conversion/registry.js';
import { ConversionRouter, type ConvertOptions, type RoutedOutcome } from './conversion/router.js';
import { DocumentSampler, type PdfSamplingCapability } from './conversion/sampler.js';
import type { DocumentClassification, SampleMetrics } from './conversion/types.js';
import { mergeArticle } from './crawl/merge.js';
import { SearchCrawler } from './crawl/search-crawler.js';
import { defaultSiteProfile, type SiteProfile } from './crawl/site-profile.js';
import type { ArticleRecord, SortOrder } from './crawl/types.js';
import { writeCsv, writeJson } from './export/records.js';
import { ProviderHttpClient } from './research/http-client.js';
import { CrossrefClient } from './research/providers/crossref-client.js';
import { OpenAlexClient } from './research/providers/openalex-client.js';
import { ScholarSearchClient } from './research/providers/scholar-search-client.js';
import { SemanticScholarClient } from './research/providers/semantic-scholar-client.js';
import { UnpaywallClient } from './research/providers/unpaywall-client.js';
import { AntiBlockDetector } from './session/anti-block-detector.js';
import { FetchSession } from './session/fetch-session.js';
import type { PageDriverFactory } from './session/page-driver.js';
import { createPlaywrightDriverFactory } from './session/playwright-driver.js';

export const ARTICLE_FIELDS = [
  'title',
  'link',
  'authors',
  'source',
  'pubDate',
  'citeCount',
  'downloadCount',
  'abstract',
  'keywords',
  'doi',
  'organization',
  'crawlTime'
] as const;

export type ArticleField = (typeof ARTICLE_FIELDS)[number];

export type ProjectedArticle = Partial<Record<ArticleField, string | number | null>>;

export interface SearchArticlesInput {
  keyword: string;
  maxResults?: number;
  sortOrder?: SortOrder;
  getDetails?: boolean;
  fields?: readonly ArticleField[];
  /** Persists the collection; `.csv` writes CSV, anything else JSON. */
  exportPath?: string;
}

export interface SearchAndAcquireResult {
  articles: ArticleRecord[];
  downloads: AcquisitionResult[];
}

export interface ClassificationReport {
  documentPath: string;
  classification: DocumentClassification;
  pagesSampled: number;
  pageCount: number;
  metrics: SampleMetrics | null;
}

export interface HarvestServiceComponents {
  createDriver: PageDriverFactory;
  fetchImpl?: typeof fetch;
  pacer?: Pacer;
  sampler?: PdfSamplingCapability;
  registry?: BackendRegistry;
}

/** Every record keeps exactly the requested fields; ones it lacks are `null`. */
export const projectArticle = (record: ArticleRecord, fields: readonly ArticleField[]): ProjectedArticle => {
  const values = new Map<string, unknown>(Object.entries(record));
  return Object.fromEntries(
    fields.map((field) => {
      const value = values.get(field);
      return [field, typeof value === 'string' || typeof value === 'number' ? value : null];
    })
  );
};

const toRequest = (record: ArticleRecord): AcquisitionRequest => ({
  ...(record.title ? { title: record.title } : {}),
  ...(record.doi ? { doi: record.doi } : {}),
  ...(record.link ? { link: record.link } : {})
});

/**
 * Entry point behind every tool. Each call runs in a fresh FetchSession that is closed when the call
 * finishes, and calls are serialized so only one session is driven at a time.
 */
export class HarvestService {
  private readonly queue = pLimit(1);
  private readonly profile: SiteProfile;
  private readonly detector: AntiBlockDetector;
  private readonly pacer: Pacer;
  private readonly providers: DoiProviders;
  private readonly semanticScholar: SemanticScholarClient;
  private readonly webSearch: ScholarSearchClient;
  private readonly fetcher: CandidateFetcher;
  private readonly sampler: PdfSamplingCapability;
  private readonly router: ConversionRouter;

  constructor(
    private readonly config: AppConfig,
    private readonly logger: Logger,
    private readonly components: HarvestServiceComponents
  ) {
    const fetchImpl = components.fetchImpl ?? fetch;
    const researchHttp = new ProviderHttpClient(config.research.requests, fetchImpl);

    this.profile = defaultSiteProfile(config.crawl);
    this.detector = new AntiBlockDetector(
      this.profile.block,
      config.browser.blockProbeTimeoutMs,
      logger.child('detector')
    );
    this.pacer = components.pacer ?? new Pacer();
    this.providers = {
      openAlex: new OpenAlexClient(config.research, researchHttp),
      unpaywall: new UnpaywallClient(config.research, researchHttp),
      crossref: new CrossrefClient(config.research, researchHttp)
    };
    this.semanticScholar = new SemanticScholarClient(config.research, researchHttp);
    this.webSearch = new ScholarSearchClient(
      { ...config.webSearch, userAgent: config.browser.userAgent },
      new ProviderHttpClient(config.webSearch.requests, fetchImpl)
    );
    this.fetcher = new CandidateFetcher(
      { ...config.acquisition, userAgent: config.browser.userAgent },
      logger.child('fetcher'),
      fetchImpl
    );

    this.sampler = components.sampler ?? new DocumentSampler(config.conversion.samplePages, logger.child('sampler'));
    const registry = components.registry ?? createBackendRegistry(config.conversion, logger, fetchImpl);
    this.router = new ConversionRouter(registry, this.sampler, config.conversion, logger.child('router'));
  }

  static fromConfig(config: AppConfig, logger: Logger): HarvestService {
    return new HarvestService(config, logger, {
      createDriver: createPlaywrightDriverFactory(config.browser, logger.child('browser'))
    });
  }

  get sourceNames(): SourceName[] {
    return this.buildSources().map((source) => source.name);
  }

  async searchArticles(input: SearchArticlesInput): Promise<Array<ArticleRecord | ProjectedArticle>> {
    const records = await this.queue(() =>
      this.withSession((session) =>
        this.crawler(session).searchAndCrawl(
          input.keyword,
          input.maxResults ?? this.config.crawl.maxResults,
          input.sortOrder ?? 'relevance',
          input.getDetails ?? true
        )
      )
    );

    const { fields } = input;
    const output = fields && fields.length > 0 ? records.map((record) => projectArticle(record, fields)) : records;

    if (input.exportPath) {
      await (input.exportPath.toLowerCase().endsWith('.csv')
        ? writeCsv(input.exportPath, output)
        : writeJson(input.exportPath, output));
      this.logger.info('Exported search results', { path: input.exportPath, count: output.length });
    }

    return output;
  }

  /** The record at `index` of the result list, enriched from its detail page when possible. */
  async getArticleInfo(
    keyword: string,
    index: number,
    sortOrder: SortOrder = 'relevance'
  ): Promise<ArticleRecord | null> {
    if (!Number.isInteger(index) || index < 0) {
      throw new HarvestError('index must be a non-negative integer.', { index });
    }

    return this.queue(() =>
      this.withSession(async (session) => {
        const crawler = this.crawler(session);
        const results = await crawler.search(keyword, index + 1, sortOrder);
        const result = results[index];
        if (!result) {
          return null;
        }
        if (!result.link) {
          return result;
        }
        const detail = await crawler.getDetail(result.link);
        return detail ? mergeArticle(result, detail) : result;
      })
    );
  }

  async acquire(request: AcquisitionRequest, sources?: readonly SourceName[]): Promise<AcquisitionResult> {
    return this.queue(() => this.withSession((session) => this.pipeline(session).acquire(request, sources)));
  }

  async acquireBatch(
    requests: AcquisitionRequest[],
    sources?: readonly SourceName[],
    stopOnFailure = false
  ): Promise<AcquisitionResult[]> {
    return this.queue(() =>
      this.withSession((session) => this.pipeline(session).acquireBatch(requests, sources, stopOnFailure))
    );
  }

  /** Crawl with details, then acquire every record in the same session. */
  async searchAndAcquire(
    keyword: string,
    maxResults: number = this.config.crawl.maxResults,
    sortOrder: SortOrder = 'relevance',
    sources?: readonly SourceName[]
  ): Promise<SearchAndAcquireResult> {
    return this.queue(() =>
      this.withSession(async (session) => {
        const articles = await this.crawler(session).searchAndCrawl(keyword, maxResults, sortOrder, true);
        const requests = articles.map(toRequest).filter((request) => request.title || request.doi);
        const downloads = await this.pipeline(session).acquireBatch(requests, sources);
        return { articles, downloads };
      })
    );
  }

  async classify(documentPath: string): Promise<ClassificationReport> {
    const sample = await this.sampler.sample(documentPath);
    return {
      documentPath,
      classification: classify(sample, this.config.conversion),
      pagesSampled: sample?.pagesSampled ?? 0,
      pageCount: sample?.pageCount ?? 0,
      metrics: sample ? measureSample(sample.text, this.config.conversion.repeatRunLength) : null
    };
  }

  async convert(documentPath: string, options: ConvertOptions = {}): Promise<RoutedOutcome> {
    return this.queue(() => this.router.convert(documentPath, options));
  }

  private crawler(session: FetchSession): SearchCrawler {
    return new SearchCrawler(
      session,
      this.detector,
      this.profile,
      this.config.crawl,
      this.pacer,
      this.logger.child('crawler')
    );
  }

  private pipeline(session: FetchSession): AcquisitionPipeline {
    return new AcquisitionPipeline({
      session,
      fetcher: this.fetcher,
      sources: this.buildSources(),
      settings: this.config.acquisition,
      pacer: this.pacer,
      logger: this.logger.child('pipeline')
    });
  }

  private buildSources(): AcquisitionSource[] {
    const { candidatesPerMirror, titleMatchThreshold } = this.config.acquisition;
    return [
      new DirectSource(this.profile, this.detector, this.pacer, this.config.crawl),
      new DoiLookupSource(this.providers, candidatesPerMirror),
      new TitleLookupSource(this.providers, candidatesPerMirror, titleMatchThreshold),
      new AggregatorSource(this.providers.openAlex, this.semanticScholar, candidatesPerMirror, titleMatchThreshold),
      new WebSearchSource(this.webSearch, this.profile, candidatesPerMirror)
    ];
  }

  private async withSession<T>(work: (session: FetchSession) => Promise<T>): Promise<T> {
    const session = new FetchSession(this.components.createDriver, this.config.browser, this.logger.child('session'));
    try {
      return await work(session);
    } finally {
      await session.close();
    }
  }
}
