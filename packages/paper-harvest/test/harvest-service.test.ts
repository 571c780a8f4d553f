import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { immediatePacer } from '../src/core/pacing.js';
import { BackendRegistry } from '../src/conversion/registry.js';
import { HarvestService, projectArticle } from '../src/harvest-service.js';
import { createFakeDriverFactory, type PageResolver } from './support/fake-page-driver.js';
import { SEARCH_URL, fixture, pdfResponse, routeFetch, silentLogger, testConfig } from './support/helpers.js';

const logger = silentLogger();
const SITE_PDF = 'https://bar.example.org/download/pdfdown?id=1';
const DETAIL_TITLE = '基于深度学习的图像识别研究';

const sitePages: PageResolver = (url) =>
  url.startsWith(SEARCH_URL) ? fixture('search-results.html') : fixture('detail-page.html');

let workDir: string;

beforeEach(async () => {
  workDir = await mkdtemp(join(tmpdir(), 'service-test-'));
});

afterEach(async () => {
  await rm(workDir, { recursive: true, force: true });
});

const createService = (components: { fetchImpl?: typeof fetch; resolvePage?: PageResolver; registry?: BackendRegistry } = {}) => {
  const fake = createFakeDriverFactory(components.resolvePage ?? sitePages);
  const service = new HarvestService(testConfig({ ACQUIRE_DOWNLOAD_DIR: join(workDir, 'downloads') }), logger, {
    createDriver: fake.factory,
    fetchImpl: components.fetchImpl ?? routeFetch({}),
    pacer: immediatePacer(),
    ...(components.registry ? { registry: components.registry } : {})
  });
  return { service, drivers: fake.drivers };
};

describe('projectArticle', () => {
  it('keeps exactly the requested fields', () => {
    const record = {
      title: 'T',
      link: null,
      authors: 'A',
      source: 'S',
      pubDate: '2024-01-01',
      citeCount: 2,
      downloadCount: 0
    };

    expect(projectArticle(record, ['title', 'link', 'citeCount', 'doi'])).toEqual({
      title: 'T',
      link: null,
      citeCount: 2,
      doi: null
    });
  });
});

describe('HarvestService', () => {
  it('lists the acquisition sources in default order', () => {
    expect(createService().service.sourceNames).toEqual([
      'direct_source',
      'doi_lookup',
      'title_lookup',
      'aggregator',
      'web_search'
    ]);
  });

  it('searches, projects and exports the records', async () => {
    const { service, drivers } = createService();
    const exportPath = join(workDir, 'export', 'results.csv');

    const articles = await service.searchArticles({
      keyword: '图像识别',
      maxResults: 2,
      getDetails: false,
      fields: ['title', 'citeCount', 'doi'],
      exportPath
    });

    expect(articles).toEqual([
      { title: '图像识别方法综述', citeCount: 12, doi: null },
      { title: '卷积网络在医学影像中的应用', citeCount: 0, doi: null }
    ]);
    expect(await readFile(exportPath, 'utf8')).toBe(
      'citeCount,doi,title\n12,,图像识别方法综述\n0,,卷积网络在医学影像中的应用\n'
    );
    expect(drivers).toHaveLength(1);
    expect(drivers[0]?.closed).toBe(true);
  });

  it('opens a fresh session for every call', async () => {
    const { service, drivers } = createService();

    await service.searchArticles({ keyword: '图像识别', maxResults: 1, getDetails: false });
    await service.searchArticles({ keyword: '图像识别', maxResults: 1, getDetails: false });

    expect(drivers).toHaveLength(2);
    expect(drivers.every((driver) => driver.closed)).toBe(true);
  });

  it('returns one enriched article by index', async () => {
    const { service } = createService();

    const article = await service.getArticleInfo('图像识别', 1);

    expect(article).toMatchObject({
      title: DETAIL_TITLE,
      link: 'https://kns.example.org/kcms2/article/abstract?v=2',
      citeCount: 33,
      downloadCount: 125,
      doi: '10.16383/j.aas.c200001'
    });
  });

  it('returns null past the end of the result list and rejects a negative index', async () => {
    const { service } = createService();

    expect(await service.getArticleInfo('图像识别', 20)).toBeNull();
    await expect(service.getArticleInfo('图像识别', -1)).rejects.toThrow('index must be a non-negative integer.');
  });

  it('searches and acquires every result through the site', async () => {
    const { service } = createService({ fetchImpl: routeFetch({ [SITE_PDF]: () => pdfResponse() }) });

    const { articles, downloads } = await service.searchAndAcquire('图像识别', 2);

    expect(articles).toHaveLength(2);
    expect(downloads).toHaveLength(2);
    expect(downloads.map((download) => [download.success, download.sourceUsed])).toEqual([
      [true, 'direct_source'],
      [true, 'direct_source']
    ]);
    expect(downloads[0]?.filepath).toBe(join(workDir, 'downloads', `${DETAIL_TITLE}.pdf`));
  });

  it('reports the classification of a document it cannot read', async () => {
    const { service } = createService();
    const documentPath = join(workDir, 'missing.pdf');

    expect(await service.classify(documentPath)).toEqual({
      documentPath,
      classification: 'Unknown',
      pagesSampled: 0,
      pageCount: 0,
      metrics: null
    });
  });

  it('converts through the configured registry', async () => {
    const registry = new BackendRegistry().register({
      name: 'pdf-text',
      convert: async () => ({ success: true, imageCount: 0, backendUsed: 'pdf-text', message: 'stub conversion' })
    });
    const { service } = createService({ registry });

    expect(await service.convert(join(workDir, 'missing.pdf'))).toEqual({
      success: true,
      imageCount: 0,
      backendUsed: 'pdf-text',
      message: 'stub conversion',
      classification: 'Unknown'
    });
  });
});
