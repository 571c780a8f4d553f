import { describe, expect, it } from 'vitest';
import { MERGE_PRECEDENCE, mergeArticle } from '../src/crawl/merge.js';
import { extractDoi, findPdfLink, parseDetailPage, parseResultRows } from '../src/crawl/page-parser.js';
import { buildSearchUrl, defaultSiteProfile, isSiteLink, normalizeLink } from '../src/crawl/site-profile.js';
import { BASE_URL, SEARCH_URL, fixture } from './support/helpers.js';

const profile = defaultSiteProfile({ baseUrl: BASE_URL, searchUrl: SEARCH_URL });
const DETAIL_URL = `${BASE_URL}/kcms2/article/abstract?v=1`;

describe('site-profile', () => {
  it('builds the search url with the fixed parameters and the keyword', () => {
    expect(buildSearchUrl(profile, '深度学习')).toBe(
      `${SEARCH_URL}?classid=WD0FTY92&kw=${encodeURIComponent('深度学习')}`
    );
  });

  it('resolves protocol-relative and site-relative links against the site host', () => {
    expect(normalizeLink('//bar.example.org/a?id=1', BASE_URL)).toBe('https://bar.example.org/a?id=1');
    expect(normalizeLink(' /kcms2/article/abstract?v=2 ', BASE_URL)).toBe(`${BASE_URL}/kcms2/article/abstract?v=2`);
  });

  it('recognises links on the site host', () => {
    expect(profile.siteDomain).toBe('kns.example.org');
    expect(isSiteLink(`${BASE_URL}/kcms2/article/abstract?v=1`, profile)).toBe(true);
    expect(isSiteLink('/kcms2/article/abstract?v=1', profile)).toBe(true);
    expect(isSiteLink('//bar.example.org/download', profile)).toBe(false);
    expect(isSiteLink('https://publisher.example.com/article/1', profile)).toBe(false);
    expect(isSiteLink(undefined, profile)).toBe(false);
  });

  it('recognises subdomains of a configured site domain only', () => {
    const site = defaultSiteProfile({ baseUrl: BASE_URL, searchUrl: SEARCH_URL, siteDomain: 'example.org' });
    expect(isSiteLink('//bar.example.org/download', site)).toBe(true);
    expect(isSiteLink('https://example.org/a', site)).toBe(true);
    expect(isSiteLink('https://notexample.org/a', site)).toBe(false);

    const campus = defaultSiteProfile({ baseUrl: 'https://kns.foo.edu.cn', searchUrl: 'https://kns.foo.edu.cn/search' });
    expect(isSiteLink('https://bar.foo.edu.cn/download', campus)).toBe(false);
    expect(isSiteLink('https://www.other.edu.cn/paper.pdf', campus)).toBe(false);
  });
});

describe('parseResultRows', () => {
  it('stops at the requested maximum', () => {
    const parsed = parseResultRows(fixture('search-results.html'), profile, 5);

    expect(parsed.totalRows).toBe(7);
    expect(parsed.results).toHaveLength(5);
    expect(parsed.results[0]).toEqual({
      title: '图像识别方法综述',
      link: '/kcms2/article/abstract?v=1',
      authors: '王一',
      source: '计算机学报',
      pubDate: '2023-05-12',
      citeCount: 12,
      downloadCount: 340
    });
  });

  it('reads an empty counter cell as zero', () => {
    const parsed = parseResultRows(fixture('search-results.html'), profile, 2);
    expect(parsed.results[1]).toMatchObject({ citeCount: 0, downloadCount: 125 });
  });

  it('skips a row without a title and keeps reading', () => {
    const html = `<table class="result-table-list"><tbody>
      <tr><td>1</td><td class="name"></td><td class="author">A</td></tr>
      <tr><td>2</td><td class="name"><a href="/x?v=2">Second</a></td><td class="author">B</td></tr>
    </tbody></table>`;
    const parsed = parseResultRows(html, profile, 10);

    expect(parsed.skipped).toBe(1);
    expect(parsed.results.map((result) => result.title)).toEqual(['Second']);
  });

  it('falls back to the alternate row selector', () => {
    const html = `<table id="gridTable"><tbody>
      <tr><td>1</td><td class="name"><a href="/x?v=9">Grid row</a></td></tr>
    </tbody></table>`;
    expect(parseResultRows(html, profile, 10).results[0]?.title).toBe('Grid row');
  });
});

describe('parseDetailPage', () => {
  it('extracts every detail field', () => {
    const detail = parseDetailPage(fixture('detail-page.html'), profile, DETAIL_URL, '2024-05-01T08:00:00.000Z');

    expect(detail).toEqual({
      url: DETAIL_URL,
      title: '基于深度学习的图像识别研究',
      authors: '张三 李四',
      organization: '示例大学计算机学院',
      abstract: '本文提出一种图像识别方法。',
      keywords: '深度学习; 图像识别; 卷积网络',
      source: '计算机学报',
      pubDate: '2023-05-12',
      citeCount: 33,
      downloadCount: 1520,
      doi: '10.16383/j.aas.c200001',
      crawlTime: '2024-05-01T08:00:00.000Z'
    });
  });

  it('leaves missing fields empty', () => {
    const detail = parseDetailPage('<html><body><h1 class="title">Only a title</h1></body></html>', profile, DETAIL_URL, 't');

    expect(detail).toMatchObject({ title: 'Only a title', abstract: '', keywords: '', doi: '', citeCount: 0 });
  });
});

describe('extractDoi', () => {
  it('prefers a labelled DOI', () => {
    expect(extractDoi('<p>ref 10.9999/other</p><p>DOI: 10.1234/abc.def</p>')).toBe('10.1234/abc.def');
  });

  it('trims trailing punctuation from a bare DOI', () => {
    expect(extractDoi('see https://doi.org/10.1000/xyz123.')).toBe('10.1000/xyz123');
  });

  it('requires at least four registrant digits', () => {
    expect(extractDoi('version 10.12/abc')).toBe('');
  });
});

describe('findPdfLink', () => {
  it('uses the primary PDF button', () => {
    expect(findPdfLink(fixture('detail-page.html'), profile, DETAIL_URL)).toBe(
      'https://bar.example.org/download/pdfdown?id=1'
    );
  });

  it('rewrites the alternate format link to its PDF form', () => {
    const html = '<a id="cajDown" href="https://bar.example.org/download/nhdown?id=2">CAJ</a>';
    expect(findPdfLink(html, profile, DETAIL_URL)).toBe('https://bar.example.org/download/pdfdown?id=2');
  });

  it('scans the markup for a PDF link when no button exists', () => {
    const html = '<a href="/help">Help</a><a href="/files/paper.pdf?sig=1">Full text</a>';
    expect(findPdfLink(html, profile, DETAIL_URL)).toBe(`${BASE_URL}/files/paper.pdf?sig=1`);
  });

  it('returns null when the page offers no download', () => {
    expect(findPdfLink('<a href="/help">Help</a><a href="javascript:login()">Sign in</a>', profile, DETAIL_URL)).toBeNull();
  });
});

describe('mergeArticle', () => {
  it('keeps non-zero list counters and takes other fields from the detail page', () => {
    const [row] = parseResultRows(fixture('search-results.html'), profile, 1).results;
    if (!row) {
      throw new Error('fixture has no rows');
    }
    const detail = parseDetailPage(fixture('detail-page.html'), profile, DETAIL_URL, '2024-05-01T08:00:00.000Z');
    const merged = mergeArticle({ ...row, downloadCount: 0 }, detail);

    expect(merged.citeCount).toBe(12);
    expect(merged.downloadCount).toBe(1520);
    expect(merged.title).toBe('基于深度学习的图像识别研究');
    expect(merged.link).toBe(DETAIL_URL);
    expect(merged.doi).toBe('10.16383/j.aas.c200001');
  });

  it('keeps list values when the detail page has none', () => {
    const detail = parseDetailPage('<html></html>', profile, '', 't');
    const merged = mergeArticle(
      {
        title: 'List title',
        link: '/x?v=1',
        authors: 'A',
        source: 'S',
        pubDate: '2020',
        citeCount: 0,
        downloadCount: 3
      },
      detail
    );

    expect(merged).toMatchObject({ title: 'List title', link: '/x?v=1', authors: 'A', citeCount: 0, downloadCount: 3 });
  });

  it('assigns every field except the link to exactly one precedence rule', () => {
    const ruled = [...MERGE_PRECEDENCE.listCounter, ...MERGE_PRECEDENCE.detailText, ...MERGE_PRECEDENCE.detailOnly];
    const detail = parseDetailPage('<html></html>', profile, '', 't');
    const merged = mergeArticle(
      { title: 'T', link: null, authors: '', source: '', pubDate: '', citeCount: 0, downloadCount: 0 },
      detail
    );

    expect(new Set(ruled).size).toBe(ruled.length);
    expect([...ruled, 'link'].sort()).toEqual(Object.keys(merged).sort());
  });
});
