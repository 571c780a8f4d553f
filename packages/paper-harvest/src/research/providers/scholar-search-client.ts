import type { WebSearchConfig } from '../../config.js';
import type { ProviderHttpClient } from '../http-client.js';
import type { PdfSearchHit } from '../types.js';
import { parseScholarResults } from './scholar-results-parser.js';

const CHALLENGE_MARKERS = [
  /detected unusual traffic/i,
  /not a robot/i,
  /accounts\.google\.com\/v3\/signin/i,
  /sorry\/index/i,
  /captcha/i
];

export type ScholarSearchSettings = Pick<WebSearchConfig, 'baseUrl' | 'language' | 'resultsPerQuery'> & {
  userAgent: string;
};

const detectChallenge = (html: string, finalUrl: string): string | null =>
  CHALLENGE_MARKERS.some((marker) => marker.test(html) || marker.test(finalUrl))
    ? 'search engine answered with a challenge page'
    : null;

/** Title search on a scholarly web search engine, reduced to the hits it lists. */
export class ScholarSearchClient {
  constructor(
    private readonly settings: ScholarSearchSettings,
    private readonly httpClient: ProviderHttpClient
  ) {}

  async searchTitle(title: string): Promise<PdfSearchHit[]> {
    const url = new URL('/scholar', this.settings.baseUrl);
    url.searchParams.set('q', title);
    url.searchParams.set('hl', this.settings.language);
    url.searchParams.set('num', String(this.settings.resultsPerQuery));

    const page = await this.httpClient.fetchPage({
      provider: 'google_scholar',
      url,
      headers: { 'user-agent': this.settings.userAgent },
      detectRefusal: detectChallenge
    });
    return parseScholarResults(page.html, page.url);
  }
}
