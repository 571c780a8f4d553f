import { z } from 'zod';
import type { ResearchConfig } from '../../config.js';
import { ProviderError } from '../../core/errors.js';
import type { ProviderHttpClient } from '../http-client.js';
import { uniqueUrls, type ProviderWork } from '../types.js';
import { normalizeDoi } from '../utils.js';

const itemSchema = z.object({
  DOI: z.string().nullish(),
  title: z.array(z.string()).nullish(),
  URL: z.string().nullish(),
  link: z
    .array(
      z.object({
        URL: z.string().nullish(),
        'content-type': z.string().nullish()
      })
    )
    .nullish()
});

const searchSchema = z.object({
  message: z
    .object({
      items: z.array(itemSchema).nullish()
    })
    .nullish()
});

const workSchema = z.object({
  message: itemSchema
});

type CrossrefItem = z.infer<typeof itemSchema>;

export type CrossrefSettings = Pick<ResearchConfig, 'crossrefBaseUrl' | 'contactEmail'>;

/** The DOI registration agency's API: bibliographic search and per-DOI full-text links. */
export class CrossrefClient {
  constructor(
    private readonly settings: CrossrefSettings,
    private readonly httpClient: ProviderHttpClient
  ) {}

  async searchWorks(query: string, limit: number): Promise<ProviderWork[]> {
    const url = this.buildUrl('/works');
    url.searchParams.set('query.bibliographic', query);
    url.searchParams.set('rows', String(limit));

    const payload = await this.httpClient.fetchJson({ provider: 'crossref', url, schema: searchSchema });
    return (payload.message?.items ?? []).map((item) => this.mapItem(item));
  }

  async getWorkByDoi(doi: string): Promise<ProviderWork | null> {
    const normalizedDoi = normalizeDoi(doi);
    if (!normalizedDoi) {
      return null;
    }

    const url = this.buildUrl(`/works/${encodeURIComponent(normalizedDoi)}`);
    try {
      const payload = await this.httpClient.fetchJson({ provider: 'crossref', url, schema: workSchema });
      return this.mapItem(payload.message);
    } catch (error) {
      if (error instanceof ProviderError && error.status === 404) {
        return null;
      }
      throw error;
    }
  }

  private buildUrl(path: string): URL {
    const url = new URL(path, this.settings.crossrefBaseUrl);
    if (this.settings.contactEmail) {
      url.searchParams.set('mailto', this.settings.contactEmail);
    }
    return url;
  }

  private mapItem(item: CrossrefItem): ProviderWork {
    const doi = normalizeDoi(item.DOI);
    const pdfUrls = uniqueUrls(
      (item.link ?? []).filter((link) => (link['content-type'] ?? '').includes('pdf')).map((link) => link.URL)
    );

    return {
      provider: 'crossref',
      providerId: doi ? `doi:${doi}` : `crossref:${item.URL ?? 'unknown'}`,
      title: item.title?.[0] ?? 'Untitled',
      doi,
      pdfUrls
    };
  }
}
