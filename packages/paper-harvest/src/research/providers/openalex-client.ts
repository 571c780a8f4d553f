import { z } from 'zod';
import type { ResearchConfig } from '../../config.js';
import { ProviderError } from '../../core/errors.js';
import type { ProviderHttpClient } from '../http-client.js';
import { uniqueUrls, type ProviderWork } from '../types.js';
import { normalizeDoi } from '../utils.js';

const locationSchema = z
  .object({
    pdf_url: z.string().nullish()
  })
  .nullish();

const workSchema = z.object({
  id: z.string().nullish(),
  display_name: z.string().nullish(),
  doi: z.string().nullish(),
  primary_location: locationSchema,
  best_oa_location: locationSchema,
  locations: z.array(locationSchema).nullish()
});

const searchSchema = z.object({
  results: z.array(workSchema).nullish()
});

type OpenAlexWork = z.infer<typeof workSchema>;

export type OpenAlexSettings = Pick<ResearchConfig, 'openAlexBaseUrl' | 'openAlexApiKey'>;

export class OpenAlexClient {
  constructor(
    private readonly settings: OpenAlexSettings,
    private readonly httpClient: ProviderHttpClient
  ) {}

  async searchWorks(query: string, limit: number): Promise<ProviderWork[]> {
    const url = this.buildUrl('/works');
    url.searchParams.set('search', query);
    url.searchParams.set('per-page', String(limit));

    const payload = await this.httpClient.fetchJson({ provider: 'openalex', url, schema: searchSchema });
    return (payload.results ?? []).map((item) => this.mapWork(item));
  }

  /** Resolves to null when OpenAlex has no record of the DOI. */
  async getWorkByDoi(doi: string): Promise<ProviderWork | null> {
    const normalizedDoi = normalizeDoi(doi);
    if (!normalizedDoi) {
      return null;
    }

    const url = this.buildUrl(`/works/${encodeURIComponent(`https://doi.org/${normalizedDoi}`)}`);

    try {
      const payload = await this.httpClient.fetchJson({ provider: 'openalex', url, schema: workSchema });
      return this.mapWork(payload);
    } catch (error) {
      if (error instanceof ProviderError && error.status === 404) {
        return null;
      }
      throw error;
    }
  }

  private buildUrl(path: string): URL {
    const url = new URL(path, this.settings.openAlexBaseUrl);
    if (this.settings.openAlexApiKey) {
      url.searchParams.set('api_key', this.settings.openAlexApiKey);
    }
    return url;
  }

  private mapWork(item: OpenAlexWork): ProviderWork {
    const pdfUrls = uniqueUrls([
      item.best_oa_location?.pdf_url,
      item.primary_location?.pdf_url,
      ...(item.locations ?? []).map((location) => location?.pdf_url)
    ]);

    return {
      provider: 'openalex',
      providerId: item.id ?? `openalex:${item.display_name ?? 'unknown'}`,
      title: item.display_name ?? 'Untitled',
      doi: normalizeDoi(item.doi),
      pdfUrls
    };
  }
}
