import { z } from 'zod';
import type { ResearchConfig } from '../../config.js';
import type { ProviderHttpClient } from '../http-client.js';
import { uniqueUrls, type ProviderWork } from '../types.js';
import { normalizeDoi } from '../utils.js';

const searchSchema = z.object({
  data: z
    .array(
      z.object({
        paperId: z.string().nullish(),
        title: z.string().nullish(),
        externalIds: z.record(z.union([z.string(), z.number()])).nullish(),
        openAccessPdf: z
          .object({
            url: z.string().nullish()
          })
          .nullish()
      })
    )
    .nullish()
});

export type SemanticScholarSettings = Pick<ResearchConfig, 'semanticScholarBaseUrl' | 'semanticScholarApiKey'>;

export class SemanticScholarClient {
  constructor(
    private readonly settings: SemanticScholarSettings,
    private readonly httpClient: ProviderHttpClient
  ) {}

  async searchWorks(query: string, limit: number): Promise<ProviderWork[]> {
    const baseUrl = this.settings.semanticScholarBaseUrl;
    const url = new URL('paper/search', baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`);

    url.searchParams.set('query', query);
    url.searchParams.set('limit', String(limit));
    url.searchParams.set('fields', 'paperId,title,externalIds,openAccessPdf');

    const headers: Record<string, string> = {};
    if (this.settings.semanticScholarApiKey) {
      headers['x-api-key'] = this.settings.semanticScholarApiKey;
    }

    const payload = await this.httpClient.fetchJson({
      provider: 'semantic_scholar',
      url,
      schema: searchSchema,
      headers
    });

    return (payload.data ?? []).map((item): ProviderWork => {
      const rawDoi = item.externalIds?.DOI;
      const pdfUrls = uniqueUrls([item.openAccessPdf?.url]);
      return {
        provider: 'semantic_scholar',
        providerId: item.paperId ?? `semantic:${item.title ?? 'unknown'}`,
        title: item.title ?? 'Untitled',
        doi: normalizeDoi(typeof rawDoi === 'string' ? rawDoi : null),
        pdfUrls
      };
    });
  }
}
