import { z } from 'zod';
import type { ResearchConfig } from '../../config.js';
import { ConfigurationMissingError, ProviderError } from '../../core/errors.js';
import type { ProviderHttpClient } from '../http-client.js';
import { uniqueUrls, type ProviderWork } from '../types.js';
import { normalizeDoi } from '../utils.js';

const locationSchema = z.object({
  url_for_pdf: z.string().nullish(),
  url: z.string().nullish()
});

const workSchema = z.object({
  doi: z.string().nullish(),
  title: z.string().nullish(),
  best_oa_location: locationSchema.nullish(),
  oa_locations: z.array(locationSchema).nullish()
});

export type UnpaywallSettings = Pick<ResearchConfig, 'unpaywallBaseUrl' | 'contactEmail'>;

/** Unpaywall requires a contact email on every request. */
export class UnpaywallClient {
  constructor(
    private readonly settings: UnpaywallSettings,
    private readonly httpClient: ProviderHttpClient
  ) {}

  get configured(): boolean {
    return Boolean(this.settings.contactEmail);
  }

  async getWorkByDoi(doi: string): Promise<ProviderWork | null> {
    const email = this.settings.contactEmail;
    if (!email) {
      throw new ConfigurationMissingError('RESEARCH_UNPAYWALL_EMAIL');
    }

    const normalizedDoi = normalizeDoi(doi);
    if (!normalizedDoi) {
      return null;
    }

    const baseUrl = this.settings.unpaywallBaseUrl;
    const url = new URL(encodeURIComponent(normalizedDoi), baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`);
    url.searchParams.set('email', email);

    try {
      const payload = await this.httpClient.fetchJson({ provider: 'unpaywall', url, schema: workSchema });
      const pdfUrls = uniqueUrls([
        payload.best_oa_location?.url_for_pdf,
        ...(payload.oa_locations ?? []).map((location) => location.url_for_pdf)
      ]);

      return {
        provider: 'unpaywall',
        providerId: `unpaywall:${normalizedDoi}`,
        title: payload.title ?? 'Untitled',
        doi: normalizeDoi(payload.doi) ?? normalizedDoi,
        pdfUrls
      };
    } catch (error) {
      if (error instanceof ProviderError && error.status === 404) {
        return null;
      }
      throw error;
    }
  }
}
