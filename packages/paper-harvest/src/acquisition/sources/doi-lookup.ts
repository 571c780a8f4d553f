import type { CrossrefClient } from '../../research/providers/crossref-client.js';
import type { OpenAlexClient } from '../../research/providers/openalex-client.js';
import type { UnpaywallClient } from '../../research/providers/unpaywall-client.js';
import { hasText, type AcquisitionRequest, type AcquisitionSource, type AttemptContext, type AttemptOutcome } from '../types.js';
import { runMirrorChain, type Mirror } from './mirror-chain.js';

export interface DoiProviders {
  openAlex: OpenAlexClient;
  unpaywall: UnpaywallClient;
  crossref: CrossrefClient;
}

/** OpenAlex, then Unpaywall when a contact email is configured, then Crossref full-text links. */
export const doiMirrors = ({ openAlex, unpaywall, crossref }: DoiProviders, doi: string): Mirror[] => {
  const mirrors: Mirror[] = [
    {
      name: 'openalex',
      resolve: async () => (await openAlex.getWorkByDoi(doi))?.pdfUrls ?? []
    }
  ];

  if (unpaywall.configured) {
    mirrors.push({
      name: 'unpaywall',
      resolve: async () => (await unpaywall.getWorkByDoi(doi))?.pdfUrls ?? []
    });
  }

  mirrors.push({
    name: 'crossref',
    resolve: async () => (await crossref.getWorkByDoi(doi))?.pdfUrls ?? []
  });

  return mirrors;
};

export class DoiLookupSource implements AcquisitionSource {
  readonly name = 'doi_lookup' as const;

  constructor(
    private readonly providers: DoiProviders,
    private readonly candidatesPerMirror: number
  ) {}

  isApplicable(request: AcquisitionRequest): boolean {
    return hasText(request.doi);
  }

  async attempt(context: AttemptContext): Promise<AttemptOutcome> {
    const doi = context.request.doi?.trim() ?? '';
    return runMirrorChain(context, doiMirrors(this.providers, doi), this.candidatesPerMirror);
  }
}
