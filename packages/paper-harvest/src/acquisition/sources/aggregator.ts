import type { OpenAlexClient } from '../../research/providers/openalex-client.js';
import type { SemanticScholarClient } from '../../research/providers/semantic-scholar-client.js';
import type { ProviderWork } from '../../research/types.js';
import { titleSimilarity } from '../../research/utils.js';
import { hasText, type AcquisitionRequest, type AcquisitionSource, type AttemptContext, type AttemptOutcome } from '../types.js';
import { runMirrorChain, type Mirror } from './mirror-chain.js';

const SEARCH_LIMIT = 5;

const matchingPdfUrls = (title: string, works: ProviderWork[], threshold: number): string[] =>
  works
    .map((work) => ({ work, score: titleSimilarity(title, work.title) }))
    .filter((item) => item.score >= threshold && item.work.pdfUrls.length > 0)
    .sort((a, b) => b.score - a.score)
    .flatMap((item) => item.work.pdfUrls);

/** Open-access locations from catalogue-wide title search. */
export class AggregatorSource implements AcquisitionSource {
  readonly name = 'aggregator' as const;

  constructor(
    private readonly openAlex: OpenAlexClient,
    private readonly semanticScholar: SemanticScholarClient,
    private readonly candidatesPerMirror: number,
    private readonly matchThreshold: number
  ) {}

  isApplicable(request: AcquisitionRequest): boolean {
    return hasText(request.title);
  }

  async attempt(context: AttemptContext): Promise<AttemptOutcome> {
    const title = context.request.title?.trim() ?? '';
    const mirrors: Mirror[] = [
      {
        name: 'openalex_search',
        resolve: async () =>
          matchingPdfUrls(title, await this.openAlex.searchWorks(title, SEARCH_LIMIT), this.matchThreshold)
      },
      {
        name: 'semantic_scholar_search',
        resolve: async () =>
          matchingPdfUrls(title, await this.semanticScholar.searchWorks(title, SEARCH_LIMIT), this.matchThreshold)
      }
    ];

    return runMirrorChain(context, mirrors, this.candidatesPerMirror);
  }
}
