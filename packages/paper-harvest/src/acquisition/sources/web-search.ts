import { isSiteLink, type SiteIdentity } from '../../crawl/site-profile.js';
import type { ScholarSearchClient } from '../../research/providers/scholar-search-client.js';
import { titleSimilarity } from '../../research/utils.js';
import { hasText, type AcquisitionRequest, type AcquisitionSource, type AttemptContext, type AttemptOutcome } from '../types.js';
import { runMirrorChain } from './mirror-chain.js';

/**
 * Full-text links listed by a web search for the title, closest title first, excluding links back to
 * the originating site.
 */
export class WebSearchSource implements AcquisitionSource {
  readonly name = 'web_search' as const;

  constructor(
    private readonly search: ScholarSearchClient,
    private readonly site: SiteIdentity,
    private readonly candidatesPerMirror: number
  ) {}

  isApplicable(request: AcquisitionRequest): boolean {
    return hasText(request.title);
  }

  async attempt(context: AttemptContext): Promise<AttemptOutcome> {
    const title = context.request.title?.trim() ?? '';

    return runMirrorChain(
      context,
      [
        {
          name: 'google_scholar',
          resolve: async () => {
            const hits = await this.search.searchTitle(title);
            return hits
              .flatMap((hit) =>
                hit.pdfUrl !== null && !isSiteLink(hit.pdfUrl, this.site)
                  ? [{ url: hit.pdfUrl, score: titleSimilarity(title, hit.title) }]
                  : []
              )
              .sort((a, b) => b.score - a.score)
              .map((candidate) => candidate.url);
          }
        }
      ],
      this.candidatesPerMirror
    );
  }
}
