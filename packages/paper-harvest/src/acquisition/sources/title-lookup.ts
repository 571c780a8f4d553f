import { classifyFailure } from '../../core/errors.js';
import { describeError } from '../../core/logger.js';
import type { ProviderWork } from '../../research/types.js';
import { titleSimilarity } from '../../research/utils.js';
import { hasText, type AcquisitionRequest, type AcquisitionSource, type AttemptContext, type AttemptOutcome } from '../types.js';
import { doiMirrors, type DoiProviders } from './doi-lookup.js';
import { runMirrorChain } from './mirror-chain.js';

const SEARCH_ROWS = 5;

export const bestTitleMatch = (title: string, works: ProviderWork[], threshold: number): ProviderWork | null => {
  let best: { work: ProviderWork; score: number } | null = null;
  for (const work of works) {
    const score = titleSimilarity(title, work.title);
    if (score >= threshold && (!best || score > best.score)) {
      best = { work, score };
    }
  }
  return best?.work ?? null;
};

/** Finds the work's DOI through the registration agency's title search, then runs the DOI mirrors. */
export class TitleLookupSource implements AcquisitionSource {
  readonly name = 'title_lookup' as const;

  constructor(
    private readonly providers: DoiProviders,
    private readonly candidatesPerMirror: number,
    private readonly matchThreshold: number
  ) {}

  isApplicable(request: AcquisitionRequest): boolean {
    return hasText(request.title);
  }

  async attempt(context: AttemptContext): Promise<AttemptOutcome> {
    const title = context.request.title?.trim() ?? '';

    let works: ProviderWork[];
    try {
      works = await this.providers.crossref.searchWorks(title, SEARCH_ROWS);
    } catch (error) {
      return { ok: false, kind: classifyFailure(error), stage: 'crossref_search', message: describeError(error) };
    }

    const match = bestTitleMatch(
      title,
      works.filter((work) => work.doi !== null),
      this.matchThreshold
    );
    if (!match?.doi) {
      return { ok: false, kind: 'not_found', stage: 'crossref_search', message: 'no work with a matching title' };
    }

    context.logger.debug('Resolved title to DOI', { doi: match.doi });
    const outcome = await runMirrorChain(context, doiMirrors(this.providers, match.doi), this.candidatesPerMirror);
    return { ...outcome, stage: `doi ${match.doi} via ${outcome.stage}` };
  }
}
