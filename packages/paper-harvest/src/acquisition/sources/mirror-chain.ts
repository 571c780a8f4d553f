import { classifyFailure, type FailureKind } from '../../core/errors.js';
import { describeError } from '../../core/logger.js';
import type { CandidateRequestOptions } from '../candidate-fetcher.js';
import type { AttemptContext, AttemptOutcome } from '../types.js';

/** One endpoint of a source. `resolve` turns the source key into candidate PDF URLs, best first. */
export interface Mirror {
  name: string;
  resolve(): Promise<string[]>;
  requestOptions?: CandidateRequestOptions;
}

interface Miss {
  mirror: string;
  kind: FailureKind;
  message: string;
}

/**
 * Tries mirrors in order and each mirror's candidates in order until one candidate becomes a
 * verified file. A mirror that errors or yields nothing counts as a miss and the next one runs.
 */
export const runMirrorChain = async (
  context: AttemptContext,
  mirrors: Mirror[],
  candidatesPerMirror: number
): Promise<AttemptOutcome> => {
  const misses: Miss[] = [];
  const tried = new Set<string>();

  for (const mirror of mirrors) {
    let candidates: string[];
    try {
      candidates = (await mirror.resolve()).filter((url) => !tried.has(url)).slice(0, candidatesPerMirror);
    } catch (error) {
      misses.push({ mirror: mirror.name, kind: classifyFailure(error), message: describeError(error) });
      context.logger.debug('Mirror lookup failed', { mirror: mirror.name, error: describeError(error) });
      continue;
    }

    if (candidates.length === 0) {
      misses.push({ mirror: mirror.name, kind: 'not_found', message: 'no PDF candidates' });
      continue;
    }

    for (const candidateUrl of candidates) {
      tried.add(candidateUrl);
      const outcome = await context.fetcher.retrieve(
        candidateUrl,
        context.target,
        context.session,
        mirror.requestOptions
      );

      if (outcome.ok) {
        return {
          ok: true,
          filepath: outcome.filepath,
          stage: mirror.name,
          candidateUrl,
          message: outcome.message
        };
      }

      misses.push({ mirror: mirror.name, kind: outcome.kind, message: outcome.message });
      context.logger.debug('Candidate rejected', { mirror: mirror.name, candidateUrl, reason: outcome.message });
    }
  }

  if (misses.length === 0) {
    return { ok: false, kind: 'not_found', stage: 'mirrors', message: 'no mirrors available' };
  }

  const last = misses[misses.length - 1];
  return {
    ok: false,
    kind: last?.kind ?? 'not_found',
    stage: last?.mirror ?? 'mirrors',
    message: misses.map((miss) => `${miss.mirror}: ${miss.message}`).join('; ')
  };
};
