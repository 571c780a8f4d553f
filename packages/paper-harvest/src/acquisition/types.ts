import type { FailureKind } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import type { FetchSession } from '../session/fetch-session.js';
import type { CandidateFetcher } from './candidate-fetcher.js';

export interface AcquisitionRequest {
  title?: string;
  doi?: string;
  link?: string;
}

export type SourceName = 'direct_source' | 'doi_lookup' | 'title_lookup' | 'aggregator' | 'web_search';

export const DEFAULT_SOURCE_ORDER = [
  'direct_source',
  'doi_lookup',
  'title_lookup',
  'aggregator',
  'web_search'
] as const satisfies readonly SourceName[];

/** One applicable source's try. `stage` names the step inside the source that produced the outcome. */
export interface SourceAttempt {
  source: SourceName;
  success: boolean;
  stage: string;
  kind?: FailureKind;
  message: string;
  candidateUrl?: string;
}

export interface AcquisitionResult {
  success: boolean;
  sourceUsed?: SourceName;
  filepath?: string;
  message: string;
  title?: string;
  doi?: string;
  attempts: SourceAttempt[];
}

/** Where a verified document must end up for the request being processed. */
export interface AcquisitionTarget {
  stem: string;
  directory: string;
  filepath: string;
}

export interface AttemptContext {
  request: AcquisitionRequest;
  target: AcquisitionTarget;
  session: FetchSession;
  fetcher: CandidateFetcher;
  logger: Logger;
}

export type AttemptOutcome =
  | { ok: true; filepath: string; stage: string; candidateUrl?: string; message: string }
  | { ok: false; kind: FailureKind; stage: string; message: string; candidateUrl?: string };

/**
 * A tagged acquisition strategy. `isApplicable` only looks at which request fields are present; a
 * source that is not applicable is left out of the attempt list.
 */
export interface AcquisitionSource {
  readonly name: SourceName;
  isApplicable(request: AcquisitionRequest): boolean;
  attempt(context: AttemptContext): Promise<AttemptOutcome>;
}

export const hasText = (value: string | undefined): value is string =>
  typeof value === 'string' && value.trim().length > 0;
