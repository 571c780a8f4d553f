import { rm } from 'node:fs/promises';
import type { AcquisitionConfig } from '../config.js';
import { classifyFailure, HarvestError } from '../core/errors.js';
import { describeError, Logger } from '../core/logger.js';
import type { Pacer } from '../core/pacing.js';
import type { FetchSession } from '../session/fetch-session.js';
import type { CandidateFetcher } from './candidate-fetcher.js';
import { partialPathFor, resolveTarget } from './filename.js';
import { verifyPdfFile } from './pdf-check.js';
import {
  hasText,
  type AcquisitionRequest,
  type AcquisitionResult,
  type AcquisitionSource,
  type AttemptOutcome,
  type SourceAttempt,
  type SourceName
} from './types.js';

export type PipelineSettings = Pick<
  AcquisitionConfig,
  'downloadDir' | 'filenameMaxLength' | 'batchDelayMs' | 'batchJitterMs'
>;

export interface AcquisitionPipelineDeps {
  session: FetchSession;
  fetcher: CandidateFetcher;
  /** Registered strategies in default order. */
  sources: AcquisitionSource[];
  settings: PipelineSettings;
  pacer: Pacer;
  logger: Logger;
}

const cleanRequest = (request: AcquisitionRequest): AcquisitionRequest => ({
  ...(hasText(request.title) ? { title: request.title.trim() } : {}),
  ...(hasText(request.doi) ? { doi: request.doi.trim() } : {}),
  ...(hasText(request.link) ? { link: request.link.trim() } : {})
});

/**
 * Runs the applicable sources for one request in order until one of them yields a verified PDF.
 * Source failures become attempt records; only exhaustion is reported as a failed result.
 */
export class AcquisitionPipeline {
  private readonly registry: Map<SourceName, AcquisitionSource>;

  constructor(private readonly deps: AcquisitionPipelineDeps) {
    this.registry = new Map(deps.sources.map((source) => [source.name, source]));
  }

  get sourceNames(): SourceName[] {
    return [...this.registry.keys()];
  }

  /** The attempt order for `request`: requested (or default) order with inapplicable sources left out. */
  planSources(request: AcquisitionRequest, sources?: readonly SourceName[]): AcquisitionSource[] {
    const order = sources ?? this.sourceNames;
    const plan: AcquisitionSource[] = [];
    const seen = new Set<SourceName>();

    for (const name of order) {
      const source = this.registry.get(name);
      if (!source) {
        throw new HarvestError(`Unknown acquisition source: ${name}`, { available: this.sourceNames });
      }
      if (seen.has(name)) {
        continue;
      }
      seen.add(name);
      if (source.isApplicable(request)) {
        plan.push(source);
      }
    }

    return plan;
  }

  async acquire(rawRequest: AcquisitionRequest, sources?: readonly SourceName[]): Promise<AcquisitionResult> {
    const request = cleanRequest(rawRequest);
    const echo = {
      ...(request.title ? { title: request.title } : {}),
      ...(request.doi ? { doi: request.doi } : {})
    };

    if (!request.title && !request.doi) {
      return { success: false, message: 'A title or a DOI is required.', attempts: [], ...echo };
    }

    const plan = this.planSources(request, sources);
    if (plan.length === 0) {
      return { success: false, message: 'No acquisition source applies to this request.', attempts: [], ...echo };
    }

    const { settings, session, fetcher, logger } = this.deps;
    const target = resolveTarget(request, settings.downloadDir, settings.filenameMaxLength);
    const attempts: SourceAttempt[] = [];

    logger.info('Acquiring document', {
      ...echo,
      plan: plan.map((source) => source.name),
      target: target.filepath
    });

    for (const source of plan) {
      const sourceLogger = logger.child(source.name);
      let outcome: AttemptOutcome;
      try {
        outcome = await source.attempt({ request, target, session, fetcher, logger: sourceLogger });
      } catch (error) {
        outcome = { ok: false, kind: classifyFailure(error), stage: 'attempt', message: describeError(error) };
      }

      if (outcome.ok) {
        const check = await verifyPdfFile(outcome.filepath);
        if (check.ok) {
          attempts.push({
            source: source.name,
            success: true,
            stage: outcome.stage,
            message: outcome.message,
            ...(outcome.candidateUrl ? { candidateUrl: outcome.candidateUrl } : {})
          });
          logger.info('Document acquired', { source: source.name, filepath: outcome.filepath });
          return {
            success: true,
            sourceUsed: source.name,
            filepath: outcome.filepath,
            message: `Downloaded via ${source.name} (${outcome.stage})`,
            attempts,
            ...echo
          };
        }

        await rm(outcome.filepath, { force: true });
        outcome = { ok: false, kind: 'validation_failure', stage: outcome.stage, message: check.reason };
      }

      attempts.push({
        source: source.name,
        success: false,
        stage: outcome.stage,
        kind: outcome.kind,
        message: outcome.message,
        ...(outcome.candidateUrl ? { candidateUrl: outcome.candidateUrl } : {})
      });
      sourceLogger.warn('Source failed', { stage: outcome.stage, kind: outcome.kind, message: outcome.message });
    }

    await rm(partialPathFor(target.filepath), { force: true });

    return {
      success: false,
      message: `All sources failed. ${attempts.map((attempt) => `${attempt.source}: ${attempt.message}`).join(' | ')}`,
      attempts,
      ...echo
    };
  }

  /**
   * Processes requests one at a time with a randomized pause between items. With `stopOnFailure`
   * the returned list ends at the first failed item.
   */
  async acquireBatch(
    requests: AcquisitionRequest[],
    sources?: readonly SourceName[],
    stopOnFailure = false
  ): Promise<AcquisitionResult[]> {
    const { pacer, settings, logger } = this.deps;
    const results: AcquisitionResult[] = [];

    for (const [index, request] of requests.entries()) {
      logger.info('Batch item', { index: index + 1, total: requests.length });
      const result = await this.acquire(request, sources);
      results.push(result);

      if (!result.success && stopOnFailure) {
        logger.warn('Stopping batch after failure', { index: index + 1 });
        break;
      }

      if (index < requests.length - 1) {
        await pacer.pause(settings.batchDelayMs, settings.batchJitterMs);
      }
    }

    logger.info('Batch finished', {
      succeeded: results.filter((result) => result.success).length,
      processed: results.length,
      requested: requests.length
    });
    return results;
  }
}
