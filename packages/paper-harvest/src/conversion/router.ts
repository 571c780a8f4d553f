import { readFile } from 'node:fs/promises';
import { basename, dirname, extname } from 'node:path';
import { ConfigurationMissingError } from '../core/errors.js';
import { describeError, Logger } from '../core/logger.js';
import { classify, classifyText, type ClassificationThresholds } from './classifier.js';
import type { BackendRegistry } from './registry.js';
import type { PdfSamplingCapability } from './sampler.js';
import type { ConversionBackend, ConversionOutcome, DocumentClassification, OutputTarget } from './types.js';

export type BackendRole = 'lightweight' | 'ocr';

export interface RouteDecision {
  backend: BackendRole;
  /** Reclassify the lightweight output and switch to OCR when it is still garbled. */
  recheckGarbled: boolean;
  degraded: boolean;
  reason: string;
}

export interface BackendRoles {
  lightweight: string;
  ocr: string;
}

export const DEFAULT_BACKEND_ROLES: BackendRoles = {
  lightweight: 'pdf-text',
  ocr: 'vision-ocr'
};

export interface ConvertOptions {
  outputDir?: string;
  /** Forces a registered backend and skips routing. */
  backend?: string;
}

export type RoutedOutcome = ConversionOutcome & { classification: DocumentClassification };

/** Deterministic backend choice for a classification. */
export const route = (classification: DocumentClassification, ocrAvailable: boolean): RouteDecision => {
  switch (classification) {
    case 'TextLayer':
      return { backend: 'lightweight', recheckGarbled: false, degraded: false, reason: 'text layer present' };
    case 'Scanned':
      return ocrAvailable
        ? { backend: 'ocr', recheckGarbled: false, degraded: false, reason: 'no text layer' }
        : {
            backend: 'lightweight',
            recheckGarbled: false,
            degraded: true,
            reason: 'no text layer and no OCR backend configured'
          };
    case 'Garbled':
      return { backend: 'lightweight', recheckGarbled: true, degraded: false, reason: 'text layer looks garbled' };
    case 'Unknown':
      return { backend: 'lightweight', recheckGarbled: false, degraded: false, reason: 'document could not be sampled' };
  }
};

export const outputTargetFor = (documentPath: string, outputDir?: string): OutputTarget => ({
  directory: outputDir ?? dirname(documentPath),
  stem: basename(documentPath, extname(documentPath))
});

export class ConversionRouter {
  constructor(
    private readonly registry: BackendRegistry,
    private readonly sampler: PdfSamplingCapability,
    private readonly thresholds: ClassificationThresholds,
    private readonly logger: Logger,
    private readonly roles: BackendRoles = DEFAULT_BACKEND_ROLES
  ) {}

  get ocrAvailable(): boolean {
    return this.registry.has(this.roles.ocr);
  }

  async classifyDocument(documentPath: string): Promise<DocumentClassification> {
    return classify(await this.sampler.sample(documentPath), this.thresholds);
  }

  async convert(documentPath: string, options: ConvertOptions = {}): Promise<RoutedOutcome> {
    const output = outputTargetFor(documentPath, options.outputDir);
    const classification = await this.classifyDocument(documentPath);

    if (options.backend) {
      const forced = this.registry.get(options.backend);
      if (!forced) {
        return {
          success: false,
          imageCount: 0,
          backendUsed: options.backend,
          message: `Unknown conversion backend: ${options.backend} (registered: ${this.registry.names().join(', ')})`,
          classification
        };
      }
      return { ...(await this.run(forced, documentPath, output)), classification };
    }

    const decision = route(classification, this.ocrAvailable);
    this.logger.info('Routing document', { documentPath, classification, ...decision });

    const chosen = this.backendFor(decision.backend);
    if (!chosen) {
      const missing = new ConfigurationMissingError(this.roles[decision.backend]);
      return {
        success: false,
        imageCount: 0,
        backendUsed: this.roles[decision.backend],
        message: missing.message,
        classification
      };
    }

    const outcome = await this.run(chosen, documentPath, output);

    if (decision.degraded && outcome.success) {
      return { ...outcome, message: `${outcome.message} (degraded: ${decision.reason})`, classification };
    }

    if (decision.recheckGarbled && outcome.success && outcome.markdownPath) {
      const recheck = classifyText(await readFile(outcome.markdownPath, 'utf8'), this.thresholds);
      const ocr = this.backendFor('ocr');
      if (recheck === 'Garbled' && ocr) {
        this.logger.info('Lightweight output still garbled; retrying with OCR', { documentPath });
        const retried = await this.run(ocr, documentPath, output);
        if (retried.success) {
          return { ...retried, classification };
        }
        this.logger.warn('OCR retry failed; keeping lightweight output', { message: retried.message });
      }
    }

    return { ...outcome, classification };
  }

  private backendFor(role: BackendRole): ConversionBackend | undefined {
    return this.registry.get(this.roles[role]);
  }

  private async run(backend: ConversionBackend, documentPath: string, output: OutputTarget): Promise<ConversionOutcome> {
    try {
      return await backend.convert(documentPath, output);
    } catch (error) {
      this.logger.warn('Conversion backend failed', { backend: backend.name, error: describeError(error) });
      return { success: false, imageCount: 0, backendUsed: backend.name, message: describeError(error) };
    }
  }
}
