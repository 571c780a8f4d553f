import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { ConversionConfig } from '../src/config.js';
import { ConfigurationMissingError } from '../src/core/errors.js';
import { createBackendRegistry, OCR_BACKEND, TEXT_BACKEND, VisionOcrBackend } from '../src/conversion/backends/index.js';
import { DEFAULT_THRESHOLDS } from '../src/conversion/classifier.js';
import { BackendRegistry } from '../src/conversion/registry.js';
import { ConversionRouter, outputTargetFor, route } from '../src/conversion/router.js';
import { DocumentSampler, type PdfSamplingCapability } from '../src/conversion/sampler.js';
import type { ConversionBackend, DocumentSample, OutputTarget } from '../src/conversion/types.js';
import { silentLogger } from './support/helpers.js';

const logger = silentLogger();
const GARBLED = '†‡§'.repeat(80);

let workDir: string;

beforeEach(async () => {
  workDir = await mkdtemp(join(tmpdir(), 'router-test-'));
});

afterEach(async () => {
  await rm(workDir, { recursive: true, force: true });
});

const fixedSampler = (text: string | null): PdfSamplingCapability => ({
  sample: async (): Promise<DocumentSample | null> => (text === null ? null : { text, pagesSampled: 1, pageCount: 1 })
});

/** Writes `markdown` next to the requested stem and records every call in `calls`. */
const fakeBackend = (name: string, calls: string[], markdown = '# Converted\n\nReadable body text.\n'): ConversionBackend => ({
  name,
  convert: async (_documentPath: string, output: OutputTarget) => {
    calls.push(name);
    const markdownPath = join(output.directory, `${output.stem}.md`);
    await writeFile(markdownPath, markdown, 'utf8');
    return { success: true, markdownPath, imageCount: 0, backendUsed: name, message: `converted by ${name}` };
  }
});

const failingBackend = (name: string, calls: string[]): ConversionBackend => ({
  name,
  convert: async () => {
    calls.push(name);
    throw new Error(`${name} crashed`);
  }
});

const routerWith = (sampleText: string | null, backends: ConversionBackend[]) => {
  const registry = new BackendRegistry();
  backends.forEach((backend) => registry.register(backend));
  return new ConversionRouter(registry, fixedSampler(sampleText), DEFAULT_THRESHOLDS, logger);
};

const documentPath = () => join(workDir, 'paper.pdf');

describe('route', () => {
  it('maps each classification to a backend role', () => {
    expect(route('TextLayer', true)).toMatchObject({ backend: 'lightweight', recheckGarbled: false, degraded: false });
    expect(route('Scanned', true)).toMatchObject({ backend: 'ocr', degraded: false });
    expect(route('Scanned', false)).toEqual({
      backend: 'lightweight',
      recheckGarbled: false,
      degraded: true,
      reason: 'no text layer and no OCR backend configured'
    });
    expect(route('Garbled', false)).toMatchObject({ backend: 'lightweight', recheckGarbled: true });
    expect(route('Unknown', true)).toMatchObject({ backend: 'lightweight', reason: 'document could not be sampled' });
  });
});

describe('outputTargetFor', () => {
  it('defaults to the directory of the document', () => {
    expect(outputTargetFor('/data/papers/survey.v2.pdf')).toEqual({ directory: '/data/papers', stem: 'survey.v2' });
    expect(outputTargetFor('/data/papers/survey.pdf', '/tmp/out')).toEqual({ directory: '/tmp/out', stem: 'survey' });
  });
});

describe('ConversionRouter', () => {
  it('sends a text-layer document to the lightweight backend', async () => {
    const calls: string[] = [];
    const router = routerWith('Plain readable text.', [fakeBackend(TEXT_BACKEND, calls), fakeBackend(OCR_BACKEND, calls)]);

    const outcome = await router.convert(documentPath());

    expect(calls).toEqual([TEXT_BACKEND]);
    expect(outcome).toMatchObject({
      success: true,
      backendUsed: TEXT_BACKEND,
      classification: 'TextLayer',
      markdownPath: join(workDir, 'paper.md')
    });
  });

  it('sends a scanned document to OCR when it is registered', async () => {
    const calls: string[] = [];
    const router = routerWith('', [fakeBackend(TEXT_BACKEND, calls), fakeBackend(OCR_BACKEND, calls)]);

    const outcome = await router.convert(documentPath());

    expect(calls).toEqual([OCR_BACKEND]);
    expect(outcome).toMatchObject({ backendUsed: OCR_BACKEND, classification: 'Scanned' });
  });

  it('marks a scanned document converted without OCR as degraded', async () => {
    const calls: string[] = [];
    const router = routerWith('', [fakeBackend(TEXT_BACKEND, calls)]);

    const outcome = await router.convert(documentPath());

    expect(outcome.message).toBe(`converted by ${TEXT_BACKEND} (degraded: no text layer and no OCR backend configured)`);
    expect(outcome.success).toBe(true);
  });

  it('retries a garbled document with OCR when the extracted text is still garbled', async () => {
    const calls: string[] = [];
    const router = routerWith(GARBLED, [fakeBackend(TEXT_BACKEND, calls, GARBLED), fakeBackend(OCR_BACKEND, calls)]);

    const outcome = await router.convert(documentPath());

    expect(calls).toEqual([TEXT_BACKEND, OCR_BACKEND]);
    expect(outcome).toMatchObject({ backendUsed: OCR_BACKEND, classification: 'Garbled' });
  });

  it('keeps the lightweight output of a garbled document when it reads cleanly', async () => {
    const calls: string[] = [];
    const router = routerWith(GARBLED, [fakeBackend(TEXT_BACKEND, calls), fakeBackend(OCR_BACKEND, calls)]);

    const outcome = await router.convert(documentPath());

    expect(calls).toEqual([TEXT_BACKEND]);
    expect(outcome.backendUsed).toBe(TEXT_BACKEND);
  });

  it('keeps the lightweight output when the OCR retry fails', async () => {
    const calls: string[] = [];
    const router = routerWith(GARBLED, [fakeBackend(TEXT_BACKEND, calls, GARBLED), failingBackend(OCR_BACKEND, calls)]);

    const outcome = await router.convert(documentPath());

    expect(calls).toEqual([TEXT_BACKEND, OCR_BACKEND]);
    expect(outcome).toMatchObject({ success: true, backendUsed: TEXT_BACKEND });
  });

  it('uses the lightweight backend when the document cannot be sampled', async () => {
    const calls: string[] = [];
    const router = routerWith(null, [fakeBackend(TEXT_BACKEND, calls), fakeBackend(OCR_BACKEND, calls)]);

    expect(await router.convert(documentPath())).toMatchObject({ backendUsed: TEXT_BACKEND, classification: 'Unknown' });
  });

  it('honours a forced backend and writes to the requested directory', async () => {
    const calls: string[] = [];
    const router = routerWith('Plain readable text.', [fakeBackend(TEXT_BACKEND, calls), fakeBackend(OCR_BACKEND, calls)]);

    const outcome = await router.convert(documentPath(), { backend: OCR_BACKEND, outputDir: workDir });

    expect(calls).toEqual([OCR_BACKEND]);
    expect(outcome).toMatchObject({ backendUsed: OCR_BACKEND, classification: 'TextLayer' });
  });

  it('rejects an unregistered forced backend', async () => {
    const calls: string[] = [];
    const router = routerWith('Plain readable text.', [fakeBackend(TEXT_BACKEND, calls)]);

    const outcome = await router.convert(documentPath(), { backend: 'layout-model' });

    expect(calls).toEqual([]);
    expect(outcome).toEqual({
      success: false,
      imageCount: 0,
      backendUsed: 'layout-model',
      message: `Unknown conversion backend: layout-model (registered: ${TEXT_BACKEND})`,
      classification: 'TextLayer'
    });
  });

  it('reports a missing role backend as missing configuration', async () => {
    const router = routerWith('Plain readable text.', [fakeBackend(OCR_BACKEND, [])]);

    expect(await router.convert(documentPath())).toMatchObject({
      success: false,
      backendUsed: TEXT_BACKEND,
      message: `Missing configuration: ${TEXT_BACKEND}`
    });
  });

  it('turns a backend exception into a failed outcome', async () => {
    const router = routerWith('Plain readable text.', [failingBackend(TEXT_BACKEND, [])]);

    expect(await router.convert(documentPath())).toEqual({
      success: false,
      imageCount: 0,
      backendUsed: TEXT_BACKEND,
      message: `${TEXT_BACKEND} crashed`,
      classification: 'TextLayer'
    });
  });
});

describe('backend registry', () => {
  const conversion = (ocrApiKey?: string): ConversionConfig => ({
    samplePages: 3,
    readableRatio: 0.5,
    repeatRatio: 0.1,
    repeatRunLength: 3,
    extractImages: false,
    maxPages: null,
    ocrBaseUrl: 'https://ocr.example.com/v1',
    ocrModel: 'test-model',
    ocrTimeoutMs: 1000,
    ...(ocrApiKey ? { ocrApiKey } : {})
  });

  it('registers OCR only when a key is configured', () => {
    expect(createBackendRegistry(conversion(), logger).names()).toEqual([TEXT_BACKEND]);
    expect(createBackendRegistry(conversion('test-secret'), logger).names()).toEqual([TEXT_BACKEND, OCR_BACKEND]);
  });

  it('refuses duplicate names', () => {
    const registry = new BackendRegistry().register(fakeBackend(TEXT_BACKEND, []));
    expect(() => registry.register(fakeBackend(TEXT_BACKEND, []))).toThrow(
      `Conversion backend already registered: ${TEXT_BACKEND}`
    );
  });

  it('fails the OCR backend without a key before touching the document', async () => {
    const backend = new VisionOcrBackend(conversion(), logger);
    await expect(backend.convert(documentPath(), { directory: workDir, stem: 'paper' })).rejects.toBeInstanceOf(
      ConfigurationMissingError
    );
  });
});

describe('DocumentSampler', () => {
  it('returns null for a file it cannot read', async () => {
    expect(await new DocumentSampler(3, logger).sample(join(workDir, 'missing.pdf'))).toBeNull();
  });
});
