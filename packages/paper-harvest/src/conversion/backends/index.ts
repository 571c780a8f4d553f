import type { ConversionConfig } from '../../config.js';
import { Logger } from '../../core/logger.js';
import { BackendRegistry } from '../registry.js';
import { VisionOcrBackend } from './ocr-backend.js';
import { PdfTextBackend } from './text-backend.js';

export { OCR_BACKEND, VisionOcrBackend } from './ocr-backend.js';
export { TEXT_BACKEND, PdfTextBackend, pageToMarkdown } from './text-backend.js';

/** `pdf-text` always; `vision-ocr` only when an API key is configured. */
export const createBackendRegistry = (
  config: ConversionConfig,
  logger: Logger,
  fetchImpl: typeof fetch = fetch
): BackendRegistry => {
  const registry = new BackendRegistry().register(
    new PdfTextBackend({ extractImages: config.extractImages, maxPages: config.maxPages }, logger.child('pdf-text'))
  );

  if (config.ocrApiKey) {
    registry.register(new VisionOcrBackend(config, logger.child('vision-ocr'), fetchImpl));
  }

  return registry;
};
