import { readFile } from 'node:fs/promises';
import { PDFParse } from 'pdf-parse';
import { describeError, Logger } from '../core/logger.js';
import type { DocumentSample } from './types.js';

export interface PdfSamplingCapability {
  sample(documentPath: string): Promise<DocumentSample | null>;
}

/** Reads the text layer of the first `pageLimit` pages. An unreadable file yields null. */
export class DocumentSampler implements PdfSamplingCapability {
  constructor(
    private readonly pageLimit: number,
    private readonly logger: Logger
  ) {}

  async sample(documentPath: string): Promise<DocumentSample | null> {
    let parser: PDFParse | null = null;
    try {
      parser = new PDFParse({ data: await readFile(documentPath) });
      const result = await parser.getText({ first: this.pageLimit });
      const pages = result.pages.slice(0, this.pageLimit);
      return {
        text: pages.map((page) => page.text).join('\n'),
        pagesSampled: pages.length,
        pageCount: result.total
      };
    } catch (error) {
      this.logger.warn('Could not sample document', { documentPath, error: describeError(error) });
      return null;
    } finally {
      await parser?.destroy();
    }
  }
}
