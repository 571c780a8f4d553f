import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { PDFParse } from 'pdf-parse';
import { ConversionError } from '../../core/errors.js';
import { describeError, Logger } from '../../core/logger.js';
import { postProcessMarkdown } from '../markdown.js';
import type { ConversionBackend, ConversionOutcome, OutputTarget } from '../types.js';

export const TEXT_BACKEND = 'pdf-text';

const IMAGE_THRESHOLD = 80;
const MAX_HEADING_LENGTH = 80;
const NUMBERED_HEADING = /^(?:\d{1,2}(?:\.\d{1,2}){0,3}\.?\s+|[IVX]+\.\s*|第[一二三四五六七八九十百\d]+[章节部分]\s*)\S/;
const NAMED_HEADING =
  /^(?:abstract|introduction|conclusions?|references|acknowledge?ments?|摘\s*要|引\s*言|结\s*论|参考文献|致\s*谢)$/i;

export interface TextBackendOptions {
  extractImages: boolean;
  maxPages: number | null;
}

const headingLevel = (line: string): number | null => {
  if (line.length > MAX_HEADING_LENGTH || /[。.,，;；:：]$/.test(line)) {
    return null;
  }
  if (NAMED_HEADING.test(line)) {
    return 2;
  }
  const numbered = line.match(NUMBERED_HEADING);
  if (!numbered) {
    return null;
  }
  const depth = (line.match(/^\d+((?:\.\d+)*)/)?.[1] ?? '').split('.').length;
  return Math.min(2 + depth - 1, 4);
};

/** Line-level markdown for one page: detected headings, paragraphs split on blank lines. */
export const pageToMarkdown = (text: string): string => {
  const blocks: string[] = [];
  let paragraph: string[] = [];
  const flush = (): void => {
    if (paragraph.length > 0) {
      blocks.push(paragraph.join(' '));
      paragraph = [];
    }
  };

  for (const raw of text.split('\n')) {
    const line = raw.trim();
    if (line.length === 0) {
      flush();
      continue;
    }

    const level = headingLevel(line);
    if (level !== null) {
      flush();
      blocks.push(`${'#'.repeat(level)} ${line}`);
      continue;
    }

    paragraph.push(line);
  }
  flush();

  return blocks.join('\n\n');
};

/** Local text-layer extraction; no network, no credentials. */
export class PdfTextBackend implements ConversionBackend {
  readonly name = TEXT_BACKEND;

  constructor(
    private readonly options: TextBackendOptions,
    private readonly logger: Logger
  ) {}

  async convert(documentPath: string, output: OutputTarget): Promise<ConversionOutcome> {
    const parser = new PDFParse({ data: await readFile(documentPath) });
    try {
      const pageRange = this.options.maxPages ? { first: this.options.maxPages } : {};
      const text = await parser.getText(pageRange);
      await mkdir(output.directory, { recursive: true });

      const imageLinks = this.options.extractImages
        ? await this.writeImages(parser, output, pageRange)
        : new Map<number, string[]>();

      const sections = text.pages.map((page, index) => {
        const pageNumber = index + 1;
        const links = (imageLinks.get(pageNumber) ?? []).map((link) => `![page ${pageNumber} figure](${link})`);
        return [`<!-- page ${pageNumber} -->`, pageToMarkdown(page.text), ...links].join('\n\n');
      });

      const markdownPath = join(output.directory, `${output.stem}.md`);
      await writeFile(markdownPath, postProcessMarkdown(sections.join('\n\n---\n\n')), 'utf8');

      const imageCount = [...imageLinks.values()].reduce((sum, links) => sum + links.length, 0);
      return {
        success: true,
        markdownPath,
        imageCount,
        backendUsed: this.name,
        message: `Extracted ${text.pages.length} page(s) from the text layer`
      };
    } catch (error) {
      throw new ConversionError(`Text extraction failed: ${describeError(error)}`, this.name, { documentPath });
    } finally {
      await parser.destroy();
    }
  }

  private async writeImages(
    parser: PDFParse,
    output: OutputTarget,
    pageRange: { first?: number }
  ): Promise<Map<number, string[]>> {
    const links = new Map<number, string[]>();
    try {
      const result = await parser.getImage({ ...pageRange, imageThreshold: IMAGE_THRESHOLD });
      const imageDir = join(output.directory, `${output.stem}_images`);

      for (const [pageIndex, page] of result.pages.entries()) {
        const pageNumber = pageIndex + 1;
        for (const [imageIndex, image] of page.images.entries()) {
          if (links.size === 0 && imageIndex === 0) {
            await mkdir(imageDir, { recursive: true });
          }
          const fileName = `page${pageNumber}_img${imageIndex + 1}.png`;
          await writeFile(join(imageDir, fileName), image.data);
          links.set(pageNumber, [...(links.get(pageNumber) ?? []), `${output.stem}_images/${fileName}`]);
        }
      }
    } catch (error) {
      this.logger.warn('Image extraction failed; continuing with text only', { error: describeError(error) });
    }
    return links;
  }
}
