import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { PDFParse } from 'pdf-parse';
import { z } from 'zod';
import type { ConversionConfig } from '../../config.js';
import { ConfigurationMissingError, ConversionError, isAbortError } from '../../core/errors.js';
import { describeError, Logger } from '../../core/logger.js';
import { postProcessMarkdown } from '../markdown.js';
import type { ConversionBackend, ConversionOutcome, OutputTarget } from '../types.js';

export const OCR_BACKEND = 'vision-ocr';

const OCR_PROMPT =
  'Convert this document page to Markdown. Keep headings, paragraphs, tables (as Markdown tables) and ' +
  'formulas (as LaTeX between $ or $$). Output only the Markdown.';
const SCREENSHOT_SCALE = 2;

export type OcrSettings = Pick<ConversionConfig, 'ocrBaseUrl' | 'ocrApiKey' | 'ocrModel' | 'ocrTimeoutMs' | 'maxPages'>;

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional()
        })
      })
    )
    .min(1)
});

/** Renders each page to an image and transcribes it through an OpenAI-compatible vision endpoint. */
export class VisionOcrBackend implements ConversionBackend {
  readonly name = OCR_BACKEND;

  constructor(
    private readonly settings: OcrSettings,
    private readonly logger: Logger,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  async convert(documentPath: string, output: OutputTarget): Promise<ConversionOutcome> {
    const apiKey = this.settings.ocrApiKey;
    if (!apiKey) {
      throw new ConfigurationMissingError('CONVERT_OCR_API_KEY');
    }

    const parser = new PDFParse({ data: await readFile(documentPath) });
    try {
      const screenshots = await parser.getScreenshot({
        scale: SCREENSHOT_SCALE,
        imageDataUrl: true,
        imageBuffer: false,
        ...(this.settings.maxPages ? { first: this.settings.maxPages } : {})
      });

      const sections: string[] = [];
      for (const [index, page] of screenshots.pages.entries()) {
        const pageNumber = index + 1;
        this.logger.debug('Transcribing page', { pageNumber, total: screenshots.pages.length });
        const markdown = await this.transcribe(page.dataUrl, apiKey);
        sections.push(`<!-- page ${pageNumber} -->\n\n${markdown}`);
      }

      await mkdir(output.directory, { recursive: true });
      const markdownPath = join(output.directory, `${output.stem}.md`);
      await writeFile(markdownPath, postProcessMarkdown(sections.join('\n\n---\n\n')), 'utf8');

      return {
        success: true,
        markdownPath,
        imageCount: 0,
        backendUsed: this.name,
        message: `Transcribed ${sections.length} page(s) with ${this.settings.ocrModel}`
      };
    } catch (error) {
      if (error instanceof ConversionError) {
        throw error;
      }
      throw new ConversionError(`OCR conversion failed: ${describeError(error)}`, this.name, { documentPath });
    } finally {
      await parser.destroy();
    }
  }

  private async transcribe(imageDataUrl: string, apiKey: string): Promise<string> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.settings.ocrTimeoutMs);

    try {
      const response = await this.fetchImpl(`${this.settings.ocrBaseUrl.replace(/\/+$/, '')}/chat/completions`, {
        method: 'POST',
        headers: {
          authorization: `Bearer ${apiKey}`,
          'content-type': 'application/json'
        },
        body: JSON.stringify({
          model: this.settings.ocrModel,
          messages: [
            {
              role: 'user',
              content: [
                { type: 'image_url', image_url: { url: imageDataUrl } },
                { type: 'text', text: OCR_PROMPT }
              ]
            }
          ],
          max_tokens: 4096,
          temperature: 0.1
        }),
        signal: controller.signal
      });

      if (!response.ok) {
        const body = await response.text();
        throw new ConversionError(`OCR endpoint returned HTTP ${response.status}`, this.name, {
          status: response.status,
          body: body.slice(0, 500)
        });
      }

      const parsed = completionSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new ConversionError('OCR endpoint returned an unexpected payload', this.name);
      }

      return parsed.data.choices[0]?.message.content?.trim() ?? '';
    } catch (error) {
      if (isAbortError(error)) {
        throw new ConversionError(`OCR request timed out after ${this.settings.ocrTimeoutMs} ms`, this.name);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
