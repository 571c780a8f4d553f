import { load } from 'cheerio';
import type { PdfSearchHit } from '../types.js';
import { normalizeWhitespace } from '../utils.js';

const RESULT_BLOCK = '.gs_r.gs_or.gs_scl';
const FULL_TEXT_LINK = '.gs_or_ggsm a, .gs_ggsd a';
const KIND_TAG = /^\[[A-Z]+\]\s*/;

const absolute = (href: string | undefined, baseUrl: string): string | null => {
  if (!href) {
    return null;
  }
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return null;
  }
};

export const parseScholarResults = (html: string, baseUrl: string): PdfSearchHit[] => {
  const $ = load(html);

  return $(RESULT_BLOCK)
    .toArray()
    .map((block): PdfSearchHit => {
      const heading = $(block).find('h3.gs_rt').first();
      const anchor = heading.find('a').first();
      const title = normalizeWhitespace(anchor.length > 0 ? anchor.text() : heading.text()).replace(KIND_TAG, '');

      return {
        title,
        pdfUrl: absolute($(block).find(FULL_TEXT_LINK).first().attr('href'), baseUrl)
      };
    });
};
