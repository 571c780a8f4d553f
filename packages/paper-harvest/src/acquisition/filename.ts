import { join } from 'node:path';
import type { AcquisitionRequest, AcquisitionTarget } from './types.js';

const ILLEGAL_PATH_CHARACTERS = /[<>:"/\\|?*\u0000-\u001f]/g;

export const sanitizeFilename = (value: string, maxLength: number): string => {
  const cleaned = value.replace(ILLEGAL_PATH_CHARACTERS, '_').replace(/\s+/g, ' ').trim();
  return Array.from(cleaned).slice(0, Math.max(1, maxLength)).join('').trim();
};

/**
 * The filename stem is derived once per request: from the title when there is one, otherwise from
 * the DOI. Every source attempt for the request writes to the same target.
 */
export const resolveTarget = (
  request: AcquisitionRequest,
  directory: string,
  maxLength: number,
  now: () => Date = () => new Date()
): AcquisitionTarget => {
  const fromTitle = request.title ? sanitizeFilename(request.title, maxLength) : '';
  const fromDoi = request.doi ? sanitizeFilename(request.doi, maxLength) : '';
  const stem = fromTitle || fromDoi || `document_${now().getTime()}`;

  return {
    stem,
    directory,
    filepath: join(directory, `${stem}.pdf`)
  };
};

export const partialPathFor = (filepath: string): string => `${filepath}.part`;
