import { readFileSync } from 'node:fs';
import { z } from 'zod';

const manifestSchema = z.object({ version: z.string().trim().min(1) });

const FALLBACK_VERSION = '0.0.0';

/** Version from the package manifest, which sits one level above both src/ and dist/. */
export const getPackageVersion = (): string => {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'));
  } catch {
    return FALLBACK_VERSION;
  }

  const parsed = manifestSchema.safeParse(raw);
  return parsed.success ? parsed.data.version : FALLBACK_VERSION;
};
