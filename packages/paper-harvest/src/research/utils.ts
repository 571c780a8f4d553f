export const normalizeWhitespace = (input: string): string => input.replace(/\s+/g, ' ').trim();

export const normalizeDoi = (doi: string | null | undefined): string | null => {
  if (!doi) {
    return null;
  }

  const normalized = doi
    .trim()
    .replace(/^https?:\/\/(dx\.)?doi\.org\//i, '')
    .replace(/^doi:\s*/i, '')
    .toLowerCase();
  return normalized.length > 0 ? normalized : null;
};

const CJK_RUN = /[\u3400-\u9fff\uf900-\ufaff]+/g;

/** Latin words of three or more letters plus overlapping bigrams of CJK runs. */
export const tokenizeForRanking = (input: string): string[] => {
  const text = normalizeWhitespace(input).toLowerCase();
  const tokens: string[] = [];

  for (const match of text.matchAll(CJK_RUN)) {
    const run = match[0];
    if (run.length === 1) {
      tokens.push(run);
      continue;
    }
    for (let index = 0; index < run.length - 1; index += 1) {
      tokens.push(run.slice(index, index + 2));
    }
  }

  text
    .replace(CJK_RUN, ' ')
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .split(' ')
    .filter((token) => token.length >= 3)
    .forEach((token) => tokens.push(token));

  return tokens;
};

export const overlapScore = (a: string[], b: string[]): number => {
  if (a.length === 0 || b.length === 0) {
    return 0;
  }

  const bSet = new Set(b);
  let overlap = 0;
  for (const token of a) {
    if (bSet.has(token)) {
      overlap += 1;
    }
  }

  return overlap / Math.max(a.length, b.length);
};

export const titleSimilarity = (a: string, b: string): number => overlapScore(tokenizeForRanking(a), tokenizeForRanking(b));
