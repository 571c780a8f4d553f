export type ResearchProvider = 'openalex' | 'crossref' | 'semantic_scholar' | 'unpaywall';

/** Metadata-provider view of a work, reduced to what acquisition needs. */
export interface ProviderWork {
  provider: ResearchProvider;
  providerId: string;
  title: string;
  doi: string | null;
  /** Candidate PDF locations, best first, without duplicates. */
  pdfUrls: string[];
}

export const uniqueUrls = (urls: Array<string | null | undefined>): string[] => {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const url of urls) {
    if (!url || seen.has(url)) {
      continue;
    }
    seen.add(url);
    result.push(url);
  }
  return result;
};

/** One result of a web search for a title, with its full-text link when the engine lists one. */
export interface PdfSearchHit {
  title: string;
  pdfUrl: string | null;
}
