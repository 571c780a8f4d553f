export type DocumentClassification = 'TextLayer' | 'Scanned' | 'Garbled' | 'Unknown';

/** Text of the first pages of a document, as extracted from its text layer. */
export interface DocumentSample {
  text: string;
  pagesSampled: number;
  pageCount: number;
}

export interface SampleMetrics {
  readableRatio: number;
  repeatRatio: number;
  characters: number;
}

export interface OutputTarget {
  directory: string;
  stem: string;
}

export interface ConversionOutcome {
  success: boolean;
  markdownPath?: string;
  imageCount: number;
  backendUsed: string;
  message: string;
}

/** Uniform capability every registered extraction backend implements. */
export interface ConversionBackend {
  readonly name: string;
  convert(documentPath: string, output: OutputTarget): Promise<ConversionOutcome>;
}
