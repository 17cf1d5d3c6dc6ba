/**
 * Result of converting a document to markdown
 */
export interface ConversionResult {
  /** The converted markdown content */
  markdown: string;
  metadata: {
    /** Original file format (without dot) */
    sourceFormat: string;
    /** Document title, from the document itself or its file name */
    title: string;
    /** Name of the parser that read the file */
    parser: string;
  };
}

export interface BatchProgress {
  processed: number;
  total: number;
  filePath: string;
}

export interface BatchFailure {
  filePath: string;
  error: Error;
}

export interface BatchResult {
  /** input path → written Markdown path */
  converted: Map<string, string>;
  failed: BatchFailure[];
}
