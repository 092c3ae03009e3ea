export interface ParsedPage {
  pageNumber: number;
  lineCount: number;
}

/**
 * Layout parser output; content is the full reading-order text
 */
export interface ParsedDocument {
  content: string;
  pages: ParsedPage[];
  paragraphs: string[];
  raw: unknown;
}

export interface ParseOptions {
  mimeType?: string;
}

export interface DocumentParser {
  parse(data: Buffer, options?: ParseOptions): Promise<ParsedDocument>;
}

export interface AzureLayoutConfig {
  endpoint: string;
  apiKey: string;
  apiVersion?: string;
  modelId?: string;
  pollIntervalMs?: number;
  maxPolls?: number;
  timeoutMs?: number;
  fetchFn?: typeof fetch;
}
