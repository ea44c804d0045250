// types/conversionTypes.ts

export type ConversionStatus = "converted" | "error";

export interface MappingRecord {
  htmlElementId: string;
  htmlTag: string;
  htmlContent: string;
  markdownLineStart: number;
  markdownLineEnd: number;
  markdownContent: string;
}

export interface DocumentConversionResult {
  originalHtmlLength: number;
  markdownResult: string;
  htmlWithIds: string;
  mappings: MappingRecord[];
  status: ConversionStatus;
  error?: string;
}

export interface MappingSession {
  sessionId: string;
  createdAt: string;
  mappings: MappingRecord[];
  markdownLineCount: number;
}

/**
 * Inclusive, 0-based line span inside the rendered markdown.
 */
export interface LineRange {
  start: number;
  end: number;
}
