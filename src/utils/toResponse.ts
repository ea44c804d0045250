import { DocumentConversionResult, MappingRecord } from "../types/conversionTypes";
import { ConvertResponse, MappingResponse } from "../types/responseTypes";

export const toMappingResponse = (mapping: MappingRecord): MappingResponse => ({
  html_element_id: mapping.htmlElementId,
  html_tag: mapping.htmlTag,
  html_content: mapping.htmlContent,
  markdown_line_start: mapping.markdownLineStart,
  markdown_line_end: mapping.markdownLineEnd,
  markdown_content: mapping.markdownContent,
});

export const toConvertResponse = (
  result: DocumentConversionResult,
  sessionId?: string
): ConvertResponse => {
  if (result.status === "error") {
    return {
      message: "HTML conversion failed",
      markdown: "",
      html_with_ids: "",
      mappings: [],
      original_html_length: result.originalHtmlLength,
      status: result.status,
      error: result.error,
    };
  }

  return {
    message: "HTML converted successfully",
    markdown: result.markdownResult,
    html_with_ids: result.htmlWithIds,
    mappings: result.mappings.map(toMappingResponse),
    original_html_length: result.originalHtmlLength,
    status: result.status,
    session_id: sessionId,
  };
};
