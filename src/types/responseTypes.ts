// types/responseTypes.ts
import { ConversionStatus } from "./conversionTypes";

export interface MappingResponse {
  html_element_id: string;
  html_tag: string;
  html_content: string;
  markdown_line_start: number;
  markdown_line_end: number;
  markdown_content: string;
}

export interface ConvertResponse {
  message: string;
  markdown: string;
  html_with_ids: string;
  mappings: MappingResponse[];
  original_html_length: number;
  status: ConversionStatus;
  session_id?: string;
  error?: string;
}
