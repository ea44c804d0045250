import { v4 as uuidv4 } from "uuid";
import { MAPPING_ID_ATTRIBUTE } from "../constants/rendererConfig";
import { DocumentConversionResult, MappingRecord } from "../types/conversionTypes";
import { MarkdownRenderer } from "../types/rendererTypes";
import { findContentLines } from "../utils/findContentLines";
import { addLineNumbers, splitLines } from "../utils/lineNumbers";
import { loadHtmlIntoCheerio } from "../utils/loadHtmlIntoCheerio";

/**
 * Returns the first mapping whose inclusive line range contains `lineNumber`.
 * Line numbers are 1-based and refer to the unnumbered markdown.
 */
export function findMappingByLine(
  mappings: readonly MappingRecord[],
  lineNumber: number
): MappingRecord | undefined {
  return mappings.find(
    (mapping) => mapping.markdownLineStart <= lineNumber && lineNumber <= mapping.markdownLineEnd
  );
}

// MappingEngine.ts
export class MappingEngine {
  private mappings: MappingRecord[] = [];

  constructor(private readonly renderer: MarkdownRenderer) {}

  convertWithMapping(htmlText: string): DocumentConversionResult {
    const originalHtmlLength = Array.from(htmlText).length;

    try {
      const $ = loadHtmlIntoCheerio(htmlText);

      // Only direct element children are tagged; text and comments are skipped
      const tagged = $.root()
        .children()
        .toArray()
        .map((element) => {
          const id = uuidv4();
          $(element).attr(MAPPING_ID_ATTRIBUTE, id);
                return { id, element };
        });

      const htmlWithIds = $.html();
      const rawMarkdown = this.renderer.render(htmlWithIds);
      const markdownLines = splitLines(rawMarkdown);

      const mappings: MappingRecord[] = [];
      let searchFrom = 0;

      for (const { id, element } of tagged) {
        const htmlContent = $.html(element);
        const elementMarkdown = this.renderer.render(htmlContent).trim();
        if (!elementMarkdown) continue;

        const range = findContentLines(markdownLines, splitLines(elementMarkdown), searchFrom);
        if (!range) continue;

        mappings.push({
          htmlElementId: id,
          htmlTag: element.tagName,
          htmlContent,
          markdownLineStart: range.start + 1,
          markdownLineEnd: range.end + 1,
          markdownContent: elementMarkdown,
        });

        // range.end is already claimed, so the next fragment starts after it
        searchFrom = range.end + 1;
      }

      this.mappings = mappings;

      return {
        originalHtmlLength,
        markdownResult: addLineNumbers(rawMarkdown).trim(),
        htmlWithIds,
        mappings,
        status: "converted",
      };
    } catch (error) {
      const message = (error instanceof Error ? error.message : String(error)) || "Unknown conversion error";
      console.error("MappingEngine: Conversion failed:", message);
      this.mappings = [];

      return {
        originalHtmlLength,
        markdownResult: "",
        htmlWithIds: "",
        mappings: [],
        status: "error",
        error: message,
      };
    }
  }

  findHtmlByLine(lineNumber: number): MappingRecord | undefined {
    return findMappingByLine(this.mappings, lineNumber);
  }

  getMappings(): readonly MappingRecord[] {
    return this.mappings;
  }
}
