// services/converterService.ts
import { MappingEngine } from "../classes/MappingEngine";
import { DocumentConversionResult, MappingRecord } from "../types/conversionTypes";
import { MarkdownRenderer } from "../types/rendererTypes";
import { SessionService } from "./sessionService";

export interface ConversionOutcome {
  result: DocumentConversionResult;
  sessionId?: string;
}

export class ConverterService {
  constructor(
    private readonly renderer: MarkdownRenderer,
    private readonly sessionService: SessionService
  ) {}

  /**
   * Converts with a fresh engine, so concurrent requests never share mapping
   * state. Successful conversions are kept as a mapping session for lookups.
   */
  convertHtmlText(htmlText: string): ConversionOutcome {
    const engine = new MappingEngine(this.renderer);
    const result = engine.convertWithMapping(htmlText);

    if (result.status !== "converted") {
      return { result };
    }

    const lineCount = result.markdownResult ? result.markdownResult.split("\n").length : 0;
    const session = this.sessionService.createSession(result.mappings, lineCount);
    console.log(
      `ConverterService: Converted ${result.originalHtmlLength} chars into ${lineCount} lines, ` +
        `${result.mappings.length} mappings (session ${session.sessionId})`
    );

    return { result, sessionId: session.sessionId };
  }

  findHtmlByLine(sessionId: string, lineNumber: number): MappingRecord | undefined {
    return this.sessionService.findHtmlByLine(sessionId, lineNumber);
  }

  deleteSession(sessionId: string): void {
    this.sessionService.deleteSession(sessionId);
  }
}
