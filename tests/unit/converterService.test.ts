// tests/unit/converterService.test.ts
import { ConverterService } from "../../src/services/converterService";
import { SessionService } from "../../src/services/sessionService";
import { TurndownRenderer } from "../../src/renderers/TurndownRenderer";
import { MarkdownRenderer } from "../../src/types/rendererTypes";

describe("ConverterService", () => {
  let sessionService: SessionService;

  beforeEach(() => {
    sessionService = new SessionService(10);
  });

  it("should keep successful conversions as mapping sessions", () => {
    const service = new ConverterService(new TurndownRenderer(), sessionService);

    const { result, sessionId } = service.convertHtmlText("<h1>Title</h1><p>Hello <b>world</b></p>");

    expect(result.status).toBe("converted");
    expect(sessionId).toBeDefined();
    expect(sessionService.size).toBe(1);
    if (!sessionId) return;

    expect(sessionService.getSession(sessionId).markdownLineCount).toBe(3);
    expect(service.findHtmlByLine(sessionId, 3)?.htmlTag).toBe("p");
    expect(service.findHtmlByLine(sessionId, 2)).toBeUndefined();
  });

  it("should keep each conversion independent", () => {
    const service = new ConverterService(new TurndownRenderer(), sessionService);

    const first = service.convertHtmlText("<p>One</p><p>Two</p>");
    const second = service.convertHtmlText("<p>Three</p>");

    expect(first.sessionId).not.toBe(second.sessionId);
    if (!first.sessionId || !second.sessionId) return;

    expect(service.findHtmlByLine(first.sessionId, 3)?.markdownContent).toBe("Two");
    expect(service.findHtmlByLine(second.sessionId, 1)?.markdownContent).toBe("Three");
    expect(service.findHtmlByLine(second.sessionId, 3)).toBeUndefined();
  });

  it("should not store failed conversions", () => {
    const failing: MarkdownRenderer = {
      render: () => {
        throw new Error("renderer unavailable");
      },
    };
    const service = new ConverterService(failing, sessionService);

    const { result, sessionId } = service.convertHtmlText("<p>x</p>");

    expect(result.status).toBe("error");
    expect(result.error).toBe("renderer unavailable");
    expect(sessionId).toBeUndefined();
    expect(sessionService.size).toBe(0);
  });

  it("should delete sessions", () => {
    const service = new ConverterService(new TurndownRenderer(), sessionService);
    const { sessionId } = service.convertHtmlText("<p>x</p>");
    if (!sessionId) throw new Error("expected a session");

    service.deleteSession(sessionId);

    expect(() => service.findHtmlByLine(sessionId, 1)).toThrow("MAPPING_SESSION_NOT_FOUND");
  });
});
