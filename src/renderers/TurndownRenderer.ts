import TurndownService from "turndown";
import { RENDERER_CONFIG } from "../constants/rendererConfig";
import { MarkdownRenderer, RendererConfig } from "../types/rendererTypes";

// renderers/TurndownRenderer.ts
export class TurndownRenderer implements MarkdownRenderer {
  private readonly service: TurndownService;

  constructor(config: RendererConfig = RENDERER_CONFIG) {
    this.service = new TurndownService({
      headingStyle: config.headingStyle,
      bulletListMarker: config.bulletListMarker,
    });

    this.service.remove(config.strippedTags);
  }

  render(html: string): string {
    return this.service.turndown(html);
  }
}
