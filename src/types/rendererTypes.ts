// types/rendererTypes.ts

export type HeadingStyle = "atx" | "setext";

export type BulletListMarker = "-" | "+" | "*";

export interface RendererConfig {
  headingStyle: HeadingStyle;
  bulletListMarker: BulletListMarker;
  strippedTags: Array<keyof HTMLElementTagNameMap>;
}

export interface MarkdownRenderer {
  render(html: string): string;
}
