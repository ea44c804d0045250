import { RendererConfig } from "../types/rendererTypes";

export const RENDERER_CONFIG: RendererConfig = {
  headingStyle: "atx",
  bulletListMarker: "-",
  // Removed together with their text content
  strippedTags: ["script", "style"],
};

export const MAPPING_ID_ATTRIBUTE = "data-mapping-id";
