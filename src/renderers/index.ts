import { MarkdownRenderer } from "../types/rendererTypes";
import { TurndownRenderer } from "./TurndownRenderer";

export { TurndownRenderer };

export const createRenderer = (): MarkdownRenderer => new TurndownRenderer();
