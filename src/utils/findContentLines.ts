import { LineRange } from "../types/conversionTypes";

/**
 * Finds the first run of `markdownLines`, starting at `startFrom`, that matches
 * every line of `contentLines` in order. Lines are compared with surrounding
 * whitespace trimmed.
 *
 * `startFrom` is the first line that may be claimed; callers pass the line
 * after the previous match, so its end line is excluded from the search.
 */
export function findContentLines(
  markdownLines: string[],
  contentLines: string[],
  startFrom = 0
): LineRange | null {
  if (contentLines.length === 0) return null;

  const lastStart = markdownLines.length - contentLines.length;

  for (let i = Math.max(startFrom, 0); i <= lastStart; i++) {
    const matches = contentLines.every(
      (contentLine, j) => markdownLines[i + j].trim() === contentLine.trim()
    );

    if (matches) {
      return { start: i, end: i + contentLines.length - 1 };
    }
  }

  return null;
}
