import { InvalidLineNumberError } from "../errors/converter/ConverterErrorTypes";

const LINE_REFERENCE_PATTERN = /^(?:\[(\d+)\]|(\d+))$/;

export const splitLines = (text: string): string[] => text.split("\n");

export const formatLineNumber = (lineNumber: number): string =>
  `[${String(lineNumber).padStart(3, "0")}]`;

/**
 * Prefixes every line with its 1-based number, e.g. `[001] # Title`.
 */
export function addLineNumbers(markdown: string): string {
  return splitLines(markdown)
    .map((line, index) => `${formatLineNumber(index + 1)} ${line}`)
    .join("\n");
}

/**
 * Accepts `7`, `007` or `[007]` and returns the line number. Numbered and
 * unnumbered lines share the same coordinates.
 */
export function parseLineReference(value: string): number {
  const match = LINE_REFERENCE_PATTERN.exec(value.trim());
  if (!match) {
    throw new InvalidLineNumberError(value);
  }
  return parseInt(match[1] || match[2], 10);
}
