import { EmptyHtmlInputError } from "../errors/converter/ConverterErrorTypes";

export function validateConvertRequest(body: unknown): string {
  if (typeof body !== "object" || body === null || !("html_text" in body)) {
    throw new EmptyHtmlInputError();
  }

  const { html_text: htmlText } = body;
  if (typeof htmlText !== "string" || htmlText.length === 0) {
    throw new EmptyHtmlInputError();
  }

  return htmlText;
}
