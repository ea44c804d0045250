import * as cheerio from "cheerio";

/**
 * Parses HTML with htmlparser2, which keeps the input's structure as written:
 * no implied html/head/body, doctype kept, stray table rows left in place.
 * The root's direct children are the top-level nodes of the input.
 * Each call returns a new tree owned by the caller.
 */
export function loadHtmlIntoCheerio(html: string): cheerio.CheerioAPI {
  return cheerio.load(html, { xml: { xmlMode: false } }, false);
}
