import * as cheerio from "cheerio";
import { normalizeWhitespace } from "../utils/text";

const NON_CONTENT = "script, style, noscript, template, iframe, svg, head, meta, link";
const HIDDEN = [
  "[aria-hidden='true']",
  "[hidden]",
  "[style*='display:none']",
  "[style*='display: none']",
  "[style*='visibility:hidden']",
  "[style*='visibility: hidden']"
].join(", ");
// Adjacent cells and list items must not fuse into one word.
const BLOCK_BOUNDARIES = "td, th, li, dt, dd, p, div, br, h1, h2, h3, h4, h5, h6";

export function looksLikeHtml(content: string): boolean {
  return /<(html|body|div|table|p|span|a|ul|li)[\s>]/i.test(content.slice(0, 4096));
}

/** Text a reader of the page would see, whitespace collapsed. */
export function extractVisibleText(html: string): string {
  const $ = cheerio.load(html);
  $(NON_CONTENT).remove();
  $(HIDDEN).remove();
  $(BLOCK_BOUNDARIES).after(" ");

  const text = $("body").text() || $.root().text();
  return normalizeWhitespace(text);
}
