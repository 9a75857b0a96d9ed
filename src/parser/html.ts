import { load } from "cheerio";

const DISCARDED = "script, style, noscript, template, head";

const BLOCK_ELEMENTS = [
  "address", "article", "aside", "blockquote", "dd", "div", "dl", "dt",
  "fieldset", "figcaption", "figure", "footer", "form", "h1", "h2", "h3",
  "h4", "h5", "h6", "header", "hr", "li", "main", "nav", "ol", "p", "pre",
  "section", "table", "tr", "td", "th", "ul",
].join(", ");

/**
 * Reduce an HTML body to readable text: block boundaries become line
 * breaks, whitespace inside a line collapses and blank lines are dropped.
 */
export function htmlToText(html: string): string {
  const $ = load(html);
  $(DISCARDED).remove();
  $("br").replaceWith("\n");
  $(BLOCK_ELEMENTS).each((_, el) => {
    $(el).prepend("\n").append("\n");
  });

  return $.root()
    .text()
    .replace(/\u00a0/g, " ")
    .split(/\r?\n/)
    .map((line) => line.replace(/[ \t\f\v]+/g, " ").trim())
    .filter((line) => line.length > 0)
    .join("\n");
}
