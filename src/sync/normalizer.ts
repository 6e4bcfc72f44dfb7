// pattern: Functional Core
import * as cheerio from "cheerio";
import type { NormalizedArticle, RawArticle } from "./types";

const WORDS_PER_MINUTE = 200;
const SUMMARY_LENGTH = 200;
const MIN_SENTENCE_CUT = 100;
const SENTENCE_TERMINATORS = ["。", ".", "!", "?", "！", "？"];

const STRIPPED_TAGS = "script, style, iframe, noscript";
const BLOCK_TAGS = [
  "p", "div", "section", "article", "header", "footer", "blockquote", "pre",
  "ul", "ol", "li", "table", "tr", "figure", "figcaption",
  "h1", "h2", "h3", "h4", "h5", "h6",
].join(", ");

export type NormalizeOptions = {
  /** Used when the upstream item has no author (typically the account name). */
  readonly fallbackAuthor?: string;
};

function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

function extractImages($: cheerio.CheerioAPI): Array<string> {
  const seen = new Set<string>();
  $("img").each((_, el) => {
    const src = $(el).attr("data-src") ?? $(el).attr("src");
    if (src && /^https?:\/\//i.test(src)) seen.add(src);
  });
  return [...seen];
}

function extractText($: cheerio.CheerioAPI): string {
  $(STRIPPED_TAGS).remove();
  $("br").replaceWith("\n");
  $(BLOCK_TAGS).each((_, el) => {
    $(el).prepend("\n").append("\n");
  });

  return $("body")
    .text()
    .split("\n")
    .map((line) => line.replace(/[ \t\u00a0]+/g, " ").trim())
    .filter((line) => line.length > 0)
    .join("\n");
}

/**
 * Strips markup, returning one trimmed line per block of text. Script,
 * style, iframe and noscript contents are dropped.
 */
export function htmlToText(html: string): string {
  if (html.trim().length === 0) return "";
  return extractText(cheerio.load(html));
}

/**
 * First {@link SUMMARY_LENGTH} characters of the text, cut back to the last
 * sentence end when one falls late enough, else marked with an ellipsis.
 */
export function summarize(text: string): string {
  const flat = collapseWhitespace(text);
  if (flat.length <= SUMMARY_LENGTH) return flat;

  const head = flat.slice(0, SUMMARY_LENGTH);
  const cut = Math.max(...SENTENCE_TERMINATORS.map((t) => head.lastIndexOf(t)));
  if (cut > MIN_SENTENCE_CUT) return head.slice(0, cut + 1);
  return `${head}...`;
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter((token) => token.length > 0).length;
}

export function readingTimeMinutes(wordCount: number): number {
  return Math.max(1, Math.ceil(wordCount / WORDS_PER_MINUTE));
}

function parseDate(value: string | null): Date | null {
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

function resolveAuthor(author: string | null, fallback: string | undefined): string | null {
  const cleaned = author ? collapseWhitespace(author) : "";
  if (cleaned.length === 0 || cleaned.toLowerCase() === "unknown") {
    return fallback ?? null;
  }
  return cleaned;
}

/**
 * Turns a validated upstream item into the record the merge engine stores.
 * Pure: identical input yields an identical record.
 */
export function normalizeArticle(
  raw: RawArticle,
  options: NormalizeOptions = {},
): NormalizedArticle {
  const $ = cheerio.load(raw.htmlBody);
  const images = extractImages($);
  const content = raw.htmlBody.trim().length === 0 ? "" : extractText($);
  const wordCount = countWords(content);

  return {
    guid: raw.guid,
    title: collapseWhitespace(raw.title),
    author: resolveAuthor(raw.author, options.fallbackAuthor),
    url: raw.link,
    contentHtml: raw.htmlBody,
    content,
    summary: summarize(content),
    images,
    coverImage: raw.coverImageUrl ?? images[0] ?? null,
    publishedAt: parseDate(raw.publishedAt),
    wordCount,
    readingTimeMinutes: readingTimeMinutes(wordCount),
  };
}
