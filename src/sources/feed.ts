/**
 * Serials published as a blog with an RSS feed (WordPress and similar).
 *
 * Post bodies come from `content:encoded` when the feed carries them and no
 * selector is configured; otherwise the post page is fetched and the elements
 * matching the book's content selector are kept.
 */

import * as cheerio from "cheerio";
import { ConfigurationError, SourceFormatError } from "../errors.js";
import type { Book, FetchedChapter } from "../types.js";
import { fetchText, parseFeed, type AdapterOptions, type SourceAdapter } from "./source.js";

/** Children of a WordPress post body */
export const DEFAULT_CONTENT_SELECTOR = "div.entry-content > *";

/** Navigation links and share widgets serials put inside the post body */
const NAVIGATION_TEXT = new Set(["Next Chapter", "Previous Chapter"]);
const EXCLUDED_IDS = new Set(["jp-post-flair"]);

/**
 * Extract chapter markup from a post page.
 *
 * @throws {SourceFormatError} If nothing but navigation matched
 */
export function extractContent(html: string, selector: string, url: string): string {
  const $ = cheerio.load(html);
  const parts = $(selector)
    .toArray()
    .filter((element) => !EXCLUDED_IDS.has($(element).attr("id") ?? ""))
    .filter((element) => !isNavigation($(element).text().trim()))
    .map((element) => $.html(element));

  const body = parts.join("\n");
  if (!body.trim()) {
    throw new SourceFormatError(`Failed to find chapter body in ${url}`);
  }
  return body;
}

function isNavigation(text: string): boolean {
  if (NAVIGATION_TEXT.has(text)) return true;
  // "Previous Chapter | Next Chapter" style rows
  const pieces = text.split(/\s*[|·]\s*|\s{2,}/).filter(Boolean);
  return pieces.length > 1 && pieces.every((piece) => NAVIGATION_TEXT.has(piece));
}

export class FeedAdapter implements SourceAdapter {
  constructor(private readonly options: AdapterOptions = {}) {}

  async listChapters(book: Book, signal?: AbortSignal): Promise<unknown[]> {
    if (book.source.type !== "feed") {
      throw new ConfigurationError(`Book ${book.id} is not a feed source`);
    }
    const useEncoded = book.source.contentSelector === undefined;
    const xml = await fetchText(book.source.feedUrl, { ...this.options, signal });

    return parseFeed(xml).map((item) => ({
      key: item.guid || item.link,
      title: item.title,
      content: useEncoded && item.encoded !== null && item.encoded.trim() ? item.encoded : undefined,
      publishedAt: item.publishedAt,
      source: { type: "feed", url: item.link },
    }));
  }

  async fetchContent(book: Book, chapter: FetchedChapter, signal?: AbortSignal): Promise<string> {
    if (book.source.type !== "feed" || chapter.source.type !== "feed") {
      throw new ConfigurationError(`Chapter ${chapter.key} of book ${book.id} is not from a feed`);
    }
    const { url } = chapter.source;
    const html = await fetchText(url, { ...this.options, signal });
    return extractContent(html, book.source.contentSelector ?? DEFAULT_CONTENT_SELECTOR, url);
  }
}
