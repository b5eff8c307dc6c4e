/**
 * Source adapters: where a book's chapter list and chapter bodies come from.
 */

import * as cheerio from "cheerio";
import { FetchError, SourceFormatError } from "../errors.js";
import type { Book, FetchedChapter } from "../types.js";
import { fetchWithRetry, type RetryOptions } from "../utils.js";

export interface SourceAdapter {
  /**
   * Current chapter list of a book, in any order. Records are returned as
   * parsed from the source and validated one by one by the caller.
   *
   * @throws {FetchError} When the source cannot be reached
   * @throws {SourceFormatError} When the whole response is unreadable
   */
  listChapters(book: Book, signal?: AbortSignal): Promise<unknown[]>;

  /**
   * Markup of a chapter the listing returned without content.
   */
  fetchContent(book: Book, chapter: FetchedChapter, signal?: AbortSignal): Promise<string>;
}

/** Retry settings adapters pass on to {@link fetchWithRetry} */
export type AdapterOptions = Omit<RetryOptions, "signal">;

/**
 * GET a URL as text.
 *
 * @throws {FetchError} On network failure or a non-2xx response
 */
export async function fetchText(url: string, options: RetryOptions = {}): Promise<string> {
  const response = await fetchWithRetry(url, { headers: { "User-Agent": "serial-courier" } }, options);
  if (!response.ok) {
    throw new FetchError(url, `GET ${url} returned ${response.status}`, { status: response.status });
  }
  return response.text();
}

/** One `<item>` of an RSS 2.0 feed */
export interface FeedItem {
  title: string;
  link: string;
  guid: string;
  publishedAt: Date | null;
  /** Full post body from `content:encoded`, when the feed carries it */
  encoded: string | null;
}

/**
 * Parse the items of an RSS 2.0 feed.
 *
 * @throws {SourceFormatError} If the document has no RSS channel
 */
export function parseFeed(xml: string): FeedItem[] {
  const $ = cheerio.load(xml, { xmlMode: true });
  if ($("rss > channel").length === 0) {
    throw new SourceFormatError("Response is not an RSS feed");
  }

  return $("rss > channel > item")
    .toArray()
    .map((element) => {
      const item = $(element);
      const encoded = item.find("content\\:encoded").first();
      return {
        title: item.children("title").text().trim(),
        link: item.children("link").text().trim(),
        guid: item.children("guid").text().trim(),
        publishedAt: parseDate(item.children("pubDate").text()),
        encoded: encoded.length > 0 ? encoded.text() : null,
      };
    });
}

/**
 * Parse an RFC 2822 feed date.
 *
 * @returns The date, or null when missing or unparseable
 */
export function parseDate(value: string): Date | null {
  if (!value.trim()) return null;
  const date = new Date(value.trim());
  return Number.isNaN(date.getTime()) ? null : date;
}
