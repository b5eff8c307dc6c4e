/**
 * RoyalRoad fictions, read through the site's per-fiction syndication feed.
 *
 * The feed only lists chapters; bodies are fetched from the chapter page.
 */

import * as cheerio from "cheerio";
import { ConfigurationError, SourceFormatError } from "../errors.js";
import type { Book, FetchedChapter } from "../types.js";
import { fetchText, parseFeed, type AdapterOptions, type SourceAdapter } from "./source.js";

const BASE_URL = "https://www.royalroad.com";

export function syndicationUrl(fictionId: number): string {
  return `${BASE_URL}/syndication/${fictionId}`;
}

export function chapterUrl(chapterId: number): string {
  return `${BASE_URL}/fiction/chapter/${chapterId}`;
}

/**
 * Chapter id from the last path segment of a chapter link.
 *
 * @returns The id, or null when the link does not end in a number
 *
 * @example
 * chapterIdFromLink('https://www.royalroad.com/fiction/chapter/12345') // 12345
 */
export function chapterIdFromLink(link: string): number | null {
  const segment = link.replace(/\/+$/, "").split("/").pop() ?? "";
  return /^\d+$/.test(segment) ? Number(segment) : null;
}

/**
 * Feed titles read "<Fiction> - <Chapter>"; keep the chapter part.
 */
export function chapterTitle(feedTitle: string): string {
  const separator = feedTitle.indexOf(" - ");
  return separator === -1 ? feedTitle : feedTitle.slice(separator + 3).trim();
}

export class RoyalRoadAdapter implements SourceAdapter {
  constructor(private readonly options: AdapterOptions = {}) {}

  async listChapters(book: Book, signal?: AbortSignal): Promise<unknown[]> {
    if (book.source.type !== "royalroad") {
      throw new ConfigurationError(`Book ${book.id} is not a RoyalRoad fiction`);
    }
    const { fictionId } = book.source;
    const xml = await fetchText(syndicationUrl(fictionId), { ...this.options, signal });

    return parseFeed(xml).map((item) => {
      const chapterId = chapterIdFromLink(item.link);
      // Left for per-record validation to reject rather than failing the whole feed
      return {
        key: chapterId === null ? "" : String(chapterId),
        title: chapterTitle(item.title),
        publishedAt: item.publishedAt,
        source: { type: "royalroad", fictionId, chapterId, url: item.link },
      };
    });
  }

  async fetchContent(_book: Book, chapter: FetchedChapter, signal?: AbortSignal): Promise<string> {
    if (chapter.source.type !== "royalroad") {
      throw new ConfigurationError(`Chapter ${chapter.key} is not a RoyalRoad chapter`);
    }
    const url = chapterUrl(chapter.source.chapterId);
    const $ = cheerio.load(await fetchText(url, { ...this.options, signal }));
    const body = $("div.chapter-inner").first();
    if (body.length === 0) {
      throw new SourceFormatError(`Failed to find chapter body in ${url}`);
    }
    return $.html(body);
  }
}
