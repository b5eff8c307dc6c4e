/**
 * Test data builders shared by the test suites.
 */

import { MemoryStore } from "../store/memory.js";
import { UNSET_CURSOR, type Book, type Chapter, type DeliveryBatch, type NewChapter, type Subscriber } from "../types.js";

/** Mutable clock for stores and orchestrators under test */
export class TestClock {
  private current: number;

  constructor(start = "2026-01-01T00:00:00.000Z") {
    this.current = new Date(start).getTime();
  }

  now = (): Date => new Date(this.current);

  advance(ms: number): void {
    this.current += ms;
  }
}

export function newChapter(key: string, overrides: Partial<NewChapter> = {}): NewChapter {
  return {
    sourceKey: key,
    title: `Chapter ${key}`,
    source: { type: "feed", url: `https://example.com/${key}` },
    content: `<p>Text of ${key}</p>`,
    publishedAt: null,
    ...overrides,
  };
}

export function seedBook(store: MemoryStore, title = "Test Book"): Promise<Book> {
  return store.createBook({
    title,
    author: "Test Author",
    source: { type: "feed", feedUrl: "https://example.com/feed" },
  });
}

export function seedSubscriber(
  store: MemoryStore,
  destinations: { kindleEmail?: string | null; pushoverKey?: string | null } = {},
): Promise<Subscriber> {
  return store.createSubscriber({
    name: "Reader",
    kindleEmail: destinations.kindleEmail === undefined ? "reader@kindle.example" : destinations.kindleEmail,
    pushoverKey: destinations.pushoverKey ?? null,
  });
}

const EPOCH = new Date("2026-01-01T00:00:00.000Z");

export function bookFixture(overrides: Partial<Book> = {}): Book {
  return {
    id: "book-1",
    title: "Pale",
    author: "Test Author",
    source: { type: "feed", feedUrl: "https://example.com/feed" },
    createdAt: EPOCH,
    updatedAt: EPOCH,
    ...overrides,
  };
}

export function chapterFixture(id: string, overrides: Partial<Chapter> = {}): Chapter {
  return {
    id,
    bookId: "book-1",
    sourceKey: id,
    title: id,
    source: { type: "feed", url: `https://example.com/${id}` },
    content: `<p>Text of ${id}</p>`,
    artifact: null,
    publishedAt: null,
    ingestedAt: EPOCH,
    updatedAt: EPOCH,
    conversionAttempts: 0,
    ...overrides,
  };
}

export function batchFixture(chapters: Chapter[], book: Book = bookFixture()): DeliveryBatch {
  return {
    book,
    subscription: {
      id: "subscription-1",
      subscriberId: "subscriber-1",
      bookId: book.id,
      chunkSize: chapters.length,
      cursor: UNSET_CURSOR,
      createdAt: EPOCH,
      updatedAt: EPOCH,
    },
    chapters,
  };
}
