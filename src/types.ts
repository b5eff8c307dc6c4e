/**
 * Shared type definitions for the courier
 */

/** Where a book's chapters come from */
export type BookSource =
  | { type: "royalroad"; fictionId: number }
  | { type: "feed"; feedUrl: string; contentSelector?: string };

/** Where a single chapter came from, enough to fetch its content again */
export type ChapterSource =
  | { type: "royalroad"; fictionId: number; chapterId: number; url: string }
  | { type: "feed"; url: string };

/** A tracked work */
export interface Book {
  id: string;
  title: string;
  author: string;
  source: BookSource;
  createdAt: Date;
  updatedAt: Date;
}

/** One unit of content belonging to a book */
export interface Chapter {
  id: string;
  bookId: string;
  /** Source-stable key, unique within the book */
  sourceKey: string;
  title: string;
  source: ChapterSource;
  /** Raw chapter markup as fetched */
  content: string;
  /** Packaged e-book, null while conversion is pending or after it gave up */
  artifact: Uint8Array | null;
  /** Publication time reported by the source, if it reports one */
  publishedAt: Date | null;
  /** Ingestion time; strictly increasing within a book and used for delivery order */
  ingestedAt: Date;
  updatedAt: Date;
  /** Failed conversion attempts so far */
  conversionAttempts: number;
}

/** A chapter record as returned by a source adapter */
export interface FetchedChapter {
  key: string;
  title: string;
  /** Absent when the adapter only lists chapters and fetches content on demand */
  content?: string;
  publishedAt: Date | null;
  source: ChapterSource;
}

/** A chapter about to be inserted, content already resolved */
export interface NewChapter {
  sourceKey: string;
  title: string;
  source: ChapterSource;
  content: string;
  publishedAt: Date | null;
}

/** A recipient */
export interface Subscriber {
  id: string;
  name: string;
  kindleEmail: string | null;
  pushoverKey: string | null;
  createdAt: Date;
  updatedAt: Date;
}

/** Last chapter successfully delivered for a subscription */
export type DeliveryCursor =
  | { kind: "unset" }
  | { kind: "delivered"; chapterId: string; ingestedAt: Date };

/** A subscriber's standing interest in a book */
export interface Subscription {
  id: string;
  subscriberId: string;
  bookId: string;
  /** Maximum chapters per delivery, at least 1 */
  chunkSize: number;
  cursor: DeliveryCursor;
  createdAt: Date;
  updatedAt: Date;
}

/** Kinds of destination a subscriber can have */
export type DestinationKind = "kindle" | "pushover";

/** An ordered batch of chapters handed to a delivery channel */
export interface DeliveryBatch {
  book: Book;
  subscription: Subscription;
  /** Ascending ingestion order, never empty */
  chapters: Chapter[];
}

export const UNSET_CURSOR: DeliveryCursor = { kind: "unset" };

/**
 * Cursor pointing at a chapter.
 */
export function cursorAt(chapter: Pick<Chapter, "id" | "ingestedAt">): DeliveryCursor {
  return { kind: "delivered", chapterId: chapter.id, ingestedAt: chapter.ingestedAt };
}

/**
 * Compare two cursors by value.
 */
export function sameCursor(a: DeliveryCursor, b: DeliveryCursor): boolean {
  if (a.kind === "unset" || b.kind === "unset") {
    return a.kind === b.kind;
  }
  return a.chapterId === b.chapterId && a.ingestedAt.getTime() === b.ingestedAt.getTime();
}
