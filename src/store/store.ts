/**
 * Persistence contract shared by the PostgreSQL store and the in-process store.
 *
 * The pipeline only ever talks to these interfaces; both implementations must
 * agree on ordering, cascades and the cursor compare-and-set.
 */

import { randomUUID } from "node:crypto";
import type {
  Book,
  BookSource,
  Chapter,
  DeliveryCursor,
  NewChapter,
  Subscriber,
  Subscription,
} from "../types.js";

export interface NewBook {
  title: string;
  author: string;
  source: BookSource;
}

export interface BookStore {
  createBook(book: NewBook): Promise<Book>;
  getBook(id: string): Promise<Book | null>;
  listBooks(): Promise<Book[]>;
  updateBook(id: string, changes: { title?: string; author?: string }): Promise<Book>;
  /** Cascades to the book's chapters and subscriptions */
  deleteBook(id: string): Promise<void>;
}

export interface ChapterStore {
  getChapter(id: string): Promise<Chapter | null>;
  /** All chapters of a book in ascending ingestion order */
  listChapters(bookId: string): Promise<Chapter[]>;
  /** Source keys already stored for a book */
  listSourceKeys(bookId: string): Promise<Set<string>>;
  /**
   * Insert chapters in the given order. Each gets an ingestion time strictly greater
   * than every chapter already stored for the book. Chapters whose source key is
   * already present are skipped, so concurrent or repeated calls never duplicate.
   *
   * @returns The chapters actually inserted, in order
   */
  insertChapters(bookId: string, chapters: NewChapter[]): Promise<Chapter[]>;
  /**
   * Chapters of a book ingested strictly after the cursor (all of them when unset),
   * ascending, at most `limit`.
   */
  listPendingChapters(bookId: string, cursor: DeliveryCursor, limit: number): Promise<Chapter[]>;
  /** Chapters without an artifact that have failed fewer than `maxAttempts` conversions */
  listChaptersAwaitingConversion(maxAttempts: number, limit: number): Promise<Chapter[]>;
  setArtifact(chapterId: string, artifact: Uint8Array): Promise<void>;
  recordConversionFailure(chapterId: string): Promise<void>;
  /** Nulls any subscription cursor pointing at the chapter */
  deleteChapter(id: string): Promise<void>;
}

export interface NewSubscriber {
  name: string;
  kindleEmail: string | null;
  pushoverKey: string | null;
}

export interface SubscriberStore {
  createSubscriber(subscriber: NewSubscriber): Promise<Subscriber>;
  getSubscriber(id: string): Promise<Subscriber | null>;
  listSubscribers(): Promise<Subscriber[]>;
  updateSubscriber(id: string, changes: Partial<NewSubscriber>): Promise<Subscriber>;
  /** Cascades to the subscriber's subscriptions */
  deleteSubscriber(id: string): Promise<void>;
}

export interface NewSubscription {
  subscriberId: string;
  bookId: string;
  chunkSize: number;
  /** Start after this chapter instead of from the beginning */
  lastDeliveredChapterId?: string;
}

export interface SubscriptionStore {
  createSubscription(subscription: NewSubscription): Promise<Subscription>;
  getSubscription(id: string): Promise<Subscription | null>;
  listSubscriptions(filter?: { subscriberId?: string; bookId?: string }): Promise<Subscription[]>;
  setChunkSize(id: string, chunkSize: number): Promise<Subscription>;
  deleteSubscription(id: string): Promise<void>;
  /**
   * Move the cursor from `expected` to `next` in one transaction.
   *
   * @throws {CursorConflictError} If the stored cursor is no longer `expected`
   */
  advanceCursor(id: string, expected: DeliveryCursor, next: DeliveryCursor): Promise<Subscription>;
}

/**
 * Expiring leases keyed by entity, visible to every process sharing the store.
 */
export interface LeaseStore {
  /**
   * Take the lease unless anyone, including `owner` itself, holds it unexpired.
   *
   * @returns Whether `owner` now holds the lease
   */
  acquireLease(key: string, owner: string, ttlMs: number): Promise<boolean>;
  releaseLease(key: string, owner: string): Promise<void>;
}

export interface Store extends BookStore, ChapterStore, SubscriberStore, SubscriptionStore, LeaseStore {
  close(): Promise<void>;
}

/** Who holds leases and for how long */
export interface LeaseOptions {
  /** Process id; each acquisition appends its own token to it */
  owner: string;
  ttlMs: number;
}

export type Leased<T> = { acquired: true; value: T } | { acquired: false };

/** Owner string for one acquisition, e.g. "host:4242:6f1c..." */
function leaseHolder(owner: string): string {
  return `${owner}:${randomUUID()}`;
}

/**
 * Run `work` while holding the lease `key`. The lease is released afterwards,
 * whether or not the work succeeded.
 *
 * Every call holds the lease under a fresh token, so two calls from the same
 * process exclude each other too.
 *
 * @returns `{ acquired: false }` without running anything if the lease is held
 */
export async function withLease<T>(
  leases: LeaseStore,
  key: string,
  options: LeaseOptions,
  work: () => Promise<T>,
): Promise<Leased<T>> {
  const holder = leaseHolder(options.owner);
  if (!(await leases.acquireLease(key, holder, options.ttlMs))) {
    return { acquired: false };
  }
  try {
    return { acquired: true, value: await work() };
  } finally {
    await leases.releaseLease(key, holder);
  }
}

/**
 * Next ingestion time for a book: now, unless the clock has not moved past the
 * previous chapter, in which case one millisecond after it.
 */
export function nextIngestionTime(previous: Date | null, now: Date): Date {
  if (previous === null || now.getTime() > previous.getTime()) {
    return now;
  }
  return new Date(previous.getTime() + 1);
}

/**
 * Validate a chunk size before it reaches the store.
 *
 * @throws {RangeError} If not a positive integer
 */
export function assertChunkSize(chunkSize: number): void {
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new RangeError(`Chunk size must be a positive integer, got ${chunkSize}`);
  }
}
