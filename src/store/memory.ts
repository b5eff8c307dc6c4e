/**
 * In-process store with the same contract as the PostgreSQL store.
 * Used by the test suite; nothing survives the process.
 */

import { randomUUID } from "node:crypto";
import { CursorConflictError, NotFoundError } from "../errors.js";
import {
  UNSET_CURSOR,
  cursorAt,
  sameCursor,
  type Book,
  type Chapter,
  type DeliveryCursor,
  type NewChapter,
  type Subscriber,
  type Subscription,
} from "../types.js";
import {
  assertChunkSize,
  nextIngestionTime,
  type NewBook,
  type NewSubscriber,
  type NewSubscription,
  type Store,
} from "./store.js";

interface Lease {
  owner: string;
  expiresAt: number;
}

export class MemoryStore implements Store {
  private readonly books = new Map<string, Book>();
  private readonly chapters = new Map<string, Chapter>();
  private readonly subscribers = new Map<string, Subscriber>();
  private readonly subscriptions = new Map<string, Subscription>();
  private readonly leases = new Map<string, Lease>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  // Books

  async createBook(book: NewBook): Promise<Book> {
    const now = this.now();
    const created: Book = { id: randomUUID(), ...book, createdAt: now, updatedAt: now };
    this.books.set(created.id, created);
    return structuredClone(created);
  }

  async getBook(id: string): Promise<Book | null> {
    const book = this.books.get(id);
    return book ? structuredClone(book) : null;
  }

  async listBooks(): Promise<Book[]> {
    return [...this.books.values()]
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .map((book) => structuredClone(book));
  }

  async updateBook(id: string, changes: { title?: string; author?: string }): Promise<Book> {
    const book = this.books.get(id);
    if (!book) throw new NotFoundError("book", id);
    const updated: Book = {
      ...book,
      title: changes.title ?? book.title,
      author: changes.author ?? book.author,
      updatedAt: this.now(),
    };
    this.books.set(id, updated);
    return structuredClone(updated);
  }

  async deleteBook(id: string): Promise<void> {
    this.books.delete(id);
    for (const subscription of [...this.subscriptions.values()]) {
      if (subscription.bookId === id) this.subscriptions.delete(subscription.id);
    }
    for (const chapter of [...this.chapters.values()]) {
      if (chapter.bookId === id) this.chapters.delete(chapter.id);
    }
  }

  // Chapters

  async getChapter(id: string): Promise<Chapter | null> {
    const chapter = this.chapters.get(id);
    return chapter ? structuredClone(chapter) : null;
  }

  async listChapters(bookId: string): Promise<Chapter[]> {
    return this.chaptersOf(bookId).map((chapter) => structuredClone(chapter));
  }

  async listSourceKeys(bookId: string): Promise<Set<string>> {
    return new Set(this.chaptersOf(bookId).map((chapter) => chapter.sourceKey));
  }

  async insertChapters(bookId: string, chapters: NewChapter[]): Promise<Chapter[]> {
    if (!this.books.has(bookId)) throw new NotFoundError("book", bookId);

    const existing = this.chaptersOf(bookId);
    const keys = new Set(existing.map((chapter) => chapter.sourceKey));
    let previous = existing.length > 0 ? existing[existing.length - 1].ingestedAt : null;

    const inserted: Chapter[] = [];
    for (const chapter of chapters) {
      if (keys.has(chapter.sourceKey)) continue;
      const ingestedAt = nextIngestionTime(previous, this.now());
      const created: Chapter = {
        id: randomUUID(),
        bookId,
        ...chapter,
        artifact: null,
        ingestedAt,
        updatedAt: ingestedAt,
        conversionAttempts: 0,
      };
      this.chapters.set(created.id, created);
      keys.add(chapter.sourceKey);
      previous = ingestedAt;
      inserted.push(structuredClone(created));
    }
    return inserted;
  }

  async listPendingChapters(bookId: string, cursor: DeliveryCursor, limit: number): Promise<Chapter[]> {
    const after = cursor.kind === "delivered" ? cursor.ingestedAt.getTime() : Number.NEGATIVE_INFINITY;
    return this.chaptersOf(bookId)
      .filter((chapter) => chapter.ingestedAt.getTime() > after)
      .slice(0, limit)
      .map((chapter) => structuredClone(chapter));
  }

  async listChaptersAwaitingConversion(maxAttempts: number, limit: number): Promise<Chapter[]> {
    return [...this.chapters.values()]
      .filter((chapter) => chapter.artifact === null && chapter.conversionAttempts < maxAttempts)
      .sort((a, b) => a.ingestedAt.getTime() - b.ingestedAt.getTime())
      .slice(0, limit)
      .map((chapter) => structuredClone(chapter));
  }

  async setArtifact(chapterId: string, artifact: Uint8Array): Promise<void> {
    const chapter = this.chapters.get(chapterId);
    if (!chapter) throw new NotFoundError("chapter", chapterId);
    this.chapters.set(chapterId, { ...chapter, artifact: new Uint8Array(artifact), updatedAt: this.now() });
  }

  async recordConversionFailure(chapterId: string): Promise<void> {
    const chapter = this.chapters.get(chapterId);
    if (!chapter) throw new NotFoundError("chapter", chapterId);
    this.chapters.set(chapterId, {
      ...chapter,
      conversionAttempts: chapter.conversionAttempts + 1,
      updatedAt: this.now(),
    });
  }

  async deleteChapter(id: string): Promise<void> {
    this.chapters.delete(id);
    for (const subscription of this.subscriptions.values()) {
      if (subscription.cursor.kind === "delivered" && subscription.cursor.chapterId === id) {
        this.subscriptions.set(subscription.id, { ...subscription, cursor: UNSET_CURSOR });
      }
    }
  }

  // Subscribers

  async createSubscriber(subscriber: NewSubscriber): Promise<Subscriber> {
    const now = this.now();
    const created: Subscriber = { id: randomUUID(), ...subscriber, createdAt: now, updatedAt: now };
    this.subscribers.set(created.id, created);
    return structuredClone(created);
  }

  async getSubscriber(id: string): Promise<Subscriber | null> {
    const subscriber = this.subscribers.get(id);
    return subscriber ? structuredClone(subscriber) : null;
  }

  async listSubscribers(): Promise<Subscriber[]> {
    return [...this.subscribers.values()]
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .map((subscriber) => structuredClone(subscriber));
  }

  async updateSubscriber(id: string, changes: Partial<NewSubscriber>): Promise<Subscriber> {
    const subscriber = this.subscribers.get(id);
    if (!subscriber) throw new NotFoundError("subscriber", id);
    const updated: Subscriber = {
      ...subscriber,
      name: changes.name ?? subscriber.name,
      kindleEmail: changes.kindleEmail === undefined ? subscriber.kindleEmail : changes.kindleEmail,
      pushoverKey: changes.pushoverKey === undefined ? subscriber.pushoverKey : changes.pushoverKey,
      updatedAt: this.now(),
    };
    this.subscribers.set(id, updated);
    return structuredClone(updated);
  }

  async deleteSubscriber(id: string): Promise<void> {
    this.subscribers.delete(id);
    for (const subscription of [...this.subscriptions.values()]) {
      if (subscription.subscriberId === id) this.subscriptions.delete(subscription.id);
    }
  }

  // Subscriptions

  async createSubscription(subscription: NewSubscription): Promise<Subscription> {
    assertChunkSize(subscription.chunkSize);
    if (!this.books.has(subscription.bookId)) throw new NotFoundError("book", subscription.bookId);
    if (!this.subscribers.has(subscription.subscriberId)) {
      throw new NotFoundError("subscriber", subscription.subscriberId);
    }

    let cursor: DeliveryCursor = UNSET_CURSOR;
    if (subscription.lastDeliveredChapterId !== undefined) {
      const chapter = this.chapters.get(subscription.lastDeliveredChapterId);
      if (!chapter || chapter.bookId !== subscription.bookId) {
        throw new NotFoundError("chapter", subscription.lastDeliveredChapterId);
      }
      cursor = cursorAt(chapter);
    }

    const now = this.now();
    const created: Subscription = {
      id: randomUUID(),
      subscriberId: subscription.subscriberId,
      bookId: subscription.bookId,
      chunkSize: subscription.chunkSize,
      cursor,
      createdAt: now,
      updatedAt: now,
    };
    this.subscriptions.set(created.id, created);
    return structuredClone(created);
  }

  async getSubscription(id: string): Promise<Subscription | null> {
    const subscription = this.subscriptions.get(id);
    return subscription ? structuredClone(subscription) : null;
  }

  async listSubscriptions(filter: { subscriberId?: string; bookId?: string } = {}): Promise<Subscription[]> {
    return [...this.subscriptions.values()]
      .filter((s) => filter.subscriberId === undefined || s.subscriberId === filter.subscriberId)
      .filter((s) => filter.bookId === undefined || s.bookId === filter.bookId)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .map((subscription) => structuredClone(subscription));
  }

  async setChunkSize(id: string, chunkSize: number): Promise<Subscription> {
    assertChunkSize(chunkSize);
    const subscription = this.subscriptions.get(id);
    if (!subscription) throw new NotFoundError("subscription", id);
    const updated = { ...subscription, chunkSize, updatedAt: this.now() };
    this.subscriptions.set(id, updated);
    return structuredClone(updated);
  }

  async deleteSubscription(id: string): Promise<void> {
    this.subscriptions.delete(id);
  }

  async advanceCursor(id: string, expected: DeliveryCursor, next: DeliveryCursor): Promise<Subscription> {
    const subscription = this.subscriptions.get(id);
    if (!subscription) throw new NotFoundError("subscription", id);
    if (!sameCursor(subscription.cursor, expected)) throw new CursorConflictError(id);
    const updated = { ...subscription, cursor: next, updatedAt: this.now() };
    this.subscriptions.set(id, updated);
    return structuredClone(updated);
  }

  // Leases

  async acquireLease(key: string, owner: string, ttlMs: number): Promise<boolean> {
    const now = this.now().getTime();
    const lease = this.leases.get(key);
    if (lease && lease.expiresAt > now) {
      return false;
    }
    this.leases.set(key, { owner, expiresAt: now + ttlMs });
    return true;
  }

  async releaseLease(key: string, owner: string): Promise<void> {
    if (this.leases.get(key)?.owner === owner) {
      this.leases.delete(key);
    }
  }

  async close(): Promise<void> {}

  private chaptersOf(bookId: string): Chapter[] {
    return [...this.chapters.values()]
      .filter((chapter) => chapter.bookId === bookId)
      .sort((a, b) => a.ingestedAt.getTime() - b.ingestedAt.getTime());
  }
}
