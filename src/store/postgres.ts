/**
 * PostgreSQL implementation of the store, on node-postgres.
 *
 * Rows are validated with zod on the way out so a schema drift shows up as an
 * error naming the column instead of an undefined deep in the pipeline.
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import pg from "pg";
import { z } from "zod";
import { CursorConflictError, NotFoundError } from "../errors.js";
import { bookSourceSchema, chapterSourceSchema, formatIssues } from "../schemas.js";
import {
  UNSET_CURSOR,
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

/** The part of a pg client the store uses */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
}

/** A pooled connection checked out for a transaction */
export interface SqlConnection extends SqlClient {
  /** Pass an error to discard the connection instead of returning it to the pool */
  release(error?: Error | boolean): void;
}

export interface SqlPool extends SqlClient {
  connect(): Promise<SqlConnection>;
  end(): Promise<void>;
}

/**
 * Wrap a node-postgres pool in the narrow interface the store uses.
 */
export function fromPgPool(pool: pg.Pool): SqlPool {
  return {
    query: (text, values) => pool.query(text, values),
    connect: async () => {
      const client = await pool.connect();
      return {
        query: (text, values) => client.query(text, values),
        release: (error) => client.release(error),
      };
    },
    end: () => pool.end(),
  };
}

/**
 * Create a pool for a connection string.
 */
export function createPool(connectionString: string, max = 10): SqlPool {
  return fromPgPool(new pg.Pool({ connectionString, max, idleTimeoutMillis: 10_000 }));
}

const bookRowSchema = z.object({
  id: z.string(),
  title: z.string(),
  author: z.string(),
  source: bookSourceSchema,
  created_at: z.date(),
  updated_at: z.date(),
});

const chapterRowSchema = z.object({
  id: z.string(),
  book_id: z.string(),
  source_key: z.string(),
  title: z.string(),
  source: chapterSourceSchema,
  content: z.string(),
  artifact: z.instanceof(Uint8Array).nullable(),
  published_at: z.date().nullable(),
  conversion_attempts: z.number().int(),
  created_at: z.date(),
  updated_at: z.date(),
});

const subscriberRowSchema = z.object({
  id: z.string(),
  name: z.string(),
  kindle_email: z.string().nullable(),
  pushover_key: z.string().nullable(),
  created_at: z.date(),
  updated_at: z.date(),
});

const subscriptionRowSchema = z.object({
  id: z.string(),
  subscriber_id: z.string(),
  book_id: z.string(),
  chunk_size: z.number().int(),
  last_delivered_chapter_id: z.string().nullable(),
  last_delivered_chapter_created_at: z.date().nullable(),
  created_at: z.date(),
  updated_at: z.date(),
});

const cursorRowSchema = subscriptionRowSchema.pick({
  last_delivered_chapter_id: true,
  last_delivered_chapter_created_at: true,
});

function parseRow<T extends z.ZodTypeAny>(schema: T, table: string, row: unknown): z.output<T> {
  const result = schema.safeParse(row);
  if (!result.success) {
    throw new Error(`Unexpected ${table} row: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export function toBook(row: unknown): Book {
  const r = parseRow(bookRowSchema, "books", row);
  return {
    id: r.id,
    title: r.title,
    author: r.author,
    source: r.source,
    createdAt: r.created_at,
    updatedAt: r.updated_at,
  };
}

export function toChapter(row: unknown): Chapter {
  const r = parseRow(chapterRowSchema, "chapters", row);
  return {
    id: r.id,
    bookId: r.book_id,
    sourceKey: r.source_key,
    title: r.title,
    source: r.source,
    content: r.content,
    artifact: r.artifact,
    publishedAt: r.published_at,
    ingestedAt: r.created_at,
    updatedAt: r.updated_at,
    conversionAttempts: r.conversion_attempts,
  };
}

export function toSubscriber(row: unknown): Subscriber {
  const r = parseRow(subscriberRowSchema, "subscribers", row);
  return {
    id: r.id,
    name: r.name,
    kindleEmail: r.kindle_email,
    pushoverKey: r.pushover_key,
    createdAt: r.created_at,
    updatedAt: r.updated_at,
  };
}

/**
 * Read the two nullable cursor columns back into the tagged cursor.
 *
 * @throws {Error} If only one of the pair is set
 */
export function toCursor(row: unknown): DeliveryCursor {
  const r = parseRow(cursorRowSchema, "subscriptions", row);
  const id = r.last_delivered_chapter_id;
  const at = r.last_delivered_chapter_created_at;
  if (id === null && at === null) return UNSET_CURSOR;
  if (id !== null && at !== null) return { kind: "delivered", chapterId: id, ingestedAt: at };
  throw new Error("Unexpected subscriptions row: cursor columns must be both set or both null");
}

export function toSubscription(row: unknown): Subscription {
  const r = parseRow(subscriptionRowSchema, "subscriptions", row);
  return {
    id: r.id,
    subscriberId: r.subscriber_id,
    bookId: r.book_id,
    chunkSize: r.chunk_size,
    cursor: toCursor(row),
    createdAt: r.created_at,
    updatedAt: r.updated_at,
  };
}

/** Cursor as the two columns it is stored in */
function cursorColumns(cursor: DeliveryCursor): [string | null, Date | null] {
  return cursor.kind === "delivered" ? [cursor.chapterId, cursor.ingestedAt] : [null, null];
}

export class PgStore implements Store {
  constructor(
    private readonly pool: SqlPool,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /**
   * Create the tables if they do not exist yet.
   */
  async migrate(): Promise<void> {
    const sql = await fs.readFile(new URL("./schema.sql", import.meta.url), "utf-8");
    await this.pool.query(sql);
  }

  // Books

  async createBook(book: NewBook): Promise<Book> {
    const now = this.now();
    const { rows } = await this.pool.query(
      `INSERT INTO books(id, title, author, source, created_at, updated_at)
       VALUES ($1, $2, $3, $4, $5, $5)
       RETURNING *`,
      [randomUUID(), book.title, book.author, JSON.stringify(book.source), now],
    );
    return toBook(rows[0]);
  }

  async getBook(id: string): Promise<Book | null> {
    const { rows } = await this.pool.query("SELECT * FROM books WHERE id = $1", [id]);
    return rows.length > 0 ? toBook(rows[0]) : null;
  }

  async listBooks(): Promise<Book[]> {
    const { rows } = await this.pool.query("SELECT * FROM books ORDER BY created_at ASC");
    return rows.map(toBook);
  }

  async updateBook(id: string, changes: { title?: string; author?: string }): Promise<Book> {
    const { rows } = await this.pool.query(
      `UPDATE books
       SET title = coalesce($1, title), author = coalesce($2, author), updated_at = $3
       WHERE id = $4
       RETURNING *`,
      [changes.title ?? null, changes.author ?? null, this.now(), id],
    );
    if (rows.length === 0) throw new NotFoundError("book", id);
    return toBook(rows[0]);
  }

  async deleteBook(id: string): Promise<void> {
    await this.pool.query("DELETE FROM books WHERE id = $1", [id]);
  }

  // Chapters

  async getChapter(id: string): Promise<Chapter | null> {
    const { rows } = await this.pool.query("SELECT * FROM chapters WHERE id = $1", [id]);
    return rows.length > 0 ? toChapter(rows[0]) : null;
  }

  async listChapters(bookId: string): Promise<Chapter[]> {
    const { rows } = await this.pool.query(
      "SELECT * FROM chapters WHERE book_id = $1 ORDER BY created_at ASC",
      [bookId],
    );
    return rows.map(toChapter);
  }

  async listSourceKeys(bookId: string): Promise<Set<string>> {
    const { rows } = await this.pool.query("SELECT source_key FROM chapters WHERE book_id = $1", [bookId]);
    const keyRow = z.object({ source_key: z.string() });
    return new Set(rows.map((row) => parseRow(keyRow, "chapters", row).source_key));
  }

  async insertChapters(bookId: string, chapters: NewChapter[]): Promise<Chapter[]> {
    return this.transaction(async (client) => {
      // Row lock on the book serializes concurrent ingestion of the same book
      const book = await client.query("SELECT id FROM books WHERE id = $1 FOR UPDATE", [bookId]);
      if (book.rows.length === 0) throw new NotFoundError("book", bookId);

      const last = await client.query(
        "SELECT max(created_at) AS last FROM chapters WHERE book_id = $1",
        [bookId],
      );
      let previous = parseRow(z.object({ last: z.date().nullable() }), "chapters", last.rows[0]).last;

      const inserted: Chapter[] = [];
      for (const chapter of chapters) {
        const ingestedAt = nextIngestionTime(previous, this.now());
        const { rows } = await client.query(
          `INSERT INTO chapters(id, book_id, source_key, title, source, content, published_at, created_at, updated_at)
           VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $8)
           ON CONFLICT (book_id, source_key) DO NOTHING
           RETURNING *`,
          [
            randomUUID(),
            bookId,
            chapter.sourceKey,
            chapter.title,
            JSON.stringify(chapter.source),
            chapter.content,
            chapter.publishedAt,
            ingestedAt,
          ],
        );
        if (rows.length > 0) {
          inserted.push(toChapter(rows[0]));
          previous = ingestedAt;
        }
      }
      return inserted;
    });
  }

  async listPendingChapters(bookId: string, cursor: DeliveryCursor, limit: number): Promise<Chapter[]> {
    const { rows } =
      cursor.kind === "delivered"
        ? await this.pool.query(
            `SELECT * FROM chapters WHERE book_id = $1 AND created_at > $2
             ORDER BY created_at ASC LIMIT $3`,
            [bookId, cursor.ingestedAt, limit],
          )
        : await this.pool.query(
            "SELECT * FROM chapters WHERE book_id = $1 ORDER BY created_at ASC LIMIT $2",
            [bookId, limit],
          );
    return rows.map(toChapter);
  }

  async listChaptersAwaitingConversion(maxAttempts: number, limit: number): Promise<Chapter[]> {
    const { rows } = await this.pool.query(
      `SELECT * FROM chapters WHERE artifact IS NULL AND conversion_attempts < $1
       ORDER BY created_at ASC LIMIT $2`,
      [maxAttempts, limit],
    );
    return rows.map(toChapter);
  }

  async setArtifact(chapterId: string, artifact: Uint8Array): Promise<void> {
    const { rowCount } = await this.pool.query(
      "UPDATE chapters SET artifact = $1, updated_at = $2 WHERE id = $3",
      [Buffer.from(artifact), this.now(), chapterId],
    );
    if (rowCount === 0) throw new NotFoundError("chapter", chapterId);
  }

  async recordConversionFailure(chapterId: string): Promise<void> {
    const { rowCount } = await this.pool.query(
      "UPDATE chapters SET conversion_attempts = conversion_attempts + 1, updated_at = $1 WHERE id = $2",
      [this.now(), chapterId],
    );
    if (rowCount === 0) throw new NotFoundError("chapter", chapterId);
  }

  async deleteChapter(id: string): Promise<void> {
    await this.pool.query("DELETE FROM chapters WHERE id = $1", [id]);
  }

  // Subscribers

  async createSubscriber(subscriber: NewSubscriber): Promise<Subscriber> {
    const now = this.now();
    const { rows } = await this.pool.query(
      `INSERT INTO subscribers(id, name, kindle_email, pushover_key, created_at, updated_at)
       VALUES ($1, $2, $3, $4, $5, $5)
       RETURNING *`,
      [randomUUID(), subscriber.name, subscriber.kindleEmail, subscriber.pushoverKey, now],
    );
    return toSubscriber(rows[0]);
  }

  async getSubscriber(id: string): Promise<Subscriber | null> {
    const { rows } = await this.pool.query("SELECT * FROM subscribers WHERE id = $1", [id]);
    return rows.length > 0 ? toSubscriber(rows[0]) : null;
  }

  async listSubscribers(): Promise<Subscriber[]> {
    const { rows } = await this.pool.query("SELECT * FROM subscribers ORDER BY created_at ASC");
    return rows.map(toSubscriber);
  }

  async updateSubscriber(id: string, changes: Partial<NewSubscriber>): Promise<Subscriber> {
    const current = await this.getSubscriber(id);
    if (!current) throw new NotFoundError("subscriber", id);
    const { rows } = await this.pool.query(
      `UPDATE subscribers SET name = $1, kindle_email = $2, pushover_key = $3, updated_at = $4
       WHERE id = $5
       RETURNING *`,
      [
        changes.name ?? current.name,
        changes.kindleEmail === undefined ? current.kindleEmail : changes.kindleEmail,
        changes.pushoverKey === undefined ? current.pushoverKey : changes.pushoverKey,
        this.now(),
        id,
      ],
    );
    if (rows.length === 0) throw new NotFoundError("subscriber", id);
    return toSubscriber(rows[0]);
  }

  async deleteSubscriber(id: string): Promise<void> {
    await this.pool.query("DELETE FROM subscribers WHERE id = $1", [id]);
  }

  // Subscriptions

  async createSubscription(subscription: NewSubscription): Promise<Subscription> {
    assertChunkSize(subscription.chunkSize);
    // Foreign key errors do not say which key failed, so check each first
    if (!(await this.getBook(subscription.bookId))) {
      throw new NotFoundError("book", subscription.bookId);
    }
    if (!(await this.getSubscriber(subscription.subscriberId))) {
      throw new NotFoundError("subscriber", subscription.subscriberId);
    }

    let cursor: DeliveryCursor = UNSET_CURSOR;
    if (subscription.lastDeliveredChapterId !== undefined) {
      const chapter = await this.getChapter(subscription.lastDeliveredChapterId);
      if (!chapter || chapter.bookId !== subscription.bookId) {
        throw new NotFoundError("chapter", subscription.lastDeliveredChapterId);
      }
      cursor = { kind: "delivered", chapterId: chapter.id, ingestedAt: chapter.ingestedAt };
    }

    const now = this.now();
    const [chapterId, chapterAt] = cursorColumns(cursor);
    const { rows } = await this.pool.query(
      `INSERT INTO subscriptions(id, subscriber_id, book_id, chunk_size,
         last_delivered_chapter_id, last_delivered_chapter_created_at, created_at, updated_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $7)
       RETURNING *`,
      [randomUUID(), subscription.subscriberId, subscription.bookId, subscription.chunkSize, chapterId, chapterAt, now],
    );
    return toSubscription(rows[0]);
  }

  async getSubscription(id: string): Promise<Subscription | null> {
    const { rows } = await this.pool.query("SELECT * FROM subscriptions WHERE id = $1", [id]);
    return rows.length > 0 ? toSubscription(rows[0]) : null;
  }

  async listSubscriptions(filter: { subscriberId?: string; bookId?: string } = {}): Promise<Subscription[]> {
    const { rows } = await this.pool.query(
      `SELECT * FROM subscriptions
       WHERE ($1::uuid IS NULL OR subscriber_id = $1) AND ($2::uuid IS NULL OR book_id = $2)
       ORDER BY created_at ASC`,
      [filter.subscriberId ?? null, filter.bookId ?? null],
    );
    return rows.map(toSubscription);
  }

  async setChunkSize(id: string, chunkSize: number): Promise<Subscription> {
    assertChunkSize(chunkSize);
    const { rows } = await this.pool.query(
      "UPDATE subscriptions SET chunk_size = $1, updated_at = $2 WHERE id = $3 RETURNING *",
      [chunkSize, this.now(), id],
    );
    if (rows.length === 0) throw new NotFoundError("subscription", id);
    return toSubscription(rows[0]);
  }

  async deleteSubscription(id: string): Promise<void> {
    await this.pool.query("DELETE FROM subscriptions WHERE id = $1", [id]);
  }

  async advanceCursor(id: string, expected: DeliveryCursor, next: DeliveryCursor): Promise<Subscription> {
    return this.transaction(async (client) => {
      const current = await client.query(
        `SELECT last_delivered_chapter_id, last_delivered_chapter_created_at
         FROM subscriptions WHERE id = $1 FOR UPDATE`,
        [id],
      );
      if (current.rows.length === 0) throw new NotFoundError("subscription", id);
      if (!sameCursor(toCursor(current.rows[0]), expected)) throw new CursorConflictError(id);

      const [chapterId, chapterAt] = cursorColumns(next);
      const { rows } = await client.query(
        `UPDATE subscriptions
         SET last_delivered_chapter_id = $1, last_delivered_chapter_created_at = $2, updated_at = $3
         WHERE id = $4
         RETURNING *`,
        [chapterId, chapterAt, this.now(), id],
      );
      return toSubscription(rows[0]);
    });
  }

  // Leases

  async acquireLease(key: string, owner: string, ttlMs: number): Promise<boolean> {
    const { rows } = await this.pool.query(
      `INSERT INTO leases(key, owner, expires_at)
       VALUES ($1, $2, now() + $3::double precision * interval '1 millisecond')
       ON CONFLICT (key) DO UPDATE
         SET owner = EXCLUDED.owner, expires_at = EXCLUDED.expires_at
         WHERE leases.expires_at < now()
       RETURNING key`,
      [key, owner, ttlMs],
    );
    return rows.length > 0;
  }

  async releaseLease(key: string, owner: string): Promise<void> {
    await this.pool.query("DELETE FROM leases WHERE key = $1 AND owner = $2", [key, owner]);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async transaction<T>(work: (client: SqlClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    let discarded = false;
    try {
      await client.query("BEGIN");
      const result = await work(client);
      await client.query("COMMIT");
      return result;
    } catch (error) {
      try {
        await client.query("ROLLBACK");
      } catch (rollbackError) {
        // A connection that cannot roll back must not go back to the pool
        client.release(rollbackError instanceof Error ? rollbackError : true);
        discarded = true;
      }
      throw error;
    } finally {
      if (!discarded) client.release();
    }
  }
}
