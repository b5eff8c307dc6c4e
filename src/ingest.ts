/**
 * Chapter ingestion and conversion.
 *
 * Ingestion reconciles what a source lists against what the store holds, by
 * source key, and stores the new chapters in source order. Conversion runs
 * separately and fills in each chapter's artifact when it can.
 */

import { ConversionError, SourceFormatError } from "./errors.js";
import type { FormatConverter } from "./convert.js";
import { silentLogger, type Logger } from "./log.js";
import { fetchedChapterSchema, formatIssues } from "./schemas.js";
import type { AdapterResolver } from "./sources/index.js";
import { withLease, type LeaseOptions, type Store } from "./store/store.js";
import type { Book, Chapter, FetchedChapter, NewChapter } from "./types.js";

export interface IngestDeps {
  store: Store;
  adapters: AdapterResolver;
  lease: LeaseOptions;
  logger?: Logger;
}

/** A source record that was not stored */
export interface SkippedRecord {
  /** Source key, when the record had a readable one */
  key: string | null;
  error: SourceFormatError;
}

export type IngestOutcome =
  | { status: "ingested"; bookId: string; inserted: Chapter[]; skipped: SkippedRecord[] }
  | { status: "locked"; bookId: string };

export function bookLeaseKey(bookId: string): string {
  return `book:${bookId}`;
}

function recordKey(record: unknown): string | null {
  if (typeof record === "object" && record !== null && "key" in record && typeof record.key === "string") {
    return record.key;
  }
  return null;
}

/**
 * Validate adapter output one record at a time, dropping repeated keys.
 */
export function validateRecords(records: unknown[]): { valid: FetchedChapter[]; skipped: SkippedRecord[] } {
  const valid: FetchedChapter[] = [];
  const skipped: SkippedRecord[] = [];
  const seen = new Set<string>();

  for (const record of records) {
    const parsed = fetchedChapterSchema.safeParse(record);
    if (!parsed.success) {
      skipped.push({
        key: recordKey(record),
        error: new SourceFormatError(`Malformed chapter record: ${formatIssues(parsed.error)}`),
      });
      continue;
    }
    if (seen.has(parsed.data.key)) {
      skipped.push({
        key: parsed.data.key,
        error: new SourceFormatError(`Duplicate chapter key ${parsed.data.key} in source listing`),
      });
      continue;
    }
    seen.add(parsed.data.key);
    valid.push(parsed.data);
  }
  return { valid, skipped };
}

/**
 * Fetch a book's chapter list and store the chapters not seen before.
 *
 * New chapters get their content from the listing or, failing that, from the
 * adapter one by one. A chapter whose page has no usable body is skipped like
 * a malformed record. Any other fetch failure stores the chapters before it
 * and is rethrown; the rest wait for the next run so that source order is kept.
 */
export async function ingestBook(book: Book, deps: IngestDeps, signal?: AbortSignal): Promise<IngestOutcome> {
  const logger = deps.logger ?? silentLogger;

  const leased = await withLease(deps.store, bookLeaseKey(book.id), deps.lease, async () => {
    const adapter = deps.adapters(book.source);
    const records = await adapter.listChapters(book, signal);
    const { valid, skipped } = validateRecords(records);
    for (const { key, error } of skipped) {
      logger.warn(`${book.title}: skipped record ${key ?? "(no key)"}: ${error.message}`);
    }

    const known = await deps.store.listSourceKeys(book.id);
    const fresh = valid.filter((record) => !known.has(record.key));

    const ready: NewChapter[] = [];
    let failure: { error: unknown } | null = null;
    for (const record of fresh) {
      try {
        const content = record.content ?? (await adapter.fetchContent(book, record, signal));
        ready.push({
          sourceKey: record.key,
          title: record.title,
          source: record.source,
          content,
          publishedAt: record.publishedAt,
        });
      } catch (error) {
        if (error instanceof SourceFormatError) {
          logger.warn(`${book.title}: skipped record ${record.key}: ${error.message}`);
          skipped.push({ key: record.key, error });
          continue;
        }
        failure = { error };
        break;
      }
    }

    const inserted = ready.length > 0 ? await deps.store.insertChapters(book.id, ready) : [];
    if (inserted.length > 0) {
      logger.info(`${book.title}: stored ${inserted.length} new chapter(s)`);
    }
    if (failure !== null) {
      logger.warn(
        `${book.title}: stopped after ${inserted.length} chapter(s), ${fresh.length - ready.length} left for the next run`,
      );
      throw failure.error;
    }
    return { inserted, skipped };
  });

  if (!leased.acquired) {
    logger.info(`${book.title}: ingestion already running elsewhere`);
    return { status: "locked", bookId: book.id };
  }
  return { status: "ingested", bookId: book.id, ...leased.value };
}

export interface ConvertDeps {
  store: Store;
  converter: FormatConverter;
  logger?: Logger;
}

export type ConvertOutcome =
  | { status: "converted"; chapterId: string; bytes: number }
  | { status: "gone"; chapterId: string };

/**
 * Package one chapter and store the artifact. A {@link ConversionError} is
 * counted against the chapter before being rethrown.
 */
export async function convertChapter(chapter: Chapter, deps: ConvertDeps): Promise<ConvertOutcome> {
  const logger = deps.logger ?? silentLogger;
  const book = await deps.store.getBook(chapter.bookId);
  if (!book) {
    // Book deleted since the chapter was listed; its chapters went with it
    return { status: "gone", chapterId: chapter.id };
  }

  let artifact: Uint8Array;
  try {
    artifact = await deps.converter.convert(book, chapter);
  } catch (error) {
    if (error instanceof ConversionError) {
      await deps.store.recordConversionFailure(chapter.id);
      logger.warn(`${book.title}: conversion of "${chapter.title}" failed (attempt ${chapter.conversionAttempts + 1})`);
    }
    throw error;
  }

  await deps.store.setArtifact(chapter.id, artifact);
  return { status: "converted", chapterId: chapter.id, bytes: artifact.byteLength };
}
