/**
 * Subscription delivery: work out what a subscription has not received yet,
 * send the next batch and move its cursor.
 */

import { destinationsOf, type ChannelSet, type DeliveryChannel, type Destination } from "./channels/index.js";
import { ConfigurationError, IntegrityError } from "./errors.js";
import { silentLogger, type Logger } from "./log.js";
import { withLease, type LeaseOptions, type Store } from "./store/store.js";
import { cursorAt, type Book, type Chapter, type DeliveryCursor, type Subscription } from "./types.js";

export interface DeliverDeps {
  store: Store;
  channels: ChannelSet;
  lease: LeaseOptions;
  logger?: Logger;
}

export type DeliveryOutcome =
  | { status: "idle"; subscriptionId: string }
  | { status: "delivered"; subscriptionId: string; chapterIds: string[]; cursor: DeliveryCursor }
  | { status: "locked"; subscriptionId: string };

export function subscriptionLeaseKey(subscriptionId: string): string {
  return `subscription:${subscriptionId}`;
}

/**
 * Check that a set cursor points at a chapter of the subscription's own book.
 *
 * @throws {IntegrityError} If it does not
 */
async function assertCursorInBook(store: Store, subscription: Subscription, book: Book): Promise<void> {
  const { cursor } = subscription;
  if (cursor.kind === "unset") return;

  const chapter = await store.getChapter(cursor.chapterId);
  if (!chapter || chapter.bookId !== book.id) {
    throw new IntegrityError(
      `Cursor of subscription ${subscription.id} points at chapter ${cursor.chapterId}, which is not in book ${book.id}`,
    );
  }
  if (chapter.ingestedAt.getTime() !== cursor.ingestedAt.getTime()) {
    throw new IntegrityError(
      `Cursor of subscription ${subscription.id} records ${cursor.ingestedAt.toISOString()} for chapter ${chapter.id}, which was ingested at ${chapter.ingestedAt.toISOString()}`,
    );
  }
}

/**
 * Pair each destination of the subscriber with its channel.
 *
 * @throws {ConfigurationError} If there is no destination, or one has no configured channel
 */
async function resolveChannels(
  store: Store,
  channels: ChannelSet,
  subscription: Subscription,
): Promise<Array<{ destination: Destination; channel: DeliveryChannel }>> {
  const subscriber = await store.getSubscriber(subscription.subscriberId);
  if (!subscriber) {
    throw new ConfigurationError(
      `Subscriber ${subscription.subscriberId} of subscription ${subscription.id} not found`,
    );
  }

  const destinations = destinationsOf(subscriber);
  if (destinations.length === 0) {
    throw new ConfigurationError(`Subscriber ${subscriber.id} has no e-reader email or push destination`);
  }

  return destinations.map((destination) => {
    const channel = channels[destination.kind];
    if (!channel) {
      throw new ConfigurationError(`No channel is configured for ${destination.kind} destinations`);
    }
    return { destination, channel };
  });
}

/**
 * Deliver the next batch of a subscription, if there is one.
 *
 * The batch is the first `chunkSize` chapters ingested after the cursor. Every
 * destination of the subscriber gets it; the cursor moves to the batch's last
 * chapter only once all of them accepted it, and only if nobody moved it in
 * the meantime. After a failure the same batch is computed again next time.
 */
export async function evaluateSubscription(
  subscription: Subscription,
  deps: DeliverDeps,
  signal?: AbortSignal,
): Promise<DeliveryOutcome> {
  const logger = deps.logger ?? silentLogger;
  const subscriptionId = subscription.id;

  const leased = await withLease(deps.store, subscriptionLeaseKey(subscriptionId), deps.lease, async () => {
    // Re-read under the lease; the caller's copy may be stale
    const current = await deps.store.getSubscription(subscriptionId);
    if (!current) return { status: "idle" as const, subscriptionId };

    const book = await deps.store.getBook(current.bookId);
    if (!book) {
      throw new ConfigurationError(`Book ${current.bookId} of subscription ${current.id} not found`);
    }
    await assertCursorInBook(deps.store, current, book);

    const chapters: Chapter[] = await deps.store.listPendingChapters(book.id, current.cursor, current.chunkSize);
    const last = chapters[chapters.length - 1];
    if (last === undefined) return { status: "idle" as const, subscriptionId };

    const targets = await resolveChannels(deps.store, deps.channels, current);
    const batch = { book, subscription: current, chapters };
    for (const { destination, channel } of targets) {
      signal?.throwIfAborted();
      await channel.deliver(destination.address, batch, signal);
    }

    const next = cursorAt(last);
    await deps.store.advanceCursor(current.id, current.cursor, next);
    logger.info(
      `${book.title}: delivered ${chapters.length} chapter(s) to subscriber ${current.subscriberId} (${targets
        .map((target) => target.destination.kind)
        .join(", ")})`,
    );
    return {
      status: "delivered" as const,
      subscriptionId,
      chapterIds: chapters.map((chapter) => chapter.id),
      cursor: next,
    };
  });

  if (!leased.acquired) {
    return { status: "locked", subscriptionId };
  }
  return leased.value;
}
