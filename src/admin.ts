/**
 * Administrative commands: manage books, chapters, subscribers and subscriptions.
 *
 * Usage: serial-courier <group> <action> [options]
 */

import { z } from "zod";
import { NotFoundError } from "./errors.js";
import { bookSourceSchema, formatIssues } from "./schemas.js";
import type { Store } from "./store/store.js";
import type { Book, BookSource, Chapter, Subscriber, Subscription } from "./types.js";
import { getNullableStringArg, getPositionalArgs, getStringArg, validateUrl } from "./utils.js";

export const ADMIN_GROUPS = ["books", "chapters", "subscribers", "subscriptions"] as const;
export type AdminGroup = (typeof ADMIN_GROUPS)[number];

/** Flags that take a value, so their values are not read as positional arguments */
const VALUE_FLAGS = [
  "--author",
  "--royalroad",
  "--feed",
  "--selector",
  "--kindle",
  "--pushover",
  "--chunk",
  "--after",
  "--subscriber",
  "--book",
];

export const ADMIN_USAGE = `Administrative commands:
  books add <title> --author <name> (--royalroad <fiction-id> | --feed <url> [--selector <css>])
  books list
  books remove <book-id>
  chapters list <book-id>
  chapters remove <chapter-id>
  subscribers add <name> [--kindle <email>] [--pushover <user-key>]
  subscribers list
  subscribers remove <subscriber-id>
  subscriptions add <subscriber-id> <book-id> [--chunk <n>] [--after <chapter-id>]
  subscriptions list [--subscriber <id>] [--book <id>]
  subscriptions set-chunk <subscription-id> <n>
  subscriptions remove <subscription-id>`;

/** Bad command-line input; the CLI prints usage for it */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function isAdminGroup(value: string): value is AdminGroup {
  return ADMIN_GROUPS.some((group) => group === value);
}

export function describeSource(source: BookSource): string {
  return source.type === "royalroad" ? `royalroad:${source.fictionId}` : source.feedUrl;
}

export function formatBook(book: Book): string {
  return `${book.id}  ${book.title} by ${book.author}  (${describeSource(book.source)})`;
}

export function formatChapter(chapter: Chapter): string {
  const epub = chapter.artifact ? "" : `  [no epub, ${chapter.conversionAttempts} failed attempt(s)]`;
  return `${chapter.id}  ${chapter.ingestedAt.toISOString()}  ${chapter.title}${epub}`;
}

export function formatSubscriber(subscriber: Subscriber): string {
  return `${subscriber.id}  ${subscriber.name}  kindle: ${subscriber.kindleEmail ?? "-"}  pushover: ${
    subscriber.pushoverKey ? "yes" : "-"
  }`;
}

export function formatSubscription(subscription: Subscription): string {
  const { cursor } = subscription;
  const position = cursor.kind === "unset" ? "from the beginning" : `after ${cursor.chapterId}`;
  return `${subscription.id}  subscriber ${subscription.subscriberId}  book ${subscription.bookId}  chunk ${subscription.chunkSize}  ${position}`;
}

/**
 * Build a book source from `--royalroad <id>` or `--feed <url> [--selector <css>]`.
 *
 * @throws {UsageError} If neither or both are given, or the values are invalid
 */
export function parseBookSource(args: string[]): BookSource {
  const fictionId = getNullableStringArg(args, "--royalroad");
  const feedUrl = getNullableStringArg(args, "--feed");
  if ((fictionId === null) === (feedUrl === null)) {
    throw new UsageError("Give exactly one of --royalroad <fiction-id> or --feed <url>");
  }

  let candidate: unknown;
  if (feedUrl !== null) {
    const validation = validateUrl(feedUrl);
    if (!validation.isValid) {
      throw new UsageError(`Invalid feed URL: ${validation.error}`);
    }
    const contentSelector = getNullableStringArg(args, "--selector");
    candidate = contentSelector === null ? { type: "feed", feedUrl } : { type: "feed", feedUrl, contentSelector };
  } else {
    candidate = { type: "royalroad", fictionId: Number(fictionId) };
  }

  const parsed = bookSourceSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new UsageError(`Invalid book source: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

const emailSchema = z.string().email();

function requirePositional(positional: string[], index: number, name: string): string {
  const value = positional[index];
  if (value === undefined) {
    throw new UsageError(`Missing <${name}>`);
  }
  return value;
}

/**
 * Parse a positive integer chunk size.
 *
 * @throws {UsageError} If the value is not one
 */
function parseChunkSize(value: string): number {
  const chunkSize = Number(value);
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new UsageError(`Chunk size must be a positive integer, got ${value}`);
  }
  return chunkSize;
}

async function books(store: Store, action: string, positional: string[], args: string[], print: Printer) {
  switch (action) {
    case "add": {
      const title = requirePositional(positional, 0, "title");
      const author = getStringArg(args, "--author", "");
      if (!author) throw new UsageError("Missing --author <name>");
      const book = await store.createBook({ title, author, source: parseBookSource(args) });
      print(`Added book ${formatBook(book)}`);
      return;
    }
    case "list": {
      const all = await store.listBooks();
      if (all.length === 0) print("No books");
      for (const book of all) print(formatBook(book));
      return;
    }
    case "remove": {
      const id = requirePositional(positional, 0, "book-id");
      if (!(await store.getBook(id))) throw new NotFoundError("book", id);
      await store.deleteBook(id);
      print(`Removed book ${id} with its chapters and subscriptions`);
      return;
    }
    default:
      throw new UsageError(`Unknown books action: ${action}`);
  }
}

async function chapters(store: Store, action: string, positional: string[], print: Printer) {
  switch (action) {
    case "list": {
      const bookId = requirePositional(positional, 0, "book-id");
      if (!(await store.getBook(bookId))) throw new NotFoundError("book", bookId);
      const all = await store.listChapters(bookId);
      if (all.length === 0) print("No chapters");
      for (const chapter of all) print(formatChapter(chapter));
      return;
    }
    case "remove": {
      const id = requirePositional(positional, 0, "chapter-id");
      if (!(await store.getChapter(id))) throw new NotFoundError("chapter", id);
      await store.deleteChapter(id);
      print(`Removed chapter ${id}`);
      return;
    }
    default:
      throw new UsageError(`Unknown chapters action: ${action}`);
  }
}

async function subscribers(store: Store, action: string, positional: string[], args: string[], print: Printer) {
  switch (action) {
    case "add": {
      const name = requirePositional(positional, 0, "name");
      const kindleEmail = getNullableStringArg(args, "--kindle");
      if (kindleEmail !== null && !emailSchema.safeParse(kindleEmail).success) {
        throw new UsageError(`Invalid e-reader email: ${kindleEmail}`);
      }
      const pushoverKey = getNullableStringArg(args, "--pushover");
      const subscriber = await store.createSubscriber({ name, kindleEmail, pushoverKey });
      print(`Added subscriber ${formatSubscriber(subscriber)}`);
      if (kindleEmail === null && pushoverKey === null) {
        print("Warning: no destination set; deliveries will fail until one is added");
      }
      return;
    }
    case "list": {
      const all = await store.listSubscribers();
      if (all.length === 0) print("No subscribers");
      for (const subscriber of all) print(formatSubscriber(subscriber));
      return;
    }
    case "remove": {
      const id = requirePositional(positional, 0, "subscriber-id");
      if (!(await store.getSubscriber(id))) throw new NotFoundError("subscriber", id);
      await store.deleteSubscriber(id);
      print(`Removed subscriber ${id} with their subscriptions`);
      return;
    }
    default:
      throw new UsageError(`Unknown subscribers action: ${action}`);
  }
}

async function subscriptions(store: Store, action: string, positional: string[], args: string[], print: Printer) {
  switch (action) {
    case "add": {
      const subscriberId = requirePositional(positional, 0, "subscriber-id");
      const bookId = requirePositional(positional, 1, "book-id");
      const chunk = getNullableStringArg(args, "--chunk");
      const chunkSize = chunk === null ? 1 : parseChunkSize(chunk);
      const after = getNullableStringArg(args, "--after");
      const subscription = await store.createSubscription({
        subscriberId,
        bookId,
        chunkSize,
        ...(after === null ? {} : { lastDeliveredChapterId: after }),
      });
      print(`Added subscription ${formatSubscription(subscription)}`);
      return;
    }
    case "list": {
      const subscriberId = getNullableStringArg(args, "--subscriber") ?? undefined;
      const bookId = getNullableStringArg(args, "--book") ?? undefined;
      const all = await store.listSubscriptions({ subscriberId, bookId });
      if (all.length === 0) print("No subscriptions");
      for (const subscription of all) print(formatSubscription(subscription));
      return;
    }
    case "set-chunk": {
      const id = requirePositional(positional, 0, "subscription-id");
      const chunkSize = parseChunkSize(requirePositional(positional, 1, "n"));
      const subscription = await store.setChunkSize(id, chunkSize);
      print(`Updated subscription ${formatSubscription(subscription)}`);
      return;
    }
    case "remove": {
      const id = requirePositional(positional, 0, "subscription-id");
      if (!(await store.getSubscription(id))) throw new NotFoundError("subscription", id);
      await store.deleteSubscription(id);
      print(`Removed subscription ${id}`);
      return;
    }
    default:
      throw new UsageError(`Unknown subscriptions action: ${action}`);
  }
}

type Printer = (line: string) => void;

/**
 * Run one administrative command.
 *
 * @param args - Arguments after the group name, starting with the action
 * @param print - Output sink (default: console.log)
 * @throws {UsageError} For a missing or malformed argument
 * @throws {NotFoundError} When a referenced record does not exist
 *
 * @example
 * await runAdminCommand(store, "subscriptions", ["set-chunk", id, "3"]);
 */
export async function runAdminCommand(
  store: Store,
  group: AdminGroup,
  args: string[],
  print: Printer = console.log,
): Promise<void> {
  const [action = "", ...rest] = getPositionalArgs(args, VALUE_FLAGS);
  if (!action) {
    throw new UsageError(`Missing ${group} action`);
  }

  switch (group) {
    case "books":
      return books(store, action, rest, args, print);
    case "chapters":
      return chapters(store, action, rest, print);
    case "subscribers":
      return subscribers(store, action, rest, args, print);
    case "subscriptions":
      return subscriptions(store, action, rest, args, print);
  }
}
