import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { USAGE, formatReport, main, type CliDeps } from "./index.js";
import { MemoryStore } from "./store/memory.js";
import { seedBook, seedSubscriber } from "./testing/fixtures.js";
import { onInterrupt, setupSignalHandlers } from "./utils.js";

// Keep serve from registering process signal handlers
vi.mock("./utils.js", async (importOriginal) => ({
  ...(await importOriginal<typeof import("./utils.js")>()),
  setupSignalHandlers: vi.fn(),
  onInterrupt: vi.fn(),
}));

function testStore() {
  const store = Object.assign(new MemoryStore(), { migrate: vi.fn(async () => {}) });
  vi.spyOn(store, "close");
  return store;
}

const env = { DATABASE_URL: "postgres://courier@localhost/courier" };

describe("formatReport", () => {
  it("prints one line per unit and a summary", () => {
    const lines = formatReport({
      pass: "deliver",
      startedAt: new Date(0),
      durationMs: 65_000,
      units: [
        { id: "s-1", status: "ok", detail: "2 chapter(s)" },
        { id: "s-2", status: "failed", kind: "transient", error: "DeliveryError: Mailgun responded 503" },
      ],
    });

    expect(lines).toEqual([
      "  s-1  ok  2 chapter(s)",
      "  s-2  failed  DeliveryError: Mailgun responded 503",
      "deliver pass: 1 ok, 1 failed in 1m 5s",
    ]);
  });
});

describe("main", () => {
  let store: ReturnType<typeof testStore>;
  let lines: string[];
  let deps: Partial<CliDeps>;
  const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), child: vi.fn() };

  beforeEach(() => {
    store = testStore();
    lines = [];
    logger.child.mockReturnValue(logger);
    deps = {
      env,
      openStore: () => store,
      print: (line) => {
        lines.push(line);
      },
      logger,
    };
  });

  afterEach(() => {
    vi.clearAllMocks();
  });

  it("prints usage and fails without a command", async () => {
    expect(await main([], deps)).toBe(1);
    expect(lines).toEqual([USAGE]);
  });

  it("prints usage for --help", async () => {
    expect(await main(["books", "--help"], deps)).toBe(0);
    expect(lines).toEqual([USAGE]);
  });

  it("rejects an unknown command before touching the database", async () => {
    const openStore = vi.fn(() => store);

    expect(await main(["frobnicate"], { ...deps, openStore })).toBe(1);
    expect(lines[0]).toBe(`Unknown command: frobnicate\n\n${USAGE}`);
    expect(openStore).not.toHaveBeenCalled();
  });

  it("fails on invalid configuration", async () => {
    expect(await main(["migrate"], { ...deps, env: {} })).toBe(1);
    expect(logger.error).toHaveBeenCalledWith("Cannot start", expect.objectContaining({ kind: "configuration" }));
  });

  it("migrates and closes the store", async () => {
    expect(await main(["migrate"], deps)).toBe(0);
    expect(store.migrate).toHaveBeenCalledTimes(1);
    expect(store.close).toHaveBeenCalledTimes(1);
    expect(lines).toEqual(["Database is up to date"]);
  });

  it("runs administrative commands", async () => {
    const book = await seedBook(store, "Pale");

    expect(await main(["books", "list"], deps)).toBe(0);
    expect(lines).toEqual([`${book.id}  Pale by Test Author  (https://example.com/feed)`]);
  });

  it("prints usage for a malformed administrative command", async () => {
    expect(await main(["subscriptions", "set-chunk", "s-1", "zero"], deps)).toBe(1);
    expect(lines[0]).toBe(`Chunk size must be a positive integer, got zero\n\n${USAGE}`);
    expect(store.close).toHaveBeenCalledTimes(1);
  });

  it("logs other command failures", async () => {
    expect(await main(["books", "remove", "nope"], deps)).toBe(1);
    expect(logger.error).toHaveBeenCalledWith(
      "books failed",
      expect.objectContaining({ message: "Resource of type book with id nope not found." }),
    );
  });

  it("runs one pass and fails when a unit failed", async () => {
    const book = await seedBook(store);
    await store.insertChapters(book.id, [
      {
        sourceKey: "1",
        title: "One",
        source: { type: "feed", url: "https://example.com/1" },
        content: "<p>One</p>",
        publishedAt: null,
      },
    ]);
    const reader = await seedSubscriber(store);
    const subscription = await store.createSubscription({ subscriberId: reader.id, bookId: book.id, chunkSize: 1 });

    expect(await main(["deliver"], deps)).toBe(1);
    expect(lines[0]).toBe(
      `  ${subscription.id}  failed  ConfigurationError: No channel is configured for kindle destinations`,
    );
    expect(lines[1]).toMatch(/^deliver pass: 1 failed in \d+s$/);
  });

  it("reports an empty pass", async () => {
    expect(await main(["ingest"], deps)).toBe(0);
    expect(lines).toEqual(["ingest pass: nothing to do in 0s"]);
  });

  it("serves until interrupted", async () => {
    expect(await main(["serve"], deps)).toBe(0);

    expect(setupSignalHandlers).toHaveBeenCalledWith("Courier");
    const cleanups = vi.mocked(onInterrupt).mock.calls.map(([callback]) => callback);
    expect(cleanups).toHaveLength(2);
    for (const cleanup of cleanups) await cleanup();
    expect(store.close).toHaveBeenCalledTimes(1);
  });
});
