import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { DeliveryChannel } from "./channels/index.js";
import type { FormatConverter } from "./convert.js";
import { FetchError } from "./errors.js";
import { Orchestrator, summarizeReport, type OrchestratorOptions, type PassReport } from "./orchestrator.js";
import type { SourceAdapter } from "./sources/index.js";
import { MemoryStore } from "./store/memory.js";
import { TestClock, newChapter, seedSubscriber } from "./testing/fixtures.js";
import type { Book, FetchedChapter } from "./types.js";

function record(key: string): FetchedChapter {
  return {
    key,
    title: `Chapter ${key}`,
    content: `<p>${key}</p>`,
    publishedAt: null,
    source: { type: "feed", url: `https://example.com/${key}` },
  };
}

function staticAdapter(keys: string[]): SourceAdapter {
  return {
    listChapters: async () => keys.map(record),
    fetchContent: async () => "",
  };
}

describe("Orchestrator", () => {
  let clock: TestClock;
  let store: MemoryStore;
  let adapters: Map<string, SourceAdapter>;
  let kindle: DeliveryChannel;
  let converter: FormatConverter;

  function orchestrator(overrides: Partial<OrchestratorOptions> = {}): Orchestrator {
    return new Orchestrator({
      store,
      adapters: (source) => {
        const adapter = source.type === "feed" ? adapters.get(source.feedUrl) : undefined;
        if (!adapter) throw new Error("no adapter");
        return adapter;
      },
      converter,
      channels: { kindle },
      owner: "worker-1",
      intervals: { ingest: 1000, convert: 1000, deliver: 1000 },
      concurrency: { ingest: 2, convert: 2, deliver: 2 },
      unitDeadlineMs: 1000,
      leaseTtlMs: 60_000,
      maxConversionAttempts: 3,
      backoff: { baseMs: 1000, maxMs: 10_000 },
      now: clock.now,
      random: () => 0.5,
      ...overrides,
    });
  }

  async function addBook(name: string, adapter: SourceAdapter): Promise<Book> {
    const feedUrl = `https://example.com/${name}/feed`;
    adapters.set(feedUrl, adapter);
    return store.createBook({ title: name, author: "Test Author", source: { type: "feed", feedUrl } });
  }

  async function run(subject: Orchestrator, pass: "ingest" | "convert" | "deliver"): Promise<PassReport> {
    const report = await subject.runPass(pass);
    if (!report) throw new Error(`${pass} pass did not run`);
    return report;
  }

  beforeEach(() => {
    clock = new TestClock();
    store = new MemoryStore(clock.now);
    adapters = new Map();
    kindle = { kind: "kindle", deliver: vi.fn(async () => {}) };
    converter = { convert: vi.fn(async () => new Uint8Array([1, 2, 3])), bundle: vi.fn(async () => new Uint8Array()) };
  });

  describe("ingest pass", () => {
    it("reports each book and keeps going after a failing one", async () => {
      const good = await addBook("good", staticAdapter(["1", "2"]));
      const bad = await addBook("bad", {
        listChapters: async () => {
          throw new FetchError("https://example.com/bad/feed", "GET https://example.com/bad/feed returned 503");
        },
        fetchContent: async () => "",
      });

      const report = await run(orchestrator(), "ingest");

      expect(report.pass).toBe("ingest");
      expect(report.startedAt).toEqual(new Date("2026-01-01T00:00:00.000Z"));
      expect(report.units).toEqual([
        { id: good.id, status: "ok", detail: "2 new, 0 skipped" },
        {
          id: bad.id,
          status: "failed",
          kind: "transient",
          error: "FetchError: GET https://example.com/bad/feed returned 503",
        },
      ]);
      expect((await store.listChapters(good.id)).map((c) => c.sourceKey)).toEqual(["1", "2"]);
    });

    it("defers a failed book until its backoff has passed", async () => {
      const listChapters = vi.fn(async () => {
        throw new FetchError("https://example.com/flaky/feed", "offline");
      });
      const book = await addBook("flaky", { listChapters, fetchContent: async () => "" });
      const subject = orchestrator();

      await run(subject, "ingest");
      const deferred = await run(subject, "ingest");
      clock.advance(500);
      const retried = await run(subject, "ingest");

      expect(deferred.units).toEqual([{ id: book.id, status: "deferred", detail: "until 2026-01-01T00:00:00.500Z" }]);
      expect(retried.units[0].status).toBe("failed");
      expect(listChapters).toHaveBeenCalledTimes(2);
    });

    it("fails only the book that runs past the deadline", async () => {
      const slow = await addBook("slow", {
        listChapters: (_book, signal) =>
          new Promise<unknown[]>((_, reject) => signal?.addEventListener("abort", () => reject(signal?.reason))),
        fetchContent: async () => "",
      });
      const fast = await addBook("fast", staticAdapter(["1"]));

      const report = await run(orchestrator({ unitDeadlineMs: 20 }), "ingest");

      expect(report.units).toEqual([
        { id: slow.id, status: "failed", kind: "transient", error: `TimeoutError: ingest ${slow.id} timed out after 20ms` },
        { id: fast.id, status: "ok", detail: "1 new, 0 skipped" },
      ]);
    });

    it("skips a pass that is still running", async () => {
      let release: () => void = () => {};
      const listChapters = vi.fn(
        () =>
          new Promise<unknown[]>((resolve) => {
            release = () => resolve([]);
          }),
      );
      await addBook("blocked", { listChapters, fetchContent: async () => "" });
      const subject = orchestrator();

      const first = subject.runPass("ingest");
      await vi.waitFor(() => expect(listChapters).toHaveBeenCalled());
      const second = await subject.runPass("ingest");
      release();

      expect(second).toBeNull();
      expect((await first)?.units[0].status).toBe("ok");
    });
  });

  describe("convert pass", () => {
    it("stores artifacts for chapters awaiting conversion", async () => {
      const book = await addBook("book", staticAdapter([]));
      const [chapter] = await store.insertChapters(book.id, [newChapter("1")]);

      const report = await run(orchestrator(), "convert");

      expect(report.units).toEqual([{ id: chapter.id, status: "ok", detail: "3 bytes" }]);
      expect((await store.getChapter(chapter.id))?.artifact).toEqual(new Uint8Array([1, 2, 3]));
      expect((await run(orchestrator(), "convert")).units).toEqual([]);
    });
  });

  describe("deliver pass", () => {
    it("delivers pending chapters and reports idle subscriptions", async () => {
      const book = await addBook("book", staticAdapter([]));
      await store.insertChapters(book.id, [newChapter("1"), newChapter("2")]);
      const reader = await seedSubscriber(store);
      const busy = await store.createSubscription({ subscriberId: reader.id, bookId: book.id, chunkSize: 5 });
      const subject = orchestrator();

      const first = await run(subject, "deliver");
      const second = await run(subject, "deliver");

      expect(first.units).toEqual([{ id: busy.id, status: "ok", detail: "2 chapter(s)" }]);
      expect(second.units).toEqual([{ id: busy.id, status: "idle" }]);
      expect(summarizeReport(second)).toBe("1 idle");
    });

    it("keeps a subscription locked while a timed-out delivery is still running", async () => {
      const book = await addBook("book", staticAdapter([]));
      await store.insertChapters(book.id, [newChapter("1")]);
      const reader = await seedSubscriber(store);
      const subscription = await store.createSubscription({ subscriberId: reader.id, bookId: book.id, chunkSize: 1 });
      const deliver = vi.fn(() => new Promise<void>(() => {}));
      kindle = { kind: "kindle", deliver };
      const subject = orchestrator({ unitDeadlineMs: 20, random: () => 0 });

      const first = await run(subject, "deliver");
      const second = await run(subject, "deliver");

      expect(first.units[0]).toMatchObject({ id: subscription.id, status: "failed", kind: "transient" });
      expect(second.units).toEqual([{ id: subscription.id, status: "locked" }]);
      expect(deliver).toHaveBeenCalledTimes(1);
    });

    it("parks a misconfigured subscription for the maximum backoff", async () => {
      const book = await addBook("book", staticAdapter([]));
      await store.insertChapters(book.id, [newChapter("1")]);
      const reader = await seedSubscriber(store, { kindleEmail: null });
      const subscription = await store.createSubscription({ subscriberId: reader.id, bookId: book.id, chunkSize: 1 });
      const subject = orchestrator();

      const failed = await run(subject, "deliver");
      clock.advance(9_999);
      const parked = await run(subject, "deliver");

      expect(failed.units[0]).toMatchObject({ id: subscription.id, status: "failed", kind: "configuration" });
      expect(parked.units[0]).toMatchObject({ status: "deferred" });
    });
  });

  describe("start and stop", () => {
    afterEach(() => {
      vi.useRealTimers();
    });

    it("runs every pass at once and then on its interval", async () => {
      vi.useFakeTimers();
      const subject = orchestrator({ intervals: { ingest: 5000, convert: 1000, deliver: 1000 } });
      const runPass = vi.spyOn(subject, "runPass").mockResolvedValue(null);

      subject.start();
      expect(runPass.mock.calls.map(([pass]) => pass)).toEqual(["ingest", "convert", "deliver"]);

      await vi.advanceTimersByTimeAsync(1000);
      expect(runPass).toHaveBeenCalledTimes(5);

      await subject.stop();
      await vi.advanceTimersByTimeAsync(10_000);
      expect(runPass).toHaveBeenCalledTimes(5);
    });
  });
});

describe("summarizeReport", () => {
  it("counts units by status", () => {
    const report: PassReport = {
      pass: "deliver",
      startedAt: new Date(0),
      durationMs: 0,
      units: [
        { id: "a", status: "ok" },
        { id: "b", status: "failed" },
        { id: "c", status: "ok" },
      ],
    };

    expect(summarizeReport(report)).toBe("2 ok, 1 failed");
    expect(summarizeReport({ ...report, units: [] })).toBe("nothing to do");
  });
});
