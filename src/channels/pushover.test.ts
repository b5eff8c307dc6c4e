import { afterEach, describe, expect, it, vi } from "vitest";
import { DeliveryError } from "../errors.js";
import { batchFixture, chapterFixture } from "../testing/fixtures.js";
import { batchTitle, destinationsOf } from "./channel.js";
import { PUSHOVER_URL, PushoverChannel, pushoverMessage } from "./pushover.js";

describe("pushoverMessage", () => {
  it("names the chapter of a single-chapter batch", () => {
    expect(pushoverMessage(batchFixture([chapterFixture("1.1")]))).toBe("Delivered new chapter for Pale: 1.1");
  });

  it("names the first and last chapter of a larger batch", () => {
    const batch = batchFixture([chapterFixture("1.1"), chapterFixture("1.2"), chapterFixture("1.3")]);
    expect(pushoverMessage(batch)).toBe("Delivered new chapters for Pale. 1.1 through 1.3");
  });
});

describe("batchTitle", () => {
  it("joins book and chapter titles", () => {
    expect(batchTitle(batchFixture([chapterFixture("1.1")]))).toBe("Pale: 1.1");
    expect(batchTitle(batchFixture([chapterFixture("1.1"), chapterFixture("1.2")]))).toBe("Pale: 1.1 - 1.2");
  });
});

describe("destinationsOf", () => {
  const base = {
    id: "subscriber-1",
    name: "Reader",
    createdAt: new Date("2026-01-01T00:00:00.000Z"),
    updatedAt: new Date("2026-01-01T00:00:00.000Z"),
  };

  it("lists the e-reader before the push destination", () => {
    expect(destinationsOf({ ...base, kindleEmail: "reader@kindle.example", pushoverKey: "user-key" })).toEqual([
      { kind: "kindle", address: "reader@kindle.example" },
      { kind: "pushover", address: "user-key" },
    ]);
  });

  it("ignores empty values", () => {
    expect(destinationsOf({ ...base, kindleEmail: "", pushoverKey: null })).toEqual([]);
  });
});

describe("PushoverChannel", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts the notification as JSON", async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response('{"status":1}', { status: 200 }));
    vi.stubGlobal("fetch", fetchMock);

    await new PushoverChannel("test-token").deliver("user-key", batchFixture([chapterFixture("1.1")]));

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(PUSHOVER_URL);
    expect(init.method).toBe("POST");
    expect(JSON.parse(init.body)).toEqual({
      token: "test-token",
      user: "user-key",
      message: "Delivered new chapter for Pale: 1.1",
    });
  });

  it("maps an invalid user key to a permanent failure", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(new Response('{"user":"invalid"}', { status: 400 })));

    await expect(
      new PushoverChannel("test-token").deliver("bad-key", batchFixture([chapterFixture("1.1")])),
    ).rejects.toEqual(new DeliveryError('Pushover responded 400: {"user":"invalid"}', { permanent: true }));
  });

  it("maps rate limiting to a transient failure", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(new Response("", { status: 429 })));

    await expect(
      new PushoverChannel("test-token").deliver("user-key", batchFixture([chapterFixture("1.1")])),
    ).rejects.toMatchObject({ permanent: false, kind: "transient" });
  });
});
