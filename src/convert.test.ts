import JSZip from "jszip";
import { describe, expect, it } from "vitest";
import { EpubConverter, buildEpub, escapeXml, toXhtmlBody } from "./convert.js";
import { ConversionError } from "./errors.js";
import type { Book, Chapter } from "./types.js";

const book: Book = {
  id: "book-1",
  title: "Salt & Stone",
  author: "A. Writer",
  source: { type: "feed", feedUrl: "https://example.com/feed" },
  createdAt: new Date("2026-01-01T00:00:00.000Z"),
  updatedAt: new Date("2026-01-01T00:00:00.000Z"),
};

function chapter(id: string, title: string, content: string, ingestedAt = "2026-01-02T03:04:05.678Z"): Chapter {
  return {
    id,
    bookId: book.id,
    sourceKey: id,
    title,
    source: { type: "feed", url: `https://example.com/${id}` },
    content,
    artifact: null,
    publishedAt: null,
    ingestedAt: new Date(ingestedAt),
    updatedAt: new Date(ingestedAt),
    conversionAttempts: 0,
  };
}

async function readEntry(bytes: Uint8Array, name: string): Promise<string> {
  const zip = await JSZip.loadAsync(bytes);
  const entry = zip.file(name);
  if (!entry) throw new Error(`missing ${name}`);
  return entry.async("string");
}

describe("escapeXml", () => {
  it("escapes markup characters", () => {
    expect(escapeXml(`<a href="x">Tom & Jerry's</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&apos;s&lt;/a&gt;",
    );
  });
});

describe("toXhtmlBody", () => {
  it("closes void elements and drops scripts", () => {
    expect(toXhtmlBody("<p>One<br>Two</p><script>track()</script>")).toBe("<p>One<br/>Two</p>");
  });

  it("drops embedded frames and styles", () => {
    expect(toXhtmlBody('<style>p{}</style><p>Text</p><iframe src="https://example.com"></iframe>')).toBe(
      "<p>Text</p>",
    );
  });

  it("returns an empty string when nothing is left", () => {
    expect(toXhtmlBody("<script>only()</script>")).toBe("");
  });
});

describe("buildEpub", () => {
  it("writes the mimetype entry first and uncompressed", async () => {
    const bytes = await buildEpub({
      identifier: "urn:test:1",
      language: "en",
      title: "Doc",
      author: "Someone",
      modified: new Date("2026-01-01T00:00:00.000Z"),
      sections: [{ title: "One", content: "<p>1</p>" }],
    });

    expect(Buffer.from(bytes.subarray(0, 4))).toEqual(Buffer.from([0x50, 0x4b, 0x03, 0x04]));
    expect(Buffer.from(bytes.subarray(30, 38)).toString("ascii")).toBe("mimetype");
    expect(Buffer.from(bytes.subarray(38, 58)).toString("ascii")).toBe("application/epub+zip");
  });

  it("points the container at the package document", async () => {
    const bytes = await buildEpub({
      identifier: "urn:test:1",
      language: "en",
      title: "Doc",
      author: "Someone",
      modified: new Date("2026-01-01T00:00:00.000Z"),
      sections: [{ title: "One", content: "<p>1</p>" }],
    });

    expect(await readEntry(bytes, "META-INF/container.xml")).toContain(
      '<rootfile full-path="OEBPS/content.opf" media-type="application/oebps-package+xml"/>',
    );
  });

  it("refuses an empty document", async () => {
    await expect(
      buildEpub({
        identifier: "urn:test:1",
        language: "en",
        title: "Empty",
        author: "Someone",
        modified: new Date(),
        sections: [],
      }),
    ).rejects.toThrow(new ConversionError('"Empty" has no sections'));
  });
});

describe("EpubConverter", () => {
  const converter = new EpubConverter();

  it("packages a chapter as its own book in the series", async () => {
    const bytes = await converter.convert(book, chapter("c1", "Chapter 1", "<p>It begins.</p>"));
    const opf = await readEntry(bytes, "OEBPS/content.opf");

    expect(opf).toContain('<dc:identifier id="book-id">urn:uuid:c1</dc:identifier>');
    expect(opf).toContain("<dc:title>Salt &amp; Stone: Chapter 1</dc:title>");
    expect(opf).toContain("<dc:creator>A. Writer</dc:creator>");
    expect(opf).toContain('<meta property="dcterms:modified">2026-01-02T03:04:05Z</meta>');
    expect(opf).toContain('<meta property="belongs-to-collection" id="series">Salt &amp; Stone</meta>');
    expect(opf).toContain('<itemref idref="s1"/>');
  });

  it("writes the chapter body under its heading", async () => {
    const bytes = await converter.convert(book, chapter("c1", "Chapter 1", "<p>It begins.</p>"));
    const section = await readEntry(bytes, "OEBPS/section-1.xhtml");

    expect(section).toContain("<body>\n<h1>Chapter 1</h1>\n<p>It begins.</p>\n</body>");
  });

  it("bundles chapters in order with one section each", async () => {
    const chapters = [
      chapter("c1", "Chapter 1", "<p>One</p>", "2026-01-02T00:00:00.000Z"),
      chapter("c2", "Chapter 2", "<p>Two</p>", "2026-01-03T00:00:00.000Z"),
      chapter("c3", "Chapter 3", "<p>Three</p>", "2026-01-04T00:00:00.000Z"),
    ];
    const bytes = await converter.bundle(book, chapters);

    const opf = await readEntry(bytes, "OEBPS/content.opf");
    expect(opf).toContain("<dc:title>Salt &amp; Stone: Chapter 1 - Chapter 3</dc:title>");
    expect(opf).toContain('<meta property="dcterms:modified">2026-01-04T00:00:00Z</meta>');
    expect(opf).toContain('<itemref idref="s1"/>\n<itemref idref="s2"/>\n<itemref idref="s3"/>');

    const nav = await readEntry(bytes, "OEBPS/nav.xhtml");
    expect(nav).toContain('<li><a href="section-2.xhtml">Chapter 2</a></li>');
    expect(await readEntry(bytes, "OEBPS/section-3.xhtml")).toContain("<h1>Chapter 3</h1>\n<p>Three</p>");
  });

  it("fails for a chapter with no usable content", async () => {
    await expect(converter.convert(book, chapter("c9", "Blank", "<script>x()</script>"))).rejects.toBeInstanceOf(
      ConversionError,
    );
  });

  it("fails for an empty bundle", async () => {
    await expect(converter.bundle(book, [])).rejects.toThrow("No chapters to bundle for book book-1");
  });
});
