/**
 * Package chapter markup as EPUB 3 for e-readers.
 *
 * A single chapter becomes a one-section book titled "<Book>: <Chapter>" in the
 * book's series; a batch of chapters becomes one book with a section each.
 */

import * as cheerio from "cheerio";
import JSZip from "jszip";
import { ConversionError, describeError } from "./errors.js";
import type { Book, Chapter } from "./types.js";

/** A single section of an EPUB, normally one chapter */
export interface EpubSection {
  title: string;
  /** HTML markup of the section body */
  content: string;
}

export interface EpubDocument {
  /** Unique identifier written as `dc:identifier` */
  identifier: string;
  /** RFC 5646 language tag */
  language: string;
  title: string;
  author: string;
  /** Series (collection) the document belongs to */
  series?: string;
  /** Written as `dcterms:modified` */
  modified: Date;
  sections: EpubSection[];
}

/** Turns chapters into delivery-ready artifacts */
export interface FormatConverter {
  /**
   * @throws {ConversionError} If the chapter cannot be packaged
   */
  convert(book: Book, chapter: Chapter): Promise<Uint8Array>;
  /**
   * One artifact holding several chapters, in the given order.
   *
   * @throws {ConversionError} If the chapters cannot be packaged
   */
  bundle(book: Book, chapters: Chapter[]): Promise<Uint8Array>;
}

const LANGUAGE = "en";

// Elements that never belong in an e-book body
const STRIPPED_ELEMENTS = ["script", "style", "noscript", "iframe", "form", "button"];

/**
 * Escape text for use in XML content and attribute values.
 */
export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/**
 * Re-serialize an HTML fragment as well-formed XHTML body content.
 *
 * @example
 * toXhtmlBody('<p>One<br>Two</p><script>x()</script>') // '<p>One<br/>Two</p>'
 */
export function toXhtmlBody(html: string): string {
  const $ = cheerio.load(html, null, false);
  $(STRIPPED_ELEMENTS.join(", ")).remove();
  return $.xml().trim();
}

/**
 * `dcterms:modified` requires second precision in UTC.
 */
function formatModified(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

function sectionFile(index: number): string {
  return `section-${index + 1}.xhtml`;
}

function sectionXhtml(section: EpubSection, language: string): string {
  const title = escapeXml(section.title);
  return `<?xml version="1.0" encoding="utf-8"?>
<!DOCTYPE html>
<html xmlns="http://www.w3.org/1999/xhtml" xmlns:epub="http://www.idpf.org/2007/ops" lang="${language}" xml:lang="${language}">
<head>
<meta charset="utf-8"/>
<title>${title}</title>
</head>
<body>
<h1>${title}</h1>
${toXhtmlBody(section.content)}
</body>
</html>
`;
}

function navXhtml(doc: EpubDocument): string {
  const items = doc.sections
    .map((section, index) => `<li><a href="${sectionFile(index)}">${escapeXml(section.title)}</a></li>`)
    .join("\n");
  return `<?xml version="1.0" encoding="utf-8"?>
<!DOCTYPE html>
<html xmlns="http://www.w3.org/1999/xhtml" xmlns:epub="http://www.idpf.org/2007/ops" lang="${doc.language}" xml:lang="${doc.language}">
<head>
<meta charset="utf-8"/>
<title>${escapeXml(doc.title)}</title>
</head>
<body>
<nav epub:type="toc" id="toc">
<ol>
${items}
</ol>
</nav>
</body>
</html>
`;
}

function packageOpf(doc: EpubDocument): string {
  const series = doc.series
    ? `
<meta property="belongs-to-collection" id="series">${escapeXml(doc.series)}</meta>
<meta refines="#series" property="collection-type">series</meta>`
    : "";
  const manifest = doc.sections
    .map((_, index) => `<item id="s${index + 1}" href="${sectionFile(index)}" media-type="application/xhtml+xml"/>`)
    .join("\n");
  const spine = doc.sections.map((_, index) => `<itemref idref="s${index + 1}"/>`).join("\n");

  return `<?xml version="1.0" encoding="utf-8"?>
<package xmlns="http://www.idpf.org/2007/opf" version="3.0" unique-identifier="book-id">
<metadata xmlns:dc="http://purl.org/dc/elements/1.1/">
<dc:identifier id="book-id">${escapeXml(doc.identifier)}</dc:identifier>
<dc:title>${escapeXml(doc.title)}</dc:title>
<dc:creator>${escapeXml(doc.author)}</dc:creator>
<dc:language>${doc.language}</dc:language>
<meta property="dcterms:modified">${formatModified(doc.modified)}</meta>${series}
</metadata>
<manifest>
<item id="nav" href="nav.xhtml" media-type="application/xhtml+xml" properties="nav"/>
${manifest}
</manifest>
<spine>
${spine}
</spine>
</package>
`;
}

const CONTAINER_XML = `<?xml version="1.0" encoding="utf-8"?>
<container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container">
<rootfiles>
<rootfile full-path="OEBPS/content.opf" media-type="application/oebps-package+xml"/>
</rootfiles>
</container>
`;

/**
 * Write an EPUB 3 container.
 *
 * @throws {ConversionError} If the document has no sections or zipping fails
 */
export async function buildEpub(doc: EpubDocument): Promise<Uint8Array> {
  if (doc.sections.length === 0) {
    throw new ConversionError(`"${doc.title}" has no sections`);
  }

  const zip = new JSZip();
  // Readers expect the uncompressed mimetype entry first
  zip.file("mimetype", "application/epub+zip", { compression: "STORE" });
  zip.file("META-INF/container.xml", CONTAINER_XML);
  zip.file("OEBPS/content.opf", packageOpf(doc));
  zip.file("OEBPS/nav.xhtml", navXhtml(doc));
  doc.sections.forEach((section, index) => {
    zip.file(`OEBPS/${sectionFile(index)}`, sectionXhtml(section, doc.language));
  });

  try {
    return await zip.generateAsync({ type: "uint8array", compression: "DEFLATE", mimeType: "application/epub+zip" });
  } catch (error) {
    throw new ConversionError(`Failed to package "${doc.title}": ${describeError(error)}`, { cause: error });
  }
}

function assertHasContent(chapter: Chapter): void {
  if (!toXhtmlBody(chapter.content)) {
    throw new ConversionError(`Chapter ${chapter.id} ("${chapter.title}") has no content`);
  }
}

export class EpubConverter implements FormatConverter {
  async convert(book: Book, chapter: Chapter): Promise<Uint8Array> {
    assertHasContent(chapter);
    return buildEpub({
      identifier: `urn:uuid:${chapter.id}`,
      language: LANGUAGE,
      title: `${book.title}: ${chapter.title}`,
      author: book.author,
      series: book.title,
      modified: chapter.ingestedAt,
      sections: [{ title: chapter.title, content: chapter.content }],
    });
  }

  async bundle(book: Book, chapters: Chapter[]): Promise<Uint8Array> {
    const first = chapters[0];
    const last = chapters[chapters.length - 1];
    if (first === undefined || last === undefined) {
      throw new ConversionError(`No chapters to bundle for book ${book.id}`);
    }
    chapters.forEach(assertHasContent);

    return buildEpub({
      identifier: `urn:serial-courier:${book.id}:${first.id}:${last.id}`,
      language: LANGUAGE,
      title: chapters.length === 1 ? `${book.title}: ${first.title}` : `${book.title}: ${first.title} - ${last.title}`,
      author: book.author,
      series: book.title,
      modified: last.ingestedAt,
      sections: chapters.map((chapter) => ({ title: chapter.title, content: chapter.content })),
    });
  }
}
