/**
 * E-reader delivery by email through the Mailgun HTTP API.
 *
 * One message per batch, with the batch as a single EPUB attachment. When the
 * EPUB cannot be built the chapters go out as an HTML attachment instead, with a
 * Markdown rendering in the text part.
 */

import TurndownService from "turndown";
import { escapeXml, type FormatConverter } from "../convert.js";
import { ConversionError } from "../errors.js";
import { silentLogger, type Logger } from "../log.js";
import type { Chapter, DeliveryBatch } from "../types.js";
import { sanitizeFilename } from "../utils.js";
import { batchTitle, postToService, type DeliveryChannel } from "./channel.js";

export interface MailgunConfig {
  apiKey: string;
  /** Messages endpoint, e.g. https://api.mailgun.net/v3/<domain>/messages */
  endpoint: string;
  from: string;
}

export interface Attachment {
  filename: string;
  contentType: string;
  bytes: Uint8Array;
}

export interface MailMessage {
  to: string;
  subject: string;
  text: string;
  html: string;
  attachment: Attachment;
}

const EPUB_TYPE = "application/epub+zip";

/**
 * Convert chapter HTML to Markdown for the text part of a fallback message.
 */
export function toMarkdown(html: string): string {
  const turndown = new TurndownService({
    headingStyle: "atx",
    codeBlockStyle: "fenced",
  });
  turndown.remove(["script", "style", "noscript", "iframe"]);
  return turndown.turndown(html);
}

function chaptersHtml(chapters: Chapter[]): string {
  return chapters.map((chapter) => `<h1>${escapeXml(chapter.title)}</h1>\n${chapter.content}`).join("\n");
}

/**
 * Build the message for a batch.
 *
 * A single chapter with a stored artifact is sent as it is; anything else is
 * bundled through the converter.
 */
export async function composeMessage(
  to: string,
  batch: DeliveryBatch,
  converter: FormatConverter,
  logger: Logger = silentLogger,
): Promise<MailMessage> {
  const subject = batchTitle(batch);
  const filename = sanitizeFilename(subject);
  const [only] = batch.chapters;

  if (batch.chapters.length === 1 && only.artifact !== null) {
    return {
      to,
      subject,
      text: subject,
      html: escapeXml(subject),
      attachment: { filename: `${filename}.epub`, contentType: EPUB_TYPE, bytes: only.artifact },
    };
  }

  try {
    const bytes = await converter.bundle(batch.book, batch.chapters);
    return {
      to,
      subject,
      text: subject,
      html: escapeXml(subject),
      attachment: { filename: `${filename}.epub`, contentType: EPUB_TYPE, bytes },
    };
  } catch (error) {
    if (!(error instanceof ConversionError)) throw error;
    logger.warn(`${subject}: sending HTML instead of EPUB (${error.message})`);
  }

  const html = chaptersHtml(batch.chapters);
  return {
    to,
    subject,
    text: toMarkdown(html),
    html: escapeXml(subject),
    attachment: {
      filename: `${filename}.html`,
      contentType: "text/html; charset=utf-8",
      bytes: new TextEncoder().encode(html),
    },
  };
}

/**
 * Multipart form in the shape the Mailgun messages API takes.
 */
export function toFormData(message: MailMessage, from: string): FormData {
  const form = new FormData();
  form.append("from", from);
  form.append("to", message.to);
  form.append("subject", message.subject);
  form.append("text", message.text);
  form.append("html", message.html);
  form.append(
    "attachment",
    new Blob([message.attachment.bytes], { type: message.attachment.contentType }),
    message.attachment.filename,
  );
  return form;
}

export class MailgunChannel implements DeliveryChannel {
  readonly kind = "kindle";

  constructor(
    private readonly config: MailgunConfig,
    private readonly converter: FormatConverter,
    private readonly logger: Logger = silentLogger,
  ) {}

  async deliver(address: string, batch: DeliveryBatch, signal?: AbortSignal): Promise<void> {
    const message = await composeMessage(address, batch, this.converter, this.logger);
    const credentials = Buffer.from(`api:${this.config.apiKey}`).toString("base64");

    await postToService(
      "Mailgun",
      this.config.endpoint,
      {
        headers: { Authorization: `Basic ${credentials}` },
        body: toFormData(message, this.config.from),
      },
      signal,
    );
    this.logger.info(`Emailed "${message.subject}" (${message.attachment.filename}) to ${address}`);
  }
}
