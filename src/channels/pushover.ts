/**
 * Push notifications through Pushover.
 */

import { silentLogger, type Logger } from "../log.js";
import type { DeliveryBatch } from "../types.js";
import { postToService, type DeliveryChannel } from "./channel.js";

export const PUSHOVER_URL = "https://api.pushover.net/1/messages.json";

/**
 * Notification text for a batch.
 *
 * @example
 * pushoverMessage(batch) // 'Delivered new chapters for Pale. 1.1 through 1.3'
 */
export function pushoverMessage(batch: DeliveryBatch): string {
  const { book, chapters } = batch;
  if (chapters.length === 1) {
    return `Delivered new chapter for ${book.title}: ${chapters[0].title}`;
  }
  return `Delivered new chapters for ${book.title}. ${chapters[0].title} through ${chapters[chapters.length - 1].title}`;
}

export class PushoverChannel implements DeliveryChannel {
  readonly kind = "pushover";

  constructor(
    private readonly token: string,
    private readonly logger: Logger = silentLogger,
  ) {}

  async deliver(address: string, batch: DeliveryBatch, signal?: AbortSignal): Promise<void> {
    const message = pushoverMessage(batch);
    await postToService(
      "Pushover",
      PUSHOVER_URL,
      {
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ token: this.token, user: address, message }),
      },
      signal,
    );
    this.logger.info(`Notified ${address}: ${message}`);
  }
}
