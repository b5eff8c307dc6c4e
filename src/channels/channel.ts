/**
 * Delivery channels: one per kind of subscriber destination.
 */

import { DeliveryError, FetchError, describeError } from "../errors.js";
import type { DeliveryBatch, DestinationKind, Subscriber } from "../types.js";
import { fetchWithRetry, isRetryableStatus } from "../utils.js";

export interface DeliveryChannel {
  readonly kind: DestinationKind;
  /**
   * Hand a batch to the external service. Resolves once the service accepted it.
   *
   * @throws {DeliveryError} Tagged permanent when retrying cannot help
   */
  deliver(address: string, batch: DeliveryBatch, signal?: AbortSignal): Promise<void>;
}

/** Configured channels by destination kind */
export type ChannelSet = { [K in DestinationKind]?: DeliveryChannel };

export interface Destination {
  kind: DestinationKind;
  address: string;
}

/**
 * A subscriber's populated destinations, e-reader first.
 */
export function destinationsOf(subscriber: Subscriber): Destination[] {
  const destinations: Destination[] = [];
  if (subscriber.kindleEmail) destinations.push({ kind: "kindle", address: subscriber.kindleEmail });
  if (subscriber.pushoverKey) destinations.push({ kind: "pushover", address: subscriber.pushoverKey });
  return destinations;
}

/**
 * "<Book>: <first>" for one chapter, "<Book>: <first> - <last>" for several.
 */
export function batchTitle(batch: DeliveryBatch): string {
  const first = batch.chapters[0];
  const last = batch.chapters[batch.chapters.length - 1];
  if (batch.chapters.length === 1) {
    return `${batch.book.title}: ${first.title}`;
  }
  return `${batch.book.title}: ${first.title} - ${last.title}`;
}

/**
 * POST to a delivery service once, mapping every failure to a {@link DeliveryError}.
 * Server errors, 408, 429 and network failures are transient; other 4xx are permanent.
 */
export async function postToService(
  service: string,
  url: string,
  init: RequestInit,
  signal?: AbortSignal,
): Promise<Response> {
  let response: Response;
  try {
    // No retries: a repeated POST is a repeated delivery
    response = await fetchWithRetry(url, { ...init, method: "POST" }, { retries: 0, signal });
  } catch (error) {
    const reason = error instanceof FetchError ? error.message : String(error);
    throw new DeliveryError(`${service} request failed: ${reason}`, { permanent: false, cause: error });
  }

  if (!response.ok) {
    let detail: string;
    try {
      detail = (await response.text()).trim().slice(0, 200);
    } catch (error) {
      detail = `unreadable body (${describeError(error)})`;
    }
    throw new DeliveryError(`${service} responded ${response.status}${detail ? `: ${detail}` : ""}`, {
      permanent: !isRetryableStatus(response.status),
    });
  }
  return response;
}
