import type { BookSource } from "../types.js";
import { FeedAdapter } from "./feed.js";
import { RoyalRoadAdapter } from "./royalroad.js";
import type { AdapterOptions, SourceAdapter } from "./source.js";

export type { SourceAdapter } from "./source.js";

/** Picks the adapter for a book's source descriptor */
export type AdapterResolver = (source: BookSource) => SourceAdapter;

/**
 * Build a resolver that reuses one adapter per source type.
 */
export function createAdapterResolver(options: AdapterOptions = {}): AdapterResolver {
  const royalroad = new RoyalRoadAdapter(options);
  const feed = new FeedAdapter(options);

  return (source) => {
    switch (source.type) {
      case "royalroad":
        return royalroad;
      case "feed":
        return feed;
    }
  };
}
