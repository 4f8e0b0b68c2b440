/**
 * Source adapter contract
 */

import type { CandidateReference } from '../types/index.js';

/**
 * Enumerates candidate articles for exactly one news source.
 *
 * Implementations skip malformed entries and throw only when the source as a
 * whole cannot be read. Nothing is fetched until iteration starts.
 */
export interface SourceAdapter {
  readonly name: string;
  produce(): AsyncIterable<CandidateReference>;
}

/**
 * Fetches a page and returns its HTML
 */
export type HtmlFetcher = (url: string) => Promise<string>;

/**
 * The subset of rss-parser used by feed adapters
 */
export interface FeedReader {
  parseURL(url: string): Promise<{ items: FeedItem[] }>;
}

export interface FeedItem {
  link?: string;
  title?: string;
  contentSnippet?: string;
}
