/**
 * RSS/Atom feed adapter
 */

import Parser from 'rss-parser';
import { logger } from '../utils/logger.js';
import type { CandidateReference } from '../types/index.js';
import type { FeedReader, SourceAdapter } from './types.js';

export interface FeedAdapterOptions {
  name: string;
  feedUrl: string;
  reader: FeedReader;
}

/**
 * Create RSS parser with custom headers
 */
export function createFeedReader(options: { userAgent: string; timeoutMs: number }): FeedReader {
  return new Parser({
    headers: {
      'User-Agent': options.userAgent,
      Accept: 'application/rss+xml, application/atom+xml, application/xml, text/xml, */*',
    },
    timeout: options.timeoutMs,
  });
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

export function createFeedAdapter(options: FeedAdapterOptions): SourceAdapter {
  const { name, feedUrl, reader } = options;

  return {
    name,
    async *produce(): AsyncGenerator<CandidateReference> {
      logger.info({ source: name, url: feedUrl }, 'Fetching RSS feed');

      const feed = await reader.parseURL(feedUrl);

      logger.info({ source: name, itemCount: feed.items.length }, 'RSS feed parsed');

      for (const item of feed.items) {
        const link = item.link?.trim();

        if (!link || !isHttpUrl(link)) {
          logger.debug({ source: name, title: item.title }, 'Feed item has no usable link, skipping');
          continue;
        }

        yield {
          url: link,
          inlineText: item.contentSnippet?.trim() ?? '',
        };
      }
    },
  };
}
