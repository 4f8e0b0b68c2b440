/**
 * HTTP page fetcher
 */

import axios from 'axios';
import { withRetry, type RetryConfig } from '../utils/retry.js';
import type { HtmlFetcher } from './types.js';

export interface HtmlFetcherOptions {
  userAgent: string;
  timeoutMs: number;
  retry?: Partial<RetryConfig>;
}

/**
 * Create a fetcher that GETs a URL and returns the response body as text.
 * Non-2xx responses and timeouts reject.
 */
export function createHtmlFetcher(options: HtmlFetcherOptions): HtmlFetcher {
  const client = axios.create({
    timeout: options.timeoutMs,
    responseType: 'text',
    headers: {
      'User-Agent': options.userAgent,
      Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
    },
  });

  return (url) =>
    withRetry(async () => {
      const response = await client.get<string>(url);
      return String(response.data);
    }, options.retry);
}
