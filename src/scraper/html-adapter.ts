/**
 * Static HTML listing adapter
 *
 * Picks article links out of a listing page by their anchor text
 * (e.g. every "Read more" link).
 */

import { logger } from '../utils/logger.js';
import type { CandidateReference } from '../types/index.js';
import { collectLinks, type LinkFilter } from './links.js';
import type { HtmlFetcher, SourceAdapter } from './types.js';

export interface LinkTextAdapterOptions {
  name: string;
  pageUrl: string;
  label: string;
  match: 'startsWith' | 'endsWith';
  fetchHtml: HtmlFetcher;
}

function labelFilter(label: string, match: 'startsWith' | 'endsWith'): LinkFilter {
  return match === 'startsWith'
    ? (text) => text.startsWith(label)
    : (text) => text.endsWith(label);
}

export function createLinkTextAdapter(options: LinkTextAdapterOptions): SourceAdapter {
  const { name, pageUrl, label, match, fetchHtml } = options;

  return {
    name,
    async *produce(): AsyncGenerator<CandidateReference> {
      logger.info({ source: name, url: pageUrl }, 'Fetching listing page');

      const html = await fetchHtml(pageUrl);
      const urls = collectLinks(html, pageUrl, 'a', labelFilter(label, match));

      logger.info({ source: name, count: urls.length }, 'Found article links');

      for (const url of urls) {
        yield { url, inlineText: '' };
      }
    },
  };
}
