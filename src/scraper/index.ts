/**
 * Scraper Module
 *
 * Builds one source adapter per enabled source
 */

import type { SourceConfig } from '../config/index.js';
import { createBrowserAdapter } from './browser-adapter.js';
import type { PageRenderer } from './browser.js';
import { createLinkTextAdapter } from './html-adapter.js';
import { createFeedAdapter } from './rss-adapter.js';
import type { FeedReader, HtmlFetcher, SourceAdapter } from './types.js';

export interface AdapterDependencies {
  fetchHtml: HtmlFetcher;
  feedReader: FeedReader;
  renderPage: PageRenderer;
}

/**
 * Create adapters for the given sources, preserving their order
 */
export function createAdapters(
  sources: readonly SourceConfig[],
  deps: AdapterDependencies
): SourceAdapter[] {
  return sources.map(({ name, definition }): SourceAdapter => {
    switch (definition.kind) {
      case 'feed':
        return createFeedAdapter({ name, feedUrl: definition.feedUrl, reader: deps.feedReader });
      case 'link-text':
        return createLinkTextAdapter({
          name,
          pageUrl: definition.pageUrl,
          label: definition.label,
          match: definition.match,
          fetchHtml: deps.fetchHtml,
        });
      case 'browser':
        return createBrowserAdapter({
          name,
          pageUrl: definition.pageUrl,
          linkSelector: definition.linkSelector,
          loadMoreLabel: definition.loadMoreLabel,
          maxLoadMoreClicks: definition.maxLoadMoreClicks,
          clickWaitMs: definition.clickWaitMs,
          renderPage: deps.renderPage,
        });
    }
  });
}

export { createFeedAdapter, createFeedReader } from './rss-adapter.js';
export { createLinkTextAdapter } from './html-adapter.js';
export { createBrowserAdapter } from './browser-adapter.js';
export { createPageRenderer, closeBrowser } from './browser.js';
export { createHtmlFetcher } from './http.js';
export { extractArticle, type ExtractedArticle } from './content-extractor.js';

export type { BrowserOptions, PageRenderer, RenderOptions } from './browser.js';
export type { SourceAdapter, FeedReader, FeedItem, HtmlFetcher } from './types.js';
