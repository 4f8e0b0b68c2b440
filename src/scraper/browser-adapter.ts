/**
 * Browser-rendered listing adapter
 */

import { logger } from '../utils/logger.js';
import type { CandidateReference } from '../types/index.js';
import type { PageRenderer, RenderOptions } from './browser.js';
import { collectLinks } from './links.js';
import type { SourceAdapter } from './types.js';

export interface BrowserAdapterOptions extends RenderOptions {
  name: string;
  pageUrl: string;
  linkSelector: string;
  renderPage: PageRenderer;
}

export function createBrowserAdapter(options: BrowserAdapterOptions): SourceAdapter {
  const { name, pageUrl, linkSelector, renderPage, loadMoreLabel, maxLoadMoreClicks, clickWaitMs } =
    options;

  return {
    name,
    async *produce(): AsyncGenerator<CandidateReference> {
      logger.info({ source: name, url: pageUrl }, 'Rendering listing page');

      const html = await renderPage(pageUrl, { loadMoreLabel, maxLoadMoreClicks, clickWaitMs });
      const urls = collectLinks(html, pageUrl, linkSelector);

      logger.info({ source: name, count: urls.length }, 'Found article cards');

      for (const url of urls) {
        yield { url, inlineText: '' };
      }
    },
  };
}
