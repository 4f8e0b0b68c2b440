/**
 * Article Resolver
 *
 * Turns a candidate reference into a title and a short preview. Never
 * rejects: any failure while fetching or extracting falls back to the
 * inline text that came with the candidate.
 */

import { extractArticle } from '../scraper/content-extractor.js';
import type { HtmlFetcher } from '../scraper/types.js';
import { logger } from '../utils/logger.js';
import type { ResolvedArticle } from '../types/index.js';

export const FALLBACK_TITLE = 'Untitled';
export const NO_PREVIEW = 'No preview available.';
export const ELLIPSIS = '…';

export interface ArticleResolver {
  resolve(url: string, inlineText: string): Promise<ResolvedArticle>;
}

export interface ResolverOptions {
  fetchHtml: HtmlFetcher;
  previewWords: number;
  fallbackChars: number;
}

/**
 * First `limit` words of `text`, single-spaced
 */
export function firstWords(text: string, limit: number): string {
  return text
    .replace(/\n/g, ' ')
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .slice(0, limit)
    .join(' ');
}

/**
 * Append an ellipsis unless the preview already ends a sentence
 */
export function terminatePreview(preview: string): string {
  if (preview.length === 0 || /[.!?]$/.test(preview)) {
    return preview;
  }
  return `${preview}${ELLIPSIS}`;
}

export function createArticleResolver(options: ResolverOptions): ArticleResolver {
  const { fetchHtml, previewWords, fallbackChars } = options;

  /**
   * Inline text cut to the character budget, counted in code points so an
   * emoji is never split
   */
  function inlinePreview(inlineText: string): string {
    const preview = Array.from(inlineText.trim()).slice(0, fallbackChars).join('');
    return preview || NO_PREVIEW;
  }

  async function fetchAndExtract(url: string, inlineText: string): Promise<ResolvedArticle> {
    const html = await fetchHtml(url);
    const article = extractArticle(html);
    const title = article.title ?? FALLBACK_TITLE;
    const preview = firstWords(article.text, previewWords);

    if (!preview) {
      logger.warn({ url, title }, 'No article text found, using inline text');
      return { title, preview: inlinePreview(inlineText) };
    }

    return { title, preview };
  }

  return {
    async resolve(url, inlineText) {
      let resolved: ResolvedArticle;

      try {
        resolved = await fetchAndExtract(url, inlineText);
      } catch (error) {
        logger.warn({ url, error }, 'Article fetch failed, using inline text');
        resolved = { title: FALLBACK_TITLE, preview: inlinePreview(inlineText) };
      }

      return { title: resolved.title, preview: terminatePreview(resolved.preview) };
    },
  };
}
