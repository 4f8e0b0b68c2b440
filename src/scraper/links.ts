/**
 * Anchor selection helpers shared by HTML and browser adapters
 */

import * as cheerio from 'cheerio';

export type LinkFilter = (text: string) => boolean;

/**
 * Resolve an href against the page it was found on.
 * Returns null for empty, non-http or unparsable links.
 */
export function toAbsoluteUrl(href: string | undefined, baseUrl: string): string | null {
  const trimmed = href?.trim();
  if (!trimmed || trimmed.startsWith('#')) {
    return null;
  }

  try {
    const url = new URL(trimmed, baseUrl);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      return null;
    }
    // Absolute links are kept verbatim so their identity matches the source
    return /^https?:\/\//i.test(trimmed) ? trimmed : url.toString();
  } catch {
    return null;
  }
}

/**
 * Collect absolute article URLs from anchors matching `selector` (and,
 * optionally, whose trimmed text passes `filter`), in document order and
 * without repeats.
 */
export function collectLinks(
  html: string,
  baseUrl: string,
  selector: string,
  filter?: LinkFilter
): string[] {
  const $ = cheerio.load(html);
  const seenUrls = new Set<string>();
  const urls: string[] = [];

  $(selector).each((_, anchor) => {
    const text = $(anchor).text().trim();
    if (filter && !filter(text)) {
      return;
    }

    const url = toAbsoluteUrl($(anchor).attr('href'), baseUrl);
    if (!url || seenUrls.has(url)) {
      return;
    }

    seenUrls.add(url);
    urls.push(url);
  });

  return urls;
}
