/**
 * Article Content Extractor
 *
 * Pulls the title and main body text out of an article page
 */

import * as cheerio from 'cheerio';

export interface ExtractedArticle {
  title: string | null;
  text: string;
}

const UNWANTED_SELECTORS = [
  'script',
  'style',
  'noscript',
  'nav',
  'header',
  'footer',
  'aside',
  'form',
  '.sidebar',
  '.menu',
  '.navigation',
  '.comments',
  '.social-share',
  '.advertisement',
  '.ads',
  '[class*="cookie"]',
  '[class*="popup"]',
  '[class*="modal"]',
  '[class*="banner"]',
];

const CONTENT_SELECTORS: cheerio.SelectorType[] = [
  'article',
  '[class*="article-body"]',
  '[class*="article-content"]',
  '[class*="post-content"]',
  '[class*="entry-content"]',
  '.content',
  'main',
  '[role="main"]',
];

const MIN_CONTAINER_CHARS = 200;
const MIN_PARAGRAPH_CHARS = 30;

function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function extractTitle($: cheerio.CheerioAPI): string | null {
  const candidates = [
    $('meta[property="og:title"]').attr('content'),
    $('title').first().text(),
    $('h1').first().text(),
  ];

  for (const candidate of candidates) {
    const title = candidate ? normalizeWhitespace(candidate) : '';
    if (title) {
      return title;
    }
  }

  return null;
}

/**
 * Extract title and body text from raw HTML.
 * Paragraphs are separated by newlines; `text` is empty when nothing
 * readable was found.
 */
export function extractArticle(html: string): ExtractedArticle {
  const $ = cheerio.load(html);
  const title = extractTitle($);

  $(UNWANTED_SELECTORS.join(', ')).remove();

  // Try to find the main article content, fallback to body
  let container = $('body');
  for (const selector of CONTENT_SELECTORS) {
    const element = $(selector).first();
    if (element.length > 0 && element.text().trim().length > MIN_CONTAINER_CHARS) {
      container = element;
      break;
    }
  }

  const paragraphs: string[] = [];
  container.find('p').each((_, p) => {
    const text = normalizeWhitespace($(p).text());
    if (text.length >= MIN_PARAGRAPH_CHARS) {
      paragraphs.push(text);
    }
  });

  // No usable paragraphs: use all text content
  if (paragraphs.length === 0) {
    const text = container.text().trim();
    if (text) {
      paragraphs.push(
        ...text
          .split(/\n\s*\n/)
          .map(normalizeWhitespace)
          .filter((block) => block.length > 0)
      );
    }
  }

  return { title, text: paragraphs.join('\n') };
}
