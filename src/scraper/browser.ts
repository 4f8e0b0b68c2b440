/**
 * Playwright Browser Factory
 *
 * Manages browser lifecycle for listing pages that only render their
 * article cards client-side
 */

import { chromium } from 'playwright';
import type { Browser, BrowserContext, Page } from 'playwright';
import { logger } from '../utils/logger.js';
import { sleep } from '../utils/retry.js';

let browser: Browser | null = null;
let context: BrowserContext | null = null;

/**
 * Browser configuration options
 */
export interface BrowserOptions {
  headless?: boolean;
  timeoutMs: number;
  userAgent: string;
}

/**
 * Options for rendering a listing page
 */
export interface RenderOptions {
  /** Accessible name of a "show more" button to click until it disappears */
  loadMoreLabel?: string;
  maxLoadMoreClicks: number;
  clickWaitMs: number;
}

/**
 * Renders a page in a browser and returns the resulting HTML
 */
export type PageRenderer = (url: string, options: RenderOptions) => Promise<string>;

/**
 * Initialize browser instance
 */
export async function initBrowser(options: BrowserOptions): Promise<Browser> {
  if (browser) {
    logger.debug('Browser already initialized');
    return browser;
  }

  const headless = options.headless ?? true;

  logger.info({ headless }, 'Launching browser');

  browser = await chromium.launch({
    headless,
    // Required for CI runners and containers
    args: ['--no-sandbox', '--disable-setuid-sandbox', '--disable-dev-shm-usage', '--disable-gpu'],
  });

  context = await browser.newContext({
    userAgent: options.userAgent,
    viewport: { width: 1920, height: 1080 },
    locale: 'en-US',
    javaScriptEnabled: true,
  });

  context.setDefaultTimeout(options.timeoutMs);

  logger.info('Browser initialized successfully');
  return browser;
}

/**
 * Create a new page in the shared context
 */
export async function createPage(options: BrowserOptions): Promise<Page> {
  if (!context) {
    await initBrowser(options);
  }

  if (!context) {
    throw new Error('Failed to initialize browser context');
  }

  const page = await context.newPage();

  // Block unnecessary resource types for faster loading
  await page.route('**/*', (route) => {
    const resourceType = route.request().resourceType();
    const blockedTypes = ['media', 'font', 'image'];

    if (blockedTypes.includes(resourceType)) {
      return route.abort();
    }
    return route.continue();
  });

  return page;
}

/**
 * Click a labelled button until it disappears or the click budget runs out.
 * Returns the number of successful clicks.
 */
async function clickUntilGone(page: Page, label: string, maxClicks: number, waitMs: number): Promise<number> {
  let clicks = 0;

  while (clicks < maxClicks) {
    const button = page.getByRole('button', { name: label });

    if ((await button.count()) === 0) {
      break;
    }

    try {
      await button.first().click({ timeout: 5000 });
    } catch (error) {
      logger.debug({ error, label, clicks }, 'Load-more button no longer clickable');
      break;
    }

    clicks++;
    await sleep(waitMs);
  }

  return clicks;
}

/**
 * Close browser and cleanup
 */
export async function closeBrowser(): Promise<void> {
  if (context) {
    try {
      await context.close();
    } catch (error) {
      logger.warn({ error }, 'Error closing context');
    }
    context = null;
  }

  if (browser) {
    try {
      await browser.close();
      logger.info('Browser closed');
    } catch (error) {
      logger.warn({ error }, 'Error closing browser');
    }
    browser = null;
  }
}

/**
 * Create a renderer that loads a page, waits for the network to go idle,
 * expands it with its load-more button and returns the final DOM as HTML.
 * The browser is closed after every render.
 */
export function createPageRenderer(browserOptions: BrowserOptions): PageRenderer {
  return async (url, options) => {
    try {
      const page = await createPage(browserOptions);

      logger.debug({ url }, 'Navigating to URL');
      await page.goto(url, { waitUntil: 'networkidle' });

      if (options.loadMoreLabel) {
        const clicks = await clickUntilGone(
          page,
          options.loadMoreLabel,
          options.maxLoadMoreClicks,
          options.clickWaitMs
        );
        logger.debug({ url, clicks }, 'Expanded listing');
      }

      return await page.content();
    } finally {
      await closeBrowser();
    }
  };
}

export type { Browser, BrowserContext, Page };
