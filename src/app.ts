/**
 * Application runner
 *
 * Wires the components from configuration, runs the pipeline once and maps
 * the outcome to a process exit code.
 */

import { isSlackConfigured, type AppConfig } from './config/index.js';
import { createSlackNotifier, type Notifier } from './notifier/index.js';
import { runPipeline, type PipelineDependencies } from './pipeline.js';
import { createArticleResolver } from './resolver/index.js';
import {
  closeBrowser,
  createAdapters,
  createFeedReader,
  createHtmlFetcher,
  createPageRenderer,
} from './scraper/index.js';
import { createFileSeenStore } from './store/index.js';
import { logger } from './utils/logger.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

export interface RunAppOptions {
  dryRun?: boolean;
  /** Builds the pipeline components; defaults to the network-backed ones */
  createDependencies?: (appConfig: AppConfig) => PipelineDependencies;
  /** Releases resources once the run is over */
  cleanup?: () => Promise<void>;
}

function createNotifier(appConfig: AppConfig): Notifier {
  const { webhookUrl, timeoutMs, minIntervalMs } = appConfig.slack;

  if (!webhookUrl) {
    // Only reachable in dry-run mode, where notify is never called
    return {
      notify: () => Promise.reject(new Error('SLACK_WEBHOOK_URL is not configured')),
    };
  }

  return createSlackNotifier({ webhookUrl, timeoutMs, minIntervalMs });
}

export function createDefaultDependencies(appConfig: AppConfig): PipelineDependencies {
  const { scraper } = appConfig;

  const adapters = createAdapters(appConfig.sources, {
    fetchHtml: createHtmlFetcher({ userAgent: scraper.userAgent, timeoutMs: scraper.timeoutMs }),
    feedReader: createFeedReader({ userAgent: scraper.userAgent, timeoutMs: scraper.timeoutMs }),
    renderPage: createPageRenderer({
      headless: true,
      timeoutMs: scraper.browserTimeoutMs,
      userAgent: scraper.userAgent,
    }),
  });

  // Article pages are fetched once, without retry
  const resolver = createArticleResolver({
    fetchHtml: createHtmlFetcher({
      userAgent: scraper.userAgent,
      timeoutMs: scraper.timeoutMs,
      retry: { maxAttempts: 1 },
    }),
    previewWords: appConfig.resolver.previewWords,
    fallbackChars: appConfig.resolver.fallbackChars,
  });

  return {
    adapters,
    store: createFileSeenStore(appConfig.store.path),
    resolver,
    notifier: createNotifier(appConfig),
  };
}

/**
 * Run once. Resolves with 0 when the run completed (even if some articles
 * failed) and 1 when it was aborted.
 */
export async function runApp(appConfig: AppConfig, options: RunAppOptions = {}): Promise<number> {
  const { dryRun = false, createDependencies = createDefaultDependencies, cleanup = closeBrowser } = options;

  logger.info(
    { env: appConfig.app.env, version: appConfig.app.version, mode: dryRun ? 'dry-run' : 'post' },
    'Starting space news notifier'
  );

  if (!dryRun && !isSlackConfigured(appConfig)) {
    logger.fatal('SLACK_WEBHOOK_URL is not configured');
    return EXIT_FAILURE;
  }

  try {
    const result = await runPipeline(createDependencies(appConfig), { dryRun });

    logger.info('');
    logger.info('Run Summary:');
    logger.info(`  ✓ Candidates: ${result.candidates}`);
    logger.info(`  ✓ Duplicates: ${result.duplicates}`);
    logger.info(`  ✓ Posted:     ${result.posted}`);
    if (result.failed > 0 || result.sourceErrors > 0 || result.emptySources > 0) {
      logger.info(`  ⚠ Failed:     ${result.failed}`);
      logger.info(`  ⚠ Bad sources: ${result.sourceErrors} failed, ${result.emptySources} empty`);
    }
    logger.info(`  ⏱ Duration:   ${(result.durationMs / 1000).toFixed(1)}s`);

    return EXIT_OK;
  } catch (error) {
    logger.fatal({ error }, 'Run aborted');
    return EXIT_FAILURE;
  } finally {
    await cleanup();
  }
}
