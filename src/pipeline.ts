/**
 * Main Pipeline
 *
 * Drives one notification run:
 * 1. Load the seen-set
 * 2. Walk every source adapter in order
 * 3. Skip articles already seen (persisted or earlier this run)
 * 4. Resolve and post each new article
 * 5. Save the seen-set once, at the end
 *
 * Only storage failures abort a run. A failure on one article or one source is
 * logged and the run moves on.
 */

import type { ArticleResolver } from './resolver/index.js';
import type { Notifier } from './notifier/index.js';
import type { SourceAdapter } from './scraper/types.js';
import { articleIdentity, type SeenStore } from './store/index.js';
import { logger } from './utils/logger.js';
import type { ArticleIdentity, CandidateReference, PipelineResult } from './types/index.js';

/**
 * Everything a run needs, built by the caller
 */
export interface PipelineDependencies {
  adapters: readonly SourceAdapter[];
  store: SeenStore;
  resolver: ArticleResolver;
  notifier: Notifier;
}

/**
 * Pipeline options
 */
export interface PipelineOptions {
  /** Resolve and log articles without posting them or saving state */
  dryRun?: boolean;
}

interface RunState {
  seen: ReadonlySet<ArticleIdentity>;
  delivered: Set<ArticleIdentity>;
  result: PipelineResult;
  dryRun: boolean;
}

async function processCandidate(
  candidate: CandidateReference,
  source: string,
  deps: PipelineDependencies,
  state: RunState
): Promise<void> {
  const identity = articleIdentity(candidate.url);

  if (state.seen.has(identity) || state.delivered.has(identity)) {
    state.result.duplicates++;
    logger.debug({ source, url: candidate.url }, 'Already posted, skipping');
    return;
  }

  try {
    const { title, preview } = await deps.resolver.resolve(candidate.url, candidate.inlineText);

    if (state.dryRun) {
      logger.info({ source, url: candidate.url, title, preview }, 'Would post article');
      state.delivered.add(identity);
      return;
    }

    await deps.notifier.notify(title, preview, candidate.url);
    state.delivered.add(identity);
    state.result.posted++;

    logger.info({ source, url: candidate.url, title }, 'Posted article');
  } catch (error) {
    state.result.failed++;
    logger.error({ error, source, url: candidate.url }, 'Failed to post article');
  }
}

async function processSource(
  adapter: SourceAdapter,
  deps: PipelineDependencies,
  state: RunState
): Promise<void> {
  let produced = 0;

  try {
    for await (const candidate of adapter.produce()) {
      produced++;
      state.result.candidates++;
      await processCandidate(candidate, adapter.name, deps, state);
    }
  } catch (error) {
    state.result.sourceErrors++;
    logger.error({ error, source: adapter.name, produced }, 'Source failed, moving to next source');
    return;
  }

  if (produced === 0) {
    state.result.emptySources++;
    logger.warn({ source: adapter.name }, 'Source returned no articles, its markup may have changed');
    return;
  }

  logger.info({ source: adapter.name, produced }, 'Source processed');
}

/**
 * Run the full pipeline once
 */
export async function runPipeline(
  deps: PipelineDependencies,
  options: PipelineOptions = {}
): Promise<PipelineResult> {
  const { dryRun = false } = options;

  const startTime = Date.now();
  const result: PipelineResult = {
    candidates: 0,
    duplicates: 0,
    posted: 0,
    failed: 0,
    emptySources: 0,
    sourceErrors: 0,
    durationMs: 0,
  };

  logger.info({ sources: deps.adapters.map((adapter) => adapter.name), dryRun }, 'Starting pipeline');

  const seen = await deps.store.load();
  logger.info({ seen: seen.size }, 'Seen-set loaded');

  const state: RunState = { seen, delivered: new Set(), result, dryRun };

  for (const adapter of deps.adapters) {
    await processSource(adapter, deps, state);
  }

  if (dryRun) {
    logger.info({ wouldPost: state.delivered.size }, 'Dry run, seen-set not saved');
  } else {
    await deps.store.save(new Set([...seen, ...state.delivered]));
    logger.info({ seen: seen.size + state.delivered.size }, 'Seen-set saved');
  }

  result.durationMs = Date.now() - startTime;
  logger.info({ result }, 'Pipeline complete');

  return result;
}
