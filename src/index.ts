/**
 * Space News Notifier
 *
 * Short-lived job that:
 * 1. Lists articles from the enabled news sources
 * 2. Drops the ones already posted (seen-set file)
 * 3. Builds a ~100 word preview of each new article
 * 4. Posts one Slack message per article
 * 5. Records the posted articles in the seen-set file
 *
 * Usage:
 *   node dist/index.js            - Run once and exit
 *   node dist/index.js --dry-run  - Resolve and log, post nothing, save nothing
 */

import { runApp } from './app.js';
import { config } from './config/index.js';
import { logger } from './utils/logger.js';

const args = process.argv.slice(2);

runApp(config, { dryRun: args.includes('--dry-run') })
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    logger.fatal({ error }, 'Run aborted');
    process.exitCode = 1;
  });
