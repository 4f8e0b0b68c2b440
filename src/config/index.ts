/**
 * Application configuration
 */

import { env, type Env } from './env.js';
import { SOURCE_DEFINITIONS, type SourceDefinition, type SourceName } from './sources.js';

export interface SourceConfig {
  name: SourceName;
  definition: SourceDefinition;
}

export interface AppConfig {
  app: {
    name: string;
    version: string;
    env: Env['NODE_ENV'];
  };
  slack: {
    webhookUrl: string | undefined;
    timeoutMs: number;
    minIntervalMs: number;
  };
  sources: readonly SourceConfig[];
  scraper: {
    userAgent: string;
    timeoutMs: number;
    browserTimeoutMs: number;
  };
  resolver: {
    previewWords: number;
    fallbackChars: number;
  };
  store: {
    path: string;
  };
  logging: {
    level: Env['LOG_LEVEL'];
    file: string | undefined;
  };
}

/**
 * Build the immutable run configuration from validated environment values
 */
export function buildConfig(values: Env): AppConfig {
  return Object.freeze({
    app: {
      name: 'space-news-notifier',
      version: '1.0.0',
      env: values.NODE_ENV,
    },

    slack: {
      webhookUrl: values.SLACK_WEBHOOK_URL,
      timeoutMs: values.NOTIFY_TIMEOUT_MS,
      minIntervalMs: values.NOTIFY_MIN_INTERVAL_MS,
    },

    sources: values.ENABLED_SOURCES.map((name) => ({
      name,
      definition: SOURCE_DEFINITIONS[name],
    })),

    scraper: {
      userAgent: values.USER_AGENT,
      timeoutMs: values.FETCH_TIMEOUT_MS,
      browserTimeoutMs: values.BROWSER_TIMEOUT_MS,
    },

    resolver: {
      previewWords: values.PREVIEW_WORDS,
      fallbackChars: values.PREVIEW_FALLBACK_CHARS,
    },

    store: {
      path: values.SEEN_STORE_PATH,
    },

    logging: {
      level: values.LOG_LEVEL,
      file: values.LOG_FILE,
    },
  });
}

export const config: AppConfig = buildConfig(env);

export function isSlackConfigured(appConfig: AppConfig = config): boolean {
  return Boolean(appConfig.slack.webhookUrl);
}

export { env, parseEnv } from './env.js';
export type { Env } from './env.js';
export { SOURCE_DEFINITIONS, SOURCE_NAMES } from './sources.js';
export type { SourceDefinition, SourceName } from './sources.js';
