/**
 * Environment variable validation using Zod
 */

import { z } from 'zod';
import 'dotenv/config';
import { DEFAULT_ENABLED_SOURCES, SOURCE_NAMES } from './sources.js';

const envSchema = z.object({
  // Slack
  SLACK_WEBHOOK_URL: z.string().url().optional(), // Optional: only required when actually posting

  // Sources (comma separated, processed in the listed order)
  ENABLED_SOURCES: z
    .string()
    .default(DEFAULT_ENABLED_SOURCES.join(','))
    .transform((value) =>
      value
        .split(',')
        .map((name) => name.trim())
        .filter((name) => name.length > 0)
    )
    .pipe(z.array(z.enum(SOURCE_NAMES)).min(1, 'ENABLED_SOURCES must name at least one source')),

  // Seen-set storage
  SEEN_STORE_PATH: z.string().min(1).default('sent_urls.json'),

  // Timeouts
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(20000),
  NOTIFY_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  BROWSER_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

  // Preview
  PREVIEW_WORDS: z.coerce.number().int().positive().default(100),
  PREVIEW_FALLBACK_CHARS: z.coerce.number().int().positive().default(500),

  // Slack allows roughly one message per second per webhook
  NOTIFY_MIN_INTERVAL_MS: z.coerce.number().int().nonnegative().default(1100),

  USER_AGENT: z.string().default('space-news-notifier/1.0'),

  // Logging
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  LOG_FILE: z.string().optional(),

  // Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: Record<string, string | undefined>): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const errors = result.error.format();
    throw new Error(`Environment validation failed:\n${JSON.stringify(errors, null, 2)}`);
  }

  return result.data;
}

export const env = parseEnv(process.env);
