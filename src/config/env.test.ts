import { describe, expect, it } from 'vitest';
import { buildConfig, isSlackConfigured } from './index.js';
import { parseEnv } from './env.js';
import { SOURCE_DEFINITIONS } from './sources.js';

describe('parseEnv', () => {
  it('applies defaults', () => {
    const values = parseEnv({});

    expect(values.ENABLED_SOURCES).toEqual(['iceye', 'rocketlab', 'capella', 'spacewatch']);
    expect(values.SEEN_STORE_PATH).toBe('sent_urls.json');
    expect(values.PREVIEW_WORDS).toBe(100);
    expect(values.PREVIEW_FALLBACK_CHARS).toBe(500);
    expect(values.NOTIFY_MIN_INTERVAL_MS).toBe(1100);
    expect(values.NOTIFY_TIMEOUT_MS).toBe(10000);
    expect(values.SLACK_WEBHOOK_URL).toBeUndefined();
  });

  it('parses the source list in the given order', () => {
    expect(parseEnv({ ENABLED_SOURCES: ' spacewatch , capella-media,' }).ENABLED_SOURCES).toEqual([
      'spacewatch',
      'capella-media',
    ]);
  });

  it('rejects unknown sources and an empty list', () => {
    expect(() => parseEnv({ ENABLED_SOURCES: 'iceye,unknown' })).toThrow('Environment validation failed');
    expect(() => parseEnv({ ENABLED_SOURCES: ' , ' })).toThrow('Environment validation failed');
  });

  it('coerces numeric settings and rejects invalid ones', () => {
    expect(parseEnv({ PREVIEW_WORDS: '50' }).PREVIEW_WORDS).toBe(50);
    expect(() => parseEnv({ NOTIFY_TIMEOUT_MS: 'soon' })).toThrow('Environment validation failed');
  });

  it('rejects a webhook that is not a URL', () => {
    expect(() => parseEnv({ SLACK_WEBHOOK_URL: 'test-secret' })).toThrow('Environment validation failed');
  });
});

describe('buildConfig', () => {
  it('attaches source definitions in order', () => {
    const appConfig = buildConfig(parseEnv({ ENABLED_SOURCES: 'capella,iceye' }));

    expect(appConfig.sources).toEqual([
      { name: 'capella', definition: SOURCE_DEFINITIONS.capella },
      { name: 'iceye', definition: SOURCE_DEFINITIONS.iceye },
    ]);
  });

  it('knows whether Slack is configured', () => {
    expect(isSlackConfigured(buildConfig(parseEnv({})))).toBe(false);
    expect(
      isSlackConfigured(buildConfig(parseEnv({ SLACK_WEBHOOK_URL: 'https://hooks.example.com/services/test' })))
    ).toBe(true);
  });
});
