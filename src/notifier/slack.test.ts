import { describe, expect, it, vi } from 'vitest';
import { NotificationError } from './errors.js';
import { createSlackNotifier, escapeSlackUrl, formatSlackMessage, type JsonPoster } from './slack.js';

const WEBHOOK = 'https://hooks.example.com/services/test-webhook';

function notifierWith(post: JsonPoster, wait = vi.fn<(ms: number) => Promise<void>>().mockResolvedValue()) {
  return {
    wait,
    notifier: createSlackNotifier({ webhookUrl: WEBHOOK, timeoutMs: 10000, minIntervalMs: 1100, post, wait }),
  };
}

describe('formatSlackMessage', () => {
  it('embeds a bold title, the preview and a link', () => {
    expect(formatSlackMessage('Rocket Reaches Orbit', 'Lift-off at dawn.', 'https://x/a')).toEqual({
      text: '*Rocket Reaches Orbit*\nLift-off at dawn.\n<https://x/a|Read the full article>',
    });
  });

  it('escapes link markup characters in the URL', () => {
    expect(formatSlackMessage('T', 'P.', 'https://x/a?b=1&c=<2>|3')).toEqual({
      text: '*T*\nP.\n<https://x/a?b=1&amp;c=&lt;2&gt;%7C3|Read the full article>',
    });
  });
});

describe('escapeSlackUrl', () => {
  it('leaves ordinary URLs untouched', () => {
    expect(escapeSlackUrl('https://www.example.com/news/launch-one/')).toBe('https://www.example.com/news/launch-one/');
  });
});

describe('createSlackNotifier', () => {
  it('posts the message to the webhook then waits the minimum interval', async () => {
    const post = vi.fn<JsonPoster>().mockResolvedValue(200);
    const { notifier, wait } = notifierWith(post);

    await notifier.notify('Title', 'Preview.', 'https://x/a');

    expect(post).toHaveBeenCalledWith(
      WEBHOOK,
      { text: '*Title*\nPreview.\n<https://x/a|Read the full article>' },
      10000
    );
    expect(wait).toHaveBeenCalledWith(1100);
  });

  it('rejects a non-2xx response without waiting', async () => {
    const { notifier, wait } = notifierWith(vi.fn<JsonPoster>().mockResolvedValue(500));

    const error: unknown = await notifier.notify('Title', 'Preview.', 'https://x/a').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(NotificationError);
    expect(error instanceof NotificationError && error.status).toBe(500);
    expect(wait).not.toHaveBeenCalled();
  });

  it('wraps transport errors', async () => {
    const { notifier } = notifierWith(vi.fn<JsonPoster>().mockRejectedValue(new Error('timeout of 10000ms exceeded')));

    await expect(notifier.notify('Title', 'Preview.', 'https://x/a')).rejects.toThrow('Slack webhook request failed');
  });
});
