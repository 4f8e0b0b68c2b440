/**
 * Slack Notifier
 *
 * Posts one message per article to an incoming webhook. Delivery is strictly
 * sequential, so a fixed pause after each post keeps us under Slack's
 * one-message-per-second webhook limit.
 */

import axios from 'axios';
import { logger } from '../utils/logger.js';
import { sleep } from '../utils/retry.js';
import { NotificationError } from './errors.js';

export interface Notifier {
  notify(title: string, preview: string, url: string): Promise<void>;
}

export interface SlackPayload {
  text: string;
}

/**
 * Sends a JSON body and resolves with the HTTP status, whatever it is
 */
export type JsonPoster = (url: string, body: SlackPayload, timeoutMs: number) => Promise<number>;

export interface SlackNotifierOptions {
  webhookUrl: string;
  timeoutMs: number;
  minIntervalMs: number;
  post?: JsonPoster;
  wait?: (ms: number) => Promise<void>;
}

/**
 * Make a URL safe inside `<url|label>` link markup. Slack control characters
 * become entities; a pipe is percent-encoded since it would end the URL.
 */
export function escapeSlackUrl(url: string): string {
  return url.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/\|/g, '%7C');
}

export function formatSlackMessage(title: string, preview: string, url: string): SlackPayload {
  return {
    text: `*${title}*\n${preview}\n<${escapeSlackUrl(url)}|Read the full article>`,
  };
}

const axiosPost: JsonPoster = async (url, body, timeoutMs) => {
  const response = await axios.post(url, body, {
    timeout: timeoutMs,
    headers: { 'Content-Type': 'application/json' },
    validateStatus: () => true,
  });
  return response.status;
};

export function createSlackNotifier(options: SlackNotifierOptions): Notifier {
  const { webhookUrl, timeoutMs, minIntervalMs, post = axiosPost, wait = sleep } = options;

  return {
    async notify(title, preview, url) {
      let status: number;

      try {
        status = await post(webhookUrl, formatSlackMessage(title, preview, url), timeoutMs);
      } catch (error) {
        throw new NotificationError('Slack webhook request failed', undefined, { cause: error });
      }

      if (status < 200 || status >= 300) {
        throw new NotificationError(`Slack webhook responded with HTTP ${status}`, status);
      }

      logger.debug({ url, status }, 'Slack message delivered');
      await wait(minIntervalMs);
    },
  };
}
