export {
  createSlackNotifier,
  escapeSlackUrl,
  formatSlackMessage,
  type Notifier,
  type JsonPoster,
  type SlackPayload,
  type SlackNotifierOptions,
} from './slack.js';
export { NotificationError } from './errors.js';
