export { createSlackAlertHandler, formatSlackAlert } from './slack.js';
export type { SlackConfig } from './slack.js';
