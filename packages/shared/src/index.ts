export * from './types.js';
export * from './errors.js';
export * from './config.js';
export * from './logger.js';
export { parseChannelList, loadChannelsFile } from './channels-file.js';
export {
  YouTubeClient,
  YouTubeApiError,
  QuotaExhaustedError,
  NotFoundError,
  parseDuration,
  type YouTubeClientOptions,
} from './youtube/client.js';
export { withRetry, isRetryableError, type RetryOptions } from './retry.js';
