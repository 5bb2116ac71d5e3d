import type { z } from 'zod';
import { createLogger, type Logger } from '../logger.js';
import { withRetry, isRetryableError, type RetryOptions } from '../retry.js';
import { ConfigurationError } from '../errors.js';
import {
  YOUTUBE_API_BATCH_SIZE,
  YOUTUBE_API_MAX_PAGE_SIZE,
  channelUrl,
  watchUrl,
  type ChannelDataSource,
  type ChannelRef,
  type ChannelSummary,
  type CountField,
  type VideoIdPage,
  type VideoRecord,
} from '../types.js';
import {
  apiErrorBodySchema,
  channelListResponseSchema,
  i18nRegionsResponseSchema,
  playlistItemsResponseSchema,
  videoListResponseSchema,
  type ChannelItem,
  type VideoItem,
} from './schemas.js';

const YOUTUBE_API_BASE = 'https://www.googleapis.com/youtube/v3';

// API quota costs: https://developers.google.com/youtube/v3/determine_quota_cost
const QUOTA_COSTS = {
  'channels.list': 1,
  'videos.list': 1,
  'playlistItems.list': 1,
  'i18nRegions.list': 1,
} as const;

export interface YouTubeClientOptions {
  apiKey: string;
  maxQuotaPerRun?: number; // default 9000 (of 10000 daily limit, leaving buffer)
  logger?: Logger;
  retry?: RetryOptions;
}

export class YouTubeClient implements ChannelDataSource {
  private apiKey: string;
  private quotaUsed = 0;
  private maxQuota: number;
  private logger: Logger;
  private retry: RetryOptions;
  private cache = new Map<string, { data: unknown; expiry: number }>();
  private cacheTtl = 3600_000; // 1 hour
  private uploadsPlaylists = new Map<string, string>();

  constructor(options: YouTubeClientOptions) {
    this.apiKey = options.apiKey;
    this.maxQuota = options.maxQuotaPerRun ?? 9000;
    this.logger = options.logger ?? createLogger('youtube-client');
    this.retry = { retryOn: isRetryableError, ...options.retry };
  }

  get quotaRemaining(): number {
    return this.maxQuota - this.quotaUsed;
  }

  get totalQuotaUsed(): number {
    return this.quotaUsed;
  }

  private checkQuota(cost: number): void {
    if (this.quotaUsed + cost > this.maxQuota) {
      throw new QuotaExhaustedError(
        `Would exceed quota: used ${this.quotaUsed}, cost ${cost}, max ${this.maxQuota}`,
      );
    }
  }

  private async fetchApi<S extends z.ZodTypeAny>(
    endpoint: string,
    params: Record<string, string>,
    quotaCost: number,
    schema: S,
  ): Promise<z.output<S>> {
    const cacheKey = `${endpoint}:${JSON.stringify(params)}`;
    const cached = this.cache.get(cacheKey);
    if (cached && cached.expiry > Date.now()) {
      this.logger.debug({ endpoint }, 'Cache hit');
      return schema.parse(cached.data);
    }

    const url = new URL(`${YOUTUBE_API_BASE}/${endpoint}`);
    url.searchParams.set('key', this.apiKey);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }

    const body = await withRetry(
      () => this.request(url, endpoint, quotaCost),
      this.logger,
      endpoint,
      this.retry,
    );

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .slice(0, 3)
        .map((i) => `${i.path.join('.')}: ${i.message}`)
        .join('; ');
      throw new YouTubeApiError(`Unexpected ${endpoint} response shape: ${issues}`, 200);
    }

    this.cache.set(cacheKey, { data: body, expiry: Date.now() + this.cacheTtl });
    return parsed.data;
  }

  private async request(url: URL, endpoint: string, quotaCost: number): Promise<unknown> {
    this.checkQuota(quotaCost);
    // The API bills a request whether or not it succeeds
    this.quotaUsed += quotaCost;
    this.logger.debug({ endpoint, quotaCost }, 'API request');

    const response = await fetch(url.toString());

    if (!response.ok) {
      const text = await response.text();
      const { message, reason } = parseErrorBody(text);
      this.logger.debug({ status: response.status, reason, endpoint }, 'YouTube API error');
      throw new YouTubeApiError(
        `YouTube API error ${response.status} on ${endpoint}: ${message}`,
        response.status,
        reason,
      );
    }

    return response.json();
  }

  /**
   * Make one cheap call to check the key before a run starts spending quota.
   * Key problems surface as ConfigurationError with a hint on how to fix them.
   */
  async validateApiKey(): Promise<void> {
    try {
      await this.fetchApi('i18nRegions', { part: 'snippet' }, QUOTA_COSTS['i18nRegions.list'], i18nRegionsResponseSchema);
    } catch (err) {
      if (!(err instanceof YouTubeApiError)) throw err;
      const hint = describeKeyProblem(err);
      if (hint) throw new ConfigurationError(hint);
      throw err;
    }
  }

  async resolveChannel(ref: ChannelRef): Promise<ChannelSummary | null> {
    switch (ref.kind) {
      case 'channelId':
        return this.getChannel(ref.value);
      case 'username': {
        const channelId = await this.lookupChannelId({ forUsername: ref.value });
        return channelId ? this.getChannel(channelId) : null;
      }
      case 'handle': {
        const channelId = await this.lookupChannelId({ forHandle: ref.value.replace(/^@/, '') });
        return channelId ? this.getChannel(channelId) : null;
      }
    }
  }

  private async lookupChannelId(filter: { forUsername: string } | { forHandle: string }): Promise<string | null> {
    const data = await this.fetchApi(
      'channels',
      { part: 'id', ...filter },
      QUOTA_COSTS['channels.list'],
      channelListResponseSchema,
    );
    return data.items[0]?.id ?? null;
  }

  async getChannel(channelId: string): Promise<ChannelSummary | null> {
    const data = await this.fetchApi(
      'channels',
      {
        part: 'snippet,statistics,contentDetails',
        id: channelId,
      },
      QUOTA_COSTS['channels.list'],
      channelListResponseSchema,
    );

    const item = data.items[0];
    if (!item) return null;

    const uploads = item.contentDetails?.relatedPlaylists?.uploads;
    if (uploads) this.uploadsPlaylists.set(item.id, uploads);

    return toChannelSummary(item);
  }

  async listVideoIds(
    channelId: string,
    pageToken: string | undefined,
    pageSize: number = YOUTUBE_API_MAX_PAGE_SIZE,
  ): Promise<VideoIdPage> {
    const playlistId = await this.getUploadsPlaylistId(channelId);

    const params: Record<string, string> = {
      part: 'contentDetails',
      playlistId,
      maxResults: String(Math.max(1, Math.min(YOUTUBE_API_MAX_PAGE_SIZE, pageSize))),
    };
    if (pageToken) params.pageToken = pageToken;

    const data = await this.fetchApi(
      'playlistItems',
      params,
      QUOTA_COSTS['playlistItems.list'],
      playlistItemsResponseSchema,
    );

    return {
      videoIds: data.items.map((item) => item.contentDetails.videoId),
      nextPageToken: data.nextPageToken,
    };
  }

  async getVideoDetails(videoIds: readonly string[]): Promise<VideoRecord[]> {
    if (videoIds.length === 0) return [];
    if (videoIds.length > YOUTUBE_API_BATCH_SIZE) {
      throw new RangeError(`videos.list takes at most ${YOUTUBE_API_BATCH_SIZE} ids, got ${videoIds.length}`);
    }

    const data = await this.fetchApi(
      'videos',
      {
        part: 'snippet,statistics,contentDetails',
        id: videoIds.join(','),
      },
      QUOTA_COSTS['videos.list'],
      videoListResponseSchema,
    );

    return data.items.map(toVideoRecord);
  }

  private async getUploadsPlaylistId(channelId: string): Promise<string> {
    const known = this.uploadsPlaylists.get(channelId);
    if (known) return known;

    const data = await this.fetchApi(
      'channels',
      {
        part: 'contentDetails',
        id: channelId,
      },
      QUOTA_COSTS['channels.list'],
      channelListResponseSchema,
    );

    const uploads = data.items[0]?.contentDetails?.relatedPlaylists?.uploads;
    if (!uploads) {
      throw new NotFoundError(`No uploads playlist for channel: ${channelId}`);
    }
    this.uploadsPlaylists.set(channelId, uploads);
    return uploads;
  }
}

// ─── Mapping ───

function toCount(value: string | number | undefined): number {
  if (value === undefined) return 0;
  const n = typeof value === 'number' ? value : parseInt(value, 10);
  return Number.isFinite(n) && n > 0 ? Math.floor(n) : 0;
}

function toChannelSummary(item: ChannelItem): ChannelSummary {
  return {
    channelId: item.id,
    title: item.snippet?.title ?? '',
    description: item.snippet?.description ?? '',
    customUrl: item.snippet?.customUrl ?? '',
    subscriberCount: toCount(item.statistics?.subscriberCount),
    totalViewCount: toCount(item.statistics?.viewCount),
    videoCount: toCount(item.statistics?.videoCount),
    url: channelUrl(item.id),
  };
}

function toVideoRecord(item: VideoItem): VideoRecord {
  const missingCounts: CountField[] = [];
  if (item.statistics.viewCount === undefined) missingCounts.push('viewCount');
  if (item.statistics.likeCount === undefined) missingCounts.push('likeCount');
  if (item.statistics.commentCount === undefined) missingCounts.push('commentCount');

  return {
    videoId: item.id,
    channelId: item.snippet.channelId,
    title: item.snippet.title,
    publishedAt: item.snippet.publishedAt,
    viewCount: toCount(item.statistics.viewCount),
    likeCount: toCount(item.statistics.likeCount),
    commentCount: toCount(item.statistics.commentCount),
    duration: item.contentDetails.duration,
    durationSeconds: parseDuration(item.contentDetails.duration),
    url: watchUrl(item.id),
    missingCounts,
  };
}

function parseErrorBody(text: string): { message: string; reason?: string } {
  try {
    const parsed = apiErrorBodySchema.safeParse(JSON.parse(text));
    if (parsed.success) {
      return {
        message: parsed.data.error.message || text,
        reason: parsed.data.error.errors[0]?.reason,
      };
    }
  } catch {
    // not JSON; fall through to the raw body
  }
  return { message: text };
}

function describeKeyProblem(err: YouTubeApiError): string | null {
  const text = `${err.reason ?? ''} ${err.message}`;

  if (err.statusCode === 400) {
    if (/expired/i.test(text)) {
      return 'YouTube API key has expired. Generate a new key at https://console.cloud.google.com/apis/credentials';
    }
    return 'Invalid YouTube API key. Check YOUTUBE_API_KEY in your .env file (keys are managed at https://console.cloud.google.com/apis/credentials)';
  }

  if (err.statusCode === 403) {
    if (/quotaExceeded/i.test(text)) {
      return 'YouTube API quota exceeded. The daily quota resets at midnight Pacific Time.';
    }
    if (/accessNotConfigured/i.test(text)) {
      return 'YouTube Data API v3 is not enabled for this key. Enable it at https://console.cloud.google.com/apis/library/youtube.googleapis.com';
    }
    return `API access forbidden: ${err.message}`;
  }

  return null;
}

/** Parse ISO 8601 duration (PT1H2M3S, P1DT2H) to seconds */
export function parseDuration(iso: string): number {
  const match = iso.match(/^P(?:(\d+)D)?(?:T(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?)?$/);
  if (!match) return 0;
  const days = parseInt(match[1] || '0', 10);
  const hours = parseInt(match[2] || '0', 10);
  const minutes = parseInt(match[3] || '0', 10);
  const seconds = parseInt(match[4] || '0', 10);
  return days * 86400 + hours * 3600 + minutes * 60 + seconds;
}

// ─── Error Classes ───

export class YouTubeApiError extends Error {
  constructor(
    message: string,
    public statusCode: number,
    public reason?: string,
  ) {
    super(message);
    this.name = 'YouTubeApiError';
  }
}

export class QuotaExhaustedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'QuotaExhaustedError';
  }
}

export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}
