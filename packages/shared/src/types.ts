// ─── Limits & Defaults ───

/** Maximum ids the YouTube Data API accepts in one videos.list request */
export const YOUTUBE_API_BATCH_SIZE = 50;

/** Maximum items one playlistItems.list page can return */
export const YOUTUBE_API_MAX_PAGE_SIZE = 50;

export const DEFAULT_MAX_RESULTS_PER_CHANNEL = 50;
export const DEFAULT_BEST_VIDEOS = 15;
export const DEFAULT_LATEST_VIDEOS = 15;
export const DEFAULT_TOP_VIDEOS = 5;

/** Duration buckets used by the trends report (seconds) */
export const SHORT_VIDEO_MAX = 300;
export const MEDIUM_VIDEO_MAX = 900;

export function watchUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}

export function channelUrl(channelId: string): string {
  return `https://www.youtube.com/channel/${channelId}`;
}

// ─── Channel References ───

/** One entry of the channels file, as written by the user */
export interface ChannelRefInput {
  channel_id?: string;
  username?: string;
  custom_url?: string;
}

export const CHANNEL_REF_KINDS = ['channelId', 'username', 'handle'] as const;
export type ChannelRefKind = (typeof CHANNEL_REF_KINDS)[number];

/** A reference carrying exactly one identifier */
export type ChannelRef =
  | { kind: 'channelId'; value: string }
  | { kind: 'username'; value: string }
  | { kind: 'handle'; value: string };

export function describeChannelRef(ref: ChannelRef | ChannelRefInput): string {
  if ('kind' in ref) {
    return ref.kind === 'handle' ? `@${ref.value.replace(/^@/, '')}` : `${ref.kind}:${ref.value}`;
  }
  return Object.entries(ref)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => `${k}=${String(v)}`)
    .join(', ');
}

// ─── Resolved Entities ───

export interface ChannelSummary {
  readonly channelId: string;
  readonly title: string;
  readonly description: string;
  readonly customUrl: string;
  readonly subscriberCount: number;
  readonly totalViewCount: number;
  readonly videoCount: number;
  readonly url: string;
}

export const COUNT_FIELDS = ['viewCount', 'likeCount', 'commentCount'] as const;
export type CountField = (typeof COUNT_FIELDS)[number];

export interface VideoRecord {
  readonly videoId: string;
  readonly channelId: string;
  readonly title: string;
  readonly publishedAt: string; // ISO 8601
  readonly viewCount: number;
  readonly likeCount: number;
  readonly commentCount: number;
  readonly duration: string; // ISO 8601 duration, e.g. PT4M13S
  readonly durationSeconds: number;
  readonly url: string;
  /** Counters the API omitted (likes/comments disabled); they read as zero */
  readonly missingCounts: readonly CountField[];
}

export interface VideoMetrics {
  /** (likes + comments) / views × 100 */
  engagementRateViews: number;
  /** (likes + comments) / subscribers × 100 */
  engagementRateSubscribers: number;
  /** views / subscribers × 100 */
  viewRate: number;
  likeRate: number;
  commentRate: number;
  viewsPerMinute: number;
}

export type ScoredVideo = VideoRecord & Readonly<VideoMetrics>;

export interface ChannelResult {
  readonly channel: ChannelSummary;
  readonly videos: readonly ScoredVideo[];
}

// ─── Data Source ───

export interface VideoIdPage {
  videoIds: string[];
  nextPageToken?: string;
}

/** What the pipeline needs from the YouTube Data API */
export interface ChannelDataSource {
  /** Returns null when no channel matches the reference */
  resolveChannel(ref: ChannelRef): Promise<ChannelSummary | null>;
  listVideoIds(channelId: string, pageToken: string | undefined, pageSize: number): Promise<VideoIdPage>;
  /** At most YOUTUBE_API_BATCH_SIZE ids per call */
  getVideoDetails(videoIds: readonly string[]): Promise<VideoRecord[]>;
}

// ─── Run Outcome ───

export type ChannelOutcome =
  | {
      status: 'resolved';
      ref: string;
      channelId: string;
      title: string;
      videoCount: number;
      /** Listed videos dropped because details were not returned (private or deleted) */
      unavailableVideos: number;
    }
  | {
      status: 'skipped';
      ref: string;
      reason: string;
      errorName: string;
    };

export const REPORT_KINDS = [
  'videosCsv',
  'channelStats',
  'engagementTrends',
  'bestVideos',
  'latestVideos',
  'readme',
] as const;

export type ReportKind = (typeof REPORT_KINDS)[number];

export type ExportOutcome =
  | { kind: ReportKind; status: 'written'; fileName: string; path: string }
  | { kind: ReportKind; status: 'failed'; fileName: string; error: string };

export type RunStatus = 'success' | 'partial' | 'failed';

export interface RunResult {
  status: RunStatus;
  timestamp: string;
  outputDir: string;
  channels: ChannelOutcome[];
  exports: ExportOutcome[];
  videosAnalyzed: number;
  apiQuotaUsed?: number;
}
