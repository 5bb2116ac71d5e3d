import {
  DEFAULT_BEST_VIDEOS,
  DEFAULT_LATEST_VIDEOS,
  DEFAULT_TOP_VIDEOS,
  MEDIUM_VIDEO_MAX,
  SHORT_VIDEO_MAX,
  type ChannelResult,
  type ChannelSummary,
  type ScoredVideo,
} from '@ytpulse/shared';
import { summarizeChannel, type ChannelMetrics } from './metrics.js';

// ─── Orderings ───

type VideoComparator = (a: ScoredVideo, b: ScoredVideo) => number;

function byVideoId(a: ScoredVideo, b: ScoredVideo): number {
  return a.videoId < b.videoId ? -1 : a.videoId > b.videoId ? 1 : 0;
}

function publishedMs(video: ScoredVideo): number {
  const ms = Date.parse(video.publishedAt);
  return Number.isNaN(ms) ? Number.NEGATIVE_INFINITY : ms;
}

/** Engagement desc, then views desc, then video id asc */
export const compareByEngagement: VideoComparator = (a, b) =>
  b.engagementRateViews - a.engagementRateViews || b.viewCount - a.viewCount || byVideoId(a, b);

/** Publish time desc, then video id asc */
export const compareByRecency: VideoComparator = (a, b) => {
  const diff = publishedMs(b) - publishedMs(a);
  return (Number.isNaN(diff) ? 0 : diff) || byVideoId(a, b);
};

/** Views desc, then engagement desc, then video id asc */
export const compareByViews: VideoComparator = (a, b) =>
  b.viewCount - a.viewCount || b.engagementRateViews - a.engagementRateViews || byVideoId(a, b);

/** View rate desc, then views desc, then video id asc */
export const compareByViewRate: VideoComparator = (a, b) =>
  b.viewRate - a.viewRate || b.viewCount - a.viewCount || byVideoId(a, b);

function topN(videos: readonly ScoredVideo[], compare: VideoComparator, n: number): ScoredVideo[] {
  return [...videos].sort(compare).slice(0, Math.max(0, n));
}

// ─── Derived View Types ───

export interface ChannelTrend {
  channelId: string;
  title: string;
  subscriberCount: number;
  videoCount: number;
  avgEngagementRate: number;
  avgViewRate: number;
  avgViews: number;
}

export interface VideoWithChannel {
  channel: ChannelSummary;
  video: ScoredVideo;
}

export interface DurationBucket {
  label: 'short' | 'medium' | 'long';
  description: string;
  videoCount: number;
  avgEngagementRate: number;
}

export interface DatasetTotals {
  channels: number;
  videos: number;
  views: number;
  likes: number;
  comments: number;
}

/**
 * Every channel result of one run, in configuration order. Derived views are
 * recomputed on each call and return fresh arrays; the owned results are
 * frozen and never reordered.
 */
export class AggregatedDataset {
  readonly channels: readonly ChannelResult[];

  constructor(channels: readonly ChannelResult[]) {
    this.channels = Object.freeze([...channels]);
  }

  get isEmpty(): boolean {
    return this.channels.length === 0;
  }

  get videoCount(): number {
    return this.channels.reduce((s, c) => s + c.videos.length, 0);
  }

  /** Flat rows in channel order, each channel's videos in fetch order */
  *rows(): Generator<VideoWithChannel> {
    for (const result of this.channels) {
      for (const video of result.videos) yield { channel: result.channel, video };
    }
  }

  bestVideos(result: ChannelResult, n = DEFAULT_BEST_VIDEOS): ScoredVideo[] {
    return topN(result.videos, compareByEngagement, n);
  }

  latestVideos(result: ChannelResult, n = DEFAULT_LATEST_VIDEOS): ScoredVideo[] {
    return topN(result.videos, compareByRecency, n);
  }

  /** Most viewed videos of one channel, for the per-channel stats report */
  topVideosOverall(result: ChannelResult, n = DEFAULT_TOP_VIDEOS): ScoredVideo[] {
    return topN(result.videos, compareByViews, n);
  }

  summarize(result: ChannelResult): ChannelMetrics {
    return summarizeChannel(result);
  }

  private trends(): (ChannelTrend & { order: number })[] {
    return this.channels.map((result, order) => {
      const metrics = summarizeChannel(result);
      return {
        order,
        channelId: result.channel.channelId,
        title: result.channel.title,
        subscriberCount: result.channel.subscriberCount,
        videoCount: metrics.videoCount,
        avgEngagementRate: metrics.avgEngagementRate,
        avgViewRate: metrics.avgViewRate,
        avgViews: metrics.avgViews,
      };
    });
  }

  /** Cross-channel comparison, highest average engagement first (ties keep config order) */
  engagementTrends(): ChannelTrend[] {
    return this.trends()
      .sort((a, b) => b.avgEngagementRate - a.avgEngagementRate || a.order - b.order)
      .map(({ order: _order, ...trend }) => trend);
  }

  viewRateRanking(): ChannelTrend[] {
    return this.trends()
      .sort((a, b) => b.avgViewRate - a.avgViewRate || a.order - b.order)
      .map(({ order: _order, ...trend }) => trend);
  }

  topEngagementAcrossChannels(n = 10): VideoWithChannel[] {
    return [...this.rows()].sort((a, b) => compareByEngagement(a.video, b.video)).slice(0, Math.max(0, n));
  }

  viralVideos(n = 5): VideoWithChannel[] {
    return [...this.rows()].sort((a, b) => compareByViewRate(a.video, b.video)).slice(0, Math.max(0, n));
  }

  durationBuckets(): DurationBucket[] {
    const all = [...this.rows()].map((r) => r.video);
    const buckets: [DurationBucket['label'], string, (seconds: number) => boolean][] = [
      ['short', `Short Videos (<${SHORT_VIDEO_MAX / 60}min)`, (s) => s < SHORT_VIDEO_MAX],
      [
        'medium',
        `Medium Videos (${SHORT_VIDEO_MAX / 60}-${MEDIUM_VIDEO_MAX / 60}min)`,
        (s) => s >= SHORT_VIDEO_MAX && s < MEDIUM_VIDEO_MAX,
      ],
      ['long', `Long Videos (>${MEDIUM_VIDEO_MAX / 60}min)`, (s) => s >= MEDIUM_VIDEO_MAX],
    ];

    return buckets.map(([label, description, test]) => {
      const videos = all.filter((v) => test(v.durationSeconds));
      return {
        label,
        description,
        videoCount: videos.length,
        avgEngagementRate:
          videos.length > 0 ? videos.reduce((s, v) => s + v.engagementRateViews, 0) / videos.length : 0,
      };
    });
  }

  totals(): DatasetTotals {
    const totals: DatasetTotals = { channels: this.channels.length, videos: 0, views: 0, likes: 0, comments: 0 };
    for (const { video } of this.rows()) {
      totals.videos++;
      totals.views += video.viewCount;
      totals.likes += video.likeCount;
      totals.comments += video.commentCount;
    }
    return totals;
  }
}

/** Accumulates channel results as the pipeline produces them */
export class ReportAggregator {
  private results: ChannelResult[] = [];

  add(result: ChannelResult): void {
    this.results.push(result);
  }

  get size(): number {
    return this.results.length;
  }

  build(): AggregatedDataset {
    return new AggregatedDataset(this.results);
  }
}
