import type { ChannelResult, ScoredVideo, VideoMetrics, VideoRecord } from '@ytpulse/shared';

/** Engagement metrics. Pure functions: no I/O, full precision, rounding happens in formatRate only. */

function percent(numerator: number, denominator: number): number {
  return denominator > 0 ? (numerator * 100) / denominator : 0;
}

export function computeVideoMetrics(video: VideoRecord, subscriberCount: number): VideoMetrics {
  const { viewCount, likeCount, commentCount, durationSeconds } = video;
  const interactions = likeCount + commentCount;

  return {
    engagementRateViews: percent(interactions, viewCount),
    engagementRateSubscribers: percent(interactions, subscriberCount),
    viewRate: percent(viewCount, subscriberCount),
    likeRate: percent(likeCount, viewCount),
    commentRate: percent(commentCount, viewCount),
    viewsPerMinute: durationSeconds > 0 ? viewCount / (durationSeconds / 60) : 0,
  };
}

export function scoreVideos(videos: readonly VideoRecord[], subscriberCount: number): ScoredVideo[] {
  return videos.map((video) => Object.freeze({ ...video, ...computeVideoMetrics(video, subscriberCount) }));
}

export function buildChannelResult(channel: ChannelResult['channel'], videos: readonly VideoRecord[]): ChannelResult {
  return Object.freeze({
    channel,
    videos: Object.freeze(scoreVideos(videos, channel.subscriberCount)),
  });
}

// ─── Channel Aggregates ───

export interface ChannelMetrics {
  videoCount: number;
  totalViews: number;
  totalLikes: number;
  totalComments: number;
  avgViews: number;
  avgLikes: number;
  avgComments: number;
  avgEngagementRate: number;
  avgEngagementRateSubscribers: number;
  avgViewRate: number;
  avgLikeRate: number;
  avgCommentRate: number;
  earliestPublishedAt: string | null;
  latestPublishedAt: string | null;
  /** Estimated from the span between the oldest and newest analysed video */
  uploadsPerMonth: number | null;
  highPerformingCount: number;
  lowPerformingCount: number;
}

function mean(values: number[]): number {
  return values.length > 0 ? values.reduce((a, b) => a + b, 0) / values.length : 0;
}

/** Averages are taken over every analysed video, independent of any top-N cut. */
export function summarizeChannel(result: ChannelResult): ChannelMetrics {
  const videos = result.videos;

  const totalViews = videos.reduce((s, v) => s + v.viewCount, 0);
  const totalLikes = videos.reduce((s, v) => s + v.likeCount, 0);
  const totalComments = videos.reduce((s, v) => s + v.commentCount, 0);
  const count = videos.length;

  const avgEngagementRate = mean(videos.map((v) => v.engagementRateViews));

  const timestamps = videos
    .map((v) => ({ iso: v.publishedAt, ms: Date.parse(v.publishedAt) }))
    .filter((t) => !Number.isNaN(t.ms))
    .sort((a, b) => a.ms - b.ms);
  const earliest = timestamps[0];
  const latest = timestamps[timestamps.length - 1];

  let uploadsPerMonth: number | null = null;
  if (earliest && latest && timestamps.length > 1) {
    const days = Math.floor((latest.ms - earliest.ms) / 86400_000);
    if (days > 0) uploadsPerMonth = (count / days) * 30;
  }

  return {
    videoCount: count,
    totalViews,
    totalLikes,
    totalComments,
    avgViews: count > 0 ? totalViews / count : 0,
    avgLikes: count > 0 ? totalLikes / count : 0,
    avgComments: count > 0 ? totalComments / count : 0,
    avgEngagementRate,
    avgEngagementRateSubscribers: mean(videos.map((v) => v.engagementRateSubscribers)),
    avgViewRate: mean(videos.map((v) => v.viewRate)),
    avgLikeRate: mean(videos.map((v) => v.likeRate)),
    avgCommentRate: mean(videos.map((v) => v.commentRate)),
    earliestPublishedAt: earliest?.iso ?? null,
    latestPublishedAt: latest?.iso ?? null,
    uploadsPerMonth,
    highPerformingCount: videos.filter((v) => v.engagementRateViews > avgEngagementRate * 1.5).length,
    lowPerformingCount: videos.filter((v) => v.engagementRateViews < avgEngagementRate * 0.5).length,
  };
}

// ─── Presentation ───

export const RATE_DECIMALS = 2;

export function formatRate(value: number, decimals = RATE_DECIMALS): string {
  return value.toFixed(decimals);
}

export function formatCount(value: number): string {
  return Math.round(value).toLocaleString('en-US');
}
