import type { ScoredVideo } from '@ytpulse/shared';
import type { ReportExporter } from './types.js';
import { formatCount, formatRate } from '../metrics.js';
import { dateOnly, generatedOn, rule, truncate, writeLines } from './text.js';

const WIDTH = 80;
const RECENT_VIDEOS = 5;

function videoLine(video: ScoredVideo, index: number): string[] {
  return [
    `${index + 1}. ${truncate(video.title, 60)}`,
    `   Views: ${formatCount(video.viewCount)} | Engagement: ${formatRate(video.engagementRateViews)}%`,
  ];
}

function share(count: number, total: number): string {
  return total > 0 ? ((count / total) * 100).toFixed(1) : '0.0';
}

export const channelStatsExporter: ReportExporter = {
  kind: 'channelStats',
  label: 'Channel statistics',
  readme: {
    format: 'Plain text report',
    description: 'Detailed statistics for each analyzed channel.',
    details: [
      'Channel metadata (subscribers, total views, total videos)',
      'Upload frequency estimate',
      'Average engagement metrics across all analyzed videos',
      'Top 5 most viewed videos',
      'Top 5 highest engagement videos',
      'Performance distribution (high vs. low performing videos)',
      'Recent videos with metrics',
    ],
  },

  fileName: (timestamp) => `youtube_channel_stats_${timestamp}.txt`,

  async export(dataset, filePath, context) {
    const lines: string[] = [
      rule('=', WIDTH),
      'YOUTUBE CHANNEL STATISTICS REPORT',
      `Generated on: ${generatedOn(context.generatedAt)}`,
      rule('=', WIDTH),
      '',
    ];

    for (const result of dataset.channels) {
      const { channel } = result;
      const m = dataset.summarize(result);

      lines.push(
        rule('-', WIDTH),
        `CHANNEL: ${channel.title}`,
        rule('-', WIDTH),
        `URL: ${channel.url}`,
        `Subscribers: ${formatCount(channel.subscriberCount)}`,
        `Total Views: ${formatCount(channel.totalViewCount)}`,
        `Total Videos: ${formatCount(channel.videoCount)}`,
        `Description: ${truncate(channel.description, 100)}`,
        '',
        `ANALYZED VIDEOS: ${m.videoCount}`,
        `Earliest Video Date: ${dateOnly(m.earliestPublishedAt)}`,
        `Latest Video Date: ${dateOnly(m.latestPublishedAt)}`,
      );
      if (m.uploadsPerMonth !== null) {
        lines.push(`Estimated Upload Frequency: ${m.uploadsPerMonth.toFixed(1)} videos per month`);
      }

      if (m.videoCount > 0) {
        lines.push(
          '',
          'ENGAGEMENT METRICS ANALYSIS:',
          `Average Views per Video: ${formatCount(m.avgViews)}`,
          `Average Likes per Video: ${formatCount(m.avgLikes)}`,
          `Average Comments per Video: ${formatCount(m.avgComments)}`,
          `Average Engagement Rate (by Views): ${formatRate(m.avgEngagementRate)}%`,
          `Average Engagement Rate (by Subscribers): ${formatRate(m.avgEngagementRateSubscribers)}%`,
          `Average View Rate: ${formatRate(m.avgViewRate)}%`,
          `Average Like Rate: ${formatRate(m.avgLikeRate)}%`,
          `Average Comment Rate: ${formatRate(m.avgCommentRate)}%`,
          '',
          'TOP 5 MOST VIEWED VIDEOS:',
          ...dataset.topVideosOverall(result).flatMap(videoLine),
          '',
          'TOP 5 HIGHEST ENGAGEMENT VIDEOS:',
          ...dataset.bestVideos(result, 5).flatMap(videoLine),
          '',
          'PERFORMANCE DISTRIBUTION:',
          `High Performing Videos (>1.5x avg engagement): ${m.highPerformingCount} (${share(m.highPerformingCount, m.videoCount)}%)`,
          `Low Performing Videos (<0.5x avg engagement): ${m.lowPerformingCount} (${share(m.lowPerformingCount, m.videoCount)}%)`,
        );
      }

      lines.push('', 'RECENT VIDEOS WITH METRICS:');
      dataset.latestVideos(result, RECENT_VIDEOS).forEach((video, i) => {
        lines.push(
          `${i + 1}. ${truncate(video.title, 50)} (${dateOnly(video.publishedAt)})`,
          `   Views: ${formatCount(video.viewCount)} | Engagement: ${formatRate(video.engagementRateViews)}% | Duration: ${video.durationSeconds}s`,
        );
      });
      lines.push('', '');
    }

    lines.push(
      rule('=', WIDTH),
      `End of Report - ${dataset.channels.length} channels analyzed`,
      rule('=', WIDTH),
    );

    await writeLines(filePath, lines);
  },
};
