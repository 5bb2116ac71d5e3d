import type { ChannelTrend, VideoWithChannel } from '../dataset.js';
import type { ReportExporter } from './types.js';
import { formatCount, formatRate } from '../metrics.js';
import { generatedOn, rule, writeLines } from './text.js';

const WIDTH = 100;
const SECTION = rule('-', 50);
const RANKED_CHANNELS = 10;

function rankingRow(trend: ChannelTrend, index: number, metric: string): string {
  const name = trend.title.slice(0, 40).padEnd(40);
  return (
    `${String(index + 1).padStart(2)}. ${name} | ${metric} | ` +
    `Avg Views: ${formatCount(trend.avgViews).padStart(8)} | ` +
    `Subscribers: ${formatCount(trend.subscriberCount).padStart(8)}`
  );
}

function topVideoRows({ channel, video }: VideoWithChannel, index: number): string[] {
  return [
    `${String(index + 1).padStart(2)}. ${channel.title} | ${video.title.slice(0, 40)}`,
    `     Engagement: ${formatRate(video.engagementRateViews)}% | Views: ${formatCount(video.viewCount)} | Duration: ${video.durationSeconds}s`,
  ];
}

function viralRows({ channel, video }: VideoWithChannel, index: number): string[] {
  return [
    `${index + 1}. ${channel.title} | ${video.title.slice(0, 40)}`,
    `   View Rate: ${formatRate(video.viewRate)}% | Views: ${formatCount(video.viewCount)}`,
  ];
}

export const engagementTrendsExporter: ReportExporter = {
  kind: 'engagementTrends',
  label: 'Engagement trends',
  readme: {
    format: 'Plain text report',
    description: 'Cross-channel comparison and trend analysis.',
    details: [
      'Aggregate statistics across all channels',
      'Channel rankings by engagement rate',
      'Channel rankings by view rate',
      'Content performance by duration (short vs. medium vs. long videos)',
      'Top 10 videos by engagement across all channels',
      'Top 5 viral videos (highest view rates)',
    ],
  },

  fileName: (timestamp) => `youtube_engagement_trends_${timestamp}.txt`,

  async export(dataset, filePath, context) {
    const lines: string[] = [
      rule('=', WIDTH),
      'YOUTUBE ENGAGEMENT TRENDS ANALYSIS REPORT',
      `Generated on: ${generatedOn(context.generatedAt)}`,
      rule('=', WIDTH),
      '',
    ];

    const totals = dataset.totals();
    if (totals.videos === 0) {
      lines.push('No videos found for analysis.');
      await writeLines(filePath, lines);
      return;
    }

    lines.push(
      'GLOBAL STATISTICS ACROSS ALL CHANNELS:',
      SECTION,
      `Total Videos Analyzed: ${formatCount(totals.videos)}`,
      `Total Views: ${formatCount(totals.views)}`,
      `Total Likes: ${formatCount(totals.likes)}`,
      `Total Comments: ${formatCount(totals.comments)}`,
      `Average Views per Video: ${formatCount(totals.views / totals.videos)}`,
      `Average Likes per Video: ${formatCount(totals.likes / totals.videos)}`,
      `Average Comments per Video: ${formatCount(totals.comments / totals.videos)}`,
      '',
      'CHANNEL RANKING BY ENGAGEMENT METRICS:',
      SECTION,
      'BY AVERAGE ENGAGEMENT RATE (Views):',
    );

    // Channels without videos have no averages to rank
    const ranked = (trends: ChannelTrend[]) => trends.filter((t) => t.videoCount > 0).slice(0, RANKED_CHANNELS);

    ranked(dataset.engagementTrends()).forEach((trend, i) => {
      lines.push(rankingRow(trend, i, `Engagement: ${formatRate(trend.avgEngagementRate).padStart(6)}%`));
    });

    lines.push('', 'BY AVERAGE VIEW RATE (Views/Subscribers):');
    ranked(dataset.viewRateRanking()).forEach((trend, i) => {
      lines.push(rankingRow(trend, i, `View Rate: ${formatRate(trend.avgViewRate).padStart(6)}%`));
    });

    lines.push('', 'CONTENT PERFORMANCE PATTERNS:', SECTION);
    for (const bucket of dataset.durationBuckets()) {
      if (bucket.videoCount === 0) continue;
      lines.push(
        `${bucket.description}: ${formatCount(bucket.videoCount)} videos | Avg Engagement: ${formatRate(bucket.avgEngagementRate)}%`,
      );
    }

    lines.push(
      '',
      'TOP PERFORMING CONTENT ACROSS ALL CHANNELS:',
      SECTION,
      'TOP 10 VIDEOS BY ENGAGEMENT RATE:',
      ...dataset.topEngagementAcrossChannels().flatMap(topVideoRows),
      '',
      'TOP 5 VIRAL VIDEOS (High View Rate):',
      ...dataset.viralVideos().flatMap(viralRows),
      '',
      rule('=', WIDTH),
      'End of Engagement Trends Report',
      rule('=', WIDTH),
    );

    await writeLines(filePath, lines);
  },
};
