import { writeFile } from 'fs/promises';
import { createObjectCsvStringifier } from 'csv-writer';
import type { ReportExporter } from './types.js';
import { formatRate } from '../metrics.js';

export const CSV_COLUMNS = [
  { id: 'channel', title: 'Channel' },
  { id: 'channelId', title: 'Channel ID' },
  { id: 'subscribers', title: 'Subscribers' },
  { id: 'videoId', title: 'Video ID' },
  { id: 'title', title: 'Video Title' },
  { id: 'publishedAt', title: 'Published Date' },
  { id: 'url', title: 'Video URL' },
  { id: 'views', title: 'Views' },
  { id: 'likes', title: 'Likes' },
  { id: 'comments', title: 'Comments' },
  { id: 'durationSeconds', title: 'Duration (seconds)' },
  { id: 'engagementRateViews', title: 'Engagement Rate (Views %)' },
  { id: 'engagementRateSubscribers', title: 'Engagement Rate (Subscribers %)' },
  { id: 'viewRate', title: 'View Rate (%)' },
  { id: 'likeRate', title: 'Like Rate (%)' },
  { id: 'commentRate', title: 'Comment Rate (%)' },
  { id: 'viewsPerMinute', title: 'Views per Minute' },
  { id: 'missingCounts', title: 'Hidden Counters' },
] as const;

type CsvRecord = Record<(typeof CSV_COLUMNS)[number]['id'], string | number>;

export const videosCsvExporter: ReportExporter = {
  kind: 'videosCsv',
  label: 'CSV',
  readme: {
    format: 'CSV (Comma-Separated Values)',
    description: 'Raw data export containing all videos from all analyzed channels with complete metrics.',
    details: [
      'One row per video, grouped by channel, header row included',
      'Channel name, id and subscriber count',
      'Video id, title, published date and URL',
      'Raw statistics: views, likes, comments, duration (seconds)',
      'Calculated metrics: engagement rates, view rate, like rate, comment rate, views per minute',
      'Hidden Counters lists counts the API did not return (reported as 0)',
    ],
  },

  fileName: (timestamp) => `youtube_channels_videos_${timestamp}.csv`,

  async export(dataset, filePath) {
    const records: CsvRecord[] = [];
    for (const { channel, video } of dataset.rows()) {
      records.push({
        channel: channel.title,
        channelId: channel.channelId,
        subscribers: channel.subscriberCount,
        videoId: video.videoId,
        title: video.title,
        publishedAt: video.publishedAt,
        url: video.url,
        views: video.viewCount,
        likes: video.likeCount,
        comments: video.commentCount,
        durationSeconds: video.durationSeconds,
        engagementRateViews: formatRate(video.engagementRateViews),
        engagementRateSubscribers: formatRate(video.engagementRateSubscribers),
        viewRate: formatRate(video.viewRate),
        likeRate: formatRate(video.likeRate),
        commentRate: formatRate(video.commentRate),
        viewsPerMinute: formatRate(video.viewsPerMinute),
        missingCounts: video.missingCounts.join(' '),
      });
    }

    const stringifier = createObjectCsvStringifier({
      header: CSV_COLUMNS.map((c) => ({ id: c.id, title: c.title })),
    });
    // Written in one go with 'wx', like the text reports
    const csv = (stringifier.getHeaderString() ?? '') + stringifier.stringifyRecords(records);
    await writeFile(filePath, csv, { encoding: 'utf-8', flag: 'wx' });
  },
};
