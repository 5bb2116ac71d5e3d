import type { ChannelResult, ScoredVideo } from '@ytpulse/shared';
import type { AggregatedDataset } from '../dataset.js';
import type { ReportExporter } from './types.js';
import { writeLines } from './text.js';

type Selector = (dataset: AggregatedDataset, result: ChannelResult) => ScoredVideo[];

/** One watch URL per line, channel after channel in configuration order */
export function urlLines(dataset: AggregatedDataset, select: Selector): string[] {
  return dataset.channels.flatMap((result) => select(dataset, result).map((video) => video.url));
}

async function writeUrlList(dataset: AggregatedDataset, filePath: string, select: Selector): Promise<void> {
  await writeLines(filePath, urlLines(dataset, select));
}

export const bestVideosExporter: ReportExporter = {
  kind: 'bestVideos',
  label: 'Best videos',
  readme: {
    format: 'Plain text (URL list)',
    description: 'Top 15 videos with the highest engagement rate from each channel.',
    details: [
      'One YouTube URL per line',
      'Sorted by engagement rate (descending) within each channel',
      'Up to 15 videos per channel',
    ],
  },

  fileName: (timestamp) => `youtube_best_videos_${timestamp}.txt`,

  async export(dataset, filePath) {
    await writeUrlList(dataset, filePath, (d, result) => d.bestVideos(result));
  },
};

export const latestVideosExporter: ReportExporter = {
  kind: 'latestVideos',
  label: 'Latest videos',
  readme: {
    format: 'Plain text (URL list)',
    description: '15 most recent videos from each channel.',
    details: ['One YouTube URL per line', 'Sorted by published date (newest first)', 'Up to 15 videos per channel'],
  },

  fileName: (timestamp) => `youtube_latest_videos_${timestamp}.txt`,

  async export(dataset, filePath) {
    await writeUrlList(dataset, filePath, (d, result) => d.latestVideos(result));
  },
};
