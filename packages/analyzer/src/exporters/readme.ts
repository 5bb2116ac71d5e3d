import { format } from 'date-fns';
import type { ChannelOutcome, ExportOutcome } from '@ytpulse/shared';
import type { AggregatedDataset } from '../dataset.js';
import type { ExportContext, ReportExporter } from './types.js';
import { formatCount } from '../metrics.js';
import { writeLines } from './text.js';

export const README_FILE = 'README.md';

export interface ReadmeInput {
  dataset: AggregatedDataset;
  context: ExportContext;
  channels: readonly ChannelOutcome[];
  /** Outcome of every data exporter that was attempted, in run order */
  artifacts: readonly { exporter: ReportExporter; outcome: ExportOutcome }[];
}

const METRICS_TABLE = [
  '| Metric | Formula | Interpretation |',
  '|--------|---------|----------------|',
  '| **Engagement Rate (Views)** | `(likes + comments) / views × 100` | Higher = more audience interaction |',
  '| **Engagement Rate (Subscribers)** | `(likes + comments) / subscribers × 100` | Engagement relative to channel size |',
  '| **View Rate** | `views / subscribers × 100` | >100% indicates viral potential |',
  '| **Like Rate** | `likes / views × 100` | Viewer satisfaction indicator |',
  '| **Comment Rate** | `comments / views × 100` | Audience discussion level |',
  '| **Views per Minute** | `views / (duration / 60)` | Content efficiency metric |',
];

/**
 * Index of the run directory. Only artifacts that were actually written are
 * described; failed exports and skipped channels get their own sections so an
 * incomplete dataset is visible from the README alone.
 */
export function renderReadme({ dataset, context, channels, artifacts }: ReadmeInput): string[] {
  const channelCount = dataset.channels.length;
  const videoCount = dataset.videoCount;
  const perChannel = channelCount > 0 ? videoCount / channelCount : 0;

  const lines: string[] = [
    `# YouTube Analysis Report - ${context.timestamp}`,
    '',
    `Generated on: ${format(context.generatedAt, "yyyy-MM-dd 'at' HH:mm:ss")}`,
    '',
    '## Analysis Summary',
    '',
    `- **Channels Analyzed:** ${channelCount}`,
    `- **Total Videos:** ${videoCount}`,
    `- **Average Videos per Channel:** ${perChannel.toFixed(1)}`,
    '',
    '## Generated Files',
    '',
  ];

  const written = artifacts.filter(({ outcome }) => outcome.status === 'written');
  if (written.length === 0) {
    lines.push('No report files were produced in this run.', '');
  }
  for (const { exporter, outcome } of written) {
    lines.push(
      `### \`${outcome.fileName}\``,
      `**Format:** ${exporter.readme.format}`,
      '',
      `**Description:** ${exporter.readme.description}`,
      '',
      ...exporter.readme.details.map((d) => `- ${d}`),
      '',
      '---',
      '',
    );
  }

  const failed = artifacts.flatMap(({ outcome }) => (outcome.status === 'failed' ? [outcome] : []));
  if (failed.length > 0) {
    lines.push('## Failed Exports', '');
    for (const outcome of failed) {
      lines.push(`- \`${outcome.fileName}\`: ${outcome.error}`);
    }
    lines.push('');
  }

  lines.push('## Engagement Metrics Explained', '', 'All reports include the following calculated metrics:', '');
  lines.push(...METRICS_TABLE, '');

  lines.push('## Channels Analyzed', '');
  if (channelCount === 0) lines.push('None.');
  dataset.channels.forEach(({ channel, videos }, i) => {
    lines.push(
      `${i + 1}. **${channel.title}** - ${formatCount(channel.subscriberCount)} subscribers (${videos.length} videos analyzed)`,
    );
  });
  lines.push('');

  const gaps = channels.flatMap((c) => (c.status === 'resolved' && c.unavailableVideos > 0 ? [c] : []));
  if (gaps.length > 0) {
    lines.push(
      '## Unavailable Videos',
      '',
      'Listed in the channel uploads but not returned with details (private or deleted); left out of every report.',
      '',
    );
    for (const c of gaps) {
      lines.push(`- **${c.title}**: ${c.unavailableVideos} of ${c.videoCount + c.unavailableVideos} listed videos`);
    }
    lines.push('');
  }

  const skipped = channels.flatMap((c) => (c.status === 'skipped' ? [c] : []));
  if (skipped.length > 0) {
    lines.push('## Skipped Channels', '');
    for (const c of skipped) {
      lines.push(`- \`${c.ref}\` (${c.errorName}): ${c.reason}`);
    }
    lines.push('');
  }

  lines.push('---', '', '*Generated by ytpulse*');
  return lines;
}

export async function writeReadme(filePath: string, input: ReadmeInput): Promise<void> {
  await writeLines(filePath, renderReadme(input));
}
