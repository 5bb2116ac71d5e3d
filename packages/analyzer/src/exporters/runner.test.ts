import { describe, it, expect, vi, beforeEach } from 'vitest';
import { mkdtemp, readFile, readdir } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { ChannelSummary, Logger } from '@ytpulse/shared';
import { AggregatedDataset } from '../dataset.js';
import { buildChannelResult } from '../metrics.js';
import type { ExportContext, ReportExporter } from './types.js';
import { ExportRunner } from './runner.js';
import { bestVideosExporter } from './url-lists.js';

const mockLogger: Logger = {
  info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(),
} as unknown as Logger;

const channel: ChannelSummary = {
  channelId: 'UC_a',
  title: 'Alpha',
  description: '',
  customUrl: '',
  subscriberCount: 10,
  totalViewCount: 0,
  videoCount: 1,
  url: 'https://www.youtube.com/channel/UC_a',
};

const dataset = new AggregatedDataset([
  buildChannelResult(channel, [
    {
      videoId: 'a1',
      channelId: 'UC_a',
      title: 'First',
      publishedAt: '2024-01-01T00:00:00Z',
      viewCount: 10,
      likeCount: 1,
      commentCount: 0,
      duration: 'PT1M',
      durationSeconds: 60,
      url: 'https://www.youtube.com/watch?v=a1',
      missingCounts: [],
    },
  ]),
]);

const brokenExporter: ReportExporter = {
  kind: 'videosCsv',
  label: 'Broken CSV',
  readme: { format: 'CSV', description: 'never written', details: [] },
  fileName: (ts) => `broken_${ts}.csv`,
  export: () => Promise.reject(new Error('EACCES: permission denied')),
};

describe('ExportRunner', () => {
  let context: ExportContext;

  beforeEach(async () => {
    const outputDir = await mkdtemp(join(tmpdir(), 'ytpulse-runner-'));
    context = { timestamp: '20240301_120000', generatedAt: new Date(2024, 2, 1, 12), outputDir };
  });

  it('keeps going after a failed exporter and writes the README last', async () => {
    const runner = new ExportRunner(mockLogger, [brokenExporter, bestVideosExporter]);
    const outcomes = await runner.run(dataset, context, []);

    expect(outcomes.map((o) => [o.kind, o.status])).toEqual([
      ['videosCsv', 'failed'],
      ['bestVideos', 'written'],
      ['readme', 'written'],
    ]);
    expect(outcomes[0]).toEqual({
      kind: 'videosCsv',
      status: 'failed',
      fileName: 'broken_20240301_120000.csv',
      error: 'Failed to write broken_20240301_120000.csv: EACCES: permission denied',
    });
    expect(mockLogger.error).toHaveBeenCalled();

    const files = (await readdir(context.outputDir)).sort();
    expect(files).toEqual(['README.md', 'youtube_best_videos_20240301_120000.txt']);

    const readme = await readFile(join(context.outputDir, 'README.md'), 'utf-8');
    expect(readme).toContain('### `youtube_best_videos_20240301_120000.txt`');
    expect(readme).not.toContain('### `broken_20240301_120000.csv`');
    expect(readme).toContain('- `broken_20240301_120000.csv`: Failed to write broken_20240301_120000.csv: EACCES: permission denied');
  });

  it('writes only the README for an empty dataset', async () => {
    const runner = new ExportRunner(mockLogger, [bestVideosExporter]);
    const outcomes = await runner.run(new AggregatedDataset([]), context, [
      { status: 'skipped', ref: '@gone', reason: 'channel not found: @gone', errorName: 'ChannelNotFoundError' },
    ]);

    expect(outcomes.map((o) => o.kind)).toEqual(['readme']);
    expect(await readdir(context.outputDir)).toEqual(['README.md']);
  });
});
