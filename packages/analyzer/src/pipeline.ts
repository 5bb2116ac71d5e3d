import { mkdir } from 'fs/promises';
import { join, resolve } from 'path';
import {
  AmbiguousReferenceError,
  ConfigurationError,
  DEFAULT_MAX_RESULTS_PER_CHANNEL,
  describeChannelRef,
  errorMessage,
  type ChannelDataSource,
  type ChannelOutcome,
  type ChannelRef,
  type ChannelRefInput,
  type ExportOutcome,
  type Logger,
  type RunResult,
  type RunStatus,
} from '@ytpulse/shared';
import { ChannelResolver, normalizeChannelRef } from './resolver.js';
import { VideoFetcher } from './fetcher.js';
import { buildChannelResult } from './metrics.js';
import { ReportAggregator } from './dataset.js';
import { ExportRunner, DEFAULT_EXPORTERS } from './exporters/runner.js';
import { runTimestamp } from './exporters/text.js';
import type { ReportExporter } from './exporters/types.js';

export interface RunConfig {
  maxResultsPerChannel: number;
  /** Parent of the per-run directory */
  outputDir: string;
  /** Clock for the run timestamp; defaults to the current time */
  now?: () => Date;
  exporters?: readonly ReportExporter[];
}

export function createRunConfig(overrides: Partial<RunConfig> & Pick<RunConfig, 'outputDir'>): Readonly<RunConfig> {
  return Object.freeze({ maxResultsPerChannel: DEFAULT_MAX_RESULTS_PER_CHANNEL, ...overrides });
}

export function deriveRunStatus(channels: readonly ChannelOutcome[], exports: readonly ExportOutcome[]): RunStatus {
  const resolved = channels.filter((c) => c.status === 'resolved').length;
  const written = exports.filter((e) => e.status === 'written').length;
  if (resolved === 0 || written === 0) return 'failed';

  const skipped = channels.length - resolved;
  const failedExports = exports.length - written;
  return skipped > 0 || failedExports > 0 ? 'partial' : 'success';
}

const MAX_RUN_DIR_ATTEMPTS = 100;

function isAlreadyExists(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'EEXIST';
}

/**
 * Claims a fresh `<outputDir>/<timestamp>` directory. Runs started within the
 * same second get `<timestamp>_1`, `<timestamp>_2`, ... so no run ever writes
 * into another run's directory.
 */
export async function createRunDirectory(outputDir: string, timestamp: string): Promise<string> {
  await mkdir(outputDir, { recursive: true });
  for (let attempt = 0; attempt < MAX_RUN_DIR_ATTEMPTS; attempt++) {
    const runDir = resolve(join(outputDir, attempt === 0 ? timestamp : `${timestamp}_${attempt}`));
    try {
      await mkdir(runDir);
      return runDir;
    } catch (err) {
      if (!isAlreadyExists(err)) throw err;
    }
  }
  throw new Error(`No free run directory for ${timestamp} in ${outputDir}`);
}

type PendingChannel = { label: string; ref: ChannelRef } | { label: string; error: AmbiguousReferenceError };

/**
 * One batch run: channels are processed one at a time (resolve, fetch, score,
 * accumulate), then every exporter runs once over the complete dataset.
 * A failing channel is skipped and recorded; a failing exporter is recorded
 * and the others still run. Only a malformed channel list aborts the run,
 * and it does so before any API call.
 */
export class AnalysisPipeline {
  private resolver: ChannelResolver;
  private fetcher: VideoFetcher;

  constructor(
    source: ChannelDataSource,
    private logger: Logger,
  ) {
    this.resolver = new ChannelResolver(source, logger);
    this.fetcher = new VideoFetcher(source, logger);
  }

  async run(inputs: readonly (ChannelRefInput | ChannelRef)[], config: Readonly<RunConfig>): Promise<RunResult> {
    const pending = this.normalizeAll(inputs);

    const now = config.now ?? (() => new Date());
    const generatedAt = now();
    const timestamp = runTimestamp(generatedAt);
    const runDir = await createRunDirectory(config.outputDir, timestamp);

    this.logger.info({ channels: pending.length, runDir }, 'Starting channel analysis');

    const aggregator = new ReportAggregator();
    const channels: ChannelOutcome[] = [];

    for (const [index, item] of pending.entries()) {
      this.logger.info({ channel: item.label, progress: `${index + 1}/${pending.length}` }, 'Processing channel');

      if ('error' in item) {
        channels.push(this.skip(item.label, item.error));
        continue;
      }

      try {
        const summary = await this.resolver.resolve(item.ref);
        const { videos, unavailableIds } = await this.fetcher.fetchChannelVideos(
          summary.channelId,
          config.maxResultsPerChannel,
        );
        aggregator.add(buildChannelResult(summary, videos));

        channels.push({
          status: 'resolved',
          ref: item.label,
          channelId: summary.channelId,
          title: summary.title,
          videoCount: videos.length,
          unavailableVideos: unavailableIds.length,
        });
        this.logger.info({ channel: summary.title, videos: videos.length }, 'Channel analyzed');
      } catch (err) {
        if (err instanceof ConfigurationError) throw err;
        channels.push(this.skip(item.label, err));
      }
    }

    const dataset = aggregator.build();
    if (dataset.isEmpty) {
      this.logger.warn('No channel data collected; writing README only');
    }

    const runner = new ExportRunner(this.logger, config.exporters ?? DEFAULT_EXPORTERS);
    const exports = await runner.run(dataset, { timestamp, generatedAt, outputDir: runDir }, channels);

    const result: RunResult = {
      status: deriveRunStatus(channels, exports),
      timestamp,
      outputDir: runDir,
      channels,
      exports,
      videosAnalyzed: dataset.videoCount,
    };

    this.logger.info(
      {
        status: result.status,
        channelsAnalyzed: dataset.channels.length,
        channelsSkipped: channels.length - dataset.channels.length,
        videosAnalyzed: result.videosAnalyzed,
      },
      'Analysis complete',
    );
    return result;
  }

  /** ConfigurationError escapes here, before any request is made */
  private normalizeAll(inputs: readonly (ChannelRefInput | ChannelRef)[]): PendingChannel[] {
    return inputs.map((input) => {
      try {
        const ref = normalizeChannelRef(input);
        return { label: describeChannelRef(ref), ref };
      } catch (err) {
        if (err instanceof AmbiguousReferenceError) return { label: describeChannelRef(input), error: err };
        throw err;
      }
    });
  }

  private skip(label: string, err: unknown): ChannelOutcome {
    const reason = errorMessage(err);
    const errorName = err instanceof Error ? err.name : 'Error';
    this.logger.warn({ channel: label, errorName, reason }, 'Channel skipped');
    return { status: 'skipped', ref: label, reason, errorName };
  }
}
