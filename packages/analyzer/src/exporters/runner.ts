import { join } from 'path';
import { ExportError, errorMessage, type ChannelOutcome, type ExportOutcome, type Logger } from '@ytpulse/shared';
import type { AggregatedDataset } from '../dataset.js';
import type { ExportContext, ReportExporter } from './types.js';
import { videosCsvExporter } from './csv.js';
import { channelStatsExporter } from './channel-stats.js';
import { engagementTrendsExporter } from './trends.js';
import { bestVideosExporter, latestVideosExporter } from './url-lists.js';
import { README_FILE, writeReadme } from './readme.js';

export const DEFAULT_EXPORTERS: readonly ReportExporter[] = [
  videosCsvExporter,
  channelStatsExporter,
  engagementTrendsExporter,
  bestVideosExporter,
  latestVideosExporter,
];

/**
 * Writes every artifact of a run. Each exporter fails on its own: the error is
 * wrapped in an ExportError, logged and recorded, and the next one still runs.
 * The README goes last so it can describe what actually landed on disk.
 */
export class ExportRunner {
  constructor(
    private logger: Logger,
    private exporters: readonly ReportExporter[] = DEFAULT_EXPORTERS,
  ) {}

  async run(
    dataset: AggregatedDataset,
    context: ExportContext,
    channels: readonly ChannelOutcome[],
  ): Promise<ExportOutcome[]> {
    const artifacts: { exporter: ReportExporter; outcome: ExportOutcome }[] = [];

    // Nothing to report on: the README alone records why
    const exporters = dataset.isEmpty ? [] : this.exporters;

    for (const exporter of exporters) {
      const fileName = exporter.fileName(context.timestamp);
      const filePath = join(context.outputDir, fileName);
      const outcome = await this.attempt(exporter.kind, fileName, filePath, () =>
        exporter.export(dataset, filePath, context),
      );
      artifacts.push({ exporter, outcome });
    }

    const readmePath = join(context.outputDir, README_FILE);
    const readme = await this.attempt('readme', README_FILE, readmePath, () =>
      writeReadme(readmePath, { dataset, context, channels, artifacts }),
    );

    return [...artifacts.map((a) => a.outcome), readme];
  }

  private async attempt(
    kind: ExportOutcome['kind'],
    fileName: string,
    filePath: string,
    write: () => Promise<void>,
  ): Promise<ExportOutcome> {
    try {
      await write();
      this.logger.info({ kind, file: filePath }, 'Report written');
      return { kind, status: 'written', fileName, path: filePath };
    } catch (err) {
      const error = new ExportError(`Failed to write ${fileName}: ${errorMessage(err)}`, kind, fileName, {
        cause: err,
      });
      this.logger.error({ err: error, kind }, 'Export failed');
      return { kind, status: 'failed', fileName, error: error.message };
    }
  }
}
