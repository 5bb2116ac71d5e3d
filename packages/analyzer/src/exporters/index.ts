export type { ExportContext, ReadmeEntry, ReportExporter } from './types.js';
export { runTimestamp, generatedOn, RUN_TIMESTAMP_FORMAT } from './text.js';
export { videosCsvExporter, CSV_COLUMNS } from './csv.js';
export { channelStatsExporter } from './channel-stats.js';
export { engagementTrendsExporter } from './trends.js';
export { bestVideosExporter, latestVideosExporter, urlLines } from './url-lists.js';
export { renderReadme, writeReadme, README_FILE, type ReadmeInput } from './readme.js';
export { ExportRunner, DEFAULT_EXPORTERS } from './runner.js';
