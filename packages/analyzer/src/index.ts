export {
  AnalysisPipeline,
  createRunConfig,
  deriveRunStatus,
  type RunConfig,
} from './pipeline.js';
export { ChannelResolver, normalizeChannelRef } from './resolver.js';
export { VideoFetcher, chunk } from './fetcher.js';
export {
  computeVideoMetrics,
  scoreVideos,
  buildChannelResult,
  summarizeChannel,
  formatRate,
  formatCount,
  RATE_DECIMALS,
  type ChannelMetrics,
} from './metrics.js';
export {
  AggregatedDataset,
  ReportAggregator,
  compareByEngagement,
  compareByRecency,
  compareByViews,
  compareByViewRate,
  type ChannelTrend,
  type VideoWithChannel,
  type DurationBucket,
  type DatasetTotals,
} from './dataset.js';
export * from './exporters/index.js';
export { MemoryChannelSource, type MemoryChannel, type MemorySourceCall } from './memory-source.js';
