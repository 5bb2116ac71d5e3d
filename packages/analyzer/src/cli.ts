#!/usr/bin/env tsx
import {
  ConfigurationError,
  createLogger,
  loadChannelsFile,
  loadConfig,
  loadDotenv,
  YouTubeClient,
  type RunResult,
  type RunStatus,
} from '@ytpulse/shared';
import { AnalysisPipeline, createRunConfig } from './pipeline.js';

const EXIT_CODES: Record<RunStatus, number> = { success: 0, partial: 2, failed: 1 };

async function main() {
  const args = process.argv.slice(2);
  const command = args[0];

  if (!command || command === '--help' || command === '-h') {
    printHelp();
    process.exit(0);
  }

  if (command !== 'channels') {
    console.error(`Unknown command: ${command}`);
    printHelp();
    process.exit(1);
  }

  const chalk = (await import('chalk')).default;
  const Table = (await import('cli-table3')).default;

  const print = {
    header: (text: string) => console.log('\n' + chalk.bold.cyan(`  ${text}`)),
    success: (text: string) => console.log(chalk.green(`  ✓ ${text}`)),
    warn: (text: string) => console.log(chalk.yellow(`  ⚠ ${text}`)),
    error: (text: string) => console.log(chalk.red(`  ✗ ${text}`)),
    dim: (text: string) => console.log(chalk.dim(`    ${text}`)),
  };

  let result: RunResult;
  try {
    loadDotenv();
    const maxResults = getFlag(args, '--max-results');
    const config = loadConfig(process.env, {
      maxResultsPerChannel: maxResults !== undefined ? Number(maxResults) : undefined,
      outputDir: getFlag(args, '--output-dir'),
      channelsFile: getFlag(args, '--channels-file'),
    });
    const logger = createLogger('ytpulse', config.logLevel);

    // Config errors surface before any quota is spent
    const refs = await loadChannelsFile(config.channelsFile);
    if (refs.length === 0) {
      throw new ConfigurationError(`No channels configured in ${config.channelsFile}`);
    }

    const youtube = new YouTubeClient({
      apiKey: config.youtubeApiKey,
      maxQuotaPerRun: config.maxQuotaPerRun,
      logger,
    });
    await youtube.validateApiKey();

    print.header(`Analyzing ${refs.length} channel(s), up to ${config.maxResultsPerChannel} videos each`);
    const pipeline = new AnalysisPipeline(youtube, logger);
    result = await pipeline.run(
      refs,
      createRunConfig({ maxResultsPerChannel: config.maxResultsPerChannel, outputDir: config.outputDir }),
    );
    result.apiQuotaUsed = youtube.totalQuotaUsed;
  } catch (err) {
    if (err instanceof ConfigurationError) {
      print.error(err.message);
    } else {
      print.error(`Analysis failed: ${err instanceof Error ? err.message : String(err)}`);
    }
    process.exit(1);
  }

  print.header('Channels');
  const channelTable = new Table({
    head: [chalk.cyan('Channel'), chalk.cyan('Status'), chalk.cyan('Videos / Reason')],
    colWidths: [32, 12, 60],
    wordWrap: true,
  });
  for (const c of result.channels) {
    channelTable.push(
      c.status === 'resolved'
        ? [
            c.title,
            chalk.green('resolved'),
            c.unavailableVideos > 0 ? `${c.videoCount} (${c.unavailableVideos} unavailable)` : String(c.videoCount),
          ]
        : [c.ref, chalk.yellow('skipped'), c.reason],
    );
  }
  console.log(channelTable.toString());

  print.header('Reports');
  for (const e of result.exports) {
    if (e.status === 'written') print.success(e.fileName);
    else print.error(`${e.fileName}: ${e.error}`);
  }

  print.dim(`Videos analyzed: ${result.videosAnalyzed}`);
  print.dim(`API quota used: ${result.apiQuotaUsed ?? 0}`);
  print.dim(`Output: ${result.outputDir}`);

  if (result.status === 'success') print.success('Analysis complete');
  else if (result.status === 'partial') print.warn('Analysis finished with skipped channels or failed reports');
  else print.error('Analysis failed: no channel data or no report written');

  process.exit(EXIT_CODES[result.status]);
}

function getFlag(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  return idx >= 0 ? args[idx + 1] : undefined;
}

function printHelp() {
  console.log(`
ytpulse — YouTube channel engagement analysis

Usage:
  ytpulse channels [options]

Options:
  --max-results <n>        Most recent videos per channel (default: 50)
  --output-dir <dir>       Parent directory for run output (default: ./output)
  --channels-file <path>   YAML list of channels (default: ./channels.yml)
  --help, -h               Show this help

Environment:
  YOUTUBE_API_KEY          Required. Read from the environment or .env
  MAX_QUOTA_PER_RUN        Local quota budget per run (default: 9000)
  LOG_LEVEL                fatal | error | warn | info | debug | trace | silent

Exit codes: 0 success, 2 partial success, 1 failure
  `);
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
