import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { resolve } from 'path';
import { ConfigurationError } from './errors.js';
import { LOG_LEVELS } from './logger.js';
import { DEFAULT_MAX_RESULTS_PER_CHANNEL } from './types.js';

const configSchema = z.object({
  // YouTube
  youtubeApiKey: z.string().min(1, 'YOUTUBE_API_KEY is required'),
  maxQuotaPerRun: z.coerce.number().int().positive().default(9000),

  // Pipeline
  maxResultsPerChannel: z.coerce.number().int().positive().default(DEFAULT_MAX_RESULTS_PER_CHANNEL),
  outputDir: z.string().min(1).default('./output'),
  channelsFile: z.string().min(1).default('./channels.yml'),

  // Logging
  logLevel: z.enum(LOG_LEVELS).default('info'),
});

export type AppConfig = Readonly<z.infer<typeof configSchema>>;

/** Overrides coming from the command line win over the environment */
export type ConfigOverrides = Partial<Pick<AppConfig, 'maxResultsPerChannel' | 'outputDir' | 'channelsFile'>>;

/** Load `.env` from the working directory into process.env (existing values win) */
export function loadDotenv(cwd = process.cwd()): void {
  dotenvConfig({ path: resolve(cwd, '.env') });
}

function blankToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {},
): AppConfig {
  const result = configSchema.safeParse({
    youtubeApiKey: env.YOUTUBE_API_KEY ?? '',
    maxQuotaPerRun: blankToUndefined(env.MAX_QUOTA_PER_RUN),
    maxResultsPerChannel: overrides.maxResultsPerChannel ?? blankToUndefined(env.MAX_RESULTS_PER_CHANNEL),
    outputDir: overrides.outputDir ?? blankToUndefined(env.OUTPUT_DIR),
    channelsFile: overrides.channelsFile ?? blankToUndefined(env.CHANNELS_FILE),
    logLevel: blankToUndefined(env.LOG_LEVEL),
  });

  if (!result.success) {
    const errors = result.error.flatten().fieldErrors;
    const lines = Object.entries(errors)
      .map(([k, v]) => `  ${k}: ${v?.join(', ')}`)
      .join('\n');
    throw new ConfigurationError(`Invalid configuration:\n${lines}`);
  }

  return Object.freeze(result.data);
}
