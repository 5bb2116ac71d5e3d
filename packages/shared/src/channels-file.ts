import { readFile } from 'fs/promises';
import YAML from 'yaml';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import type { ChannelRefInput } from './types.js';

/**
 * The channels file is a YAML list of single-key mappings:
 *
 *   - channel_id: UC...
 *   - username: somelegacyname
 *   - custom_url: "@handle"
 *
 * Entries naming several identifiers load fine here; the resolver rejects
 * them per channel so the rest of the run can go ahead.
 */

const identifier = z
  .union([z.string(), z.number()], { errorMap: () => ({ message: 'must be a string' }) })
  .transform((value) => String(value).trim())
  .pipe(z.string().min(1, 'must not be empty'));

const channelEntrySchema = z
  .object({
    channel_id: identifier.optional(),
    username: identifier.optional(),
    custom_url: identifier.optional(),
  })
  .strict()
  .refine(
    (entry) => entry.channel_id !== undefined || entry.username !== undefined || entry.custom_url !== undefined,
    { message: 'must have channel_id, username, or custom_url' },
  );

export function parseChannelList(source: string, origin = 'channels file'): ChannelRefInput[] {
  let data: unknown;
  try {
    data = YAML.parse(source);
  } catch (err) {
    throw new ConfigurationError(
      `Error parsing YAML in ${origin}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  if (!Array.isArray(data)) {
    throw new ConfigurationError(`${origin} must contain a list of channel definitions`);
  }

  return data.map((entry, i) => {
    if (entry === null || typeof entry !== 'object' || Array.isArray(entry)) {
      throw new ConfigurationError(`Channel ${i} in ${origin} must be a mapping`);
    }
    const result = channelEntrySchema.safeParse(entry);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
      throw new ConfigurationError(`Channel ${i} in ${origin} ${issues}`);
    }
    return result.data;
  });
}

export async function loadChannelsFile(path: string): Promise<ChannelRefInput[]> {
  let source: string;
  try {
    source = await readFile(path, 'utf-8');
  } catch (err) {
    throw new ConfigurationError(
      `Cannot read channels file ${path}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  return parseChannelList(source, path);
}
