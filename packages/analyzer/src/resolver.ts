import {
  AmbiguousReferenceError,
  ChannelNotFoundError,
  ConfigurationError,
  describeChannelRef,
  type ChannelDataSource,
  type ChannelRef,
  type ChannelRefInput,
  type ChannelSummary,
  type Logger,
} from '@ytpulse/shared';

const INPUT_KEYS = [
  ['channel_id', 'channelId'],
  ['username', 'username'],
  ['custom_url', 'handle'],
] as const satisfies readonly (readonly [keyof ChannelRefInput, ChannelRef['kind']])[];

/**
 * Turn a channels-file entry into a reference with exactly one identifier.
 * Several identifiers are rejected rather than picking one by priority.
 */
export function normalizeChannelRef(input: ChannelRefInput | ChannelRef): ChannelRef {
  if ('kind' in input) return input;

  const present: ChannelRef[] = [];
  const keys: string[] = [];
  for (const [key, kind] of INPUT_KEYS) {
    const value = input[key]?.trim();
    if (!value) continue;
    present.push({ kind, value });
    keys.push(key);
  }

  if (present.length === 0) {
    throw new ConfigurationError('Channel reference must have channel_id, username, or custom_url');
  }
  if (present.length > 1) {
    throw new AmbiguousReferenceError(
      `Ambiguous channel reference (${describeChannelRef(input)}): use exactly one of channel_id, username, custom_url`,
      keys,
    );
  }
  return present[0];
}

export class ChannelResolver {
  constructor(
    private source: ChannelDataSource,
    private logger: Logger,
  ) {}

  async resolve(input: ChannelRefInput | ChannelRef): Promise<ChannelSummary> {
    const ref = normalizeChannelRef(input);
    const label = describeChannelRef(ref);

    this.logger.debug({ ref: label }, 'Resolving channel');
    const summary = await this.source.resolveChannel(ref);

    if (!summary) {
      throw new ChannelNotFoundError(`channel not found: ${label}`, label);
    }

    this.logger.info(
      { channel: summary.title, channelId: summary.channelId, subscribers: summary.subscriberCount },
      'Channel resolved',
    );
    return summary;
  }
}
