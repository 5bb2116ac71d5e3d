import { describe, it, expect, vi } from 'vitest';
import {
  AmbiguousReferenceError,
  ChannelNotFoundError,
  ConfigurationError,
  type ChannelSummary,
  type Logger,
} from '@ytpulse/shared';
import { ChannelResolver, normalizeChannelRef } from './resolver.js';
import { MemoryChannelSource } from './memory-source.js';

const mockLogger: Logger = {
  info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(),
} as unknown as Logger;

const ALPHA: ChannelSummary = {
  channelId: 'UC_alpha',
  title: 'Alpha',
  description: 'Alpha videos',
  customUrl: '@alpha',
  subscriberCount: 1000,
  totalViewCount: 120000,
  videoCount: 42,
  url: 'https://www.youtube.com/channel/UC_alpha',
};

describe('normalizeChannelRef', () => {
  it('maps each identifier key to its reference kind', () => {
    expect(normalizeChannelRef({ channel_id: 'UC_alpha' })).toEqual({ kind: 'channelId', value: 'UC_alpha' });
    expect(normalizeChannelRef({ username: 'legacy' })).toEqual({ kind: 'username', value: 'legacy' });
    expect(normalizeChannelRef({ custom_url: '@alpha' })).toEqual({ kind: 'handle', value: '@alpha' });
  });

  it('trims values and ignores blank identifiers', () => {
    expect(normalizeChannelRef({ channel_id: '  UC_alpha ', username: '  ' })).toEqual({
      kind: 'channelId',
      value: 'UC_alpha',
    });
  });

  it('passes an already normalized reference through', () => {
    expect(normalizeChannelRef({ kind: 'username', value: 'legacy' })).toEqual({ kind: 'username', value: 'legacy' });
  });

  it('rejects a reference without identifiers as a configuration error', () => {
    expect(() => normalizeChannelRef({})).toThrow(ConfigurationError);
  });

  it('rejects a reference with several identifiers instead of picking one', () => {
    let caught: unknown;
    try {
      normalizeChannelRef({ channel_id: 'UC_alpha', custom_url: '@alpha' });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(AmbiguousReferenceError);
    if (!(caught instanceof AmbiguousReferenceError)) return;
    expect(caught.identifiers).toEqual(['channel_id', 'custom_url']);
    expect(caught.message).toBe(
      'Ambiguous channel reference (channel_id=UC_alpha, custom_url=@alpha): use exactly one of channel_id, username, custom_url',
    );
  });
});

describe('ChannelResolver', () => {
  const source = new MemoryChannelSource([{ summary: ALPHA, handle: 'alpha', username: 'alphaold', videos: [] }]);
  const resolver = new ChannelResolver(source, mockLogger);

  it('resolves by channel id, username and handle to the same summary', async () => {
    await expect(resolver.resolve({ channel_id: 'UC_alpha' })).resolves.toBe(ALPHA);
    await expect(resolver.resolve({ username: 'alphaold' })).resolves.toBe(ALPHA);
    await expect(resolver.resolve({ custom_url: '@Alpha' })).resolves.toBe(ALPHA);
  });

  it('fails with ChannelNotFoundError when nothing matches', async () => {
    const err = await resolver.resolve({ custom_url: '@missing' }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ChannelNotFoundError);
    if (!(err instanceof ChannelNotFoundError)) return;
    expect(err.message).toBe('channel not found: @missing');
    expect(err.ref).toBe('@missing');
  });
});
