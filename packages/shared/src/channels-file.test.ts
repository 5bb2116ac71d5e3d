import { describe, it, expect } from 'vitest';
import { mkdtemp, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { parseChannelList, loadChannelsFile } from './channels-file.js';
import { ConfigurationError } from './errors.js';

describe('parseChannelList', () => {
  it('reads a list of single-key mappings in order', () => {
    const refs = parseChannelList(
      ['- channel_id: UC_alpha', '- username: legacyname', '- custom_url: "@beta"'].join('\n'),
    );

    expect(refs).toEqual([{ channel_id: 'UC_alpha' }, { username: 'legacyname' }, { custom_url: '@beta' }]);
  });

  it('trims identifiers and keeps numeric-looking names as strings', () => {
    expect(parseChannelList('- username: 12345\n- custom_url: "  @gamma  "')).toEqual([
      { username: '12345' },
      { custom_url: '@gamma' },
    ]);
  });

  it('loads entries with several identifiers so the resolver can reject them', () => {
    expect(parseChannelList('- channel_id: UC_alpha\n  username: alpha')).toEqual([
      { channel_id: 'UC_alpha', username: 'alpha' },
    ]);
  });

  it('rejects a document that is not a list', () => {
    expect(() => parseChannelList('channel_id: UC_alpha')).toThrow(
      'channels file must contain a list of channel definitions',
    );
  });

  it('rejects an entry without any identifier', () => {
    expect(() => parseChannelList('- channel_id: UC_alpha\n- {}')).toThrow(
      'Channel 1 in channels file must have channel_id, username, or custom_url',
    );
  });

  it('rejects an empty identifier', () => {
    expect(() => parseChannelList('- custom_url: ""')).toThrow('Channel 0 in channels file custom_url: must not be empty');
  });

  it('rejects scalar entries and unknown keys', () => {
    expect(() => parseChannelList('- UC_alpha')).toThrow('Channel 0 in channels file must be a mapping');
    expect(() => parseChannelList('- handle: "@alpha"')).toThrow(ConfigurationError);
  });

  it('reports YAML syntax errors as configuration errors', () => {
    expect(() => parseChannelList('- channel_id: [unclosed')).toThrow(ConfigurationError);
  });
});

describe('loadChannelsFile', () => {
  it('reads the channel list from disk', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'ytpulse-channels-'));
    const path = join(dir, 'channels.yml');
    await writeFile(path, '- channel_id: UC_alpha\n');

    await expect(loadChannelsFile(path)).resolves.toEqual([{ channel_id: 'UC_alpha' }]);
  });

  it('fails with a configuration error when the file is missing', async () => {
    await expect(loadChannelsFile('/nonexistent/ytpulse/channels.yml')).rejects.toBeInstanceOf(ConfigurationError);
  });
});
