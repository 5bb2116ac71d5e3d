import {
  YOUTUBE_API_BATCH_SIZE,
  type ChannelDataSource,
  type ChannelRef,
  type ChannelSummary,
  type VideoIdPage,
  type VideoRecord,
} from '@ytpulse/shared';

export interface MemoryChannel {
  summary: ChannelSummary;
  username?: string;
  /** Without the leading @ */
  handle?: string;
  /** Newest first, as the uploads listing returns them */
  videos: VideoRecord[];
}

export interface MemorySourceCall {
  method: 'resolveChannel' | 'listVideoIds' | 'getVideoDetails';
  channelId?: string;
  count?: number;
}

type Stage = 'list' | 'details';

interface InjectedFailure {
  stage: Stage;
  error: Error;
  /** Zero-based call of that stage that fails; every call when absent */
  atCall?: number;
}

/**
 * In-process ChannelDataSource over a fixed set of channels. Page tokens are
 * plain offsets. Failures can be injected per channel and stage, optionally
 * on one call only (a later page or batch).
 */
export class MemoryChannelSource implements ChannelDataSource {
  readonly calls: MemorySourceCall[] = [];
  private failures = new Map<string, InjectedFailure>();
  private stageCalls = new Map<string, number>();

  constructor(private channels: MemoryChannel[]) {}

  failOn(channelId: string, stage: Stage, error: Error = new Error(`${stage} failed`), atCall?: number): this {
    this.failures.set(channelId, { stage, error, atCall });
    return this;
  }

  async resolveChannel(ref: ChannelRef): Promise<ChannelSummary | null> {
    this.calls.push({ method: 'resolveChannel' });
    const match = this.channels.find((c) => {
      switch (ref.kind) {
        case 'channelId':
          return c.summary.channelId === ref.value;
        case 'username':
          return c.username === ref.value;
        case 'handle':
          return c.handle?.toLowerCase() === ref.value.replace(/^@/, '').toLowerCase();
      }
    });
    return match?.summary ?? null;
  }

  async listVideoIds(channelId: string, pageToken: string | undefined, pageSize: number): Promise<VideoIdPage> {
    this.calls.push({ method: 'listVideoIds', channelId, count: pageSize });
    this.maybeFail(channelId, 'list');

    const videos = this.channel(channelId).videos;
    const offset = pageToken ? Number(pageToken) : 0;
    const end = offset + pageSize;
    return {
      videoIds: videos.slice(offset, end).map((v) => v.videoId),
      nextPageToken: end < videos.length ? String(end) : undefined,
    };
  }

  async getVideoDetails(videoIds: readonly string[]): Promise<VideoRecord[]> {
    if (videoIds.length > YOUTUBE_API_BATCH_SIZE) {
      throw new RangeError(`At most ${YOUTUBE_API_BATCH_SIZE} ids per details request, got ${videoIds.length}`);
    }
    const wanted = new Set(videoIds);
    const found = this.channels.flatMap((c) => c.videos).filter((v) => wanted.has(v.videoId));
    const channelId = found[0]?.channelId;

    this.calls.push({ method: 'getVideoDetails', channelId, count: videoIds.length });
    if (channelId) this.maybeFail(channelId, 'details');
    return found;
  }

  private channel(channelId: string): MemoryChannel {
    const channel = this.channels.find((c) => c.summary.channelId === channelId);
    if (!channel) throw new Error(`Unknown channel ${channelId}`);
    return channel;
  }

  private maybeFail(channelId: string, stage: Stage): void {
    const key = `${channelId}:${stage}`;
    const call = this.stageCalls.get(key) ?? 0;
    this.stageCalls.set(key, call + 1);

    const failure = this.failures.get(channelId);
    if (!failure || failure.stage !== stage) return;
    if (failure.atCall === undefined || failure.atCall === call) throw failure.error;
  }
}
