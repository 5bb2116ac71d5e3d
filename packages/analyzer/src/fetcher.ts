import {
  FetchError,
  YOUTUBE_API_BATCH_SIZE,
  YOUTUBE_API_MAX_PAGE_SIZE,
  errorMessage,
  type ChannelDataSource,
  type Logger,
  type VideoIdPage,
  type VideoRecord,
} from '@ytpulse/shared';

export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (size < 1) throw new RangeError(`chunk size must be positive, got ${size}`);
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

export interface ChannelVideos {
  /** In listing order */
  videos: VideoRecord[];
  /** Listed ids the details endpoint did not return (private or deleted) */
  unavailableIds: string[];
}

/**
 * Collects a channel's most recent uploads: ids from the paginated uploads
 * listing, then full details in batches of at most 50. A channel either comes
 * back complete or the whole fetch fails with a FetchError.
 */
export class VideoFetcher {
  constructor(
    private source: ChannelDataSource,
    private logger: Logger,
  ) {}

  async fetchVideos(channelId: string, maxResults: number): Promise<VideoRecord[]> {
    return (await this.fetchChannelVideos(channelId, maxResults)).videos;
  }

  async fetchChannelVideos(channelId: string, maxResults: number): Promise<ChannelVideos> {
    if (!Number.isInteger(maxResults) || maxResults < 1) {
      throw new RangeError(`maxResults must be a positive integer, got ${maxResults}`);
    }

    const videoIds = await this.listVideoIds(channelId, maxResults);
    if (videoIds.length === 0) return { videos: [], unavailableIds: [] };

    const batches = chunk(videoIds, YOUTUBE_API_BATCH_SIZE);
    const byId = new Map<string, VideoRecord>();

    for (const [batchIndex, batch] of batches.entries()) {
      let details: VideoRecord[];
      try {
        details = await this.source.getVideoDetails(batch);
      } catch (err) {
        throw new FetchError(
          `Video details batch ${batchIndex} failed for channel ${channelId}: ${errorMessage(err)}`,
          channelId,
          'details',
          batchIndex,
          { cause: err },
        );
      }
      for (const video of details) byId.set(video.videoId, video);
      this.logger.debug({ channelId, batchIndex, requested: batch.length, received: details.length }, 'Batch fetched');
    }

    // Keep listing order; the details endpoint does not promise one
    const videos: VideoRecord[] = [];
    const missing: string[] = [];
    for (const id of videoIds) {
      const video = byId.get(id);
      if (video) videos.push(video);
      else missing.push(id);
    }

    if (missing.length > 0) {
      this.logger.warn({ channelId, missing }, 'Videos listed but not returned by details (private or deleted)');
    }

    return { videos, unavailableIds: missing };
  }

  private async listVideoIds(channelId: string, maxResults: number): Promise<string[]> {
    const ids: string[] = [];
    const seen = new Set<string>();
    let pageToken: string | undefined;
    let pageIndex = 0;

    while (ids.length < maxResults) {
      const pageSize = Math.min(YOUTUBE_API_MAX_PAGE_SIZE, maxResults - ids.length);

      let page: VideoIdPage;
      try {
        page = await this.source.listVideoIds(channelId, pageToken, pageSize);
      } catch (err) {
        throw new FetchError(
          `Listing page ${pageIndex} failed for channel ${channelId}: ${errorMessage(err)}`,
          channelId,
          'list',
          pageIndex,
          { cause: err },
        );
      }

      for (const id of page.videoIds) {
        if (ids.length >= maxResults) break;
        if (seen.has(id)) continue;
        seen.add(id);
        ids.push(id);
      }

      pageToken = page.nextPageToken;
      pageIndex++;
      if (!pageToken) break;
    }

    this.logger.debug({ channelId, ids: ids.length, pages: pageIndex }, 'Video ids listed');
    return ids;
  }
}
