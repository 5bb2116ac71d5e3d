import { describe, it, expect } from 'vitest';
import type { ChannelSummary, VideoRecord } from '@ytpulse/shared';
import { AggregatedDataset, ReportAggregator } from './dataset.js';
import { buildChannelResult } from './metrics.js';

function makeVideo(overrides: Partial<VideoRecord> = {}): VideoRecord {
  const videoId = overrides.videoId ?? 'vid';
  return {
    videoId,
    channelId: 'UC_test',
    title: `Video ${videoId}`,
    publishedAt: '2024-01-15T10:00:00Z',
    viewCount: 1000,
    likeCount: 50,
    commentCount: 10,
    duration: 'PT2M',
    durationSeconds: 120,
    url: `https://www.youtube.com/watch?v=${videoId}`,
    missingCounts: [],
    ...overrides,
  };
}

function makeChannel(channelId: string, subscriberCount = 1000): ChannelSummary {
  return {
    channelId,
    title: `Channel ${channelId}`,
    description: '',
    customUrl: '',
    subscriberCount,
    totalViewCount: 0,
    videoCount: 0,
    url: `https://www.youtube.com/channel/${channelId}`,
  };
}

describe('AggregatedDataset', () => {
  describe('bestVideos', () => {
    it('orders by engagement, then views, then video id', () => {
      const result = buildChannelResult(makeChannel('UC_a'), [
        makeVideo({ videoId: 'low', viewCount: 1000, likeCount: 10, commentCount: 0 }),
        makeVideo({ videoId: 'tie-b', viewCount: 1000, likeCount: 50, commentCount: 0 }),
        makeVideo({ videoId: 'tie-a', viewCount: 1000, likeCount: 50, commentCount: 0 }),
        makeVideo({ videoId: 'more-views', viewCount: 2000, likeCount: 100, commentCount: 0 }),
        makeVideo({ videoId: 'top', viewCount: 100, likeCount: 20, commentCount: 0 }),
      ]);
      const dataset = new AggregatedDataset([result]);

      expect(dataset.bestVideos(result).map((v) => v.videoId)).toEqual([
        'top',
        'more-views',
        'tie-a',
        'tie-b',
        'low',
      ]);
    });

    it('returns the same order for any input permutation', () => {
      const videos = [
        makeVideo({ videoId: 'c', likeCount: 50 }),
        makeVideo({ videoId: 'a', likeCount: 50 }),
        makeVideo({ videoId: 'b', likeCount: 50 }),
      ];
      const forward = buildChannelResult(makeChannel('UC_a'), videos);
      const reversed = buildChannelResult(makeChannel('UC_a'), [...videos].reverse());
      const dataset = new AggregatedDataset([forward, reversed]);

      const ids = (r: typeof forward) => dataset.bestVideos(r).map((v) => v.videoId);
      expect(ids(forward)).toEqual(['a', 'b', 'c']);
      expect(ids(reversed)).toEqual(ids(forward));
    });

    it('returns every video when fewer than requested, without padding', () => {
      const result = buildChannelResult(makeChannel('UC_a'), [
        makeVideo({ videoId: 'a' }),
        makeVideo({ videoId: 'b' }),
        makeVideo({ videoId: 'c' }),
      ]);
      expect(new AggregatedDataset([result]).bestVideos(result, 15)).toHaveLength(3);
    });

    it('does not reorder the stored videos', () => {
      const result = buildChannelResult(makeChannel('UC_a'), [
        makeVideo({ videoId: 'first', likeCount: 1 }),
        makeVideo({ videoId: 'second', likeCount: 90 }),
      ]);
      const dataset = new AggregatedDataset([result]);
      dataset.bestVideos(result);
      dataset.latestVideos(result);
      expect(dataset.channels[0].videos.map((v) => v.videoId)).toEqual(['first', 'second']);
    });
  });

  describe('latestVideos', () => {
    it('returns videos in non-increasing publish order with id tie-break', () => {
      const result = buildChannelResult(makeChannel('UC_a'), [
        makeVideo({ videoId: 'old', publishedAt: '2023-06-01T00:00:00Z' }),
        makeVideo({ videoId: 'new-b', publishedAt: '2024-02-01T00:00:00Z' }),
        makeVideo({ videoId: 'mid', publishedAt: '2023-12-24T12:30:00Z' }),
        makeVideo({ videoId: 'new-a', publishedAt: '2024-02-01T00:00:00Z' }),
      ]);
      const latest = new AggregatedDataset([result]).latestVideos(result);

      expect(latest.map((v) => v.videoId)).toEqual(['new-a', 'new-b', 'mid', 'old']);
      for (let i = 1; i < latest.length; i++) {
        expect(Date.parse(latest[i - 1].publishedAt)).toBeGreaterThanOrEqual(Date.parse(latest[i].publishedAt));
      }
    });

    it('limits to n', () => {
      const videos = Array.from({ length: 20 }, (_, i) =>
        makeVideo({ videoId: `v${String(i).padStart(2, '0')}`, publishedAt: `2024-01-${String(i + 1).padStart(2, '0')}T00:00:00Z` }),
      );
      const result = buildChannelResult(makeChannel('UC_a'), videos);
      const latest = new AggregatedDataset([result]).latestVideos(result);
      expect(latest).toHaveLength(15);
      expect(latest[0].videoId).toBe('v19');
    });
  });

  describe('topVideosOverall', () => {
    it('returns the five most viewed', () => {
      const videos = [100, 700, 300, 900, 500, 200].map((viewCount, i) => makeVideo({ videoId: `v${i}`, viewCount }));
      const result = buildChannelResult(makeChannel('UC_a'), videos);
      expect(new AggregatedDataset([result]).topVideosOverall(result).map((v) => v.viewCount)).toEqual([
        900, 700, 500, 300, 200,
      ]);
    });
  });

  describe('cross-channel views', () => {
    const quiet = buildChannelResult(makeChannel('UC_quiet', 10_000), [
      makeVideo({ videoId: 'q1', channelId: 'UC_quiet', viewCount: 1000, likeCount: 10, commentCount: 0 }),
    ]);
    const lively = buildChannelResult(makeChannel('UC_lively', 100), [
      makeVideo({ videoId: 'l1', channelId: 'UC_lively', viewCount: 500, likeCount: 50, commentCount: 0, durationSeconds: 600 }),
      makeVideo({ videoId: 'l2', channelId: 'UC_lively', viewCount: 300, likeCount: 30, commentCount: 0, durationSeconds: 1200 }),
    ]);
    const dataset = new AggregatedDataset([quiet, lively]);

    it('ranks channels by average engagement', () => {
      const trends = dataset.engagementTrends();
      expect(trends.map((t) => t.channelId)).toEqual(['UC_lively', 'UC_quiet']);
      expect(trends[0].avgEngagementRate).toBe(10);
      expect(trends[0].avgViewRate).toBe(400);
      expect(trends[0].subscriberCount).toBe(100);
      expect(trends[0].videoCount).toBe(2);
      expect(trends[1].avgEngagementRate).toBe(1);
    });

    it('keeps configuration order for tied channels', () => {
      const a = buildChannelResult(makeChannel('UC_a'), [makeVideo({ videoId: 'a1' })]);
      const b = buildChannelResult(makeChannel('UC_b'), [makeVideo({ videoId: 'b1' })]);
      expect(new AggregatedDataset([b, a]).engagementTrends().map((t) => t.channelId)).toEqual(['UC_b', 'UC_a']);
    });

    it('ranks channels by view rate', () => {
      expect(dataset.viewRateRanking().map((t) => t.channelId)).toEqual(['UC_lively', 'UC_quiet']);
    });

    it('yields rows channel by channel in fetch order', () => {
      expect([...dataset.rows()].map((r) => r.video.videoId)).toEqual(['q1', 'l1', 'l2']);
      expect(dataset.videoCount).toBe(3);
    });

    it('buckets videos by duration', () => {
      expect(dataset.durationBuckets()).toEqual([
        { label: 'short', description: 'Short Videos (<5min)', videoCount: 1, avgEngagementRate: 1 },
        { label: 'medium', description: 'Medium Videos (5-15min)', videoCount: 1, avgEngagementRate: 10 },
        { label: 'long', description: 'Long Videos (>15min)', videoCount: 1, avgEngagementRate: 10 },
      ]);
    });

    it('finds top engagement and viral videos across channels', () => {
      expect(dataset.topEngagementAcrossChannels().map((r) => r.video.videoId)).toEqual(['l1', 'l2', 'q1']);
      expect(dataset.viralVideos(1).map((r) => `${r.channel.channelId}/${r.video.videoId}`)).toEqual([
        'UC_lively/l1',
      ]);
    });

    it('totals views, likes and comments', () => {
      expect(dataset.totals()).toEqual({ channels: 2, videos: 3, views: 1800, likes: 90, comments: 0 });
    });
  });
});

describe('ReportAggregator', () => {
  it('builds an immutable dataset in insertion order', () => {
    const aggregator = new ReportAggregator();
    aggregator.add(buildChannelResult(makeChannel('UC_a'), [makeVideo({ videoId: 'a1' })]));
    aggregator.add(buildChannelResult(makeChannel('UC_b'), []));

    const dataset = aggregator.build();
    expect(aggregator.size).toBe(2);
    expect(dataset.channels.map((c) => c.channel.channelId)).toEqual(['UC_a', 'UC_b']);
    expect(Object.isFrozen(dataset.channels)).toBe(true);
    expect(dataset.isEmpty).toBe(false);
  });

  it('reports an empty dataset', () => {
    const dataset = new ReportAggregator().build();
    expect(dataset.isEmpty).toBe(true);
    expect(dataset.videoCount).toBe(0);
  });
});
