import { z } from 'zod';

/**
 * Response shapes of the YouTube Data API v3 endpoints the client calls.
 * Counters arrive as decimal strings and may be absent (hidden subscriber
 * counts, disabled likes or comments); absence is kept as `undefined` here and
 * turned into zero by the client, which also records which ones were missing.
 */

const countString = z.union([z.string(), z.number()]).optional();

const channelItemSchema = z.object({
  id: z.string(),
  snippet: z
    .object({
      title: z.string().default(''),
      description: z.string().default(''),
      customUrl: z.string().optional(),
      publishedAt: z.string().optional(),
    })
    .optional(),
  statistics: z
    .object({
      subscriberCount: countString,
      videoCount: countString,
      viewCount: countString,
      hiddenSubscriberCount: z.boolean().optional(),
    })
    .optional(),
  contentDetails: z
    .object({
      relatedPlaylists: z
        .object({
          uploads: z.string().optional(),
        })
        .optional(),
    })
    .optional(),
});

export const channelListResponseSchema = z.object({
  items: z.array(channelItemSchema).default([]),
});

export const playlistItemsResponseSchema = z.object({
  items: z
    .array(
      z.object({
        contentDetails: z.object({
          videoId: z.string(),
        }),
      }),
    )
    .default([]),
  nextPageToken: z.string().optional(),
});

const videoItemSchema = z.object({
  id: z.string(),
  snippet: z.object({
    channelId: z.string(),
    title: z.string().default(''),
    publishedAt: z.string(),
  }),
  statistics: z
    .object({
      viewCount: countString,
      likeCount: countString,
      commentCount: countString,
    })
    .default({}),
  contentDetails: z
    .object({
      duration: z.string().default('PT0S'),
    })
    .default({}),
});

export const videoListResponseSchema = z.object({
  items: z.array(videoItemSchema).default([]),
});

export const i18nRegionsResponseSchema = z.object({
  items: z.array(z.unknown()).default([]),
});

/** Error body returned with non-2xx responses */
export const apiErrorBodySchema = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string().default(''),
    errors: z
      .array(
        z.object({
          reason: z.string().optional(),
          message: z.string().optional(),
        }),
      )
      .default([]),
  }),
});

export type ChannelItem = z.infer<typeof channelItemSchema>;
export type VideoItem = z.infer<typeof videoItemSchema>;
export type ChannelListResponse = z.infer<typeof channelListResponseSchema>;
export type PlaylistItemsResponse = z.infer<typeof playlistItemsResponseSchema>;
export type VideoListResponse = z.infer<typeof videoListResponseSchema>;
