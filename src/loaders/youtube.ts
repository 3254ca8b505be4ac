/**
 * YouTube Data API v3 client for channel and playlist listing
 */

import { google, type youtube_v3 } from 'googleapis';
import type {
  ChannelRef,
  ListedVideo,
  PrivacyStatus,
  VideoDetails,
  VideoListingApi,
  VideoPage,
} from '../types';
import { parseIsoDuration } from '../lib/dates';
import {
  ConfigError,
  errorMessage,
  QuotaExhaustedError,
  UpstreamRateLimitError,
  UpstreamRequestError,
  UpstreamUnavailableError,
} from '../lib/errors';
import { createLogger } from '../lib/logger';

const log = createLogger('youtube');

const PAGE_SIZE = 50;
const QUOTA_REASONS = new Set(['quotaExceeded', 'dailyLimitExceeded']);
const RATE_LIMIT_REASONS = new Set(['rateLimitExceeded', 'userRateLimitExceeded']);
const BAD_KEY_REASONS = new Set(['keyInvalid', 'keyExpired', 'badRequest']);

type Nullable<T> = T | null | undefined;

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * HTTP status of a googleapis (gaxios) error, if there is one
 */
export function httpStatus(error: unknown): number | undefined {
  if (!isObject(error)) return undefined;
  const { response, status, code } = error;
  if (isObject(response) && typeof response.status === 'number') return response.status;
  if (typeof status === 'number') return status;
  if (typeof code === 'number') return code;
  if (typeof code === 'string' && /^\d{3}$/.test(code)) return Number.parseInt(code, 10);
  return undefined;
}

/**
 * The `reason` fields of a Google API error body
 */
export function errorReasons(error: unknown): string[] {
  if (!isObject(error)) return [];

  let entries: unknown = error.errors;
  const response = error.response;
  if (!Array.isArray(entries) && isObject(response)) {
    const data = response.data;
    const body = isObject(data) ? data.error : undefined;
    if (isObject(body)) entries = body.errors;
  }
  if (!Array.isArray(entries)) return [];

  return entries.flatMap((entry: unknown) =>
    isObject(entry) && typeof entry.reason === 'string' ? [entry.reason] : []
  );
}

/**
 * Translate an API failure into the pipeline's error types
 */
export function classifyApiError(error: unknown, action: string): Error {
  const status = httpStatus(error);
  const reasons = errorReasons(error);
  const detail = `${action}: ${errorMessage(error)}`;

  if (reasons.some((r) => QUOTA_REASONS.has(r))) {
    return new QuotaExhaustedError(`YouTube API daily quota exhausted (${detail})`, { cause: error });
  }
  if (status === 429 || reasons.some((r) => RATE_LIMIT_REASONS.has(r))) {
    return new UpstreamRateLimitError(`YouTube API rate limit (${detail})`, { cause: error });
  }
  if (status === 400 && reasons.some((r) => BAD_KEY_REASONS.has(r))) {
    return new ConfigError(`YouTube API key was rejected (${detail})`, { cause: error });
  }
  if (status === 404) {
    return new UpstreamUnavailableError(`Not found (${detail})`, { cause: error });
  }
  return new UpstreamRequestError(detail, status, { cause: error });
}

function toPrivacy(value: Nullable<string>): PrivacyStatus | undefined {
  return value === 'public' || value === 'unlisted' || value === 'private' ? value : undefined;
}

function toDate(value: Nullable<string>): Date | undefined {
  if (!value) return undefined;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

export function mapSearchResult(item: youtube_v3.Schema$SearchResult): ListedVideo | null {
  const videoId = item.id?.videoId;
  const publishedAt = toDate(item.snippet?.publishedAt);
  if (!videoId || !publishedAt) return null;
  return { videoId, title: item.snippet?.title ?? '', publishedAt };
}

export function mapPlaylistItem(item: youtube_v3.Schema$PlaylistItem): ListedVideo | null {
  const videoId = item.contentDetails?.videoId;
  const publishedAt =
    toDate(item.contentDetails?.videoPublishedAt) ?? toDate(item.snippet?.publishedAt);
  if (!videoId || !publishedAt) return null;
  return {
    videoId,
    title: item.snippet?.title ?? '',
    publishedAt,
    privacyStatus: toPrivacy(item.status?.privacyStatus),
  };
}

export function mapVideoDetails(item: youtube_v3.Schema$Video): VideoDetails | null {
  const videoId = item.id;
  const privacyStatus = toPrivacy(item.status?.privacyStatus);
  if (!videoId || !privacyStatus) return null;

  const duration = item.contentDetails?.duration;
  return {
    videoId,
    privacyStatus,
    durationSeconds: duration ? parseIsoDuration(duration) : undefined,
    title: item.snippet?.title ?? undefined,
    publishedAt: toDate(item.snippet?.publishedAt),
  };
}

function collect<S, T>(items: Nullable<S[]>, map: (item: S) => T | null): T[] {
  const results: T[] = [];
  for (const item of items ?? []) {
    const mapped = map(item);
    if (mapped) results.push(mapped);
  }
  return results;
}

type ListCall<P, R> = (params: P) => Promise<{ data: R }>;

/**
 * The slice of the googleapis YouTube client used here
 */
export interface YouTubeClient {
  channels: {
    list: ListCall<youtube_v3.Params$Resource$Channels$List, youtube_v3.Schema$ChannelListResponse>;
  };
  search: {
    list: ListCall<youtube_v3.Params$Resource$Search$List, youtube_v3.Schema$SearchListResponse>;
  };
  playlistItems: {
    list: ListCall<
      youtube_v3.Params$Resource$Playlistitems$List,
      youtube_v3.Schema$PlaylistItemListResponse
    >;
  };
  videos: {
    list: ListCall<youtube_v3.Params$Resource$Videos$List, youtube_v3.Schema$VideoListResponse>;
  };
}

export class YouTubeDataApi implements VideoListingApi {
  private readonly youtube: YouTubeClient;

  constructor(apiKey: string, youtube?: YouTubeClient) {
    this.youtube = youtube ?? google.youtube({ version: 'v3', auth: apiKey });
  }

  private async call<T>(action: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw classifyApiError(error, action);
    }
  }

  private async lookupChannel(
    params: Pick<youtube_v3.Params$Resource$Channels$List, 'id' | 'forHandle' | 'forUsername'>
  ): Promise<string | null> {
    const res = await this.call('channels.list', () =>
      this.youtube.channels.list({ part: ['id'], maxResults: 1, ...params })
    );
    return res.data.items?.[0]?.id ?? null;
  }

  async resolveChannelId(ref: ChannelRef): Promise<string | null> {
    switch (ref.kind) {
      case 'id':
        return this.lookupChannel({ id: [ref.value] });
      case 'handle':
        return this.lookupChannel({ forHandle: ref.value });
      case 'user': {
        const id = await this.lookupChannel({ forUsername: ref.value });
        if (id) return id;
        break;
      }
      case 'custom':
        break;
    }

    // Custom URLs have no direct lookup
    log.debug({ query: ref.value }, 'Searching for channel');
    const res = await this.call('search.list', () =>
      this.youtube.search.list({
        part: ['snippet'],
        q: ref.value,
        type: ['channel'],
        maxResults: 1,
      })
    );
    const first = res.data.items?.[0];
    return first?.snippet?.channelId ?? first?.id?.channelId ?? null;
  }

  async listChannelVideos(
    channelId: string,
    options: { pageToken?: string; publishedAfter?: Date }
  ): Promise<VideoPage> {
    const res = await this.call('search.list', () =>
      this.youtube.search.list({
        part: ['snippet'],
        channelId,
        maxResults: PAGE_SIZE,
        order: 'date',
        type: ['video'],
        publishedAfter: options.publishedAfter?.toISOString(),
        pageToken: options.pageToken,
      })
    );
    return {
      items: collect(res.data.items, mapSearchResult),
      nextPageToken: res.data.nextPageToken ?? undefined,
    };
  }

  async listPlaylistItems(playlistId: string, options: { pageToken?: string }): Promise<VideoPage> {
    const res = await this.call('playlistItems.list', () =>
      this.youtube.playlistItems.list({
        part: ['snippet', 'contentDetails', 'status'],
        playlistId,
        maxResults: PAGE_SIZE,
        pageToken: options.pageToken,
      })
    );
    return {
      items: collect(res.data.items, mapPlaylistItem),
      nextPageToken: res.data.nextPageToken ?? undefined,
    };
  }

  async getVideoDetails(videoIds: string[]): Promise<VideoDetails[]> {
    if (!videoIds.length) return [];
    if (videoIds.length > PAGE_SIZE) {
      throw new RangeError(`At most ${PAGE_SIZE} video IDs per details call, got ${videoIds.length}`);
    }

    const res = await this.call('videos.list', () =>
      this.youtube.videos.list({
        part: ['snippet', 'contentDetails', 'status'],
        id: videoIds,
        maxResults: PAGE_SIZE,
      })
    );
    return collect(res.data.items, mapVideoDetails);
  }
}
