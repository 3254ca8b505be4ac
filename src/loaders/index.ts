/**
 * Video enumeration for a channel or playlist
 */

import type {
  EnumerateOptions,
  ListedVideo,
  ListTarget,
  VideoCandidate,
  VideoDetails,
  VideoListingApi,
  VideoPage,
} from '../types';
import { errorMessage, UpstreamUnavailableError } from '../lib/errors';
import { createLogger } from '../lib/logger';
import { RetryPolicy, type RetryHooks } from '../lib/retry';
import { parseChannelRef, parsePlaylistRef, videoUrl } from './references';

export { parseChannelRef, parsePlaylistRef, videoUrl } from './references';
export { YouTubeDataApi, classifyApiError } from './youtube';

const log = createLogger('loader');

const DETAILS_BATCH = 50;

export type ResolvedTarget =
  | { kind: 'channel'; channelId: string }
  | { kind: 'playlist'; playlistId: string };

/**
 * Resolve a channel or playlist reference to an upstream ID. Channel IDs are
 * looked up too, so an unknown one fails here rather than listing nothing.
 *
 * @throws UpstreamUnavailableError when the reference cannot be resolved
 */
export async function resolveTarget(
  api: VideoListingApi,
  target: ListTarget,
  retry: RetryPolicy = new RetryPolicy(),
  hooks: RetryHooks = {}
): Promise<ResolvedTarget> {
  if (target.kind === 'playlist') {
    const playlistId = parsePlaylistRef(target.playlist);
    if (!playlistId) {
      throw new UpstreamUnavailableError(`Could not parse playlist: ${target.playlist}`);
    }
    return { kind: 'playlist', playlistId };
  }

  const ref = parseChannelRef(target.channel);
  if (!ref) {
    throw new UpstreamUnavailableError(`Could not parse channel URL: ${target.channel}`);
  }
  const { value: channelId } = await retry.run(() => api.resolveChannelId(ref), hooks);
  if (!channelId) {
    throw new UpstreamUnavailableError(`No channel found for ${target.channel}`);
  }
  log.info({ channel: target.channel, channelId }, 'Resolved channel');
  return { kind: 'channel', channelId };
}

function needsDetails(video: ListedVideo): boolean {
  return video.durationSeconds === undefined || video.privacyStatus === undefined;
}

async function lookupDetails(
  api: VideoListingApi,
  videoIds: string[],
  retry: RetryPolicy,
  hooks: RetryHooks
): Promise<Map<string, VideoDetails>> {
  const details = new Map<string, VideoDetails>();
  for (let i = 0; i < videoIds.length; i += DETAILS_BATCH) {
    const batch = videoIds.slice(i, i + DETAILS_BATCH);
    const { value } = await retry.run(() => api.getVideoDetails(batch), hooks);
    for (const item of value) {
      details.set(item.videoId, item);
    }
  }
  return details;
}

/**
 * Fill in duration and privacy for a page of listed videos. Videos the details
 * lookup no longer knows about are dropped.
 */
export async function completePage(
  api: VideoListingApi,
  items: ListedVideo[],
  retry: RetryPolicy = new RetryPolicy(),
  hooks: RetryHooks = {}
): Promise<VideoCandidate[]> {
  const missing = items.filter(needsDetails).map((v) => v.videoId);
  const details = missing.length
    ? await lookupDetails(api, missing, retry, hooks)
    : new Map<string, VideoDetails>();

  const candidates: VideoCandidate[] = [];
  for (const item of items) {
    const extra = details.get(item.videoId);
    const privacyStatus = extra?.privacyStatus ?? item.privacyStatus;

    if (needsDetails(item) && !extra) {
      log.debug({ videoId: item.videoId }, 'No details returned, skipping');
      continue;
    }
    if (!privacyStatus) continue;

    candidates.push({
      videoId: item.videoId,
      title: extra?.title ?? item.title,
      publishedAt: extra?.publishedAt ?? item.publishedAt,
      privacyStatus,
      durationSeconds: extra?.durationSeconds ?? item.durationSeconds,
      videoUrl: videoUrl(item.videoId),
    });
  }
  return candidates;
}

/**
 * Lazily enumerate every video of a channel or playlist in upstream order,
 * following page tokens until the last page. A video listed twice is yielded
 * once, at its first position.
 */
export async function* enumerateVideos(
  api: VideoListingApi,
  target: ListTarget,
  options: EnumerateOptions = {}
): AsyncGenerator<VideoCandidate> {
  const retry = new RetryPolicy(options.retry);
  const hooks: RetryHooks = {
    sleep: options.sleep,
    onRetry: ({ attempt, delayMs, error }) => {
      log.warn({ retry: attempt + 1, delayMs, err: errorMessage(error) }, 'Listing rate limited, backing off');
    },
  };

  const resolved = await resolveTarget(api, target, retry, hooks);
  const seenTokens = new Set<string>();
  const seenVideos = new Set<string>();
  let pageToken: string | undefined;
  let page = 0;

  do {
    const token = pageToken;
    const { value: result } = await retry.run<VideoPage>(
      () =>
        resolved.kind === 'channel'
          ? api.listChannelVideos(resolved.channelId, {
              pageToken: token,
              publishedAfter: options.publishedAfter,
            })
          : api.listPlaylistItems(resolved.playlistId, { pageToken: token }),
      hooks
    );
    page++;
    log.debug({ page, items: result.items.length }, 'Fetched listing page');

    for (const video of await completePage(api, result.items, retry, hooks)) {
      if (seenVideos.has(video.videoId)) {
        log.debug({ videoId: video.videoId }, 'Video listed twice, skipping');
        continue;
      }
      seenVideos.add(video.videoId);
      yield video;
    }

    pageToken = result.nextPageToken;
    if (pageToken && seenTokens.has(pageToken)) {
      log.warn({ pageToken }, 'Page token repeated, stopping enumeration');
      break;
    }
    if (pageToken) seenTokens.add(pageToken);
  } while (pageToken);
}
