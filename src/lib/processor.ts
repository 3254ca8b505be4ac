/**
 * Sequential transcript processor with rate-limit retry and pacing
 */

import pLimit from 'p-limit';
import type {
  BulkOptions,
  FetchOptions,
  FetchOutcome,
  TranscriptFetcher,
  TranscriptResult,
  VideoCandidate,
} from '../types';
import { errorMessage, isFatalError, RetryExhaustedError, TranscriptError } from './errors';
import { fetchTranscript } from './fetcher';
import { createLogger } from './logger';
import { RequestPacer } from './pacing';
import { RetryPolicy, sleep as defaultSleep, type RetryHooks } from './retry';

const log = createLogger('processor');

/**
 * English transcript fetcher whose requests never overlap, even when the
 * returned function is called concurrently
 */
export function createTranscriptFetcher(options: FetchOptions = {}): TranscriptFetcher {
  const limit = pLimit(1);
  const languages = options.languages ?? ['en'];
  return (videoId) => limit(() => fetchTranscript(videoId, { ...options, languages }));
}

/**
 * Map a failed fetch to the outcome recorded for the video
 */
export function outcomeFromError(videoId: string, error: unknown, attempts: number): FetchOutcome {
  if (error instanceof RetryExhaustedError) {
    return { status: 'rate_limited_exhausted', videoId, attempts: error.attempts, error: error.message };
  }

  if (error instanceof TranscriptError) {
    switch (error.kind) {
      case 'no_english_transcript':
      case 'transcripts_disabled':
      case 'video_unavailable':
        return { status: error.kind, videoId, attempts, error: error.message };
      case 'rate_limited':
        return { status: 'rate_limited_exhausted', videoId, attempts, error: error.message };
      case 'request_failed':
        return { status: 'error', videoId, attempts, error: error.message };
    }
  }

  return { status: 'error', videoId, attempts, error: errorMessage(error) };
}

/**
 * Fetch one video's transcript under the retry policy. Never rejects except
 * for run-ending errors (see isFatalError).
 */
export async function fetchOutcome(
  videoId: string,
  fetcher: TranscriptFetcher,
  retry: RetryPolicy,
  hooks: RetryHooks = {}
): Promise<FetchOutcome> {
  let attempts = 0;

  try {
    const { value } = await retry.run(() => {
      attempts++;
      return fetcher(videoId);
    }, hooks);
    return { status: 'transcribed', videoId, transcriptText: value.text, attempts };
  } catch (error) {
    if (isFatalError(error)) throw error;
    return outcomeFromError(videoId, error, attempts);
  }
}

/**
 * Yield one result per video, in input order, as each fetch completes.
 * Requests are strictly one at a time.
 */
export async function* streamVideos(
  videos: AsyncIterable<VideoCandidate> | Iterable<VideoCandidate>,
  options: BulkOptions = {}
): AsyncGenerator<TranscriptResult> {
  const sleep = options.sleep ?? defaultSleep;
  const fetcher = options.fetcher ?? createTranscriptFetcher();
  const retry = new RetryPolicy(options.retry);
  const pacer = new RequestPacer(options.pacing, sleep);
  let processed = 0;

  for await (const video of videos) {
    await pacer.beforeRequest((wait) => {
      if (wait.kind === 'batch_pause') {
        log.info({ batch: wait.batch, pauseMs: wait.ms, processed }, 'Batch complete, pausing');
      }
    });

    const outcome = await fetchOutcome(video.videoId, fetcher, retry, {
      sleep,
      random: options.random,
      onRetry: ({ attempt, delayMs, error }) => {
        log.warn(
          { videoId: video.videoId, retry: attempt + 1, of: retry.maxRetries, delayMs, err: errorMessage(error) },
          'Rate limited, backing off'
        );
      },
    });
    pacer.itemDone();
    processed++;

    log.debug({ videoId: video.videoId, status: outcome.status, attempts: outcome.attempts }, 'Fetched');

    const result: TranscriptResult = { video, outcome };
    options.onProgress?.(processed, result);
    yield result;
  }
}

/**
 * Process every video and collect the results
 */
export async function processVideos(
  videos: AsyncIterable<VideoCandidate> | Iterable<VideoCandidate>,
  options: BulkOptions = {}
): Promise<TranscriptResult[]> {
  const results: TranscriptResult[] = [];
  for await (const result of streamVideos(videos, options)) {
    results.push(result);
  }
  return results;
}
