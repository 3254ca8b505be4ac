/**
 * channel-transcripts - English transcripts for recent videos of a YouTube
 * channel or playlist
 *
 * @example
 * ```typescript
 * import { loadRunConfig, runPipeline, YouTubeDataApi } from 'channel-transcripts';
 *
 * const config = loadRunConfig({ channel: 'https://www.youtube.com/@SomeChannel', monthsBack: 3 });
 * const summary = await runPipeline(config, { api: new YouTubeDataApi(config.apiKey) });
 * console.log(`${summary.transcribed}/${summary.accepted} transcribed, index at ${summary.indexPath}`);
 * ```
 */

// Transcript fetching
export {
  fetchTranscript,
  fetchVideoInfo,
  extractVideoId,
  parseTranscriptXml,
  selectTrack,
} from './lib/fetcher';
export type { VideoInfo } from './lib/fetcher';

// Fetch phase
export {
  streamVideos,
  processVideos,
  fetchOutcome,
  createTranscriptFetcher,
} from './lib/processor';
export { RetryPolicy } from './lib/retry';
export { RequestPacer } from './lib/pacing';

// Enumeration and filtering
export {
  enumerateVideos,
  resolveTarget,
  parseChannelRef,
  parsePlaylistRef,
  YouTubeDataApi,
} from './loaders';
export { filterVideos, evaluateCandidate, criteriaForWindow } from './lib/filters';
export { subtractMonths, parseIsoDuration } from './lib/dates';

// Output
export { OutputWriter, formatTranscriptFile, transcriptFilename, sanitizeTitle } from './outputs';

// Pipeline and configuration
export { runPipeline } from './lib/pipeline';
export type { PipelineDeps, RunSummary } from './lib/pipeline';
export { loadRunConfig, getConfigSummary, toListTarget, DEFAULT_OUTPUT_DIR } from './lib/config';
export type { RunConfig, RunOptions } from './lib/config';
export { logger } from './lib/logger';

// Errors
export {
  TranscriptError,
  ConfigError,
  UpstreamUnavailableError,
  UpstreamRateLimitError,
  QuotaExhaustedError,
  UpstreamRequestError,
  RetryExhaustedError,
  errorMessage,
} from './lib/errors';

// Types
export type {
  VideoCandidate,
  ListTarget,
  FetchOutcome,
  FetchStatus,
  IndexRow,
  Transcript,
  TranscriptSegment,
  TranscriptResult,
  TranscriptFetcher,
  VideoListingApi,
  FilterCriteria,
  RejectionReason,
  RetryOptions,
  PacingOptions,
  BulkOptions,
  FetchOptions,
} from './types';
