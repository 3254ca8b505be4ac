/**
 * Shared types for channel-transcripts
 */

export type PrivacyStatus = 'public' | 'unlisted' | 'private';

/**
 * A video listed by the upstream channel or playlist
 */
export interface VideoCandidate {
  videoId: string;
  title: string;
  /** Publication time (UTC) */
  publishedAt: Date;
  privacyStatus: PrivacyStatus;
  /** Absent until the details lookup resolves it */
  durationSeconds?: number;
  videoUrl: string;
}

/**
 * Where to enumerate videos from. Exactly one of the two is set.
 */
export type ListTarget =
  | { kind: 'channel'; channel: string }
  | { kind: 'playlist'; playlist: string };

export interface TranscriptSegment {
  text: string;
  /** Start time in seconds */
  start: number;
  /** Duration in seconds */
  duration: number;
}

export interface Transcript {
  videoId: string;
  /** Language code of the track that was fetched */
  language: string;
  /** True when the track is auto-generated */
  isGenerated: boolean;
  segments: TranscriptSegment[];
  /** Segment texts joined with single spaces */
  text: string;
}

export interface CaptionTrack {
  baseUrl: string;
  languageCode: string;
  name?: string;
  /** 'asr' for auto-generated tracks */
  kind?: string;
}

export type FetchStatus =
  | 'transcribed'
  | 'no_english_transcript'
  | 'transcripts_disabled'
  | 'video_unavailable'
  | 'rate_limited_exhausted'
  | 'error';

/**
 * Result of trying to retrieve the transcript of one accepted candidate
 */
export type FetchOutcome =
  | {
      status: 'transcribed';
      videoId: string;
      transcriptText: string;
      attempts: number;
    }
  | {
      status: Exclude<FetchStatus, 'transcribed'>;
      videoId: string;
      attempts: number;
      error?: string;
    };

/**
 * A candidate paired with the outcome of its transcript fetch
 */
export interface TranscriptResult {
  video: VideoCandidate;
  outcome: FetchOutcome;
}

/**
 * One row of index.csv
 */
export interface IndexRow {
  video_id: string;
  title: string;
  published_at: string;
  video_url: string;
  duration: number | null;
  has_transcript: boolean;
  transcript_path: string;
}

export type RejectionReason =
  | 'not_public'
  | 'outside_date_range'
  | 'too_short'
  | 'too_long'
  | 'unknown_duration';

export type FilterVerdict = { accepted: true } | { accepted: false; reason: RejectionReason };

export interface FilterCriteria {
  /** Start of the accepted publication window (inclusive) */
  publishedAfter: Date;
  /** End of the accepted publication window (inclusive) */
  publishedBefore: Date;
  minDurationSeconds?: number;
  maxDurationSeconds?: number;
}

export type Sleep = (ms: number) => Promise<void>;

/**
 * Fetches the English transcript for a video or throws a TranscriptError
 */
export type TranscriptFetcher = (videoId: string) => Promise<Transcript>;

export interface FetchOptions {
  /** Preferred language codes, in order */
  languages?: string[];
  /** fetch implementation, defaults to the global one */
  fetch?: typeof fetch;
}

export interface RetryOptions {
  /** Retries after the first attempt */
  maxRetries: number;
  /** Wait before the first retry; doubles on each further retry */
  baseDelayMs: number;
  /** Extra random wait, as a fraction of the computed delay (0 disables) */
  jitterRatio?: number;
}

export interface PacingOptions {
  /** Wait between two consecutive transcript requests */
  interRequestDelayMs: number;
  /** Items processed before a batch pause */
  batchSize: number;
  /** Pause taken instead of the inter-request delay after each full batch */
  batchPauseMs: number;
}

export interface BulkOptions {
  fetcher?: TranscriptFetcher;
  retry?: Partial<RetryOptions>;
  pacing?: Partial<PacingOptions>;
  sleep?: Sleep;
  random?: () => number;
  onProgress?: (processed: number, result: TranscriptResult) => void;
}

export type ChannelRef =
  | { kind: 'id'; value: string }
  | { kind: 'handle'; value: string }
  | { kind: 'custom'; value: string }
  | { kind: 'user'; value: string };

/**
 * A video as returned by a listing call, before the details lookup
 */
export interface ListedVideo {
  videoId: string;
  title: string;
  publishedAt: Date;
  privacyStatus?: PrivacyStatus;
  durationSeconds?: number;
}

export interface VideoPage {
  items: ListedVideo[];
  nextPageToken?: string;
}

export interface VideoDetails {
  videoId: string;
  privacyStatus: PrivacyStatus;
  durationSeconds?: number;
  title?: string;
  publishedAt?: Date;
}

/**
 * The video-listing upstream (YouTube Data API)
 */
export interface VideoListingApi {
  /** Resolve a channel reference to a channel ID that exists; null when not found */
  resolveChannelId(ref: ChannelRef): Promise<string | null>;
  listChannelVideos(
    channelId: string,
    options: { pageToken?: string; publishedAfter?: Date }
  ): Promise<VideoPage>;
  listPlaylistItems(playlistId: string, options: { pageToken?: string }): Promise<VideoPage>;
  /** At most 50 IDs per call; unknown IDs are left out of the result */
  getVideoDetails(videoIds: string[]): Promise<VideoDetails[]>;
}

export interface EnumerateOptions {
  /** Forwarded to channel listing to narrow the search upstream */
  publishedAfter?: Date;
  retry?: Partial<RetryOptions>;
  sleep?: Sleep;
}
