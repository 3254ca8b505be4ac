/**
 * Error types raised across the pipeline
 */

export type TranscriptErrorKind =
  | 'rate_limited'
  | 'no_english_transcript'
  | 'transcripts_disabled'
  | 'video_unavailable'
  | 'request_failed';

/**
 * Failure to retrieve one video's transcript
 */
export class TranscriptError extends Error {
  readonly kind: TranscriptErrorKind;
  readonly videoId: string;

  constructor(kind: TranscriptErrorKind, videoId: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TranscriptError';
    this.kind = kind;
    this.videoId = videoId;
  }
}

/**
 * Invalid or contradictory run configuration
 */
export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/**
 * The channel or playlist reference cannot be resolved
 */
export class UpstreamUnavailableError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'UpstreamUnavailableError';
  }
}

/**
 * Short-term rate limit reported by the video-listing API
 */
export class UpstreamRateLimitError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'UpstreamRateLimitError';
  }
}

/**
 * Daily API quota used up. Retrying within the run cannot help.
 */
export class QuotaExhaustedError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'QuotaExhaustedError';
  }
}

/**
 * Any other failure of the video-listing API
 */
export class UpstreamRequestError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number, options?: ErrorOptions) {
    super(message, options);
    this.name = 'UpstreamRequestError';
    this.status = status;
  }
}

/**
 * Retries ran out while the upstream kept rate limiting
 */
export class RetryExhaustedError extends Error {
  readonly attempts: number;

  constructor(attempts: number, lastError: unknown) {
    super(`Still rate limited after ${attempts} attempts`, { cause: lastError });
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
  }
}

export function isRateLimitError(error: unknown): boolean {
  if (error instanceof UpstreamRateLimitError) return true;
  return error instanceof TranscriptError && error.kind === 'rate_limited';
}

/**
 * Errors that end the whole run rather than one item
 */
export function isFatalError(error: unknown): boolean {
  return (
    error instanceof ConfigError ||
    error instanceof UpstreamUnavailableError ||
    error instanceof QuotaExhaustedError
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
