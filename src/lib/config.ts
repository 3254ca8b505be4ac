/**
 * Run configuration: CLI options plus environment, validated with zod
 */

import { z } from 'zod';
import type { ListTarget, PacingOptions, RetryOptions } from '../types';
import { ConfigError } from './errors';
import { DEFAULT_BATCH_PAUSE_MS, DEFAULT_BATCH_SIZE, DEFAULT_INTER_REQUEST_DELAY_MS } from './pacing';
import { DEFAULT_BASE_DELAY_MS, DEFAULT_MAX_RETRIES } from './retry';

export const DEFAULT_OUTPUT_DIR = './transcripts';
export const DEFAULT_MONTHS_BACK = 3;

export interface RunConfig {
  target: ListTarget;
  apiKey: string;
  monthsBack: number;
  outputDir: string;
  minDurationSeconds?: number;
  maxDurationSeconds?: number;
  pacing: PacingOptions;
  retry: RetryOptions;
}

/** Raw run options; numbers may arrive as command-line strings */
export interface RunOptions {
  channel?: string;
  playlist?: string;
  monthsBack?: number | string;
  outputDir?: string;
  minDuration?: number | string;
  maxDuration?: number | string;
  batchSize?: number | string;
  batchPause?: number | string;
  delay?: number | string;
  maxRetries?: number | string;
  backoff?: number | string;
  jitter?: number | string;
}

const seconds = z.coerce.number().finite().min(0);

export const runOptionsSchema = z
  .object({
    monthsBack: z.coerce.number().int().min(1).max(600).default(DEFAULT_MONTHS_BACK),
    outputDir: z.string().trim().min(1).default(DEFAULT_OUTPUT_DIR),
    minDuration: seconds.int().optional(),
    maxDuration: seconds.int().optional(),
    batchSize: z.coerce.number().int().min(1).default(DEFAULT_BATCH_SIZE),
    batchPause: seconds.default(DEFAULT_BATCH_PAUSE_MS / 1000),
    delay: seconds.default(DEFAULT_INTER_REQUEST_DELAY_MS / 1000),
    maxRetries: z.coerce.number().int().min(0).max(20).default(DEFAULT_MAX_RETRIES),
    backoff: seconds.default(DEFAULT_BASE_DELAY_MS / 1000),
    jitter: z.coerce.number().min(0).max(1).default(0),
    apiKey: z
      .string({ required_error: 'YOUTUBE_API_KEY environment variable not set' })
      .trim()
      .min(1, 'YOUTUBE_API_KEY environment variable not set'),
  })
  .refine(
    (o) => o.minDuration === undefined || o.maxDuration === undefined || o.minDuration <= o.maxDuration,
    { message: 'minDuration cannot exceed maxDuration', path: ['minDuration'] }
  );

/**
 * Build the list target from the two mutually exclusive inputs
 */
export function toListTarget(channel?: string, playlist?: string): ListTarget {
  const hasChannel = Boolean(channel?.trim());
  const hasPlaylist = Boolean(playlist?.trim());

  if (hasChannel && hasPlaylist) {
    throw new ConfigError('Provide only one of a channel or a playlist');
  }
  if (channel && hasChannel) return { kind: 'channel', channel };
  if (playlist && hasPlaylist) return { kind: 'playlist', playlist };
  throw new ConfigError('Must provide either a channel or a playlist');
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Validate the options of one run. The API key comes from the environment.
 *
 * @throws ConfigError
 */
export function loadRunConfig(
  options: RunOptions,
  env: NodeJS.ProcessEnv = process.env
): RunConfig {
  const target = toListTarget(options.channel, options.playlist);

  const parsed = runOptionsSchema.safeParse({ ...options, apiKey: env.YOUTUBE_API_KEY });
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }
  const o = parsed.data;

  return {
    target,
    apiKey: o.apiKey,
    monthsBack: o.monthsBack,
    outputDir: o.outputDir,
    minDurationSeconds: o.minDuration,
    maxDurationSeconds: o.maxDuration,
    pacing: {
      interRequestDelayMs: Math.round(o.delay * 1000),
      batchSize: o.batchSize,
      batchPauseMs: Math.round(o.batchPause * 1000),
    },
    retry: {
      maxRetries: o.maxRetries,
      baseDelayMs: Math.round(o.backoff * 1000),
      jitterRatio: o.jitter,
    },
  };
}

/**
 * Loggable view of a config, without the API key
 */
export function getConfigSummary(config: RunConfig): Record<string, unknown> {
  return {
    target: config.target,
    months_back: config.monthsBack,
    output_dir: config.outputDir,
    min_duration: config.minDurationSeconds ?? null,
    max_duration: config.maxDurationSeconds ?? null,
    batch_size: config.pacing.batchSize,
    batch_pause_ms: config.pacing.batchPauseMs,
    delay_ms: config.pacing.interRequestDelayMs,
    max_retries: config.retry.maxRetries,
    backoff_ms: config.retry.baseDelayMs,
    jitter: config.retry.jitterRatio,
  };
}
