/**
 * End-to-end run: enumerate → filter → fetch → write, streamed item by item
 */

import type {
  FetchStatus,
  IndexRow,
  Sleep,
  TranscriptFetcher,
  TranscriptResult,
  VideoListingApi,
} from '../types';
import { enumerateVideos } from '../loaders';
import { OutputWriter } from '../outputs';
import type { RunConfig } from './config';
import { criteriaForWindow, emptyTally, filterVideos, type RejectionTally } from './filters';
import { createLogger } from './logger';
import { streamVideos } from './processor';

const log = createLogger('pipeline');

export interface PipelineDeps {
  api: VideoListingApi;
  /** Defaults to the English transcript fetcher */
  fetcher?: TranscriptFetcher;
  /** Defaults to a writer on config.outputDir */
  writer?: OutputWriter;
  sleep?: Sleep;
  now?: () => Date;
  random?: () => number;
  onResult?: (result: TranscriptResult, row: IndexRow, processed: number) => void;
}

export interface RunSummary {
  accepted: number;
  transcribed: number;
  skipped: number;
  byStatus: Record<FetchStatus, number>;
  rejected: RejectionTally;
  window: { from: Date; to: Date };
  outputDir: string;
  indexPath: string;
}

function emptyStatusCounts(): Record<FetchStatus, number> {
  return {
    transcribed: 0,
    no_english_transcript: 0,
    transcripts_disabled: 0,
    video_unavailable: 0,
    rate_limited_exhausted: 0,
    error: 0,
  };
}

export async function runPipeline(config: RunConfig, deps: PipelineDeps): Promise<RunSummary> {
  const now = deps.now?.() ?? new Date();
  const criteria = criteriaForWindow(config.monthsBack, now, {
    min: config.minDurationSeconds,
    max: config.maxDurationSeconds,
  });
  const writer = deps.writer ?? new OutputWriter(config.outputDir);
  const rejected = emptyTally();
  const byStatus = emptyStatusCounts();

  log.info(
    { from: criteria.publishedAfter.toISOString(), to: criteria.publishedBefore.toISOString() },
    'Listing videos'
  );

  const candidates = enumerateVideos(deps.api, config.target, {
    publishedAfter: criteria.publishedAfter,
    retry: config.retry,
    sleep: deps.sleep,
  });
  const accepted = filterVideos(candidates, criteria, rejected);

  let processed = 0;
  for await (const result of streamVideos(accepted, {
    fetcher: deps.fetcher,
    retry: config.retry,
    pacing: config.pacing,
    sleep: deps.sleep,
    random: deps.random,
  })) {
    const row = await writer.record(result);
    processed++;
    byStatus[result.outcome.status]++;
    deps.onResult?.(result, row, processed);
  }

  const indexPath = await writer.finalize();
  if (!processed) {
    log.info({ rejected }, 'No videos matched the filters');
  }

  return {
    accepted: processed,
    transcribed: byStatus.transcribed,
    skipped: processed - byStatus.transcribed,
    byStatus,
    rejected,
    window: { from: criteria.publishedAfter, to: criteria.publishedBefore },
    outputDir: writer.outputDir,
    indexPath,
  };
}
