#!/usr/bin/env node
/**
 * channel-transcripts CLI - English transcripts for a channel or playlist
 */

import 'dotenv/config';
import { createInterface } from 'node:readline/promises';
import { program } from 'commander';
import { version } from '../package.json';
import {
  DEFAULT_OUTPUT_DIR,
  errorMessage,
  extractVideoId,
  fetchVideoInfo,
  getConfigSummary,
  loadRunConfig,
  logger,
  OutputWriter,
  runPipeline,
  YouTubeDataApi,
} from './index';
import type { FetchOutcome, TranscriptResult } from './types';

// ANSI colors
const green = (s: string) => `\x1b[32m${s}\x1b[0m`;
const red = (s: string) => `\x1b[31m${s}\x1b[0m`;
const yellow = (s: string) => `\x1b[33m${s}\x1b[0m`;
const dim = (s: string) => `\x1b[2m${s}\x1b[0m`;

function statusLabel(outcome: FetchOutcome): string {
  switch (outcome.status) {
    case 'transcribed':
      return green('OK');
    case 'no_english_transcript':
    case 'transcripts_disabled':
    case 'video_unavailable':
      return yellow('SKIP');
    default:
      return red('FAIL');
  }
}

function printResult({ video, outcome }: TranscriptResult, processed: number): void {
  const title = video.title.slice(0, 60) || video.videoId;
  const detail = outcome.status === 'transcribed' ? '' : ` ${dim(outcome.error ?? outcome.status)}`;
  console.log(`[${processed}] [${video.videoId}] ${statusLabel(outcome)} ${title}${detail}`);
}

interface FetchCommandOptions {
  channelUrl?: string;
  playlistId?: string;
  monthsBack: string;
  outputDir?: string;
  minDuration?: string;
  maxDuration?: string;
  batchSize: string;
  batchPause: string;
  delay: string;
  maxRetries: string;
  backoff: string;
  jitter: string;
}

async function promptOutputDir(fallback: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(
      `Enter output directory (or press Enter for ${fallback}): `
    );
    return answer.trim() || fallback;
  } finally {
    rl.close();
  }
}

program
  .name('channel-transcripts')
  .description('Fetch English transcripts for recent videos of a YouTube channel or playlist')
  .version(version);

program
  .command('fetch', { isDefault: true })
  .description('Fetch transcripts and write them with an index.csv')
  .option('--channel-url <url>', 'Channel URL, @handle or channel ID')
  .option('--playlist-id <id>', 'Playlist ID or URL')
  .option('-m, --months-back <n>', 'Calendar months to look back', '3')
  .option('-o, --output-dir <dir>', `Output directory (default: prompt, then ${DEFAULT_OUTPUT_DIR})`)
  .option('--min-duration <seconds>', 'Skip videos shorter than this')
  .option('--max-duration <seconds>', 'Skip videos longer than this')
  .option('--batch-size <n>', 'Transcripts per batch', '10')
  .option('--batch-pause <seconds>', 'Pause between batches', '30')
  .option('--delay <seconds>', 'Delay between transcript requests', '2')
  .option('--max-retries <n>', 'Retries for a rate-limited request', '5')
  .option('--backoff <seconds>', 'First backoff wait, doubled on each retry', '5')
  .option('--jitter <ratio>', 'Random extra backoff as a fraction of the wait (0-1)', '0')
  .action(async (options: FetchCommandOptions) => {
    let writer: OutputWriter | undefined;

    try {
      const { channelUrl, playlistId, ...rest } = options;
      const config = loadRunConfig({ ...rest, channel: channelUrl, playlist: playlistId });

      if (!options.outputDir && process.stdin.isTTY) {
        config.outputDir = await promptOutputDir(config.outputDir);
      }
      logger.debug({ config: getConfigSummary(config) }, 'Configuration');

      writer = new OutputWriter(config.outputDir);
      const active = writer;
      process.once('SIGINT', () => {
        console.error(yellow(`\nInterrupted after ${active.rowCount} videos; ${active.indexPath} is incomplete`));
        process.exit(130);
      });

      const source =
        config.target.kind === 'channel'
          ? `channel ${config.target.channel}`
          : `playlist ${config.target.playlist}`;
      console.log(dim(`Fetching videos from ${source}...`));
      console.log(
        dim(
          `  Batch size ${config.pacing.batchSize}, ${config.pacing.interRequestDelayMs / 1000}s between requests, ` +
            `${config.pacing.batchPauseMs / 1000}s between batches\n`
        )
      );

      const summary = await runPipeline(config, {
        api: new YouTubeDataApi(config.apiKey),
        writer,
        onResult: (result, _row, processed) => printResult(result, processed),
      });

      console.log(
        dim(`\nWindow: ${summary.window.from.toISOString()} to ${summary.window.to.toISOString()}`)
      );
      if (!summary.accepted) {
        console.log(yellow('No videos found matching the criteria'));
      }
      console.log(
        `\n${green('Done!')} ${summary.transcribed} transcribed, ${summary.skipped} skipped of ${summary.accepted} videos`
      );
      for (const [status, count] of Object.entries(summary.byStatus)) {
        if (count && status !== 'transcribed') console.log(dim(`  ${status}: ${count}`));
      }
      console.log(`Index: ${summary.indexPath}`);
    } catch (error) {
      console.error(red(`Failed: ${errorMessage(error)}`));
      if (writer?.rowCount) {
        console.error(dim(`${writer.rowCount} videos were recorded in ${writer.indexPath}`));
      }
      process.exit(1);
    }
  });

// Info command
program
  .command('info <video>')
  .description('Show available transcript languages for a video')
  .action(async (video: string) => {
    const videoId = extractVideoId(video);
    if (!videoId) {
      console.error(red(`Invalid video ID or URL: ${video}`));
      process.exit(1);
    }

    try {
      const info = await fetchVideoInfo(videoId);

      if (info.playability !== 'OK') {
        console.log(yellow(`Video unavailable: ${info.reason ?? info.playability}`));
        return;
      }
      if (!info.tracks.length) {
        console.log(yellow('No captions available for this video'));
        return;
      }

      console.log(`Available transcripts for ${info.title ?? videoId}:\n`);
      for (const track of info.tracks) {
        const type = track.kind === 'asr' ? dim('(auto-generated)') : '';
        console.log(`  ${track.languageCode.padEnd(6)} ${track.name ?? ''} ${type}`);
      }
    } catch (error) {
      console.error(red(`Failed: ${errorMessage(error)}`));
      process.exit(1);
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error(red(`Failed: ${errorMessage(error)}`));
  process.exit(1);
});
