import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readdir, readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { runPipeline } from '../src/lib/pipeline';
import type { RunConfig } from '../src/lib/config';
import { QuotaExhaustedError, TranscriptError } from '../src/lib/errors';
import type { ListedVideo, TranscriptFetcher, VideoListingApi } from '../src/types';

const NOW = new Date('2024-06-15T12:00:00.000Z');
const HEADER = 'video_id,title,published_at,video_url,duration,has_transcript,transcript_path\n';

function listingApi(items: ListedVideo[]): VideoListingApi {
  return {
    resolveChannelId: async () => null,
    listChannelVideos: async () => ({ items }),
    listPlaylistItems: async () => ({ items }),
    getVideoDetails: async () => [],
  };
}

/**
 * Playlist listing that serves the given pages in order, one token per page
 */
function pagedApi(pages: ListedVideo[][]): VideoListingApi {
  const page = (token?: string) => {
    const index = token ? Number.parseInt(token.replace('page-', ''), 10) : 0;
    const nextPageToken = index + 1 < pages.length ? `page-${index + 1}` : undefined;
    return { items: pages[index] ?? [], nextPageToken };
  };
  return {
    ...listingApi([]),
    listPlaylistItems: async (_playlistId, options) => page(options.pageToken),
  };
}

const transcribe: TranscriptFetcher = async (videoId) => ({
  videoId,
  language: 'en',
  isGenerated: false,
  segments: [],
  text: `words of ${videoId}`,
});

async function snapshotDir(dir: string): Promise<Record<string, string>> {
  const files: Record<string, string> = {};
  for (const name of (await readdir(dir)).sort()) {
    files[name] = await readFile(join(dir, name), 'utf-8');
  }
  return files;
}

function item(videoId: string, title: string, day: number, privacyStatus: ListedVideo['privacyStatus'] = 'public'): ListedVideo {
  return {
    videoId,
    title,
    publishedAt: new Date(Date.UTC(2024, 4, day)),
    privacyStatus,
    durationSeconds: 300,
  };
}

describe('runPipeline', () => {
  let outputDir: string;
  let config: RunConfig;

  beforeEach(async () => {
    outputDir = await mkdtemp(join(tmpdir(), 'channel-transcripts-run-'));
    config = {
      target: { kind: 'playlist', playlist: 'PL0123456789abcdef' },
      apiKey: 'test-api-key',
      monthsBack: 3,
      outputDir,
      pacing: { interRequestDelayMs: 100, batchSize: 10, batchPauseMs: 1000 },
      retry: { maxRetries: 5, baseDelayMs: 1000 },
    };
  });

  afterEach(async () => {
    await rm(outputDir, { recursive: true, force: true });
  });

  test('writes transcripts and an index row for every accepted video', async () => {
    let betaCalls = 0;
    const fetcher: TranscriptFetcher = async (videoId) => {
      if (videoId === 'bbbbbbbbbbb') {
        betaCalls++;
        if (betaCalls <= 2) throw new TranscriptError('rate_limited', videoId, 'Too many requests (HTTP 429)');
      }
      if (videoId === 'ccccccccccc') {
        throw new TranscriptError('no_english_transcript', videoId, 'No transcript in en (available: fr)');
      }
      return { videoId, language: 'en', isGenerated: true, segments: [], text: `words of ${videoId}` };
    };
    const slept: number[] = [];
    const processed: number[] = [];

    const summary = await runPipeline(config, {
      api: listingApi([
        item('aaaaaaaaaaa', 'Alpha', 1),
        item('hhhhhhhhhhh', 'Hidden', 2, 'private'),
        item('bbbbbbbbbbb', 'Beta', 2),
        item('ccccccccccc', 'Gamma', 3),
      ]),
      fetcher,
      now: () => NOW,
      sleep: async (ms) => {
        slept.push(ms);
      },
      onResult: (_result, _row, count) => processed.push(count),
    });

    expect(summary).toMatchObject({
      accepted: 3,
      transcribed: 2,
      skipped: 1,
      outputDir,
      indexPath: join(outputDir, 'index.csv'),
    });
    expect(summary.byStatus.no_english_transcript).toBe(1);
    expect(summary.rejected.not_public).toBe(1);
    expect(summary.window.from.toISOString()).toBe('2024-03-15T12:00:00.000Z');
    expect(processed).toEqual([1, 2, 3]);
    expect(slept).toEqual([100, 1000, 2000, 100]);

    expect((await readdir(outputDir)).sort()).toEqual([
      '2024-05-01__aaaaaaaaaaa__alpha.txt',
      '2024-05-02__bbbbbbbbbbb__beta.txt',
      'index.csv',
    ]);
    expect(await readFile(join(outputDir, 'index.csv'), 'utf-8')).toBe(
      HEADER +
        'aaaaaaaaaaa,Alpha,2024-05-01T00:00:00.000Z,https://www.youtube.com/watch?v=aaaaaaaaaaa,300,True,2024-05-01__aaaaaaaaaaa__alpha.txt\n' +
        'bbbbbbbbbbb,Beta,2024-05-02T00:00:00.000Z,https://www.youtube.com/watch?v=bbbbbbbbbbb,300,True,2024-05-02__bbbbbbbbbbb__beta.txt\n' +
        'ccccccccccc,Gamma,2024-05-03T00:00:00.000Z,https://www.youtube.com/watch?v=ccccccccccc,300,False,\n'
    );
    expect(await readFile(join(outputDir, '2024-05-02__bbbbbbbbbbb__beta.txt'), 'utf-8')).toBe(
      'Title: Beta\n' +
        'Video URL: https://www.youtube.com/watch?v=bbbbbbbbbbb\n' +
        'Published: 2024-05-02T00:00:00.000Z\n' +
        'Duration: 300 seconds\n' +
        '\n' +
        'words of bbbbbbbbbbb'
    );
  });

  test('a run with no matching videos writes a header-only index', async () => {
    const fetcher: TranscriptFetcher = async () => {
      throw new Error('should not be called');
    };

    const summary = await runPipeline(config, {
      api: listingApi([item('aaaaaaaaaaa', 'Old', 1)]),
      fetcher,
      now: () => new Date('2025-06-15T12:00:00.000Z'),
      sleep: async () => undefined,
    });

    expect(summary.accepted).toBe(0);
    expect(summary.rejected.outside_date_range).toBe(1);
    expect(await readFile(summary.indexPath, 'utf-8')).toBe(HEADER);
  });

  test('daily quota exhaustion ends the run', async () => {
    const api: VideoListingApi = {
      ...listingApi([]),
      listPlaylistItems: async () => {
        throw new QuotaExhaustedError('YouTube API daily quota exhausted');
      },
    };

    await expect(
      runPipeline(config, { api, now: () => NOW, sleep: async () => undefined })
    ).rejects.toBeInstanceOf(QuotaExhaustedError);
  });

  test('a video listed on two pages is fetched and indexed once', async () => {
    const fetched: string[] = [];
    const fetcher: TranscriptFetcher = async (videoId) => {
      fetched.push(videoId);
      return transcribe(videoId);
    };
    const slept: number[] = [];

    const summary = await runPipeline(config, {
      api: pagedApi([
        [item('aaaaaaaaaaa', 'Alpha', 1), item('bbbbbbbbbbb', 'Beta', 2)],
        [item('bbbbbbbbbbb', 'Beta', 2), item('ccccccccccc', 'Gamma', 3)],
      ]),
      fetcher,
      now: () => NOW,
      sleep: async (ms) => {
        slept.push(ms);
      },
    });

    expect(fetched).toEqual(['aaaaaaaaaaa', 'bbbbbbbbbbb', 'ccccccccccc']);
    expect(slept).toEqual([100, 100]);
    expect(summary.accepted).toBe(3);
    const index = await readFile(summary.indexPath, 'utf-8');
    expect(index.split('\n').filter((line) => line.startsWith('bbbbbbbbbbb,'))).toHaveLength(1);
    expect(index.split('\n')).toHaveLength(5);
  });

  test('a second run over the same upstream writes identical files', async () => {
    const api = pagedApi([
      [item('aaaaaaaaaaa', 'Alpha', 1), item('hhhhhhhhhhh', 'Hidden', 2, 'private')],
      [item('bbbbbbbbbbb', 'Beta', 2), item('ccccccccccc', 'Gamma', 3)],
    ]);
    const fetcher: TranscriptFetcher = async (videoId) => {
      if (videoId === 'ccccccccccc') {
        throw new TranscriptError('transcripts_disabled', videoId, 'Transcripts are disabled');
      }
      return transcribe(videoId);
    };
    const deps = { api, fetcher, now: () => NOW, sleep: async () => undefined };

    await runPipeline(config, deps);
    const first = await snapshotDir(outputDir);
    await runPipeline(config, deps);
    const second = await snapshotDir(outputDir);

    expect(Object.keys(first)).toEqual([
      '2024-05-01__aaaaaaaaaaa__alpha.txt',
      '2024-05-02__bbbbbbbbbbb__beta.txt',
      'index.csv',
    ]);
    expect(second).toEqual(first);
  });

  test('pauses after every full batch and not after the last item', async () => {
    config.pacing = { interRequestDelayMs: 100, batchSize: 2, batchPauseMs: 5000 };
    const slept: number[] = [];

    const summary = await runPipeline(config, {
      api: listingApi([
        item('aaaaaaaaaaa', 'One', 1),
        item('bbbbbbbbbbb', 'Two', 2),
        item('ccccccccccc', 'Three', 3),
        item('ddddddddddd', 'Four', 4),
        item('eeeeeeeeeee', 'Five', 5),
      ]),
      fetcher: transcribe,
      now: () => NOW,
      sleep: async (ms) => {
        slept.push(ms);
      },
    });

    expect(summary.transcribed).toBe(5);
    expect(slept).toEqual([100, 5000, 100, 5000]);
  });
});
