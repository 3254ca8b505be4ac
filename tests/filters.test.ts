import { describe, test, expect } from 'vitest';
import {
  checkDuration,
  criteriaForWindow,
  emptyTally,
  evaluateCandidate,
  filterVideos,
} from '../src/lib/filters';
import type { FilterCriteria, PrivacyStatus, VideoCandidate } from '../src/types';

const NOW = new Date('2024-06-15T12:00:00.000Z');

function candidate(overrides: Partial<VideoCandidate> = {}): VideoCandidate {
  const videoId = overrides.videoId ?? 'abcdefghijk';
  return {
    videoId,
    title: 'A video',
    publishedAt: new Date('2024-05-01T00:00:00.000Z'),
    privacyStatus: 'public',
    durationSeconds: 600,
    videoUrl: `https://www.youtube.com/watch?v=${videoId}`,
    ...overrides,
  };
}

async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) items.push(item);
  return items;
}

describe('criteriaForWindow', () => {
  test('spans N calendar months back to now', () => {
    const criteria = criteriaForWindow(3, NOW, { min: 60 });

    expect(criteria.publishedAfter.toISOString()).toBe('2024-03-15T12:00:00.000Z');
    expect(criteria.publishedBefore).toBe(NOW);
    expect(criteria.minDurationSeconds).toBe(60);
    expect(criteria.maxDurationSeconds).toBeUndefined();
  });
});

describe('evaluateCandidate', () => {
  const criteria = criteriaForWindow(3, NOW, { min: 60, max: 3600 });

  test('accepts a public video inside the window and duration range', () => {
    expect(evaluateCandidate(candidate(), criteria)).toEqual({ accepted: true });
  });

  test('window bounds are inclusive', () => {
    expect(evaluateCandidate(candidate({ publishedAt: criteria.publishedAfter }), criteria)).toEqual({
      accepted: true,
    });
    expect(evaluateCandidate(candidate({ publishedAt: NOW }), criteria)).toEqual({ accepted: true });
    expect(
      evaluateCandidate(candidate({ publishedAt: new Date('2024-03-15T11:59:59.999Z') }), criteria)
    ).toEqual({ accepted: false, reason: 'outside_date_range' });
  });

  test('duration bounds are inclusive', () => {
    expect(evaluateCandidate(candidate({ durationSeconds: 60 }), criteria).accepted).toBe(true);
    expect(evaluateCandidate(candidate({ durationSeconds: 3600 }), criteria).accepted).toBe(true);
    expect(evaluateCandidate(candidate({ durationSeconds: 59 }), criteria)).toEqual({
      accepted: false,
      reason: 'too_short',
    });
    expect(evaluateCandidate(candidate({ durationSeconds: 3601 }), criteria)).toEqual({
      accepted: false,
      reason: 'too_long',
    });
  });

  test('reports the first failing predicate: privacy, then date, then duration', () => {
    const old = new Date('2020-01-01T00:00:00.000Z');

    expect(
      evaluateCandidate(candidate({ privacyStatus: 'unlisted', publishedAt: old, durationSeconds: 1 }), criteria)
    ).toEqual({ accepted: false, reason: 'not_public' });
    expect(evaluateCandidate(candidate({ publishedAt: old, durationSeconds: 1 }), criteria)).toEqual({
      accepted: false,
      reason: 'outside_date_range',
    });
  });
});

describe('checkDuration', () => {
  test('ignores a missing duration when no bounds are set', () => {
    const criteria = criteriaForWindow(3, NOW);
    expect(checkDuration(candidate({ durationSeconds: undefined }), criteria)).toBeNull();
  });

  test('rejects a missing duration when a bound is set', () => {
    const criteria = criteriaForWindow(3, NOW, { max: 100 });
    expect(checkDuration(candidate({ durationSeconds: undefined }), criteria)).toBe('unknown_duration');
  });
});

describe('filterVideos', () => {
  test('keeps accepted videos in order and tallies rejections', async () => {
    const criteria = criteriaForWindow(3, NOW, { min: 60 });
    const tally = emptyTally();
    const videos = [
      candidate({ videoId: 'aaaaaaaaaaa' }),
      candidate({ videoId: 'bbbbbbbbbbb', privacyStatus: 'private' }),
      candidate({ videoId: 'ccccccccccc', durationSeconds: 30 }),
      candidate({ videoId: 'ddddddddddd' }),
      candidate({ videoId: 'eeeeeeeeeee', publishedAt: new Date('2023-01-01T00:00:00.000Z') }),
    ];

    const accepted = await collect(filterVideos(videos, criteria, tally));

    expect(accepted.map((v) => v.videoId)).toEqual(['aaaaaaaaaaa', 'ddddddddddd']);
    expect(tally).toEqual({
      not_public: 1,
      outside_date_range: 1,
      too_short: 1,
      too_long: 0,
      unknown_duration: 0,
    });
  });

  test('matches a direct evaluation of every predicate on generated candidates', async () => {
    // mulberry32, seeded so failures are reproducible
    let seed = 42;
    const next = () => {
      seed = (seed + 0x6d2b79f5) | 0;
      let t = Math.imul(seed ^ (seed >>> 15), 1 | seed);
      t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
    const privacies: PrivacyStatus[] = ['public', 'unlisted', 'private'];
    const criteria: FilterCriteria = criteriaForWindow(3, NOW, { min: 120, max: 1800 });
    const span = 200 * 24 * 3600 * 1000;

    const videos = Array.from({ length: 300 }, (_, i) =>
      candidate({
        videoId: `vid${String(i).padStart(8, '0')}`,
        privacyStatus: privacies[Math.floor(next() * privacies.length)],
        publishedAt: new Date(NOW.getTime() - span + Math.floor(next() * (span + 10 * 24 * 3600 * 1000))),
        durationSeconds: next() < 0.1 ? undefined : Math.floor(next() * 2400),
      })
    );

    const expected = videos.filter(
      (v) =>
        v.privacyStatus === 'public' &&
        v.publishedAt.getTime() >= criteria.publishedAfter.getTime() &&
        v.publishedAt.getTime() <= criteria.publishedBefore.getTime() &&
        v.durationSeconds !== undefined &&
        v.durationSeconds >= 120 &&
        v.durationSeconds <= 1800
    );

    const accepted = await collect(filterVideos(videos, criteria));

    expect(accepted).toEqual(expected);
  });
});
