/**
 * Candidate filtering: privacy, publication window, duration
 */

import type {
  FilterCriteria,
  FilterVerdict,
  RejectionReason,
  VideoCandidate,
} from '../types';
import { subtractMonths } from './dates';

export type RejectionTally = Record<RejectionReason, number>;

export function emptyTally(): RejectionTally {
  return {
    not_public: 0,
    outside_date_range: 0,
    too_short: 0,
    too_long: 0,
    unknown_duration: 0,
  };
}

/**
 * Build the criteria for "published within the last N calendar months"
 */
export function criteriaForWindow(
  monthsBack: number,
  now: Date,
  duration: { min?: number; max?: number } = {}
): FilterCriteria {
  return {
    publishedAfter: subtractMonths(now, monthsBack),
    publishedBefore: now,
    minDurationSeconds: duration.min,
    maxDurationSeconds: duration.max,
  };
}

export function passesPrivacyFilter(video: VideoCandidate): boolean {
  return video.privacyStatus === 'public';
}

export function passesDateFilter(video: VideoCandidate, criteria: FilterCriteria): boolean {
  const published = video.publishedAt.getTime();
  return (
    published >= criteria.publishedAfter.getTime() &&
    published <= criteria.publishedBefore.getTime()
  );
}

/**
 * Duration check. Returns the rejection reason, or null when the video passes.
 */
export function checkDuration(
  video: VideoCandidate,
  criteria: FilterCriteria
): RejectionReason | null {
  const { minDurationSeconds: min, maxDurationSeconds: max } = criteria;
  if (min === undefined && max === undefined) return null;

  const duration = video.durationSeconds;
  if (duration === undefined) return 'unknown_duration';
  if (min !== undefined && duration < min) return 'too_short';
  if (max !== undefined && duration > max) return 'too_long';
  return null;
}

/**
 * Evaluate the predicates in a fixed order and report the first that fails
 */
export function evaluateCandidate(video: VideoCandidate, criteria: FilterCriteria): FilterVerdict {
  if (!passesPrivacyFilter(video)) {
    return { accepted: false, reason: 'not_public' };
  }
  if (!passesDateFilter(video, criteria)) {
    return { accepted: false, reason: 'outside_date_range' };
  }
  const durationReason = checkDuration(video, criteria);
  if (durationReason) {
    return { accepted: false, reason: durationReason };
  }
  return { accepted: true };
}

export function passesAllFilters(video: VideoCandidate, criteria: FilterCriteria): boolean {
  return evaluateCandidate(video, criteria).accepted;
}

/**
 * Lazily drop rejected candidates, counting them by reason in `tally`
 */
export async function* filterVideos(
  videos: AsyncIterable<VideoCandidate> | Iterable<VideoCandidate>,
  criteria: FilterCriteria,
  tally: RejectionTally = emptyTally()
): AsyncGenerator<VideoCandidate> {
  for await (const video of videos) {
    const verdict = evaluateCandidate(video, criteria);
    if (verdict.accepted) {
      yield video;
    } else {
      tally[verdict.reason]++;
    }
  }
}
