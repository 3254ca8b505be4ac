/**
 * Transcript text files: naming and content
 */

import type { VideoCandidate } from '../types';
import { formatDay } from '../lib/dates';

const MAX_TITLE_LENGTH = 100;

/**
 * Make a title safe for a file name: lowercase, spaces to underscores, only
 * letters, digits, '_' and '-' kept, at most 100 characters
 */
export function sanitizeTitle(title: string): string {
  const cleaned = title
    .toLowerCase()
    .replace(/ /g, '_')
    .replace(/[^\p{L}\p{N}_-]/gu, '');
  return Array.from(cleaned).slice(0, MAX_TITLE_LENGTH).join('');
}

/**
 * YYYY-MM-DD__{videoId}__{sanitized_title}.txt
 */
export function transcriptFilename(video: VideoCandidate): string {
  return `${formatDay(video.publishedAt)}__${video.videoId}__${sanitizeTitle(video.title)}.txt`;
}

export function formatTranscriptFile(video: VideoCandidate, transcript: string): string {
  const duration = video.durationSeconds ?? 'Unknown';
  return [
    `Title: ${video.title}`,
    `Video URL: ${video.videoUrl}`,
    `Published: ${video.publishedAt.toISOString()}`,
    `Duration: ${duration} seconds`,
    '',
    transcript,
  ].join('\n');
}
