/**
 * CSV metadata index
 */

import type { FetchOutcome, IndexRow, VideoCandidate } from '../types';

export const INDEX_COLUMNS: (keyof IndexRow)[] = [
  'video_id',
  'title',
  'published_at',
  'video_url',
  'duration',
  'has_transcript',
  'transcript_path',
];

/**
 * Quote a field when it contains a comma, quote or line break
 */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function formatField(value: IndexRow[keyof IndexRow]): string {
  if (value === null) return '';
  if (typeof value === 'boolean') return value ? 'True' : 'False';
  return escapeCsvField(String(value));
}

export function csvHeader(): string {
  return `${INDEX_COLUMNS.join(',')}\n`;
}

export function formatCsvRow(row: IndexRow): string {
  return `${INDEX_COLUMNS.map((column) => formatField(row[column])).join(',')}\n`;
}

export function toIndexRow(
  video: VideoCandidate,
  outcome: FetchOutcome,
  transcriptPath: string | null
): IndexRow {
  return {
    video_id: video.videoId,
    title: video.title,
    published_at: video.publishedAt.toISOString(),
    video_url: video.videoUrl,
    duration: video.durationSeconds ?? null,
    has_transcript: outcome.status === 'transcribed' && transcriptPath !== null,
    transcript_path: transcriptPath ?? '',
  };
}
