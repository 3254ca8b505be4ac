/**
 * Parse channel and playlist references given on the command line
 */

import type { ChannelRef } from '../types';

const CHANNEL_ID = /^UC[\w-]{22}$/;
const HANDLE = /^@[\w.-]+$/;
const PLAYLIST_ID = /^[\w-]{10,64}$/;

export function isYouTubeHost(hostname: string): boolean {
  return hostname === 'youtube.com' || hostname.endsWith('.youtube.com');
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

function parseUrl(value: string): URL | null {
  try {
    return new URL(value);
  } catch {
    return null;
  }
}

/**
 * Accepts:
 * - https://www.youtube.com/channel/UCxxxx or a bare UCxxxx ID
 * - https://www.youtube.com/@handle or a bare @handle
 * - https://www.youtube.com/c/name
 * - https://www.youtube.com/user/name
 */
export function parseChannelRef(input: string): ChannelRef | null {
  const value = input.trim();
  if (CHANNEL_ID.test(value)) return { kind: 'id', value };
  if (HANDLE.test(value)) return { kind: 'handle', value };

  const url = parseUrl(value);
  if (!url || !isYouTubeHost(url.hostname)) return null;

  const [first, second] = url.pathname.split('/').filter(Boolean).map(decodeSegment);
  if (!first) return null;

  if (first === 'channel' && second) return { kind: 'id', value: second };
  if (first.startsWith('@') && first.length > 1) return { kind: 'handle', value: first };
  if (first === 'c' && second) return { kind: 'custom', value: second };
  if (first === 'user' && second) return { kind: 'user', value: second };
  return null;
}

/**
 * A bare playlist ID, or any YouTube URL carrying a list= parameter
 */
export function parsePlaylistRef(input: string): string | null {
  const value = input.trim();
  if (PLAYLIST_ID.test(value)) return value;

  const url = parseUrl(value);
  if (!url || !isYouTubeHost(url.hostname)) return null;

  const list = url.searchParams.get('list');
  return list && PLAYLIST_ID.test(list) ? list : null;
}

export function videoUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}
