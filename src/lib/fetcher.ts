/**
 * Transcript retrieval over YouTube's player endpoint and timed-text tracks
 */

import type { CaptionTrack, FetchOptions, Transcript, TranscriptSegment } from '../types';
import { TranscriptError } from './errors';

const PLAYER_URL = 'https://www.youtube.com/youtubei/v1/player?prettyPrint=false';
const CLIENT_CONTEXT = {
  client: { clientName: 'WEB', clientVersion: '2.20240101.00.00', hl: 'en' },
};
const DEFAULT_LANGUAGES = ['en'];
const VIDEO_ID = /^[A-Za-z0-9_-]{11}$/;

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function getString(source: JsonObject, key: string): string | undefined {
  const value = source[key];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Extract an 11-character video ID from an ID or any common YouTube URL
 */
export function extractVideoId(input: string): string | null {
  const value = input.trim();
  if (VIDEO_ID.test(value)) return value;

  let url: URL;
  try {
    url = new URL(value);
  } catch {
    return null;
  }

  let candidate: string | null = null;
  if (url.hostname === 'youtu.be') {
    candidate = url.pathname.split('/')[1] ?? null;
  } else if (url.hostname === 'youtube.com' || url.hostname.endsWith('.youtube.com')) {
    candidate = url.searchParams.get('v');
    if (!candidate) {
      const match = /^\/(?:shorts|embed|live|v)\/([^/?#]+)/.exec(url.pathname);
      candidate = match ? match[1] : null;
    }
  }

  return candidate && VIDEO_ID.test(candidate) ? candidate : null;
}

export interface VideoInfo {
  videoId: string;
  title?: string;
  playability: string;
  reason?: string;
  tracks: CaptionTrack[];
}

function trackName(track: JsonObject): string | undefined {
  const name = track.name;
  if (!isObject(name)) return undefined;
  const simple = getString(name, 'simpleText');
  if (simple) return simple;
  const runs = name.runs;
  if (!Array.isArray(runs)) return undefined;
  return runs
    .map((run) => (isObject(run) ? getString(run, 'text') ?? '' : ''))
    .join('');
}

/**
 * Read the caption track list out of a player response
 */
export function parseCaptionTracks(player: unknown): CaptionTrack[] {
  if (!isObject(player)) return [];
  const captions = player.captions;
  const renderer = isObject(captions) ? captions.playerCaptionsTracklistRenderer : undefined;
  const captionTracks = isObject(renderer) ? renderer.captionTracks : undefined;
  if (!Array.isArray(captionTracks)) return [];

  const tracks: CaptionTrack[] = [];
  for (const raw of captionTracks) {
    if (!isObject(raw)) continue;
    const baseUrl = getString(raw, 'baseUrl');
    const languageCode = getString(raw, 'languageCode');
    if (!baseUrl || !languageCode) continue;
    tracks.push({ baseUrl, languageCode, name: trackName(raw), kind: getString(raw, 'kind') });
  }
  return tracks;
}

/**
 * Pick the best track for the preferred languages: exact code before regional
 * variant (en before en-GB), human-made before auto-generated
 */
export function selectTrack(tracks: CaptionTrack[], languages: string[]): CaptionTrack | null {
  for (const language of languages) {
    const code = language.toLowerCase();
    const matching = [
      ...tracks.filter((t) => t.languageCode.toLowerCase() === code),
      ...tracks.filter((t) => t.languageCode.toLowerCase().startsWith(`${code}-`)),
    ];
    const manual = matching.find((t) => t.kind !== 'asr');
    const chosen = manual ?? matching[0];
    if (chosen) return chosen;
  }
  return null;
}

const ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (entity, body: string) => {
    if (body[0] === '#') {
      const code =
        body[1] === 'x' || body[1] === 'X'
          ? Number.parseInt(body.slice(2), 16)
          : Number.parseInt(body.slice(1), 10);
      return Number.isInteger(code) && code <= 0x10ffff ? String.fromCodePoint(code) : entity;
    }
    return ENTITIES[body.toLowerCase()] ?? entity;
  });
}

function attribute(attrs: string, name: string): number {
  const match = new RegExp(`\\b${name}="([\\d.]+)"`).exec(attrs);
  return match ? Number.parseFloat(match[1]) : 0;
}

function cleanText(raw: string): string {
  // Timed text is entity-encoded twice: once by the XML, once inside it
  const stripped = raw.replace(/<[^>]+>/g, '');
  return decodeEntities(decodeEntities(stripped)).replace(/\s+/g, ' ').trim();
}

/**
 * Parse timed-text XML, either the classic <text start dur> form or the
 * srv3 <p t d> form (milliseconds)
 */
export function parseTranscriptXml(xml: string): TranscriptSegment[] {
  const segments: TranscriptSegment[] = [];

  for (const match of xml.matchAll(/<text\b([^>]*)>([\s\S]*?)<\/text>/g)) {
    const text = cleanText(match[2]);
    if (!text) continue;
    segments.push({ text, start: attribute(match[1], 'start'), duration: attribute(match[1], 'dur') });
  }
  if (segments.length) return segments;

  for (const match of xml.matchAll(/<p\b([^>]*)>([\s\S]*?)<\/p>/g)) {
    const text = cleanText(match[2]);
    if (!text) continue;
    segments.push({
      text,
      start: attribute(match[1], 't') / 1000,
      duration: attribute(match[1], 'd') / 1000,
    });
  }
  return segments;
}

async function request(
  videoId: string,
  doFetch: typeof fetch,
  url: string,
  init?: RequestInit
): Promise<Response> {
  let response: Response;
  try {
    response = await doFetch(url, init);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new TranscriptError('request_failed', videoId, `Request failed: ${message}`, {
      cause: error,
    });
  }

  if (response.status === 429) {
    throw new TranscriptError('rate_limited', videoId, 'Too many requests (HTTP 429)');
  }
  if (!response.ok) {
    throw new TranscriptError('request_failed', videoId, `HTTP ${response.status}`);
  }
  return response;
}

/**
 * Fetch the player response and list the caption tracks of a video
 */
export async function fetchVideoInfo(
  videoId: string,
  options: FetchOptions = {}
): Promise<VideoInfo> {
  const doFetch = options.fetch ?? fetch;
  const response = await request(videoId, doFetch, PLAYER_URL, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({ context: CLIENT_CONTEXT, videoId }),
  });

  let player: unknown;
  try {
    player = await response.json();
  } catch (error) {
    throw new TranscriptError('request_failed', videoId, 'Malformed player response', {
      cause: error,
    });
  }
  if (!isObject(player)) {
    throw new TranscriptError('request_failed', videoId, 'Malformed player response');
  }

  const { playabilityStatus, videoDetails } = player;
  const playability = isObject(playabilityStatus) ? playabilityStatus : {};
  const details = isObject(videoDetails) ? videoDetails : {};

  return {
    videoId,
    title: getString(details, 'title'),
    playability: getString(playability, 'status') ?? 'OK',
    reason: getString(playability, 'reason'),
    tracks: parseCaptionTracks(player),
  };
}

function assertPlayable(info: VideoInfo): void {
  if (info.playability === 'OK') return;

  const reason = info.reason ?? info.playability;
  if (/not a bot/i.test(reason)) {
    throw new TranscriptError('rate_limited', info.videoId, `Request blocked: ${reason}`);
  }
  throw new TranscriptError('video_unavailable', info.videoId, `Video unavailable: ${reason}`);
}

/**
 * Fetch a transcript in one of the preferred languages (English by default)
 *
 * @throws TranscriptError
 */
export async function fetchTranscript(
  videoId: string,
  options: FetchOptions = {}
): Promise<Transcript> {
  const languages = options.languages?.length ? options.languages : DEFAULT_LANGUAGES;
  const doFetch = options.fetch ?? fetch;

  const info = await fetchVideoInfo(videoId, options);
  assertPlayable(info);

  if (!info.tracks.length) {
    throw new TranscriptError('transcripts_disabled', videoId, 'Transcripts are disabled');
  }

  const track = selectTrack(info.tracks, languages);
  if (!track) {
    const available = info.tracks.map((t) => t.languageCode).join(', ');
    throw new TranscriptError(
      'no_english_transcript',
      videoId,
      `No transcript in ${languages.join(', ')} (available: ${available})`
    );
  }

  const trackUrl = new URL(track.baseUrl);
  trackUrl.searchParams.delete('fmt');
  const response = await request(videoId, doFetch, trackUrl.toString());
  const segments = parseTranscriptXml(await response.text());

  if (!segments.length) {
    throw new TranscriptError('request_failed', videoId, 'Transcript track was empty');
  }

  return {
    videoId,
    language: track.languageCode,
    isGenerated: track.kind === 'asr',
    segments,
    text: segments.map((s) => s.text).join(' '),
  };
}
