import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { MediaRef, MediaVariant, Quality, TrackCandidate } from '../../types/music';
import { ProviderAdapter, SearchOptions } from './types';
import { fetchText } from './request';
import { extractJsonObject } from '../../utils/html';
import { extractYouTubeVideoId } from '../../utils/providers';
import { normalizeTitle } from '../../utils/text';
import { bestQuality, qualityFallbackOrder, qualityFromBitrate } from '../../utils/tracks';
import { logDebug, logEvent, logWarning } from '../../utils/logger';

const RESULTS_URL = 'https://www.youtube.com/results';
const WATCH_URL = 'https://www.youtube.com/watch';
const VIDEO_ID_PATTERN = /"videoId":"([a-zA-Z0-9_-]{11})"/g;

const AdaptiveFormatSchema = z.object({
  mimeType: z.string(),
  url: z.string().optional(),
  bitrate: z.number().optional(),
  averageBitrate: z.number().optional(),
});

const PlayerResponseSchema = z.object({
  playabilityStatus: z.object({ status: z.string().optional() }).optional(),
  videoDetails: z.object({
    videoId: z.string(),
    title: z.string(),
    lengthSeconds: z.string().optional(),
    author: z.string().optional(),
    isLiveContent: z.boolean().optional(),
    thumbnail: z.object({ thumbnails: z.array(z.object({ url: z.string() })) }).optional(),
  }),
  streamingData: z
    .object({
      adaptiveFormats: z.array(AdaptiveFormatSchema).optional(),
    })
    .optional(),
});

type PlayerResponse = z.infer<typeof PlayerResponseSchema>;

export function watchUrl(videoId: string): string {
  return `${WATCH_URL}?v=${videoId}`;
}

/** Video ids in first-seen order. */
export function extractVideoIds(html: string): string[] {
  const ids: string[] = [];
  for (const match of html.matchAll(VIDEO_ID_PATTERN)) {
    const id = match[1];
    if (id && !ids.includes(id)) ids.push(id);
  }
  return ids;
}

/** Direct audio formats of a player response, highest bitrate first. */
export function audioVariants(player: PlayerResponse): MediaVariant[] {
  const formats = player.streamingData?.adaptiveFormats ?? [];
  const variants: MediaVariant[] = [];
  for (const format of formats) {
    if (!format.mimeType.startsWith('audio/') || !format.url) continue;
    const bitrateKbps = Math.round((format.averageBitrate ?? format.bitrate ?? 0) / 1000);
    variants.push({
      quality: qualityFromBitrate(bitrateKbps),
      segments: [format.url],
      mimeType: format.mimeType,
      bitrateKbps,
    });
  }
  return variants.sort((a, b) => (b.bitrateKbps ?? 0) - (a.bitrateKbps ?? 0));
}

function orderedRefs(variants: readonly MediaVariant[], requested: Quality, pageUrl: string): MediaRef[] {
  const refs: MediaRef[] = [];
  for (const tier of qualityFallbackOrder(requested)) {
    for (const variant of variants) {
      const first = variant.segments[0];
      if (variant.quality === tier && first) refs.push({ kind: 'direct', url: first });
    }
  }
  // yt-dlp can still resolve the page when every direct URL is rejected
  refs.push({ kind: 'page', url: pageUrl });
  return refs;
}

export function candidateFromPlayerResponse(player: PlayerResponse, requested: Quality): TrackCandidate {
  const details = player.videoDetails;
  const pageUrl = watchUrl(details.videoId);
  const variants = audioVariants(player);
  const length = Number.parseInt(details.lengthSeconds ?? '0', 10);
  const thumbnails = details.thumbnail?.thumbnails ?? [];
  const thumbnail = thumbnails[thumbnails.length - 1]?.url;

  const candidate: TrackCandidate = {
    title: normalizeTitle(details.title) || details.title,
    durationSeconds: details.isLiveContent || !Number.isFinite(length) ? 0 : length,
    sourceProvider: 'youtube',
    verified: false,
    quality: bestQuality(variants, requested),
    mediaRefs: orderedRefs(variants, requested, pageUrl),
    variants,
    pageUrl,
  };
  if (details.author) candidate.creator = details.author;
  if (thumbnail) candidate.thumbnail = thumbnail;
  return candidate;
}

/**
 * Scrapes the results page for video ids, then reads the player
 * response embedded in each watch page for its audio formats.
 */
export class YouTubeAdapter implements ProviderAdapter {
  readonly id = 'youtube' as const;

  constructor(private readonly http: AxiosInstance) {}

  async search(query: string, options: SearchOptions): Promise<TrackCandidate[]> {
    const directId = extractYouTubeVideoId(query);
    const ids = directId ? [directId] : await this.searchVideoIds(query, options.signal);

    const candidates: TrackCandidate[] = [];
    for (const id of ids) {
      if (candidates.length >= options.maxResults) break;
      const candidate = await this.inspect(id, options.quality, options.signal);
      if (candidate) candidates.push(candidate);
    }

    logEvent('youtube_search_completed', { query, resultsCount: candidates.length });
    return candidates;
  }

  private async searchVideoIds(query: string, signal?: AbortSignal): Promise<string[]> {
    const html = await fetchText(this.http, this.id, RESULTS_URL, { params: { search_query: query }, signal });
    if (!html) return [];
    const ids = extractVideoIds(html);
    logDebug('youtube_results_parsed', { query, ids: ids.length });
    return ids;
  }

  private async inspect(videoId: string, quality: Quality, signal?: AbortSignal): Promise<TrackCandidate | null> {
    const html = await fetchText(this.http, this.id, WATCH_URL, { params: { v: videoId }, signal });
    if (!html) return null;

    const parsed = PlayerResponseSchema.safeParse(extractJsonObject(html, 'ytInitialPlayerResponse'));
    if (!parsed.success) {
      logWarning('youtube_player_response_unparsable', { videoId });
      return null;
    }
    const status = parsed.data.playabilityStatus?.status;
    if (status && status !== 'OK') {
      logWarning('youtube_video_unplayable', { videoId, status });
      return null;
    }
    return candidateFromPlayerResponse(parsed.data, quality);
  }
}
