import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { MediaRef, MediaVariant, Quality, TrackCandidate } from '../../types/music';
import { ProviderAdapter, SearchOptions } from './types';
import { fetchJson, fetchText } from './request';
import { detectProvider } from '../../utils/providers';
import { bestQuality, qualityFallbackOrder } from '../../utils/tracks';
import { logDebug, logEvent, logWarning } from '../../utils/logger';

const API_BASE = 'https://api-v2.soundcloud.com';

const TranscodingSchema = z.object({
  url: z.string(),
  preset: z.string().optional(),
  snipped: z.boolean().optional(),
  quality: z.string().optional(),
  format: z.object({
    protocol: z.string(),
    mime_type: z.string().optional(),
  }),
});

const TrackSchema = z.object({
  kind: z.string().optional(),
  title: z.string(),
  duration: z.number().optional(),
  full_duration: z.number().optional(),
  permalink_url: z.string().optional(),
  artwork_url: z.string().nullable().optional(),
  user: z.object({ username: z.string() }).partial().optional(),
  media: z.object({ transcodings: z.array(TranscodingSchema) }).optional(),
});

const SearchResponseSchema = z.object({
  collection: z.array(z.unknown()),
});

const StreamUrlSchema = z.object({ url: z.string() });

type SoundCloudTrack = z.infer<typeof TrackSchema>;
type Transcoding = z.infer<typeof TranscodingSchema>;

export function transcodingQuality(transcoding: Transcoding): Quality {
  return transcoding.quality === 'hq' ? 'high' : 'medium';
}

/** Media segment URIs of an HLS media playlist, resolved against its URL. */
export function parseM3u8Segments(playlist: string, baseUrl: string): string[] {
  const segments: string[] = [];
  for (const raw of playlist.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith('#')) continue;
    try {
      segments.push(new URL(line, baseUrl).toString());
    } catch {
      logWarning('soundcloud_segment_uri_invalid', { line });
    }
  }
  return segments;
}

/**
 * Uses the public api-v2 search and each transcoding's stream-URL
 * endpoint. Needs a client id; without one it finds nothing.
 */
export class SoundCloudAdapter implements ProviderAdapter {
  readonly id = 'soundcloud' as const;

  constructor(
    private readonly http: AxiosInstance,
    private readonly clientId: string | undefined
  ) {}

  async search(query: string, options: SearchOptions): Promise<TrackCandidate[]> {
    const clientId = this.clientId;
    if (!clientId) {
      logDebug('soundcloud_client_id_missing', { query });
      return [];
    }

    const tracks = detectProvider(query) === this.id
      ? await this.resolveUrl(query.trim(), clientId, options.signal)
      : await this.searchTracks(query, clientId, options);

    const candidates: TrackCandidate[] = [];
    for (const track of tracks) {
      if (candidates.length >= options.maxResults) break;
      const candidate = await this.toCandidate(track, clientId, options);
      if (candidate) candidates.push(candidate);
    }

    logEvent('soundcloud_search_completed', { query, resultsCount: candidates.length });
    return candidates;
  }

  private async searchTracks(query: string, clientId: string, options: SearchOptions): Promise<SoundCloudTrack[]> {
    const data = await fetchJson(this.http, this.id, `${API_BASE}/search/tracks`, {
      params: { q: query, client_id: clientId, limit: options.maxResults },
      signal: options.signal,
    });
    const parsed = SearchResponseSchema.safeParse(data);
    if (!parsed.success) {
      if (data !== null) logWarning('soundcloud_search_unparsable', { query });
      return [];
    }
    const tracks: SoundCloudTrack[] = [];
    for (const item of parsed.data.collection) {
      const track = TrackSchema.safeParse(item);
      if (track.success && (track.data.kind === undefined || track.data.kind === 'track')) tracks.push(track.data);
    }
    return tracks;
  }

  private async resolveUrl(url: string, clientId: string, signal?: AbortSignal): Promise<SoundCloudTrack[]> {
    const data = await fetchJson(this.http, this.id, `${API_BASE}/resolve`, {
      params: { url, client_id: clientId },
      signal,
    });
    const parsed = TrackSchema.safeParse(data);
    return parsed.success && (parsed.data.kind === undefined || parsed.data.kind === 'track') ? [parsed.data] : [];
  }

  private async toCandidate(
    track: SoundCloudTrack,
    clientId: string,
    options: SearchOptions
  ): Promise<TrackCandidate | null> {
    const variants: MediaVariant[] = [];
    const playlistUrls = new Map<MediaVariant, string>();

    for (const transcoding of track.media?.transcodings ?? []) {
      if (transcoding.snipped) continue;
      const resolved = await this.variantFor(transcoding, clientId, options.signal);
      if (!resolved) continue;
      variants.push(resolved.variant);
      playlistUrls.set(resolved.variant, resolved.url);
    }

    if (variants.length === 0) {
      logDebug('soundcloud_track_without_streams', { title: track.title });
      return null;
    }

    const mediaRefs: MediaRef[] = [];
    for (const tier of qualityFallbackOrder(options.quality)) {
      for (const variant of variants) {
        const url = playlistUrls.get(variant);
        if (variant.quality === tier && url) mediaRefs.push({ kind: 'direct', url });
      }
    }

    const candidate: TrackCandidate = {
      title: track.title,
      durationSeconds: Math.round((track.full_duration ?? track.duration ?? 0) / 1000),
      sourceProvider: this.id,
      // Stream URLs come from the signed endpoint itself
      verified: true,
      quality: bestQuality(variants, options.quality),
      mediaRefs,
      variants,
    };
    if (track.user?.username) candidate.creator = track.user.username;
    if (track.permalink_url) candidate.pageUrl = track.permalink_url;
    if (track.artwork_url) candidate.thumbnail = track.artwork_url;
    return candidate;
  }

  private async variantFor(
    transcoding: Transcoding,
    clientId: string,
    signal?: AbortSignal
  ): Promise<{ variant: MediaVariant; url: string } | null> {
    const data = await fetchJson(this.http, this.id, transcoding.url, { params: { client_id: clientId }, signal });
    const stream = StreamUrlSchema.safeParse(data);
    if (!stream.success) return null;

    const quality = transcodingQuality(transcoding);
    const mimeType = transcoding.format.mime_type;
    const base = { quality, ...(mimeType ? { mimeType } : {}) };

    if (transcoding.format.protocol === 'progressive') {
      return { variant: { ...base, segments: [stream.data.url] }, url: stream.data.url };
    }
    if (transcoding.format.protocol !== 'hls') return null;

    const playlist = await fetchText(this.http, this.id, stream.data.url, { signal });
    if (!playlist) return null;
    const segments = parseM3u8Segments(playlist, stream.data.url);
    if (segments.length === 0) return null;
    return { variant: { ...base, segments }, url: stream.data.url };
  }
}
