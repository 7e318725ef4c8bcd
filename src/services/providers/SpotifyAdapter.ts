import type { AxiosInstance } from 'axios';
import type { TrackCandidate } from '../../types/music';
import { ProviderAdapter, SearchOptions } from './types';
import { fetchText } from './request';
import { ProviderUnavailable } from '../../errors';
import { decodeEntities, metaContent } from '../../utils/html';
import { isHttpUrl, isSpotifyTrackUrl } from '../../utils/providers';
import { logEvent, logWarning } from '../../utils/logger';

const SEARCH_URL = 'https://open.spotify.com/search/';

export interface SpotifyTrackInfo {
  title: string;
  artist?: string;
  album?: string;
  durationSeconds?: number;
  thumbnail?: string;
  url?: string;
}

function firstMatch(html: string, pattern: RegExp): string | undefined {
  const value = pattern.exec(html)?.[1];
  return value ? decodeEntities(value) : undefined;
}

/**
 * Title, artist and duration of the first track described by a Spotify page:
 * Open Graph tags on track pages, embedded entity JSON elsewhere.
 */
export function extractSpotifyTrack(html: string): SpotifyTrackInfo | null {
  if (metaContent(html, 'og:type') === 'music.song') {
    const title = metaContent(html, 'og:title');
    if (title) {
      // "Artist · Album · Song · 2019"
      const [artist, album] = (metaContent(html, 'og:description') ?? '').split(' · ').map((s) => s.trim());
      const duration = Number(metaContent(html, 'music:duration'));
      const info: SpotifyTrackInfo = { title };
      if (artist) info.artist = artist;
      if (album) info.album = album;
      if (Number.isFinite(duration) && duration > 0) info.durationSeconds = duration;
      const image = metaContent(html, 'og:image');
      if (image) info.thumbnail = image;
      const url = metaContent(html, 'og:url');
      if (url) info.url = url;
      return info;
    }
  }

  const title = firstMatch(html, /"name":"([^"]+)"/);
  if (!title) return null;
  const info: SpotifyTrackInfo = { title };
  const artist = firstMatch(html, /"artist":"([^"]+)"/);
  if (artist) info.artist = artist;
  const album = firstMatch(html, /"album":"([^"]+)"/);
  if (album) info.album = album;
  const durationMs = Number(firstMatch(html, /"duration_ms":(\d+)/));
  if (Number.isFinite(durationMs) && durationMs > 0) info.durationSeconds = Math.round(durationMs / 1000);
  return info;
}

/**
 * Reads track metadata from Spotify's web pages and finds the audio through
 * the YouTube adapter, relabelling the results as Spotify candidates.
 */
export class SpotifyAdapter implements ProviderAdapter {
  readonly id = 'spotify' as const;

  constructor(
    private readonly http: AxiosInstance,
    private readonly audioSource: ProviderAdapter
  ) {}

  async search(query: string, options: SearchOptions): Promise<TrackCandidate[]> {
    const isTrackUrl = isSpotifyTrackUrl(query);
    if (!isTrackUrl && isHttpUrl(query)) {
      logWarning('spotify_url_not_supported', { query });
      return [];
    }

    const pageUrl = isTrackUrl ? query.trim() : `${SEARCH_URL}${encodeURIComponent(query)}`;
    const html = await fetchText(this.http, this.id, pageUrl, { signal: options.signal });
    const info = html ? extractSpotifyTrack(html) : null;

    if (!info) {
      if (isTrackUrl) return [];
      logEvent('spotify_metadata_missing', { query });
      return this.delegate(`${query} music`, null, options);
    }

    logEvent('spotify_metadata_found', { query, title: info.title, artist: info.artist });
    const audioQuery = info.artist ? `${info.title} ${info.artist}` : info.title;
    const matched = await this.delegate(audioQuery, info, options);
    if (matched.length > 0) return matched;

    // Looser search; its results keep the audio source's own metadata
    const looseQuery = `${isTrackUrl ? info.title : query} music`;
    logEvent('spotify_audio_search_widened', { query, audioQuery, looseQuery });
    return this.delegate(looseQuery, null, options);
  }

  private async delegate(
    audioQuery: string,
    info: SpotifyTrackInfo | null,
    options: SearchOptions
  ): Promise<TrackCandidate[]> {
    let results: TrackCandidate[];
    try {
      results = await this.audioSource.search(audioQuery, options);
    } catch (error) {
      if (error instanceof ProviderUnavailable) {
        throw new ProviderUnavailable(this.id, `audio source ${error.provider} unavailable`, { cause: error });
      }
      throw error;
    }

    return results.map((candidate) => {
      const relabelled: TrackCandidate = { ...candidate, sourceProvider: this.id };
      if (info?.artist) relabelled.creator = info.artist;
      if (info?.thumbnail) relabelled.thumbnail = info.thumbnail;
      if (!relabelled.durationSeconds && info?.durationSeconds) relabelled.durationSeconds = info.durationSeconds;
      return relabelled;
    });
  }
}
