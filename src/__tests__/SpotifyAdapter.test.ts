import { describe, it, expect, vi } from 'vitest';
import { SpotifyAdapter, extractSpotifyTrack } from '../services/providers/SpotifyAdapter';
import type { ProviderAdapter, SearchOptions } from '../services/providers/types';
import { ProviderUnavailable } from '../errors';
import type { TrackCandidate } from '../types/music';
import { createFakeHttp } from './httpFake';
import { makeCandidate } from './fixtures';

const TRACK_URL = 'https://open.spotify.com/track/4iV5W9uYEdYUVa79Axb7Rh';

const TRACK_PAGE = `<html><head>
<meta property="og:type" content="music.song" />
<meta property="og:title" content="Ocean Eyes" />
<meta property="og:description" content="Test Artist · Test Album · Song · 2016" />
<meta name="music:duration" content="200" />
<meta content="https://i.scdn.test/cover.jpg" property="og:image" />
<meta property="og:url" content="${TRACK_URL}" />
</head></html>`;

const options: SearchOptions = { quality: 'high', maxResults: 3 };

function audioSource(results: TrackCandidate[]) {
  const adapter = {
    id: 'youtube' as const,
    search: vi.fn(async (_query: string, _options: SearchOptions) => results),
  };
  return adapter satisfies ProviderAdapter;
}

describe('extractSpotifyTrack', () => {
  it('should read Open Graph tags of a track page', () => {
    expect(extractSpotifyTrack(TRACK_PAGE)).toEqual({
      title: 'Ocean Eyes',
      artist: 'Test Artist',
      album: 'Test Album',
      durationSeconds: 200,
      thumbnail: 'https://i.scdn.test/cover.jpg',
      url: TRACK_URL,
    });
  });

  it('should fall back to embedded entity JSON', () => {
    const html = '<script>{"type":"track","name":"Night &amp; Day","artist":"Someone","duration_ms":201500}</script>';

    expect(extractSpotifyTrack(html)).toEqual({ title: 'Night & Day', artist: 'Someone', durationSeconds: 202 });
  });

  it('should keep out-of-range character references as written', () => {
    const html = '<meta property="og:type" content="music.song"><meta property="og:title" content="Song &#99999999; X">';

    expect(extractSpotifyTrack(html)).toEqual({ title: 'Song &#99999999; X' });
  });

  it('should return null without track data', () => {
    expect(extractSpotifyTrack('<html><body>Nothing</body></html>')).toBeNull();
  });
});

describe('SpotifyAdapter', () => {
  it('should find audio for a track URL and label it as Spotify', async () => {
    const { http } = createFakeHttp(() => ({ data: TRACK_PAGE }));
    const source = audioSource([
      makeCandidate({ title: 'Ocean Eyes (Audio)', durationSeconds: 0, creator: 'Some Uploader' }),
    ]);

    const candidates = await new SpotifyAdapter(http, source).search(TRACK_URL, options);

    expect(source.search).toHaveBeenCalledWith('Ocean Eyes Test Artist', options);
    expect(candidates).toHaveLength(1);
    expect(candidates[0]).toMatchObject({
      title: 'Ocean Eyes (Audio)',
      sourceProvider: 'spotify',
      creator: 'Test Artist',
      thumbnail: 'https://i.scdn.test/cover.jpg',
      durationSeconds: 200,
    });
  });

  it('should search the audio source with the query when the page has no track', async () => {
    const { http, requests } = createFakeHttp(() => ({ data: '<html></html>' }));
    const source = audioSource([makeCandidate({ title: 'Night Drive' })]);

    const candidates = await new SpotifyAdapter(http, source).search('night drive', options);

    expect(requests[0]?.url).toBe('https://open.spotify.com/search/night%20drive');
    expect(source.search).toHaveBeenCalledWith('night drive music', options);
    expect(candidates[0]?.sourceProvider).toBe('spotify');
  });

  it('should widen the audio search when the title and artist find nothing', async () => {
    const { http } = createFakeHttp(() => ({ data: TRACK_PAGE }));
    const source = {
      id: 'youtube' as const,
      search: vi.fn(async (query: string, _options: SearchOptions) =>
        query === 'Ocean Eyes music' ? [makeCandidate({ title: 'Ocean Eyes', creator: 'Some Uploader' })] : []
      ),
    } satisfies ProviderAdapter;

    const candidates = await new SpotifyAdapter(http, source).search(TRACK_URL, options);

    expect(source.search.mock.calls.map(([query]) => query)).toEqual(['Ocean Eyes Test Artist', 'Ocean Eyes music']);
    expect(candidates).toHaveLength(1);
    expect(candidates[0]).toMatchObject({ title: 'Ocean Eyes', sourceProvider: 'spotify', creator: 'Some Uploader' });
  });

  it('should widen a free-text search with the query itself', async () => {
    const { http } = createFakeHttp(() => ({ data: TRACK_PAGE }));
    const source = audioSource([]);

    await expect(new SpotifyAdapter(http, source).search('ocean eyes', options)).resolves.toEqual([]);

    expect(source.search.mock.calls.map(([query]) => query)).toEqual(['Ocean Eyes Test Artist', 'ocean eyes music']);
  });

  it('should find nothing for a track URL without metadata', async () => {
    const { http } = createFakeHttp(() => ({ status: 404, data: 'gone' }));
    const source = audioSource([makeCandidate({ title: 'Night Drive' })]);

    await expect(new SpotifyAdapter(http, source).search(TRACK_URL, options)).resolves.toEqual([]);
    expect(source.search).not.toHaveBeenCalled();
  });

  it('should ignore Spotify URLs that are not tracks', async () => {
    const { http, requests } = createFakeHttp(() => ({ data: TRACK_PAGE }));

    const candidates = await new SpotifyAdapter(http, audioSource([])).search(
      'https://open.spotify.com/album/1A2GTWGtFfWp7KSQTwWOyo',
      options
    );

    expect(candidates).toEqual([]);
    expect(requests).toHaveLength(0);
  });

  it('should report itself unavailable when its audio source is', async () => {
    const { http } = createFakeHttp(() => ({ data: TRACK_PAGE }));
    const source = {
      id: 'youtube' as const,
      search: async (): Promise<TrackCandidate[]> => {
        throw new ProviderUnavailable('youtube', 'connection reset');
      },
    } satisfies ProviderAdapter;

    await expect(new SpotifyAdapter(http, source).search(TRACK_URL, options)).rejects.toMatchObject({
      name: 'ProviderUnavailable',
      provider: 'spotify',
    });
  });
});
