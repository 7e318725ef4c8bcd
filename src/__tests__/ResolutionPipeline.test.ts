import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { ResolutionPipeline, type MediaVerifier, type PipelineConfig } from '../services/ResolutionPipeline';
import { createRegistry, type ProviderAdapter, type SearchOptions } from '../services/providers/types';
import { ProviderUnavailable, ResolutionFailed } from '../errors';
import type { MediaRef, ProviderId, TrackCandidate } from '../types/music';
import { makeCandidate } from './fixtures';

type SearchFn = (query: string, options: SearchOptions) => Promise<TrackCandidate[]>;

function fakeAdapter(id: ProviderId, search: SearchFn) {
  const adapter = { id, search: vi.fn(search) };
  return adapter satisfies ProviderAdapter;
}

const config: PipelineConfig = {
  providerPriorityOrder: ['youtube', 'spotify', 'soundcloud'],
  resolutionTimeoutMs: 50,
  maxResultsPerProvider: 3,
  resolutionCacheTtlMs: 60_000,
  defaultQuality: 'high',
  scoring: { titleMatchStep: 0.1 },
};

describe('ResolutionPipeline', () => {
  let verifier: MediaVerifier & { verify: Mock<[MediaRef], Promise<boolean>> };

  beforeEach(() => {
    verifier = { verify: vi.fn<[MediaRef], Promise<boolean>>().mockResolvedValue(true) };
  });

  describe('tryList', () => {
    const pipeline = new ResolutionPipeline(
      createRegistry([
        fakeAdapter('youtube', async () => []),
        fakeAdapter('spotify', async () => []),
        fakeAdapter('soundcloud', async () => []),
      ]),
      { verify: async () => true },
      config
    );

    it('should follow the priority order for free text', () => {
      expect(pipeline.tryList('some song')).toEqual(['youtube', 'spotify', 'soundcloud']);
    });

    it('should put the preferred provider first', () => {
      expect(pipeline.tryList('some song', 'soundcloud')).toEqual(['soundcloud', 'youtube', 'spotify']);
    });

    it('should put the provider owning a URL first', () => {
      expect(pipeline.tryList('https://open.spotify.com/track/abc123')).toEqual(['spotify', 'youtube', 'soundcloud']);
    });

    it('should skip providers without an adapter', () => {
      const partial = new ResolutionPipeline(
        createRegistry([fakeAdapter('soundcloud', async () => [])]),
        { verify: async () => true },
        config
      );

      expect(partial.tryList('some song', 'spotify')).toEqual(['soundcloud']);
    });
  });

  describe('resolve', () => {
    it('should fall back to the next provider when one is unavailable', async () => {
      const youtube = fakeAdapter('youtube', async () => {
        throw new ProviderUnavailable('youtube', 'connection reset');
      });
      const spotify = fakeAdapter('spotify', async () => [
        makeCandidate({ title: 'Night Drive', sourceProvider: 'spotify', verified: true }),
      ]);
      const pipeline = new ResolutionPipeline(createRegistry([youtube, spotify]), verifier, config);

      const track = await pipeline.resolve('night drive');

      expect(track.sourceProvider).toBe('spotify');
      expect(track.title).toBe('Night Drive');
      expect(track.requestedQuality).toBe('high');
      expect(verifier.verify).not.toHaveBeenCalled();
    });

    it('should fall back to the next provider when the best candidate cannot be verified', async () => {
      const youtubeRefs: MediaRef[] = [
        { kind: 'direct', url: 'https://yt.test/night-drive.m4a' },
        { kind: 'page', url: 'https://yt.test/watch?v=night-drive' },
      ];
      const spotifyRef: MediaRef = { kind: 'direct', url: 'https://sp.test/night-drive.m4a' };
      verifier.verify.mockImplementation(async (ref) => ref.url.startsWith('https://sp.test/'));
      const youtube = fakeAdapter('youtube', async () => [makeCandidate({ title: 'Night Drive', mediaRefs: youtubeRefs })]);
      const spotify = fakeAdapter('spotify', async () => [
        makeCandidate({ title: 'Night Drive', sourceProvider: 'spotify', mediaRefs: [spotifyRef] }),
      ]);
      const pipeline = new ResolutionPipeline(createRegistry([youtube, spotify]), verifier, config);

      const track = await pipeline.resolve('night drive');

      expect(track.sourceProvider).toBe('spotify');
      expect(track.mediaRef).toEqual(spotifyRef);
      expect(verifier.verify.mock.calls.map(([ref]) => ref.url)).toEqual([
        'https://yt.test/night-drive.m4a',
        'https://yt.test/watch?v=night-drive',
        'https://sp.test/night-drive.m4a',
      ]);
    });

    it('should pass the quality and result limit to adapters', async () => {
      const youtube = fakeAdapter('youtube', async () => [makeCandidate({ title: 'Night Drive' })]);
      const pipeline = new ResolutionPipeline(createRegistry([youtube]), verifier, config);

      const track = await pipeline.resolve('night drive', undefined, 'low');

      expect(track.requestedQuality).toBe('low');
      expect(youtube.search).toHaveBeenCalledWith(
        'night drive',
        expect.objectContaining({ quality: 'low', maxResults: 3 })
      );
    });

    it('should list every tried provider in order when nothing resolves', async () => {
      verifier.verify.mockResolvedValue(false);
      const pipeline = new ResolutionPipeline(
        createRegistry([
          fakeAdapter('youtube', async () => []),
          fakeAdapter('spotify', async () => {
            throw new Error('unexpected markup');
          }),
          fakeAdapter('soundcloud', async () => [makeCandidate({ title: 'Night Drive', sourceProvider: 'soundcloud' })]),
        ]),
        verifier,
        config
      );

      const error = await pipeline.resolve('  night drive ').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ResolutionFailed);
      expect(error).toMatchObject({ query: 'night drive', triedProviders: ['youtube', 'spotify', 'soundcloud'] });
    });

    it('should move on when a provider search outlives the timeout', async () => {
      const youtube = fakeAdapter('youtube', () => new Promise<TrackCandidate[]>(() => undefined));
      const soundcloud = fakeAdapter('soundcloud', async () => [
        makeCandidate({ title: 'Night Drive', sourceProvider: 'soundcloud' }),
      ]);
      const pipeline = new ResolutionPipeline(createRegistry([youtube, soundcloud]), verifier, config);

      const track = await pipeline.resolve('night drive');

      expect(track.sourceProvider).toBe('soundcloud');
      const signal = youtube.search.mock.calls[0]?.[1].signal;
      expect(signal?.aborted).toBe(true);
    });

    it('should use the first media reference that verifies', async () => {
      const expired: MediaRef = { kind: 'direct', url: 'https://media.test/expired' };
      const page: MediaRef = { kind: 'page', url: 'https://www.youtube.com/watch?v=abcdefghijk' };
      verifier.verify.mockImplementation(async (ref) => ref.kind === 'page');
      const pipeline = new ResolutionPipeline(
        createRegistry([fakeAdapter('youtube', async () => [makeCandidate({ title: 'Night Drive', mediaRefs: [expired, page] })])]),
        verifier,
        config
      );

      const track = await pipeline.resolve('night drive');

      expect(track.mediaRef).toEqual(page);
      expect(verifier.verify).toHaveBeenCalledTimes(2);
    });

    it('should pick the best scored candidate of a provider', async () => {
      const pipeline = new ResolutionPipeline(
        createRegistry([
          fakeAdapter('youtube', async () => [
            makeCandidate({ title: 'Something Else Entirely' }),
            makeCandidate({ title: 'Night Drive', quality: 'medium' }),
          ]),
        ]),
        verifier,
        config
      );

      expect((await pipeline.resolve('night drive')).title).toBe('Night Drive');
    });

    it('should reject an empty query without searching', async () => {
      const youtube = fakeAdapter('youtube', async () => []);
      const pipeline = new ResolutionPipeline(createRegistry([youtube]), verifier, config);

      await expect(pipeline.resolve('   ')).rejects.toMatchObject({ triedProviders: [] });
      expect(youtube.search).not.toHaveBeenCalled();
    });
  });

  describe('cache', () => {
    it('should reuse a resolution until it expires', async () => {
      let now = 1_000;
      const youtube = fakeAdapter('youtube', async () => [makeCandidate({ title: 'Night Drive', verified: true })]);
      const pipeline = new ResolutionPipeline(createRegistry([youtube]), verifier, config, () => now);

      const first = await pipeline.resolve('Night Drive');
      const second = await pipeline.resolve('night drive');
      now += 60_001;
      await pipeline.resolve('night drive');

      expect(second).toBe(first);
      expect(youtube.search).toHaveBeenCalledTimes(2);
    });

    it('should keep separate entries per quality', async () => {
      const youtube = fakeAdapter('youtube', async () => [makeCandidate({ title: 'Night Drive', verified: true })]);
      const pipeline = new ResolutionPipeline(createRegistry([youtube]), verifier, config);

      await pipeline.resolve('night drive', undefined, 'high');
      await pipeline.resolve('night drive', undefined, 'low');

      expect(youtube.search).toHaveBeenCalledTimes(2);
    });

    it('should not cache when the ttl is zero', async () => {
      const youtube = fakeAdapter('youtube', async () => [makeCandidate({ title: 'Night Drive', verified: true })]);
      const pipeline = new ResolutionPipeline(createRegistry([youtube]), verifier, { ...config, resolutionCacheTtlMs: 0 });

      await pipeline.resolve('night drive');
      await pipeline.resolve('night drive');

      expect(youtube.search).toHaveBeenCalledTimes(2);
    });
  });
});
