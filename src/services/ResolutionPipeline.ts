import type { MediaRef, PlayerConfig, ProviderId, Quality, Track, TrackCandidate } from '../types/music';
import type { ProviderRegistry } from './providers/types';
import { selectBest } from './candidateScoring';
import { ProviderUnavailable, ResolutionFailed } from '../errors';
import { withTimeout } from '../utils/async';
import { detectProvider } from '../utils/providers';
import { describeTrack, trackFromCandidate } from '../utils/tracks';
import { logDebug, logError, logEvent, logWarning } from '../utils/logger';

export interface MediaVerifier {
  verify(ref: MediaRef): Promise<boolean>;
}

export type PipelineConfig = Pick<
  PlayerConfig,
  | 'providerPriorityOrder'
  | 'resolutionTimeoutMs'
  | 'maxResultsPerProvider'
  | 'resolutionCacheTtlMs'
  | 'defaultQuality'
  | 'scoring'
>;

type CacheEntry = { track: Track; ts: number };

/**
 * Turns a free-text or URL query into a playable Track, trying providers in
 * order until one yields a verified media locator.
 */
export class ResolutionPipeline {
  private readonly cache = new Map<string, CacheEntry>();

  constructor(
    private readonly adapters: ProviderRegistry,
    private readonly verifier: MediaVerifier,
    private readonly config: PipelineConfig,
    private readonly now: () => number = Date.now
  ) {}

  /** Providers in the order `resolve` will try them. */
  tryList(query: string, preferredProvider?: ProviderId): ProviderId[] {
    const preferred = preferredProvider ?? detectProvider(query) ?? undefined;
    const order: ProviderId[] = [];
    if (preferred && this.adapters.has(preferred)) order.push(preferred);
    for (const id of this.config.providerPriorityOrder) {
      if (this.adapters.has(id) && !order.includes(id)) order.push(id);
    }
    return order;
  }

  async resolve(query: string, preferredProvider?: ProviderId, quality: Quality = this.config.defaultQuality): Promise<Track> {
    const trimmed = query.trim();
    if (!trimmed) throw new ResolutionFailed(query, []);

    const key = `${preferredProvider ?? '*'}|${quality}|${trimmed.toLowerCase()}`;
    const cached = this.getCached(key);
    if (cached) {
      logEvent('resolution_cache_hit', { query: trimmed });
      return cached;
    }

    const tried: ProviderId[] = [];
    for (const providerId of this.tryList(trimmed, preferredProvider)) {
      tried.push(providerId);
      const track = await this.tryProvider(providerId, trimmed, quality);
      if (track) {
        this.setCached(key, track);
        logEvent('resolution_succeeded', { query: trimmed, tried, ...describeTrack(track) });
        return track;
      }
    }

    logWarning('resolution_failed', { query: trimmed, tried });
    throw new ResolutionFailed(trimmed, tried);
  }

  private async tryProvider(providerId: ProviderId, query: string, quality: Quality): Promise<Track | null> {
    const adapter = this.adapters.get(providerId);
    if (!adapter) return null;

    let candidates: TrackCandidate[];
    try {
      candidates = await withTimeout(
        (signal) => adapter.search(query, { quality, maxResults: this.config.maxResultsPerProvider, signal }),
        this.config.resolutionTimeoutMs,
        () => new ProviderUnavailable(providerId, `search timed out after ${this.config.resolutionTimeoutMs}ms`)
      );
    } catch (error) {
      if (error instanceof ProviderUnavailable) {
        logWarning('provider_unavailable', { provider: providerId, query, error: error.message });
      } else {
        logError('provider_search_failed', error, { provider: providerId, query });
      }
      return null;
    }

    const best = selectBest(query, candidates, this.config.scoring);
    if (!best) {
      logDebug('provider_no_candidates', { provider: providerId, query });
      return null;
    }

    if (best.verified) {
      const ref = best.mediaRefs.find((r) => r.url.trim() !== '');
      return ref ? trackFromCandidate(best, ref, quality) : null;
    }

    for (const ref of best.mediaRefs) {
      if (await this.verifier.verify(ref)) {
        return trackFromCandidate(best, ref, quality);
      }
    }
    logWarning('provider_candidate_unverifiable', {
      provider: providerId,
      query,
      title: best.title,
      refs: best.mediaRefs.length,
    });
    return null;
  }

  private getCached(key: string): Track | null {
    const entry = this.cache.get(key);
    if (!entry) return null;
    if (this.now() - entry.ts > this.config.resolutionCacheTtlMs) {
      this.cache.delete(key);
      return null;
    }
    return entry.track;
  }

  private setCached(key: string, track: Track): void {
    if (this.config.resolutionCacheTtlMs <= 0) return;
    this.cache.set(key, { track, ts: this.now() });
  }
}
