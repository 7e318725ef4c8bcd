import type { ProviderId, Quality, TrackCandidate } from '../../types/music';

export interface SearchOptions {
  quality: Quality;
  maxResults: number;
  signal?: AbortSignal;
}

/**
 * One music source. Implementations return an empty list when nothing usable
 * was found and throw ProviderUnavailable only when the provider could not be
 * reached at all.
 */
export interface ProviderAdapter {
  readonly id: ProviderId;
  search(query: string, options: SearchOptions): Promise<TrackCandidate[]>;
}

export type ProviderRegistry = ReadonlyMap<ProviderId, ProviderAdapter>;

export function createRegistry(adapters: readonly ProviderAdapter[]): ProviderRegistry {
  const registry = new Map<ProviderId, ProviderAdapter>();
  for (const adapter of adapters) registry.set(adapter.id, adapter);
  return registry;
}
