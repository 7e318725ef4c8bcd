import { MediaRef, MediaVariant, Quality, QUALITY_TIERS, Track, TrackCandidate } from '../types/music';

export function qualityRank(q: Quality): number {
  return QUALITY_TIERS.length - QUALITY_TIERS.indexOf(q);
}

/**
 * Tiers to try for a requested quality: the tier itself, then lower tiers
 * (closest first), then higher tiers (closest first).
 */
export function qualityFallbackOrder(requested: Quality): Quality[] {
  const idx = QUALITY_TIERS.indexOf(requested);
  const lower = QUALITY_TIERS.slice(idx + 1);
  const higher = QUALITY_TIERS.slice(0, idx).reverse();
  return [requested, ...lower, ...higher];
}

export function bestQuality(variants: readonly MediaVariant[], fallback: Quality = 'low'): Quality {
  let best: Quality | null = null;
  for (const v of variants) {
    if (best === null || qualityRank(v.quality) > qualityRank(best)) best = v.quality;
  }
  return best ?? fallback;
}

export function qualityFromBitrate(kbps: number): Quality {
  if (kbps >= 128) return 'high';
  if (kbps >= 64) return 'medium';
  return 'low';
}

function cleanDuration(seconds: number): number {
  if (!Number.isFinite(seconds) || seconds < 0) return 0;
  return Math.round(seconds);
}

/**
 * Builds an immutable Track. The media locator must not be empty.
 */
export function createTrack(data: {
  title: string;
  durationSeconds: number;
  sourceProvider: Track['sourceProvider'];
  mediaRef: MediaRef;
  requestedQuality: Quality;
  variants?: readonly MediaVariant[];
  creator?: string | undefined;
  pageUrl?: string | undefined;
  thumbnail?: string | undefined;
}): Track {
  if (!data.mediaRef.url.trim()) {
    throw new Error('Track media locator must not be empty');
  }

  const variants = Object.freeze(
    (data.variants ?? []).map((v) => Object.freeze({ ...v, segments: Object.freeze([...v.segments]) }))
  );

  const track: Track = {
    title: data.title.trim() || 'Unknown title',
    durationSeconds: cleanDuration(data.durationSeconds),
    sourceProvider: data.sourceProvider,
    mediaRef: Object.freeze({ ...data.mediaRef }),
    requestedQuality: data.requestedQuality,
    variants,
    ...(data.creator ? { creator: data.creator } : {}),
    ...(data.pageUrl ? { pageUrl: data.pageUrl } : {}),
    ...(data.thumbnail ? { thumbnail: data.thumbnail } : {}),
  };
  return Object.freeze(track);
}

export function trackFromCandidate(candidate: TrackCandidate, mediaRef: MediaRef, quality: Quality): Track {
  return createTrack({
    title: candidate.title,
    durationSeconds: candidate.durationSeconds,
    sourceProvider: candidate.sourceProvider,
    mediaRef,
    requestedQuality: quality,
    variants: candidate.variants,
    creator: candidate.creator,
    pageUrl: candidate.pageUrl,
    thumbnail: candidate.thumbnail,
  });
}

export function describeTrack(track: Track): Record<string, unknown> {
  return {
    title: track.title,
    provider: track.sourceProvider,
    durationSeconds: track.durationSeconds,
    quality: track.requestedQuality,
  };
}
