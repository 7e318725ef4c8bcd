import type { MediaVariant, Quality, StreamHandle, Track } from '../types/music';
import { SegmentOpener, openSegmentedStream } from './SegmentedStream';
import { StreamUnavailable, errorMessage } from '../errors';
import { qualityFallbackOrder } from '../utils/tracks';
import { describeUrl, logEvent, logWarning } from '../utils/logger';

export interface PageResolver {
  resolve(pageUrl: string, quality: Quality): Promise<MediaVariant[]>;
}

export interface TrackPreparer {
  prepare(track: Track): Promise<StreamHandle>;
}

/** Variants in the order they should be tried for `requested`. */
export function orderVariants(variants: readonly MediaVariant[], requested: Quality): MediaVariant[] {
  const ordered: MediaVariant[] = [];
  for (const tier of qualityFallbackOrder(requested)) {
    for (const variant of variants) {
      if (variant.quality === tier) ordered.push(variant);
    }
  }
  return ordered;
}

/**
 * Opens a Track's audio as a single Readable, walking its quality variants
 * until one starts streaming.
 */
export class StreamPreparer implements TrackPreparer {
  constructor(
    private readonly open: SegmentOpener,
    private readonly pages: PageResolver
  ) {}

  async prepare(track: Track): Promise<StreamHandle> {
    const quality = track.requestedQuality;
    const variants = track.mediaRef.kind === 'page'
      ? await this.pages.resolve(track.mediaRef.url, quality)
      : track.variants.length > 0
        ? track.variants
        : [{ quality, segments: [track.mediaRef.url] }];

    const handle = await this.openFirst(track, orderVariants(variants, quality));
    if (handle) return handle;

    // Direct URLs expire; the page can still yield a fresh one
    if (track.mediaRef.kind === 'direct' && track.pageUrl) {
      logWarning('stream_direct_variants_failed', { title: track.title, page: describeUrl(track.pageUrl) });
      const fresh = await this.pages.resolve(track.pageUrl, quality);
      const retried = await this.openFirst(track, orderVariants(fresh, quality));
      if (retried) return retried;
    }

    throw new StreamUnavailable(`no variant of "${track.title}" could be opened`);
  }

  private async openFirst(track: Track, variants: readonly MediaVariant[]): Promise<StreamHandle | null> {
    for (const variant of variants) {
      const controller = new AbortController();
      try {
        const stream = await openSegmentedStream(variant.segments, this.open, controller);
        logEvent('stream_prepared', {
          title: track.title,
          quality: variant.quality,
          segments: variant.segments.length,
        });
        return {
          track,
          quality: variant.quality,
          ...(variant.mimeType ? { mimeType: variant.mimeType } : {}),
          stream,
          close: () => {
            controller.abort();
            stream.destroy();
          },
        };
      } catch (error) {
        controller.abort();
        logWarning('stream_variant_failed', {
          title: track.title,
          quality: variant.quality,
          error: errorMessage(error),
        });
      }
    }
    return null;
  }
}
