import { createWriteStream } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import { randomUUID } from 'crypto';
import { pipeline } from 'stream/promises';
import type { ProviderId, Quality, Track } from '../types/music';
import type { TrackPreparer } from './StreamPreparer';
import { StreamUnavailable } from '../errors';
import { sanitizeFileName } from '../utils/text';
import { describeTrack } from '../utils/tracks';
import { logError, logEvent } from '../utils/logger';

export interface TrackResolver {
  resolve(query: string, preferredProvider?: ProviderId, quality?: Quality): Promise<Track>;
}

export interface DownloadRequest {
  query: string;
  provider?: ProviderId | undefined;
  quality?: Quality | undefined;
}

export interface DownloadedFile {
  readonly path: string;
  readonly fileName: string;
  readonly track: Track;
  readonly sizeBytes: number;
  /** Removes the file. Safe to call more than once. */
  cleanup(): Promise<void>;
}

const EXTENSIONS: Record<string, string> = {
  'audio/mp4': 'm4a',
  'audio/m4a': 'm4a',
  'audio/mpeg': 'mp3',
  'audio/webm': 'webm',
  'audio/ogg': 'ogg',
  'audio/opus': 'opus',
  'audio/aac': 'aac',
  'audio/flac': 'flac',
  'audio/wav': 'wav',
};

export function extensionFor(mimeType: string | undefined): string {
  if (!mimeType) return 'audio';
  const base = mimeType.split(';')[0]?.trim().toLowerCase() ?? '';
  return EXTENSIONS[base] ?? 'audio';
}

/**
 * Resolves a query and writes its audio to a file under the download
 * directory, outside any playback session.
 */
export class DownloadService {
  constructor(
    private readonly resolver: TrackResolver,
    private readonly preparer: TrackPreparer,
    private readonly downloadPath: string,
    private readonly uniqueId: () => string = randomUUID
  ) {}

  async download(request: DownloadRequest): Promise<DownloadedFile> {
    const track = await this.resolver.resolve(request.query, request.provider, request.quality);
    const handle = await this.preparer.prepare(track);

    const fileName = `${sanitizeFileName(track.title)}-${this.uniqueId().slice(0, 8)}.${extensionFor(handle.mimeType)}`;
    const filePath = path.join(this.downloadPath, fileName);

    try {
      await fs.mkdir(this.downloadPath, { recursive: true });
      await pipeline(handle.stream, createWriteStream(filePath));
      const stats = await fs.stat(filePath);
      if (stats.size === 0) {
        throw new StreamUnavailable(`download of "${track.title}" produced no data`);
      }

      logEvent('download_completed', { ...describeTrack(track), fileName, sizeBytes: stats.size });
      return {
        path: filePath,
        fileName,
        track,
        sizeBytes: stats.size,
        cleanup: async () => {
          await fs.rm(filePath, { force: true });
          logEvent('download_cleaned_up', { fileName });
        },
      };
    } catch (error) {
      handle.close();
      await fs.rm(filePath, { force: true });
      logError('download_failed', error, { ...describeTrack(track), fileName });
      throw error;
    }
  }

  /** Downloads, hands the file to `consume`, and removes it once `consume` settles. */
  async withDownload<T>(request: DownloadRequest, consume: (file: DownloadedFile) => Promise<T>): Promise<T> {
    const file = await this.download(request);
    try {
      return await consume(file);
    } finally {
      // A failed cleanup must not replace the outcome of consume
      await file.cleanup().catch((error: unknown) => {
        logError('download_cleanup_failed', error, { fileName: file.fileName });
      });
    }
  }
}
