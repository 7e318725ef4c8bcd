import type { ProviderId } from './types/music';

export type MusicErrorCode =
  | 'PROVIDER_UNAVAILABLE'
  | 'RESOLUTION_FAILED'
  | 'STREAM_UNAVAILABLE'
  | 'QUEUE_FULL'
  | 'INDEX_OUT_OF_RANGE'
  | 'PLAYLIST_NAME_CONFLICT'
  | 'PLAYLIST_NOT_FOUND'
  | 'PLAYLIST_FULL'
  | 'PLAYBACK_FAILED'
  | 'INVALID_INPUT';

export class MusicError extends Error {
  constructor(
    message: string,
    public readonly code: MusicErrorCode,
    public readonly retryable: boolean = false,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'MusicError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/** Transport-level failure of one provider; the pipeline falls through to the next. */
export class ProviderUnavailable extends MusicError {
  constructor(public readonly provider: ProviderId, reason: string, options?: { cause?: unknown }) {
    super(`Provider ${provider} unavailable: ${reason}`, 'PROVIDER_UNAVAILABLE', true, options);
    this.name = 'ProviderUnavailable';
  }
}

export class ResolutionFailed extends MusicError {
  constructor(public readonly query: string, public readonly triedProviders: readonly ProviderId[]) {
    super(
      `No playable result for "${query}" (tried: ${triedProviders.join(', ') || 'none'})`,
      'RESOLUTION_FAILED'
    );
    this.name = 'ResolutionFailed';
  }
}

export class StreamUnavailable extends MusicError {
  constructor(reason: string, options?: { cause?: unknown }) {
    super(`Stream unavailable: ${reason}`, 'STREAM_UNAVAILABLE', true, options);
    this.name = 'StreamUnavailable';
  }
}

export class QueueFull extends MusicError {
  constructor(public readonly maxSize: number) {
    super(`Queue is full (max ${maxSize} tracks)`, 'QUEUE_FULL');
    this.name = 'QueueFull';
  }
}

export class IndexOutOfRange extends MusicError {
  constructor(public readonly index: number, public readonly length: number) {
    super(`Index ${index} is out of range for ${length} item(s)`, 'INDEX_OUT_OF_RANGE');
    this.name = 'IndexOutOfRange';
  }
}

export class PlaylistNameConflict extends MusicError {
  constructor(public readonly ownerId: string, public readonly playlistName: string) {
    super(`Playlist "${playlistName}" already exists`, 'PLAYLIST_NAME_CONFLICT');
    this.name = 'PlaylistNameConflict';
  }
}

export class PlaylistNotFound extends MusicError {
  constructor(public readonly ownerId: string, public readonly playlistName: string) {
    super(`Playlist "${playlistName}" not found`, 'PLAYLIST_NOT_FOUND');
    this.name = 'PlaylistNotFound';
  }
}

export class PlaylistFull extends MusicError {
  constructor(public readonly playlistName: string, public readonly maxSize: number) {
    super(`Playlist "${playlistName}" is full (max ${maxSize} tracks)`, 'PLAYLIST_FULL');
    this.name = 'PlaylistFull';
  }
}

export class PlaybackFailed extends MusicError {
  constructor(reason: string, public readonly attempts: number) {
    super(`Playback failed after ${attempts} attempt(s): ${reason}`, 'PLAYBACK_FAILED');
    this.name = 'PlaybackFailed';
  }
}

export class InvalidInput extends MusicError {
  constructor(message: string) {
    super(message, 'INVALID_INPUT');
    this.name = 'InvalidInput';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
