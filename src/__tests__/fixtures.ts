import { PassThrough } from 'stream';
import type { ProviderId, Quality, StreamHandle, Track, TrackCandidate } from '../types/music';
import type { AudioSink, PlaybackTicket } from '../services/SessionEngine';
import type { TrackPreparer } from '../services/StreamPreparer';
import { createTrack } from '../utils/tracks';

export function makeTrack(title: string, provider: ProviderId = 'youtube', quality: Quality = 'high'): Track {
  return createTrack({
    title,
    durationSeconds: 180,
    sourceProvider: provider,
    mediaRef: { kind: 'direct', url: `https://media.test/${encodeURIComponent(title)}.m4a` },
    requestedQuality: quality,
  });
}

export function makeCandidate(overrides: Partial<TrackCandidate> & { title: string }): TrackCandidate {
  return {
    durationSeconds: 200,
    sourceProvider: 'youtube',
    verified: false,
    quality: 'high',
    mediaRefs: [{ kind: 'direct', url: `https://media.test/${encodeURIComponent(overrides.title)}` }],
    variants: [],
    ...overrides,
  };
}

export function makeHandle(track: Track): StreamHandle & { closed: boolean } {
  const stream = new PassThrough();
  const handle = {
    track,
    quality: track.requestedQuality,
    stream,
    closed: false,
    close: () => {
      handle.closed = true;
      stream.destroy();
    },
  };
  return handle;
}

/** Records what the session asks of it; tests settle tickets by hand. */
export class RecordingSink implements AudioSink {
  readonly played: { title: string; ticket: PlaybackTicket }[] = [];
  readonly volumes: number[] = [];
  stops = 0;
  destroyed = false;
  pauseResult = true;

  play(handle: StreamHandle, ticket: PlaybackTicket): void {
    this.played.push({ title: handle.track.title, ticket });
  }

  pause(): boolean {
    return this.pauseResult;
  }

  resume(): boolean {
    return true;
  }

  stop(): void {
    this.stops++;
  }

  setVolume(volume: number): void {
    this.volumes.push(volume);
  }

  destroy(): void {
    this.destroyed = true;
  }

  lastTicket(): PlaybackTicket {
    const last = this.played[this.played.length - 1];
    if (!last) throw new Error('nothing has been played');
    return last.ticket;
  }
}

interface Pending {
  track: Track;
  resolve: (handle: StreamHandle) => void;
  reject: (error: Error) => void;
}

/** Preparations stay pending until the test releases or fails them. */
export class DeferredPreparer implements TrackPreparer {
  readonly pending: Pending[] = [];
  readonly handles: (StreamHandle & { closed: boolean })[] = [];

  prepare(track: Track): Promise<StreamHandle> {
    return new Promise((resolve, reject) => {
      this.pending.push({ track, resolve, reject });
    });
  }

  release(index = 0): void {
    const entry = this.take(index);
    const handle = makeHandle(entry.track);
    this.handles.push(handle);
    entry.resolve(handle);
  }

  fail(index = 0, message = 'stream unavailable'): void {
    this.take(index).reject(new Error(message));
  }

  private take(index: number): Pending {
    const [entry] = this.pending.splice(index, 1);
    if (!entry) throw new Error(`no pending preparation at ${index}`);
    return entry;
  }
}

/** Prepares immediately, failing for titles in `failing`. */
export class ImmediatePreparer implements TrackPreparer {
  readonly prepared: string[] = [];

  constructor(private readonly failing: ReadonlySet<string> = new Set()) {}

  async prepare(track: Track): Promise<StreamHandle> {
    this.prepared.push(track.title);
    if (this.failing.has(track.title)) throw new Error(`cannot open ${track.title}`);
    return makeHandle(track);
  }
}

/** Lets queued promise callbacks run. */
export async function flush(rounds = 10): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}
