import { EventEmitter } from 'eventemitter3';
import type { LoopMode, SessionSnapshot, SessionStatus, StreamHandle, Track } from '../types/music';
import type { TrackPreparer } from './StreamPreparer';
import { RandomSource, TrackQueue } from './TrackQueue';
import { IndexOutOfRange, InvalidInput, PlaybackFailed, errorMessage } from '../errors';
import { Mutex } from '../utils/mutex';
import { describeTrack } from '../utils/tracks';
import { logDebug, logError, logEvent, logWarning } from '../utils/logger';

/**
 * Handed to the sink with each stream. Only the first call counts; calls for
 * a stream the session has already moved past are ignored.
 */
export interface PlaybackTicket {
  readonly generation: number;
  finished(): void;
  failed(error: unknown): void;
}

export interface AudioSink {
  play(handle: StreamHandle, ticket: PlaybackTicket): void;
  pause(): boolean;
  resume(): boolean;
  stop(): void;
  /** 0..1, for the current stream and every later one. */
  setVolume(volume: number): void;
  destroy(): void;
}

export type CompletionMessage =
  | { generation: number; outcome: 'finished' }
  | { generation: number; outcome: 'failed'; error: unknown };

export interface SessionEvents {
  nowPlaying: (track: Track) => void;
  trackError: (track: Track, reason: string) => void;
  queueExhausted: () => void;
  playbackFailed: (reason: string) => void;
}

export interface SessionOptions {
  maxQueueSize: number;
  retryBudget: number;
  // 0..1, defaults to full volume
  volume?: number;
  random?: RandomSource;
}

/** Counters a caller captures before slow work and hands back to have stale results dropped. */
export interface SessionMarks {
  // Bumped by stop(), clear() and dispose()
  epoch: number;
  // Bumped by skip(), stop(), play(index) and dispose()
  interrupts: number;
}

export interface EnqueueOptions {
  position?: number | undefined;
  expect?: Partial<SessionMarks> | undefined;
}

/**
 * Playback state machine of one guild: idle -> playing <-> paused -> idle,
 * with error while a failed track is being retried.
 *
 * State changes run as synchronous tasks on the session lock, in call order.
 * Stream preparation runs outside the lock and is tagged with the playback
 * generation it was started for; a result for an older generation is closed
 * and dropped.
 */
export class SessionEngine extends EventEmitter<SessionEvents> {
  private readonly queue: TrackQueue;
  private readonly lock = new Mutex();
  private status: SessionStatus = 'idle';
  private current: StreamHandle | null = null;
  private playingTrack: Track | null = null;
  private preparing = false;
  private generation = 0;
  private epoch = 0;
  private interrupts = 0;
  private disposed = false;
  private volume: number;

  constructor(
    readonly guildId: string,
    private readonly sink: AudioSink,
    private readonly preparer: TrackPreparer,
    private readonly options: SessionOptions
  ) {
    super();
    this.queue = new TrackQueue(options.maxQueueSize, options.random);
    this.volume = clampVolume(options.volume ?? 1);
    this.callSink('setVolume', () => this.sink.setVolume(this.volume));
  }

  getStatus(): SessionStatus {
    return this.status;
  }

  isPreparing(): boolean {
    return this.preparing;
  }

  /** True while a track plays, is paused or is being prepared. */
  isActive(): boolean {
    return this.status === 'playing' || this.status === 'paused' || this.preparing;
  }

  nowPlaying(): Track | null {
    return this.playingTrack;
  }

  marks(): SessionMarks {
    return { epoch: this.epoch, interrupts: this.interrupts };
  }

  snapshot(): SessionSnapshot {
    return {
      guildId: this.guildId,
      status: this.status,
      nowPlaying: this.playingTrack,
      preparing: this.preparing,
      volume: this.volume,
      ...this.queue.snapshot(),
    };
  }

  /**
   * Starts playback. Without an index this is a no-op while something plays
   * or is being prepared; with one it jumps there from any state.
   * Resolves true once a track is playing.
   */
  async play(index?: number): Promise<boolean> {
    const generation = await this.lock.run(() => {
      if (this.disposed) return null;

      if (index === undefined) {
        if (this.isActive()) return null;
        if (!this.queue.start()) {
          this.exhausted();
          return null;
        }
      } else {
        if (!Number.isInteger(index) || index < 0 || index >= this.queue.length) {
          throw new IndexOutOfRange(index, this.queue.length);
        }
        this.interrupts++;
        this.teardown();
        this.queue.jumpTo(index);
      }
      this.generation++;
      return this.beginPreparing();
    });

    return generation === null ? false : this.runPlayback(generation);
  }

  async pause(): Promise<boolean> {
    return this.lock.run(() => {
      if (this.status !== 'playing') return false;
      if (!this.callSink('pause', () => this.sink.pause())) return false;
      this.status = 'paused';
      logEvent('session_paused', { guildId: this.guildId });
      return true;
    });
  }

  async resume(): Promise<boolean> {
    return this.lock.run(() => {
      if (this.status !== 'paused') return false;
      if (!this.callSink('resume', () => this.sink.resume())) return false;
      this.status = 'playing';
      logEvent('session_resumed', { guildId: this.guildId });
      return true;
    });
  }

  /** Moves past the current (or preparing) track. No-op when idle. */
  async skip(): Promise<boolean> {
    const generation = await this.lock.run(() => {
      if (this.disposed || !this.isActive()) return undefined;
      this.interrupts++;
      logEvent('session_skip', { guildId: this.guildId, title: this.playingTrack?.title });
      return this.moveToNext();
    });

    if (generation === undefined) return false;
    if (generation !== null) await this.runPlayback(generation);
    return true;
  }

  async stop(): Promise<void> {
    await this.lock.run(() => {
      this.generation++;
      this.epoch++;
      this.interrupts++;
      this.teardown();
      this.preparing = false;
      this.status = 'idle';
      const removed = this.queue.clear();
      logEvent('session_stopped', { guildId: this.guildId, removed });
    });
  }

  /** Applies a sink completion. Stale or unexpected messages are ignored. */
  async deliver(message: CompletionMessage): Promise<void> {
    const generation = await this.lock.run(() => {
      if (message.generation !== this.generation || this.status !== 'playing') {
        logDebug('session_completion_ignored', {
          guildId: this.guildId,
          generation: message.generation,
          current: this.generation,
          status: this.status,
        });
        return null;
      }

      const track = this.playingTrack;
      if (message.outcome === 'failed' && track) {
        const reason = errorMessage(message.error);
        logWarning('session_stream_failed', { guildId: this.guildId, ...describeTrack(track), error: reason });
        this.notify(() => this.emit('trackError', track, reason));
      }
      return this.moveToNext();
    });

    if (generation !== null) await this.runPlayback(generation);
  }

  /** Index the track landed at, or null when `expect` no longer matches or the session is gone. */
  async enqueue(track: Track, options: EnqueueOptions = {}): Promise<number | null> {
    return this.lock.run(() => {
      if (this.disposed || !this.matches(options.expect)) {
        logDebug('session_enqueue_discarded', { guildId: this.guildId, title: track.title });
        return null;
      }
      return this.queue.enqueue(track, options.position);
    });
  }

  /** Appends all tracks or none. Index of the first, or null when `expect` no longer matches. */
  async enqueueMany(tracks: readonly Track[], expect?: Partial<SessionMarks>): Promise<number | null> {
    return this.lock.run(() => (!this.disposed && this.matches(expect) ? this.queue.enqueueMany(tracks) : null));
  }

  /** Removing the playing item leaves its stream playing. */
  async removeAt(index: number): Promise<Track> {
    return this.lock.run(() => this.queue.removeAt(index));
  }

  async reorder(fromIndex: number, toIndex: number): Promise<void> {
    await this.lock.run(() => this.queue.reorder(fromIndex, toIndex));
  }

  /** Empties the queue; the current stream keeps playing. */
  async clear(): Promise<number> {
    return this.lock.run(() => {
      this.epoch++;
      return this.queue.clear();
    });
  }

  async setLoopMode(mode: LoopMode): Promise<void> {
    await this.lock.run(() => this.queue.setLoopMode(mode));
  }

  async setShuffle(enabled: boolean): Promise<void> {
    await this.lock.run(() => this.queue.setShuffle(enabled));
  }

  /** Clamps to 0..1 and resolves the volume now in effect. */
  async setVolume(volume: number): Promise<number> {
    if (!Number.isFinite(volume)) throw new InvalidInput(`Volume must be a number, got ${volume}`);
    return this.lock.run(() => {
      if (this.disposed) return this.volume;
      this.volume = clampVolume(volume);
      this.callSink('setVolume', () => this.sink.setVolume(this.volume));
      logEvent('session_volume_changed', { guildId: this.guildId, volume: this.volume });
      return this.volume;
    });
  }

  async dispose(): Promise<void> {
    await this.lock.run(() => {
      if (this.disposed) return;
      this.disposed = true;
      this.generation++;
      this.epoch++;
      this.interrupts++;
      this.teardown();
      this.preparing = false;
      this.status = 'idle';
      this.callSink('destroy', () => this.sink.destroy());
      logEvent('session_disposed', { guildId: this.guildId });
    });
    this.removeAllListeners();
  }

  private matches(expect: Partial<SessionMarks> | undefined): boolean {
    if (!expect) return true;
    if (expect.epoch !== undefined && expect.epoch !== this.epoch) return false;
    if (expect.interrupts !== undefined && expect.interrupts !== this.interrupts) return false;
    return true;
  }

  // Lock held. Tears down the current stream and advances; returns the
  // generation to prepare, or null when the queue ran out.
  private moveToNext(): number | null {
    this.generation++;
    this.teardown();
    if (!this.queue.advance()) {
      this.exhausted();
      return null;
    }
    return this.beginPreparing();
  }

  private beginPreparing(): number {
    this.preparing = true;
    return this.generation;
  }

  private exhausted(): void {
    this.preparing = false;
    this.status = 'idle';
    logEvent('session_queue_exhausted', { guildId: this.guildId });
    this.notify(() => this.emit('queueExhausted'));
  }

  private teardown(): void {
    const handle = this.current;
    this.current = null;
    this.playingTrack = null;
    this.status = 'idle';
    if (!handle) return;
    this.callSink('stop', () => this.sink.stop());
    handle.close();
  }

  /**
   * Prepares the cursor track for `generation`, advancing past tracks that
   * fail until one plays, the queue runs out or the retry budget is spent.
   */
  private async runPlayback(generation: number): Promise<boolean> {
    let failures = 0;

    for (;;) {
      const track = await this.lock.run(() => (generation === this.generation ? this.queue.current() : null));
      if (!track) return false;

      let handle: StreamHandle;
      try {
        handle = await this.preparer.prepare(track);
      } catch (error) {
        const reason = errorMessage(error);
        failures++;
        const retry = await this.lock.run(() => this.afterFailure(generation, track, reason, failures));
        if (!retry) return false;
        continue;
      }

      const started = await this.lock.run(() => this.start(generation, track, handle));
      if (!started) {
        logDebug('session_stale_stream_closed', { guildId: this.guildId, title: track.title });
        handle.close();
      }
      return started;
    }
  }

  // Lock held. True when the next cursor item should be tried.
  private afterFailure(generation: number, track: Track, reason: string, failures: number): boolean {
    if (generation !== this.generation) return false;

    logWarning('session_track_failed', { guildId: this.guildId, ...describeTrack(track), error: reason, failures });
    this.status = 'error';
    this.notify(() => this.emit('trackError', track, reason));

    const next = this.queue.advance();
    if (failures > this.options.retryBudget) {
      const failure = new PlaybackFailed(reason, failures);
      this.preparing = false;
      this.status = 'idle';
      logError('session_playback_failed', failure, { guildId: this.guildId });
      this.notify(() => this.emit('playbackFailed', failure.message));
      return false;
    }
    if (!next) {
      this.exhausted();
      return false;
    }
    return true;
  }

  // Lock held.
  private start(generation: number, track: Track, handle: StreamHandle): boolean {
    if (generation !== this.generation || this.disposed) return false;

    this.preparing = false;
    this.current = handle;
    this.playingTrack = track;
    this.status = 'playing';

    const ticket = this.ticketFor(generation);
    try {
      this.sink.play(handle, ticket);
    } catch (error) {
      logError('session_sink_error', error, { guildId: this.guildId, operation: 'play' });
      ticket.failed(error);
    }
    logEvent('session_now_playing', { guildId: this.guildId, generation, ...describeTrack(track), quality: handle.quality });
    this.notify(() => this.emit('nowPlaying', track));
    return true;
  }

  private ticketFor(generation: number): PlaybackTicket {
    let settled = false;
    const settle = (message: CompletionMessage): void => {
      if (settled) return;
      settled = true;
      this.deliver(message).catch((error: unknown) => {
        logError('session_completion_failed', error, { guildId: this.guildId, generation });
      });
    };
    return {
      generation,
      finished: () => settle({ generation, outcome: 'finished' }),
      failed: (error) => settle({ generation, outcome: 'failed', error }),
    };
  }

  // Sink errors are logged and reported as a failed call, never thrown.
  private callSink<T>(operation: string, call: () => T): T | false {
    try {
      return call();
    } catch (error) {
      logError('session_sink_error', error, { guildId: this.guildId, operation });
      return false;
    }
  }

  private notify(emit: () => void): void {
    try {
      emit();
    } catch (error) {
      logError('session_listener_error', error, { guildId: this.guildId });
    }
  }
}

function clampVolume(volume: number): number {
  return Math.max(0, Math.min(1, volume));
}
