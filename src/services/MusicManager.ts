import { EventEmitter } from 'eventemitter3';
import type {
  LoopMode,
  PlayerConfig,
  Playlist,
  ProviderId,
  Quality,
  SessionSnapshot,
  Track,
} from '../types/music';
import { AudioSink, SessionEngine } from './SessionEngine';
import type { RandomSource } from './TrackQueue';
import type { TrackPreparer } from './StreamPreparer';
import type { PlaylistStore } from './PlaylistStore';
import type { DownloadRequest, DownloadService, DownloadedFile, TrackResolver } from './DownloadService';
import { logError, logEvent } from '../utils/logger';
import { describeTrack } from '../utils/tracks';

export type SinkFactory = (guildId: string) => AudioSink;

export type SessionCloseReason = 'disconnect' | 'inactivity' | 'shutdown';

export interface MusicManagerEvents {
  nowPlaying: (guildId: string, track: Track) => void;
  trackError: (guildId: string, track: Track, reason: string) => void;
  queueExhausted: (guildId: string) => void;
  playbackFailed: (guildId: string, reason: string) => void;
  sessionClosed: (guildId: string, reason: SessionCloseReason) => void;
}

export interface QueryOptions {
  provider?: ProviderId | undefined;
  position?: number | undefined;
  quality?: Quality | undefined;
}

export type QueueResult =
  | { status: 'queued'; track: Track; position: number }
  // stop, skip or clear arrived while the query was resolving
  | { status: 'discarded'; track: Track };

export interface MusicManagerDeps {
  resolver: TrackResolver;
  preparer: TrackPreparer;
  playlists: PlaylistStore;
  downloads: DownloadService;
  sinkFactory: SinkFactory;
  config: Pick<PlayerConfig, 'maxQueueSize' | 'retryBudget' | 'inactivityTimeoutMs' | 'defaultQuality' | 'defaultVolume'>;
  random?: RandomSource;
}

/**
 * Front door for a chat front end: one SessionEngine per guild, created on
 * first use, plus the shared resolver, playlist store and downloads. Session
 * events are re-emitted with the guild id.
 */
export class MusicManager extends EventEmitter<MusicManagerEvents> {
  private readonly sessions = new Map<string, SessionEngine>();
  private readonly inactivityTimers = new Map<string, ReturnType<typeof setTimeout>>();

  constructor(private readonly deps: MusicManagerDeps) {
    super();
  }

  hasSession(guildId: string): boolean {
    return this.sessions.has(guildId);
  }

  /** Resolves `query`, queues it, and starts playback when the session is idle. */
  async play(guildId: string, query: string, options: QueryOptions = {}): Promise<QueueResult> {
    return this.withSession(guildId, async (session) => {
      const marks = session.marks();

      const track = await this.deps.resolver.resolve(query, options.provider, options.quality ?? this.deps.config.defaultQuality);
      const position = await session.enqueue(track, { position: options.position, expect: marks });
      if (position === null) {
        logEvent('play_request_discarded', { guildId, query });
        return { status: 'discarded', track };
      }

      logEvent('play_request_queued', { guildId, position, ...describeTrack(track) });
      await session.play();
      return { status: 'queued', track, position };
    });
  }

  /** Like play, without starting playback. */
  async enqueue(guildId: string, query: string, options: QueryOptions = {}): Promise<QueueResult> {
    return this.withSession(guildId, async (session) => {
      const { epoch } = session.marks();

      const track = await this.deps.resolver.resolve(query, options.provider, options.quality ?? this.deps.config.defaultQuality);
      const position = await session.enqueue(track, { position: options.position, expect: { epoch } });
      if (position === null) return { status: 'discarded', track };
      logEvent('song_added_to_queue', { guildId, position, ...describeTrack(track) });
      return { status: 'queued', track, position };
    });
  }

  async playIndex(guildId: string, index: number): Promise<boolean> {
    return this.withSession(guildId, (session) => session.play(index));
  }

  async pause(guildId: string): Promise<boolean> {
    return this.sessions.get(guildId)?.pause() ?? false;
  }

  async resume(guildId: string): Promise<boolean> {
    return this.sessions.get(guildId)?.resume() ?? false;
  }

  async skip(guildId: string): Promise<boolean> {
    return this.sessions.get(guildId)?.skip() ?? false;
  }

  async stop(guildId: string): Promise<void> {
    const session = this.sessions.get(guildId);
    if (!session) return;
    await session.stop();
    this.startInactivityTimer(guildId);
  }

  async clearQueue(guildId: string): Promise<number> {
    return this.sessions.get(guildId)?.clear() ?? 0;
  }

  async removeFromQueue(guildId: string, index: number): Promise<Track> {
    return this.withSession(guildId, (session) => session.removeAt(index));
  }

  async moveInQueue(guildId: string, fromIndex: number, toIndex: number): Promise<void> {
    await this.withSession(guildId, (session) => session.reorder(fromIndex, toIndex));
  }

  async setLoopMode(guildId: string, mode: LoopMode): Promise<void> {
    await this.withSession(guildId, (session) => session.setLoopMode(mode));
  }

  async setShuffle(guildId: string, enabled: boolean): Promise<void> {
    await this.withSession(guildId, (session) => session.setShuffle(enabled));
  }

  /** Volume in 0..1, clamped; resolves the volume now in effect. */
  async setVolume(guildId: string, volume: number): Promise<number> {
    return this.withSession(guildId, (session) => session.setVolume(volume));
  }

  getQueue(guildId: string): SessionSnapshot {
    const session = this.sessions.get(guildId);
    if (session) return session.snapshot();
    return {
      guildId,
      status: 'idle',
      nowPlaying: null,
      preparing: false,
      volume: this.deps.config.defaultVolume,
      items: [],
      cursor: null,
      loopMode: 'off',
      shuffleEnabled: false,
    };
  }

  getNowPlaying(guildId: string): Track | null {
    return this.sessions.get(guildId)?.nowPlaying() ?? null;
  }

  async playlistCreate(ownerId: string, name: string): Promise<Playlist> {
    return this.deps.playlists.create(ownerId, name);
  }

  async playlistAdd(ownerId: string, name: string, query: string, options: QueryOptions = {}): Promise<Playlist> {
    const track = await this.deps.resolver.resolve(query, options.provider, options.quality ?? this.deps.config.defaultQuality);
    return this.deps.playlists.addTrack(ownerId, name, track);
  }

  async playlistRemoveTrack(ownerId: string, name: string, index: number): Promise<Track> {
    return this.deps.playlists.removeTrack(ownerId, name, index);
  }

  /** Appends a copy of the playlist's tracks to the guild queue and starts playback when idle. */
  async playlistPlay(guildId: string, ownerId: string, name: string): Promise<number> {
    return this.withSession(guildId, async (session) => {
      const { epoch } = session.marks();

      const playlist = await this.deps.playlists.get(ownerId, name);
      if (playlist.tracks.length === 0) return 0;

      const first = await session.enqueueMany(playlist.tracks, { epoch });
      if (first === null) return 0;
      logEvent('playlist_queued', { guildId, ownerId, name: playlist.name, tracks: playlist.tracks.length });
      await session.play();
      return playlist.tracks.length;
    });
  }

  async playlistList(ownerId: string): Promise<string[]> {
    return this.deps.playlists.list(ownerId);
  }

  async playlistDelete(ownerId: string, name: string): Promise<void> {
    await this.deps.playlists.delete(ownerId, name);
  }

  async playlistRename(ownerId: string, from: string, to: string): Promise<Playlist> {
    return this.deps.playlists.rename(ownerId, from, to);
  }

  /** Bypasses the sessions entirely. */
  async download(request: DownloadRequest): Promise<DownloadedFile> {
    return this.deps.downloads.download(request);
  }

  async withDownload<T>(request: DownloadRequest, consume: (file: DownloadedFile) => Promise<T>): Promise<T> {
    return this.deps.downloads.withDownload(request, consume);
  }

  async disconnect(guildId: string, reason: SessionCloseReason = 'disconnect'): Promise<void> {
    this.cancelInactivityTimer(guildId);
    const session = this.sessions.get(guildId);
    if (!session) return;
    this.sessions.delete(guildId);
    await session.dispose();
    logEvent('session_closed', { guildId, reason });
    this.emit('sessionClosed', guildId, reason);
  }

  async shutdown(): Promise<void> {
    await Promise.all([...this.sessions.keys()].map((guildId) => this.disconnect(guildId, 'shutdown')));
  }

  /**
   * Runs a command on the guild's session, creating it when missing. The
   * inactivity countdown is held while the command runs and started again
   * afterwards if the session was left idle, whatever the outcome.
   */
  private async withSession<T>(guildId: string, command: (session: SessionEngine) => Promise<T>): Promise<T> {
    const session = this.getSession(guildId);
    this.cancelInactivityTimer(guildId);
    try {
      return await command(session);
    } finally {
      if (this.sessions.get(guildId) === session && !session.isActive() && !this.inactivityTimers.has(guildId)) {
        this.startInactivityTimer(guildId);
      }
    }
  }

  private getSession(guildId: string): SessionEngine {
    let session = this.sessions.get(guildId);
    if (!session) {
      session = new SessionEngine(guildId, this.deps.sinkFactory(guildId), this.deps.preparer, {
        maxQueueSize: this.deps.config.maxQueueSize,
        retryBudget: this.deps.config.retryBudget,
        volume: this.deps.config.defaultVolume,
        ...(this.deps.random ? { random: this.deps.random } : {}),
      });
      this.wire(guildId, session);
      this.sessions.set(guildId, session);
      logEvent('session_created', { guildId });
    }
    return session;
  }

  private wire(guildId: string, session: SessionEngine): void {
    session.on('nowPlaying', (track) => {
      this.cancelInactivityTimer(guildId);
      this.emit('nowPlaying', guildId, track);
    });
    session.on('trackError', (track, reason) => this.emit('trackError', guildId, track, reason));
    session.on('queueExhausted', () => {
      this.startInactivityTimer(guildId);
      this.emit('queueExhausted', guildId);
    });
    session.on('playbackFailed', (reason) => {
      this.startInactivityTimer(guildId);
      this.emit('playbackFailed', guildId, reason);
    });
  }

  private startInactivityTimer(guildId: string): void {
    this.cancelInactivityTimer(guildId);
    const timeout = this.deps.config.inactivityTimeoutMs;
    if (timeout <= 0) return;

    const timer = setTimeout(() => {
      this.inactivityTimers.delete(guildId);
      logEvent('inactivity_timeout', { guildId });
      this.disconnect(guildId, 'inactivity').catch((error: unknown) => {
        logError('inactivity_disconnect_failed', error, { guildId });
      });
    }, timeout);
    // Do not hold the event loop open for this timer
    timer.unref();
    this.inactivityTimers.set(guildId, timer);
    logEvent('inactivity_timer_started', { guildId, timeout });
  }

  private cancelInactivityTimer(guildId: string): void {
    const timer = this.inactivityTimers.get(guildId);
    if (timer) {
      clearTimeout(timer);
      this.inactivityTimers.delete(guildId);
      logEvent('inactivity_timer_cancelled', { guildId });
    }
  }
}
