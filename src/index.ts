import type { PlayerConfig } from './types/music';
import { playerConfig } from './config';
import { createHttpClient } from './utils/http';
import { createRegistry } from './services/providers/types';
import { YouTubeAdapter } from './services/providers/YouTubeAdapter';
import { SpotifyAdapter } from './services/providers/SpotifyAdapter';
import { SoundCloudAdapter } from './services/providers/SoundCloudAdapter';
import { UrlVerifier } from './services/UrlVerifier';
import { ResolutionPipeline } from './services/ResolutionPipeline';
import { YtDlpPageResolver } from './services/YtDlpPageResolver';
import { httpSegmentOpener } from './services/SegmentedStream';
import { StreamPreparer } from './services/StreamPreparer';
import { InMemoryPlaylistRepository, JsonFilePlaylistRepository } from './services/playlistRepositories';
import { PlaylistStore } from './services/PlaylistStore';
import { DownloadService } from './services/DownloadService';
import { MusicManager, type SinkFactory } from './services/MusicManager';
import { logEvent } from './utils/logger';

/**
 * Builds a MusicManager on the real providers, yt-dlp and a playlist store
 * (a JSON file when PLAYLIST_STORE_PATH is set, memory otherwise).
 */
export function createMusicManager(sinkFactory: SinkFactory, config: PlayerConfig = playerConfig): MusicManager {
  const providerHttp = createHttpClient(config.resolutionTimeoutMs);
  const streamHttp = createHttpClient(config.streamTimeoutMs);

  const youtube = new YouTubeAdapter(providerHttp);
  const registry = createRegistry([
    youtube,
    new SpotifyAdapter(providerHttp, youtube),
    new SoundCloudAdapter(providerHttp, config.soundcloudClientId),
  ]);

  const resolver = new ResolutionPipeline(
    registry,
    new UrlVerifier(createHttpClient(config.verificationTimeoutMs), config.verificationTimeoutMs),
    config
  );
  const preparer = new StreamPreparer(
    httpSegmentOpener(streamHttp, config.streamTimeoutMs),
    new YtDlpPageResolver({
      path: config.ytdlp.path,
      cookiesPath: config.ytdlp.cookiesPath,
      timeoutMs: config.streamTimeoutMs,
    })
  );

  const repository = config.playlistStorePath
    ? new JsonFilePlaylistRepository(config.playlistStorePath)
    : new InMemoryPlaylistRepository();

  logEvent('music_manager_created', {
    providers: resolver.tryList(''),
    playlistStore: config.playlistStorePath ? 'file' : 'memory',
  });

  return new MusicManager({
    resolver,
    preparer,
    playlists: new PlaylistStore(repository, config.maxPlaylistSize),
    downloads: new DownloadService(resolver, preparer, config.downloadPath),
    sinkFactory,
    config,
  });
}

export { playerConfig, loadPlayerConfig } from './config';
export * from './types/music';
export * from './errors';
export { MusicManager } from './services/MusicManager';
export type {
  MusicManagerDeps,
  MusicManagerEvents,
  QueryOptions,
  QueueResult,
  SessionCloseReason,
  SinkFactory,
} from './services/MusicManager';
export { SessionEngine } from './services/SessionEngine';
export type { AudioSink, PlaybackTicket, SessionEvents, SessionOptions } from './services/SessionEngine';
export { TrackQueue } from './services/TrackQueue';
export { ResolutionPipeline } from './services/ResolutionPipeline';
export type { MediaVerifier } from './services/ResolutionPipeline';
export { UrlVerifier } from './services/UrlVerifier';
export { StreamPreparer } from './services/StreamPreparer';
export type { PageResolver, TrackPreparer } from './services/StreamPreparer';
export { YtDlpPageResolver } from './services/YtDlpPageResolver';
export { PlaylistStore } from './services/PlaylistStore';
export { InMemoryPlaylistRepository, JsonFilePlaylistRepository } from './services/playlistRepositories';
export type { PlaylistRepository } from './services/playlistRepositories';
export { DownloadService } from './services/DownloadService';
export type { DownloadRequest, DownloadedFile, TrackResolver } from './services/DownloadService';
export { createRegistry } from './services/providers/types';
export type { ProviderAdapter, SearchOptions } from './services/providers/types';
export { YouTubeAdapter } from './services/providers/YouTubeAdapter';
export { SpotifyAdapter } from './services/providers/SpotifyAdapter';
export { SoundCloudAdapter } from './services/providers/SoundCloudAdapter';
export { DiscordVoiceSink, voiceConnectionSinkFactory } from './sinks/DiscordVoiceSink';
export type { VoiceConnectionLike } from './sinks/DiscordVoiceSink';
