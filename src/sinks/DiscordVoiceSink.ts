import {
  AudioPlayer,
  AudioPlayerStatus,
  AudioResource,
  StreamType,
  createAudioPlayer,
  createAudioResource,
  getVoiceConnection,
} from '@discordjs/voice';
import type { StreamHandle } from '../types/music';
import type { AudioSink, PlaybackTicket } from '../services/SessionEngine';
import { logError, logEvent } from '../utils/logger';

export interface TrackMetadata {
  title: string;
  provider: string;
}

export interface SubscriptionLike {
  unsubscribe(): void;
}

/** The part of a VoiceConnection the sink needs. */
export interface VoiceConnectionLike {
  subscribe(player: AudioPlayer): SubscriptionLike | undefined;
}

/**
 * AudioSink on an @discordjs/voice audio player. The player going idle after
 * a resource played settles that resource's ticket as finished; a player
 * error settles it as failed. Resources carry an inline volume so volume
 * changes reach the playing stream.
 */
export class DiscordVoiceSink implements AudioSink {
  readonly player: AudioPlayer;
  private readonly subscription: SubscriptionLike | undefined;
  private active: { ticket: PlaybackTicket; resource: AudioResource<TrackMetadata> } | null = null;
  private volume = 1;

  constructor(connection: VoiceConnectionLike, player: AudioPlayer = createAudioPlayer()) {
    this.player = player;
    this.subscription = connection.subscribe(player);

    player.on(AudioPlayerStatus.Idle, () => {
      const active = this.active;
      this.active = null;
      active?.ticket.finished();
    });

    player.on('error', (error) => {
      const active = this.active;
      if (!active || error.resource !== active.resource) return;
      this.active = null;
      logError('audio_player_error', error, { title: active.resource.metadata.title });
      active.ticket.failed(error);
    });
  }

  play(handle: StreamHandle, ticket: PlaybackTicket): void {
    const resource = createAudioResource<TrackMetadata>(handle.stream, {
      inputType: StreamType.Arbitrary,
      inlineVolume: true,
      metadata: { title: handle.track.title, provider: handle.track.sourceProvider },
    });
    resource.volume?.setVolume(this.volume);
    this.active = { ticket, resource };
    this.player.play(resource);
    logEvent('audio_player_started', { title: handle.track.title, generation: ticket.generation });
  }

  pause(): boolean {
    return this.player.pause();
  }

  resume(): boolean {
    return this.player.unpause();
  }

  setVolume(volume: number): void {
    this.volume = volume;
    this.active?.resource.volume?.setVolume(volume);
  }

  stop(): void {
    // Cleared first so the idle transition is not reported as a finish
    this.active = null;
    this.player.stop(true);
  }

  destroy(): void {
    this.stop();
    this.subscription?.unsubscribe();
    this.player.removeAllListeners();
  }
}

/**
 * Sink factory for guilds whose voice connection was joined elsewhere with
 * `joinVoiceChannel`. Fails when the guild has no connection yet.
 */
export function voiceConnectionSinkFactory(group?: string): (guildId: string) => DiscordVoiceSink {
  return (guildId) => {
    const connection = group === undefined ? getVoiceConnection(guildId) : getVoiceConnection(guildId, group);
    if (!connection) throw new Error(`No voice connection for guild ${guildId}`);
    return new DiscordVoiceSink(connection);
  };
}
