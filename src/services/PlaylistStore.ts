import type { Playlist, Track } from '../types/music';
import type { PlaylistRepository } from './playlistRepositories';
import {
  IndexOutOfRange,
  InvalidInput,
  PlaylistFull,
  PlaylistNameConflict,
  PlaylistNotFound,
} from '../errors';
import { KeyedMutex } from '../utils/mutex';
import { logEvent } from '../utils/logger';

const MAX_NAME_LENGTH = 100;

/**
 * Named track lists per owner. Writes to one (owner, name) are serialized;
 * other playlists stay readable and writable meanwhile.
 */
export class PlaylistStore {
  private readonly locks = new KeyedMutex();

  constructor(
    private readonly repository: PlaylistRepository,
    private readonly maxPlaylistSize: number,
    private readonly now: () => number = Date.now
  ) {}

  async create(ownerId: string, name: string): Promise<Playlist> {
    const playlistName = this.validName(name);
    return this.locked(ownerId, playlistName, async () => {
      if (await this.repository.load(ownerId, playlistName)) {
        throw new PlaylistNameConflict(ownerId, playlistName);
      }
      const playlist = this.newPlaylist(ownerId, playlistName);
      await this.repository.save(playlist);
      logEvent('playlist_created', { ownerId, name: playlistName });
      return playlist;
    });
  }

  /** Appends a track, creating the playlist when it does not exist yet. */
  async addTrack(ownerId: string, name: string, track: Track): Promise<Playlist> {
    const playlistName = this.validName(name);
    return this.locked(ownerId, playlistName, async () => {
      const playlist = (await this.repository.load(ownerId, playlistName)) ?? this.newPlaylist(ownerId, playlistName);
      if (playlist.tracks.length >= this.maxPlaylistSize) {
        throw new PlaylistFull(playlistName, this.maxPlaylistSize);
      }
      const updated: Playlist = { ...playlist, tracks: [...playlist.tracks, track], updatedAt: this.now() };
      await this.repository.save(updated);
      logEvent('playlist_track_added', { ownerId, name: playlistName, title: track.title, size: updated.tracks.length });
      return updated;
    });
  }

  async removeTrack(ownerId: string, rawName: string, index: number): Promise<Track> {
    const name = rawName.trim();
    return this.locked(ownerId, name, async () => {
      const playlist = await this.require(ownerId, name);
      const removed = Number.isInteger(index) ? playlist.tracks[index] : undefined;
      if (!removed) throw new IndexOutOfRange(index, playlist.tracks.length);
      const tracks = playlist.tracks.filter((_, i) => i !== index);
      await this.repository.save({ ...playlist, tracks, updatedAt: this.now() });
      logEvent('playlist_track_removed', { ownerId, name, index, title: removed.title });
      return removed;
    });
  }

  async rename(ownerId: string, rawFrom: string, to: string): Promise<Playlist> {
    const from = rawFrom.trim();
    const target = this.validName(to);
    if (target === from) return this.get(ownerId, from);

    // Both names locked, in a fixed order so two opposite renames cannot deadlock
    const [first, second] = [from, target].sort();
    return this.locked(ownerId, first ?? from, () =>
      this.locked(ownerId, second ?? target, async () => {
        const playlist = await this.require(ownerId, from);
        if (await this.repository.load(ownerId, target)) {
          throw new PlaylistNameConflict(ownerId, target);
        }
        const renamed: Playlist = { ...playlist, name: target, updatedAt: this.now() };
        await this.repository.save(renamed);
        await this.repository.remove(ownerId, from);
        logEvent('playlist_renamed', { ownerId, from, to: target });
        return renamed;
      })
    );
  }

  async delete(ownerId: string, rawName: string): Promise<void> {
    const name = rawName.trim();
    await this.locked(ownerId, name, async () => {
      if (!(await this.repository.remove(ownerId, name))) {
        throw new PlaylistNotFound(ownerId, name);
      }
      logEvent('playlist_deleted', { ownerId, name });
    });
  }

  /** A copy; changing it does not change the stored playlist. */
  async get(ownerId: string, name: string): Promise<Playlist> {
    return this.require(ownerId, name.trim());
  }

  async list(ownerId: string): Promise<string[]> {
    return this.repository.listNames(ownerId);
  }

  private async require(ownerId: string, name: string): Promise<Playlist> {
    const playlist = await this.repository.load(ownerId, name);
    if (!playlist) throw new PlaylistNotFound(ownerId, name);
    return playlist;
  }

  private newPlaylist(ownerId: string, name: string): Playlist {
    const ts = this.now();
    return { ownerId, name, tracks: [], createdAt: ts, updatedAt: ts };
  }

  private validName(name: string): string {
    const trimmed = name.trim();
    if (!trimmed) throw new InvalidInput('Playlist name must not be empty');
    if (trimmed.length > MAX_NAME_LENGTH) {
      throw new InvalidInput(`Playlist name must be at most ${MAX_NAME_LENGTH} characters`);
    }
    return trimmed;
  }

  private locked<T>(ownerId: string, name: string, task: () => Promise<T>): Promise<T> {
    return this.locks.run(JSON.stringify([ownerId, name]), task);
  }
}
